import type { PlatformKind, RepoTarget } from "./types.js";

export type ProjectRef = {
  id: string;
  name: string;
};

export type RepositoryRef = {
  id: string;
  name: string;
  project: ProjectRef;
  /** Short branch name, e.g. "main". null for a repository without commits. */
  defaultBranch: string | null;
  /** Disabled, archived or otherwise read-only. */
  disabled: boolean;
};

export type RepoFile = {
  path: string;
  /** Blob id, when the listing provides one. */
  objectId?: string;
  size?: number;
  /** Set when the platform already classified the file. */
  isBinary?: boolean;
};

export type FileContent =
  | { kind: "text"; content: string }
  | { kind: "binary" }
  | { kind: "unsupported-encoding"; encoding: string };

export type FileChange = {
  path: string;
  content: string;
};

export type PushRequest = {
  target: RepoTarget;
  branch: string;
  /** Head the branch must still point at; null when the push creates the branch. */
  expectedHead: string | null;
  /** Commit the new commit is built on. */
  baseCommit: string;
  message: string;
  changes: FileChange[];
};

export type PullRequestRef = {
  id: string;
  url: string;
};

export type PullRequestQuery = {
  sourceBranch: string;
  targetBranch: string;
};

export type PullRequestDraft = PullRequestQuery & {
  title: string;
  description: string;
};

/**
 * What the engine needs from a hosting platform. Implementations translate
 * failures into the error taxonomy in errors.ts and must be safe to share
 * across concurrent workers.
 */
export interface PlatformClient {
  readonly kind: PlatformKind;
  listProjects(): Promise<ProjectRef[]>;
  listRepositories(project: string): Promise<RepositoryRef[]>;
  getRepository(project: string, repository: string): Promise<RepositoryRef>;
  getBranchHead(target: RepoTarget, branch: string): Promise<string | null>;
  listFiles(target: RepoTarget, commitId: string): Promise<RepoFile[]>;
  readFile(target: RepoTarget, file: RepoFile, commitId: string): Promise<FileContent>;
  /** One commit containing every change, or nothing at all. */
  pushCommit(request: PushRequest): Promise<{ commitId: string }>;
  findPullRequest(target: RepoTarget, query: PullRequestQuery): Promise<PullRequestRef | null>;
  createPullRequest(target: RepoTarget, draft: PullRequestDraft): Promise<PullRequestRef>;
}

export function formatTarget(target: RepoTarget): string {
  return `${target.projectName}/${target.repositoryName}`;
}

export function toRepoTarget(repository: RepositoryRef): RepoTarget {
  return {
    projectId: repository.project.id,
    projectName: repository.project.name,
    repositoryId: repository.id,
    repositoryName: repository.name,
  };
}
