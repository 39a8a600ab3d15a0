import type { WebApi } from "azure-devops-node-api";
import type { ICoreApi } from "azure-devops-node-api/CoreApi.js";
import type { IGitApi } from "azure-devops-node-api/GitApi.js";
import GitInterfaces from "azure-devops-node-api/interfaces/GitInterfaces.js";
import type { GitItem, GitPush, GitRepository, GitVersionDescriptor } from "azure-devops-node-api/interfaces/GitInterfaces.js";
import {
  BulkReplaceError,
  ConflictError,
  NotFoundError,
  PlatformError,
  classifyPlatformError,
  errorMessage,
} from "../core/errors.js";
import type {
  FileContent,
  PlatformClient,
  ProjectRef,
  PullRequestDraft,
  PullRequestQuery,
  PullRequestRef,
  PushRequest,
  RepoFile,
  RepositoryRef,
} from "../core/platform.js";
import type { RepoTarget } from "../core/types.js";
import { organizationUrl } from "./client.js";

const PROJECT_PAGE_SIZE = 100;
const ZERO_OBJECT_ID = "0".repeat(40);
/** Code pages we can round-trip as UTF-8 text: UTF-8 and US-ASCII. */
const TEXT_CODE_PAGES = new Set([65001, 20127]);

function toBranchRef(branch: string): string {
  return `refs/heads/${branch}`;
}

function fromBranchRef(ref: string | undefined): string | null {
  if (!ref) return null;
  return ref.replace(/^refs\/heads\//, "");
}

function atCommit(commitId: string): GitVersionDescriptor {
  return { version: commitId, versionType: GitInterfaces.GitVersionType.Commit };
}

/** "TF401028: The reference has already been updated by another client" */
function isStaleRefError(err: unknown): boolean {
  return /TF401028|TF401035|already been updated/i.test(errorMessage(err));
}

export class AzureDevOpsPlatform implements PlatformClient {
  readonly kind = "azure-devops" as const;
  private coreApi?: Promise<ICoreApi>;
  private gitApi?: Promise<IGitApi>;

  constructor(
    private readonly connection: WebApi,
    private readonly options: { organization: string; baseUrl: string }
  ) {}

  private core(): Promise<ICoreApi> {
    this.coreApi ??= this.connection.getCoreApi();
    return this.coreApi;
  }

  private git(): Promise<IGitApi> {
    this.gitApi ??= this.connection.getGitApi();
    return this.gitApi;
  }

  private async request<T>(context: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof BulkReplaceError) && isStaleRefError(err)) {
        throw new ConflictError(`${context}: ${errorMessage(err)}`, { cause: err });
      }
      throw classifyPlatformError(err, context);
    }
  }

  private toRepositoryRef(repository: GitRepository, fallbackProject: string): RepositoryRef {
    if (!repository.id || !repository.name) {
      throw new PlatformError(`Repository listing in ${fallbackProject} returned an entry without id or name.`);
    }
    return {
      id: repository.id,
      name: repository.name,
      project: {
        id: repository.project?.id ?? fallbackProject,
        name: repository.project?.name ?? fallbackProject,
      },
      defaultBranch: fromBranchRef(repository.defaultBranch),
      disabled: Boolean(repository.isDisabled || repository.isInMaintenance),
    };
  }

  async listProjects(): Promise<ProjectRef[]> {
    return this.request(`list projects of ${this.options.organization}`, async () => {
      const core = await this.core();
      const projects: ProjectRef[] = [];
      for (let skip = 0; ; skip += PROJECT_PAGE_SIZE) {
        const page = await core.getProjects(undefined, PROJECT_PAGE_SIZE, skip);
        if (!page) throw new NotFoundError(`Organization ${this.options.organization} was not found.`);
        for (const project of page) {
          if (project.id && project.name) projects.push({ id: project.id, name: project.name });
        }
        if (page.length < PROJECT_PAGE_SIZE) break;
      }
      return projects;
    });
  }

  async listRepositories(project: string): Promise<RepositoryRef[]> {
    return this.request(`list repositories of ${project}`, async () => {
      const core = await this.core();
      // Missing resources come back as null rather than as an error.
      const found = await core.getProject(project);
      if (!found) throw new NotFoundError(`Project ${project} was not found.`);

      const git = await this.git();
      const repositories = (await git.getRepositories(project)) ?? [];
      return repositories.map((repository) => this.toRepositoryRef(repository, project));
    });
  }

  async getRepository(project: string, repository: string): Promise<RepositoryRef> {
    return this.request(`get repository ${project}/${repository}`, async () => {
      const git = await this.git();
      const found = await git.getRepository(repository, project);
      if (!found) throw new NotFoundError(`Repository ${project}/${repository} was not found.`);
      return this.toRepositoryRef(found, project);
    });
  }

  async getBranchHead(target: RepoTarget, branch: string): Promise<string | null> {
    return this.request(`get ref ${target.repositoryName}@${branch}`, async () => {
      const git = await this.git();
      const refs = (await git.getRefs(target.repositoryId, target.projectId, `heads/${branch}`)) ?? [];
      const ref = refs.find((candidate) => candidate.name === toBranchRef(branch));
      return ref?.objectId ?? null;
    });
  }

  async listFiles(target: RepoTarget, commitId: string): Promise<RepoFile[]> {
    return this.request(`list files of ${target.repositoryName}@${commitId}`, async () => {
      const git = await this.git();
      const items =
        (await git.getItems(
          target.repositoryId,
          target.projectId,
          "/",
          GitInterfaces.VersionControlRecursionType.Full,
          true,
          false,
          false,
          false,
          atCommit(commitId)
        )) ?? [];

      const files: RepoFile[] = [];
      for (const item of items) {
        if (item.isFolder || !item.path) continue;
        if (item.gitObjectType !== undefined && item.gitObjectType !== GitInterfaces.GitObjectType.Blob) continue;
        files.push({
          path: item.path,
          objectId: item.objectId,
          isBinary: item.contentMetadata?.isBinary === true ? true : undefined,
        });
      }
      return files;
    });
  }

  async readFile(target: RepoTarget, file: RepoFile, commitId: string): Promise<FileContent> {
    const item: GitItem | null = await this.request(`read ${target.repositoryName}:${file.path}`, async () => {
      const git = await this.git();
      return git.getItem(
        target.repositoryId,
        file.path,
        target.projectId,
        undefined,
        undefined,
        true,
        false,
        false,
        atCommit(commitId),
        true
      );
    });

    if (!item) throw new NotFoundError(`${file.path} does not exist at ${commitId}.`);
    const metadata = item.contentMetadata;
    if (metadata?.isBinary) return { kind: "binary" };
    if (metadata?.encoding !== undefined && !TEXT_CODE_PAGES.has(metadata.encoding)) {
      return { kind: "unsupported-encoding", encoding: `code page ${metadata.encoding}` };
    }
    return { kind: "text", content: item.content ?? "" };
  }

  /**
   * A missing branch is created at `baseCommit` first, as the push API only
   * updates refs. The push itself is conditioned on the old object id, so a
   * concurrent update fails the whole push.
   */
  async pushCommit(request: PushRequest): Promise<{ commitId: string }> {
    const { target, branch, message, changes } = request;
    const context = `push ${target.repositoryName}@${branch}`;

    return this.request(context, async () => {
      const git = await this.git();

      if (request.expectedHead === null) {
        const results = await git.updateRefs(
          [{ name: toBranchRef(branch), oldObjectId: ZERO_OBJECT_ID, newObjectId: request.baseCommit }],
          target.repositoryId,
          target.projectId
        );
        if (!results?.[0]?.success) {
          throw new ConflictError(`${context}: branch ${branch} could not be created (it may already exist).`);
        }
      }

      const push: GitPush = {
        refUpdates: [{ name: toBranchRef(branch), oldObjectId: request.expectedHead ?? request.baseCommit }],
        commits: [
          {
            comment: message,
            changes: changes.map((change) => ({
              changeType: GitInterfaces.VersionControlChangeType.Edit,
              item: { path: change.path },
              newContent: { content: change.content, contentType: GitInterfaces.ItemContentType.RawText },
            })),
          },
        ],
      };

      const created = await git.createPush(push, target.repositoryId, target.projectId);
      const commitId = created?.commits?.[0]?.commitId;
      if (!commitId) throw new PlatformError(`${context}: push response carried no commit id.`);
      return { commitId };
    });
  }

  private pullRequestUrl(target: RepoTarget, id: number): string {
    const base = organizationUrl(this.options.baseUrl, this.options.organization);
    return `${base}/${encodeURIComponent(target.projectName)}/_git/${encodeURIComponent(target.repositoryName)}/pullrequest/${id}`;
  }

  async findPullRequest(target: RepoTarget, query: PullRequestQuery): Promise<PullRequestRef | null> {
    return this.request(`find pull request ${target.repositoryName}`, async () => {
      const git = await this.git();
      const found =
        (await git.getPullRequests(
          target.repositoryId,
          {
            sourceRefName: toBranchRef(query.sourceBranch),
            targetRefName: toBranchRef(query.targetBranch),
            status: GitInterfaces.PullRequestStatus.Active,
          },
          target.projectId
        )) ?? [];
      const id = found[0]?.pullRequestId;
      return id === undefined ? null : { id: String(id), url: this.pullRequestUrl(target, id) };
    });
  }

  async createPullRequest(target: RepoTarget, draft: PullRequestDraft): Promise<PullRequestRef> {
    return this.request(`create pull request ${target.repositoryName}`, async () => {
      const git = await this.git();
      const created = await git.createPullRequest(
        {
          sourceRefName: toBranchRef(draft.sourceBranch),
          targetRefName: toBranchRef(draft.targetBranch),
          title: draft.title,
          description: draft.description,
        },
        target.repositoryId,
        target.projectId
      );
      const id = created?.pullRequestId;
      if (id === undefined) throw new PlatformError("Pull request response carried no id.");
      return { id: String(id), url: this.pullRequestUrl(target, id) };
    });
  }
}
