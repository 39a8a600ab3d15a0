import type { Octokit } from "@octokit/rest";
import { NotFoundError, classifyPlatformError } from "../core/errors.js";
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
import { decodeBlob } from "../core/text.js";
import type { RepoTarget } from "../core/types.js";
import { commitFiles, findOpenPullRequest, openPullRequest } from "./pr.js";
import { getBlobBytes, getBranchSha, getFileBytes, getRepoInfo, listOwnerRepos, listRepoFiles, type RepoInfo } from "./repo.js";

/**
 * GitHub has no project level between the owner and its repositories, so the
 * owner is exposed as the single project of the organization.
 */
export class GitHubPlatform implements PlatformClient {
  readonly kind = "github" as const;
  private readonly project: ProjectRef;

  constructor(private readonly octokit: Octokit, private readonly owner: string) {
    this.project = { id: owner, name: owner };
  }

  private async request<T>(context: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      throw classifyPlatformError(err, context);
    }
  }

  private assertProject(project: string): void {
    if (project.toLowerCase() !== this.owner.toLowerCase()) {
      throw new NotFoundError(`"${project}" is not a project of ${this.owner}; GitHub scopes use the owner name.`);
    }
  }

  private toRepositoryRef(info: RepoInfo): RepositoryRef {
    return {
      id: String(info.id),
      name: info.name,
      project: this.project,
      defaultBranch: info.defaultBranch,
      disabled: info.disabled,
    };
  }

  async listProjects(): Promise<ProjectRef[]> {
    await this.request(`get owner ${this.owner}`, () => this.octokit.users.getByUsername({ username: this.owner }));
    return [this.project];
  }

  async listRepositories(project: string): Promise<RepositoryRef[]> {
    this.assertProject(project);
    const repos = await this.request(`list repositories of ${this.owner}`, () =>
      listOwnerRepos({ octokit: this.octokit, owner: this.owner })
    );
    return repos.map((info) => this.toRepositoryRef(info));
  }

  async getRepository(project: string, repository: string): Promise<RepositoryRef> {
    this.assertProject(project);
    const info = await this.request(`get repository ${this.owner}/${repository}`, () =>
      getRepoInfo({ octokit: this.octokit, owner: this.owner, repo: repository })
    );
    return this.toRepositoryRef(info);
  }

  getBranchHead(target: RepoTarget, branch: string): Promise<string | null> {
    return this.request(`get ref ${target.repositoryName}@${branch}`, () =>
      getBranchSha({ octokit: this.octokit, owner: this.owner, repo: target.repositoryName, branch })
    );
  }

  listFiles(target: RepoTarget, commitId: string): Promise<RepoFile[]> {
    return this.request(`list files of ${target.repositoryName}@${commitId}`, () =>
      listRepoFiles({ octokit: this.octokit, owner: this.owner, repo: target.repositoryName, commitSha: commitId })
    );
  }

  async readFile(target: RepoTarget, file: RepoFile, commitId: string): Promise<FileContent> {
    const repo = target.repositoryName;
    const bytes = await this.request(`read ${repo}:${file.path}`, () =>
      file.objectId
        ? getBlobBytes({ octokit: this.octokit, owner: this.owner, repo, sha: file.objectId })
        : getFileBytes({ octokit: this.octokit, owner: this.owner, repo, path: file.path, ref: commitId })
    );
    return decodeBlob(bytes);
  }

  async pushCommit(request: PushRequest): Promise<{ commitId: string }> {
    const { commitSha } = await this.request(`push ${request.target.repositoryName}@${request.branch}`, () =>
      commitFiles({
        octokit: this.octokit,
        owner: this.owner,
        repo: request.target.repositoryName,
        branch: request.branch,
        expectedHead: request.expectedHead,
        baseCommit: request.baseCommit,
        message: request.message,
        changes: request.changes,
      })
    );
    return { commitId: commitSha };
  }

  async findPullRequest(target: RepoTarget, query: PullRequestQuery): Promise<PullRequestRef | null> {
    const pr = await this.request(`find pull request ${target.repositoryName}`, () =>
      findOpenPullRequest({
        octokit: this.octokit,
        owner: this.owner,
        repo: target.repositoryName,
        head: query.sourceBranch,
        base: query.targetBranch,
      })
    );
    return pr ? { id: String(pr.prNumber), url: pr.prUrl } : null;
  }

  async createPullRequest(target: RepoTarget, draft: PullRequestDraft): Promise<PullRequestRef> {
    const pr = await this.request(`create pull request ${target.repositoryName}`, () =>
      openPullRequest({
        octokit: this.octokit,
        owner: this.owner,
        repo: target.repositoryName,
        head: draft.sourceBranch,
        base: draft.targetBranch,
        title: draft.title,
        body: draft.description,
      })
    );
    return { id: String(pr.prNumber), url: pr.prUrl };
  }
}
