import type { Octokit } from "@octokit/rest";
import { PlatformError, httpStatusOf } from "../core/errors.js";
import type { RepoFile } from "../core/platform.js";

const SYMLINK_MODE = "120000";

export type RepoInfo = {
  id: number;
  name: string;
  defaultBranch: string | null;
  disabled: boolean;
};

export async function getRepoInfo(args: { octokit: Octokit; owner: string; repo: string }): Promise<RepoInfo> {
  const { octokit, owner, repo } = args;
  const { data } = await octokit.repos.get({ owner, repo });
  return {
    id: data.id,
    name: data.name,
    defaultBranch: data.default_branch || null,
    disabled: Boolean(data.archived || data.disabled),
  };
}

export async function listOwnerRepos(args: { octokit: Octokit; owner: string }): Promise<RepoInfo[]> {
  const { octokit, owner } = args;
  const { data: account } = await octokit.users.getByUsername({ username: owner });

  const repos =
    account.type === "Organization"
      ? await octokit.paginate(octokit.repos.listForOrg, { org: owner, per_page: 100 })
      : await octokit.paginate(octokit.repos.listForUser, { username: owner, per_page: 100 });

  return repos.map((repo) => ({
    id: repo.id,
    name: repo.name,
    defaultBranch: repo.default_branch || null,
    disabled: Boolean(repo.archived || repo.disabled),
  }));
}

/** Commit sha the branch points at, or null when the branch does not exist. */
export async function getBranchSha(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  branch: string;
}): Promise<string | null> {
  const { octokit, owner, repo, branch } = args;
  try {
    const ref = await octokit.git.getRef({ owner, repo, ref: `heads/${branch}` });
    return ref.data.object.sha;
  } catch (err) {
    // An empty repository answers 409 instead of 404.
    const status = httpStatusOf(err);
    if (status === 404 || status === 409) return null;
    throw err;
  }
}

export async function getTreeSha(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  commitSha: string;
}): Promise<string> {
  const { octokit, owner, repo, commitSha } = args;
  const commit = await octokit.git.getCommit({ owner, repo, commit_sha: commitSha });
  return commit.data.tree.sha;
}

type TreeEntry = {
  path: string;
  sha: string;
  mode: string;
  size?: number;
};

export async function listTreeEntries(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  commitSha: string;
}): Promise<TreeEntry[]> {
  const { octokit, owner, repo, commitSha } = args;
  const treeSha = await getTreeSha({ octokit, owner, repo, commitSha });
  const { data } = await octokit.git.getTree({
    owner,
    repo,
    tree_sha: treeSha,
    recursive: "1",
  });

  if (data.truncated) {
    throw new PlatformError(`Tree of ${owner}/${repo}@${commitSha} is too large to list in one request.`);
  }

  const entries: TreeEntry[] = [];
  for (const item of data.tree ?? []) {
    if (item.type !== "blob" || !item.path || !item.sha || !item.mode) continue;
    entries.push({ path: item.path, sha: item.sha, mode: item.mode, size: item.size });
  }
  return entries;
}

/** Regular blobs only; symlinks and submodules are not text files we may rewrite. */
export async function listRepoFiles(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  commitSha: string;
}): Promise<RepoFile[]> {
  const entries = await listTreeEntries(args);
  return entries
    .filter((entry) => entry.mode !== SYMLINK_MODE)
    .map((entry) => ({ path: entry.path, objectId: entry.sha, size: entry.size }));
}

export async function getBlobBytes(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  sha: string;
}): Promise<Buffer> {
  const { octokit, owner, repo, sha } = args;
  const { data } = await octokit.git.getBlob({ owner, repo, file_sha: sha });
  return Buffer.from(data.content, data.encoding === "base64" ? "base64" : "utf8");
}

export async function getFileBytes(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  path: string;
  ref: string;
}): Promise<Buffer> {
  const { octokit, owner, repo, path, ref } = args;
  const { data } = await octokit.repos.getContent({ owner, repo, path, ref });

  if (Array.isArray(data)) {
    throw new PlatformError(`Path "${path}" is a directory, expected a file.`);
  }
  if (data.type !== "file") {
    throw new PlatformError(`Path "${path}" is not a regular file.`);
  }

  const content = "content" in data ? data.content : undefined;
  const encoding = "encoding" in data ? data.encoding : undefined;
  // The contents API leaves content empty above 1 MB; the blob API has no such limit.
  if (!content || encoding !== "base64") {
    return getBlobBytes({ octokit, owner, repo, sha: data.sha });
  }
  return Buffer.from(content, "base64");
}
