import type { Octokit } from "@octokit/rest";
import { classifyPlatformError } from "../core/errors.js";
import type { FileChange } from "../core/platform.js";
import { getTreeSha, listTreeEntries } from "./repo.js";

type BlobMode = "100644" | "100755";

function toBlobMode(mode: string | undefined): BlobMode {
  return mode === "100755" ? "100755" : "100644";
}

/**
 * Writes all changes as a single commit on `branch` through the git data API:
 * tree, then commit, then one ref update. Nothing is visible on the branch
 * unless the final ref update succeeds, and that update refuses anything but
 * a fast-forward from `expectedHead`.
 */
export async function commitFiles(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  branch: string;
  expectedHead: string | null;
  baseCommit: string;
  message: string;
  changes: FileChange[];
}): Promise<{ commitSha: string }> {
  const { octokit, owner, repo, branch, expectedHead, baseCommit, message, changes } = args;
  if (!changes.length) throw new Error("No changes provided");

  const entries = await listTreeEntries({ octokit, owner, repo, commitSha: baseCommit });
  const modes = new Map(entries.map((entry) => [entry.path, entry.mode]));
  const baseTree = await getTreeSha({ octokit, owner, repo, commitSha: baseCommit });

  const tree = await octokit.git.createTree({
    owner,
    repo,
    base_tree: baseTree,
    tree: changes.map((change) => ({
      path: change.path,
      mode: toBlobMode(modes.get(change.path)),
      type: "blob" as const,
      content: change.content,
    })),
  });

  const commit = await octokit.git.createCommit({
    owner,
    repo,
    message,
    tree: tree.data.sha,
    parents: [baseCommit],
  });

  try {
    if (expectedHead === null) {
      await octokit.git.createRef({ owner, repo, ref: `refs/heads/${branch}`, sha: commit.data.sha });
    } else {
      await octokit.git.updateRef({ owner, repo, ref: `heads/${branch}`, sha: commit.data.sha, force: false });
    }
  } catch (err) {
    // 422 here means "not a fast forward" or "reference already exists".
    throw classifyPlatformError(err, `update ${branch}`, { conflictStatuses: [409, 422] });
  }

  return { commitSha: commit.data.sha };
}

export async function findOpenPullRequest(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  head: string;
  base: string;
}): Promise<{ prUrl: string; prNumber: number } | null> {
  const { octokit, owner, repo, head, base } = args;
  const { data } = await octokit.pulls.list({
    owner,
    repo,
    state: "open",
    head: `${owner}:${head}`,
    base,
    per_page: 1,
  });
  const pr = data[0];
  return pr ? { prUrl: pr.html_url, prNumber: pr.number } : null;
}

export async function openPullRequest(args: {
  octokit: Octokit;
  owner: string;
  repo: string;
  head: string;
  base: string;
  title: string;
  body?: string;
}): Promise<{ prUrl: string; prNumber: number }> {
  const { octokit, owner, repo, head, base, title, body } = args;
  const pr = await octokit.pulls.create({
    owner,
    repo,
    base,
    head,
    title,
    body: body ?? "",
  });

  if (!pr.data.html_url || !pr.data.number) throw new Error("Failed to create PR");
  return { prUrl: pr.data.html_url, prNumber: pr.data.number };
}
