import type { PipelineContext } from "./context.js";
import {
  CommitApplyError,
  ConflictError,
  NotFoundError,
  RunCancelledError,
  errorMessage,
  toErrorDetail,
} from "./errors.js";
import { buildOutcome, failedOutcome } from "./outcome.js";
import { formatTarget, type FileContent, type PullRequestRef } from "./platform.js";
import { backoffDelay, sleep } from "./retry.js";
import { applyRules } from "./rules.js";
import type { ChangePlan, ErrorDetail, FileMatch, RepoTarget, RunOutcome } from "./types.js";

type PushBase = {
  branch: string;
  expectedHead: string | null;
  baseCommit: string;
};

async function resolvePushBase(ctx: PipelineContext, plan: ChangePlan, defaultBranch: string): Promise<PushBase> {
  const { client, config, call } = ctx;
  const label = formatTarget(plan.target);

  const defaultHead = await call(`get head of ${label}@${defaultBranch}`, () =>
    client.getBranchHead(plan.target, defaultBranch)
  );
  if (!defaultHead) {
    throw new NotFoundError(`Branch ${defaultBranch} of ${label} no longer exists.`);
  }

  if (config.delivery.mode === "direct") {
    return { branch: defaultBranch, expectedHead: defaultHead, baseCommit: defaultHead };
  }

  const workBranch = config.delivery.branchName;
  const workHead = await call(`get head of ${label}@${workBranch}`, () =>
    client.getBranchHead(plan.target, workBranch)
  );
  if (workHead) return { branch: workBranch, expectedHead: workHead, baseCommit: workHead };
  return { branch: workBranch, expectedHead: null, baseCommit: defaultHead };
}

/**
 * Recomputes the planned files against `baseCommit`. Files deleted since the
 * scan are dropped; files that no longer change are dropped.
 */
async function rebuildChanges(ctx: PipelineContext, plan: ChangePlan, baseCommit: string): Promise<FileMatch[]> {
  const { client, config, call } = ctx;
  const label = formatTarget(plan.target);
  const rebuilt: FileMatch[] = [];

  for (const change of plan.changes) {
    let fresh: FileContent;
    try {
      fresh = await call(`re-read ${label}:${change.path}`, () =>
        client.readFile(plan.target, { path: change.path }, baseCommit)
      );
    } catch (err) {
      if (err instanceof NotFoundError) {
        ctx.logger.warn(`${label}: ${change.path} was removed since the scan; leaving it alone`);
        continue;
      }
      throw new CommitApplyError(`Could not re-read ${change.path} at ${baseCommit}: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    if (fresh.kind !== "text") {
      ctx.logger.warn(`${label}: ${change.path} is no longer a text file; leaving it alone`);
      continue;
    }

    const applied = applyRules(fresh.content, config.rules);
    if (applied.content === fresh.content) continue;
    rebuilt.push({
      ...change,
      originalContent: fresh.content,
      newContent: applied.content,
      matchCount: applied.matchCount,
    });
  }

  return rebuilt;
}

async function ensurePullRequest(ctx: PipelineContext, target: RepoTarget, defaultBranch: string): Promise<PullRequestRef | null> {
  const { client, config, call, logger } = ctx;
  if (config.delivery.mode !== "pull-request") return null;

  const { branchName, title, description } = config.delivery;
  const label = formatTarget(target);
  const query = { sourceBranch: branchName, targetBranch: defaultBranch };

  const existing = await call(`find pull request ${label}`, () => client.findPullRequest(target, query));
  if (existing) {
    logger.info(`${label}: pull request already open: ${existing.url}`);
    return existing;
  }

  const created = await call(`create pull request ${label}`, () =>
    client.createPullRequest(target, { ...query, title, description })
  );
  logger.info(`${label}: pull request created: ${created.url}`);
  return created;
}

/**
 * Pushes every change of a non-empty plan as one commit. Returns `applied`,
 * `no-changes` when a moved head already carries the replacements, or
 * `skipped-error`. When a retried push conflicts and the moved head already
 * carries the replacements, the outcome is `applied` at that head with an
 * error detail, as the unanswered call most likely landed.
 */
export async function applyChangePlan(ctx: PipelineContext, plan: ChangePlan): Promise<RunOutcome> {
  const { client, config, call, logger, signal } = ctx;
  const wait = ctx.sleep ?? sleep;
  const label = formatTarget(plan.target);

  try {
    if (plan.changes.length === 0 || !plan.branch || !plan.baseHead) {
      throw new CommitApplyError("Refusing to commit an empty change plan.");
    }
    const defaultBranch = plan.branch;
    const attempts = Math.max(1, config.retry.maxAttempts);
    let lastConflict: ConflictError | undefined;
    // Set when a push call was retried and then conflicted: the earlier call may have landed.
    let unconfirmedPush: FileMatch[] | undefined;

    const appliedOutcome = async (changes: FileMatch[], commitId: string, error?: ErrorDetail): Promise<RunOutcome> => {
      try {
        const pr = await ensurePullRequest(ctx, plan.target, defaultBranch);
        return buildOutcome(plan, "applied", changes, { commitId, pullRequestUrl: pr?.url, error });
      } catch (prErr) {
        logger.error(`${label}: commit ${commitId} pushed but the pull request failed: ${errorMessage(prErr)}`);
        return buildOutcome(plan, "applied", changes, {
          commitId,
          error: toErrorDetail(prErr, "Commit pushed but the pull request could not be opened"),
        });
      }
    };

    for (let attempt = 1; attempt <= attempts; attempt += 1) {
      if (signal?.aborted) throw new RunCancelledError("Cancelled before the commit was pushed; nothing was written.");

      const base = await resolvePushBase(ctx, plan, defaultBranch);
      const changes =
        base.baseCommit === plan.baseHead ? plan.changes : await rebuildChanges(ctx, plan, base.baseCommit);

      if (changes.length === 0 && unconfirmedPush && base.expectedHead) {
        const detail = toErrorDetail(
          new CommitApplyError(
            `A push to ${base.branch} was retried without a response; ${base.expectedHead} already carries the replacements and is most likely that push.`
          )
        );
        logger.warn(`${label}: ${detail.message}`);
        return appliedOutcome(unconfirmedPush, base.expectedHead, detail);
      }

      if (changes.length === 0) {
        logger.info(`${label}: ${base.branch} already carries the replacements`);
        const pr = base.expectedHead ? await ensurePullRequest(ctx, plan.target, defaultBranch) : null;
        return buildOutcome(plan, "no-changes", [], pr ? { pullRequestUrl: pr.url } : {});
      }

      let pushCalls = 0;
      try {
        const { commitId } = await call(`push ${label}@${base.branch}`, () => {
          pushCalls += 1;
          return client.pushCommit({
            target: plan.target,
            branch: base.branch,
            expectedHead: base.expectedHead,
            baseCommit: base.baseCommit,
            message: config.commitMessage,
            changes: changes.map((change) => ({ path: change.path, content: change.newContent })),
          });
        });
        logger.info(`${label}: pushed ${changes.length} file(s) to ${base.branch} as ${commitId}`);
        return await appliedOutcome(changes, commitId);
      } catch (err) {
        if (!(err instanceof ConflictError)) throw err;
        lastConflict = err;
        if (pushCalls > 1) unconfirmedPush = changes;
        if (attempt < attempts) {
          const delayMs = backoffDelay(config.retry, attempt);
          logger.warn(`${label}: ${base.branch} moved during push (attempt ${attempt}/${attempts}), retrying in ${delayMs}ms`);
          await wait(delayMs);
        }
      }
    }

    throw new CommitApplyError(`Branch kept moving; gave up after ${attempts} push attempt(s).`, {
      cause: lastConflict,
    });
  } catch (err) {
    logger.error(`${label}: commit failed: ${errorMessage(err)}`);
    return failedOutcome(plan.target, err, plan);
  }
}
