import { toErrorDetail } from "./errors.js";
import type { ChangePlan, ErrorDetail, FileMatch, RepoTarget, RunOutcome, RunStatus } from "./types.js";

type OutcomeExtras = {
  commitId?: string;
  pullRequestUrl?: string;
  error?: ErrorDetail;
};

export function buildOutcome(
  plan: ChangePlan,
  status: Exclude<RunStatus, "skipped-error">,
  changes: readonly FileMatch[] = plan.changes,
  extras: OutcomeExtras = {}
): RunOutcome {
  const files = status === "no-changes" ? [] : changes.map((change) => ({ path: change.path, matchCount: change.matchCount }));
  const outcome: RunOutcome = {
    target: plan.target,
    status,
    filesChanged: files.length,
    files: Object.freeze(files),
    fileErrors: Object.freeze([...plan.fileErrors]),
    skippedFiles: plan.skippedFiles.length,
    degraded: plan.fileErrors.length > 0,
    ...extras,
  };
  return Object.freeze(outcome);
}

export function failedOutcome(target: RepoTarget, err: unknown, plan?: ChangePlan): RunOutcome {
  const outcome: RunOutcome = {
    target,
    status: "skipped-error",
    filesChanged: 0,
    files: Object.freeze([]),
    fileErrors: Object.freeze(plan ? [...plan.fileErrors] : []),
    skippedFiles: plan?.skippedFiles.length ?? 0,
    degraded: (plan?.fileErrors.length ?? 0) > 0,
    error: toErrorDetail(err),
  };
  return Object.freeze(outcome);
}
