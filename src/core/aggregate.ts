import { formatTarget } from "./platform.js";
import { RUN_STATUSES, type ErrorDetail, type RepoTarget, type RunOutcome, type RunReport, type RunStatus } from "./types.js";

export function aggregateOutcomes(args: {
  organization: string;
  dryRun: boolean;
  startedAt: Date;
  finishedAt: Date;
  outcomes: readonly RunOutcome[];
  fatal?: ErrorDetail;
  cancelled?: boolean;
  notStarted?: RepoTarget[];
}): RunReport {
  const { outcomes } = args;

  const counts: Record<RunStatus, number> = { applied: 0, "would-apply": 0, "no-changes": 0, "skipped-error": 0 };
  for (const outcome of outcomes) counts[outcome.status] += 1;

  const failures: RunReport["failures"] = [];
  const degraded: RunReport["degraded"] = [];
  for (const outcome of outcomes) {
    if (outcome.error) failures.push({ target: outcome.target, error: outcome.error });
    if (outcome.degraded) degraded.push({ target: outcome.target, fileErrors: outcome.fileErrors });
  }

  return {
    organization: args.organization,
    dryRun: args.dryRun,
    startedAt: args.startedAt.toISOString(),
    finishedAt: args.finishedAt.toISOString(),
    outcomes,
    counts,
    failures,
    degraded,
    fatal: args.fatal,
    cancelled: args.cancelled ?? false,
    notStarted: args.notStarted ?? [],
  };
}

/** True for a fatal run or any repository carrying an error, applied ones included. */
export function hasFailures(report: RunReport): boolean {
  return Boolean(report.fatal) || report.failures.length > 0;
}

const STATUS_LABELS: Record<RunStatus, string> = {
  applied: "applied",
  "would-apply": "would apply",
  "no-changes": "no changes",
  "skipped-error": "failed",
};

/** Plain-text summary shared by the CLI and the Slack surface. */
export function formatReport(report: RunReport, options: { maxFilesPerRepo?: number } = {}): string {
  const { maxFilesPerRepo = 10 } = options;
  const lines: string[] = [];
  const mode = report.dryRun ? "Dry run" : "Live run";

  if (report.fatal) {
    lines.push(`${mode} for ${report.organization} aborted (${report.fatal.code}): ${report.fatal.message}`);
    return lines.join("\n");
  }

  lines.push(`${mode} for ${report.organization}: ${report.outcomes.length} repositor${report.outcomes.length === 1 ? "y" : "ies"}`);
  lines.push(
    RUN_STATUSES.filter((status) => report.counts[status] > 0)
      .map((status) => `${STATUS_LABELS[status]}: ${report.counts[status]}`)
      .join(", ") || "nothing processed"
  );

  for (const outcome of report.outcomes) {
    if (outcome.status === "no-changes" && !outcome.error && !outcome.degraded) continue;
    const head = `- ${formatTarget(outcome.target)} [${STATUS_LABELS[outcome.status]}]`;
    const extras = [
      outcome.filesChanged > 0 ? `${outcome.filesChanged} file(s)` : "",
      outcome.commitId ? `commit ${outcome.commitId.slice(0, 12)}` : "",
      outcome.pullRequestUrl ?? "",
    ].filter(Boolean);
    lines.push(extras.length ? `${head} ${extras.join(", ")}` : head);

    for (const file of outcome.files.slice(0, maxFilesPerRepo)) {
      lines.push(`    ${file.path} (${file.matchCount} match${file.matchCount === 1 ? "" : "es"})`);
    }
    if (outcome.files.length > maxFilesPerRepo) {
      lines.push(`    ... and ${outcome.files.length - maxFilesPerRepo} more`);
    }
    for (const fileError of outcome.fileErrors) {
      lines.push(`    unreadable: ${fileError.path}: ${fileError.message}`);
    }
    if (outcome.error) lines.push(`    error (${outcome.error.code}): ${outcome.error.message}`);
  }

  if (report.cancelled) {
    lines.push(`Cancelled: ${report.notStarted.length} repositor${report.notStarted.length === 1 ? "y was" : "ies were"} not started`);
    for (const target of report.notStarted) lines.push(`    ${formatTarget(target)}`);
  }

  return lines.join("\n");
}

/** 0 when every repository succeeded, 1 when any failed, 2 when the run itself was aborted. */
export function exitCodeFor(report: RunReport): 0 | 1 | 2 {
  if (report.fatal) return 2;
  return hasFailures(report) ? 1 : 0;
}
