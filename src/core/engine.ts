import type { Logger } from "@slack/logger";
import { aggregateOutcomes } from "./aggregate.js";
import { applyChangePlan } from "./committer.js";
import type { PipelineContext } from "./context.js";
import { reportDryRun } from "./dryRun.js";
import { RunCancelledError, errorMessage, isFatalError, toErrorDetail } from "./errors.js";
import { buildOutcome, failedOutcome } from "./outcome.js";
import { formatTarget, type PlatformClient } from "./platform.js";
import { buildChangePlan } from "./planner.js";
import { WorkerPool } from "./pool.js";
import { createCallRunner, type Sleep } from "./retry.js";
import { findNonIdempotentRules, validateRules } from "./rules.js";
import { scanRepository } from "./scanner.js";
import { resolveScope } from "./scope.js";
import type { ChangePlan, ErrorDetail, RepoTarget, RunConfig, RunOutcome, RunReport } from "./types.js";

export type RunArgs = {
  client: PlatformClient;
  config: RunConfig;
  logger: Logger;
  /** Stops dispatching repositories once aborted; in-flight ones finish or stop before pushing. */
  signal?: AbortSignal;
  sleep?: Sleep;
  now?: () => Date;
};

async function processRepository(ctx: PipelineContext, target: RepoTarget): Promise<RunOutcome> {
  const { config, logger } = ctx;
  const label = formatTarget(target);
  logger.info(`Scanning ${label}`);

  let plan: ChangePlan;
  try {
    plan = buildChangePlan(await scanRepository(ctx, target));
  } catch (err) {
    logger.error(`${label}: scan failed: ${errorMessage(err)}`);
    return failedOutcome(target, err);
  }

  if (config.dryRun) return reportDryRun(plan);
  if (plan.changes.length === 0) return buildOutcome(plan, "no-changes");
  return applyChangePlan(ctx, plan);
}

function logOutcome(logger: Logger, outcome: RunOutcome): void {
  const label = formatTarget(outcome.target);
  const degraded = outcome.degraded ? ` (${outcome.fileErrors.length} unreadable file(s))` : "";
  if (outcome.status === "skipped-error") {
    logger.error(`${label}: ${outcome.status}: ${outcome.error?.message ?? "unknown error"}`);
  } else {
    logger.info(`${label}: ${outcome.status}, ${outcome.filesChanged} file(s)${degraded}`);
  }
}

/**
 * Runs one bulk replacement end to end and returns the report. Fatal
 * conditions (bad rules, bad scope, rejected credentials) end the run before
 * any repository is scanned and are reported in `fatal`; they are not thrown.
 */
export async function runBulkReplace(args: RunArgs): Promise<RunReport> {
  const { client, config, logger, signal, sleep } = args;
  const now = args.now ?? (() => new Date());
  const startedAt = now();
  const finish = (parts: { outcomes?: RunOutcome[]; fatal?: ErrorDetail; notStarted?: RepoTarget[] }) =>
    aggregateOutcomes({
      organization: config.organization,
      dryRun: config.dryRun,
      startedAt,
      finishedAt: now(),
      outcomes: parts.outcomes ?? [],
      fatal: parts.fatal,
      cancelled: signal?.aborted ?? false,
      notStarted: parts.notStarted,
    });

  const call = createCallRunner({
    policy: config.retry,
    timeoutMs: config.requestTimeoutMs,
    logger,
    signal,
    sleep,
  });
  const ctx: PipelineContext = { client, config, call, logger, signal, sleep };

  let targets: RepoTarget[];
  try {
    validateRules(config.rules);
    for (const index of findNonIdempotentRules(config.rules)) {
      logger.warn(`Rule ${index + 1} reintroduces a search string; a second run will change files again`);
    }
    targets = await resolveScope({ client, organization: config.organization, scope: config.scope, call, logger });
  } catch (err) {
    if (err instanceof RunCancelledError) {
      logger.warn(`Run cancelled while resolving the scope: ${err.message}`);
      return finish({});
    }
    if (!isFatalError(err)) throw err;
    logger.error(`Run aborted: ${errorMessage(err)}`);
    return finish({ fatal: toErrorDetail(err) });
  }

  logger.info(
    `${config.dryRun ? "Dry run" : "Live run"} over ${targets.length} repositor${targets.length === 1 ? "y" : "ies"} in ${config.organization}`
  );

  const notStarted: RepoTarget[] = [];
  const pool = new WorkerPool(config.concurrency.repositories);
  const results = await pool.map(targets, async (target) => {
    if (signal?.aborted) {
      notStarted.push(target);
      return null;
    }
    let outcome: RunOutcome;
    try {
      outcome = await processRepository(ctx, target);
    } catch (err) {
      outcome = failedOutcome(target, err);
    }
    logOutcome(logger, outcome);
    return outcome;
  });

  if (signal?.aborted) {
    logger.warn(`Run cancelled; ${notStarted.length} repositor${notStarted.length === 1 ? "y was" : "ies were"} not started`);
  }

  const outcomes = results.filter((outcome): outcome is RunOutcome => outcome !== null);
  const order = new Map(targets.map((target, index) => [target.repositoryId, index]));
  notStarted.sort((a, b) => (order.get(a.repositoryId) ?? 0) - (order.get(b.repositoryId) ?? 0));
  return finish({ outcomes, notStarted });
}
