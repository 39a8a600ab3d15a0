import crypto from "crypto";
import type { Logger } from "@slack/logger";
import type { App, BlockAction, ButtonAction, SayFn } from "@slack/bolt";
import { hasFailures } from "../core/aggregate.js";
import { withRequest, type Settings } from "../core/config.js";
import { runBulkReplace } from "../core/engine.js";
import { RequestTimeoutError, errorMessage } from "../core/errors.js";
import type { PlatformClient } from "../core/platform.js";
import { withTimeout } from "../core/retry.js";
import { FINISHED_STATUSES, type RunStore, type SweepRunRecord } from "../core/runStore.js";
import type { RunConfig, RunReport } from "../core/types.js";
import { APPLY_ACTION_ID, CANCEL_ACTION_ID, buildPreviewBlocks, summarizeReport } from "./blocks.js";
import { USAGE, parseSweepRequest, stripMentions, type SweepRequest } from "./parse.js";

const PREVIEW_TIMEOUT_MS = 10 * 60 * 1000;
const APPLY_TIMEOUT_MS = 30 * 60 * 1000;

export type SweepDeps = {
  store: RunStore;
  loadSettings: () => Promise<Settings>;
  connect: (config: RunConfig) => Promise<PlatformClient>;
  now?: () => Date;
};

/**
 * Bounds one engine run. On timeout the run is signalled to stop dispatching
 * repositories; ones already in flight still finish.
 */
async function runPhase(
  timeoutMs: number,
  label: string,
  task: (signal: AbortSignal) => Promise<RunReport>
): Promise<RunReport> {
  const controller = new AbortController();
  try {
    return await withTimeout(task(controller.signal), timeoutMs, label);
  } catch (err) {
    controller.abort();
    throw err;
  }
}

const STATUS_REPLIES: Record<string, string> = {
  PREVIEWING: "Still building the preview. Hang tight.",
  AWAITING_APPROVAL: "The preview is waiting for a decision. Use the Apply or Cancel buttons above.",
  APPLYING: "Still pushing the approved changes. Hang tight.",
};

async function previewAndRespond(args: {
  deps: SweepDeps;
  run: SweepRunRecord;
  request: SweepRequest;
  say: SayFn;
  logger: Logger;
}): Promise<void> {
  const { deps, run, request, say, logger } = args;
  const { store } = deps;
  const now = deps.now ?? (() => new Date());

  const settings = await deps.loadSettings();
  const config = withRequest(settings, { rules: request.rules, scope: request.scope, dryRun: false }, now());
  const client = await deps.connect(config);

  let report: RunReport;
  try {
    report = await runPhase(PREVIEW_TIMEOUT_MS, "Preview", (signal) =>
      runBulkReplace({ client, config: { ...config, dryRun: true }, logger, signal, now })
    );
  } catch (err) {
    if (err instanceof RequestTimeoutError) {
      store.updateRun(run.runId, { status: "FAILED" });
      await say({ thread_ts: run.threadTs, text: "The preview timed out after 10 minutes. Narrow the scope and try again." });
      return;
    }
    throw err;
  }

  if (report.fatal) {
    store.updateRun(run.runId, { status: "FAILED", preview: report });
    await say({ thread_ts: run.threadTs, text: `Could not build the preview.\n${summarizeReport(report)}` });
    return;
  }

  if (report.counts["would-apply"] === 0) {
    store.updateRun(run.runId, { status: "DONE", preview: report });
    await say({ thread_ts: run.threadTs, text: `Nothing to change.\n${summarizeReport(report)}` });
    return;
  }

  const previewMessage = await say({
    thread_ts: run.threadTs,
    text: "Preview ready. Apply or cancel.",
    blocks: buildPreviewBlocks(report, run.runId),
  });

  store.updateRun(run.runId, {
    status: "AWAITING_APPROVAL",
    config,
    preview: report,
    previewMessageTs: previewMessage.ts,
  });
  logger.info(`Run ${run.runId}: preview ready, ${report.counts["would-apply"]} repositories would change`);
}

type MentionArgs = {
  event: { text: string; ts: string; thread_ts?: string; channel: string; user?: string };
  say: SayFn;
  logger: Logger;
};

type ButtonArgs = {
  action: { value?: string };
  ack: () => Promise<void>;
  say: SayFn;
  logger: Logger;
};

export type SweepListeners = {
  onMention: (args: MentionArgs) => Promise<void>;
  onApply: (args: ButtonArgs) => Promise<void>;
  onCancel: (args: ButtonArgs) => Promise<void>;
};

export function createSweepListeners(deps: SweepDeps): SweepListeners {
  const { store } = deps;

  const onMention = async ({ event, say, logger }: MentionArgs): Promise<void> => {
    const cleaned = stripMentions(event.text);
    const threadTs = event.thread_ts ?? event.ts;

    const existingRun = store.getRunByThread(threadTs);
    if (existingRun && !FINISHED_STATUSES.has(existingRun.status)) {
      await say({ thread_ts: threadTs, text: STATUS_REPLIES[existingRun.status] ?? "This run is still in progress." });
      return;
    }

    const request = parseSweepRequest(cleaned);
    if (!request) {
      await say({ thread_ts: threadTs, text: USAGE });
      return;
    }

    const runId = crypto.randomBytes(3).toString("hex");
    const run = store.createRun({ runId, threadTs, channel: event.channel, request: cleaned, requestedBy: event.user });
    logger.info(`Run ${runId}: new request from ${event.user ?? "unknown user"}: ${cleaned}`);

    await say({
      thread_ts: threadTs,
      text: `Working on it (job ${runId}). Building a dry-run preview of ${request.rules.length} replacement(s)...`,
    });

    try {
      await previewAndRespond({ deps, run, request, say, logger });
    } catch (err) {
      logger.error(`Run ${runId}: preview failed: ${errorMessage(err)}`);
      store.updateRun(runId, { status: "FAILED" });
      await say({ thread_ts: threadTs, text: `Failed to build the preview.\n${errorMessage(err)}` });
    }
  };

  const onApply = async ({ action, ack, say, logger }: ButtonArgs): Promise<void> => {
    await ack();
    const runId = action.value ?? "";
    const run = store.transition(runId, "AWAITING_APPROVAL", "APPLYING");

    if (!run) {
      const known = store.getRunById(runId);
      await say({
        thread_ts: known?.threadTs,
        text: known ? "This preview is no longer awaiting approval." : "Run not found.",
      });
      return;
    }

    const { config } = run;
    if (!config) {
      store.updateRun(run.runId, { status: "FAILED" });
      await say({ thread_ts: run.threadTs, text: "Run configuration is missing. Please start a new request." });
      return;
    }

    await say({ thread_ts: run.threadTs, text: "Approved. Pushing the changes..." });

    try {
      const client = await deps.connect(config);
      const report = await runPhase(APPLY_TIMEOUT_MS, "Apply", (signal) =>
        runBulkReplace({ client, config, logger, signal, now: deps.now })
      );
      const failed = hasFailures(report);
      store.updateRun(run.runId, { status: failed ? "FAILED" : "DONE" });
      await say({
        thread_ts: run.threadTs,
        text: `${failed ? "Finished with failures." : "Done."}\n${summarizeReport(report)}`,
      });
    } catch (err) {
      store.updateRun(run.runId, { status: "FAILED" });
      if (err instanceof RequestTimeoutError) {
        await say({
          thread_ts: run.threadTs,
          text: "Applying timed out after 30 minutes. Repositories already in progress may still finish; check the logs.",
        });
        return;
      }
      logger.error(`Run ${run.runId}: apply failed: ${errorMessage(err)}`);
      await say({ thread_ts: run.threadTs, text: `Failed to apply the changes.\n${errorMessage(err)}` });
    }
  };

  const onCancel = async ({ action, ack, say }: ButtonArgs): Promise<void> => {
    await ack();
    const runId = action.value ?? "";
    const run = store.transition(runId, "AWAITING_APPROVAL", "CANCELLED");
    if (!run) {
      const known = store.getRunById(runId);
      await say({ thread_ts: known?.threadTs, text: known ? "This preview is no longer awaiting approval." : "Run not found." });
      return;
    }
    await say({ thread_ts: run.threadTs, text: "Cancelled. Nothing was pushed." });
  };

  return { onMention, onApply, onCancel };
}

export function registerHandlers(app: App, deps: SweepDeps): void {
  const listeners = createSweepListeners(deps);
  app.event("app_mention", listeners.onMention);
  app.action<BlockAction<ButtonAction>>(APPLY_ACTION_ID, listeners.onApply);
  app.action<BlockAction<ButtonAction>>(CANCEL_ACTION_ID, listeners.onCancel);
}
