import type { RunConfig, RunReport } from "./types.js";

export type SweepRunStatus =
  | "PREVIEWING"
  | "AWAITING_APPROVAL"
  | "APPLYING"
  | "DONE"
  | "FAILED"
  | "CANCELLED";

export type SweepRunRecord = {
  runId: string;
  threadTs: string;
  channel: string;
  requestedBy?: string;
  request: string;
  status: SweepRunStatus;
  /** Configuration of the live run; the preview used the same with dryRun set. */
  config?: RunConfig;
  preview?: RunReport;
  previewMessageTs?: string;
  createdAt: number;
  updatedAt: number;
};

/** Terminal states; a new mention in the thread starts over. */
export const FINISHED_STATUSES: ReadonlySet<SweepRunStatus> = new Set(["DONE", "FAILED", "CANCELLED"]);

export class RunStore {
  private readonly runsById = new Map<string, SweepRunRecord>();
  private readonly runsByThread = new Map<string, string>();

  constructor(private readonly clock: () => number = Date.now) {}

  createRun(args: { runId: string; threadTs: string; channel: string; request: string; requestedBy?: string }): SweepRunRecord {
    const now = this.clock();
    const record: SweepRunRecord = {
      ...args,
      status: "PREVIEWING",
      createdAt: now,
      updatedAt: now,
    };
    this.runsById.set(record.runId, record);
    this.runsByThread.set(record.threadTs, record.runId);
    return record;
  }

  getRunById(runId: string): SweepRunRecord | undefined {
    return this.runsById.get(runId);
  }

  getRunByThread(threadTs: string): SweepRunRecord | undefined {
    const runId = this.runsByThread.get(threadTs);
    if (!runId) return undefined;
    return this.runsById.get(runId);
  }

  updateRun(runId: string, updates: Partial<Omit<SweepRunRecord, "runId" | "createdAt">>): SweepRunRecord | undefined {
    const existing = this.runsById.get(runId);
    if (!existing) return undefined;
    const next = { ...existing, ...updates, updatedAt: this.clock() };
    this.runsById.set(runId, next);
    return next;
  }

  /**
   * Moves a run from `from` to `to` only if it is still in `from`. Two clicks
   * on the same button race here; only one wins.
   */
  transition(runId: string, from: SweepRunStatus, to: SweepRunStatus): SweepRunRecord | undefined {
    const existing = this.runsById.get(runId);
    if (!existing || existing.status !== from) return undefined;
    return this.updateRun(runId, { status: to });
  }
}
