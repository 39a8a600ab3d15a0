import { buildOutcome } from "./outcome.js";
import type { ChangePlan, RunOutcome } from "./types.js";

/** Reports what a live run would do. Takes no client, so it cannot mutate anything. */
export function reportDryRun(plan: ChangePlan): RunOutcome {
  if (plan.changes.length === 0) return buildOutcome(plan, "no-changes");
  return buildOutcome(plan, "would-apply");
}
