export { runBulkReplace, type RunArgs } from "./core/engine.js";
export { resolveScope } from "./core/scope.js";
export { scanRepository } from "./core/scanner.js";
export { buildChangePlan } from "./core/planner.js";
export { reportDryRun } from "./core/dryRun.js";
export { applyChangePlan } from "./core/committer.js";
export { aggregateOutcomes, exitCodeFor, formatReport, hasFailures } from "./core/aggregate.js";
export { applyRules, countOccurrences, findNonIdempotentRules, validateRules } from "./core/rules.js";
export { defaultWorkBranch, loadSettings, parseSettings, readSettingsFile, withRequest, type Settings } from "./core/config.js";
export { DEFAULT_RETRY_POLICY, backoffDelay, createCallRunner, withRetry, withTimeout, type CallRunner } from "./core/retry.js";
export * from "./core/errors.js";
export type * from "./core/platform.js";
export { formatTarget, toRepoTarget } from "./core/platform.js";
export type * from "./core/types.js";
export { connectPlatform } from "./connect.js";
export { AzureDevOpsPlatform } from "./azure/platform.js";
export { GitHubPlatform } from "./github/platform.js";
export { RUN_STATUSES } from "./core/types.js";
