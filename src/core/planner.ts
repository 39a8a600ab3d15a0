import type { ChangePlan, ScanResult } from "./types.js";

/** Pure. Keeps only files whose content actually changes. */
export function buildChangePlan(scan: ScanResult): ChangePlan {
  return {
    target: scan.target,
    branch: scan.branch,
    baseHead: scan.head,
    changes: scan.matches.filter((match) => match.newContent !== match.originalContent),
    fileErrors: scan.fileErrors,
    skippedFiles: scan.skippedFiles,
  };
}
