export type PlatformKind = "azure-devops" | "github";

export type ReplacementRule = {
  search: string;
  replace: string;
};

/** Applied left to right; each rule sees the output of the previous one. */
export type RuleSet = readonly ReplacementRule[];

export type ScopeEntry = {
  project: string;
  repository?: string;
};

export type Scope = { kind: "all" } | { kind: "subset"; entries: ScopeEntry[] };

export type RetryPolicy = {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** 0 disables jitter, 1 lets the delay fall anywhere in [0, computed]. */
  jitter: number;
};

export type Delivery =
  | { mode: "direct" }
  | { mode: "pull-request"; branchName: string; title: string; description: string };

export type PathFilter = {
  include: string[];
  exclude: string[];
};

export type RunConfig = {
  platform: PlatformKind;
  organization: string;
  baseUrl?: string;
  scope: Scope;
  rules: RuleSet;
  dryRun: boolean;
  delivery: Delivery;
  commitMessage: string;
  pathFilter: PathFilter;
  maxFileBytes: number;
  concurrency: {
    repositories: number;
    files: number;
  };
  retry: RetryPolicy;
  requestTimeoutMs: number;
};

export type RepoTarget = {
  projectId: string;
  projectName: string;
  repositoryId: string;
  repositoryName: string;
};

export type FileMatch = {
  target: RepoTarget;
  path: string;
  originalContent: string;
  newContent: string;
  matchCount: number;
};

export type FileError = {
  path: string;
  message: string;
};

export type SkipReason = "binary" | "too-large" | "unsupported-encoding";

export type SkippedFile = {
  path: string;
  reason: SkipReason;
};

export type ScanResult = {
  target: RepoTarget;
  /** null when the repository has no default branch (empty repository). */
  branch: string | null;
  head: string | null;
  matches: FileMatch[];
  fileErrors: FileError[];
  skippedFiles: SkippedFile[];
};

export type ChangePlan = {
  target: RepoTarget;
  branch: string | null;
  baseHead: string | null;
  changes: FileMatch[];
  fileErrors: FileError[];
  skippedFiles: SkippedFile[];
};

export type RunStatus = "applied" | "would-apply" | "no-changes" | "skipped-error";

export const RUN_STATUSES: readonly RunStatus[] = ["applied", "would-apply", "no-changes", "skipped-error"];

export type ErrorDetail = {
  code: string;
  message: string;
};

export type FileSummary = {
  path: string;
  matchCount: number;
};

export type RunOutcome = Readonly<{
  target: RepoTarget;
  status: RunStatus;
  filesChanged: number;
  files: readonly FileSummary[];
  fileErrors: readonly FileError[];
  skippedFiles: number;
  degraded: boolean;
  commitId?: string;
  pullRequestUrl?: string;
  error?: ErrorDetail;
}>;

export type RunReport = {
  organization: string;
  dryRun: boolean;
  startedAt: string;
  finishedAt: string;
  outcomes: readonly RunOutcome[];
  counts: Record<RunStatus, number>;
  failures: { target: RepoTarget; error: ErrorDetail }[];
  degraded: { target: RepoTarget; fileErrors: readonly FileError[] }[];
  fatal?: ErrorDetail;
  cancelled: boolean;
  notStarted: RepoTarget[];
};
