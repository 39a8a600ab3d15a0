import type { ErrorDetail } from "./types.js";

export type ErrorCode =
  | "CONFIGURATION"
  | "SCOPE_RESOLUTION"
  | "AUTHENTICATION"
  | "TRANSIENT_API"
  | "CONFLICT"
  | "NOT_FOUND"
  | "PLATFORM"
  | "REQUEST_TIMEOUT"
  | "FILE_READ"
  | "COMMIT_APPLY"
  | "CANCELLED";

export class BulkReplaceError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "BulkReplaceError";
  }
}

export class ConfigurationError extends BulkReplaceError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION", issues.length ? `${message}\n- ${issues.join("\n- ")}` : message);
    this.issues = issues;
    this.name = "ConfigurationError";
  }
}

export class ScopeResolutionError extends BulkReplaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("SCOPE_RESOLUTION", message, options);
    this.name = "ScopeResolutionError";
  }
}

export class AuthenticationError extends BulkReplaceError {
  constructor(message = "The platform rejected the credentials.", options?: { cause?: unknown }) {
    super("AUTHENTICATION", message, options);
    this.name = "AuthenticationError";
  }
}

export class TransientApiError extends BulkReplaceError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("TRANSIENT_API", message, options);
    this.status = status;
    this.name = "TransientApiError";
  }
}

export class ConflictError extends BulkReplaceError {
  constructor(message = "The branch was updated by another client.", options?: { cause?: unknown }) {
    super("CONFLICT", message, options);
    this.name = "ConflictError";
  }
}

export class NotFoundError extends BulkReplaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("NOT_FOUND", message, options);
    this.name = "NotFoundError";
  }
}

/** Any other non-success response the platform gave us. Not retried. */
export class PlatformError extends BulkReplaceError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("PLATFORM", message, options);
    this.status = status;
    this.name = "PlatformError";
  }
}

export class RequestTimeoutError extends BulkReplaceError {
  constructor(message = "Request exceeded time limit.") {
    super("REQUEST_TIMEOUT", message);
    this.name = "RequestTimeoutError";
  }
}

export class FileReadError extends BulkReplaceError {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super("FILE_READ", message, options);
    this.path = path;
    this.name = "FileReadError";
  }
}

export class CommitApplyError extends BulkReplaceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("COMMIT_APPLY", message, options);
    this.name = "CommitApplyError";
  }
}

export class RunCancelledError extends BulkReplaceError {
  constructor(message = "The run was cancelled before this step started.") {
    super("CANCELLED", message);
    this.name = "RunCancelledError";
  }
}

/** Errors that end the whole run before any repository is touched. */
export function isFatalError(err: unknown): err is ConfigurationError | ScopeResolutionError | AuthenticationError {
  return (
    err instanceof ConfigurationError ||
    err instanceof ScopeResolutionError ||
    err instanceof AuthenticationError
  );
}

export function isRetryableError(err: unknown): boolean {
  return err instanceof TransientApiError || err instanceof RequestTimeoutError;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

export function toErrorDetail(err: unknown, prefix?: string): ErrorDetail {
  const code = err instanceof BulkReplaceError ? err.code : "UNEXPECTED";
  const message = prefix ? `${prefix}: ${errorMessage(err)}` : errorMessage(err);
  return { code, message };
}

const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EAI_AGAIN",
  "EPIPE",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

/** Reads the HTTP status off an Octokit RequestError (`status`) or a typed-rest-client error (`statusCode`). */
export function httpStatusOf(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("status" in err && typeof err.status === "number") return err.status;
  if ("statusCode" in err && typeof err.statusCode === "number") return err.statusCode;
  return undefined;
}

function networkCodeOf(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return networkCodeOf(err.cause);
  return undefined;
}

function isRateLimitMessage(message: string): boolean {
  return /rate limit|secondary rate|abuse detection|throttl/i.test(message);
}

/**
 * Maps a raw client error onto the taxonomy. Errors that are already
 * classified pass through untouched.
 */
export function classifyPlatformError(
  err: unknown,
  context: string,
  options: { conflictStatuses?: number[] } = {}
): BulkReplaceError {
  if (err instanceof BulkReplaceError) return err;

  const { conflictStatuses = [409] } = options;
  const status = httpStatusOf(err);
  const message = `${context}: ${errorMessage(err)}`;

  if (status === undefined) {
    const code = networkCodeOf(err);
    if (code && NETWORK_ERROR_CODES.has(code)) {
      return new TransientApiError(message, undefined, { cause: err });
    }
    return new PlatformError(message, undefined, { cause: err });
  }

  if (conflictStatuses.includes(status)) return new ConflictError(message, { cause: err });
  if (status === 403 && isRateLimitMessage(errorMessage(err))) {
    return new TransientApiError(message, status, { cause: err });
  }
  if (status === 401 || status === 403) return new AuthenticationError(message, { cause: err });
  if (status === 404) return new NotFoundError(message, { cause: err });
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientApiError(message, status, { cause: err });
  }
  return new PlatformError(message, status, { cause: err });
}
