import { describe, expect, it } from "vitest";
import {
  AuthenticationError,
  ConfigurationError,
  ConflictError,
  NotFoundError,
  PlatformError,
  ScopeResolutionError,
  TransientApiError,
  classifyPlatformError,
  httpStatusOf,
  isFatalError,
  isRetryableError,
  toErrorDetail,
  RequestTimeoutError,
  CommitApplyError,
} from "./errors.js";

function httpError(status: number, message = "request failed") {
  return Object.assign(new Error(message), { status });
}

describe("classifyPlatformError", () => {
  it("maps authorization failures", () => {
    const err = classifyPlatformError(httpError(401, "Bad credentials"), "list projects");
    expect(err).toBeInstanceOf(AuthenticationError);
    expect(err.message).toBe("list projects: Bad credentials");
    expect(classifyPlatformError(httpError(403), "x")).toBeInstanceOf(AuthenticationError);
  });

  it("treats a rate-limited 403 as transient", () => {
    const err = classifyPlatformError(httpError(403, "API rate limit exceeded for user"), "read");
    expect(err).toBeInstanceOf(TransientApiError);
  });

  it("maps 404 and 409", () => {
    expect(classifyPlatformError(httpError(404), "x")).toBeInstanceOf(NotFoundError);
    expect(classifyPlatformError(httpError(409), "x")).toBeInstanceOf(ConflictError);
  });

  it("maps extra conflict statuses only when asked", () => {
    expect(classifyPlatformError(httpError(422), "x")).toBeInstanceOf(PlatformError);
    expect(classifyPlatformError(httpError(422), "x", { conflictStatuses: [409, 422] })).toBeInstanceOf(ConflictError);
  });

  it("maps throttling and server errors to transient", () => {
    for (const status of [408, 429, 500, 502, 503]) {
      const err = classifyPlatformError(httpError(status), "x");
      expect(err).toBeInstanceOf(TransientApiError);
      if (err instanceof TransientApiError) expect(err.status).toBe(status);
    }
  });

  it("reads statusCode as well as status", () => {
    const err = Object.assign(new Error("Service Unavailable"), { statusCode: 503 });
    expect(httpStatusOf(err)).toBe(503);
    expect(classifyPlatformError(err, "x")).toBeInstanceOf(TransientApiError);
  });

  it("maps network failures to transient, including wrapped ones", () => {
    const reset = Object.assign(new Error("socket hang up"), { code: "ECONNRESET" });
    expect(classifyPlatformError(reset, "x")).toBeInstanceOf(TransientApiError);
    const wrapped = new Error("fetch failed", { cause: Object.assign(new Error("timeout"), { code: "UND_ERR_CONNECT_TIMEOUT" }) });
    expect(classifyPlatformError(wrapped, "x")).toBeInstanceOf(TransientApiError);
  });

  it("passes classified errors through", () => {
    const original = new ConflictError("moved");
    expect(classifyPlatformError(original, "x")).toBe(original);
  });

  it("falls back to PlatformError", () => {
    const err = classifyPlatformError(new Error("weird"), "push");
    expect(err).toBeInstanceOf(PlatformError);
    expect(err.code).toBe("PLATFORM");
  });
});

describe("error helpers", () => {
  it("knows which errors end the run", () => {
    expect(isFatalError(new ConfigurationError("bad"))).toBe(true);
    expect(isFatalError(new ScopeResolutionError("missing"))).toBe(true);
    expect(isFatalError(new AuthenticationError())).toBe(true);
    expect(isFatalError(new NotFoundError("gone"))).toBe(false);
  });

  it("retries only transient conditions", () => {
    expect(isRetryableError(new TransientApiError("busy", 503))).toBe(true);
    expect(isRetryableError(new RequestTimeoutError())).toBe(true);
    expect(isRetryableError(new ConflictError())).toBe(false);
    expect(isRetryableError(new Error("plain"))).toBe(false);
  });

  it("builds error details", () => {
    expect(toErrorDetail(new CommitApplyError("push rejected"))).toEqual({ code: "COMMIT_APPLY", message: "push rejected" });
    expect(toErrorDetail(new Error("boom"), "While pushing")).toEqual({ code: "UNEXPECTED", message: "While pushing: boom" });
    expect(toErrorDetail("text")).toEqual({ code: "UNEXPECTED", message: "text" });
  });

  it("lists configuration issues in the message", () => {
    const err = new ConfigurationError("Invalid settings.", ["a: required", "b: too small"]);
    expect(err.message).toBe("Invalid settings.\n- a: required\n- b: too small");
  });
});
