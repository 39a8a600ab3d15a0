import { LogLevel, type Logger } from "@slack/logger";
import type { PipelineContext } from "../core/context.js";
import type { PlatformClient } from "../core/platform.js";
import { createCallRunner, type Sleep } from "../core/retry.js";
import type { RunConfig } from "../core/types.js";

export type LogLine = { level: LogLevel; message: string };

/** Keeps log lines in memory so tests can assert on them. */
export class MemoryLogger implements Logger {
  readonly lines: LogLine[] = [];
  private level = LogLevel.DEBUG;
  private name = "test";

  debug(...msg: unknown[]): void {
    this.push(LogLevel.DEBUG, msg);
  }

  info(...msg: unknown[]): void {
    this.push(LogLevel.INFO, msg);
  }

  warn(...msg: unknown[]): void {
    this.push(LogLevel.WARN, msg);
  }

  error(...msg: unknown[]): void {
    this.push(LogLevel.ERROR, msg);
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  setName(name: string): void {
    this.name = name;
  }

  messages(level?: LogLevel): string[] {
    return this.lines.filter((line) => level === undefined || line.level === level).map((line) => line.message);
  }

  private push(level: LogLevel, msg: unknown[]): void {
    this.lines.push({ level, message: msg.map(String).join(" ") });
  }
}

export const noSleep: Sleep = async () => {};

export function testConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    platform: "azure-devops",
    organization: "contoso",
    scope: { kind: "all" },
    rules: [{ search: "foo", replace: "bar" }],
    dryRun: false,
    delivery: { mode: "direct" },
    commitMessage: "Bulk update",
    pathFilter: { include: [], exclude: [] },
    maxFileBytes: 1024 * 1024,
    concurrency: { repositories: 2, files: 2 },
    retry: { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, jitter: 0 },
    requestTimeoutMs: 1000,
    ...overrides,
  };
}

export function testContext(
  client: PlatformClient,
  config: RunConfig = testConfig(),
  options: { signal?: AbortSignal; logger?: MemoryLogger } = {}
): PipelineContext & { logger: MemoryLogger } {
  const logger = options.logger ?? new MemoryLogger();
  const call = createCallRunner({
    policy: config.retry,
    timeoutMs: config.requestTimeoutMs,
    logger,
    signal: options.signal,
    sleep: noSleep,
  });
  return { client, config, call, logger, signal: options.signal, sleep: noSleep };
}
