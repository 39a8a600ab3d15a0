import { ConsoleLogger, LogLevel, type Logger } from "@slack/logger";

const LEVELS: readonly LogLevel[] = [LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
  const normalized = value?.trim().toLowerCase();
  return LEVELS.find((level) => level === normalized);
}

export function createLogger(options: { level?: LogLevel; name?: string } = {}): Logger {
  const logger = new ConsoleLogger();
  logger.setName(options.name ?? "repo-sweep");
  logger.setLevel(options.level ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO);
  return logger;
}
