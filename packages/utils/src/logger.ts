/**
 * Minimal leveled logging for the merkle-doc packages.
 *
 * @module
 * - Severity levels (debug, info, warn, error)
 * - Lazy evaluation for expensive messages
 * - Module-tagged output `[LEVEL][module::HH:MM:SS.mmm]`
 * - Per-logger enable flag and level
 * - Call counting
 *
 * @example
 * ```typescript
 * import { getLogger } from "@merkle-doc/utils/logger";
 *
 * // Debug logger that stays silent until someone flips it on.
 * const logger = getLogger("document", { enabled: false, level: "debug" });
 * logger.debug(() => ["visiting", path]);
 * ```
 *
 * The default level comes from the `LOG_LEVEL` environment variable and
 * falls back to `"info"`.
 */

import { getEnv } from "./env.ts";

export type LogMessage = unknown | (() => unknown);

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.hasOwn(LOG_LEVELS, value);

function shouldLog(level: LogLevel, loggerLevel: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[loggerLevel];
}

/**
 * Current time as HH:MM:SS.mmm (UTC).
 */
function getTimeStamp(): string {
  return new Date().toISOString().slice(11, 23);
}

function resolveMessages(messages: LogMessage[]): unknown[] {
  return messages.flatMap((msg) => {
    const resolved = typeof msg === "function" ? msg() : msg;
    return Array.isArray(resolved) ? resolved : [resolved];
  });
}

export interface GetLoggerOptions {
  /**
   * Whether this logger writes anything. Defaults to true.
   */
  enabled?: boolean;
  /**
   * Minimum level for this logger. Defaults to `LOG_LEVEL` or `"info"`.
   */
  level?: LogLevel;
}

export interface LogCounts {
  debug: number;
  info: number;
  warn: number;
  error: number;
  readonly total: number;
}

export class Logger {
  private _disabled: boolean;
  public level: LogLevel;
  private _counts: Record<LogLevel, number>;

  constructor(
    private readonly moduleName?: string,
    options?: GetLoggerOptions,
  ) {
    this._disabled = options?.enabled === undefined ? false : !options.enabled;
    this.level = options?.level ?? getEnvLevel() ?? "info";
    this._counts = { debug: 0, info: 0, warn: 0, error: 0 };
  }

  get disabled(): boolean {
    return this._disabled;
  }

  set disabled(value: boolean) {
    this._disabled = value;
  }

  /**
   * Calls per level. Counts include calls dropped because the logger was
   * disabled or the level filtered them out.
   */
  get counts(): LogCounts {
    const { debug, info, warn, error } = this._counts;
    return { debug, info, warn, error, total: debug + info + warn + error };
  }

  resetCounts(): void {
    this._counts = { debug: 0, info: 0, warn: 0, error: 0 };
  }

  private prefix(level: LogLevel): string {
    const tag = level.toUpperCase();
    const timestamp = getTimeStamp();
    return this.moduleName
      ? `[${tag}][${this.moduleName}::${timestamp}]`
      : `[${tag}][${timestamp}]`;
  }

  private write(level: LogLevel, messages: LogMessage[]): void {
    this._counts[level]++;
    if (this._disabled || !shouldLog(level, this.level)) return;

    const prefix = this.prefix(level);
    const resolved = resolveMessages(messages);
    switch (level) {
      case "debug":
        return console.debug(prefix, ...resolved);
      case "info":
        return console.log(prefix, ...resolved);
      case "warn":
        return console.warn(prefix, ...resolved);
      case "error":
        return console.error(prefix, ...resolved);
    }
  }

  debug(...messages: LogMessage[]): void {
    this.write("debug", messages);
  }

  /**
   * Same as {@link Logger.info}.
   */
  log(...messages: LogMessage[]): void {
    this.write("info", messages);
  }

  info(...messages: LogMessage[]): void {
    this.write("info", messages);
  }

  warn(...messages: LogMessage[]): void {
    this.write("warn", messages);
  }

  error(...messages: LogMessage[]): void {
    this.write("error", messages);
  }
}

function getEnvLevel(): LogLevel | undefined {
  const level = getEnv("LOG_LEVEL");
  return isLogLevel(level) ? level : undefined;
}

const loggers = new Map<string, Logger>();

/**
 * Returns the logger tagged with `moduleName`, creating it on first use.
 * Options only apply when the logger is created.
 */
export function getLogger(
  moduleName: string,
  options?: GetLoggerOptions,
): Logger {
  const existing = loggers.get(moduleName);
  if (existing) {
    return existing;
  }

  const logger = new Logger(moduleName, options);
  loggers.set(moduleName, logger);
  return logger;
}

export function resetAllLoggerCounts(): void {
  for (const logger of loggers.values()) {
    logger.resetCounts();
  }
}

/**
 * Per-logger call totals plus an overall `total`.
 */
export function getLoggerCountsBreakdown(): Record<string, number> & {
  total: number;
} {
  const breakdown: Record<string, number> = {};
  let total = 0;
  for (const [name, logger] of loggers) {
    const count = logger.counts.total;
    breakdown[name] = count;
    total += count;
  }
  return { ...breakdown, total };
}
