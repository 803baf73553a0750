import type { Logger, LogLevel } from "@gauntlet/schemas";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/** Reads GAUNTLET_LOG_LEVEL, defaulting to "info". */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const raw = (env.GAUNTLET_LOG_LEVEL ?? "").trim().toLowerCase();
  return isLogLevel(raw) ? raw : "info";
}

export class ConsoleLogger implements Logger {
  private prefix: string;
  private level: LogLevel;
  private threshold: number;

  constructor(scope: string, level: LogLevel = resolveLogLevel()) {
    // Scope names can come from agent names; keep control chars out of the log line
    // biome-ignore lint/suspicious/noControlCharactersInRegex: intentional sanitization of control chars
    const safeScope = scope.replace(/[\x00-\x1f\x7f]/g, "_").slice(0, 64);
    this.prefix = `[${safeScope}]`;
    this.level = level;
    this.threshold = LEVEL_ORDER[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.debug) return;
    console.debug(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.info) return;
    console.log(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.threshold > LEVEL_ORDER.warn) return;
    console.warn(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(`${this.prefix} ${message}`, data !== undefined ? data : "");
  }

  /** Child logger sharing this logger's level, e.g. `[llm:agent-1]`. */
  child(subscope: string): ConsoleLogger {
    return new ConsoleLogger(`${this.prefix.slice(1, -1)}:${subscope}`, this.level);
  }
}

/** Logger that drops everything; handy for tests and library embedding. */
export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
