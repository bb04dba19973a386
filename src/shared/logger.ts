/**
 * Logging façade. Pipeline components take a Logger so hosts can route
 * messages wherever they like; the default writes to the console.
 */

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function parseLogLevel(raw?: string): LogLevel {
  const v = (raw ?? "info").toLowerCase();
  if (v === "debug" || v === "info" || v === "warn" || v === "error") return v;
  if (v === "warning") return "warn";
  return "info";
}

export class ConsoleLogger implements Logger {
  private scope: string;
  private minLevel: LogLevel;

  constructor(scope: string, minLevel: LogLevel = parseLogLevel(process.env.LOG_LEVEL)) {
    this.scope = scope;
    this.minLevel = minLevel;
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }

  private format(level: LogLevel, message: string): string {
    return `${new Date().toISOString()} ${level.toUpperCase().padEnd(5)} [${this.scope}] ${message}`;
  }

  debug(message: string): void {
    if (this.enabled("debug")) console.debug(this.format("debug", message));
  }

  info(message: string): void {
    if (this.enabled("info")) console.info(this.format("info", message));
  }

  warn(message: string): void {
    if (this.enabled("warn")) console.warn(this.format("warn", message));
  }

  error(message: string): void {
    if (this.enabled("error")) console.error(this.format("error", message));
  }
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
