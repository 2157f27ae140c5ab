/**
 * Leveled logging for case synthesis.
 *
 * Entries carry the target being synthesized, are kept in memory for the
 * end-of-run summary and are echoed to the console unless muted.
 */

import { formatValue } from "./utils";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogContext {
  target?: string;
  member?: string;
  phase?: string;
  component?: string;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export class Logger {
  private entries: LogEntry[] = [];
  private context: LogContext = {};
  private timers = new Map<string, number>();

  constructor(private level: LogLevel = "info", private echo: boolean = true) {}

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Run `work` with `context` merged into every entry it logs; the previous
   * context is restored afterwards
   */
  async within<T>(context: LogContext, work: () => Promise<T>): Promise<T> {
    const previous = this.context;
    this.context = { ...previous, ...context };
    try {
      return await work();
    } finally {
      this.context = previous;
    }
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * Log `message` with the time elapsed since startTimer(name); returns the
   * duration in milliseconds
   */
  endTimer(name: string, message: string, level: LogLevel = "debug"): number {
    const started = this.timers.get(name);
    if (started === undefined) {
      this.log("warn", `Timer "${name}" was never started`);
      return 0;
    }
    this.timers.delete(name);
    const durationMs = Date.now() - started;
    this.log(level, message, { durationMs });
    return durationMs;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  /**
   * Entries at or above `level`
   */
  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => rank(entry.level) >= rank(level));
  }

  countByLevel(): Record<LogLevel, number> {
    const counts: Record<LogLevel, number> = { debug: 0, info: 0, warn: 0, error: 0 };
    for (const entry of this.entries) {
      counts[entry.level] += 1;
    }
    return counts;
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (rank(level) < rank(this.level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? data : undefined,
    };
    this.entries.push(entry);

    if (this.echo) {
      this.write(level, formatEntry(entry));
    }
  }

  private write(level: LogLevel, line: string): void {
    switch (level) {
      case "debug":
        console.debug(line);
        break;
      case "info":
        console.log(line);
        break;
      case "warn":
        console.warn(line);
        break;
      case "error":
        console.error(line);
        break;
    }
  }
}

/**
 * One console line: `[phase] <component> target.member: message (key=value, ...)`
 */
export function formatEntry(entry: LogEntry): string {
  const parts: string[] = [];
  const context = entry.context;
  if (context?.phase) parts.push(`[${context.phase}]`);
  if (context?.component) parts.push(`<${context.component}>`);
  if (context?.target) parts.push(context.member ? `${context.target}.${context.member}` : context.target);

  let line = parts.length > 0 ? `${parts.join(" ")}: ${entry.message}` : entry.message;
  if (entry.data) {
    const fields = Object.entries(entry.data).map(([key, value]) =>
      key === "durationMs" && typeof value === "number" ? `${value}ms` : `${key}=${formatField(value)}`
    );
    line += ` (${fields.join(", ")})`;
  }
  return line;
}

function formatField(value: unknown): string {
  return typeof value === "string" ? value : formatValue(value);
}

export const globalLogger = new Logger("info", true);
