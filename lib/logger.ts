/**
 * Structured logging for the spotcheck engine
 * Provides contextual, leveled logging with timers and an in-memory trail
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export interface LogContext {
  hint?: string;
  phase?: string;
  component?: string;
  strategy?: string;
}

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: Record<string, unknown>;
}

export class Logger {
  private entries: LogEntry[] = [];
  private level: LogLevel;
  private context: LogContext = {};
  private timers: Map<string, number> = new Map();
  private readonly shouldLog: boolean;

  constructor(level: LogLevel = "info", shouldLog: boolean = true) {
    this.level = level;
    this.shouldLog = shouldLog;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  /**
   * Merge context into every subsequent entry
   */
  pushContext(context: Partial<LogContext>): void {
    this.context = { ...this.context, ...context };
  }

  /**
   * Drop the given context keys
   */
  popContext(keys: (keyof LogContext)[]): void {
    const next = { ...this.context };
    for (const key of keys) {
      delete next[key];
    }
    this.context = next;
  }

  clearContext(): void {
    this.context = {};
  }

  startTimer(name: string): void {
    this.timers.set(name, Date.now());
  }

  /**
   * End a timer and log its duration; returns the duration in milliseconds
   */
  endTimer(name: string, message: string, data?: Record<string, unknown>, level: LogLevel = "debug"): number {
    const start = this.timers.get(name);
    if (start === undefined) {
      this.log("warn", `Timer "${name}" not found`);
      return 0;
    }

    const duration = Date.now() - start;
    this.timers.delete(name);
    this.log(level, message, { ...data, duration });
    return duration;
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

  isEnabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.level);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (!this.isEnabled(level)) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context: Object.keys(this.context).length > 0 ? { ...this.context } : undefined,
      data: data && Object.keys(data).length > 0 ? { ...data } : undefined,
    };
    this.entries.push(entry);

    if (this.shouldLog) {
      this.consoleLog(level, this.format(entry));
    }
  }

  private format(entry: LogEntry): string {
    const parts: string[] = [];
    if (entry.context?.phase) parts.push(`[${entry.context.phase}]`);
    if (entry.context?.component) parts.push(`<${entry.context.component}>`);
    if (entry.context?.strategy) parts.push(`(${entry.context.strategy})`);
    if (entry.context?.hint) parts.push(entry.context.hint);

    let result = parts.length > 0 ? `${parts.join(" ")}: ${entry.message}` : entry.message;
    if (entry.data) {
      result += `\n  ${this.formatData(entry.data)}`;
    }
    return result;
  }

  private formatData(data: Record<string, unknown>): string {
    return Object.entries(data)
      .map(([key, value]) => {
        if (key === "duration" && typeof value === "number") return `${key}: ${value}ms`;
        if (Array.isArray(value)) return `${key}: [${value.length} items]`;
        if (typeof value === "object" && value !== null) return `${key}: ${JSON.stringify(value)}`;
        return `${key}: ${String(value)}`;
      })
      .join(", ");
  }

  private consoleLog(level: LogLevel, message: string): void {
    switch (level) {
      case "debug":
        console.debug(message);
        break;
      case "info":
        console.log(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "error":
        console.error(message);
        break;
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  getEntriesForHint(hint: string): LogEntry[] {
    return this.entries.filter((entry) => entry.context?.hint === hint);
  }

  getEntriesAtLevel(level: LogLevel): LogEntry[] {
    return this.entries.filter((entry) => LOG_LEVELS.indexOf(entry.level) >= LOG_LEVELS.indexOf(level));
  }
}

/**
 * Global logger instance
 */
export const globalLogger = new Logger("info", true);
