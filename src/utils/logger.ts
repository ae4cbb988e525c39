import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[36m", // cyan
  info: "\x1b[32m",  // green
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

/**
 * Fields a scoped logger stamps on every entry, e.g. the source URL and
 * collection of one ingestion run.
 */
export type LogContext = Record<string, string | number | boolean>;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: LogContext;
  data?: unknown;
  stack?: string;
}

export interface LoggerOptions {
  /** Lowest level emitted. Falls back to PAGEVAULT_LOG_LEVEL, then PAGEVAULT_DEBUG */
  level?: LogLevel;
  /** Shorthand for level "debug" (true) or "info" (false) */
  debug?: boolean;
  logToFile?: boolean;
  logDir?: string;
  /** ANSI level tags; defaults to whether stdout is a terminal */
  color?: boolean;
}

function parseLevel(value: string | undefined): LogLevel | undefined {
  return value === "debug" || value === "info" || value === "warn" || value === "error"
    ? value
    : undefined;
}

function resolveLevel(options: LoggerOptions): LogLevel {
  if (options.level) return options.level;
  if (options.debug !== undefined) return options.debug ? "debug" : "info";
  return (
    parseLevel(process.env.PAGEVAULT_LOG_LEVEL) ??
    (process.env.PAGEVAULT_DEBUG === "true" ? "debug" : "info")
  );
}

/**
 * Output shared by a logger and all of its children: console lines, plus
 * one JSONL file per day under logDir when file logging is on.
 */
export class LogSink {
  minLevel: LogLevel;
  private readonly color: boolean;
  private readonly logToFile: boolean;
  private readonly logDir: string;
  private queue: LogEntry[] = [];
  private flushInterval: NodeJS.Timeout | null = null;
  private initialized = false;

  constructor(options: LoggerOptions = {}) {
    this.minLevel = resolveLevel(options);
    this.color = options.color ?? process.stdout.isTTY === true;
    this.logToFile = options.logToFile ?? false;
    this.logDir = options.logDir ?? path.join(os.homedir(), ".pagevault", "logs");
  }

  accepts(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.minLevel];
  }

  async init(): Promise<void> {
    if (this.initialized) return;

    if (this.logToFile) {
      await fs.mkdir(this.logDir, { recursive: true });
      this.flushInterval = setInterval(() => {
        void this.flush();
      }, 5000);
      // A pending flush must not keep the CLI process alive
      this.flushInterval.unref();
    }
    this.initialized = true;
  }

  write(entry: LogEntry): void {
    const line = this.format(entry);
    if (entry.level === "error") {
      console.error(line);
    } else if (entry.level === "warn") {
      console.warn(line);
    } else {
      console.log(line);
    }

    if (this.logToFile) {
      this.queue.push(entry);
    }
  }

  private format(entry: LogEntry): string {
    const tag = `[${entry.level.toUpperCase()}]`.padEnd(7);
    let output = this.color
      ? `${LEVEL_COLORS[entry.level]}${tag}${RESET} ${entry.message}`
      : `${tag} ${entry.message}`;

    if (entry.context) {
      const fields = Object.entries(entry.context).map(([key, value]) => `${key}=${value}`);
      output += ` (${fields.join(" ")})`;
    }
    if (entry.data !== undefined && !(entry.data instanceof Error)) {
      output += ` ${JSON.stringify(entry.data)}`;
    }
    if (entry.stack) {
      output += `\n${entry.stack}`;
    }
    return output;
  }

  async flush(): Promise<void> {
    if (!this.logToFile || this.queue.length === 0) {
      return;
    }

    const entries = this.queue;
    this.queue = [];

    const date = new Date().toISOString().split("T")[0];
    const logPath = path.join(this.logDir, `pagevault-${date}.log`);
    try {
      const lines = entries.map((entry) => JSON.stringify(entry)).join("\n") + "\n";
      await fs.appendFile(logPath, lines, "utf-8");
    } catch (err) {
      // Fallback to console if file write fails
      console.error("Failed to write to log file:", err);
    }
  }

  async close(): Promise<void> {
    if (this.flushInterval) {
      clearInterval(this.flushInterval);
      this.flushInterval = null;
    }
    await this.flush();
  }
}

export class Logger {
  private readonly sink: LogSink;
  private readonly context: LogContext;

  /**
   * @param sink - Output to share; a new one is built from `options` when omitted
   */
  constructor(options: LoggerOptions = {}, sink?: LogSink, context: LogContext = {}) {
    this.sink = sink ?? new LogSink(options);
    this.context = context;
  }

  /**
   * Logger writing to the same output with `context` added to every entry.
   * Keys in `context` replace keys of the same name on this logger.
   */
  child(context: LogContext): Logger {
    return new Logger({}, this.sink, { ...this.context, ...context });
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.sink.accepts(level)) {
      return;
    }

    const entry: LogEntry = { timestamp: new Date().toISOString(), level, message };
    if (Object.keys(this.context).length > 0) {
      entry.context = this.context;
    }
    if (data !== undefined) {
      entry.data = data;
    }
    if (data instanceof Error) {
      entry.stack = data.stack;
    }
    this.sink.write(entry);
  }

  debug(message: string, data?: unknown): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: unknown): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: unknown): void {
    this.log("warn", message, data);
  }

  error(message: string, error?: unknown): void {
    this.log("error", message, error);
  }

  init(): Promise<void> {
    return this.sink.init();
  }

  flush(): Promise<void> {
    return this.sink.flush();
  }

  close(): Promise<void> {
    return this.sink.close();
  }

  /** Level changes apply to every logger sharing this one's output */
  setLevel(level: LogLevel): void {
    this.sink.minLevel = level;
  }

  setDebugMode(enabled: boolean): void {
    this.setLevel(enabled ? "debug" : "info");
  }

  isDebugMode(): boolean {
    return this.sink.minLevel === "debug";
  }
}

// Singleton instance
let loggerInstance: Logger | null = null;

export function createLogger(options?: LoggerOptions): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger(options);
  }
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = new Logger();
  }
  return loggerInstance;
}

export interface ErrorContext {
  component?: string;
  action?: string;
  url?: string;
}

export function trackError(thrown: unknown, context?: ErrorContext, logger: Logger = getLogger()): void {
  const error = thrown instanceof Error ? thrown : new Error(String(thrown));
  const message = context?.component
    ? `[${context.component}] ${error.message}`
    : error.message;

  logger.error(message, {
    error: {
      name: error.name,
      message: error.message,
      stack: error.stack,
    },
    context,
  });
}

/**
 * @param logger - Scoped logger to report through; the shared logger when omitted
 */
export function createErrorTracker(component: string, logger?: Logger) {
  return (error: unknown, action?: string, url?: string) => {
    trackError(error, { component, action, url }, logger);
  };
}
