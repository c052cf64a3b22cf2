/**
 * Namespaced logger with an optional JSON-lines file transport
 */

import { appendFile, mkdir } from "node:fs/promises";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface MirrorLogger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LOG_LEVELS, value);
}

interface LogEntry {
  timestamp: string;
  level: LogLevel;
  namespace: string;
  message: string;
  meta?: Record<string, unknown>;
}

type LogSink = (entry: LogEntry) => void;

class NamespacedLogger implements MirrorLogger {
  constructor(
    private readonly namespace: string,
    private readonly minLevel: LogLevel,
    private readonly sink: LogSink,
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS[level] >= LOG_LEVELS[this.minLevel];
  }

  private format(message: string, meta?: Record<string, unknown>): string {
    const prefix = `[${this.namespace}]`;
    if (meta && Object.keys(meta).length > 0) {
      return `${prefix} ${message} ${JSON.stringify(meta)}`;
    }
    return `${prefix} ${message}`;
  }

  private write(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    this.sink({
      timestamp: new Date().toISOString(),
      level,
      namespace: this.namespace,
      message,
      meta,
    });
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("debug")) {
      console.debug(this.format(message, meta));
      this.write("debug", message, meta);
    }
  }

  info(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("info")) {
      console.info(this.format(message, meta));
      this.write("info", message, meta);
    }
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("warn")) {
      console.warn(this.format(message, meta));
      this.write("warn", message, meta);
    }
  }

  error(message: string, meta?: Record<string, unknown>): void {
    if (this.shouldLog("error")) {
      console.error(this.format(message, meta));
      this.write("error", message, meta);
    }
  }
}

/**
 * Creates loggers that share one log directory
 */
export class LoggerFactory {
  private logFile?: string;
  private directoryReady?: Promise<void>;
  private pendingWrites: Promise<void> = Promise.resolve();

  /**
   * Mirror every entry to `<dir>/helpmirror.log` as JSON lines
   */
  setLogDirectory(dir: string): void {
    this.logFile = path.join(dir, "helpmirror.log");
    this.directoryReady = mkdir(dir, { recursive: true }).then(() => undefined);
  }

  createLogger(namespace: string, level?: LogLevel): MirrorLogger {
    const envLevel = process.env.LOG_LEVEL?.toLowerCase();
    const minLevel = level ?? (isLogLevel(envLevel) ? envLevel : "info");

    return new NamespacedLogger(namespace, minLevel, (entry) => {
      this.writeToFile(entry);
    });
  }

  private writeToFile(entry: LogEntry): void {
    const logFile = this.logFile;
    const ready = this.directoryReady;
    if (!logFile || !ready) return;

    const line = JSON.stringify(entry) + "\n";
    this.pendingWrites = this.pendingWrites
      .then(() => ready)
      .then(() => appendFile(logFile, line, "utf8"))
      .catch((error: unknown) => {
        console.error(`[LoggerFactory] Failed to write to ${logFile}:`, error);
      });
  }

  /**
   * Resolves once every entry logged so far has reached the log file
   */
  flush(): Promise<void> {
    return this.pendingWrites;
  }
}

export const loggerFactory = new LoggerFactory();

export function createLogger(namespace: string, level?: LogLevel): MirrorLogger {
  return loggerFactory.createLogger(namespace, level);
}
