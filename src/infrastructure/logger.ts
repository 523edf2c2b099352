/**
 * Structured Logger: No console.log, explicit levels.
 */

import type { LogLevelName } from "@doc-review/core";
import type { AppError, Logger as LoggerInterface } from "../types.js";

export enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_RANK: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
};

const LEVEL_BY_NAME: Record<LogLevelName, LogLevel> = {
  debug: LogLevel.DEBUG,
  info: LogLevel.INFO,
  warn: LogLevel.WARN,
  error: LogLevel.ERROR,
};

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  context?: string;
  data?: unknown;
}

/** Receives every entry at or above the logger's threshold. */
export type LogSink = (entry: LogEntry) => void;

export interface LoggerOptions {
  maxEntries?: number;
  sink?: LogSink;
  /** Minimum level forwarded to the sink. The buffer keeps everything. */
  threshold?: LogLevelName;
}

export class Logger implements LoggerInterface {
  private entries: LogEntry[] = [];
  private maxEntries: number;
  private sink: LogSink | undefined;
  private threshold: LogLevel;
  private forwarded = new WeakSet<LogEntry>();

  constructor(options: LoggerOptions = {}) {
    this.maxEntries = options.maxEntries ?? 1000;
    this.sink = options.sink;
    this.threshold = LEVEL_BY_NAME[options.threshold ?? "info"];
  }

  debug(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, context, data);
  }

  info(message: string, context?: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, context, data);
  }

  warn(message: string, context?: string, error?: AppError): void {
    this.log(LogLevel.WARN, message, context, error);
  }

  error(message: string, context?: string, error?: AppError): void {
    this.log(LogLevel.ERROR, message, context, error);
  }

  /**
   * Change the sink threshold, e.g. once settings have been read.
   */
  setThreshold(level: LogLevelName): void {
    this.threshold = LEVEL_BY_NAME[level];
  }

  private log(
    level: LogLevel,
    message: string,
    context?: string,
    data?: unknown
  ): void {
    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      context,
      data,
    };

    this.entries.push(entry);

    // Prevent unbounded growth
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }

    if (LEVEL_RANK[level] >= LEVEL_RANK[this.threshold]) {
      this.forward(entry);
    }
  }

  /**
   * Get recent logs (last N entries).
   */
  recent(count: number = 100): LogEntry[] {
    return this.entries.slice(-count);
  }

  /**
   * Forward the entries among the last `count` that the threshold held back,
   * e.g. to give a failed command its debug context.
   */
  replayHeldBack(count: number = 100): number {
    if (!this.sink) {
      return 0;
    }
    const heldBack = this.recent(count).filter((entry) => !this.forwarded.has(entry));
    for (const entry of heldBack) {
      this.forward(entry);
    }
    return heldBack.length;
  }

  private forward(entry: LogEntry): void {
    this.forwarded.add(entry);
    this.sink?.(entry);
  }
}

/**
 * One line per entry: `LEVEL [context] message`, plus the error message for
 * entries carrying an {@link AppError}.
 */
export function formatLogEntry(entry: LogEntry): string {
  const context = entry.context ? ` [${entry.context}]` : "";
  const detail = isAppError(entry.data) && entry.data.message !== entry.message
    ? `: ${entry.data.message}`
    : "";
  return `${entry.level}${context} ${entry.message}${detail}`;
}

/**
 * Sink writing formatted entries to a stream (stderr for the CLI).
 */
export function createStreamSink(stream: { write(chunk: string): unknown }): LogSink {
  return (entry) => {
    stream.write(`${formatLogEntry(entry)}\n`);
  };
}

function isAppError(value: unknown): value is AppError {
  return (
    typeof value === "object" &&
    value !== null &&
    "code" in value &&
    "message" in value &&
    typeof value.message === "string"
  );
}
