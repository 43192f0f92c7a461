/**
 * Gateway log buffer.
 *
 * Every entry is written to stdout as JSON through pino, kept in a bounded
 * in-memory ring for the /logs API, and pushed to live subscribers.
 */
import pino, { type Logger } from "pino";
import type { LogLevel } from "../config/schema.js";

export type { LogLevel } from "../config/schema.js";

export interface LogEntry {
  id: number;
  timestamp: Date;
  level: LogLevel;
  source: string;
  message: string;
  data?: Record<string, unknown>;
}

export type LogSubscriber = (entry: LogEntry) => void;

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function makeLogger(level: LogLevel): Logger {
  const isTestTooling = process.env.VITEST === "true" || process.env.NODE_ENV === "test";
  return pino({
    level,
    enabled: !isTestTooling,
    base: { service: "local-assistant-gateway" },
    messageKey: "msg",
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}

export class GatewayLogs {
  private entries: LogEntry[] = [];
  private subscribers = new Set<LogSubscriber>();
  private nextId = 1;
  private level: LogLevel = "info";
  private logger: Logger;

  constructor(private capacity = 1000) {
    this.logger = makeLogger(this.level);
  }

  /**
   * Apply level and buffer size from config.
   */
  configure(options: { level?: LogLevel; bufferSize?: number }): void {
    if (options.level) {
      this.level = options.level;
      this.logger.level = options.level;
    }
    if (options.bufferSize) {
      this.capacity = options.bufferSize;
      this.trim();
    }
  }

  log(level: LogLevel, source: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.level]) return;

    const entry: LogEntry = {
      id: this.nextId++,
      timestamp: new Date(),
      level,
      source,
      message,
      data,
    };

    this.entries.push(entry);
    this.trim();

    this.logger[level]({ source, ...data }, message);

    for (const subscriber of this.subscribers) {
      try {
        subscriber(entry);
      } catch (err) {
        this.logger.error({ source: "Logs", err }, "Log subscriber failed");
      }
    }
  }

  debug(source: string, message: string, data?: Record<string, unknown>): void {
    this.log("debug", source, message, data);
  }

  info(source: string, message: string, data?: Record<string, unknown>): void {
    this.log("info", source, message, data);
  }

  warn(source: string, message: string, data?: Record<string, unknown>): void {
    this.log("warn", source, message, data);
  }

  error(source: string, message: string, data?: Record<string, unknown>): void {
    this.log("error", source, message, data);
  }

  /**
   * Security audit trail: who did what to which resource.
   */
  audit(sessionId: string, action: string, resource: string, message: string): void {
    this.log("info", "Audit", message, { audit: true, user: sessionId, action, resource });
  }

  /**
   * Most recent entries, oldest first, optionally at or above a level.
   */
  getRecent(count = 100, level?: LogLevel): LogEntry[] {
    const filtered = level
      ? this.entries.filter((e) => LEVEL_ORDER[e.level] >= LEVEL_ORDER[level])
      : this.entries;
    return filtered.slice(-count);
  }

  clear(): void {
    this.entries = [];
  }

  subscribe(subscriber: LogSubscriber): () => void {
    this.subscribers.add(subscriber);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  private trim(): void {
    if (this.entries.length > this.capacity) {
      this.entries.splice(0, this.entries.length - this.capacity);
    }
  }
}

export const gatewayLogs = new GatewayLogs();
