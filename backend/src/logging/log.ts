/**
 * Simple Logger
 *
 * Per-service console logger with a bounded in-memory entry buffer and optional
 * JSON-lines persistence (LOG_FILE_PATH).
 */

import fs from 'fs';
import path from 'path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: number;
  data?: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

/** Entries kept in memory per service; older ones are evicted first. */
export const MAX_BUFFERED_ENTRIES = 500;

function resolveMinLevel(value: string | undefined): LogLevel {
  const normalized = value?.trim().toLowerCase();
  if (
    normalized === 'debug' ||
    normalized === 'info' ||
    normalized === 'warn' ||
    normalized === 'error'
  ) {
    return normalized;
  }
  return 'info';
}

export class Log {
  private static instances = new Map<string, Log>();
  private static logFilePath = process.env.LOG_FILE_PATH?.trim() || null;
  private static minLevel: LogLevel = resolveMinLevel(process.env.LOG_LEVEL);
  private static fileReady = false;

  private service: string;
  private entries: LogEntry[] = [];

  private constructor(service: string) {
    this.service = service;
  }

  static create(config: { service: string }): Log {
    const { service } = config;
    const existing = Log.instances.get(service);
    if (existing) {
      return existing;
    }
    const created = new Log(service);
    Log.instances.set(service, created);
    return created;
  }

  /** Override level and file target (config reload, tests). */
  static configure(options: { level?: LogLevel; filePath?: string | null }): void {
    if (options.level) {
      Log.minLevel = options.level;
    }
    if (options.filePath !== undefined) {
      Log.logFilePath = options.filePath;
      Log.fileReady = false;
    }
  }

  debug(message: string, data?: unknown) {
    this.log('debug', message, data);
  }

  info(message: string, data?: unknown) {
    this.log('info', message, data);
  }

  warn(message: string, data?: unknown) {
    this.log('warn', message, data);
  }

  error(message: string, data?: unknown) {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: unknown) {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[Log.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      level,
      message,
      timestamp: Date.now(),
      data,
    };
    this.entries.push(entry);
    if (this.entries.length > MAX_BUFFERED_ENTRIES) {
      this.entries.shift();
    }

    const prefix = `[${new Date(entry.timestamp).toISOString()}] [${this.service}] [${level.toUpperCase()}]`;
    const output = `${prefix} ${message}`;
    const extra = data === undefined ? '' : data;

    if (level === 'error') {
      console.error(output, extra);
    } else if (level === 'warn') {
      console.warn(output, extra);
    } else {
      console.log(output, extra);
    }

    this.writeToFile(entry);
  }

  private writeToFile(entry: LogEntry): void {
    const filePath = Log.logFilePath;
    if (!filePath) {
      return;
    }
    try {
      if (!Log.fileReady) {
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        Log.fileReady = true;
      }
      const payload = JSON.stringify({
        ...entry,
        data: entry.data instanceof Error ? entry.data.message : entry.data,
        service: this.service,
      });
      fs.appendFileSync(filePath, `${payload}\n`, { encoding: 'utf8' });
    } catch (error) {
      // Keep logger non-fatal.
      console.warn('[Log] Failed to persist log entry:', error);
    }
  }

  getEntries(): LogEntry[] {
    return [...this.entries];
  }

  clear() {
    this.entries = [];
  }
}

export function createLogger(service: string): Log {
  return Log.create({ service });
}
