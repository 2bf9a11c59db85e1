/**
 * Unified Logger - process-wide log for the bundle store, coordinator and CLI
 *
 * Entries are kept in a bounded history and re-emitted to `onLog`
 * subscribers; `--verbose` echoes them to stderr.
 */

import { EventEmitter } from 'events';

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

export interface LogEntry {
  /** Milliseconds since epoch */
  timestamp: number;
  level: LogLevel;
  /** Component that produced the entry, e.g. `bundle-store` */
  source: string;
  message: string;
  data?: Record<string, unknown>;
  error?: {
    message: string;
    name: string;
    stack?: string;
  };
}

export interface LogFilter {
  minLevel?: LogLevel;
  /** Exact source match */
  source?: string;
}

function copyEntry(entry: LogEntry): LogEntry {
  return {
    ...entry,
    data: entry.data ? structuredClone(entry.data) : undefined,
    error: entry.error ? { ...entry.error } : undefined,
  };
}

export class UnifiedLogger extends EventEmitter {
  private static instance: UnifiedLogger | null = null;

  private logs: LogEntry[] = [];
  private maxLogSize = 1000;
  private minLevel: LogLevel = LogLevel.INFO;

  private constructor() {
    super();
    this.setMaxListeners(50);
  }

  static getInstance(): UnifiedLogger {
    if (!UnifiedLogger.instance) {
      UnifiedLogger.instance = new UnifiedLogger();
    }
    return UnifiedLogger.instance;
  }

  /**
   * Drop the singleton with its history and subscribers (for testing)
   */
  static reset(): void {
    if (UnifiedLogger.instance) {
      UnifiedLogger.instance.clear();
      UnifiedLogger.instance.removeAllListeners();
      UnifiedLogger.instance = null;
    }
  }

  setMinLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  /**
   * Bound the history; never below 100 entries
   */
  setMaxLogSize(size: number): void {
    this.maxLogSize = Math.max(100, size);
    if (this.logs.length > this.maxLogSize) {
      this.logs = this.logs.slice(-this.maxLogSize);
    }
  }

  log(level: LogLevel, source: string, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (level < this.minLevel) {
      return;
    }

    const entry: LogEntry = {
      timestamp: Date.now(),
      level,
      source,
      message,
      data: data ? structuredClone(data) : undefined,
      error: error ? { message: error.message, name: error.name, stack: error.stack } : undefined,
    };

    if (this.logs.length >= this.maxLogSize) {
      this.logs = this.logs.slice(-(this.maxLogSize - 1));
    }
    this.logs.push(entry);

    this.emit('log', copyEntry(entry));
  }

  debug(source: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, source, message, data);
  }

  info(source: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, source, message, data);
  }

  warn(source: string, message: string, data?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, source, message, data);
  }

  error(source: string, message: string, error?: Error, data?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, source, message, data, error);
  }

  /**
   * Copies of the recorded entries, oldest first
   */
  getLogs(filter: LogFilter = {}): LogEntry[] {
    return this.logs
      .filter(entry => filter.minLevel === undefined || entry.level >= filter.minLevel)
      .filter(entry => filter.source === undefined || entry.source === filter.source)
      .map(copyEntry);
  }

  onLog(callback: (entry: LogEntry) => void): () => void {
    this.on('log', callback);
    return () => this.off('log', callback);
  }

  clear(): void {
    this.logs = [];
  }

  format(entry: LogEntry, options: { includeTimestamp?: boolean } = {}): string {
    const parts: string[] = [];
    if (options.includeTimestamp !== false) {
      parts.push(`[${new Date(entry.timestamp).toISOString()}]`);
    }
    parts.push(`[${LogLevel[entry.level].padEnd(5)}]`, `[${entry.source}]`, entry.message);
    if (entry.data) {
      parts.push(JSON.stringify(entry.data));
    }
    if (entry.error) {
      parts.push(`Error: ${entry.error.message}`);
    }
    return parts.join(' ');
  }
}

export function getUnifiedLogger(): UnifiedLogger {
  return UnifiedLogger.getInstance();
}

/**
 * Map a configured level name to a LogLevel; unknown names mean INFO
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'DEBUG': return LogLevel.DEBUG;
    case 'WARN':
    case 'WARNING': return LogLevel.WARN;
    case 'ERROR': return LogLevel.ERROR;
    default: return LogLevel.INFO;
  }
}
