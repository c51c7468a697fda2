/**
 * Structured Logger
 *
 * Leveled logging with run-scoped trace IDs and pluggable sinks. Every
 * component takes a logger through its options and falls back to a
 * component logger derived from the global one.
 *
 * Sinks:
 * - console: human-readable lines on stdout/stderr
 * - memory: ring buffer, read back by tests
 * - file: JSON lines appended to a log file
 *
 * Usage:
 *   const log = createComponentLogger('Orchestrator');
 *   log.withTrace(runId).info('Loop started', { iteration: 1 });
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

// ─── Types ───────────────────────────────────────────────────────────

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export interface LogEntry {
  timestamp: string;
  level: LogLevel;
  message: string;
  traceId?: string;
  data?: Record<string, unknown>;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  level?: LogLevel;
  sinks?: LogSink[];
  /** Merged into every entry */
  defaultContext?: Record<string, unknown>;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  silent: 5,
};

// ─── Sinks ───────────────────────────────────────────────────────────

export class ConsoleSink implements LogSink {
  write(entry: LogEntry): void {
    const prefix = `[${entry.timestamp}] [${entry.level.toUpperCase()}]`;
    const traceStr = entry.traceId ? ` (${entry.traceId})` : '';
    const dataStr =
      entry.data && Object.keys(entry.data).length > 0 ? ' ' + JSON.stringify(entry.data) : '';
    const line = `${prefix}${traceStr} ${entry.message}${dataStr}`;

    if (entry.level === 'error' || entry.level === 'warn') {
      // Keep stdout clean for command output
      console.error(line);
    } else {
      console.log(line);
    }
  }
}

export class MemorySink implements LogSink {
  private buffer: LogEntry[] = [];

  constructor(private readonly maxSize = 1000) {}

  write(entry: LogEntry): void {
    this.buffer.push(entry);
    if (this.buffer.length > this.maxSize) {
      this.buffer.shift();
    }
  }

  getEntries(filter?: { level?: LogLevel; traceId?: string }): LogEntry[] {
    let entries = this.buffer;

    if (filter?.level) {
      const min = LEVEL_PRIORITY[filter.level];
      entries = entries.filter((e) => LEVEL_PRIORITY[e.level] >= min);
    }
    if (filter?.traceId) {
      entries = entries.filter((e) => e.traceId === filter.traceId);
    }

    return entries;
  }

  messages(): string[] {
    return this.buffer.map((e) => e.message);
  }

  clear(): void {
    this.buffer = [];
  }
}

/** Appends one JSON object per line */
export class FileSink implements LogSink {
  private initialized = false;

  constructor(private readonly filePath: string) {}

  write(entry: LogEntry): void {
    if (!this.initialized) {
      mkdirSync(dirname(this.filePath), { recursive: true });
      this.initialized = true;
    }
    appendFileSync(this.filePath, JSON.stringify(entry) + '\n', 'utf-8');
  }
}

// ─── Logger ──────────────────────────────────────────────────────────

export class StructuredLogger {
  private minLevel: LogLevel;
  private readonly sinks: LogSink[];
  private readonly defaultContext: Record<string, unknown>;
  private traceId?: string;

  constructor(config: LoggerConfig = {}) {
    this.minLevel = config.level ?? 'info';
    this.sinks = config.sinks ?? [new ConsoleSink()];
    this.defaultContext = config.defaultContext ?? {};
  }

  /** Child logger bound to a run or request id */
  withTrace(traceId: string): StructuredLogger {
    const child = new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: this.defaultContext,
    });
    child.traceId = traceId;
    return child;
  }

  withContext(context: Record<string, unknown>): StructuredLogger {
    const child = new StructuredLogger({
      level: this.minLevel,
      sinks: this.sinks,
      defaultContext: { ...this.defaultContext, ...context },
    });
    child.traceId = this.traceId;
    return child;
  }

  setLevel(level: LogLevel): void {
    this.minLevel = level;
  }

  trace(message: string, data?: Record<string, unknown>): void {
    this.log('trace', message, data);
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log('debug', message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log('info', message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log('warn', message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log('error', message, data);
  }

  private log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(this.traceId && { traceId: this.traceId }),
      ...(data || Object.keys(this.defaultContext).length > 0
        ? { data: { ...this.defaultContext, ...data } }
        : {}),
    };

    for (const sink of this.sinks) {
      try {
        sink.write(entry);
      } catch (err) {
        // A failing sink must not take the pipeline down with it
        if (!(sink instanceof ConsoleSink)) {
          console.error(`[logger] sink write failed: ${err instanceof Error ? err.message : String(err)}`);
        }
      }
    }
  }
}

// ─── Global instance ─────────────────────────────────────────────────

/**
 * Global logger. `configureLogger()` replaces it once config is loaded;
 * component loggers created before that keep the startup defaults.
 */
export let logger = new StructuredLogger();

export function configureLogger(config: LoggerConfig): void {
  logger = new StructuredLogger(config);
}

export function createComponentLogger(component: string): StructuredLogger {
  return logger.withContext({ component });
}
