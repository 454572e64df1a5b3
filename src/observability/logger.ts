/**
 * @fileoverview Structured logger.
 *
 * Leveled, JSON-serializable log entries with a module name and a
 * correlation ID. A loop run logs under its task ID so interleaved runs can
 * be told apart.
 *
 * @module querypilot/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;
  readonly module: string;

  /** Task ID for entries written during a loop run */
  readonly correlationId: UniqueId | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly correlationId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

/**
 * Console transport. Writes to stderr so stdout stays free for results.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = process.stderr.isTTY === true) {}

  write(entry: LogEntry): void {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const prefix = this.useColors
      ? `\x1b[90m${timestamp}\x1b[0m ${LEVEL_COLORS[entry.level]}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`
      : `${timestamp} ${level} [${entry.module}]`;

    const details = Object.keys(entry.data).length > 0 ? ` ${JSON.stringify(entry.data)}` : '';
    const failure = entry.error ? ` (${entry.error.name}: ${entry.error.message})` : '';
    process.stderr.write(`${prefix} ${entry.message}${details}${failure}\n`);
  }
}

const LEVEL_COLORS: Record<Severity, string> = {
  DEBUG: '\x1b[90m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
};

/**
 * Memory transport - keeps entries for tests and diagnostics.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];

  constructor(private readonly maxEntries: number = 1000) {}

  write(entry: LogEntry): void {
    this.entries.push(entry);
    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }

  findByCorrelationId(correlationId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.correlationId === correlationId);
  }

  clear(): void {
    this.entries.length = 0;
  }
}

/**
 * @example
 * ```typescript
 * const logger = createLogger('tools.dispatcher', { minLevel: Severity.DEBUG });
 * logger.info('Tool completed', { tool: 'get_tables', durationMs: 12 });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    const transports = config.transports ?? [];
    this.config = {
      minLevel: config.minLevel ?? Severity.INFO,
      module: config.module ?? 'querypilot',
      transports: transports.length > 0 ? transports : [new ConsoleTransport()],
      correlationId: config.correlationId,
    };
  }

  /**
   * Creates a logger sharing this one's transports and level.
   */
  child(context: { module?: string; correlationId?: UniqueId }): Logger {
    return new Logger({
      ...this.config,
      module: context.module ?? this.config.module,
      correlationId: context.correlationId ?? this.config.correlationId,
    });
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.WARN, message, data);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  private log(level: Severity, message: string, data?: Record<string, unknown>, error?: Error): void {
    if (SEVERITY_ORDER[level] < SEVERITY_ORDER[this.config.minLevel]) {
      return;
    }

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      correlationId: this.config.correlationId ?? null,
      data: data ?? {},
      error: error ? formatError(error) : null,
    };

    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

function formatError(error: Error): LogError {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : undefined;
  return {
    name: error.name,
    message: error.message,
    stack: error.stack,
    code,
  };
}

/**
 * Parses a level name such as "debug" or "WARN".
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  return Object.values(Severity).find(level => level === upper) ?? null;
}

export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
