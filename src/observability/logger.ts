/**
 * @fileoverview Structured Logger - leveled logging for the audit agent.
 *
 * Entries carry a module name, a correlation id (one per run), structured
 * data and optional timing metrics. Console output goes to stderr so that it
 * never interleaves with the structured step stream on stdout.
 *
 * @module sql-audit-agent/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { UniqueId, Timestamp } from '../types/core.types.js';
import { Severity, createTimestamp, createUniqueId } from '../types/core.types.js';

/**
 * A structured log entry.
 */
export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;

  /** Module that generated the log */
  readonly module: string;

  /** Run the entry belongs to, if any */
  readonly correlationId: UniqueId | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly metrics: LogMetrics | null;
}

/**
 * Error information in a log entry.
 */
export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
}

/**
 * Performance metrics in a log entry.
 */
export interface LogMetrics {
  readonly durationMs?: number;
  readonly custom?: Readonly<Record<string, number>>;
}

/**
 * Transport for outputting logs.
 */
export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

/**
 * Configuration for the logger.
 */
export interface LoggerConfig {
  /** Minimum level to log */
  readonly minLevel: Severity;

  /** Module name for this logger instance */
  readonly module: string;

  /** Transports to write to */
  readonly transports: LogTransport[];

  /** Default correlation ID */
  readonly defaultCorrelationId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const DEFAULT_CONFIG: LoggerConfig = {
  minLevel: Severity.INFO,
  module: 'audit-agent',
  transports: [],
};

/**
 * Parses a level name such as `info` or `WARN`; unknown names yield null.
 */
export function parseSeverity(value: string): Severity | null {
  const upper = value.trim().toUpperCase();
  return Object.values(Severity).find((level) => level === upper) ?? null;
}

/**
 * Console transport - one formatted line per entry on stderr.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  private readonly useColors: boolean;
  private readonly output: (line: string) => void;

  constructor(
    useColors: boolean = process.stderr.isTTY === true,
    output: (line: string) => void = (line) => process.stderr.write(`${line}\n`),
  ) {
    this.useColors = useColors;
    this.output = output;
  }

  write(entry: LogEntry): void {
    const parts = [this.formatPrefix(entry), entry.message];

    if (Object.keys(entry.data).length > 0) {
      parts.push(JSON.stringify(entry.data));
    }
    if (entry.metrics?.durationMs !== undefined) {
      parts.push(`(${entry.metrics.durationMs}ms)`);
    }
    if (entry.error) {
      parts.push(`- ${entry.error.name}: ${entry.error.message}`);
    }

    this.output(parts.join(' '));
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);

    if (this.useColors) {
      const color = this.getLevelColor(entry.level);
      return `\x1b[90m${timestamp}\x1b[0m ${color}${level}\x1b[0m \x1b[36m[${entry.module}]\x1b[0m`;
    }

    return `${timestamp} ${level} [${entry.module}]`;
  }

  private getLevelColor(level: Severity): string {
    switch (level) {
      case Severity.DEBUG: return '\x1b[90m'; // Gray
      case Severity.INFO: return '\x1b[32m';  // Green
      case Severity.WARN: return '\x1b[33m';  // Yellow
      case Severity.ERROR: return '\x1b[31m'; // Red
      case Severity.FATAL: return '\x1b[35m'; // Magenta
      default: return '\x1b[0m';
    }
  }
}

/**
 * Memory transport - stores logs in memory for testing.
 */
export class MemoryTransport implements LogTransport {
  readonly name = 'memory';

  private readonly entries: LogEntry[] = [];
  private readonly maxEntries: number;

  constructor(maxEntries: number = 1000) {
    this.maxEntries = maxEntries;
  }

  write(entry: LogEntry): void {
    this.entries.push(entry);

    if (this.entries.length > this.maxEntries) {
      this.entries.shift();
    }
  }

  getEntries(): ReadonlyArray<LogEntry> {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  findByCorrelationId(correlationId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.correlationId === correlationId);
  }

  findByLevel(level: Severity): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.level === level);
  }
}

/**
 * Structured logger.
 *
 * @example
 * ```typescript
 * const logger = new Logger({
 *   module: 'agent.loop',
 *   minLevel: Severity.DEBUG,
 *   transports: [new ConsoleTransport()],
 * });
 *
 * logger.info('Step finished', { step: 3, tools: 2 });
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;
  private correlationId: UniqueId | null;

  constructor(config: Partial<LoggerConfig> = {}) {
    const merged = { ...DEFAULT_CONFIG, ...config };
    this.config = merged.transports.length === 0
      ? { ...merged, transports: [new ConsoleTransport()] }
      : merged;
    this.correlationId = config.defaultCorrelationId ?? null;
  }

  /**
   * Creates a child logger sharing transports and level.
   */
  child(context: { module?: string; correlationId?: UniqueId }): Logger {
    const correlationId = context.correlationId ?? this.correlationId;

    return new Logger({
      minLevel: this.config.minLevel,
      module: context.module ?? this.config.module,
      transports: this.config.transports,
      defaultCorrelationId: correlationId ?? undefined,
    });
  }

  setCorrelationId(id: UniqueId): void {
    this.correlationId = id;
  }

  getCorrelationId(): UniqueId | null {
    return this.correlationId;
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

  /**
   * Times an async operation and logs its duration.
   * Failures are logged at ERROR and rethrown.
   */
  async time<T>(
    label: string,
    fn: () => Promise<T>,
    level: Severity = Severity.DEBUG,
  ): Promise<T> {
    const start = Date.now();
    try {
      const result = await fn();
      this.withMetrics(level, `${label} completed`, { durationMs: Date.now() - start });
      return result;
    } catch (error) {
      this.withMetrics(
        Severity.ERROR,
        `${label} failed`,
        { durationMs: Date.now() - start },
        undefined,
        error instanceof Error ? error : new Error(String(error)),
      );
      throw error;
    }
  }

  // ============ Private Methods ============

  private withMetrics(
    level: Severity,
    message: string,
    metrics: LogMetrics,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isEnabled(level)) return;
    this.writeEntry(this.createEntry(level, message, data, error, metrics));
  }

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
  ): void {
    if (!this.isEnabled(level)) return;
    this.writeEntry(this.createEntry(level, message, data, error));
  }

  private isEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  private createEntry(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
    metrics?: LogMetrics,
  ): LogEntry {
    return {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      correlationId: this.correlationId,
      data: data ?? {},
      error: error ? { name: error.name, message: error.message, stack: error.stack } : null,
      metrics: metrics ?? null,
    };
  }

  private writeEntry(entry: LogEntry): void {
    for (const transport of this.config.transports) {
      try {
        transport.write(entry);
      } catch (transportError) {
        // Fallback to stderr if transport fails
        console.error(`Logger transport '${transport.name}' failed:`, transportError);
      }
    }
  }
}

/**
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}

/**
 * Creates a logger that drops every entry, for callers that want silence.
 */
export function createSilentLogger(module: string = 'audit-agent'): Logger {
  return new Logger({ module, transports: [{ name: 'null', write: () => undefined }] });
}
