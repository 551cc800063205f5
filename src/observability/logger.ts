/**
 * @fileoverview Structured Logger - leveled, JSON-serializable logging.
 *
 * Entries carry the module that wrote them, the pursuit they belong to
 * (when logged from inside a pursuit), structured data, error details
 * and optional timing metrics. Output goes to one or more transports.
 *
 * @module pursuit-runtime/observability/logger
 * @version 0.1.0
 */

import { v4 as uuidv4 } from 'uuid';
import type { Timestamp, UniqueId } from '../types/index.js';
import { Severity, createTimestamp, createUniqueId } from '../types/index.js';

export interface LogEntry {
  readonly id: UniqueId;
  readonly timestamp: Timestamp;
  readonly level: Severity;
  readonly message: string;
  readonly module: string;

  /** Pursuit this entry was logged from, if any */
  readonly pursuitId: UniqueId | null;

  readonly data: Readonly<Record<string, unknown>>;
  readonly error: LogError | null;
  readonly metrics: LogMetrics | null;
}

export interface LogError {
  readonly name: string;
  readonly message: string;
  readonly stack: string | undefined;
  readonly code: string | undefined;
}

export interface LogMetrics {
  readonly durationMs?: number;
  readonly custom?: Readonly<Record<string, number>>;
}

export interface LogTransport {
  readonly name: string;
  write(entry: LogEntry): void;
}

export interface LoggerConfig {
  readonly minLevel: Severity;
  readonly module: string;
  readonly transports: ReadonlyArray<LogTransport>;
  readonly pursuitId?: UniqueId | undefined;
}

const SEVERITY_ORDER: Record<Severity, number> = {
  DEBUG: 0,
  INFO: 1,
  WARN: 2,
  ERROR: 3,
  FATAL: 4,
};

const LEVEL_COLORS: Record<Severity, string> = {
  DEBUG: '\x1b[90m',
  INFO: '\x1b[32m',
  WARN: '\x1b[33m',
  ERROR: '\x1b[31m',
  FATAL: '\x1b[35m',
};

/**
 * Writes entries to stderr so that stdout stays free for command output.
 */
export class ConsoleTransport implements LogTransport {
  readonly name = 'console';

  constructor(private readonly useColors: boolean = true) {}

  write(entry: LogEntry): void {
    const hasData = Object.keys(entry.data).length > 0;
    const parts = [this.formatPrefix(entry), entry.message];
    if (hasData) parts.push(JSON.stringify(entry.data));
    if (entry.metrics?.durationMs !== undefined) parts.push(`(${entry.metrics.durationMs.toFixed(1)}ms)`);
    if (entry.error) parts.push(`\n  ${entry.error.stack ?? `${entry.error.name}: ${entry.error.message}`}`);

    console.error(parts.join(' '));
  }

  private formatPrefix(entry: LogEntry): string {
    const timestamp = new Date(entry.timestamp).toISOString();
    const level = entry.level.padEnd(5);
    const scope = entry.pursuitId ? `${entry.module}:${entry.pursuitId.slice(0, 8)}` : entry.module;

    if (this.useColors) {
      return `\x1b[90m${timestamp}\x1b[0m ${LEVEL_COLORS[entry.level]}${level}\x1b[0m \x1b[36m[${scope}]\x1b[0m`;
    }
    return `${timestamp} ${level} [${scope}]`;
  }
}

/**
 * Keeps entries in memory, for tests and post-mortem inspection.
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

  clear(): void {
    this.entries.length = 0;
  }

  findByPursuitId(pursuitId: UniqueId): ReadonlyArray<LogEntry> {
    return this.entries.filter(e => e.pursuitId === pursuitId);
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
 * const logger = createLogger('agent.loop', { minLevel: Severity.DEBUG });
 * const pursuitLogger = logger.child({ pursuitId });
 *
 * pursuitLogger.info('Pursuit started', { maxIterations: 5 });
 * pursuitLogger.error('Act callback failed', { iteration: 2 }, error);
 * ```
 */
export class Logger {
  private readonly config: LoggerConfig;

  constructor(config: Partial<LoggerConfig> = {}) {
    this.config = {
      minLevel: config.minLevel ?? Severity.INFO,
      module: config.module ?? 'pursuit',
      transports: config.transports && config.transports.length > 0
        ? config.transports
        : [new ConsoleTransport()],
      pursuitId: config.pursuitId,
    };
  }

  /**
   * Creates a logger sharing this one's transports and level.
   */
  child(context: { module?: string; pursuitId?: UniqueId }): Logger {
    return new Logger({
      ...this.config,
      module: context.module ?? this.config.module,
      pursuitId: context.pursuitId ?? this.config.pursuitId,
    });
  }

  isLevelEnabled(level: Severity): boolean {
    return SEVERITY_ORDER[level] >= SEVERITY_ORDER[this.config.minLevel];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.DEBUG, message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log(Severity.INFO, message, data);
  }

  warn(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.WARN, message, data, error);
  }

  error(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.ERROR, message, data, error);
  }

  fatal(message: string, data?: Record<string, unknown>, error?: Error): void {
    this.log(Severity.FATAL, message, data, error);
  }

  /**
   * Logs with performance metrics attached.
   */
  withMetrics(level: Severity, message: string, metrics: LogMetrics, data?: Record<string, unknown>): void {
    this.log(level, message, data, undefined, metrics);
  }

  /**
   * Times an async operation and logs its duration.
   */
  async time<T>(label: string, fn: () => Promise<T>, level: Severity = Severity.DEBUG): Promise<T> {
    const start = performance.now();
    try {
      const result = await fn();
      this.withMetrics(level, `${label} completed`, { durationMs: performance.now() - start });
      return result;
    } catch (error) {
      this.log(
        Severity.ERROR,
        `${label} failed`,
        undefined,
        error instanceof Error ? error : undefined,
        { durationMs: performance.now() - start },
      );
      throw error;
    }
  }

  // ============ Private Methods ============

  private log(
    level: Severity,
    message: string,
    data?: Record<string, unknown>,
    error?: Error,
    metrics?: LogMetrics,
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const entry: LogEntry = {
      id: createUniqueId(uuidv4()),
      timestamp: createTimestamp(),
      level,
      message,
      module: this.config.module,
      pursuitId: this.config.pursuitId ?? null,
      data: data ?? {},
      error: error ? formatError(error) : null,
      metrics: metrics ?? null,
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
 * Creates a logger for a specific module.
 */
export function createLogger(module: string, config?: Partial<LoggerConfig>): Logger {
  return new Logger({ ...config, module });
}
