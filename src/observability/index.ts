/**
 * @fileoverview Observability module public exports.
 *
 * @module pursuit-runtime/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  type LogEntry,
  type LogError,
  type LogMetrics,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export { TraceRecorder } from './tracer.js';
