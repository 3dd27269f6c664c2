/**
 * @fileoverview Observability module public exports.
 *
 * @module sql-audit-agent/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  createSilentLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogMetrics,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';
