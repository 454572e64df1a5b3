/**
 * @fileoverview Observability module public exports.
 *
 * @module querypilot/observability
 * @version 0.1.0
 */

export {
  Logger,
  ConsoleTransport,
  MemoryTransport,
  createLogger,
  parseSeverity,
  type LogEntry,
  type LogError,
  type LogTransport,
  type LoggerConfig,
} from './logger.js';

export { renderTranscript } from './transcript.js';
