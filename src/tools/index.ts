/**
 * @fileoverview Tools module public exports.
 *
 * @module querypilot/tools
 * @version 0.1.0
 */

export { ToolRegistry } from './tool-registry.js';

export {
  ToolDispatcher,
  readEnvelopeError,
  type ToolDispatcherEvents,
  type ToolDispatcherConfig,
  type InvokeOptions,
} from './tool-dispatcher.js';

export {
  ToolName,
  createDatabaseTools,
  extractSql,
  type DatabaseToolDependencies,
} from './database.js';
