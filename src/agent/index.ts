/**
 * @fileoverview Agent module public exports.
 *
 * @module querypilot/agent
 * @version 0.1.0
 */

export {
  LoopLifecycle,
  LoopState,
  type LifecycleEvents,
  type StateHistoryEntry,
} from './lifecycle.js';

export {
  LoopController,
  LoopOutcome,
  DEFAULT_LOOP_CONFIG,
  createTask,
  type LoopConfig,
  type LoopControllerEvents,
  type LoopDependencies,
  type LoopError,
  type LoopResult,
  type RunOptions,
} from './loop-controller.js';

export { Decider, isActionable, type Selection, type ToolSelector } from './decider.js';
export { Describer, describeTask, type ArgumentBuilder, type ToolArguments } from './describer.js';
export { PlanStore, pendingToolNames } from './plan-store.js';
export { deriveKnowledge, selectRelevantTables, type TaskKnowledge } from './knowledge.js';
export { Trace } from './trace.js';
