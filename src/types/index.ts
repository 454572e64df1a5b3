/**
 * @fileoverview Public type exports.
 *
 * @module querypilot/types
 * @version 0.1.0
 */

export {
  Severity,
  ErrorKind,
  TERMINAL_TOOL,
  createUniqueId,
  createTimestamp,
  type UniqueId,
  type Timestamp,
  type Task,
} from './core.types.js';

export {
  ExecutionStatus,
  REPLY_OK,
  type ToolDescriptor,
  type ToolExecutionContext,
  type ToolImplementation,
  type Action,
  type ExecutionResult,
  type ReplyEnvelope,
} from './tools.types.js';

export {
  PlanStepStatus,
  type PlanStep,
  type Plan,
  type TraceEntry,
} from './plan.types.js';
