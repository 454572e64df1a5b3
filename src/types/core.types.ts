/**
 * @fileoverview Core type definitions for the querypilot runtime.
 *
 * These primitives are shared by every component of the loop: identifiers,
 * timestamps, severities and the classification of failures the loop can
 * observe.
 *
 * @module querypilot/types/core
 * @version 0.1.0
 */

/**
 * Unique identifier type used throughout the system.
 * Format: UUID v4 string.
 */
export type UniqueId = string & { readonly __brand: 'UniqueId' };

/**
 * Unix timestamp in milliseconds.
 */
export type Timestamp = number & { readonly __brand: 'Timestamp' };

/**
 * Severity levels for logging.
 */
export enum Severity {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  FATAL = 'FATAL',
}

/**
 * Failure kinds a tool call or a loop run can end with.
 *
 * @remarks
 * - UnknownTool: a tool name that the registry does not hold
 * - SchemaViolation: arguments rejected by the tool's input schema
 * - ArgumentConstructionError: the trace lacks data needed to build arguments
 * - CollaboratorError: the tool's backing system failed or replied with an error
 * - Exhausted: an iteration or time budget ran out
 */
export enum ErrorKind {
  UNKNOWN_TOOL = 'UnknownTool',
  SCHEMA_VIOLATION = 'SchemaViolation',
  ARGUMENT_CONSTRUCTION = 'ArgumentConstructionError',
  COLLABORATOR = 'CollaboratorError',
  EXHAUSTED = 'Exhausted',
}

/**
 * A goal handed to the loop by an external request.
 */
export interface Task {
  readonly id: UniqueId;

  /** Free text description of the objective */
  readonly goal: string;

  /** Tool whose successful dispatch ends the task */
  readonly terminalTool: string;
}

/**
 * Name of the tool that ends a task unless the task says otherwise.
 */
export const TERMINAL_TOOL = 'final_answer';

/**
 * Creates a branded UniqueId from a string.
 */
export function createUniqueId(value: string): UniqueId {
  return value as UniqueId;
}

/**
 * Creates a branded Timestamp, defaulting to the current time.
 */
export function createTimestamp(value?: number): Timestamp {
  return (value ?? Date.now()) as Timestamp;
}
