/**
 * @fileoverview Tool contract type definitions.
 *
 * Tools are the only way the loop touches the outside world. Each one carries
 * its own input and output schemas so the dispatcher can reject a malformed
 * call before anything is sent.
 *
 * @module querypilot/types/tools
 * @version 0.1.0
 */

import type { z } from 'zod';
import type { ErrorKind, Timestamp, UniqueId } from './core.types.js';
import type { Logger } from '../observability/logger.js';

/**
 * Static description of a tool. Frozen once the registry is built.
 */
export interface ToolDescriptor {
  /** Identifier the reasoning component uses to name the tool */
  readonly name: string;

  /** What the tool does, phrased for the reasoning component */
  readonly description: string;

  /** Schema the call arguments must satisfy */
  readonly inputSchema: z.ZodTypeAny;

  /** Schema of a successful reply */
  readonly outputSchema: z.ZodTypeAny;

  /** Failure kinds this tool can produce */
  readonly errorModes: ReadonlyArray<ErrorKind>;

  /** Whether this tool changes external state */
  readonly hasSideEffects: boolean;

  /** Whether repeating a call yields the same reply */
  readonly idempotent: boolean;
}

/**
 * Context passed to a tool implementation for a single call.
 */
export interface ToolExecutionContext {
  readonly executionId: UniqueId;
  readonly signal: AbortSignal;
  readonly logger: Logger;
}

/**
 * A descriptor bound to the function that performs the call.
 */
export interface ToolImplementation {
  readonly descriptor: ToolDescriptor;
  execute(input: unknown, context: ToolExecutionContext): Promise<unknown>;
}

/**
 * One tool call chosen by the Decider and parameterized by the Describer.
 */
export interface Action {
  readonly id: UniqueId;
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;

  /** Diagnostic only; control logic never branches on it */
  readonly rationale: string;
}

export enum ExecutionStatus {
  OK = 'OK',
  ERROR = 'ERROR',
}

/**
 * Outcome of dispatching exactly one Action.
 */
export interface ExecutionResult {
  readonly id: UniqueId;
  readonly actionId: UniqueId;
  readonly toolName: string;
  readonly status: ExecutionStatus;

  /** Tool reply on success, null on error */
  readonly payload: unknown;

  readonly errorKind: ErrorKind | null;
  readonly errorDetail: string | null;
  readonly durationMs: number;
  readonly completedAt: Timestamp;
}

/**
 * Reply envelope of the database-backed tools. An `error` of "OK" is success;
 * any other string describes the failure.
 */
export interface ReplyEnvelope<T = unknown> {
  readonly reply: T;
  readonly error: string;
}

export const REPLY_OK = 'OK';
