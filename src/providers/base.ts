/**
 * @fileoverview Collaborator interfaces.
 *
 * The loop never talks to a database, a model or a reporting endpoint
 * directly. Each of them sits behind one of these interfaces, so runs can be
 * driven by HTTP/OpenAI-backed implementations or by in-process stand-ins.
 *
 * @module querypilot/providers
 */

import type { Task } from '../types/core.types.js';
import type { Plan, TraceEntry } from '../types/plan.types.js';
import type { Action, ExecutionResult, ReplyEnvelope, ToolDescriptor } from '../types/tools.types.js';

/**
 * Row of a query result, column name to value.
 */
export type QueryRow = Readonly<Record<string, string | number | null>>;

/**
 * Database reachable through raw query text.
 */
export interface DatabaseClient {
  query(sql: string, signal?: AbortSignal): Promise<ReplyEnvelope>;
}

/**
 * Writes SQL for a task given the structure of the tables involved.
 */
export interface QueryComposer {
  composeQuery(
    request: { tableStructures: Readonly<Record<string, string>>; taskDescription: string },
    signal?: AbortSignal,
  ): Promise<string>;
}

/**
 * External system that grades the final answer.
 */
export interface AnswerReporter {
  submit(answer: ReadonlyArray<string>, signal?: AbortSignal): Promise<AnswerReceipt>;
}

export interface AnswerReceipt {
  readonly code: number;
  readonly message: string;
}

/**
 * Everything the reasoning component may condition on.
 */
export interface ReasoningContext {
  readonly task: Task;
  readonly plan: Plan;
  readonly trace: ReadonlyArray<TraceEntry>;
  readonly tools: ReadonlyArray<ToolDescriptor>;
}

/**
 * The call just dispatched, before it is appended to the trace.
 */
export interface ExecutedStep {
  readonly action: Action;
  readonly result: ExecutionResult;
}

export interface ToolSuggestion {
  readonly toolName: string;
  readonly rationale: string;
}

/**
 * The opaque reasoning component. Its answers are proposals; the Decider and
 * Describer check them against the registry and the trace before use.
 */
export interface Reasoner {
  readonly name: string;

  /** Proposes the next tool to call. */
  suggestTool(context: ReasoningContext): Promise<ToolSuggestion>;

  /** Picks the table to inspect next from a non-empty list of candidates. */
  pickTable(context: ReasoningContext, candidates: ReadonlyArray<string>): Promise<string>;

  /** Turns query rows into the values submitted as the final answer. */
  extractAnswer(context: ReasoningContext, rows: ReadonlyArray<QueryRow>): Promise<ReadonlyArray<string>>;

  /** Writes a short note on what a step's result means for the goal. */
  reflect(context: ReasoningContext, step: ExecutedStep): Promise<string>;
}

/**
 * The part of a Reasoner the loop controller uses after each dispatch.
 */
export type Reflector = Pick<Reasoner, 'reflect'>;
