/**
 * @fileoverview Plan and trace types.
 *
 * A Plan is an immutable value; every revision produces a new one. The trace
 * is the append-only record of what was actually dispatched.
 *
 * @module querypilot/types/plan
 * @version 0.1.0
 */

import type { Timestamp } from './core.types.js';
import type { Action, ExecutionResult } from './tools.types.js';

export enum PlanStepStatus {
  PENDING = 'PENDING',
  DONE = 'DONE',
  FAILED = 'FAILED',
}

export interface PlanStep {
  readonly toolName: string;
  readonly rationale: string;
  readonly status: PlanStepStatus;

  /** Table the step is about, when it is about one */
  readonly target: string | null;
}

export interface Plan {
  /** 1 for the seed plan, incremented on each revision */
  readonly revision: number;
  readonly steps: ReadonlyArray<PlanStep>;
  readonly createdAt: Timestamp;
}

export interface TraceEntry {
  /** 1-based cycle that produced the entry */
  readonly cycle: number;
  readonly planSnapshot: Plan;
  readonly action: Action;
  readonly result: ExecutionResult;

  /** Reasoner's note on the result. Shown to later prompts and in transcripts, never branched on */
  readonly reflection: string | null;
}
