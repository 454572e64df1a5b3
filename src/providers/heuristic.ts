/**
 * @fileoverview Deterministic reasoner.
 *
 * Follows the plan in order, picks tables in listing order, answers with the
 * result column the goal names and notes only whether a step succeeded. Used by the CLI's `--heuristic` mode and
 * as the reasoning component in tests.
 *
 * @module querypilot/providers/heuristic
 */

import { PlanStepStatus } from '../types/plan.types.js';
import { ExecutionStatus } from '../types/tools.types.js';
import type { ExecutedStep, QueryRow, ReasoningContext, Reasoner, ToolSuggestion } from './base.js';

export class HeuristicReasoner implements Reasoner {
  readonly name = 'heuristic';

  async suggestTool(context: ReasoningContext): Promise<ToolSuggestion> {
    const next = context.plan.steps.find(step => step.status === PlanStepStatus.PENDING);
    if (next === undefined) {
      return { toolName: context.task.terminalTool, rationale: 'Plan is complete' };
    }
    return { toolName: next.toolName, rationale: next.rationale };
  }

  async pickTable(_context: ReasoningContext, candidates: ReadonlyArray<string>): Promise<string> {
    const [first] = candidates;
    if (first === undefined) {
      throw new Error('No candidate tables to pick from');
    }
    return first;
  }

  async extractAnswer(context: ReasoningContext, rows: ReadonlyArray<QueryRow>): Promise<ReadonlyArray<string>> {
    const column = answerColumn(context.task.goal, rows);
    if (column === null) return [];

    return rows
      .map(row => row[column])
      .filter((value): value is string | number => value !== null && value !== undefined)
      .map(value => String(value));
  }

  async reflect(_context: ReasoningContext, { action, result }: ExecutedStep): Promise<string> {
    if (result.status === ExecutionStatus.OK) {
      return `${action.toolName} succeeded`;
    }
    return `${action.toolName} failed with ${result.errorKind ?? 'an unknown error'}: ${result.errorDetail ?? 'no detail'}`;
  }
}

/**
 * The column the goal mentions by name, else the first column.
 */
export function answerColumn(goal: string, rows: ReadonlyArray<QueryRow>): string | null {
  const [first] = rows;
  if (first === undefined) return null;

  const columns = Object.keys(first);
  const words = new Set(goal.toLowerCase().split(/[^a-z0-9_]+/));
  return columns.find(column => words.has(column.toLowerCase())) ?? columns[0] ?? null;
}
