/**
 * @fileoverview Plan Store - versioned plan of remaining work.
 *
 * Each revision is a new frozen Plan appended to the history; no plan is
 * edited in place. A revision first records every executed step as DONE or
 * FAILED, then lists what is still pending.
 *
 * Revisions are a pure function of the trace and the task: revising twice
 * over the same trace yields the same pending tool names and targets.
 *
 * @module querypilot/agent/plan-store
 * @version 0.1.0
 */

import { createTimestamp } from '../types/core.types.js';
import type { Task } from '../types/core.types.js';
import { PlanStepStatus } from '../types/plan.types.js';
import type { Plan, PlanStep, TraceEntry } from '../types/plan.types.js';
import { ExecutionStatus } from '../types/tools.types.js';
import { ToolName } from '../tools/database.js';
import { deriveKnowledge } from './knowledge.js';
import type { TaskKnowledge } from './knowledge.js';

export class PlanStore {
  private readonly revisions: Plan[] = [];

  /**
   * @throws Error if no plan has been created yet
   */
  current(): Plan {
    const plan = this.revisions[this.revisions.length - 1];
    if (plan === undefined) {
      throw new Error('No plan has been created yet');
    }
    return plan;
  }

  /**
   * Builds the next plan from everything in the trace and appends it to the
   * history. The first call seeds the plan from the task alone.
   */
  revise(trace: ReadonlyArray<TraceEntry>, task: Task): Plan {
    const knowledge = deriveKnowledge(trace, task);
    const steps: PlanStep[] = [
      ...trace.map(recordStep),
      ...pendingSteps(knowledge, task),
    ];

    const plan: Plan = Object.freeze({
      revision: this.revisions.length + 1,
      steps: Object.freeze(steps.map(step => Object.freeze(step))),
      createdAt: createTimestamp(),
    });
    this.revisions.push(plan);
    return plan;
  }

  history(): ReadonlyArray<Plan> {
    return [...this.revisions];
  }
}

/**
 * Tool names of the pending steps, in plan order.
 */
export function pendingToolNames(plan: Plan): string[] {
  return plan.steps.filter(step => step.status === PlanStepStatus.PENDING).map(step => step.toolName);
}

function recordStep({ action, result }: TraceEntry): PlanStep {
  const ok = result.status === ExecutionStatus.OK;
  const table = action.arguments['table_name'];

  return {
    toolName: action.toolName,
    rationale: ok ? action.rationale : `${action.rationale} (failed: ${result.errorDetail ?? 'unknown error'})`,
    status: ok ? PlanStepStatus.DONE : PlanStepStatus.FAILED,
    target: typeof table === 'string' ? table : null,
  };
}

function pendingSteps(knowledge: TaskKnowledge, task: Task): PlanStep[] {
  if (knowledge.answered) return [];

  const steps: PlanStep[] = [];
  const pending = (toolName: string, rationale: string, target: string | null = null): void => {
    steps.push({ toolName, rationale, status: PlanStepStatus.PENDING, target });
  };

  if (knowledge.tables === null) {
    pending(ToolName.GET_TABLES, 'List the tables in the database');
    pending(ToolName.GET_TABLE_STRUCTURE, 'Inspect each table the goal refers to');
  } else {
    for (const table of knowledge.pendingTables) {
      pending(ToolName.GET_TABLE_STRUCTURE, `Inspect the structure of '${table}'`, table);
    }
  }

  if (knowledge.usableQuery === null) {
    const retry = knowledge.rejectedQueries.length > 0 ? ', avoiding the queries that failed' : '';
    pending(ToolName.ANALYZE_STRUCTURE, `Compose a query for the goal from the table structures${retry}`);
  }

  if (knowledge.queryRows === null) {
    pending(ToolName.EXECUTE_QUERY, 'Run the composed query');
  }

  pending(task.terminalTool, 'Submit the values returned by the query');
  return steps;
}
