/**
 * @fileoverview Markdown transcript of a finished run, for people reading
 * what the loop did. Nothing reads it back.
 *
 * @module querypilot/observability/transcript
 */

import type { LoopResult } from '../agent/loop-controller.js';
import { PlanStepStatus } from '../types/plan.types.js';
import type { Plan } from '../types/plan.types.js';
import type { TraceEntry } from '../types/plan.types.js';
import { ExecutionStatus } from '../types/tools.types.js';

export function renderTranscript(goal: string, result: LoopResult): string {
  const lines: string[] = [
    `# Task ${result.taskId}`,
    '',
    `**Goal:** ${goal}`,
    '',
    `**Outcome:** ${result.outcome} after ${result.cycles} cycles (${result.reason})`,
  ];

  if (result.answer !== null) {
    lines.push('', `**Answer:** ${result.answer.join(', ')}`);
  }
  if (result.error !== null) {
    lines.push('', `**Error:** ${result.error.code}: ${result.error.message}`);
  }

  for (const entry of result.trace) {
    lines.push('', ...renderEntry(entry));
  }

  const finalPlan = result.planHistory[result.planHistory.length - 1];
  if (finalPlan !== undefined) {
    lines.push('', `## Final plan (revision ${finalPlan.revision})`, '', ...renderPlan(finalPlan));
  }

  return `${lines.join('\n')}\n`;
}

function renderEntry({ cycle, action, result, reflection }: TraceEntry): string[] {
  const outcome = result.status === ExecutionStatus.OK
    ? fence(JSON.stringify(result.payload, null, 2))
    : [`Failed with ${result.errorKind ?? 'an unknown error'}: ${result.errorDetail ?? ''}`];

  return [
    `## Cycle ${cycle}: ${action.toolName}`,
    '',
    `_${action.rationale}_`,
    '',
    ...fence(JSON.stringify(action.arguments, null, 2)),
    '',
    ...outcome,
    ...(reflection === null ? [] : ['', `> ${reflection}`]),
  ];
}

function renderPlan(plan: Plan): string[] {
  return plan.steps.map(step => {
    const mark = step.status === PlanStepStatus.DONE ? 'x' : ' ';
    const failed = step.status === PlanStepStatus.FAILED ? ' (failed)' : '';
    return `- [${mark}] ${step.toolName}${failed}`;
  });
}

function fence(text: string): string[] {
  return ['```json', text, '```'];
}
