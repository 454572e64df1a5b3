/**
 * @fileoverview Unit tests for HeuristicReasoner
 */

import { describe, it, expect } from 'vitest';
import { HeuristicReasoner, answerColumn } from './heuristic.js';
import type { ReasoningContext } from './base.js';
import { PlanStore } from '../agent/plan-store.js';
import { createTask } from '../agent/loop-controller.js';
import { failedEntry, okEntry } from '../testing/builders.js';

function contextFor(goal: string): ReasoningContext {
  const task = createTask(goal);
  return { task, plan: new PlanStore().revise([], task), trace: [], tools: [] };
}

describe('HeuristicReasoner', () => {
  const reasoner = new HeuristicReasoner();

  it('should suggest the first pending step', async () => {
    await expect(reasoner.suggestTool(contextFor('count users'))).resolves.toEqual({
      toolName: 'get_tables',
      rationale: 'List the tables in the database',
    });
  });

  it('should suggest the terminal tool when nothing is pending', async () => {
    const task = createTask('count users');
    const trace = [okEntry(1, 'final_answer', { answer: ['3'] }, { code: 0, message: 'OK' })];
    const context = { task, plan: new PlanStore().revise(trace, task), trace, tools: [] };

    await expect(reasoner.suggestTool(context)).resolves.toEqual({
      toolName: 'final_answer',
      rationale: 'Plan is complete',
    });
  });

  it('should pick the first candidate table', async () => {
    await expect(reasoner.pickTable(contextFor('x'), ['users', 'datacenters'])).resolves.toBe('users');
  });

  it('should answer with the named column and skip nulls', async () => {
    const rows = [{ username: 'ana', id: 1 }, { username: null, id: 2 }, { username: 'bo', id: 3 }];

    await expect(reasoner.extractAnswer(contextFor('list the username of each user'), rows)).resolves.toEqual([
      'ana',
      'bo',
    ]);
  });

  it('should note a successful step', async () => {
    const step = okEntry(1, 'get_tables', {}, { reply: [], error: 'OK' });

    await expect(reasoner.reflect(contextFor('count users'), step)).resolves.toBe('get_tables succeeded');
  });

  it('should note the error of a failed step', async () => {
    const step = failedEntry(2, 'execute_query', { query: 'SELEC 1' }, 'syntax error');

    await expect(reasoner.reflect(contextFor('count users'), step)).resolves.toBe(
      'execute_query failed with CollaboratorError: syntax error',
    );
  });
});

describe('answerColumn', () => {
  it('should fall back to the first column', () => {
    expect(answerColumn('how many?', [{ 'COUNT(*)': 3 }])).toBe('COUNT(*)');
  });

  it('should return null without rows', () => {
    expect(answerColumn('anything', [])).toBeNull();
  });
});
