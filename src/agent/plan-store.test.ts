/**
 * @fileoverview Unit tests for PlanStore
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { PlanStore, pendingToolNames } from './plan-store.js';
import { createTask } from './loop-controller.js';
import { PlanStepStatus } from '../types/plan.types.js';
import type { Plan } from '../types/plan.types.js';
import {
  failedEntry,
  queryComposed,
  queryExecuted,
  structureFetched,
  tablesListed,
} from '../testing/builders.js';
import { DATACENTER_GOAL, DATACENTER_QUERY, DATACENTERS_DDL, USERS_DDL } from '../testing/fakes.js';

const task = createTask(DATACENTER_GOAL);
const TABLES = ['connections', 'datacenters', 'users'];

function pendingTargets(plan: Plan): Array<string | null> {
  return plan.steps.filter(step => step.status === PlanStepStatus.PENDING).map(step => step.target);
}

describe('PlanStore', () => {
  let store: PlanStore;

  beforeEach(() => {
    store = new PlanStore();
  });

  it('should throw before the first revision', () => {
    expect(() => store.current()).toThrow('No plan has been created yet');
  });

  it('should seed a plan from the task alone', () => {
    const plan = store.revise([], task);

    expect(plan.revision).toBe(1);
    expect(pendingToolNames(plan)).toEqual([
      'get_tables',
      'get_table_structure',
      'analyze_structure',
      'execute_query',
      'final_answer',
    ]);
    expect(store.current()).toBe(plan);
  });

  it('should plan one structure fetch per relevant table once tables are listed', () => {
    const plan = store.revise([tablesListed(1, TABLES)], task);

    expect(plan.steps[0]?.status).toBe(PlanStepStatus.DONE);
    expect(pendingToolNames(plan)).toEqual([
      'get_table_structure',
      'get_table_structure',
      'analyze_structure',
      'execute_query',
      'final_answer',
    ]);
    expect(pendingTargets(plan)).toEqual(['datacenters', 'users', null, null, null]);
  });

  it('should record failed steps with their error', () => {
    const plan = store.revise([
      tablesListed(1, TABLES),
      failedEntry(2, 'get_table_structure', { table_name: 'users' }, 'timeout'),
    ], task);

    expect(plan.steps[1]).toEqual({
      toolName: 'get_table_structure',
      rationale: 'step 2 (failed: timeout)',
      status: PlanStepStatus.FAILED,
      target: 'users',
    });
  });

  it('should plan a new composition after a query fails', () => {
    const trace = [
      tablesListed(1, TABLES),
      structureFetched(2, 'datacenters', DATACENTERS_DDL),
      structureFetched(3, 'users', USERS_DDL),
      queryComposed(4, 'SELECT broken'),
      failedEntry(5, 'execute_query', { query: 'SELECT broken' }, 'syntax error'),
    ];
    const plan = store.revise(trace, task);

    expect(pendingToolNames(plan)).toEqual(['analyze_structure', 'execute_query', 'final_answer']);
    expect(plan.steps[5]?.rationale).toBe(
      'Compose a query for the goal from the table structures, avoiding the queries that failed',
    );
  });

  it('should leave only the answer once rows are known', () => {
    const plan = store.revise([
      tablesListed(1, TABLES),
      structureFetched(2, 'datacenters', DATACENTERS_DDL),
      structureFetched(3, 'users', USERS_DDL),
      queryComposed(4, DATACENTER_QUERY),
      queryExecuted(5, DATACENTER_QUERY, [{ dc_id: '4278' }]),
    ], task);

    expect(pendingToolNames(plan)).toEqual(['final_answer']);
  });

  it('should produce the same pending steps for the same trace', () => {
    const trace = [tablesListed(1, TABLES), structureFetched(2, 'users', USERS_DDL)];
    const first = store.revise(trace, task);
    const second = new PlanStore().revise(trace, task);

    expect(pendingToolNames(second)).toEqual(pendingToolNames(first));
    expect(pendingTargets(second)).toEqual(pendingTargets(first));
  });

  it('should keep every revision frozen in the history', () => {
    const seed = store.revise([], task);
    store.revise([tablesListed(1, TABLES)], task);

    expect(store.history().map(plan => plan.revision)).toEqual([1, 2]);
    expect(store.history()[0]).toBe(seed);
    expect(Object.isFrozen(seed)).toBe(true);
    expect(Object.isFrozen(seed.steps)).toBe(true);
  });
});
