/**
 * @fileoverview Unit tests for Decider
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Decider, isActionable } from './decider.js';
import { deriveKnowledge } from './knowledge.js';
import { PlanStore } from './plan-store.js';
import { createTask } from './loop-controller.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { createDatabaseTools } from '../tools/database.js';
import { HeuristicReasoner } from '../providers/heuristic.js';
import type { ReasoningContext, ToolSuggestion } from '../providers/base.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { Severity } from '../types/core.types.js';
import type { TraceEntry } from '../types/plan.types.js';
import { queryComposed, queryExecuted, structureFetched, tablesListed } from '../testing/builders.js';
import {
  DATACENTER_GOAL,
  DATACENTERS_DDL,
  FakeDatabase,
  GradingReporter,
  ScriptedComposer,
  USERS_DDL,
} from '../testing/fakes.js';

const task = createTask(DATACENTER_GOAL);
const TABLES = ['connections', 'datacenters', 'users'];

class FixedReasoner extends HeuristicReasoner {
  constructor(private readonly toolName: string) {
    super();
  }

  override async suggestTool(_context: ReasoningContext): Promise<ToolSuggestion> {
    return { toolName: this.toolName, rationale: 'fixed' };
  }
}

describe('Decider', () => {
  let registry: ToolRegistry;
  let logs: MemoryTransport;
  let logger: Logger;

  beforeEach(() => {
    registry = new ToolRegistry(createDatabaseTools({
      database: new FakeDatabase(),
      composer: new ScriptedComposer(),
      reporter: new GradingReporter(),
    }));
    logs = new MemoryTransport();
    logger = new Logger({ minLevel: Severity.DEBUG, transports: [logs] });
  });

  async function select(toolName: string, trace: ReadonlyArray<TraceEntry>): Promise<ToolSuggestion> {
    const plan = new PlanStore().revise(trace, task);
    return new Decider(registry, new FixedReasoner(toolName), logger).select(plan, trace, task);
  }

  it('should accept an actionable suggestion', async () => {
    const selection = await select('get_tables', []);

    expect(selection).toEqual({ toolName: 'get_tables', rationale: 'fixed' });
  });

  it('should fall back to the plan when the suggested tool is unregistered', async () => {
    const selection = await select('drop_database', []);

    expect(selection).toEqual({ toolName: 'get_tables', rationale: 'List the tables in the database' });
    expect(logs.findByLevel(Severity.WARN)[0]?.message).toBe('Reasoner suggested an unregistered tool');
  });

  it('should not list tables again once they are known', async () => {
    const selection = await select('get_tables', [tablesListed(1, TABLES)]);

    expect(selection).toEqual({
      toolName: 'get_table_structure',
      rationale: "Inspect the structure of 'datacenters'",
    });
  });

  it('should not inspect structures again once every relevant table is known', async () => {
    const trace = [
      tablesListed(1, TABLES),
      structureFetched(2, 'datacenters', DATACENTERS_DDL),
      structureFetched(3, 'users', USERS_DDL),
    ];
    const selection = await select('get_table_structure', trace);

    expect(selection.toolName).toBe('analyze_structure');
  });

  it('should not answer before a query has returned rows', async () => {
    const selection = await select('final_answer', [tablesListed(1, TABLES)]);

    expect(selection.toolName).toBe('get_table_structure');
  });

  it('should choose the terminal tool once rows are known', async () => {
    const trace = [
      tablesListed(1, TABLES),
      structureFetched(2, 'datacenters', DATACENTERS_DDL),
      structureFetched(3, 'users', USERS_DDL),
      queryComposed(4, 'SELECT 1'),
      queryExecuted(5, 'SELECT 1', [{ dc_id: '1' }]),
    ];
    const selection = await select('get_tables', trace);

    expect(selection).toEqual({ toolName: 'final_answer', rationale: 'Submit the values returned by the query' });
  });
});

describe('isActionable', () => {
  it('should require structures and no pending tables before composing', () => {
    const partial = deriveKnowledge([tablesListed(1, TABLES), structureFetched(2, 'users', USERS_DDL)], task);
    const complete = deriveKnowledge([
      tablesListed(1, TABLES),
      structureFetched(2, 'users', USERS_DDL),
      structureFetched(3, 'datacenters', DATACENTERS_DDL),
    ], task);

    expect(isActionable('analyze_structure', null, partial, task)).toBe(false);
    expect(isActionable('analyze_structure', null, complete, task)).toBe(true);
  });

  it('should only fetch the structure of a pending table', () => {
    const knowledge = deriveKnowledge([tablesListed(1, TABLES), structureFetched(2, 'users', USERS_DDL)], task);

    expect(isActionable('get_table_structure', 'users', knowledge, task)).toBe(false);
    expect(isActionable('get_table_structure', 'datacenters', knowledge, task)).toBe(true);
  });
});
