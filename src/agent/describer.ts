/**
 * @fileoverview Describer - builds the arguments for the chosen tool.
 *
 * Arguments are synthesized from the trace: table names from the listing,
 * structures from earlier inspections, the query from the last composition,
 * the answer from the last successful query. When the trace does not hold
 * what a tool needs yet, an ArgumentConstructionError tells the controller to
 * replan instead of dispatching.
 *
 * @module querypilot/agent/describer
 * @version 0.1.0
 */

import { ArgumentConstructionError } from '../errors.js';
import type { Task } from '../types/core.types.js';
import type { Plan, TraceEntry } from '../types/plan.types.js';
import type { ReasoningContext, Reasoner } from '../providers/base.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { ToolName } from '../tools/database.js';
import { createLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import { deriveKnowledge } from './knowledge.js';
import type { RejectedQuery, TaskKnowledge } from './knowledge.js';

export type ToolArguments = Readonly<Record<string, unknown>>;

export interface ArgumentBuilder {
  buildArguments(
    toolName: string,
    plan: Plan,
    trace: ReadonlyArray<TraceEntry>,
    task: Task,
    logger?: Logger,
  ): Promise<ToolArguments>;
}

export class Describer implements ArgumentBuilder {
  private readonly logger: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly reasoner: Reasoner,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('agent.describer');
  }

  /**
   * @throws ArgumentConstructionError when the trace lacks required data
   */
  async buildArguments(
    toolName: string,
    plan: Plan,
    trace: ReadonlyArray<TraceEntry>,
    task: Task,
    logger: Logger = this.logger,
  ): Promise<ToolArguments> {
    const knowledge = deriveKnowledge(trace, task);
    const context: ReasoningContext = { task, plan, trace, tools: this.registry.list() };

    switch (toolName) {
      case ToolName.GET_TABLES:
        return {};

      case ToolName.GET_TABLE_STRUCTURE:
        return { table_name: await this.chooseTable(context, knowledge, logger) };

      case ToolName.ANALYZE_STRUCTURE:
        if (knowledge.structures.size === 0) {
          throw new ArgumentConstructionError(toolName, 'no table structure has been fetched');
        }
        return {
          table_structures: Object.fromEntries(knowledge.structures),
          task_description: describeTask(task.goal, knowledge.rejectedQueries),
        };

      case ToolName.EXECUTE_QUERY:
        if (knowledge.usableQuery === null) {
          throw new ArgumentConstructionError(toolName, 'no query has been composed');
        }
        return { query: knowledge.usableQuery };

      case ToolName.FINAL_ANSWER: {
        if (knowledge.queryRows === null) {
          throw new ArgumentConstructionError(toolName, 'no query has returned rows yet');
        }
        const answer = await this.reasoner.extractAnswer(context, knowledge.queryRows);
        return { answer: answer.map(value => String(value)) };
      }

      default:
        throw new ArgumentConstructionError(toolName, 'no argument recipe for this tool');
    }
  }

  private async chooseTable(context: ReasoningContext, knowledge: TaskKnowledge, logger: Logger): Promise<string> {
    const [first, ...rest] = knowledge.pendingTables;
    if (knowledge.tables === null) {
      throw new ArgumentConstructionError(ToolName.GET_TABLE_STRUCTURE, 'the table list is not known yet');
    }
    if (first === undefined) {
      throw new ArgumentConstructionError(ToolName.GET_TABLE_STRUCTURE, 'every relevant table is already inspected');
    }
    if (rest.length === 0) return first;

    const picked = await this.reasoner.pickTable(context, knowledge.pendingTables);
    if (!knowledge.pendingTables.includes(picked)) {
      logger.warn('Reasoner picked a table that is not pending', { picked, chosen: first });
      return first;
    }
    return picked;
  }
}

/**
 * The goal, plus what went wrong with earlier queries so the composer does
 * not repeat them.
 */
export function describeTask(goal: string, rejected: ReadonlyArray<RejectedQuery>): string {
  if (rejected.length === 0) return goal;

  const lines = rejected.map(r => `- ${r.query} -> ${r.detail}`);
  return `${goal}\n\nThese queries failed earlier; write a different one:\n${lines.join('\n')}`;
}
