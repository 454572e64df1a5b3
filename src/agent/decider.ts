/**
 * @fileoverview Decider - picks the next tool to call.
 *
 * The reasoning component proposes a tool; the Decider accepts the proposal
 * only when the tool is registered and its preconditions hold against the
 * trace. Otherwise it falls back to the first actionable pending step. A tool
 * whose work is already in the trace (a table that was already inspected, a
 * query that already ran) is never actionable, so known schema is not fetched
 * again.
 *
 * @module querypilot/agent/decider
 * @version 0.1.0
 */

import type { Task } from '../types/core.types.js';
import { PlanStepStatus } from '../types/plan.types.js';
import type { Plan, PlanStep, TraceEntry } from '../types/plan.types.js';
import type { Reasoner, ToolSuggestion } from '../providers/base.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import { ToolName } from '../tools/database.js';
import { createLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import { deriveKnowledge } from './knowledge.js';
import type { TaskKnowledge } from './knowledge.js';

export type Selection = ToolSuggestion;

/**
 * Anything that can choose the next tool. The LoopController depends on this
 * rather than on the Decider class.
 */
export interface ToolSelector {
  select(plan: Plan, trace: ReadonlyArray<TraceEntry>, task: Task, logger?: Logger): Promise<Selection>;
}

export class Decider implements ToolSelector {
  private readonly logger: Logger;

  constructor(
    private readonly registry: ToolRegistry,
    private readonly reasoner: Reasoner,
    logger?: Logger,
  ) {
    this.logger = logger ?? createLogger('agent.decider');
  }

  async select(
    plan: Plan,
    trace: ReadonlyArray<TraceEntry>,
    task: Task,
    logger: Logger = this.logger,
  ): Promise<Selection> {
    const knowledge = deriveKnowledge(trace, task);
    const fallback = this.policyChoice(plan, knowledge, task);

    const suggestion = await this.reasoner.suggestTool({
      task,
      plan,
      trace,
      tools: this.registry.list(),
    });

    if (!this.registry.has(suggestion.toolName)) {
      logger.warn('Reasoner suggested an unregistered tool', {
        suggested: suggestion.toolName,
        chosen: fallback.toolName,
      });
      return fallback;
    }

    if (!isActionable(suggestion.toolName, null, knowledge, task)) {
      logger.warn('Reasoner suggestion is redundant or premature', {
        suggested: suggestion.toolName,
        chosen: fallback.toolName,
      });
      return fallback;
    }

    return suggestion;
  }

  /**
   * First pending step whose preconditions hold; the first pending step when
   * none do, so the Describer can surface what is missing.
   */
  private policyChoice(plan: Plan, knowledge: TaskKnowledge, task: Task): Selection {
    const pending = plan.steps.filter(step => step.status === PlanStepStatus.PENDING);
    const step: PlanStep | undefined =
      pending.find(s => isActionable(s.toolName, s.target, knowledge, task)) ?? pending[0];

    if (step === undefined) {
      return { toolName: task.terminalTool, rationale: 'Nothing else is pending; submit the answer' };
    }
    return { toolName: step.toolName, rationale: step.rationale };
  }
}

/**
 * Whether calling `toolName` now would do new, possible work.
 */
export function isActionable(
  toolName: string,
  target: string | null,
  knowledge: TaskKnowledge,
  task: Task,
): boolean {
  if (toolName === task.terminalTool) {
    return knowledge.queryRows !== null && !knowledge.answered;
  }

  switch (toolName) {
    case ToolName.GET_TABLES:
      return knowledge.tables === null;

    case ToolName.GET_TABLE_STRUCTURE:
      return target === null
        ? knowledge.pendingTables.length > 0
        : knowledge.pendingTables.includes(target);

    case ToolName.ANALYZE_STRUCTURE:
      return knowledge.structures.size > 0
        && knowledge.pendingTables.length === 0
        && knowledge.usableQuery === null;

    case ToolName.EXECUTE_QUERY:
      return knowledge.usableQuery !== null && knowledge.queryRows === null;

    default:
      return true;
  }
}
