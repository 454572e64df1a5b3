/**
 * @fileoverview Loop Controller - drives one task from seed plan to outcome.
 *
 * Each cycle decides, describes, executes and replans, appending exactly one
 * trace entry. A run ends when the task's terminal tool succeeds, when its
 * iteration or time budget runs out, when its signal is aborted, when no
 * table structure can be fetched, or on a fatal controller error. Budgets and
 * cancellation are only checked between cycles; the signal never reaches the
 * dispatcher, so a tool call that was sent runs to completion and is recorded.
 *
 * When a reflector is given, each result gets a short note before it is
 * appended. Notes are for prompts and transcripts only.
 *
 * All per-run state (plan store, trace, lifecycle) is created inside `run`,
 * so one controller can serve concurrent tasks that share only the registry.
 *
 * @module querypilot/agent/loop-controller
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import { ArgumentConstructionError, UnknownToolError, describeError } from '../errors.js';
import { ErrorKind, TERMINAL_TOOL, createUniqueId } from '../types/core.types.js';
import type { Task, UniqueId } from '../types/core.types.js';
import type { Plan, TraceEntry } from '../types/plan.types.js';
import { ExecutionStatus } from '../types/tools.types.js';
import type { Action, ExecutionResult, ToolDescriptor } from '../types/tools.types.js';
import type { ToolRegistry } from '../tools/tool-registry.js';
import type { ToolDispatcher } from '../tools/tool-dispatcher.js';
import { createLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import type { Reflector } from '../providers/base.js';
import type { Selection, ToolSelector } from './decider.js';
import type { ArgumentBuilder, ToolArguments } from './describer.js';
import { deriveKnowledge, discoveryDeadEnd } from './knowledge.js';
import { LoopLifecycle, LoopState } from './lifecycle.js';
import { PlanStore, pendingToolNames } from './plan-store.js';
import { Trace } from './trace.js';

export enum LoopOutcome {
  SUCCEEDED = 'SUCCEEDED',
  EXHAUSTED = 'EXHAUSTED',
  CANCELLED = 'CANCELLED',
  FAILED = 'FAILED',
}

export interface LoopConfig {
  /** Cycles a run may start, including ones that only replanned */
  readonly maxIterations: number;

  /** Wall-clock budget for a run */
  readonly timeoutMs: number;
}

export const DEFAULT_LOOP_CONFIG: LoopConfig = {
  maxIterations: 10,
  timeoutMs: 300_000,
};

export interface LoopError {
  readonly code: string;
  readonly message: string;
}

export interface LoopResult {
  readonly taskId: UniqueId;
  readonly outcome: LoopOutcome;

  /** Submitted answer when the run succeeded */
  readonly answer: ReadonlyArray<string> | null;

  readonly reason: string;
  readonly error: LoopError | null;
  readonly trace: ReadonlyArray<TraceEntry>;
  readonly planHistory: ReadonlyArray<Plan>;
  readonly cycles: number;
  readonly durationMs: number;
}

export interface LoopControllerEvents {
  'cycle:start': (taskId: UniqueId, cycle: number) => void;
  'plan:revised': (taskId: UniqueId, plan: Plan) => void;
  'trace:appended': (taskId: UniqueId, entry: TraceEntry) => void;
  'loop:terminated': (result: LoopResult) => void;
}

export interface LoopDependencies {
  readonly registry: ToolRegistry;
  readonly dispatcher: ToolDispatcher;
  readonly selector: ToolSelector;
  readonly argumentBuilder: ArgumentBuilder;

  /** Writes the note stored with each trace entry */
  readonly reflector?: Reflector;
  readonly logger?: Logger;
}

export interface RunOptions {
  readonly signal?: AbortSignal;
  readonly maxIterations?: number;
  readonly timeoutMs?: number;
}

/**
 * Consecutive schema violations that end a run.
 */
const MAX_SCHEMA_VIOLATIONS = 2;

/**
 * Per-run bookkeeping shared by the cycle helpers.
 */
interface RunState {
  readonly task: Task;
  readonly logger: Logger;
  readonly lifecycle: LoopLifecycle;
  readonly planStore: PlanStore;
  readonly trace: Trace;
  readonly startTime: number;
  cycles: number;
}

/**
 * @example
 * ```typescript
 * const controller = new LoopController({ registry, dispatcher, selector: decider, argumentBuilder: describer });
 * const result = await controller.run(createTask('list dc_id of active datacenters'));
 * if (result.outcome === LoopOutcome.SUCCEEDED) console.log(result.answer);
 * ```
 */
export class LoopController extends EventEmitter<LoopControllerEvents> {
  private readonly config: LoopConfig;
  private readonly logger: Logger;

  constructor(
    private readonly deps: LoopDependencies,
    config: Partial<LoopConfig> = {},
  ) {
    super();
    this.config = { ...DEFAULT_LOOP_CONFIG, ...config };
    this.logger = deps.logger ?? createLogger('agent.loop');
  }

  /**
   * Runs a task to its outcome. Never rejects; failures are reported in the
   * result together with the trace gathered so far.
   */
  async run(task: Task, options: RunOptions = {}): Promise<LoopResult> {
    const maxIterations = options.maxIterations ?? this.config.maxIterations;
    const deadline = Date.now() + (options.timeoutMs ?? this.config.timeoutMs);
    const logger = this.logger.child({ correlationId: task.id });

    const run: RunState = {
      task,
      logger,
      lifecycle: new LoopLifecycle(),
      planStore: new PlanStore(),
      trace: new Trace(),
      startTime: Date.now(),
      cycles: 0,
    };
    run.lifecycle.on('transition', (from, to, reason) => {
      logger.debug('State transition', { from, to, reason });
    });

    logger.info('Task started', { goal: task.goal, maxIterations });

    try {
      let plan = this.replan(run);
      let schemaViolations = 0;

      for (;;) {
        if (options.signal?.aborted === true) {
          return this.finish(run, LoopOutcome.CANCELLED, `Cancelled after ${run.cycles} cycles`);
        }
        const deadEnd = discoveryDeadEnd(deriveKnowledge(run.trace.toArray(), task));
        if (deadEnd !== null) {
          return this.finish(run, LoopOutcome.FAILED, 'Schema discovery cannot continue', {
            code: 'TABLES_UNAVAILABLE',
            message: deadEnd,
          });
        }
        if (run.cycles >= maxIterations) {
          return this.finish(run, LoopOutcome.EXHAUSTED, `Iteration budget of ${maxIterations} exhausted`, {
            code: ErrorKind.EXHAUSTED,
            message: `No accepted answer within ${maxIterations} cycles`,
          });
        }
        if (Date.now() >= deadline) {
          return this.finish(run, LoopOutcome.EXHAUSTED, 'Time budget exhausted', {
            code: ErrorKind.EXHAUSTED,
            message: `No accepted answer before the deadline`,
          });
        }

        run.cycles++;
        this.emit('cycle:start', task.id, run.cycles);
        run.lifecycle.transition(LoopState.DECIDING, `Cycle ${run.cycles}`);

        let selection: Selection;
        let descriptor: ToolDescriptor;
        try {
          selection = await this.deps.selector.select(plan, run.trace.toArray(), task, logger);
          descriptor = this.deps.registry.describe(selection.toolName);
        } catch (error) {
          if (error instanceof UnknownToolError) {
            return this.finish(run, LoopOutcome.FAILED, 'Decider chose an unregistered tool', {
              code: error.code,
              message: error.message,
            });
          }
          return this.failReasoning(run, 'Decider failed', error);
        }

        run.lifecycle.transition(LoopState.DESCRIBING, selection.rationale);

        let args: ToolArguments;
        try {
          args = await this.deps.argumentBuilder.buildArguments(
            descriptor.name,
            plan,
            run.trace.toArray(),
            task,
            logger,
          );
        } catch (error) {
          if (!(error instanceof ArgumentConstructionError)) {
            return this.failReasoning(run, 'Describer failed', error);
          }
          logger.warn('Arguments not constructible yet; replanning', {
            tool: error.toolName,
            missing: error.missing,
          });
          run.lifecycle.transition(LoopState.REPLANNING, error.message);
          plan = this.replan(run);
          continue;
        }

        const action: Action = Object.freeze({
          id: createUniqueId(uuidv4()),
          toolName: descriptor.name,
          arguments: args,
          rationale: selection.rationale,
        });

        run.lifecycle.transition(LoopState.EXECUTING, `Dispatching ${action.toolName}`);
        const result = await this.deps.dispatcher.invoke(action, { logger });
        const reflection = await this.reflect(run, plan, action, result);
        const entry = run.trace.append({ cycle: run.cycles, planSnapshot: plan, action, result, reflection });
        this.emit('trace:appended', task.id, entry);

        if (action.toolName === task.terminalTool && result.status === ExecutionStatus.OK) {
          return this.finish(run, LoopOutcome.SUCCEEDED, 'Final answer accepted', null, readAnswer(action.arguments));
        }

        if (result.errorKind === ErrorKind.SCHEMA_VIOLATION) {
          schemaViolations++;
          if (schemaViolations >= MAX_SCHEMA_VIOLATIONS) {
            return this.finish(run, LoopOutcome.FAILED, 'Repeated schema violation', {
              code: 'SCHEMA_VIOLATION',
              message: result.errorDetail ?? 'schema violation',
            });
          }
        } else {
          schemaViolations = 0;
        }

        const reason = result.status === ExecutionStatus.OK
          ? `${action.toolName} succeeded`
          : `${action.toolName} failed: ${result.errorDetail ?? 'unknown error'}`;
        run.lifecycle.transition(LoopState.REPLANNING, reason);
        plan = this.replan(run);
      }
    } catch (error) {
      logger.error('Loop aborted by an internal error', {}, error instanceof Error ? error : undefined);
      return this.finish(run, LoopOutcome.FAILED, 'Internal error', {
        code: 'INTERNAL_ERROR',
        message: describeError(error),
      });
    }
  }

  private replan(run: RunState): Plan {
    const plan = run.planStore.revise(run.trace.toArray(), run.task);
    run.logger.debug('Plan revised', { revision: plan.revision, pending: pendingToolNames(plan) });
    this.emit('plan:revised', run.task.id, plan);
    return plan;
  }

  private async reflect(run: RunState, plan: Plan, action: Action, result: ExecutionResult): Promise<string | null> {
    const reflector = this.deps.reflector;
    if (reflector === undefined) return null;

    try {
      return await reflector.reflect(
        { task: run.task, plan, trace: run.trace.toArray(), tools: this.deps.registry.list() },
        { action, result },
      );
    } catch (error) {
      run.logger.warn('Reflection failed; recording the step without a note', {
        tool: action.toolName,
        error: describeError(error),
      });
      return null;
    }
  }

  private failReasoning(run: RunState, reason: string, error: unknown): LoopResult {
    return this.finish(run, LoopOutcome.FAILED, reason, {
      code: 'REASONING_FAILED',
      message: describeError(error),
    });
  }

  private finish(
    run: RunState,
    outcome: LoopOutcome,
    reason: string,
    error: LoopError | null = null,
    answer: ReadonlyArray<string> | null = null,
  ): LoopResult {
    run.lifecycle.terminate(reason);

    const result: LoopResult = Object.freeze({
      taskId: run.task.id,
      outcome,
      answer,
      reason,
      error,
      trace: run.trace.toArray(),
      planHistory: run.planStore.history(),
      cycles: run.cycles,
      durationMs: Date.now() - run.startTime,
    });

    const data = { outcome, reason, cycles: run.cycles, traceLength: result.trace.length };
    if (outcome === LoopOutcome.SUCCEEDED) {
      run.logger.info('Task finished', data);
    } else {
      run.logger.warn('Task finished', { ...data, error });
    }

    this.emit('loop:terminated', result);
    return result;
  }
}

export function createTask(goal: string, terminalTool: string = TERMINAL_TOOL): Task {
  return Object.freeze({ id: createUniqueId(uuidv4()), goal, terminalTool });
}

function readAnswer(args: ToolArguments): ReadonlyArray<string> | null {
  const answer = args['answer'];
  return Array.isArray(answer) ? answer.map(value => String(value)) : null;
}
