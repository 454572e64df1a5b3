/**
 * @fileoverview Tool Dispatcher - turns an Action into an ExecutionResult.
 *
 * Nothing thrown by a tool crosses this boundary. Input validation failures
 * come back as SchemaViolation results without touching the collaborator;
 * everything that goes wrong afterwards comes back as a CollaboratorError.
 *
 * @module querypilot/tools/tool-dispatcher
 * @version 0.1.0
 */

import { EventEmitter } from 'eventemitter3';
import { v4 as uuidv4 } from 'uuid';
import type { z } from 'zod';
import { SchemaViolationError, UnknownToolError, describeError } from '../errors.js';
import { ErrorKind, createTimestamp, createUniqueId } from '../types/core.types.js';
import type { UniqueId } from '../types/core.types.js';
import { ExecutionStatus, REPLY_OK } from '../types/tools.types.js';
import type { Action, ExecutionResult, ToolImplementation } from '../types/tools.types.js';
import { createLogger } from '../observability/logger.js';
import type { Logger } from '../observability/logger.js';
import type { ToolRegistry } from './tool-registry.js';

export interface ToolDispatcherEvents {
  'tool:invoked': (action: Action) => void;
  'tool:completed': (action: Action, result: ExecutionResult) => void;
  'tool:failed': (action: Action, result: ExecutionResult) => void;
}

export interface ToolDispatcherConfig {
  /** Upper bound for a single collaborator call */
  readonly timeoutMs: number;
  readonly logger: Logger;
}

export interface InvokeOptions {
  readonly logger?: Logger;
}

const DEFAULT_TIMEOUT_MS = 30_000;

export class ToolDispatcher extends EventEmitter<ToolDispatcherEvents> {
  private readonly config: ToolDispatcherConfig;

  constructor(
    private readonly registry: ToolRegistry,
    config: Partial<ToolDispatcherConfig> = {},
  ) {
    super();
    this.config = {
      timeoutMs: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      logger: config.logger ?? createLogger('tools.dispatcher'),
    };
  }

  /**
   * Dispatches one action. Always resolves.
   *
   * The call is only ever aborted by the tool timeout; once sent, it runs to
   * completion whatever happens to the run that issued it.
   */
  async invoke(action: Action, options: InvokeOptions = {}): Promise<ExecutionResult> {
    const logger = options.logger ?? this.config.logger;
    const startTime = Date.now();

    let tool: ToolImplementation;
    try {
      tool = this.registry.resolve(action.toolName);
    } catch (error) {
      if (!(error instanceof UnknownToolError)) throw error;
      return this.fail(action, ErrorKind.UNKNOWN_TOOL, error.message, startTime, logger);
    }

    const parsed = tool.descriptor.inputSchema.safeParse(action.arguments);
    if (!parsed.success) {
      const violation = new SchemaViolationError(action.toolName, formatIssues(parsed.error));
      return this.fail(action, ErrorKind.SCHEMA_VIOLATION, violation.message, startTime, logger);
    }

    this.emit('tool:invoked', action);
    logger.debug('Invoking tool', { tool: action.toolName, actionId: action.id });

    let reply: unknown;
    try {
      reply = await this.executeWithTimeout(tool, parsed.data, createUniqueId(uuidv4()), logger);
    } catch (error) {
      return this.fail(action, ErrorKind.COLLABORATOR, describeError(error), startTime, logger);
    }

    const envelopeError = readEnvelopeError(reply);
    if (envelopeError !== null) {
      return this.fail(action, ErrorKind.COLLABORATOR, envelopeError, startTime, logger);
    }

    const output = tool.descriptor.outputSchema.safeParse(reply);
    if (!output.success) {
      const detail = `unexpected reply: ${formatIssues(output.error).join('; ')}`;
      return this.fail(action, ErrorKind.COLLABORATOR, detail, startTime, logger);
    }

    const result = buildResult(action, ExecutionStatus.OK, output.data, null, null, startTime);
    logger.info('Tool completed', { tool: action.toolName, durationMs: result.durationMs });
    this.emit('tool:completed', action, result);
    return result;
  }

  private fail(
    action: Action,
    kind: ErrorKind,
    detail: string,
    startTime: number,
    logger: Logger,
  ): ExecutionResult {
    const result = buildResult(action, ExecutionStatus.ERROR, null, kind, detail, startTime);
    logger.warn('Tool failed', { tool: action.toolName, kind, detail });
    this.emit('tool:failed', action, result);
    return result;
  }

  private executeWithTimeout(
    tool: ToolImplementation,
    input: unknown,
    executionId: UniqueId,
    logger: Logger,
  ): Promise<unknown> {
    const controller = new AbortController();

    return new Promise<unknown>((resolve, reject) => {
      const timer = setTimeout(() => {
        controller.abort();
        reject(new Error(`Tool '${tool.descriptor.name}' timed out after ${this.config.timeoutMs}ms`));
      }, this.config.timeoutMs);

      void tool.execute(input, {
        executionId,
        signal: controller.signal,
        logger: logger.child({ module: `tools.${tool.descriptor.name}` }),
      })
        .then(resolve, reject)
        .finally(() => clearTimeout(timer));
    });
  }
}

function buildResult(
  action: Action,
  status: ExecutionStatus,
  payload: unknown,
  errorKind: ErrorKind | null,
  errorDetail: string | null,
  startTime: number,
): ExecutionResult {
  return Object.freeze({
    id: createUniqueId(uuidv4()),
    actionId: action.id,
    toolName: action.toolName,
    status,
    payload,
    errorKind,
    errorDetail,
    durationMs: Date.now() - startTime,
    completedAt: createTimestamp(),
  });
}

/**
 * Returns the failure text of a `{ reply, error }` envelope, or null when the
 * value is not an envelope or reports "OK".
 */
export function readEnvelopeError(value: unknown): string | null {
  if (typeof value !== 'object' || value === null || !('error' in value)) {
    return null;
  }
  const { error } = value;
  if (error === REPLY_OK) return null;
  return typeof error === 'string' ? error : JSON.stringify(error);
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
}
