/**
 * @fileoverview Error classes raised inside the loop.
 *
 * Every class carries a string `code`; the logger records it and the
 * LoopController copies it into a failed LoopResult.
 *
 * @module querypilot/errors
 * @version 0.1.0
 */

export abstract class QueryPilotError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * A tool name that the registry does not hold.
 */
export class UnknownToolError extends QueryPilotError {
  readonly code = 'UNKNOWN_TOOL';

  constructor(readonly toolName: string) {
    super(`Unknown tool: '${toolName}'`);
  }
}

/**
 * Arguments rejected by a tool's input schema.
 */
export class SchemaViolationError extends QueryPilotError {
  readonly code = 'SCHEMA_VIOLATION';

  constructor(readonly toolName: string, readonly issues: ReadonlyArray<string>) {
    super(`schema violation: ${issues.join('; ')}`);
  }
}

/**
 * The trace does not yet hold the data needed to build a tool's arguments.
 */
export class ArgumentConstructionError extends QueryPilotError {
  readonly code = 'ARGUMENT_CONSTRUCTION';

  constructor(readonly toolName: string, readonly missing: string) {
    super(`Cannot build arguments for '${toolName}': ${missing}`);
  }
}

/**
 * A collaborator behind a tool failed or rejected the request.
 */
export class CollaboratorError extends QueryPilotError {
  readonly code = 'COLLABORATOR_ERROR';
}

export class ConfigurationError extends QueryPilotError {
  readonly code = 'CONFIGURATION_ERROR';
}

/**
 * Reads a message from anything a promise may reject with.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
}
