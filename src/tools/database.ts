/**
 * @fileoverview Database discovery tools.
 *
 * Five tools: list tables, show a table's structure, compose a query from
 * the structures, run a query, and submit the final answer. The first,
 * second and fourth reply with a `{ reply, error }` envelope where an `error`
 * of "OK" means success.
 *
 * @module querypilot/tools/database
 * @version 0.1.0
 */

import { z } from 'zod';
import { CollaboratorError } from '../errors.js';
import { ErrorKind } from '../types/core.types.js';
import type { ToolImplementation } from '../types/tools.types.js';
import type { AnswerReporter, DatabaseClient, QueryComposer } from '../providers/base.js';

export const ToolName = {
  GET_TABLES: 'get_tables',
  GET_TABLE_STRUCTURE: 'get_table_structure',
  ANALYZE_STRUCTURE: 'analyze_structure',
  EXECUTE_QUERY: 'execute_query',
  FINAL_ANSWER: 'final_answer',
} as const;

export type ToolName = (typeof ToolName)[keyof typeof ToolName];

// ============ Input/Output Schemas ============

export const GetTablesInputSchema = z.object({});

export const GetTablesOutputSchema = z.object({
  reply: z.array(z.object({ table_name: z.string() })),
  error: z.string(),
});

export const GetTableStructureInputSchema = z.object({
  table_name: z.string()
    .min(1)
    .refine(name => !name.includes('`'), 'must not contain a backtick')
    .describe('Name of the table to describe, as listed by get_tables'),
});

export const GetTableStructureOutputSchema = z.object({
  reply: z.array(z.object({ Table: z.string(), 'Create Table': z.string() })).min(1),
  error: z.string(),
});

export const AnalyzeStructureInputSchema = z.object({
  table_structures: z.record(z.string())
    .refine(structures => Object.keys(structures).length > 0, 'at least one table structure is required')
    .describe('Table name to CREATE TABLE statement'),
  task_description: z.string().min(1).describe('What the query has to return'),
});

export const AnalyzeStructureOutputSchema = z.string().min(1);

export const QueryRowSchema = z.record(z.union([z.string(), z.number(), z.null()]));

export const ExecuteQueryInputSchema = z.object({
  query: z.string().trim().min(1).describe('SQL to execute'),
});

export const ExecuteQueryOutputSchema = z.object({
  reply: z.array(QueryRowSchema),
  error: z.string(),
});

export const FinalAnswerInputSchema = z.object({
  answer: z.array(z.string()).describe('Values submitted as the answer'),
});

export const FinalAnswerOutputSchema = z.object({
  code: z.number(),
  message: z.string(),
}).nullable();

export type GetTablesOutput = z.infer<typeof GetTablesOutputSchema>;
export type GetTableStructureOutput = z.infer<typeof GetTableStructureOutputSchema>;
export type ExecuteQueryOutput = z.infer<typeof ExecuteQueryOutputSchema>;

// ============ Helper Functions ============

/**
 * Pulls the SQL out of model output that may be wrapped in a code fence.
 */
export function extractSql(text: string): string {
  const fenced = /```(?:sql)?\s*([\s\S]*?)```/i.exec(text);
  return (fenced?.[1] ?? text).trim();
}

/**
 * Backtick-quotes a table name so listed names such as `user-accounts` reach
 * the database intact. The input schema rules out backticks in the name.
 */
export function quoteIdentifier(name: string): string {
  return `\`${name}\``;
}

/**
 * Normalizes a `show tables` reply to `{ table_name }` rows. Databases name
 * the column after the schema (`Tables_in_<db>`), so the first string value
 * is taken when `table_name` is absent.
 */
function normalizeTableRows(reply: unknown): unknown {
  if (!Array.isArray(reply)) return reply;

  return reply.map((row: unknown) => {
    if (typeof row !== 'object' || row === null) return row;
    if ('table_name' in row && typeof row.table_name === 'string') {
      return { table_name: row.table_name };
    }
    const first = Object.values(row).find((value): value is string => typeof value === 'string');
    return first === undefined ? row : { table_name: first };
  });
}

// ============ Tool Definitions ============

export interface DatabaseToolDependencies {
  readonly database: DatabaseClient;
  readonly composer: QueryComposer;
  readonly reporter: AnswerReporter;
}

const COLLABORATOR_FAILURES = [ErrorKind.SCHEMA_VIOLATION, ErrorKind.COLLABORATOR] as const;

export function createDatabaseTools(deps: DatabaseToolDependencies): ToolImplementation[] {
  return [
    {
      descriptor: {
        name: ToolName.GET_TABLES,
        description: 'Lists all tables in the database',
        inputSchema: GetTablesInputSchema,
        outputSchema: GetTablesOutputSchema,
        errorModes: COLLABORATOR_FAILURES,
        hasSideEffects: false,
        idempotent: true,
      },
      async execute(_input, context) {
        const envelope = await deps.database.query('show tables', context.signal);
        return { ...envelope, reply: normalizeTableRows(envelope.reply) };
      },
    },
    {
      descriptor: {
        name: ToolName.GET_TABLE_STRUCTURE,
        description: 'Shows the CREATE TABLE statement of one table',
        inputSchema: GetTableStructureInputSchema,
        outputSchema: GetTableStructureOutputSchema,
        errorModes: COLLABORATOR_FAILURES,
        hasSideEffects: false,
        idempotent: true,
      },
      async execute(input, context) {
        const { table_name } = GetTableStructureInputSchema.parse(input);
        return deps.database.query(`show create table ${quoteIdentifier(table_name)}`, context.signal);
      },
    },
    {
      descriptor: {
        name: ToolName.ANALYZE_STRUCTURE,
        description: 'Writes an SQL query for the task from the collected table structures',
        inputSchema: AnalyzeStructureInputSchema,
        outputSchema: AnalyzeStructureOutputSchema,
        errorModes: COLLABORATOR_FAILURES,
        hasSideEffects: false,
        idempotent: false,
      },
      async execute(input, context) {
        const request = AnalyzeStructureInputSchema.parse(input);
        const text = await deps.composer.composeQuery(
          { tableStructures: request.table_structures, taskDescription: request.task_description },
          context.signal,
        );
        const sql = extractSql(text);
        if (sql === '') {
          throw new CollaboratorError('Query composer returned no query');
        }
        context.logger.debug('Composed query', { sql });
        return sql;
      },
    },
    {
      descriptor: {
        name: ToolName.EXECUTE_QUERY,
        description: 'Executes an SQL query and returns its rows',
        inputSchema: ExecuteQueryInputSchema,
        outputSchema: ExecuteQueryOutputSchema,
        errorModes: COLLABORATOR_FAILURES,
        hasSideEffects: true,
        idempotent: false,
      },
      async execute(input, context) {
        const { query } = ExecuteQueryInputSchema.parse(input);
        return deps.database.query(query, context.signal);
      },
    },
    {
      descriptor: {
        name: ToolName.FINAL_ANSWER,
        description: 'Submits the final answer; ends the task',
        inputSchema: FinalAnswerInputSchema,
        outputSchema: FinalAnswerOutputSchema,
        errorModes: COLLABORATOR_FAILURES,
        hasSideEffects: true,
        idempotent: false,
      },
      async execute(input, context) {
        const { answer } = FinalAnswerInputSchema.parse(input);
        const receipt = await deps.reporter.submit(answer, context.signal);
        if (receipt.code !== 0) {
          throw new CollaboratorError(`Answer rejected: ${receipt.message}`);
        }
        context.logger.info('Answer accepted', { message: receipt.message });
        return receipt;
      },
    },
  ];
}
