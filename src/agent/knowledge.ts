/**
 * @fileoverview Facts derived from a trace.
 *
 * PlanStore, Decider and Describer all condition on the same view of what
 * has been learned so far. Deriving it from the trace alone keeps plan
 * revision a pure function of the trace and the task.
 *
 * @module querypilot/agent/knowledge
 * @version 0.1.0
 */

import { ErrorKind } from '../types/core.types.js';
import type { Task } from '../types/core.types.js';
import type { TraceEntry } from '../types/plan.types.js';
import { ExecutionStatus } from '../types/tools.types.js';
import type { QueryRow } from '../providers/base.js';
import {
  ExecuteQueryOutputSchema,
  GetTableStructureOutputSchema,
  GetTablesOutputSchema,
  ToolName,
} from '../tools/database.js';

/**
 * Failed structure fetches after which a table is treated as unavailable.
 */
export const MAX_STRUCTURE_ATTEMPTS = 2;

export interface RejectedQuery {
  readonly query: string;
  readonly detail: string;
}

export interface TaskKnowledge {
  /** Every table in the database, or null until listed */
  readonly tables: ReadonlyArray<string> | null;

  /** Tables the goal refers to */
  readonly relevantTables: ReadonlyArray<string>;

  /** Table name to CREATE TABLE statement */
  readonly structures: ReadonlyMap<string, string>;

  readonly unavailableTables: ReadonlySet<string>;

  /** Relevant tables neither inspected nor unavailable, in listing order */
  readonly pendingTables: ReadonlyArray<string>;

  /** Latest composed or executed query that has not failed */
  readonly usableQuery: string | null;

  /** Rows of the usable query once it ran successfully */
  readonly queryRows: ReadonlyArray<QueryRow> | null;

  readonly rejectedQueries: ReadonlyArray<RejectedQuery>;
  readonly answered: boolean;
}

export function deriveKnowledge(trace: ReadonlyArray<TraceEntry>, task: Task): TaskKnowledge {
  let tables: string[] | null = null;
  const structures = new Map<string, string>();
  const structureFailures = new Map<string, number>();
  let usableQuery: string | null = null;
  let queryRows: ReadonlyArray<QueryRow> | null = null;
  const rejectedQueries: RejectedQuery[] = [];
  let answered = false;

  for (const { action, result } of trace) {
    const ok = result.status === ExecutionStatus.OK;

    switch (action.toolName) {
      case ToolName.GET_TABLES: {
        const parsed = GetTablesOutputSchema.safeParse(result.payload);
        if (ok && parsed.success) {
          tables = parsed.data.reply.map(row => row.table_name);
        }
        break;
      }

      case ToolName.GET_TABLE_STRUCTURE: {
        const table = readString(action.arguments, 'table_name');
        if (table === null) break;
        const parsed = GetTableStructureOutputSchema.safeParse(result.payload);
        const statement = parsed.success ? parsed.data.reply[0]?.['Create Table'] : undefined;
        if (ok && statement !== undefined) {
          structures.set(table, statement);
        } else if (!ok && result.errorKind === ErrorKind.COLLABORATOR) {
          structureFailures.set(table, (structureFailures.get(table) ?? 0) + 1);
        }
        break;
      }

      case ToolName.ANALYZE_STRUCTURE:
        if (ok && typeof result.payload === 'string') {
          usableQuery = result.payload;
          queryRows = null;
        }
        break;

      case ToolName.EXECUTE_QUERY: {
        const query = readString(action.arguments, 'query');
        if (query === null) break;
        const parsed = ExecuteQueryOutputSchema.safeParse(result.payload);
        if (ok && parsed.success) {
          usableQuery = query;
          queryRows = parsed.data.reply;
        } else if (!ok && result.errorKind === ErrorKind.COLLABORATOR) {
          rejectedQueries.push({ query, detail: result.errorDetail ?? 'failed' });
          if (query === usableQuery) {
            usableQuery = null;
            queryRows = null;
          }
        }
        break;
      }

      default:
        break;
    }

    if (action.toolName === task.terminalTool) {
      if (ok) {
        answered = true;
      } else if (result.errorKind === ErrorKind.COLLABORATOR && usableQuery !== null) {
        // A rejected answer discredits the query that produced it.
        rejectedQueries.push({ query: usableQuery, detail: result.errorDetail ?? 'answer rejected' });
        usableQuery = null;
        queryRows = null;
      }
    }
  }

  const unavailableTables = new Set(
    [...structureFailures].filter(([, count]) => count >= MAX_STRUCTURE_ATTEMPTS).map(([table]) => table),
  );
  const relevantTables = tables === null ? [] : selectRelevantTables(task.goal, tables);

  return {
    tables,
    relevantTables,
    structures,
    unavailableTables,
    pendingTables: relevantTables.filter(t => !structures.has(t) && !unavailableTables.has(t)),
    usableQuery,
    queryRows,
    rejectedQueries,
    answered,
  };
}

/**
 * Why schema discovery cannot go on: the tables are listed, yet no structure
 * is known and none is left to fetch. Null while progress is possible.
 */
export function discoveryDeadEnd(knowledge: TaskKnowledge): string | null {
  if (knowledge.tables === null || knowledge.structures.size > 0 || knowledge.pendingTables.length > 0) {
    return null;
  }
  if (knowledge.tables.length === 0) return 'The database lists no tables';
  return `No table structure could be fetched: ${[...knowledge.unavailableTables].join(', ')}`;
}

/**
 * Tables whose name, singular or plural, appears as a word in the goal.
 * Falls back to every table when the goal names none.
 */
export function selectRelevantTables(goal: string, tables: ReadonlyArray<string>): string[] {
  const words = new Set<string>();
  for (const word of goal.toLowerCase().split(/[^a-z0-9_]+/)) {
    if (word === '') continue;
    words.add(word);
    words.add(singular(word));
  }

  const matches = tables.filter(table => {
    const name = table.toLowerCase();
    return words.has(name) || words.has(singular(name));
  });
  return matches.length > 0 ? matches : [...tables];
}

function singular(word: string): string {
  return word.length > 1 && word.endsWith('s') ? word.slice(0, -1) : word;
}

function readString(args: Readonly<Record<string, unknown>>, key: string): string | null {
  const value = args[key];
  return typeof value === 'string' ? value.trim() : null;
}
