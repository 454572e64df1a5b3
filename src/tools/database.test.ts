/**
 * @fileoverview Unit tests for the database tools
 */

import { describe, it, expect, vi } from 'vitest';
import { v4 as uuidv4 } from 'uuid';
import { ToolName, createDatabaseTools, extractSql } from './database.js';
import type { DatabaseToolDependencies } from './database.js';
import { CollaboratorError } from '../errors.js';
import { createUniqueId } from '../types/core.types.js';
import type { ToolExecutionContext, ToolImplementation } from '../types/tools.types.js';
import { Logger, MemoryTransport } from '../observability/logger.js';
import { FakeDatabase, GradingReporter, ScriptedComposer, USERS_DDL } from '../testing/fakes.js';

const context: ToolExecutionContext = {
  executionId: createUniqueId(uuidv4()),
  signal: new AbortController().signal,
  logger: new Logger({ transports: [new MemoryTransport()] }),
};

function toolFor(name: string, deps: Partial<DatabaseToolDependencies> = {}): ToolImplementation {
  const tools = createDatabaseTools({
    database: deps.database ?? new FakeDatabase(),
    composer: deps.composer ?? new ScriptedComposer(),
    reporter: deps.reporter ?? new GradingReporter(),
  });
  const tool = tools.find(t => t.descriptor.name === name);
  if (tool === undefined) throw new Error(`missing tool ${name}`);
  return tool;
}

describe('database tools', () => {
  it('get_tables should normalize the listing to table_name rows', async () => {
    const reply = await toolFor(ToolName.GET_TABLES).execute({}, context);

    expect(reply).toEqual({
      reply: [{ table_name: 'connections' }, { table_name: 'datacenters' }, { table_name: 'users' }],
      error: 'OK',
    });
  });

  it('get_table_structure should ask for the CREATE TABLE statement', async () => {
    const database = new FakeDatabase();
    const reply = await toolFor(ToolName.GET_TABLE_STRUCTURE, { database }).execute({ table_name: 'users' }, context);

    expect(database.queries).toEqual(['show create table `users`']);
    expect(reply).toEqual({ reply: [{ Table: 'users', 'Create Table': USERS_DDL }], error: 'OK' });
  });

  it('get_table_structure should quote listed names that are not plain identifiers', async () => {
    const ddl = 'CREATE TABLE `user-accounts` (`id` int)';
    const database = new FakeDatabase({ structures: { 'user-accounts': ddl } });
    const reply = await toolFor(ToolName.GET_TABLE_STRUCTURE, { database }).execute(
      { table_name: 'user-accounts' },
      context,
    );

    expect(database.queries).toEqual(['show create table `user-accounts`']);
    expect(reply).toEqual({ reply: [{ Table: 'user-accounts', 'Create Table': ddl }], error: 'OK' });
  });

  it('analyze_structure should return the composed query without code fences', async () => {
    const composer = new ScriptedComposer(['```sql\nSELECT id FROM users\n```']);
    const reply = await toolFor(ToolName.ANALYZE_STRUCTURE, { composer }).execute(
      { table_structures: { users: USERS_DDL }, task_description: 'list user ids' },
      context,
    );

    expect(reply).toBe('SELECT id FROM users');
    expect(composer.requests).toEqual([{ tableStructures: { users: USERS_DDL }, taskDescription: 'list user ids' }]);
  });

  it('analyze_structure should fail when the composer returns no query', async () => {
    const composer = new ScriptedComposer(['```sql\n```']);
    const run = toolFor(ToolName.ANALYZE_STRUCTURE, { composer }).execute(
      { table_structures: { users: USERS_DDL }, task_description: 'list user ids' },
      context,
    );

    await expect(run).rejects.toThrow(CollaboratorError);
  });

  it('final_answer should return the receipt when the answer is accepted', async () => {
    const reply = await toolFor(ToolName.FINAL_ANSWER).execute({ answer: ['9294', '4278'] }, context);

    expect(reply).toEqual({ code: 0, message: 'OK' });
  });

  it('final_answer should throw when the answer is rejected', async () => {
    const reporter = new GradingReporter();
    const run = toolFor(ToolName.FINAL_ANSWER, { reporter }).execute({ answer: ['1'] }, context);

    await expect(run).rejects.toThrow('Answer rejected: Wrong answer');
    expect(reporter.submissions).toEqual([['1']]);
  });

  it('should pass the call signal to the database', async () => {
    const database = new FakeDatabase();
    const query = vi.spyOn(database, 'query');

    await toolFor(ToolName.GET_TABLES, { database }).execute({}, context);

    expect(query).toHaveBeenCalledWith('show tables', context.signal);
  });
});

describe('extractSql', () => {
  it('should strip a fenced block', () => {
    expect(extractSql('Here you go:\n```sql\nSELECT 1\n```')).toBe('SELECT 1');
  });

  it('should trim plain text', () => {
    expect(extractSql('  SELECT 1 \n')).toBe('SELECT 1');
  });
});
