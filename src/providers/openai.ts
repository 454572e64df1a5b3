/**
 * @fileoverview OpenAI-backed collaborators.
 *
 * The reasoner and the query composer talk to a chat model through a single
 * `ChatCompletionFn`, so tests can swap the model for a stub without
 * touching the SDK.
 *
 * @see https://platform.openai.com/docs/api-reference/chat
 */

import type OpenAI from 'openai';
import { z } from 'zod';
import { CollaboratorError } from '../errors.js';
import type { TraceEntry } from '../types/plan.types.js';
import { PlanStepStatus } from '../types/plan.types.js';
import type {
  ExecutedStep,
  QueryComposer,
  QueryRow,
  ReasoningContext,
  Reasoner,
  ToolSuggestion,
} from './base.js';

export interface ChatMessage {
  readonly role: 'system' | 'user';
  readonly content: string;
}

export interface ChatOptions {
  /** Ask the model for a JSON object */
  readonly json: boolean;
  readonly signal?: AbortSignal;
}

export type ChatCompletionFn = (messages: ReadonlyArray<ChatMessage>, options: ChatOptions) => Promise<string>;

export const DEFAULT_MODEL = 'gpt-4o';

/**
 * Adapts the OpenAI SDK to a ChatCompletionFn.
 */
export function createOpenAIChat(client: OpenAI, model: string = DEFAULT_MODEL): ChatCompletionFn {
  return async (messages, options) => {
    const completion = await client.chat.completions.create(
      {
        model,
        temperature: 0,
        messages: messages.map(m =>
          m.role === 'system'
            ? { role: 'system' as const, content: m.content }
            : { role: 'user' as const, content: m.content }),
        response_format: { type: options.json ? 'json_object' : 'text' },
      },
      { signal: options.signal },
    );

    const content = completion.choices[0]?.message.content;
    if (content === null || content === undefined) {
      throw new CollaboratorError(`Model ${model} returned an empty completion`);
    }
    return content;
  };
}

// ============ Reply Schemas ============

const SuggestionReplySchema = z.object({
  _thoughts: z.string().optional(),
  tool: z.string().min(1),
});

const TableReplySchema = z.object({
  _thoughts: z.string().optional(),
  table: z.string().min(1),
});

const AnswerReplySchema = z.object({
  _thoughts: z.string().optional(),
  answer: z.array(z.union([z.string(), z.number()])),
});

// ============ Prompt Helpers ============

function renderTools(context: ReasoningContext): string {
  return context.tools.map(tool => `- ${tool.name}: ${tool.description}`).join('\n');
}

function renderPlan(context: ReasoningContext): string {
  return context.plan.steps
    .map(step => {
      const target = step.target === null ? '' : ` (${step.target})`;
      return `- [${step.status}] ${step.toolName}${target}: ${step.rationale}`;
    })
    .join('\n');
}

export function renderTrace(trace: ReadonlyArray<TraceEntry>): string {
  if (trace.length === 0) return 'No actions taken yet.';

  return trace
    .map(({ cycle, action, result, reflection }) => renderStep(`cycle="${cycle}"`, { action, result }, reflection))
    .join('\n');
}

function renderStep(attributes: string, { action, result }: ExecutedStep, reflection: string | null): string {
  const lines = [
    `<action ${attributes}>`,
    `tool: ${action.toolName}`,
    `arguments: ${JSON.stringify(action.arguments)}`,
    `status: ${result.status}`,
    `result: ${result.errorDetail ?? JSON.stringify(result.payload)}`,
  ];
  if (reflection !== null) lines.push(`reflection: ${reflection}`);
  lines.push('</action>');
  return lines.join('\n');
}

function parseReply<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, text: string, what: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    throw new CollaboratorError(`Model returned invalid JSON for ${what}`);
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CollaboratorError(`Model reply for ${what} has the wrong shape: ${parsed.error.message}`);
  }
  return parsed.data;
}

// ============ Reasoner ============

export class OpenAIReasoner implements Reasoner {
  readonly name = 'openai';

  constructor(private readonly chat: ChatCompletionFn) {}

  async suggestTool(context: ReasoningContext): Promise<ToolSuggestion> {
    const pending = context.plan.steps.filter(step => step.status === PlanStepStatus.PENDING);
    const system = [
      'You choose the single next tool for an agent working towards a goal.',
      'Reply with JSON only: {"_thoughts": "one or two sentences", "tool": "exact tool name"}.',
      'Do not repeat an action whose result is already in the history unless it failed.',
      `Use ${context.task.terminalTool} only once the query result answering the goal is known.`,
      '',
      `<goal>${context.task.goal}</goal>`,
      `<tools>\n${renderTools(context)}\n</tools>`,
      `<plan>\n${renderPlan(context)}\n</plan>`,
      `<history>\n${renderTrace(context.trace)}\n</history>`,
    ].join('\n');

    const reply = parseReply(
      SuggestionReplySchema,
      await this.chat([{ role: 'system', content: system }, { role: 'user', content: 'Which tool next?' }], { json: true }),
      'tool suggestion',
    );

    const step = pending.find(s => s.toolName === reply.tool);
    return { toolName: reply.tool, rationale: reply._thoughts ?? step?.rationale ?? `Use ${reply.tool}` };
  }

  async pickTable(context: ReasoningContext, candidates: ReadonlyArray<string>): Promise<string> {
    const system = [
      'Pick the table whose structure should be inspected next to reach the goal.',
      'Reply with JSON only: {"_thoughts": "one sentence", "table": "exact table name"}.',
      '',
      `<goal>${context.task.goal}</goal>`,
      `<candidates>\n${candidates.join('\n')}\n</candidates>`,
      `<history>\n${renderTrace(context.trace)}\n</history>`,
    ].join('\n');

    const reply = parseReply(
      TableReplySchema,
      await this.chat([{ role: 'system', content: system }, { role: 'user', content: 'Which table?' }], { json: true }),
      'table choice',
    );
    return reply.table;
  }

  async extractAnswer(context: ReasoningContext, rows: ReadonlyArray<QueryRow>): Promise<ReadonlyArray<string>> {
    const system = [
      'Extract the values that answer the goal from the query result rows.',
      'Reply with JSON only: {"_thoughts": "one sentence", "answer": ["value", ...]}.',
      '',
      `<goal>${context.task.goal}</goal>`,
      `<rows>\n${JSON.stringify(rows)}\n</rows>`,
    ].join('\n');

    const reply = parseReply(
      AnswerReplySchema,
      await this.chat([{ role: 'system', content: system }, { role: 'user', content: 'What is the answer?' }], { json: true }),
      'answer extraction',
    );
    return reply.answer.map(value => String(value));
  }

  async reflect(context: ReasoningContext, step: ExecutedStep): Promise<string> {
    const system = [
      'You review the action an agent has just performed while working towards a goal.',
      'Write a note to yourself in at most three plain sentences: what the result shows,',
      'whether it moves the task forward, and what it means for the next step. No JSON, no markdown.',
      '',
      `<goal>${context.task.goal}</goal>`,
      `<tools>\n${renderTools(context)}\n</tools>`,
      `<plan>\n${renderPlan(context)}\n</plan>`,
      `<history>\n${renderTrace(context.trace)}\n</history>`,
      `<latest>\n${renderStep('latest="true"', step, null)}\n</latest>`,
    ].join('\n');

    const note = (await this.chat(
      [{ role: 'system', content: system }, { role: 'user', content: 'Reflect on the latest action.' }],
      { json: false },
    )).trim();
    if (note === '') {
      throw new CollaboratorError('Model returned an empty reflection');
    }
    return note;
  }
}

// ============ Query Composer ============

export class OpenAIQueryComposer implements QueryComposer {
  constructor(private readonly chat: ChatCompletionFn) {}

  async composeQuery(
    request: { tableStructures: Readonly<Record<string, string>>; taskDescription: string },
    signal?: AbortSignal,
  ): Promise<string> {
    const structures = Object.entries(request.tableStructures)
      .map(([table, statement]) => `${table}:\n${statement}`)
      .join('\n\n');

    const system = [
      'You write SQL for the database described below.',
      'Return one SQL query and nothing else: no prose, no markdown, no code fences.',
    ].join('\n');
    const user = [
      `<structures>\n${structures}\n</structures>`,
      `<task>\n${request.taskDescription}\n</task>`,
    ].join('\n');

    return this.chat(
      [{ role: 'system', content: system }, { role: 'user', content: user }],
      { json: false, signal },
    );
  }
}
