/**
 * @fileoverview HTTP clients for the database API and the answer endpoint.
 *
 * Both endpoints take a JSON body carrying the task name and the service key.
 *
 * @module querypilot/providers/http
 */

import { z } from 'zod';
import { CollaboratorError } from '../errors.js';
import type { ReplyEnvelope } from '../types/tools.types.js';
import type { AnswerReceipt, AnswerReporter, DatabaseClient } from './base.js';

export interface HttpEndpointConfig {
  readonly url: string;
  readonly apiKey: string;
  readonly taskName: string;

  /** Defaults to the global fetch */
  readonly fetch?: typeof fetch;
}

const EnvelopeSchema = z.object({
  reply: z.unknown(),
  error: z.string(),
});

const ReceiptSchema = z.object({
  code: z.number(),
  message: z.string(),
});

async function postJson(
  config: HttpEndpointConfig,
  body: Record<string, unknown>,
  signal: AbortSignal | undefined,
): Promise<{ status: number; json: unknown }> {
  const fetchImpl = config.fetch ?? fetch;
  const response = await fetchImpl(config.url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: JSON.stringify({ task: config.taskName, apikey: config.apiKey, ...body }),
    signal,
  });

  const text = await response.text();
  try {
    return { status: response.status, json: JSON.parse(text) };
  } catch {
    throw new CollaboratorError(`${config.url} responded ${response.status} with a non-JSON body`);
  }
}

export class HttpDatabaseClient implements DatabaseClient {
  constructor(private readonly config: HttpEndpointConfig) {}

  async query(sql: string, signal?: AbortSignal): Promise<ReplyEnvelope> {
    const { status, json } = await postJson(this.config, { query: sql }, signal);

    const parsed = EnvelopeSchema.safeParse(json);
    if (!parsed.success) {
      throw new CollaboratorError(`Database API responded ${status} without a reply envelope`);
    }
    return { reply: parsed.data.reply, error: parsed.data.error };
  }
}

/**
 * Submits answers. The endpoint reports rejection both through a non-zero
 * `code` and through 4xx statuses, so the body is read either way.
 */
export class HttpAnswerReporter implements AnswerReporter {
  constructor(private readonly config: HttpEndpointConfig) {}

  async submit(answer: ReadonlyArray<string>, signal?: AbortSignal): Promise<AnswerReceipt> {
    const { status, json } = await postJson(this.config, { answer }, signal);

    const parsed = ReceiptSchema.safeParse(json);
    if (!parsed.success) {
      throw new CollaboratorError(`Report API responded ${status} without a receipt`);
    }
    return parsed.data;
  }
}
