/**
 * @fileoverview Runtime configuration from environment variables.
 *
 * @module querypilot/config
 * @version 0.1.0
 */

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import { Severity } from './types/core.types.js';
import { DEFAULT_MODEL } from './providers/openai.js';
import { parseSeverity } from './observability/logger.js';

const positiveInt = (fallback: number): z.ZodDefault<z.ZodNumber> =>
  z.coerce.number().int().positive().default(fallback);

const EnvSchema = z.object({
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_MODEL: z.string().min(1).default(DEFAULT_MODEL),
  DATABASE_API_URL: z.string().url(),
  REPORT_API_URL: z.string().url(),
  SERVICE_API_KEY: z.string().min(1),
  TASK_NAME: z.string().min(1).default('database'),
  MAX_ITERATIONS: positiveInt(10),
  LOOP_TIMEOUT_MS: positiveInt(300_000),
  TOOL_TIMEOUT_MS: positiveInt(30_000),
  LOG_LEVEL: z.string().default(Severity.INFO),
});

export interface QueryPilotConfig {
  readonly openai: { readonly apiKey: string; readonly model: string };
  readonly databaseApiUrl: string;
  readonly reportApiUrl: string;
  readonly serviceApiKey: string;
  readonly taskName: string;
  readonly maxIterations: number;
  readonly loopTimeoutMs: number;
  readonly toolTimeoutMs: number;
  readonly logLevel: Severity;
}

/**
 * Reads `.env` into process.env without overriding variables already set.
 */
export function loadEnvironment(path?: string): NodeJS.ProcessEnv {
  dotenv.config(path === undefined ? {} : { path });
  return process.env;
}

/**
 * @throws ConfigurationError listing every invalid or missing variable
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>>): QueryPilotConfig {
  // Blank values count as unset.
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );

  const parsed = EnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const values = parsed.data;
  const logLevel = parseSeverity(values.LOG_LEVEL);
  if (logLevel === null) {
    throw new ConfigurationError(`Invalid configuration: LOG_LEVEL: unknown level '${values.LOG_LEVEL}'`);
  }

  return {
    openai: { apiKey: values.OPENAI_API_KEY, model: values.OPENAI_MODEL },
    databaseApiUrl: values.DATABASE_API_URL,
    reportApiUrl: values.REPORT_API_URL,
    serviceApiKey: values.SERVICE_API_KEY,
    taskName: values.TASK_NAME,
    maxIterations: values.MAX_ITERATIONS,
    loopTimeoutMs: values.LOOP_TIMEOUT_MS,
    toolTimeoutMs: values.TOOL_TIMEOUT_MS,
    logLevel,
  };
}
