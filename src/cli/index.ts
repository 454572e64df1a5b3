#!/usr/bin/env node
/**
 * @fileoverview querypilot CLI
 *
 * Usage:
 *   querypilot run "<goal>" [options]
 *   querypilot tools
 *   querypilot --help
 */

import { writeFile } from 'node:fs/promises';
import OpenAI from 'openai';
import { createQueryPilot } from '../index.js';
import { createTask, LoopOutcome } from '../agent/loop-controller.js';
import type { LoopResult } from '../agent/loop-controller.js';
import { loadConfig, loadEnvironment } from '../config.js';
import type { QueryPilotConfig } from '../config.js';
import { CollaboratorError, describeError } from '../errors.js';
import { ConsoleTransport, createLogger } from '../observability/logger.js';
import { renderTranscript } from '../observability/transcript.js';
import { HeuristicReasoner } from '../providers/heuristic.js';
import { HttpAnswerReporter, HttpDatabaseClient } from '../providers/http.js';
import { OpenAIQueryComposer, OpenAIReasoner, createOpenAIChat } from '../providers/openai.js';
import type { QueryComposer, Reasoner } from '../providers/base.js';
import { createDatabaseTools } from '../tools/database.js';
import type { DatabaseToolDependencies } from '../tools/database.js';
import { ToolRegistry } from '../tools/tool-registry.js';
import { Severity } from '../types/core.types.js';

const VERSION = '0.1.0';

interface CLIConfig {
  command: 'run' | 'tools' | 'help' | 'version';
  goal: string | undefined;
  maxIterations: number | undefined;
  timeoutMs: number | undefined;
  heuristic: boolean;
  transcript: string | undefined;
  verbose: boolean;
}

function parseArgs(args: string[]): CLIConfig {
  const config: CLIConfig = {
    command: 'help',
    goal: undefined,
    maxIterations: undefined,
    timeoutMs: undefined,
    heuristic: false,
    transcript: undefined,
    verbose: false,
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i];

    switch (arg) {
      case 'run':
        config.command = 'run';
        break;

      case 'tools':
      case 'list':
        config.command = 'tools';
        break;

      case '-h':
      case '--help':
      case 'help':
        config.command = 'help';
        break;

      case '-v':
      case '--version':
      case 'version':
        config.command = 'version';
        break;

      case '-n':
      case '--max-iterations':
        config.maxIterations = parsePositive(arg, args[++i]);
        break;

      case '-t':
      case '--timeout':
        config.timeoutMs = parsePositive(arg, args[++i]);
        break;

      case '--heuristic':
        config.heuristic = true;
        break;

      case '--transcript':
        config.transcript = args[++i];
        break;

      case '--verbose':
        config.verbose = true;
        break;

      default:
        if (arg !== undefined && config.command === 'run' && config.goal === undefined && !arg.startsWith('-')) {
          config.goal = arg;
        }
        break;
    }

    i++;
  }

  return config;
}

function parsePositive(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`${flag} expects a positive integer, got '${value ?? ''}'`);
  }
  return parsed;
}

function printHelp(): void {
  console.log(`
querypilot - answers questions about a database by planning, acting and replanning

USAGE:
  querypilot <command> [options]

COMMANDS:
  run "<goal>"      Run a task until an answer is accepted or a budget runs out
  tools             List available tools
  help              Show this help message
  version           Show version

OPTIONS:
  -n, --max-iterations <n>   Cycle budget (default: MAX_ITERATIONS or 10)
  -t, --timeout <ms>         Wall-clock budget (default: LOOP_TIMEOUT_MS or 300000)
  --heuristic                Use the deterministic reasoner instead of the model
  --transcript <file>        Write a Markdown transcript of the run
  --verbose                  Enable debug logging

ENVIRONMENT (read from .env as well):
  OPENAI_API_KEY, OPENAI_MODEL, DATABASE_API_URL, REPORT_API_URL,
  SERVICE_API_KEY, TASK_NAME, MAX_ITERATIONS, LOOP_TIMEOUT_MS,
  TOOL_TIMEOUT_MS, LOG_LEVEL

EXAMPLES:
  querypilot run "list dc_id of active datacenters whose manager is an inactive user"
  querypilot run "how many users are inactive" --heuristic --transcript run.md
`);
}

function printVersion(): void {
  console.log(`querypilot v${VERSION}`);
}

/**
 * Collaborators for listing tools only; nothing is ever called on them.
 */
function offlineCollaborators(): DatabaseToolDependencies {
  const offline = (): never => {
    throw new CollaboratorError('Not connected');
  };
  return {
    database: { query: async () => offline() },
    composer: { composeQuery: async () => offline() },
    reporter: { submit: async () => offline() },
  };
}

function listTools(): void {
  const registry = new ToolRegistry(createDatabaseTools(offlineCollaborators()));

  console.log('\nAVAILABLE TOOLS\n');
  for (const tool of registry.list()) {
    const effects = tool.hasSideEffects ? 'side effects' : 'read only';
    console.log(`  ${tool.name}`);
    console.log(`     ${tool.description}`);
    console.log(`     ${effects}, ${tool.idempotent ? 'idempotent' : 'not idempotent'}`);
    console.log('');
  }
  console.log(`Total: ${registry.list().length} tools\n`);
}

function createReasoning(config: QueryPilotConfig, heuristic: boolean): { reasoner: Reasoner; composer: QueryComposer } {
  const chat = createOpenAIChat(new OpenAI({ apiKey: config.openai.apiKey }), config.openai.model);
  return {
    reasoner: heuristic ? new HeuristicReasoner() : new OpenAIReasoner(chat),
    composer: new OpenAIQueryComposer(chat),
  };
}

async function runTask(cli: CLIConfig): Promise<LoopResult> {
  if (cli.goal === undefined || cli.goal.trim() === '') {
    throw new Error('run needs a goal, e.g. querypilot run "list all users"');
  }

  const config = loadConfig(loadEnvironment());
  const logger = createLogger('querypilot', {
    minLevel: cli.verbose ? Severity.DEBUG : config.logLevel,
    transports: [new ConsoleTransport()],
  });

  const { reasoner, composer } = createReasoning(config, cli.heuristic);
  const endpoint = { apiKey: config.serviceApiKey, taskName: config.taskName };
  const controller = createQueryPilot({
    database: new HttpDatabaseClient({ ...endpoint, url: config.databaseApiUrl }),
    reporter: new HttpAnswerReporter({ ...endpoint, url: config.reportApiUrl }),
    composer,
    reasoner,
    toolTimeoutMs: config.toolTimeoutMs,
    loop: { maxIterations: config.maxIterations, timeoutMs: config.loopTimeoutMs },
    logger,
  });

  if (cli.verbose) {
    controller.on('trace:appended', (_taskId, entry) => {
      console.error(`  [${entry.cycle}] ${entry.action.toolName} → ${entry.result.status}`);
    });
  }

  const abort = new AbortController();
  const onSigint = (): void => {
    console.error('\n  Cancelling after the current cycle...');
    abort.abort();
  };
  process.once('SIGINT', onSigint);

  const task = createTask(cli.goal);
  try {
    const result = await controller.run(task, {
      signal: abort.signal,
      maxIterations: cli.maxIterations,
      timeoutMs: cli.timeoutMs,
    });

    if (cli.transcript !== undefined) {
      await writeFile(cli.transcript, renderTranscript(task.goal, result), 'utf8');
      console.error(`  Transcript written to ${cli.transcript}`);
    }
    return result;
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

function printResult(result: LoopResult): void {
  console.log(`Outcome: ${result.outcome} (${result.reason}) after ${result.cycles} cycles`);
  if (result.answer !== null) {
    console.log(`Answer: ${JSON.stringify(result.answer)}`);
  }
  if (result.error !== null) {
    console.log(`Error: ${result.error.code}: ${result.error.message}`);
  }
}

async function main(): Promise<void> {
  const config = parseArgs(process.argv.slice(2));

  switch (config.command) {
    case 'run': {
      const result = await runTask(config);
      printResult(result);
      process.exitCode = result.outcome === LoopOutcome.SUCCEEDED ? 0 : 2;
      break;
    }

    case 'tools':
      listTools();
      break;

    case 'version':
      printVersion();
      break;

    case 'help':
    default:
      printHelp();
      break;
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${describeError(error)}`);
  process.exit(1);
});
