/**
 * @fileoverview querypilot - plan/act/replan agent loop over a database API.
 *
 * @example
 * ```typescript
 * const loop = createQueryPilot({ database, composer, reporter, reasoner: new HeuristicReasoner() });
 * const result = await loop.run(createTask('list dc_id of active datacenters'));
 * ```
 *
 * @module querypilot
 * @version 0.1.0
 */

import { Decider } from './agent/decider.js';
import { Describer } from './agent/describer.js';
import { LoopController } from './agent/loop-controller.js';
import type { LoopConfig } from './agent/loop-controller.js';
import { createLogger } from './observability/logger.js';
import type { Logger } from './observability/logger.js';
import type { Reasoner } from './providers/base.js';
import { createDatabaseTools } from './tools/database.js';
import type { DatabaseToolDependencies } from './tools/database.js';
import { ToolDispatcher } from './tools/tool-dispatcher.js';
import { ToolRegistry } from './tools/tool-registry.js';

export * from './types/index.js';
export * from './errors.js';
export * from './agent/index.js';
export * from './tools/index.js';
export * from './providers/index.js';
export * from './observability/index.js';
export { loadConfig, loadEnvironment, type QueryPilotConfig } from './config.js';

export interface QueryPilotOptions extends DatabaseToolDependencies {
  readonly reasoner: Reasoner;
  readonly loop?: Partial<LoopConfig>;
  readonly toolTimeoutMs?: number;
  readonly logger?: Logger;
}

/**
 * Wires the database tools, dispatcher, decider and describer into a
 * LoopController.
 */
export function createQueryPilot(options: QueryPilotOptions): LoopController {
  const logger = options.logger ?? createLogger('querypilot');
  const registry = new ToolRegistry(createDatabaseTools(options));
  const dispatcher = new ToolDispatcher(registry, {
    timeoutMs: options.toolTimeoutMs,
    logger: logger.child({ module: 'tools.dispatcher' }),
  });

  return new LoopController(
    {
      registry,
      dispatcher,
      selector: new Decider(registry, options.reasoner, logger.child({ module: 'agent.decider' })),
      argumentBuilder: new Describer(registry, options.reasoner, logger.child({ module: 'agent.describer' })),
      reflector: options.reasoner,
      logger: logger.child({ module: 'agent.loop' }),
    },
    options.loop,
  );
}
