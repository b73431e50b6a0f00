import Fastify from 'fastify';
import fastifyWebSocket from '@fastify/websocket';
import { registerRoutes } from './api/routes.js';
import { LedgerFeed, registerWebSocket } from './api/websocket.js';
import { AppConfig } from './config.js';
import { EventLogger } from './infra/logger.js';
import { SequenceClock, SystemSequenceClock } from './infra/sequenceClock.js';
import { StateStore } from './infra/storage/stateStore.js';
import { GovernanceService } from './services/governanceService.js';

export interface AppContext {
  app: ReturnType<typeof Fastify>;
  stateStore: StateStore;
  logger: EventLogger;
  clock: SequenceClock;
  governanceService: GovernanceService;
  feed: LedgerFeed;
}

/** Tests pass a `ManualSequenceClock` here; a running server always uses the system clock. */
export interface AppOverrides {
  clock?: SequenceClock;
}

export async function buildApp(config: AppConfig, overrides: AppOverrides = {}): Promise<AppContext> {
  const app = Fastify({
    logger: false,
  });

  // Register WebSocket plugin first so routes can use { websocket: true }.
  await app.register(fastifyWebSocket);

  const stateStore = new StateStore(config.paths.stateFile, config.ledger.defaultSpan);
  await stateStore.init();

  const logger = new EventLogger(config.paths.logFile);
  await logger.init();

  const clock = overrides.clock ?? new SystemSequenceClock();
  const governanceService = new GovernanceService(stateStore, logger, clock, config.ledger.guardianId);

  await registerRoutes(app, {
    config,
    governanceService,
  });

  const feed = await registerWebSocket(app);

  return {
    app,
    stateStore,
    logger,
    clock,
    governanceService,
    feed,
  };
}
