/**
 * Fleetboard - fleet scheduling and notification engine
 *
 * @module fleetboard
 */

import { AuditLogger, NullAuditTrail, type AuditTrail } from './audit/audit-logger.js';
import { ConfigDestinationDirectory, type FleetboardConfig } from './config/loader.js';
import { FleetService } from './fleet/fleet-service.js';
import { createLogger } from './logger.js';
import { NotificationDispatcher } from './notifications/dispatcher.js';
import { createTransport } from './notifications/transport.js';
import { StaticPolicyProvider } from './policy/category-policy.js';
import { createFleetboardScheduler, type Scheduler } from './scheduler/scheduler.js';
import { JsonFileFleetStore } from './store/fleet-store.js';
import { KeyedMutex } from './store/keyed-mutex.js';
import { SummaryPublisher } from './summary/summary-publisher.js';
import type {
  CategoryPolicyProvider,
  DestinationDirectory,
  FleetRepository,
  Logger,
  MessagingTransport,
} from './types.js';

export * from './types.js';
export * from './errors.js';
export { AuditLogger, NullAuditTrail, type AuditAction, type AuditEntry, type AuditTrail } from './audit/audit-logger.js';
export * from './config/index.js';
export * from './fleet/index.js';
export * from './notifications/index.js';
export * from './policy/index.js';
export * from './scheduler/index.js';
export * from './store/index.js';
export * from './summary/index.js';
export * from './validation/index.js';
export { createLogger, silentLogger } from './logger.js';

/** Collaborators to use instead of the ones built from configuration */
export interface FleetboardOverrides {
  policies?: CategoryPolicyProvider;
  repository?: FleetRepository;
  transport?: MessagingTransport;
  directory?: DestinationDirectory;
  audit?: AuditTrail;
  logger?: Logger;
}

export interface Fleetboard {
  config: FleetboardConfig;
  policies: CategoryPolicyProvider;
  repository: FleetRepository;
  transport: MessagingTransport;
  audit: AuditTrail;
  locks: KeyedMutex;
  service: FleetService;
  dispatcher: NotificationDispatcher;
  publisher: SummaryPublisher;
}

/**
 * Wire the engine's components without starting anything. The service and
 * the dispatcher share one lock set so operator actions and ticks serialize
 * per fleet.
 */
export function createFleetboard(config: FleetboardConfig, overrides: FleetboardOverrides = {}): Fleetboard {
  const logger = overrides.logger;
  const policies = overrides.policies ?? new StaticPolicyProvider(config.categories, config.pingGroups);
  const repository = overrides.repository ?? new JsonFileFleetStore(config.dataDir);
  const transport = overrides.transport ?? createTransport({ ...config.discord, logger });
  const audit =
    overrides.audit ?? (config.audit.enabled ? new AuditLogger(config.audit.path) : new NullAuditTrail());
  const locks = new KeyedMutex();

  const service = new FleetService({ policies, repository, locks, audit, logger });
  const dispatcher = new NotificationDispatcher({
    policies,
    repository,
    transport,
    locks,
    logger,
    appUrl: config.appUrl,
    maxAttempts: config.delivery.maxAttempts,
    backoff: config.delivery.backoff,
  });
  const publisher = new SummaryPublisher({
    policies,
    repository,
    transport,
    directory: overrides.directory ?? new ConfigDestinationDirectory(config.summaries),
    logger,
  });

  return { config, policies, repository, transport, audit, locks, service, dispatcher, publisher };
}

/**
 * Initialize the engine and start its scheduler
 */
export async function initializeFleetboard(
  config: FleetboardConfig,
  overrides: FleetboardOverrides = {},
): Promise<
  Fleetboard & {
    scheduler: Scheduler;
    /** Idempotent; the caller registers signal handlers */
    shutdown: () => void;
  }
> {
  const log = overrides.logger ?? createLogger('fleetboard');
  const board = createFleetboard(config, overrides);

  if (board.audit instanceof AuditLogger) {
    await board.audit.initialize();
  }

  const scheduler = createFleetboardScheduler(
    {
      dispatchTick: async () => {
        await board.dispatcher.tick();
      },
      publishSummary: async () => {
        await board.publisher.publishAll();
      },
    },
    { tickMs: config.tickMs, summaryMs: config.summaryMs },
    overrides.logger,
  );

  try {
    // Store must be readable before the first tick
    const fleets = await board.repository.loadActiveFleets();
    scheduler.start();
    log.info(`Started: ${config.categories.length} categories, ${fleets.length} active fleets`);
  } catch (err) {
    try {
      scheduler.stop();
    } catch (stopErr) {
      log.error(`Defensive scheduler.stop() failed: ${String(stopErr)}`);
    }
    throw err;
  }

  // Cleanup handle; the entrypoint owns signal registration
  let stopped = false;
  const shutdown = (): void => {
    if (stopped) return;
    stopped = true;
    try {
      scheduler.stop();
    } catch (err) {
      log.error(`scheduler.stop() failed during shutdown: ${String(err)}`);
    }
  };

  return { ...board, scheduler, shutdown };
}
