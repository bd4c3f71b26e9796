/**
 * Notification Dispatcher - drives fleet transitions and their deliveries
 *
 * Each tick walks the active fleets one at a time under the fleet's lock:
 *
 * 1. Plan: apply the due transition and enqueue the deliveries it needs.
 * 2. Commit: persist the plan before touching the transport.
 * 3. Deliver: send pending deliveries per destination, oldest first.
 * 4. Record: persist confirmations, retry schedules and message ids.
 *
 * A crash between 3 and 4 replays the same delivery ids on the next tick;
 * the transport's nonce handling returns the original message instead of
 * posting a duplicate.
 *
 * @module notifications/dispatcher
 */

import { DeliveryError, PersistenceError, errorMessage } from '../errors.js';
import { fleetLockKey } from '../fleet/fleet-service.js';
import { createLogger } from '../logger.js';
import { KeyedMutex } from '../store/keyed-mutex.js';
import { toMs } from '../time.js';
import type {
  CategoryPolicyProvider,
  Delivery,
  DestinationNotificationState,
  Fleet,
  FleetRepository,
  Logger,
  MessagingTransport,
} from '../types.js';
import {
  buildCancelNotice,
  buildCancelledMessage,
  buildPingMessage,
  buildRescheduleNotice,
  buildUpdateEmbed,
  type RenderContext,
} from './message-builder.js';
import {
  DEFAULT_BACKOFF,
  backoffDelay,
  planNotifications,
  rescheduledSince,
  type BackoffConfig,
} from './outbox.js';

export interface DispatcherConfig {
  policies: CategoryPolicyProvider;
  repository: FleetRepository;
  transport: MessagingTransport;
  /** Shared with FleetService so operator actions and ticks never interleave on a fleet */
  locks?: KeyedMutex;
  logger?: Logger;
  appUrl?: string;
  /** Attempts before a retryable delivery is abandoned (default: 5) */
  maxAttempts?: number;
  backoff?: BackoffConfig;
}

export interface TickReport {
  fleets: number;
  transitions: number;
  confirmed: number;
  retrying: number;
  abandoned: number;
  archived: number;
  errors: number;
}

function emptyReport(): TickReport {
  return { fleets: 0, transitions: 0, confirmed: 0, retrying: 0, abandoned: 0, archived: 0, errors: 0 };
}

function isDue(delivery: Delivery, now: Date): boolean {
  return delivery.nextAttemptAt === null || toMs(delivery.nextAttemptAt) <= now.getTime();
}

export class NotificationDispatcher {
  private readonly policies: CategoryPolicyProvider;
  private readonly repository: FleetRepository;
  private readonly transport: MessagingTransport;
  private readonly locks: KeyedMutex;
  private readonly logger: Logger;
  private readonly appUrl?: string;
  private readonly maxAttempts: number;
  private readonly backoff: BackoffConfig;
  private processingPromise: Promise<TickReport> | null = null;

  constructor(config: DispatcherConfig) {
    this.policies = config.policies;
    this.repository = config.repository;
    this.transport = config.transport;
    this.locks = config.locks ?? new KeyedMutex();
    this.logger = config.logger ?? createLogger('dispatcher');
    this.appUrl = config.appUrl;
    this.maxAttempts = config.maxAttempts ?? 5;
    this.backoff = config.backoff ?? DEFAULT_BACKOFF;
  }

  /**
   * Run one dispatch pass. A tick requested while another is running joins
   * the running one instead of starting a second pass.
   */
  async tick(now: Date = new Date()): Promise<TickReport> {
    if (this.processingPromise) {
      return this.processingPromise;
    }

    this.processingPromise = this.runTick(now).finally(() => {
      this.processingPromise = null;
    });
    return this.processingPromise;
  }

  private async runTick(now: Date): Promise<TickReport> {
    const report = emptyReport();
    // A failure here means nothing can be decided this tick; let the scheduler count it
    const fleets = await this.repository.loadActiveFleets();
    fleets.sort((a, b) => toMs(a.formUpTime) - toMs(b.formUpTime));

    for (const { id } of fleets) {
      try {
        await this.locks.runExclusive(fleetLockKey(id), () => this.processFleet(id, now, report));
      } catch (e) {
        report.errors++;
        this.logger.error(`Fleet ${id} skipped this tick: ${errorMessage(e)}`);
      }
    }

    if (report.transitions > 0 || report.confirmed > 0 || report.errors > 0) {
      this.logger.info(
        `Tick: ${report.fleets} fleets, ${report.transitions} transitions, ${report.confirmed} delivered, ` +
          `${report.retrying} retrying, ${report.abandoned} abandoned, ${report.errors} errors`,
      );
    }
    return report;
  }

  private async processFleet(fleetId: string, now: Date, report: TickReport): Promise<void> {
    // Re-read under the lock: an operator action may have landed since the listing
    const fleet = await this.repository.loadFleet(fleetId);
    if (!fleet || fleet.archivedAt !== null) return;
    report.fleets++;

    const policy = await this.policies.getCategoryPolicy(fleet.categoryId);
    if (!policy) {
      this.logger.warn(`Category ${fleet.categoryId} of fleet ${fleet.id} not found, skipping`);
      return;
    }

    const plan = planNotifications(fleet, policy, now);
    let current = fleet;
    if (plan.changed) {
      current = await this.repository.saveFleet(plan.fleet, fleet.version);
      if (plan.transition) {
        report.transitions++;
        this.logger.info(`Fleet ${fleet.id} (${policy.name}) → ${current.status}`);
      }
      if (plan.archived) {
        report.archived++;
        this.logger.debug?.(`Archived fleet ${fleet.id}`);
      }
    }

    const hasWork = current.notificationState.some((s) =>
      s.deliveries.some((d) => d.status === 'pending' && isDue(d, now)),
    );
    if (!hasWork) return;

    const working = structuredClone(current);
    const ctx: RenderContext = { policy, appUrl: this.appUrl };
    await Promise.all(
      working.notificationState.map((state) => this.deliverDestination(working, state, ctx, now, report)),
    );

    try {
      await this.repository.saveFleet(working, current.version);
    } catch (e) {
      if (e instanceof PersistenceError) {
        // Unrecorded sends are replayed next tick under the same nonce
        this.logger.error(`Delivery results for fleet ${fleet.id} not recorded: ${e.message}`);
      }
      throw e;
    }
  }

  /**
   * Work through one destination's pending deliveries in order. A delivery
   * waiting on backoff holds back everything behind it.
   */
  private async deliverDestination(
    fleet: Fleet,
    state: DestinationNotificationState,
    ctx: RenderContext,
    now: Date,
    report: TickReport,
  ): Promise<void> {
    for (const delivery of state.deliveries) {
      if (delivery.status !== 'pending') continue;
      if (!isDue(delivery, now)) break;

      delivery.attempts++;
      try {
        await this.execute(fleet, state, delivery, ctx);
        delivery.status = 'confirmed';
        delivery.confirmedAt = now.toISOString();
        delivery.nextAttemptAt = null;
        delivery.lastError = null;
        report.confirmed++;
      } catch (e) {
        delivery.lastError = errorMessage(e);
        const retryable = !(e instanceof DeliveryError) || e.retryable;

        if (!retryable || delivery.attempts >= this.maxAttempts) {
          delivery.status = 'abandoned';
          delivery.nextAttemptAt = null;
          report.abandoned++;
          this.logger.error(
            `Abandoned ${delivery.kind} for fleet ${fleet.id} in ${state.destination} ` +
              `after ${delivery.attempts} attempt(s): ${delivery.lastError}`,
          );
          continue;
        }

        const delay = backoffDelay(delivery.attempts, this.backoff);
        delivery.nextAttemptAt = new Date(now.getTime() + delay).toISOString();
        report.retrying++;
        this.logger.warn(
          `${delivery.kind} for fleet ${fleet.id} in ${state.destination} failed ` +
            `(attempt ${delivery.attempts}/${this.maxAttempts}), retrying in ${Math.round(delay / 1000)}s: ` +
            delivery.lastError,
        );
        break;
      }
    }
  }

  private async execute(
    fleet: Fleet,
    state: DestinationNotificationState,
    delivery: Delivery,
    ctx: RenderContext,
  ): Promise<void> {
    const destination = state.destination;

    switch (delivery.kind) {
      case 'create':
      case 'reminder':
      case 'formup': {
        const announced = state.messageIds.length > 0;
        const replyTo = delivery.kind === 'create' ? undefined : state.messageIds.at(-1);
        const messageId = await this.transport.sendMessage(
          destination,
          buildPingMessage(delivery.kind, fleet, ctx, announced),
          { ping: ctx.policy.pingRoles, nonce: delivery.id, replyTo },
        );
        delivery.messageId = messageId;
        if (!state.messageIds.includes(messageId)) {
          state.messageIds.push(messageId);
        }
        // Older messages still show what they showed; a later update brings them in line
        if (!announced) {
          this.markRendered(state, fleet);
        }
        return;
      }

      case 'update': {
        const embed = buildUpdateEmbed(fleet, ctx);
        for (const messageId of state.messageIds) {
          await this.transport.editMessage(destination, messageId, { embed });
        }
        // The fleet may have moved again since this update was queued
        const rescheduledFrom = rescheduledSince(state, fleet);
        delivery.rescheduledFrom = rescheduledFrom;
        if (rescheduledFrom) {
          delivery.messageId = await this.transport.sendMessage(
            destination,
            buildRescheduleNotice(fleet, ctx, rescheduledFrom),
            { ping: [], nonce: delivery.id },
          );
        }
        this.markRendered(state, fleet);
        return;
      }

      case 'cancel': {
        const cancelled = buildCancelledMessage(fleet, ctx);
        for (const messageId of state.messageIds) {
          await this.transport.editMessage(destination, messageId, cancelled);
        }
        delivery.messageId = await this.transport.sendMessage(destination, buildCancelNotice(fleet, ctx), {
          ping: [],
          nonce: delivery.id,
        });
        this.markRendered(state, fleet);
        return;
      }
    }
  }

  private markRendered(state: DestinationNotificationState, fleet: Fleet): void {
    state.renderedRevision = fleet.revision;
    state.renderedFormUpTime = fleet.formUpTime;
  }
}
