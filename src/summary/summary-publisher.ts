/**
 * Summary Publisher - keeps one "upcoming fleets" message per destination
 *
 * Every cycle posts a fresh summary, records it as the destination's live
 * message, and only then deletes the previous one. A failed delete leaves a
 * stale message behind but never a missing one.
 *
 * @module summary/summary-publisher
 */

import { errorMessage } from '../errors.js';
import { isAnnounced } from '../fleet/fleet-service.js';
import { isTerminal } from '../fleet/fleet-state-machine.js';
import { createLogger } from '../logger.js';
import { buildSummaryMessage, type SummaryEntry } from '../notifications/message-builder.js';
import { canView } from '../policy/category-policy.js';
import { toMs } from '../time.js';
import type {
  CategoryPolicyProvider,
  DestinationDirectory,
  FleetRepository,
  Logger,
  MessagingTransport,
  SummaryDestination,
} from '../types.js';

export interface SummaryPublisherConfig {
  policies: CategoryPolicyProvider;
  repository: FleetRepository;
  transport: MessagingTransport;
  directory: DestinationDirectory;
  logger?: Logger;
}

export interface PublishResult {
  destination: string;
  published: boolean;
  messageId: string | null;
  fleetCount: number;
  error?: string;
}

export class SummaryPublisher {
  private readonly logger: Logger;

  constructor(private readonly config: SummaryPublisherConfig) {
    this.logger = config.logger ?? createLogger('summary');
  }

  /**
   * Fleets shown to `destination`: same scope, viewable by its roles, not
   * cancelled or expired, announced; soonest first.
   */
  async collectEntries(destination: SummaryDestination, now: Date): Promise<SummaryEntry[]> {
    const roles = new Set(destination.roles);
    const policies = (await this.config.policies.listCategoryPolicies(destination.scopeId)).filter((p) =>
      canView(p, roles),
    );
    if (policies.length === 0) return [];

    const byId = new Map(policies.map((p) => [p.id, p]));
    const fleets = await this.config.repository.loadActiveFleets({
      scopeId: destination.scopeId,
      categoryIds: policies.map((p) => p.id),
    });

    const entries: SummaryEntry[] = [];
    for (const fleet of fleets) {
      const policy = byId.get(fleet.categoryId);
      if (policy && !isTerminal(fleet, now) && isAnnounced(fleet)) {
        entries.push({ fleet, policy });
      }
    }
    return entries.sort((a, b) => toMs(a.fleet.formUpTime) - toMs(b.fleet.formUpTime));
  }

  async publish(destination: SummaryDestination, now: Date = new Date()): Promise<PublishResult> {
    const { repository, transport } = this.config;
    const entries = await this.collectEntries(destination, now);
    const previous = await repository.loadSummaryState(destination.id);

    let messageId: string;
    try {
      messageId = await transport.sendMessage(destination.id, buildSummaryMessage(entries, now), { ping: [] });
    } catch (e) {
      // The previous summary stays live and tracked
      this.logger.warn(`Summary for ${destination.id} not posted: ${errorMessage(e)}`);
      return {
        destination: destination.id,
        published: false,
        messageId: previous?.lastSummaryMessageId ?? null,
        fleetCount: entries.length,
        error: errorMessage(e),
      };
    }

    try {
      await repository.saveSummaryState({
        destination: destination.id,
        lastSummaryMessageId: messageId,
        publishedAt: now.toISOString(),
      });
    } catch (e) {
      // An untracked summary would never be replaced; withdraw it so the tracked one stays the only one
      this.logger.error(`Summary pointer for ${destination.id} not saved, withdrawing ${messageId}: ${errorMessage(e)}`);
      await transport.deleteMessage(destination.id, messageId).catch((deleteErr: unknown) => {
        this.logger.warn(`Could not withdraw summary ${messageId} in ${destination.id}: ${errorMessage(deleteErr)}`);
      });
      throw e;
    }

    const stale = previous?.lastSummaryMessageId;
    if (stale && stale !== messageId) {
      try {
        await transport.deleteMessage(destination.id, stale);
      } catch (e) {
        this.logger.warn(`Could not delete previous summary ${stale} in ${destination.id}: ${errorMessage(e)}`);
      }
    }

    this.logger.debug?.(`Published summary ${messageId} to ${destination.id} (${entries.length} fleets)`);
    return { destination: destination.id, published: true, messageId, fleetCount: entries.length };
  }

  /**
   * One publish cycle over every configured destination. Destinations are
   * independent; one failing does not hold back the rest.
   */
  async publishAll(now: Date = new Date()): Promise<PublishResult[]> {
    const destinations = await this.config.directory.listSummaryDestinations();
    const results: PublishResult[] = [];

    for (const destination of destinations) {
      try {
        results.push(await this.publish(destination, now));
      } catch (e) {
        this.logger.error(`Summary cycle failed for ${destination.id}: ${errorMessage(e)}`);
        results.push({
          destination: destination.id,
          published: false,
          messageId: null,
          fleetCount: 0,
          error: errorMessage(e),
        });
      }
    }

    const posted = results.filter((r) => r.published).length;
    this.logger.info(`Published ${posted}/${destinations.length} summaries`);
    return results;
  }
}
