/**
 * Fleet Service - the operations the rest of the system calls
 *
 * propose / reschedule / edit / cancel / list. Every mutation runs under the
 * fleet's lock (shared with the dispatcher) and, where the overlap rules are
 * involved, under the category (or ping group) lock first, so two concurrent
 * proposals cannot both pass the spacing check. Lock order is always
 * category → fleet.
 *
 * @module fleet/fleet-service
 */

import { v4 as uuidv4 } from 'uuid';
import { type AuditAction, type AuditTrail, NullAuditTrail } from '../audit/audit-logger.js';
import { InvariantViolation, NotFoundError, errorMessage, type RejectionReason } from '../errors.js';
import { createLogger } from '../logger.js';
import { KeyedMutex } from '../store/keyed-mutex.js';
import { toMs } from '../time.js';
import type {
  CategoryPolicy,
  CategoryPolicyProvider,
  DestinationNotificationState,
  Fleet,
  FleetDetails,
  FleetRepository,
  Logger,
} from '../types.js';
import { validate, type ValidateOptions } from '../validation/overlap-validator.js';
import {
  cancel,
  computeReminderEligible,
  editDetails,
  isTerminal,
  reschedule,
} from './fleet-state-machine.js';

export type ProposeResult = { accepted: true; fleet: Fleet } | { accepted: false; reason: RejectionReason };

export type RescheduleResult = ProposeResult;

export interface ProposeOptions {
  name?: string;
  commanderId?: string;
  hidden?: boolean;
  disableReminder?: boolean;
}

export interface ListOptions {
  /** Include hidden fleets that have not been announced yet (managers) */
  includeHidden?: boolean;
}

export interface FleetServiceDeps {
  policies: CategoryPolicyProvider;
  repository: FleetRepository;
  locks?: KeyedMutex;
  audit?: AuditTrail;
  logger?: Logger;
}

export function fleetLockKey(fleetId: string): string {
  return `fleet:${fleetId}`;
}

function categoryLockKey(policy: CategoryPolicy): string {
  return policy.pingGroupId ? `group:${policy.scopeId}:${policy.pingGroupId}` : `category:${policy.id}`;
}

/** A hidden fleet is announced once its first ping has fired */
export function isAnnounced(fleet: Fleet): boolean {
  return !fleet.hidden || fleet.status !== 'Scheduled';
}

function emptyNotificationState(destination: string): DestinationNotificationState {
  return {
    destination,
    messageIds: [],
    renderedRevision: 0,
    renderedFormUpTime: null,
    deliveries: [],
  };
}

function sameDetails(a: FleetDetails, b: FleetDetails): boolean {
  const aKeys = Object.keys(a);
  return aKeys.length === Object.keys(b).length && aKeys.every((k) => a[k] === b[k]);
}

export class FleetService {
  private readonly policies: CategoryPolicyProvider;
  private readonly repository: FleetRepository;
  private readonly locks: KeyedMutex;
  private readonly audit: AuditTrail;
  private readonly logger: Logger;

  constructor(deps: FleetServiceDeps) {
    this.policies = deps.policies;
    this.repository = deps.repository;
    this.locks = deps.locks ?? new KeyedMutex();
    this.audit = deps.audit ?? new NullAuditTrail();
    this.logger = deps.logger ?? createLogger('fleet-service');
  }

  private async requirePolicy(categoryId: string): Promise<CategoryPolicy> {
    const policy = await this.policies.getCategoryPolicy(categoryId);
    if (!policy) {
      throw new NotFoundError('category', categoryId);
    }
    return policy;
  }

  private async requireFleet(fleetId: string): Promise<Fleet> {
    const fleet = await this.repository.loadFleet(fleetId);
    if (!fleet) {
      throw new NotFoundError('fleet', fleetId);
    }
    return fleet;
  }

  /**
   * Live fleets the validator must consider for `policy`: its own category,
   * plus the other categories of its ping group when it belongs to one.
   */
  private async loadValidationContext(
    policy: CategoryPolicy,
  ): Promise<{ existing: Fleet[]; options: ValidateOptions }> {
    const existing = await this.repository.loadActiveFleets({ categoryId: policy.id });
    if (!policy.pingGroupId) {
      return { existing, options: {} };
    }

    const group = await this.policies.getPingGroup(policy.pingGroupId);
    if (!group) {
      this.logger.warn(`Ping group ${policy.pingGroupId} of category ${policy.id} not found, ignoring`);
      return { existing, options: {} };
    }

    const groupCategoryIds = (await this.policies.listCategoryPolicies(policy.scopeId))
      .filter((c) => c.pingGroupId === policy.pingGroupId && c.id !== policy.id)
      .map((c) => c.id);
    const groupFleets =
      groupCategoryIds.length > 0
        ? await this.repository.loadActiveFleets({ scopeId: policy.scopeId, categoryIds: groupCategoryIds })
        : [];

    return { existing, options: { groupFleets, groupCooldownMs: group.cooldownMs } };
  }

  /**
   * Append to the audit trail after the change is committed. A failed append
   * is logged, never thrown: the caller must not see a saved fleet as failed.
   */
  private async recordAudit(
    action: AuditAction,
    fleetId: string | null,
    details: Record<string, unknown>,
    actor?: string,
  ): Promise<void> {
    try {
      await this.audit.record(action, fleetId, details, actor);
    } catch (e) {
      this.logger.error(`Audit ${action} for fleet ${fleetId ?? '-'} not recorded: ${errorMessage(e)}`);
    }
  }

  /** Run `fn`, logging contract failures loudly before they propagate */
  private async guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (e instanceof InvariantViolation) {
        this.logger.error(`INVARIANT VIOLATION during ${operation}: ${e.message}`);
      }
      throw e;
    }
  }

  async proposeFleet(
    categoryId: string,
    formUpTime: Date,
    details: FleetDetails,
    now: Date,
    options: ProposeOptions = {},
  ): Promise<ProposeResult> {
    const policy = await this.requirePolicy(categoryId);

    return this.locks.runExclusive(categoryLockKey(policy), async () => {
      const { existing, options: validateOptions } = await this.loadValidationContext(policy);
      const result = validate(policy, existing, formUpTime, now, validateOptions);

      if (!result.accepted) {
        this.logger.info(`Rejected ${policy.name} fleet at ${formUpTime.toISOString()}: ${result.reason.code}`);
        await this.recordAudit(
          'fleet.rejected',
          null,
          { categoryId, formUpTime: formUpTime.toISOString(), reason: result.reason.code },
          options.commanderId,
        );
        return result;
      }

      const formUpIso = formUpTime.toISOString();
      const disableReminder = options.disableReminder ?? false;
      const fleet: Fleet = {
        id: uuidv4(),
        scopeId: policy.scopeId,
        categoryId: policy.id,
        name: options.name ?? policy.name,
        commanderId: options.commanderId ?? 'system',
        formUpTime: formUpIso,
        status: 'Scheduled',
        details: { ...details },
        hidden: options.hidden ?? false,
        disableReminder,
        reminderEligible: computeReminderEligible(policy, formUpIso, disableReminder, now),
        revision: 0,
        version: 0,
        createdAt: now.toISOString(),
        cancelledAt: null,
        cancelledBy: null,
        archivedAt: null,
        destinations: [...policy.destinations],
        notificationState: policy.destinations.map(emptyNotificationState),
      };

      const saved = await this.repository.saveFleet(fleet, 0);
      this.logger.info(`Scheduled fleet ${saved.id} (${policy.name}) at ${formUpIso}`);
      await this.recordAudit(
        'fleet.proposed',
        saved.id,
        { categoryId, formUpTime: formUpIso, hidden: saved.hidden },
        saved.commanderId,
      );
      return { accepted: true, fleet: saved };
    });
  }

  async rescheduleFleet(
    fleetId: string,
    newTime: Date,
    now: Date,
    actor?: string,
  ): Promise<RescheduleResult> {
    const initial = await this.requireFleet(fleetId);
    const policy = await this.requirePolicy(initial.categoryId);

    return this.guarded('reschedule', () =>
      this.locks.runExclusive(categoryLockKey(policy), () =>
        this.locks.runExclusive(fleetLockKey(fleetId), async () => {
          const fleet = await this.requireFleet(fleetId);
          if (isTerminal(fleet, now)) {
            throw new InvariantViolation(`Cannot reschedule inert fleet ${fleet.id}`, fleet.id);
          }

          const { existing, options } = await this.loadValidationContext(policy);
          const result = validate(policy, existing, newTime, now, { ...options, excludeFleetId: fleet.id });
          if (!result.accepted) {
            return result;
          }

          const previous = fleet.formUpTime;
          const saved = await this.repository.saveFleet(reschedule(fleet, policy, newTime, now), fleet.version);
          this.logger.info(`Rescheduled fleet ${fleet.id} from ${previous} to ${saved.formUpTime}`);
          await this.recordAudit('fleet.rescheduled', fleet.id, { from: previous, to: saved.formUpTime }, actor);
          return { accepted: true, fleet: saved };
        }),
      ),
    );
  }

  /**
   * Replace the fleet's descriptive fields (and optionally its name).
   * Never changes status; identical content is not a new revision.
   */
  async editFleetDetails(
    fleetId: string,
    details: FleetDetails,
    options: { name?: string; actor?: string; now?: Date } = {},
  ): Promise<Fleet> {
    const now = options.now ?? new Date();
    return this.guarded('edit', () =>
      this.locks.runExclusive(fleetLockKey(fleetId), async () => {
        const fleet = await this.requireFleet(fleetId);
        if (sameDetails(fleet.details, details) && (options.name === undefined || options.name === fleet.name)) {
          return fleet;
        }

        const saved = await this.repository.saveFleet(
          editDetails(fleet, { details, name: options.name }, now),
          fleet.version,
        );
        await this.recordAudit('fleet.details_edited', fleet.id, { revision: saved.revision }, options.actor);
        return saved;
      }),
    );
  }

  async cancelFleet(fleetId: string, options: { actor?: string; now?: Date } = {}): Promise<Fleet> {
    const now = options.now ?? new Date();
    return this.guarded('cancel', () =>
      this.locks.runExclusive(fleetLockKey(fleetId), async () => {
        const fleet = await this.requireFleet(fleetId);
        const saved = await this.repository.saveFleet(cancel(fleet, now, options.actor ?? null), fleet.version);
        this.logger.info(`Cancelled fleet ${fleet.id}`);
        await this.recordAudit('fleet.cancelled', fleet.id, { formUpTime: fleet.formUpTime }, options.actor);
        return saved;
      }),
    );
  }

  /**
   * Fleets in the given categories that are neither cancelled nor expired,
   * ordered by form-up time.
   */
  async listVisibleFleets(categoryIds: string[], now: Date, options: ListOptions = {}): Promise<Fleet[]> {
    if (categoryIds.length === 0) return [];
    const fleets = await this.repository.loadActiveFleets({ categoryIds });
    return fleets
      .filter((f) => !isTerminal(f, now) && (options.includeHidden || isAnnounced(f)))
      .sort((a, b) => toMs(a.formUpTime) - toMs(b.formUpTime));
  }
}
