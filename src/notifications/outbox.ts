/**
 * Notification Outbox - decides which deliveries a fleet needs this tick
 *
 * Pure planning over a fleet snapshot. Each destination keeps an ordered
 * list of deliveries; create/reminder/formup/cancel appear at most once per
 * destination and an update at most once per fleet revision, whatever the
 * delivery's final status.
 *
 * @module notifications/outbox
 */

import { v4 as uuidv4 } from 'uuid';
import { applyTransition, isExpired, nextTransition, type FleetTransition } from '../fleet/fleet-state-machine.js';
import type {
  CategoryPolicy,
  Delivery,
  DestinationNotificationState,
  Fleet,
  NotificationKind,
} from '../types.js';

export interface BackoffConfig {
  baseMs: number;
  maxMs: number;
}

export const DEFAULT_BACKOFF: BackoffConfig = {
  baseMs: 30 * 1000,
  maxMs: 15 * 60 * 1000,
};

/** Exponential backoff after the given number of failed attempts */
export function backoffDelay(attempts: number, config: BackoffConfig = DEFAULT_BACKOFF): number {
  const delay = config.baseMs * Math.pow(2, Math.max(0, attempts - 1));
  return Math.min(delay, config.maxMs);
}

export function newDelivery(
  kind: NotificationKind,
  revision: number,
  now: Date,
  extra: Partial<Pick<Delivery, 'rescheduledFrom'>> = {},
): Delivery {
  return {
    id: uuidv4(),
    kind,
    status: 'pending',
    revision,
    attempts: 0,
    createdAt: now.toISOString(),
    nextAttemptAt: null,
    lastError: null,
    confirmedAt: null,
    messageId: null,
    ...extra,
  };
}

export function hasDelivery(state: DestinationNotificationState, kind: NotificationKind): boolean {
  return state.deliveries.some((d) => d.kind === kind);
}

export function hasPending(state: DestinationNotificationState): boolean {
  return state.deliveries.some((d) => d.status === 'pending');
}

export function isSettled(fleet: Fleet): boolean {
  return fleet.notificationState.every((s) => !hasPending(s));
}

/** Count of deliveries of `kind` in the given status, across destinations */
export function countDeliveries(fleet: Fleet, kind: NotificationKind, status?: Delivery['status']): number {
  return fleet.notificationState.reduce(
    (sum, s) => sum + s.deliveries.filter((d) => d.kind === kind && (!status || d.status === status)).length,
    0,
  );
}

/** Form-up time the destination's messages show, when the fleet has moved since */
export function rescheduledSince(state: DestinationNotificationState, fleet: Fleet): string | undefined {
  return state.renderedFormUpTime !== null && state.renderedFormUpTime !== fleet.formUpTime
    ? state.renderedFormUpTime
    : undefined;
}

function supersedePending(state: DestinationNotificationState, keep?: NotificationKind): void {
  for (const delivery of state.deliveries) {
    if (delivery.status === 'pending' && delivery.kind !== keep) {
      delivery.status = 'superseded';
    }
  }
}

export interface NotificationPlan {
  fleet: Fleet;
  transition: FleetTransition | null;
  enqueued: Delivery[];
  archived: boolean;
  /** True when the plan changed anything that must be persisted */
  changed: boolean;
}

/**
 * Work out the next fleet state and the deliveries to enqueue at `now`.
 * The input is never mutated.
 */
export function planNotifications(fleet: Fleet, policy: CategoryPolicy, now: Date): NotificationPlan {
  let next: Fleet = structuredClone(fleet);
  const enqueued: Delivery[] = [];
  let transition: FleetTransition | null = null;
  let changed = false;

  const enqueue = (state: DestinationNotificationState, delivery: Delivery): void => {
    state.deliveries.push(delivery);
    enqueued.push(delivery);
  };

  const archive = (): boolean => {
    if (next.archivedAt !== null) return false;
    next.archivedAt = now.toISOString();
    return true;
  };

  if (next.archivedAt !== null) {
    return { fleet: next, transition, enqueued, archived: false, changed };
  }

  if (isExpired(next, now)) {
    const before = JSON.stringify(next.notificationState);
    next.notificationState.forEach((s) => supersedePending(s));
    changed = JSON.stringify(next.notificationState) !== before;
    const archived = archive();
    return { fleet: next, transition, enqueued, archived, changed: changed || archived };
  }

  if (next.status === 'Cancelled') {
    const before = JSON.stringify(next.notificationState);
    for (const state of next.notificationState) {
      supersedePending(state, 'cancel');
      if (state.messageIds.length > 0 && !hasDelivery(state, 'cancel')) {
        enqueue(state, newDelivery('cancel', next.revision, now));
      }
    }
    changed = JSON.stringify(next.notificationState) !== before;
    const archived = isSettled(next) ? archive() : false;
    return { fleet: next, transition, enqueued, archived, changed: changed || archived };
  }

  if (!next.hidden) {
    for (const state of next.notificationState) {
      if (!hasDelivery(state, 'create')) {
        enqueue(state, newDelivery('create', next.revision, now));
      }
    }
  }

  transition = nextTransition(next, policy, now);
  if (transition) {
    next = applyTransition(next, transition);
    for (const state of next.notificationState) {
      if (!hasDelivery(state, transition)) {
        enqueue(state, newDelivery(transition, next.revision, now));
      }
    }
  } else {
    for (const state of next.notificationState) {
      const stale = next.revision > state.renderedRevision;
      const alreadyQueued = state.deliveries.some((d) => d.kind === 'update' && d.revision === next.revision);
      if (stale && state.messageIds.length > 0 && !hasPending(state) && !alreadyQueued) {
        const rescheduledFrom = rescheduledSince(state, next);
        enqueue(state, newDelivery('update', next.revision, now, rescheduledFrom ? { rescheduledFrom } : {}));
      }
    }
  }

  changed = enqueued.length > 0 || transition !== null;
  return { fleet: next, transition, enqueued, archived: false, changed };
}
