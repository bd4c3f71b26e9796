/**
 * Fleet State Machine
 *
 * Valid transitions:
 * - Scheduled → ReminderSent (reminder lead crossed, reminder applies)
 * - Scheduled | ReminderSent → FormingUp (form-up time reached)
 * - Scheduled | ReminderSent | FormingUp → Cancelled (operator action)
 *
 * Expired is a view state: not cancelled and form-up more than an hour ago.
 * Functions here never mutate their input; they return the next fleet.
 *
 * @module fleet/fleet-state-machine
 */

import { InvariantViolation } from '../errors.js';
import { EXPIRY_GRACE_MS, toMs } from '../time.js';
import type { CategoryPolicy, Fleet, FleetDetails, FleetStatus, FleetViewStatus } from '../types.js';

export type FleetTransition = 'reminder' | 'formup';

const LEGAL_TRANSITIONS: Record<FleetStatus, readonly FleetStatus[]> = {
  Scheduled: ['ReminderSent', 'FormingUp', 'Cancelled'],
  ReminderSent: ['FormingUp', 'Cancelled'],
  FormingUp: ['Cancelled'],
  Cancelled: [],
};

const TRANSITION_TARGET: Record<FleetTransition, FleetStatus> = {
  reminder: 'ReminderSent',
  formup: 'FormingUp',
};

export function isExpired(fleet: Pick<Fleet, 'status' | 'formUpTime'>, now: Date): boolean {
  return fleet.status !== 'Cancelled' && now.getTime() - toMs(fleet.formUpTime) > EXPIRY_GRACE_MS;
}

/** Cancelled or expired fleets take no further transitions or notifications */
export function isTerminal(fleet: Pick<Fleet, 'status' | 'formUpTime'>, now: Date): boolean {
  return fleet.status === 'Cancelled' || isExpired(fleet, now);
}

export function viewStatus(fleet: Fleet, now: Date): FleetViewStatus {
  return isExpired(fleet, now) ? 'Expired' : fleet.status;
}

export function canTransition(from: FleetStatus, to: FleetStatus): boolean {
  return LEGAL_TRANSITIONS[from].includes(to);
}

/**
 * Whether a reminder applies to a fleet forming up at `formUpTime` when
 * evaluated at `at` (creation, or a reschedule before the reminder fired).
 */
export function computeReminderEligible(
  policy: CategoryPolicy,
  formUpTime: string,
  disableReminder: boolean,
  at: Date,
): boolean {
  if (policy.reminderLeadMs === undefined || disableReminder) return false;
  return policy.reminderLeadMs < toMs(formUpTime) - at.getTime();
}

/**
 * The transition due at `now`, if any. When form-up and reminder are both
 * due, only form-up fires and ReminderSent is skipped.
 */
export function nextTransition(
  fleet: Fleet,
  policy: CategoryPolicy,
  now: Date,
): FleetTransition | null {
  if (isTerminal(fleet, now)) return null;

  const formUpMs = toMs(fleet.formUpTime);
  const nowMs = now.getTime();

  if (nowMs >= formUpMs && fleet.status !== 'FormingUp') {
    return 'formup';
  }

  if (
    fleet.status === 'Scheduled' &&
    fleet.reminderEligible &&
    policy.reminderLeadMs !== undefined &&
    nowMs >= formUpMs - policy.reminderLeadMs
  ) {
    return 'reminder';
  }

  return null;
}

export function applyTransition(fleet: Fleet, transition: FleetTransition): Fleet {
  const target = TRANSITION_TARGET[transition];
  if (!canTransition(fleet.status, target)) {
    throw new InvariantViolation(
      `Illegal transition ${fleet.status} → ${target} for fleet ${fleet.id}`,
      fleet.id,
    );
  }
  return { ...fleet, status: target };
}

export function cancel(fleet: Fleet, now: Date, cancelledBy: string | null = null): Fleet {
  if (!canTransition(fleet.status, 'Cancelled') || isExpired(fleet, now)) {
    throw new InvariantViolation(`Fleet ${fleet.id} is already ${viewStatus(fleet, now)}`, fleet.id);
  }
  return {
    ...fleet,
    status: 'Cancelled',
    cancelledAt: now.toISOString(),
    cancelledBy,
  };
}

/**
 * Move the form-up time. A reminder already sent is never re-sent; an
 * unsent reminder is re-evaluated against the new time, so a later trigger
 * point simply fires later.
 */
export function reschedule(fleet: Fleet, policy: CategoryPolicy, newTime: Date, now: Date): Fleet {
  if (isTerminal(fleet, now)) {
    throw new InvariantViolation(`Cannot reschedule ${viewStatus(fleet, now)} fleet ${fleet.id}`, fleet.id);
  }
  const formUpTime = newTime.toISOString();
  const reminderEligible =
    fleet.status === 'Scheduled'
      ? computeReminderEligible(policy, formUpTime, fleet.disableReminder, now)
      : fleet.reminderEligible;
  // Status never moves backwards: a fleet already forming up is not pinged again
  return {
    ...fleet,
    formUpTime,
    reminderEligible,
    revision: fleet.revision + 1,
  };
}

export function editDetails(
  fleet: Fleet,
  changes: { details?: FleetDetails; name?: string },
  now: Date,
): Fleet {
  if (isTerminal(fleet, now)) {
    throw new InvariantViolation(`Cannot edit ${viewStatus(fleet, now)} fleet ${fleet.id}`, fleet.id);
  }
  return {
    ...fleet,
    name: changes.name ?? fleet.name,
    details: changes.details ? { ...changes.details } : fleet.details,
    revision: fleet.revision + 1,
  };
}
