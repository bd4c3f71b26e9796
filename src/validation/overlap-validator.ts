/**
 * Overlap Validator
 *
 * Decides whether a proposed form-up time is schedulable in a category.
 * Rules are evaluated in order:
 *   1. too far in advance (strictly beyond maxAdvance)
 *   2. at or before now
 *   3. closer than minSpacing to a live fleet of the same category
 *      (and, for ping groups, closer than the group cooldown to a live
 *      fleet of another category in the group)
 *
 * @module validation/overlap-validator
 */

import type { RejectionReason } from '../errors.js';
import { isExpired } from '../fleet/fleet-state-machine.js';
import { formatDuration, formatUtc, toMs } from '../time.js';
import type { CategoryPolicy, Fleet } from '../types.js';

export type ValidationResult = { accepted: true } | { accepted: false; reason: RejectionReason };

export interface ValidateOptions {
  /** Fleet being rescheduled; never conflicts with itself */
  excludeFleetId?: string;
  /** Live fleets of other categories sharing the policy's ping group */
  groupFleets?: Fleet[];
  groupCooldownMs?: number;
}

function findConflict(
  candidates: Fleet[],
  proposedMs: number,
  spacingMs: number,
  now: Date,
  excludeFleetId: string | undefined,
): { fleet: Fleet; gapMs: number } | null {
  if (spacingMs <= 0) return null;

  const live = candidates
    .filter((f) => f.id !== excludeFleetId && f.status !== 'Cancelled' && !isExpired(f, now))
    .sort((a, b) => toMs(a.formUpTime) - toMs(b.formUpTime));

  for (const fleet of live) {
    const gapMs = Math.abs(proposedMs - toMs(fleet.formUpTime));
    if (gapMs < spacingMs) {
      return { fleet, gapMs };
    }
  }
  return null;
}

function overlapReason(fleet: Fleet, gapMs: number, requiredMs: number): RejectionReason {
  return {
    code: 'Overlaps',
    fleetId: fleet.id,
    gapMs,
    requiredMs,
    message:
      `Too close to "${fleet.name}" at ${formatUtc(fleet.formUpTime)} UTC: ` +
      `fleets must be at least ${formatDuration(requiredMs)} apart (gap is ${formatDuration(gapMs)})`,
  };
}

export function validate(
  policy: CategoryPolicy,
  existingFleets: Fleet[],
  proposedFormUpTime: Date,
  now: Date,
  options: ValidateOptions = {},
): ValidationResult {
  const proposedMs = proposedFormUpTime.getTime();
  const leadMs = proposedMs - now.getTime();

  if (leadMs > policy.maxAdvanceMs) {
    return {
      accepted: false,
      reason: {
        code: 'TooFarInAdvance',
        maxAdvanceMs: policy.maxAdvanceMs,
        message: `${policy.name} fleets can be scheduled at most ${formatDuration(policy.maxAdvanceMs)} in advance`,
      },
    };
  }

  if (leadMs <= 0) {
    return {
      accepted: false,
      reason: { code: 'InPast', message: 'Form-up time must be in the future' },
    };
  }

  const sameCategory = existingFleets.filter(
    (f) => f.categoryId === policy.id && f.scopeId === policy.scopeId,
  );
  const conflict = findConflict(
    sameCategory,
    proposedMs,
    policy.minSpacingMs,
    now,
    options.excludeFleetId,
  );
  if (conflict) {
    return { accepted: false, reason: overlapReason(conflict.fleet, conflict.gapMs, policy.minSpacingMs) };
  }

  if (options.groupFleets && options.groupCooldownMs !== undefined) {
    const groupConflict = findConflict(
      options.groupFleets.filter((f) => f.scopeId === policy.scopeId && f.categoryId !== policy.id),
      proposedMs,
      options.groupCooldownMs,
      now,
      options.excludeFleetId,
    );
    if (groupConflict) {
      return {
        accepted: false,
        reason: overlapReason(groupConflict.fleet, groupConflict.gapMs, options.groupCooldownMs),
      };
    }
  }

  return { accepted: true };
}
