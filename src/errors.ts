/**
 * Error taxonomy for the scheduling engine.
 *
 * @module errors
 */

export type RejectionReason =
  | { code: 'TooFarInAdvance'; maxAdvanceMs: number; message: string }
  | { code: 'InPast'; message: string }
  | { code: 'Overlaps'; fleetId: string; gapMs: number; requiredMs: number; message: string };

/**
 * A proposal or reschedule was refused. Always recoverable; nothing is mutated.
 */
export class ValidationError extends Error {
  constructor(public readonly reason: RejectionReason) {
    super(reason.message);
    this.name = 'ValidationError';
  }
}

/**
 * The messaging transport refused or failed a send/edit/delete.
 * Retryable failures are retried on a later tick.
 */
export class DeliveryError extends Error {
  constructor(
    message: string,
    public readonly retryable: boolean = true,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'DeliveryError';
  }
}

/**
 * Storage read or write failed. Fatal for the current operation.
 */
export class PersistenceError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'PersistenceError';
  }
}

/**
 * A programming-contract failure such as transitioning a cancelled fleet.
 */
export class InvariantViolation extends Error {
  constructor(
    message: string,
    public readonly fleetId?: string,
  ) {
    super(message);
    this.name = 'InvariantViolation';
  }
}

export class NotFoundError extends Error {
  constructor(
    public readonly entity: 'fleet' | 'category',
    public readonly id: string,
  ) {
    super(`${entity === 'fleet' ? 'Fleet' : 'Category'} ${id} not found`);
    this.name = 'NotFoundError';
  }
}

/**
 * Configuration file missing, unparseable or failing the schema.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join('\n  - ')}` : message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
