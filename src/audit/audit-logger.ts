/**
 * Audit Logger - hash-chained trail of operator actions on fleets
 *
 * JSONL, append-only. Each entry carries a SHA-256 checksum of its content
 * and the previous entry's checksum, so edits to past entries are detectable.
 *
 * @module audit/audit-logger
 */

import { createHash } from 'node:crypto';
import { existsSync } from 'node:fs';
import { appendFile, mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { errorMessage } from '../errors.js';

export type AuditAction =
  | 'fleet.proposed'
  | 'fleet.rejected'
  | 'fleet.rescheduled'
  | 'fleet.details_edited'
  | 'fleet.cancelled';

export interface AuditEntry {
  timestamp: string;
  action: AuditAction;
  /** User id of the operator, or 'system' */
  actor: string;
  fleetId: string | null;
  details: Record<string, unknown>;
  checksum: string;
  previous_checksum: string | null;
}

export interface VerificationError {
  line: number;
  type: 'chain_broken' | 'checksum_mismatch' | 'parse_error';
  message: string;
}

/** Sink for operator actions; the service records through this */
export interface AuditTrail {
  record(
    action: AuditAction,
    fleetId: string | null,
    details: Record<string, unknown>,
    actor?: string,
  ): Promise<void>;
}

export class NullAuditTrail implements AuditTrail {
  async record(): Promise<void> {
    // No-op
  }
}

export class AuditLogger implements AuditTrail {
  private lastChecksum: string | null = null;
  private initialized = false;
  private pending: Promise<void> = Promise.resolve();

  constructor(private readonly logPath: string) {}

  async initialize(): Promise<void> {
    if (this.initialized) return;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }

    if (existsSync(this.logPath)) {
      const entries = await this.readEntries();
      this.lastChecksum = entries.length > 0 ? entries[entries.length - 1].checksum : null;
    }

    this.initialized = true;
  }

  /**
   * Append an entry. Appends are chained through a promise so concurrent
   * callers cannot fork the checksum chain.
   */
  record(
    action: AuditAction,
    fleetId: string | null,
    details: Record<string, unknown>,
    actor = 'system',
  ): Promise<void> {
    const next = this.pending.then(() => this.append(action, fleetId, details, actor));
    this.pending = next.catch(() => undefined);
    return next;
  }

  private async append(
    action: AuditAction,
    fleetId: string | null,
    details: Record<string, unknown>,
    actor: string,
  ): Promise<void> {
    if (!this.initialized) {
      await this.initialize();
    }

    const partialEntry: Omit<AuditEntry, 'checksum'> = {
      timestamp: new Date().toISOString(),
      action,
      actor,
      fleetId,
      details,
      previous_checksum: this.lastChecksum,
    };
    const checksum = this.computeChecksum(partialEntry);

    await appendFile(this.logPath, JSON.stringify({ ...partialEntry, checksum }) + '\n', 'utf-8');
    this.lastChecksum = checksum;
  }

  private computeChecksum(entry: Omit<AuditEntry, 'checksum'>): string {
    // Key order is fixed by construction and preserved by JSON.parse
    return createHash('sha256').update(JSON.stringify(entry)).digest('hex');
  }

  private async readLines(): Promise<string[]> {
    if (!existsSync(this.logPath)) return [];
    const content = await readFile(this.logPath, 'utf-8');
    return content.trim().split('\n').filter(Boolean);
  }

  private async readEntries(): Promise<AuditEntry[]> {
    return (await this.readLines()).map((line) => JSON.parse(line) as AuditEntry);
  }

  /**
   * Verify the checksum chain of the whole log
   */
  async verify(): Promise<{ valid: boolean; entries: number; errors: VerificationError[] }> {
    const lines = await this.readLines();
    const errors: VerificationError[] = [];
    let previousChecksum: string | null = null;

    for (let i = 0; i < lines.length; i++) {
      let entry: AuditEntry;
      try {
        entry = JSON.parse(lines[i]) as AuditEntry;
      } catch (e) {
        errors.push({ line: i + 1, type: 'parse_error', message: `Failed to parse entry: ${errorMessage(e)}` });
        continue;
      }

      if (entry.previous_checksum !== previousChecksum) {
        errors.push({
          line: i + 1,
          type: 'chain_broken',
          message: `Chain broken: expected ${previousChecksum}, got ${entry.previous_checksum}`,
        });
      }

      const { checksum, ...rest } = entry;
      const computed = this.computeChecksum(rest);
      if (computed !== checksum) {
        errors.push({
          line: i + 1,
          type: 'checksum_mismatch',
          message: `Checksum mismatch: expected ${checksum}, computed ${computed}`,
        });
      }

      previousChecksum = checksum;
    }

    return { valid: errors.length === 0, entries: lines.length, errors };
  }

  async getRecentEntries(count = 100): Promise<AuditEntry[]> {
    const entries = await this.readEntries();
    return entries.slice(-count);
  }

  async searchByFleet(fleetId: string): Promise<AuditEntry[]> {
    const entries = await this.readEntries();
    return entries.filter((e) => e.fleetId === fleetId);
  }
}
