/**
 * Fleet Store - JSON file persistence for fleets and summary pointers
 *
 * Storage location: `${dataDir}/fleets.json`
 *
 * Writes are atomic (temp file + rename) and serialized within the process
 * and across processes sharing the data directory. Saves use optimistic
 * versioning so a stale copy can never overwrite a newer one.
 *
 * @module store/fleet-store
 */

import * as path from 'node:path';
import { PersistenceError, errorMessage } from '../errors.js';
import type { Fleet, FleetFilter, FleetRepository, SummaryState } from '../types.js';
import { loadJsonFile, saveJsonFile } from './json-file.js';
import { FileLock, type FileLockOptions } from './file-lock.js';
import { KeyedMutex } from './keyed-mutex.js';

const STORE_FILE = 'fleets.json';
const STORE_VERSION = '1.0.0';

interface StoreFile {
  version: string;
  fleets: Record<string, Fleet>;
  summaries: Record<string, SummaryState>;
}

function isStoreFile(value: unknown): value is StoreFile {
  if (typeof value !== 'object' || value === null) return false;
  if (!('version' in value) || !('fleets' in value) || !('summaries' in value)) return false;
  return (
    typeof value.version === 'string' &&
    typeof value.fleets === 'object' &&
    value.fleets !== null &&
    typeof value.summaries === 'object' &&
    value.summaries !== null
  );
}

export function matchesFilter(fleet: Fleet, filter?: FleetFilter): boolean {
  if (!filter) return true;
  if (filter.scopeId !== undefined && fleet.scopeId !== filter.scopeId) return false;
  if (filter.categoryId !== undefined && fleet.categoryId !== filter.categoryId) return false;
  if (filter.categoryIds !== undefined && !filter.categoryIds.includes(fleet.categoryId)) return false;
  return true;
}

export class JsonFileFleetStore implements FleetRepository {
  private readonly filePath: string;
  private readonly writeLock = new KeyedMutex();
  private readonly fileLock: FileLock;

  constructor(dataDir: string, options: { lock?: FileLockOptions } = {}) {
    this.filePath = path.join(dataDir, STORE_FILE);
    this.fileLock = new FileLock(this.filePath, options.lock);
  }

  /** In-process callers queue on the mutex; other processes on the file lock */
  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    return this.writeLock.runExclusive(STORE_FILE, () => this.fileLock.runExclusive(fn));
  }

  private async read(): Promise<StoreFile> {
    let raw: unknown;
    try {
      raw = await loadJsonFile(this.filePath);
    } catch (e) {
      throw new PersistenceError(`Failed to read ${this.filePath}: ${errorMessage(e)}`, e);
    }
    if (raw === undefined) {
      return { version: STORE_VERSION, fleets: {}, summaries: {} };
    }
    if (!isStoreFile(raw)) {
      throw new PersistenceError(`Unrecognized store layout in ${this.filePath}`);
    }
    return raw;
  }

  private async write(store: StoreFile): Promise<void> {
    try {
      await saveJsonFile(this.filePath, store);
    } catch (e) {
      throw new PersistenceError(`Failed to write ${this.filePath}: ${errorMessage(e)}`, e);
    }
  }

  async loadActiveFleets(filter?: FleetFilter): Promise<Fleet[]> {
    const store = await this.read();
    return Object.values(store.fleets).filter((f) => f.archivedAt === null && matchesFilter(f, filter));
  }

  async loadFleet(id: string): Promise<Fleet | null> {
    const store = await this.read();
    return store.fleets[id] ?? null;
  }

  async saveFleet(fleet: Fleet, expectedVersion?: number): Promise<Fleet> {
    return this.exclusive(async () => {
      const store = await this.read();
      const stored = store.fleets[fleet.id];
      if (expectedVersion !== undefined && (stored?.version ?? 0) !== expectedVersion) {
        throw new PersistenceError(
          `Version conflict saving fleet ${fleet.id}: expected ${expectedVersion}, found ${stored?.version ?? 0}`,
        );
      }
      const saved: Fleet = { ...fleet, version: (stored?.version ?? 0) + 1 };
      store.fleets[fleet.id] = saved;
      await this.write(store);
      return saved;
    });
  }

  async loadSummaryState(destination: string): Promise<SummaryState | null> {
    const store = await this.read();
    return store.summaries[destination] ?? null;
  }

  async saveSummaryState(state: SummaryState): Promise<void> {
    await this.exclusive(async () => {
      const store = await this.read();
      store.summaries[state.destination] = state;
      await this.write(store);
    });
  }
}
