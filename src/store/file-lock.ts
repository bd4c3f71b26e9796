/**
 * File Lock - serializes store writes across processes
 *
 * `fleetboard run` and one-shot CLI commands share the data directory, so a
 * read-check-write cycle on the store must exclude other processes, not just
 * other callers in this one. Two layers, as in the WAL locking this follows:
 *
 * 1. flock() on `<file>.lock` through fs-ext, when its native binding loads
 * 2. Otherwise an exclusively created `<file>.pid`, taken over once its
 *    owner has exited
 *
 * @module store/file-lock
 */

import { mkdir, open, readFile, unlink, type FileHandle } from 'node:fs/promises';
import { dirname } from 'node:path';
import { setTimeout as sleep } from 'node:timers/promises';
import { PersistenceError, errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import type { Logger } from '../types.js';

type Flock = (fd: number, operation: number) => Promise<void>;

// flock constants
const LOCK_EX = 2;
const LOCK_NB = 4;
const LOCK_UN = 8;

let flockBinding: Promise<Flock | null> | null = null;
let warnedNoFlock = false;

/** fs-ext is optional: a failed native build leaves the PID file layer */
function loadFlock(): Promise<Flock | null> {
  flockBinding ??= import('fs-ext').then(
    (fsExt): Flock | null => {
      if (typeof fsExt.flock !== 'function') return null;
      return (fd, operation) =>
        new Promise<void>((resolve, reject) => {
          fsExt.flock(fd, operation, (err: Error | null) => {
            if (err) reject(err);
            else resolve();
          });
        });
    },
    () => null,
  );
  return flockBinding;
}

function errnoCode(e: unknown): string | undefined {
  return e instanceof Error && 'code' in e && typeof e.code === 'string' ? e.code : undefined;
}

function isAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (e) {
    // EPERM: alive, owned by another user
    return errnoCode(e) !== 'ESRCH';
  }
}

export interface FileLockOptions {
  /** Give up with a PersistenceError after this long (default: 10s) */
  timeoutMs?: number;
  retryMs?: number;
  /** Try flock before the PID file (default: true) */
  useFlock?: boolean;
  logger?: Logger;
}

export class FileLock {
  private readonly lockPath: string;
  private readonly pidPath: string;
  private readonly timeoutMs: number;
  private readonly retryMs: number;
  private readonly useFlock: boolean;
  private readonly logger: Logger;

  constructor(target: string, options: FileLockOptions = {}) {
    this.lockPath = `${target}.lock`;
    this.pidPath = `${target}.pid`;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.retryMs = options.retryMs ?? 20;
    this.useFlock = options.useFlock ?? true;
    this.logger = options.logger ?? createLogger('store');
  }

  async runExclusive<T>(fn: () => Promise<T>): Promise<T> {
    await mkdir(dirname(this.lockPath), { recursive: true, mode: 0o700 });
    const deadline = Date.now() + this.timeoutMs;

    const flock = this.useFlock ? await loadFlock() : null;
    if (flock) {
      const handle = await this.acquireFlock(flock, deadline);
      if (handle) {
        try {
          return await fn();
        } finally {
          await this.releaseFlock(flock, handle);
        }
      }
    } else if (this.useFlock && !warnedNoFlock) {
      warnedNoFlock = true;
      this.logger.warn('flock not available (install fs-ext for kernel locking), using PID file locking');
    }

    await this.acquirePidFile(deadline);
    try {
      return await fn();
    } finally {
      await this.releasePidFile();
    }
  }

  /** Resolves null when flock is unsupported here and the PID file should be used */
  private async acquireFlock(flock: Flock, deadline: number): Promise<FileHandle | null> {
    const handle = await open(this.lockPath, 'a', 0o600);
    for (;;) {
      try {
        await flock(handle.fd, LOCK_EX | LOCK_NB);
        return handle;
      } catch (e) {
        const code = errnoCode(e);
        if (code !== 'EAGAIN' && code !== 'EWOULDBLOCK') {
          await handle.close();
          this.logger.warn(`flock failed on ${this.lockPath}, using PID file locking: ${errorMessage(e)}`);
          return null;
        }
      }
      if (Date.now() >= deadline) {
        await handle.close();
        throw this.timeout(this.lockPath);
      }
      await sleep(this.retryMs);
    }
  }

  private async releaseFlock(flock: Flock, handle: FileHandle): Promise<void> {
    try {
      await flock(handle.fd, LOCK_UN);
    } finally {
      // Closing the descriptor drops the lock even if LOCK_UN failed
      await handle.close();
    }
  }

  private async acquirePidFile(deadline: number): Promise<void> {
    for (;;) {
      try {
        const handle = await open(this.pidPath, 'wx', 0o600);
        try {
          await handle.writeFile(String(process.pid), 'utf-8');
        } finally {
          await handle.close();
        }
        return;
      } catch (e) {
        if (errnoCode(e) !== 'EEXIST') {
          throw new PersistenceError(`Failed to lock ${this.pidPath}: ${errorMessage(e)}`, e);
        }
      }

      const holder = await this.readHolder();
      if (holder !== null && !isAlive(holder)) {
        this.logger.warn(`Stale lock ${this.pidPath} from dead process ${holder}, taking over`);
        await unlink(this.pidPath).catch((e: unknown) => {
          if (errnoCode(e) !== 'ENOENT') throw e;
        });
        continue;
      }
      if (Date.now() >= deadline) {
        throw this.timeout(this.pidPath, holder);
      }
      await sleep(this.retryMs);
    }
  }

  /** PID in the lock file; null while the owner has not written it yet or it is gone */
  private async readHolder(): Promise<number | null> {
    try {
      const pid = Number.parseInt((await readFile(this.pidPath, 'utf-8')).trim(), 10);
      return Number.isNaN(pid) ? null : pid;
    } catch (e) {
      if (errnoCode(e) === 'ENOENT') return null;
      throw e;
    }
  }

  private async releasePidFile(): Promise<void> {
    try {
      await unlink(this.pidPath);
    } catch (e) {
      this.logger.error(`Failed to release lock ${this.pidPath}: ${errorMessage(e)}`);
    }
  }

  private timeout(file: string, holder: number | null = null): PersistenceError {
    const by = holder !== null ? ` (held by process ${holder})` : '';
    return new PersistenceError(`Timed out after ${this.timeoutMs}ms waiting for lock ${file}${by}`);
  }
}
