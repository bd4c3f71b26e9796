import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtemp, readFile, rm, stat, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { MemoryLogger } from '../../__tests__/fakes.js';
import { PersistenceError } from '../../errors.js';
import { silentLogger } from '../../logger.js';
import { FileLock } from '../file-lock.js';

describe('FileLock', () => {
  let tempDir: string;
  let target: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'file-lock-test-'));
    target = join(tempDir, 'fleets.json');
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  describe.each([
    { layer: 'flock when available', useFlock: true },
    { layer: 'PID file', useFlock: false },
  ])('exclusion ($layer)', ({ useFlock }) => {
    it('should hold a second holder back until the first is done', async () => {
      const first = new FileLock(target, { useFlock, logger: silentLogger });
      const second = new FileLock(target, { useFlock, logger: silentLogger });
      const events: string[] = [];
      let release: () => void = () => undefined;
      const gate = new Promise<void>((resolve) => {
        release = resolve;
      });

      const a = first.runExclusive(async () => {
        events.push('a:start');
        await gate;
        events.push('a:end');
      });
      await vi.waitFor(() => expect(events).toEqual(['a:start']));

      const b = second.runExclusive(async () => {
        events.push('b:start');
      });
      await new Promise((resolve) => setTimeout(resolve, 60));
      expect(events).toEqual(['a:start']);

      release();
      await Promise.all([a, b]);
      expect(events).toEqual(['a:start', 'a:end', 'b:start']);
    });

    it('should release the lock when the callback throws', async () => {
      const lock = new FileLock(target, { useFlock, logger: silentLogger, timeoutMs: 500 });

      await expect(
        lock.runExclusive(async () => {
          throw new Error('boom');
        }),
      ).rejects.toThrow('boom');

      expect(await lock.runExclusive(async () => 'again')).toBe('again');
    });
  });

  describe('PID file layer', () => {
    it('should record the owner while held and remove the file afterwards', async () => {
      const lock = new FileLock(target, { useFlock: false, logger: silentLogger });

      const owner = await lock.runExclusive(() => readFile(`${target}.pid`, 'utf-8'));

      expect(owner).toBe(String(process.pid));
      await expect(stat(`${target}.pid`)).rejects.toMatchObject({ code: 'ENOENT' });
    });

    it('should take over a lock left by a dead process', async () => {
      await writeFile(`${target}.pid`, '2147483646');
      const logger = new MemoryLogger();
      const lock = new FileLock(target, { useFlock: false, logger });

      expect(await lock.runExclusive(async () => 'taken')).toBe('taken');
      expect(logger.messages('warn')).toEqual([
        `Stale lock ${target}.pid from dead process 2147483646, taking over`,
      ]);
    });

    it('should time out while a live process holds the lock', async () => {
      await writeFile(`${target}.pid`, String(process.pid));
      const lock = new FileLock(target, { useFlock: false, logger: silentLogger, timeoutMs: 50, retryMs: 10 });
      const work = vi.fn(async () => undefined);

      const attempt = lock.runExclusive(work);

      await expect(attempt).rejects.toBeInstanceOf(PersistenceError);
      await expect(attempt).rejects.toThrow(
        `Timed out after 50ms waiting for lock ${target}.pid (held by process ${process.pid})`,
      );
      expect(work).not.toHaveBeenCalled();
    });
  });
});
