/**
 * Tests for initializeFleetboard scheduler wiring
 *
 * Covers:
 * - Init flow (store check, scheduler.start, fail-fast)
 * - Shutdown handle (idempotent, error-safe)
 */

import { beforeEach, describe, expect, it, vi } from 'vitest';

const schedulerMocks = vi.hoisted(() => ({
  start: vi.fn(),
  stop: vi.fn(),
}));

vi.mock('../scheduler/scheduler.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../scheduler/scheduler.js')>();
  return {
    ...actual,
    createFleetboardScheduler: vi.fn().mockReturnValue({
      start: schedulerMocks.start,
      stop: schedulerMocks.stop,
      getStatus: vi.fn().mockReturnValue([]),
      isRunning: vi.fn().mockReturnValue(false),
    }),
  };
});

import { NullAuditTrail } from '../audit/audit-logger.js';
import { parseConfig } from '../config/loader.js';
import { createFleetboard, initializeFleetboard } from '../index.js';
import { DiscordRestTransport, LogTransport } from '../notifications/transport.js';
import { InMemoryFleetRepository, MemoryLogger, RecordingTransport, makeFleet } from './fakes.js';

const CONFIG = parseConfig(
  `
categories:
  - { id: stratop, scopeId: scope-1, name: Strat Op, minSpacing: 2h, maxAdvance: 14d, destinations: [chan-a] }
`,
  {},
  '/srv/fleetboard',
);

describe('initializeFleetboard', () => {
  let repository: InMemoryFleetRepository;
  let logger: MemoryLogger;

  function overrides() {
    return { repository, logger, transport: new RecordingTransport(), audit: new NullAuditTrail() };
  }

  beforeEach(() => {
    schedulerMocks.start.mockReset();
    schedulerMocks.stop.mockReset();
    repository = new InMemoryFleetRepository([makeFleet()]);
    logger = new MemoryLogger();
  });

  it('starts the scheduler once the store is readable', async () => {
    const board = await initializeFleetboard(CONFIG, overrides());

    expect(schedulerMocks.start).toHaveBeenCalledTimes(1);
    expect(schedulerMocks.stop).not.toHaveBeenCalled();
    expect(logger.messages('info')).toContain('Started: 1 categories, 1 active fleets');
    expect(board.repository).toBe(repository);
  });

  it('fails fast and stops the scheduler when the store is unreadable', async () => {
    repository.failLoads = true;

    await expect(initializeFleetboard(CONFIG, overrides())).rejects.toThrow('store offline');

    expect(schedulerMocks.start).not.toHaveBeenCalled();
    expect(schedulerMocks.stop).toHaveBeenCalledTimes(1);
  });

  it('keeps the original error when the defensive stop also fails', async () => {
    repository.failLoads = true;
    schedulerMocks.stop.mockImplementation(() => {
      throw new Error('timers gone');
    });

    await expect(initializeFleetboard(CONFIG, overrides())).rejects.toThrow('store offline');
    expect(logger.messages('error')).toEqual(['Defensive scheduler.stop() failed: Error: timers gone']);
  });

  it('returns an idempotent shutdown handle', async () => {
    const { shutdown } = await initializeFleetboard(CONFIG, overrides());

    shutdown();
    shutdown();

    expect(schedulerMocks.stop).toHaveBeenCalledTimes(1);
  });

  it('logs instead of throwing when stop fails during shutdown', async () => {
    const { shutdown } = await initializeFleetboard(CONFIG, overrides());
    schedulerMocks.stop.mockImplementation(() => {
      throw new Error('timers gone');
    });

    expect(() => shutdown()).not.toThrow();
    expect(logger.messages('error')).toEqual(['scheduler.stop() failed during shutdown: Error: timers gone']);
  });
});

describe('createFleetboard', () => {
  it('logs messages when no bot token is configured', () => {
    const board = createFleetboard(CONFIG, { repository: new InMemoryFleetRepository(), logger: new MemoryLogger() });
    expect(board.transport).toBeInstanceOf(LogTransport);
  });

  it('talks to Discord when a bot token is configured', () => {
    const config = { ...CONFIG, discord: { botToken: 'test-secret' } };
    const board = createFleetboard(config, { repository: new InMemoryFleetRepository(), logger: new MemoryLogger() });
    expect(board.transport).toBeInstanceOf(DiscordRestTransport);
  });
});
