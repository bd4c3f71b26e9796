/**
 * Scheduler - Periodic engine tasks with jitter and circuit breakers
 *
 * Drives the two recurring jobs: the notification dispatch tick and the
 * summary republish. A task's run never overlaps itself; a task that keeps
 * failing is parked until its breaker's reset time has passed, then run
 * once (half-open) before going back to its normal cadence.
 *
 * @module scheduler/scheduler
 */

import { errorMessage } from '../errors.js';
import { createLogger } from '../logger.js';
import { MINUTE_MS } from '../time.js';
import type { Logger } from '../types.js';

export type TaskStatus = 'idle' | 'running' | 'circuit_open';

export interface CircuitBreakerConfig {
  maxFailures: number;
  resetTimeMs: number;
}

export interface TaskDefinition {
  id: string;
  name: string;
  intervalMs: number;
  /** Each run lands within ±jitterMs of the interval; default 10% of it */
  jitterMs?: number;
  handler: () => Promise<void>;
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  /** Run as soon as the scheduler starts instead of after one interval */
  runOnStart?: boolean;
}

export interface SchedulerConfig {
  defaultJitterPercent?: number;
  defaultCircuitBreaker?: CircuitBreakerConfig;
  logger?: Logger;
}

export interface TaskStatusReport {
  id: string;
  name: string;
  status: TaskStatus;
  lastRun: string | null;
  lastSuccess: string | null;
  consecutiveFailures: number;
  nextRunAt: string | null;
}

interface TaskState {
  def: Required<Omit<TaskDefinition, 'circuitBreaker'>> & { circuitBreaker: CircuitBreakerConfig };
  status: TaskStatus;
  lastRun: Date | null;
  lastSuccess: Date | null;
  consecutiveFailures: number;
  nextRunAt: Date | null;
  timer: NodeJS.Timeout | null;
}

const DEFAULT_CIRCUIT_BREAKER: CircuitBreakerConfig = {
  maxFailures: 3,
  resetTimeMs: 5 * MINUTE_MS,
};

const MIN_DELAY_MS = 1000;

export class Scheduler {
  private readonly tasks = new Map<string, TaskState>();
  private readonly jitterPercent: number;
  private readonly breakerDefaults: CircuitBreakerConfig;
  private readonly logger: Logger;
  private running = false;

  constructor(config: SchedulerConfig = {}) {
    this.jitterPercent = config.defaultJitterPercent ?? 10;
    this.breakerDefaults = config.defaultCircuitBreaker ?? DEFAULT_CIRCUIT_BREAKER;
    this.logger = config.logger ?? createLogger('scheduler');
  }

  register(task: TaskDefinition): void {
    if (this.tasks.has(task.id)) {
      throw new Error(`Task ${task.id} is already registered`);
    }
    const jitterMs = task.jitterMs ?? Math.floor((task.intervalMs * this.jitterPercent) / 100);
    this.tasks.set(task.id, {
      def: {
        id: task.id,
        name: task.name,
        intervalMs: task.intervalMs,
        jitterMs,
        handler: task.handler,
        runOnStart: task.runOnStart ?? false,
        circuitBreaker: { ...this.breakerDefaults, ...task.circuitBreaker },
      },
      status: 'idle',
      lastRun: null,
      lastSuccess: null,
      consecutiveFailures: 0,
      nextRunAt: null,
      timer: null,
    });
    this.logger.info(`Registered task: ${task.name} (${task.intervalMs}ms ±${jitterMs}ms)`);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    for (const state of this.tasks.values()) {
      this.arm(state, state.def.runOnStart ? 0 : this.nextDelay(state));
    }
    this.logger.info(`Started with ${this.tasks.size} tasks`);
  }

  stop(): void {
    this.running = false;
    for (const state of this.tasks.values()) {
      this.disarm(state);
    }
    this.logger.info('Stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  /**
   * Run a task now, outside its cadence. Resolves false for an unknown id.
   */
  async trigger(taskId: string): Promise<boolean> {
    const state = this.tasks.get(taskId);
    if (!state) return false;
    this.disarm(state);
    await this.run(state);
    return true;
  }

  resetCircuitBreaker(taskId: string): void {
    const state = this.tasks.get(taskId);
    if (!state) return;
    state.status = 'idle';
    state.consecutiveFailures = 0;
    this.logger.info(`Reset circuit breaker for: ${state.def.name}`);
  }

  getStatus(): TaskStatusReport[] {
    return Array.from(this.tasks.values(), (state) => ({
      id: state.def.id,
      name: state.def.name,
      status: state.status,
      lastRun: state.lastRun?.toISOString() ?? null,
      lastSuccess: state.lastSuccess?.toISOString() ?? null,
      consecutiveFailures: state.consecutiveFailures,
      nextRunAt: state.nextRunAt?.toISOString() ?? null,
    }));
  }

  private nextDelay(state: TaskState): number {
    const { intervalMs, jitterMs } = state.def;
    const jitter = Math.floor(Math.random() * jitterMs * 2) - jitterMs;
    return Math.max(MIN_DELAY_MS, intervalMs + jitter);
  }

  private arm(state: TaskState, delay: number): void {
    if (!this.running) return;
    this.disarm(state);
    state.nextRunAt = new Date(Date.now() + delay);
    state.timer = setTimeout(() => {
      state.timer = null;
      state.nextRunAt = null;
      this.run(state).catch((e) => {
        this.logger.error(`${state.def.name} crashed outside its handler: ${errorMessage(e)}`);
      });
    }, delay);
  }

  private disarm(state: TaskState): void {
    if (state.timer) clearTimeout(state.timer);
    state.timer = null;
    state.nextRunAt = null;
  }

  /** Whether an open circuit has cooled down enough for a trial run */
  private readyForTrial(state: TaskState): boolean {
    if (!state.lastRun) return true;
    return Date.now() - state.lastRun.getTime() >= state.def.circuitBreaker.resetTimeMs;
  }

  private async run(state: TaskState): Promise<void> {
    const { name, handler, circuitBreaker } = state.def;
    if (state.status === 'running') return;

    if (state.status === 'circuit_open') {
      if (!this.readyForTrial(state)) {
        this.arm(state, this.nextDelay(state));
        return;
      }
      this.logger.info(`Circuit half-open for ${name}`);
    }

    state.status = 'running';
    state.lastRun = new Date();
    try {
      await handler();
      state.status = 'idle';
      state.lastSuccess = new Date();
      state.consecutiveFailures = 0;
      this.logger.debug?.(`${name} completed`);
    } catch (e) {
      state.consecutiveFailures++;
      if (state.consecutiveFailures >= circuitBreaker.maxFailures) {
        state.status = 'circuit_open';
        this.logger.error(`Circuit OPEN for ${name} after ${state.consecutiveFailures} failures: ${errorMessage(e)}`);
      } else {
        state.status = 'idle';
        this.logger.warn(`${name} failed (${state.consecutiveFailures}/${circuitBreaker.maxFailures}): ${errorMessage(e)}`);
      }
    } finally {
      this.arm(state, this.nextDelay(state));
    }
  }
}

export interface FleetboardSchedule {
  tickMs?: number;
  summaryMs?: number;
}

/**
 * Scheduler with the dispatch tick and the summary republish, both run once
 * at start.
 */
export function createFleetboardScheduler(
  handlers: {
    dispatchTick: () => Promise<void>;
    publishSummary: () => Promise<void>;
  },
  schedule: FleetboardSchedule = {},
  logger?: Logger,
): Scheduler {
  const scheduler = new Scheduler({ logger });
  const tickMs = schedule.tickMs ?? MINUTE_MS;
  const summaryMs = schedule.summaryMs ?? 30 * MINUTE_MS;

  // ±5% keeps a ping at most one tick late
  scheduler.register({
    id: 'dispatch',
    name: 'Notification Dispatch',
    intervalMs: tickMs,
    jitterMs: Math.floor(tickMs * 0.05),
    handler: handlers.dispatchTick,
    runOnStart: true,
    circuitBreaker: { maxFailures: 5, resetTimeMs: 2 * tickMs },
  });

  scheduler.register({
    id: 'summary',
    name: 'Summary Publish',
    intervalMs: summaryMs,
    jitterMs: Math.min(MINUTE_MS, Math.floor(summaryMs * 0.05)),
    handler: handlers.publishSummary,
    runOnStart: true,
  });

  return scheduler;
}
