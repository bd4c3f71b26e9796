/**
 * Scheduler Module - Periodic tasks with resilience
 *
 * @module scheduler
 */

export {
  Scheduler,
  createFleetboardScheduler,
  type CircuitBreakerConfig,
  type FleetboardSchedule,
  type TaskDefinition,
  type SchedulerConfig,
  type TaskStatus,
  type TaskStatusReport,
} from './scheduler.js';
