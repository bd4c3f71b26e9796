export {
  FleetService,
  fleetLockKey,
  isAnnounced,
  type FleetServiceDeps,
  type ListOptions,
  type ProposeOptions,
  type ProposeResult,
  type RescheduleResult,
} from './fleet-service.js';
export {
  applyTransition,
  canTransition,
  cancel,
  computeReminderEligible,
  editDetails,
  isExpired,
  isTerminal,
  nextTransition,
  reschedule,
  viewStatus,
  type FleetTransition,
} from './fleet-state-machine.js';
