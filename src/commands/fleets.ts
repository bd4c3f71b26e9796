import { AuditLogger } from "../audit/audit-logger.js";
import { loadConfig, type FleetboardConfig } from "../config/loader.js";
import { ConfigError } from "../errors.js";
import { viewStatus } from "../fleet/fleet-state-machine.js";
import { createFleetboard, initializeFleetboard, type Fleetboard } from "../index.js";
import { viewableCategoryIds } from "../policy/category-policy.js";
import type { RuntimeEnv } from "../runtime.js";
import { formatCountdown, formatUtc, parseDuration } from "../time.js";
import type { Fleet, FleetDetails } from "../types.js";

// ---------------------------------------------------------------------------
// Shared
// ---------------------------------------------------------------------------

export type CommonOpts = {
  config?: string;
  json?: boolean;
};

async function openBoard(opts: CommonOpts, runtime: RuntimeEnv): Promise<Fleetboard | null> {
  try {
    const config = await loadConfig(opts.config);
    return createFleetboard(config);
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(err.message);
      runtime.exit(1);
      return null;
    }
    throw err;
  }
}

const UTC_MINUTE_RE = /^(\d{4}-\d{2}-\d{2})[ T](\d{2}:\d{2})$/;

/**
 * Accepts an ISO timestamp with zone, `YYYY-MM-DD HH:MM` (read as UTC), or
 * an offset from now such as `+2h` or `+1h30m`.
 */
export function parseFormUpTime(input: string, now: Date): Date | null {
  const trimmed = input.trim();
  if (trimmed.startsWith("+")) {
    const offset = parseDuration(trimmed.slice(1));
    return offset === null ? null : new Date(now.getTime() + offset);
  }
  const utc = UTC_MINUTE_RE.exec(trimmed);
  const parsed = Date.parse(utc ? `${utc[1]}T${utc[2]}:00Z` : trimmed);
  return Number.isNaN(parsed) ? null : new Date(parsed);
}

/** `key=value` pairs into fleet details; later keys win */
export function parseDetails(pairs: string[]): FleetDetails | null {
  const details: FleetDetails = {};
  for (const pair of pairs) {
    const eq = pair.indexOf("=");
    if (eq <= 0) return null;
    details[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return details;
}

function fleetSummary(fleet: Fleet): Record<string, unknown> {
  return {
    id: fleet.id,
    categoryId: fleet.categoryId,
    name: fleet.name,
    formUpTime: fleet.formUpTime,
    status: fleet.status,
    hidden: fleet.hidden,
    revision: fleet.revision,
  };
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

export type RunOpts = CommonOpts & {
  once?: boolean;
};

export async function fleetboardRunCommand(opts: RunOpts, runtime: RuntimeEnv): Promise<void> {
  if (opts.once) {
    const board = await openBoard(opts, runtime);
    if (!board) return;
    const report = await board.dispatcher.tick();
    const summaries = await board.publisher.publishAll();
    if (opts.json) {
      runtime.log(JSON.stringify({ dispatch: report, summaries }, null, 2));
      return;
    }
    runtime.log(
      `Dispatch: ${report.fleets} fleets, ${report.transitions} transitions, ${report.confirmed} delivered, ` +
        `${report.retrying} retrying, ${report.abandoned} abandoned`,
    );
    runtime.log(`Summaries: ${summaries.filter((s) => s.published).length}/${summaries.length} published`);
    return;
  }

  let config: FleetboardConfig;
  try {
    config = await loadConfig(opts.config);
  } catch (err) {
    if (err instanceof ConfigError) {
      runtime.error(err.message);
      runtime.exit(1);
      return;
    }
    throw err;
  }

  const { shutdown } = await initializeFleetboard(config);
  const stop = (): void => {
    runtime.log("Shutting down");
    shutdown();
  };
  process.once("SIGINT", stop);
  process.once("SIGTERM", stop);
  runtime.log(`Fleetboard running (tick ${config.tickMs}ms, summary ${config.summaryMs}ms)`);
}

// ---------------------------------------------------------------------------
// Propose
// ---------------------------------------------------------------------------

export type ProposeOpts = CommonOpts & {
  name?: string;
  fc?: string;
  hidden?: boolean;
  reminder?: boolean;
  detail?: string[];
};

export async function fleetProposeCommand(
  categoryId: string,
  when: string,
  opts: ProposeOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const now = new Date();
  const formUpTime = parseFormUpTime(when, now);
  if (!formUpTime) {
    runtime.error(`Invalid form-up time: "${when}". Use an ISO time, "YYYY-MM-DD HH:MM" (UTC) or +2h.`);
    runtime.exit(1);
    return;
  }
  const details = parseDetails(opts.detail ?? []);
  if (!details) {
    runtime.error("Details must be given as key=value.");
    runtime.exit(1);
    return;
  }

  const board = await openBoard(opts, runtime);
  if (!board) return;

  const result = await board.service.proposeFleet(categoryId, formUpTime, details, now, {
    name: opts.name,
    commanderId: opts.fc,
    hidden: opts.hidden,
    disableReminder: opts.reminder === false,
  });

  if (!result.accepted) {
    runtime.error(`Rejected (${result.reason.code}): ${result.reason.message}`);
    runtime.exit(1);
    return;
  }

  if (opts.json) {
    runtime.log(JSON.stringify(fleetSummary(result.fleet)));
    return;
  }
  runtime.log(`Scheduled ${result.fleet.name} at ${formatUtc(result.fleet.formUpTime)} UTC (${result.fleet.id})`);
}

// ---------------------------------------------------------------------------
// Reschedule
// ---------------------------------------------------------------------------

export type RescheduleOpts = CommonOpts & {
  by?: string;
};

export async function fleetRescheduleCommand(
  fleetId: string,
  when: string,
  opts: RescheduleOpts,
  runtime: RuntimeEnv,
): Promise<void> {
  const now = new Date();
  const newTime = parseFormUpTime(when, now);
  if (!newTime) {
    runtime.error(`Invalid form-up time: "${when}".`);
    runtime.exit(1);
    return;
  }

  const board = await openBoard(opts, runtime);
  if (!board) return;

  const result = await board.service.rescheduleFleet(fleetId, newTime, now, opts.by);
  if (!result.accepted) {
    runtime.error(`Rejected (${result.reason.code}): ${result.reason.message}`);
    runtime.exit(1);
    return;
  }

  if (opts.json) {
    runtime.log(JSON.stringify(fleetSummary(result.fleet)));
    return;
  }
  runtime.log(`Rescheduled ${result.fleet.name} to ${formatUtc(result.fleet.formUpTime)} UTC`);
}

// ---------------------------------------------------------------------------
// Edit
// ---------------------------------------------------------------------------

export type EditOpts = CommonOpts & {
  name?: string;
  by?: string;
  detail?: string[];
};

export async function fleetEditCommand(fleetId: string, opts: EditOpts, runtime: RuntimeEnv): Promise<void> {
  const details = parseDetails(opts.detail ?? []);
  if (!details) {
    runtime.error("Details must be given as key=value.");
    runtime.exit(1);
    return;
  }

  const board = await openBoard(opts, runtime);
  if (!board) return;

  const current = await board.repository.loadFleet(fleetId);
  const merged = { ...(current?.details ?? {}), ...details };
  const fleet = await board.service.editFleetDetails(fleetId, merged, { name: opts.name, actor: opts.by });

  if (opts.json) {
    runtime.log(JSON.stringify(fleetSummary(fleet)));
    return;
  }
  runtime.log(`Updated ${fleet.name} (revision ${fleet.revision})`);
}

// ---------------------------------------------------------------------------
// Cancel
// ---------------------------------------------------------------------------

export type CancelOpts = CommonOpts & {
  by?: string;
};

export async function fleetCancelCommand(fleetId: string, opts: CancelOpts, runtime: RuntimeEnv): Promise<void> {
  const board = await openBoard(opts, runtime);
  if (!board) return;

  const fleet = await board.service.cancelFleet(fleetId, { actor: opts.by });
  if (opts.json) {
    runtime.log(JSON.stringify(fleetSummary(fleet)));
    return;
  }
  runtime.log(`Cancelled ${fleet.name} (${formatUtc(fleet.formUpTime)} UTC)`);
}

// ---------------------------------------------------------------------------
// List
// ---------------------------------------------------------------------------

export type ListOpts = CommonOpts & {
  category?: string;
  roles?: string;
  all?: boolean;
};

export async function fleetListCommand(opts: ListOpts, runtime: RuntimeEnv): Promise<void> {
  const board = await openBoard(opts, runtime);
  if (!board) return;

  const now = new Date();
  const policies = await board.policies.listCategoryPolicies();
  let categoryIds = opts.roles
    ? viewableCategoryIds(policies, new Set(opts.roles.split(",").map((r) => r.trim()).filter(Boolean)))
    : policies.map((p) => p.id);
  if (opts.category) {
    categoryIds = categoryIds.filter((id) => id === opts.category);
  }

  const fleets = await board.service.listVisibleFleets(categoryIds, now, { includeHidden: opts.all });

  if (opts.json) {
    runtime.log(JSON.stringify(fleets.map(fleetSummary), null, 2));
    return;
  }
  if (fleets.length === 0) {
    runtime.log("No upcoming fleets.");
    return;
  }

  const names = new Map(policies.map((p) => [p.id, p.name]));
  for (const fleet of fleets) {
    runtime.log(
      `${formatUtc(fleet.formUpTime)} UTC  ${names.get(fleet.categoryId) ?? fleet.categoryId}  ${fleet.name}  ` +
        `[${viewStatus(fleet, now)}${fleet.hidden ? ", hidden" : ""}]  ${formatCountdown(fleet.formUpTime, now)}  ${fleet.id}`,
    );
  }
}

// ---------------------------------------------------------------------------
// Status
// ---------------------------------------------------------------------------

export async function fleetStatusCommand(fleetId: string, opts: CommonOpts, runtime: RuntimeEnv): Promise<void> {
  const board = await openBoard(opts, runtime);
  if (!board) return;

  const fleet = await board.repository.loadFleet(fleetId);
  if (!fleet) {
    runtime.error(`Fleet ${fleetId} not found`);
    runtime.exit(1);
    return;
  }

  if (opts.json) {
    runtime.log(JSON.stringify(fleet, null, 2));
    return;
  }

  const now = new Date();
  runtime.log(`${fleet.name} (${fleet.id})`);
  runtime.log(`  form-up:  ${formatUtc(fleet.formUpTime)} UTC, ${formatCountdown(fleet.formUpTime, now)}`);
  runtime.log(`  status:   ${viewStatus(fleet, now)}${fleet.archivedAt ? " (archived)" : ""}`);
  runtime.log(`  revision: ${fleet.revision}`);
  for (const state of fleet.notificationState) {
    runtime.log(`  #${state.destination}: ${state.messageIds.length} message(s)`);
    for (const d of state.deliveries) {
      const error = d.lastError ? ` - ${d.lastError}` : "";
      runtime.log(`    ${d.kind} ${d.status} (attempts ${d.attempts})${error}`);
    }
  }

  if (board.audit instanceof AuditLogger) {
    const history = await board.audit.searchByFleet(fleet.id);
    for (const entry of history) {
      runtime.log(`  ${entry.timestamp} ${entry.action} by ${entry.actor}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export async function auditVerifyCommand(opts: CommonOpts, runtime: RuntimeEnv): Promise<void> {
  const board = await openBoard(opts, runtime);
  if (!board) return;

  if (!(board.audit instanceof AuditLogger)) {
    runtime.log("Audit logging is disabled.");
    return;
  }

  const result = await board.audit.verify();
  if (opts.json) {
    runtime.log(JSON.stringify(result, null, 2));
  } else if (result.valid) {
    runtime.log(`Audit log intact (${result.entries} entries)`);
  } else {
    for (const error of result.errors) {
      runtime.error(`line ${error.line}: ${error.message}`);
    }
  }
  if (!result.valid) {
    runtime.exit(1);
  }
}
