import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { describeCommandError, runCommandWithRuntime } from "../cli/cli-utils.js";
import { InvariantViolation, NotFoundError, PersistenceError } from "../errors.js";
import type { RuntimeEnv } from "../runtime.js";
import {
  auditVerifyCommand,
  fleetCancelCommand,
  fleetEditCommand,
  fleetListCommand,
  fleetProposeCommand,
  fleetRescheduleCommand,
  fleetStatusCommand,
  fleetboardRunCommand,
  parseDetails,
  parseFormUpTime,
  type ProposeOpts,
} from "./fleets.js";

const CONFIG = `
dataDir: ./data
categories:
  - id: stratop
    scopeId: scope-1
    name: Strat Op
    minSpacing: 2h
    maxAdvance: 14d
    reminderLead: 1h
    managerRoles: [role-lead]
    pingRoles: [role-pilots]
    destinations: [chan-a]
  - id: covert
    scopeId: scope-1
    name: Black Ops
    minSpacing: 0
    maxAdvance: 14d
    viewerRoles: [role-spy]
    destinations: [chan-b]
summaries:
  - channel: chan-s
    scopeId: scope-1
`;

const runtime: RuntimeEnv = {
  log: vi.fn(),
  error: vi.fn(),
  exit: vi.fn(),
};

function logged(): string[] {
  return vi.mocked(runtime.log).mock.calls.map((call) => call[0]);
}

function errors(): string[] {
  return vi.mocked(runtime.error).mock.calls.map((call) => call[0]);
}

const SCHEDULED_RE = /^Scheduled (.+) at \d{4}-\d{2}-\d{2} \d{2}:\d{2} UTC \(([0-9a-f-]{36})\)$/;

let tempDir: string;
let opts: { config: string };

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), "fleet-cli-test-"));
  opts = { config: join(tempDir, "fleetboard.yaml") };
  await writeFile(opts.config, CONFIG);
  vi.mocked(runtime.log).mockClear();
  vi.mocked(runtime.error).mockClear();
  vi.mocked(runtime.exit).mockClear();
  // The engine's own loggers write to the console
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tempDir, { recursive: true, force: true });
});

async function propose(when: string, extra: Omit<ProposeOpts, "config"> = {}): Promise<string> {
  vi.mocked(runtime.log).mockClear();
  await fleetProposeCommand("stratop", when, { ...opts, ...extra }, runtime);
  const match = SCHEDULED_RE.exec(logged()[0] ?? "");
  if (!match) throw new Error(`proposal failed: ${errors().join("; ")}`);
  vi.mocked(runtime.log).mockClear();
  return match[2];
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

describe("parseFormUpTime", () => {
  const now = new Date("2026-03-01T12:00:00.000Z");

  it("accepts offsets, UTC minutes and ISO times", () => {
    expect(parseFormUpTime("+2h", now)?.toISOString()).toBe("2026-03-01T14:00:00.000Z");
    expect(parseFormUpTime("+1h30m", now)?.toISOString()).toBe("2026-03-01T13:30:00.000Z");
    expect(parseFormUpTime("2026-03-02 18:30", now)?.toISOString()).toBe("2026-03-02T18:30:00.000Z");
    expect(parseFormUpTime("2026-03-02T18:30:00+02:00", now)?.toISOString()).toBe("2026-03-02T16:30:00.000Z");
  });

  it("rejects anything else", () => {
    expect(parseFormUpTime("tomorrow", now)).toBeNull();
    expect(parseFormUpTime("+soon", now)).toBeNull();
  });
});

describe("parseDetails", () => {
  it("reads key=value pairs", () => {
    expect(parseDetails(["Doctrine=Eagles", "Comms = Mumble "])).toEqual({ Doctrine: "Eagles", Comms: "Mumble" });
    expect(parseDetails(["Staging=Jita=4-4"])).toEqual({ Staging: "Jita=4-4" });
  });

  it("rejects pairs without a key", () => {
    expect(parseDetails(["=Eagles"])).toBeNull();
    expect(parseDetails(["Doctrine"])).toBeNull();
  });
});

// ---------------------------------------------------------------------------
// Commands
// ---------------------------------------------------------------------------

describe("fleetProposeCommand", () => {
  it("schedules a fleet", async () => {
    await fleetProposeCommand("stratop", "+3h", { ...opts, name: "Op Alpha", fc: "user-fc" }, runtime);

    expect(runtime.exit).not.toHaveBeenCalled();
    expect(logged()).toHaveLength(1);
    expect(SCHEDULED_RE.exec(logged()[0])?.[1]).toBe("Op Alpha");
  });

  it("reports a rejected proposal", async () => {
    await propose("+3h");

    await fleetProposeCommand("stratop", "+4h", opts, runtime);

    expect(errors()).toHaveLength(1);
    expect(errors()[0]).toMatch(/^Rejected \(Overlaps\): /);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("refuses an unreadable time", async () => {
    await fleetProposeCommand("stratop", "whenever", opts, runtime);

    expect(errors()).toEqual([
      'Invalid form-up time: "whenever". Use an ISO time, "YYYY-MM-DD HH:MM" (UTC) or +2h.',
    ]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("refuses malformed details", async () => {
    await fleetProposeCommand("stratop", "+3h", { ...opts, detail: ["oops"] }, runtime);

    expect(errors()).toEqual(["Details must be given as key=value."]);
  });

  it("reports a missing config file", async () => {
    const missing = join(tempDir, "absent.yaml");
    await fleetProposeCommand("stratop", "+3h", { config: missing }, runtime);

    expect(errors()).toEqual([`Config file not found: ${missing}`]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});

describe("fleetListCommand", () => {
  it("says when nothing is scheduled", async () => {
    await fleetListCommand(opts, runtime);
    expect(logged()).toEqual(["No upcoming fleets."]);
  });

  it("lists fleets the given roles may view", async () => {
    const id = await propose("+3h", { name: "Op Alpha" });
    await fleetProposeCommand("covert", "+5h", { ...opts, name: "Quiet One" }, runtime);
    vi.mocked(runtime.log).mockClear();

    await fleetListCommand({ ...opts, roles: "role-pilots" }, runtime);

    expect(logged()).toHaveLength(1);
    expect(logged()[0]).toMatch(/ UTC {2}Strat Op {2}Op Alpha {2}\[Scheduled\] {2}In [23] hours {2}/);
    expect(logged()[0].endsWith(id)).toBe(true);

    vi.mocked(runtime.log).mockClear();
    await fleetListCommand({ ...opts, roles: "role-spy", json: true }, runtime);
    const listed: Array<{ name: string }> = JSON.parse(logged()[0]);
    expect(listed.map((f) => f.name)).toEqual(["Op Alpha", "Quiet One"]);
  });

  it("shows hidden fleets only with --all", async () => {
    await propose("+3h", { name: "Surprise", hidden: true });

    await fleetListCommand(opts, runtime);
    expect(logged()).toEqual(["No upcoming fleets."]);

    vi.mocked(runtime.log).mockClear();
    await fleetListCommand({ ...opts, all: true }, runtime);
    expect(logged()[0]).toContain("[Scheduled, hidden]");
  });
});

describe("fleet lifecycle commands", () => {
  it("reschedules, edits and cancels a fleet", async () => {
    const id = await propose("+3h", { name: "Op Alpha", detail: ["Doctrine=Eagles"] });

    await fleetRescheduleCommand(id, "+6h", { ...opts, by: "user-lead" }, runtime);
    expect(logged()[0]).toMatch(/^Rescheduled Op Alpha to \d{4}-\d{2}-\d{2} \d{2}:\d{2} UTC$/);

    vi.mocked(runtime.log).mockClear();
    await fleetEditCommand(id, { ...opts, detail: ["Comms=Mumble"], json: true }, runtime);
    const edited: { revision: number } = JSON.parse(logged()[0]);
    expect(edited.revision).toBe(2);

    vi.mocked(runtime.log).mockClear();
    await fleetStatusCommand(id, { ...opts, json: true }, runtime);
    const status: { details: Record<string, string> } = JSON.parse(logged()[0]);
    expect(status.details).toEqual({ Doctrine: "Eagles", Comms: "Mumble" });

    vi.mocked(runtime.log).mockClear();
    await fleetCancelCommand(id, { ...opts, by: "user-lead" }, runtime);
    expect(logged()[0]).toMatch(/^Cancelled Op Alpha \(\d{4}-\d{2}-\d{2} \d{2}:\d{2} UTC\)$/);

    vi.mocked(runtime.log).mockClear();
    await fleetListCommand(opts, runtime);
    expect(logged()).toEqual(["No upcoming fleets."]);
  });

  it("prints the audit history in the status view", async () => {
    const id = await propose("+3h", { fc: "user-fc" });

    await fleetStatusCommand(id, opts, runtime);

    const lines = logged();
    expect(lines[0]).toBe(`Strat Op (${id})`);
    expect(lines).toContain("  status:   Scheduled");
    expect(lines).toContain("  #chan-a: 0 message(s)");
    expect(lines[lines.length - 1]).toMatch(/ fleet\.proposed by user-fc$/);
  });

  it("reports an unknown fleet", async () => {
    await fleetStatusCommand("nope", opts, runtime);

    expect(errors()).toEqual(["Fleet nope not found"]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});

describe("fleetboardRunCommand --once", () => {
  it("runs one dispatch pass and one summary cycle", async () => {
    await propose("+3h");

    await fleetboardRunCommand({ ...opts, once: true }, runtime);

    expect(logged()).toEqual([
      "Dispatch: 1 fleets, 0 transitions, 1 delivered, 0 retrying, 0 abandoned",
      "Summaries: 1/1 published",
    ]);
  });
});

describe("auditVerifyCommand", () => {
  it("confirms an intact log", async () => {
    await propose("+3h");
    await auditVerifyCommand(opts, runtime);

    expect(logged()).toEqual(["Audit log intact (1 entries)"]);
    expect(runtime.exit).not.toHaveBeenCalled();
  });

  it("flags a tampered log", async () => {
    await propose("+3h");
    await writeFile(join(tempDir, "data", "audit.log"), '{"broken": true}\n');

    await auditVerifyCommand(opts, runtime);

    expect(errors().length).toBeGreaterThan(0);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

describe("runCommandWithRuntime", () => {
  it("turns engine errors into messages and a non-zero exit", async () => {
    await runCommandWithRuntime(runtime, () => fleetCancelCommand("nope", opts, runtime));

    expect(errors()).toEqual(["Fleet nope not found"]);
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });

  it("describes each error kind", () => {
    expect(describeCommandError(new PersistenceError("disk full"))).toBe(
      "Scheduling temporarily unavailable: disk full",
    );
    expect(describeCommandError(new NotFoundError("category", "x"))).toBe("Category x not found");
    expect(describeCommandError(new InvariantViolation("Fleet f is already Cancelled"))).toBe(
      "Not allowed: Fleet f is already Cancelled",
    );
    expect(describeCommandError("weird")).toBe("Unexpected error: weird");
  });
});
