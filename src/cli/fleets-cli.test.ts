import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Command } from "commander";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import type { RuntimeEnv } from "../runtime.js";
import { registerFleetboardCli } from "./fleets-cli.js";

const CONFIG = `
categories:
  - { id: stratop, scopeId: scope-1, name: Strat Op, minSpacing: 2h, maxAdvance: 14d, reminderLead: 1h, destinations: [chan-a] }
`;

describe("registerFleetboardCli", () => {
  let tempDir: string;
  let configPath: string;
  const runtime: RuntimeEnv = { log: vi.fn(), error: vi.fn(), exit: vi.fn() };

  function program(): Command {
    const root = new Command().name("fleetboard").exitOverride();
    registerFleetboardCli(root, runtime);
    return root;
  }

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "fleet-cli-register-"));
    configPath = join(tempDir, "fleetboard.yaml");
    await writeFile(configPath, CONFIG);
    vi.mocked(runtime.log).mockClear();
    vi.mocked(runtime.error).mockClear();
    vi.mocked(runtime.exit).mockClear();
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
  });

  it("registers every subcommand", () => {
    expect(program().commands.map((c) => c.name())).toEqual([
      "run",
      "propose",
      "reschedule",
      "edit",
      "cancel",
      "list",
      "status",
      "audit-verify",
    ]);
  });

  it("passes the global config, repeated details and --no-reminder through", async () => {
    await program().parseAsync(
      ["-c", configPath, "propose", "stratop", "+3h", "-d", "Doctrine=Eagles", "-d", "Comms=Mumble", "--no-reminder", "--json"],
      { from: "user" },
    );
    const proposed: { id: string } = JSON.parse(vi.mocked(runtime.log).mock.calls[0][0]);

    vi.mocked(runtime.log).mockClear();
    await program().parseAsync(["-c", configPath, "status", proposed.id, "--json"], { from: "user" });
    const fleet: { details: Record<string, string>; disableReminder: boolean; reminderEligible: boolean } = JSON.parse(
      vi.mocked(runtime.log).mock.calls[0][0],
    );

    expect(fleet.details).toEqual({ Doctrine: "Eagles", Comms: "Mumble" });
    expect(fleet.disableReminder).toBe(true);
    expect(fleet.reminderEligible).toBe(false);
    expect(runtime.exit).not.toHaveBeenCalled();
  });

  it("reports command failures through the runtime", async () => {
    await program().parseAsync(["-c", configPath, "cancel", "nope"], { from: "user" });

    expect(runtime.error).toHaveBeenCalledWith("Fleet nope not found");
    expect(runtime.exit).toHaveBeenCalledWith(1);
  });
});
