import type { Command } from "commander";
import {
  auditVerifyCommand,
  fleetCancelCommand,
  fleetEditCommand,
  fleetListCommand,
  fleetProposeCommand,
  fleetRescheduleCommand,
  fleetStatusCommand,
  fleetboardRunCommand,
  type CancelOpts,
  type CommonOpts,
  type EditOpts,
  type ListOpts,
  type ProposeOpts,
  type RescheduleOpts,
  type RunOpts,
} from "../commands/fleets.js";
import { defaultRuntime, type RuntimeEnv } from "../runtime.js";
import { runCommandWithRuntime } from "./cli-utils.js";

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

export function registerFleetboardCli(program: Command, runtime: RuntimeEnv = defaultRuntime) {
  program.option("-c, --config <path>", "Config file (default: $FLEETBOARD_CONFIG or ./fleetboard.yaml)");

  const withGlobals = <T extends CommonOpts>(opts: T): T => ({ ...program.opts<CommonOpts>(), ...opts });

  program
    .command("run")
    .description("Run the dispatcher and summary publisher until interrupted")
    .option("--once", "Run a single dispatch tick and summary cycle, then exit", false)
    .option("--json", "Output JSON", false)
    .action(async (opts: RunOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetboardRunCommand(withGlobals(opts), runtime);
      });
    });

  program
    .command("propose")
    .description("Propose a fleet in a category")
    .argument("<category>", "Category id")
    .argument("<formUp>", 'Form-up time: ISO, "YYYY-MM-DD HH:MM" (UTC) or +2h')
    .option("--name <name>", "Fleet name (default: category name)")
    .option("--fc <userId>", "Fleet commander user id")
    .option("--hidden", "Skip the creation ping", false)
    .option("--no-reminder", "Never send a reminder for this fleet")
    .option("-d, --detail <key=value>", "Descriptive field (repeatable)", collect, [])
    .option("--json", "Output JSON", false)
    .action(async (category: string, formUp: string, opts: ProposeOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetProposeCommand(category, formUp, withGlobals(opts), runtime);
      });
    });

  program
    .command("reschedule")
    .description("Move a fleet to a new form-up time")
    .argument("<fleetId>", "Fleet id")
    .argument("<formUp>", "New form-up time")
    .option("--by <userId>", "Acting user id")
    .option("--json", "Output JSON", false)
    .action(async (fleetId: string, formUp: string, opts: RescheduleOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetRescheduleCommand(fleetId, formUp, withGlobals(opts), runtime);
      });
    });

  program
    .command("edit")
    .description("Change a fleet's name or descriptive fields")
    .argument("<fleetId>", "Fleet id")
    .option("--name <name>", "New fleet name")
    .option("-d, --detail <key=value>", "Descriptive field to set (repeatable)", collect, [])
    .option("--by <userId>", "Acting user id")
    .option("--json", "Output JSON", false)
    .action(async (fleetId: string, opts: EditOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetEditCommand(fleetId, withGlobals(opts), runtime);
      });
    });

  program
    .command("cancel")
    .description("Cancel a fleet")
    .argument("<fleetId>", "Fleet id")
    .option("--by <userId>", "Acting user id")
    .option("--json", "Output JSON", false)
    .action(async (fleetId: string, opts: CancelOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetCancelCommand(fleetId, withGlobals(opts), runtime);
      });
    });

  program
    .command("list")
    .description("List upcoming fleets")
    .option("--category <id>", "Only this category")
    .option("--roles <ids>", "Comma-separated role ids; only categories they may view")
    .option("--all", "Include hidden fleets not yet announced", false)
    .option("--json", "Output JSON", false)
    .action(async (opts: ListOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetListCommand(withGlobals(opts), runtime);
      });
    });

  program
    .command("status")
    .description("Show a fleet with its delivery history")
    .argument("<fleetId>", "Fleet id")
    .option("--json", "Output JSON", false)
    .action(async (fleetId: string, opts: CommonOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await fleetStatusCommand(fleetId, withGlobals(opts), runtime);
      });
    });

  program
    .command("audit-verify")
    .description("Verify the audit log checksum chain")
    .option("--json", "Output JSON", false)
    .action(async (opts: CommonOpts) => {
      await runCommandWithRuntime(runtime, async () => {
        await auditVerifyCommand(withGlobals(opts), runtime);
      });
    });
}
