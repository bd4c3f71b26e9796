#!/usr/bin/env node
import { Command } from "commander";
import { registerFleetboardCli } from "./fleets-cli.js";

function buildProgram(): Command {
  const program = new Command();
  program
    .name("fleetboard")
    .description("Fleet scheduling and notification engine")
    .version("0.1.0");
  registerFleetboardCli(program);
  return program;
}

buildProgram()
  .parseAsync(process.argv)
  .catch((err: unknown) => {
    console.error(err instanceof Error ? err.message : String(err));
    process.exit(1);
  });
