#!/usr/bin/env tsx

import { API_ENDPOINT_ENV } from "@dagkit/client";
import { Command, CommanderError } from "commander";
import { registerConfigCommands } from "./commands/config";
import { registerNameCommands } from "./commands/name";
import { registerObjectCommands } from "./commands/object";
import { registerPinCommands } from "./commands/pin";
import { registerResolveCommand } from "./commands/resolve";
import { OUTPUT_FORMATS } from "./lib/output";

function createProgram(): Command {
  const program = new Command();

  program
    .name("dagkit")
    .description("Client for IPFS-compatible content-addressed object stores")
    .version("0.1.0")
    .option("-p, --profile <name>", "use specified profile")
    .option("--api-url <url>", `override the API endpoint (env: ${API_ENDPOINT_ENV})`)
    .option("-f, --format <type>", `output format: ${OUTPUT_FORMATS.join("|")}`, "text")
    .option("-v, --verbose", "verbose output")
    .option("-q, --quiet", "quiet mode");

  registerObjectCommands(program);
  registerResolveCommand(program);
  registerPinCommands(program);
  registerNameCommands(program);
  registerConfigCommands(program);

  program.exitOverride();
  return program;
}

async function main(): Promise<void> {
  const program = createProgram();
  try {
    await program.parseAsync(process.argv);
    // If no subcommand is provided, show help
    if (process.argv.length <= 2) {
      program.outputHelp();
    }
  } catch (error: unknown) {
    if (error instanceof CommanderError) {
      // commander has already printed help, the version or the usage error
      process.exit(error.exitCode);
    }
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    process.exit(1);
  }
}

void main();
