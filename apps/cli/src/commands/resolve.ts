import { resolve } from "@dagkit/core";
import type { Command } from "commander";
import { connect, createCommandContext } from "../lib/context";
import { exitWithError } from "../lib/output";

export function registerResolveCommand(program: Command): void {
  program
    .command("resolve <path>")
    .description("Resolve an /ipfs/ or /ipns/ path to an /ipfs/ path")
    .option("--no-recursive", "stop after one level of name indirection")
    .action(async (target: string, cmdOpts: { recursive: boolean }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const resolved = await resolve(target, cmdOpts.recursive);
        formatter.output({ path: resolved }, (v) => v.path);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });
}
