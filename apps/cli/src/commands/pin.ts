import { lookup } from "@dagkit/core";
import type { Command } from "commander";
import { connect, createCommandContext } from "../lib/context";
import { exitWithError } from "../lib/output";

const mode = (recursive: boolean): string => (recursive ? "recursive" : "direct");

export function registerPinCommands(program: Command): void {
  const pin = program.command("pin").description("Keep objects in the node's storage");

  pin
    .command("add <path>")
    .description("Pin an object")
    .option("--no-recursive", "pin only the object, not its descendants")
    .action(async (target: string, cmdOpts: { recursive: boolean }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const ref = await lookup(target);
        await ref.pin(cmdOpts.recursive);
        if (formatter.format === "text") {
          formatter.success(`Pinned ${ref.hash} (${mode(cmdOpts.recursive)})`);
        } else {
          formatter.output({ hash: ref.hash, pinned: true, mode: mode(cmdOpts.recursive) });
        }
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  pin
    .command("rm <path>")
    .alias("remove")
    .description("Unpin an object; succeeds if it is not pinned")
    .option("--no-recursive", "remove a direct pin")
    .action(async (target: string, cmdOpts: { recursive: boolean }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const ref = await lookup(target);
        await ref.unpin(cmdOpts.recursive);
        if (formatter.format === "text") {
          formatter.success(`Unpinned ${ref.hash}`);
        } else {
          formatter.output({ hash: ref.hash, pinned: false });
        }
      } catch (error) {
        exitWithError(formatter, error);
      }
    });
}
