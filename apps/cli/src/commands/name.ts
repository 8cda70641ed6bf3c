import { lookup, publishFor } from "@dagkit/core";
import { parseDuration } from "@dagkit/encoding";
import type { Command } from "commander";
import { connect, createCommandContext } from "../lib/context";
import { exitWithError } from "../lib/output";

export function registerNameCommands(program: Command): void {
  const name = program.command("name").description("Publish under the node's identity");

  name
    .command("publish <path>")
    .description("Point the node's name at an object")
    .option("--lifetime <duration>", "record lifetime, e.g. 24h, 90m, 30s", "24h")
    .action(async (target: string, cmdOpts: { lifetime: string }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        const lifetimeMs = parseDuration(cmdOpts.lifetime);
        connect(opts, formatter);
        const ref = await lookup(target);
        await publishFor(ref, lifetimeMs);
        if (formatter.format === "text") {
          formatter.success(`Published ${ref.hash} for ${cmdOpts.lifetime}`);
        } else {
          formatter.output({ value: ref.toString(), lifetimeMs });
        }
      } catch (error) {
        exitWithError(formatter, error);
      }
    });
}
