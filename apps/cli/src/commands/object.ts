import { isUtf8 } from "node:buffer";
import * as fs from "node:fs";
import { type CommittedObject, DagObject, getObject, lookup, stat } from "@dagkit/core";
import { formatSize } from "@dagkit/encoding";
import type { Command } from "commander";
import { connect, createCommandContext } from "../lib/context";
import { exitWithError } from "../lib/output";

export type LinkSpec = { name: string; path: string };

export type DataView = { encoding: "utf-8" | "hex"; text: string };

type LinkView = { name: string; hash: string; size: number };

type ObjectView = {
  hash: string;
  size: number;
  links: LinkView[];
  data: DataView;
};

/**
 * Parse a `--link name=path` argument. The name may be empty; the path may
 * not.
 */
export function parseLink(arg: string): LinkSpec {
  const eq = arg.indexOf("=");
  if (eq === -1 || eq === arg.length - 1) {
    throw new Error(`Invalid link "${arg}": expected name=path`);
  }
  return { name: arg.slice(0, eq), path: arg.slice(eq + 1) };
}

/**
 * Render object data as text, falling back to hex for non-UTF-8 bytes
 */
export function renderData(data: Uint8Array, hex = false): DataView {
  if (!hex && isUtf8(data)) {
    return { encoding: "utf-8", text: new TextDecoder().decode(data) };
  }
  return { encoding: "hex", text: Buffer.from(data).toString("hex") };
}

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const toLinkViews = (object: CommittedObject): LinkView[] =>
  object.links.map((link) => ({
    name: link.name,
    hash: link.object.hash,
    size: link.object.size,
  }));

const formatLinks = (links: LinkView[]): string =>
  links.map((l) => `${l.hash}  ${formatSize(l.size).padStart(9)}  ${l.name}`).join("\n");

export function registerObjectCommands(program: Command): void {
  const object = program.command("object").description("Read and write DAG objects");

  object
    .command("get <path>")
    .description("Fetch an object by hash, /ipfs/ or /ipns/ path")
    .option("--hex", "print data as hex")
    .option("-o, --output <file>", "write the raw data to a file instead")
    .action(async (target: string, cmdOpts: { hex?: boolean; output?: string }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const fetched = await getObject(target);

        if (cmdOpts.output) {
          fs.writeFileSync(cmdOpts.output, fetched.data);
          formatter.success(`Wrote ${formatSize(fetched.data.length)} to ${cmdOpts.output}`);
          return;
        }

        const view: ObjectView = {
          hash: fetched.hash,
          size: fetched.size,
          links: toLinkViews(fetched),
          data: renderData(fetched.data, cmdOpts.hex),
        };

        formatter.output(view, (v) => {
          const lines = [`hash  ${v.hash}`, `size  ${formatSize(v.size)} (${v.size})`];
          if (v.links.length > 0) {
            lines.push(`links ${v.links.length}`, formatLinks(v.links));
          }
          lines.push(`data  ${v.data.encoding === "hex" ? "(hex) " : ""}${v.data.text}`);
          return lines.join("\n");
        });
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  object
    .command("put")
    .description("Build an object from data and links, and store it")
    .option("-d, --data <text>", "object data as UTF-8 text")
    .option("--file <path>", "read object data from a file")
    .option("-l, --link <name=path>", "append a link (repeatable, kept in order)", collect, [])
    .action(async (cmdOpts: { data?: string; file?: string; link: string[] }) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        if (cmdOpts.data !== undefined && cmdOpts.file !== undefined) {
          throw new Error("Use either --data or --file, not both");
        }
        const links = cmdOpts.link.map(parseLink);

        let data: Uint8Array = new Uint8Array(0);
        if (cmdOpts.file !== undefined) {
          data = new Uint8Array(fs.readFileSync(cmdOpts.file));
        } else if (cmdOpts.data !== undefined) {
          data = new TextEncoder().encode(cmdOpts.data);
        }

        connect(opts, formatter);
        const draft = new DagObject(data);
        for (const link of links) {
          const ref = await lookup(link.path);
          formatter.debug(`Link "${link.name}" → ${ref.hash} (${ref.size} bytes)`);
          draft.addLink(link.name, ref);
        }

        const committed = await draft.commit();
        formatter.output({ hash: committed.hash, size: committed.size }, (v) => v.hash);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  object
    .command("stat <path>")
    .description("Show object metadata without downloading it")
    .action(async (target: string) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const stats = await stat(target);
        formatter.output(stats, (s) =>
          [
            `Hash:           ${s.hash}`,
            `NumLinks:       ${s.numLinks}`,
            `DataSize:       ${s.dataSize}`,
            `CumulativeSize: ${s.cumulativeSize}`,
          ].join("\n")
        );
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  object
    .command("links <path>")
    .description("List an object's links in order")
    .action(async (target: string) => {
      const { opts, formatter } = createCommandContext(program);

      try {
        connect(opts, formatter);
        const links = toLinkViews(await getObject(target));
        formatter.output(links, (l) => (l.length === 0 ? "(no links)" : formatLinks(l)));
      } catch (error) {
        exitWithError(formatter, error);
      }
    });
}
