/**
 * Global option parsing and endpoint selection
 */

import {
  DEFAULT_API_ENDPOINT,
  normalizeEndpoint,
  readEndpointFromEnv,
  setApiEndpoint,
} from "@dagkit/client";
import type { Command } from "commander";
import { z } from "zod";
import { type Config, getProfile, loadConfig } from "./config";
import { createFormatter, OUTPUT_FORMATS, type OutputFormatter } from "./output";

const GlobalOptionsSchema = z.object({
  profile: z.string().optional(),
  apiUrl: z.string().optional(),
  format: z.enum(OUTPUT_FORMATS).default("text"),
  verbose: z.boolean().default(false),
  quiet: z.boolean().default(false),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export type EndpointSource = "flag" | "env" | "profile" | "default";

export type ResolvedEndpoint = {
  endpoint: string;
  source: EndpointSource;
  /** Profile consulted, when the endpoint came from one */
  profile?: string;
};

/**
 * Validate commander's option bag.
 */
export function parseGlobalOptions(opts: Record<string, unknown>): GlobalOptions {
  const result = GlobalOptionsSchema.safeParse(opts);
  if (!result.success) {
    const issue = result.error.issues[0];
    const name = issue?.path.join(".") ?? "option";
    throw new Error(`Invalid --${name}: ${issue?.message ?? "unrecognized value"}`);
  }
  return result.data;
}

/**
 * Pick the endpoint: --api-url, then DAGKIT_API_URL, then the selected
 * profile, then the built-in default.
 *
 * The config is only loaded when neither the flag nor the variable is set.
 */
export function resolveEndpoint(
  opts: Pick<GlobalOptions, "apiUrl" | "profile">,
  env: NodeJS.ProcessEnv = process.env,
  readConfig: () => Config = loadConfig
): ResolvedEndpoint {
  if (opts.apiUrl) {
    return { endpoint: normalizeEndpoint(opts.apiUrl), source: "flag" };
  }

  const fromEnv = readEndpointFromEnv(env);
  if (fromEnv !== undefined) {
    return { endpoint: fromEnv, source: "env" };
  }

  const config = readConfig();
  const name = opts.profile || config.currentProfile;
  // A dangling currentProfile falls back to the default; a named one must exist
  if (!opts.profile && !config.profiles[name]) {
    return { endpoint: DEFAULT_API_ENDPOINT, source: "default" };
  }
  const profile = getProfile(config, name);
  return { endpoint: normalizeEndpoint(profile.apiUrl), source: "profile", profile: name };
}

/**
 * Resolve the endpoint and install it process-wide for the library calls
 * that follow.
 */
export function applyEndpoint(opts: GlobalOptions): ResolvedEndpoint {
  const resolved = resolveEndpoint(opts);
  setApiEndpoint(resolved.endpoint);
  return resolved;
}

/**
 * Options and formatter for a command action
 */
export function createCommandContext(program: Command): {
  opts: GlobalOptions;
  formatter: OutputFormatter;
} {
  const opts = parseGlobalOptions(program.opts());
  return { opts, formatter: createFormatter(opts) };
}

/**
 * Install the endpoint and log where it came from
 */
export function connect(opts: GlobalOptions, formatter: OutputFormatter): ResolvedEndpoint {
  const resolved = applyEndpoint(opts);
  const origin = resolved.profile ? `profile "${resolved.profile}"` : resolved.source;
  formatter.debug(`Using ${resolved.endpoint} (${origin})`);
  return resolved;
}
