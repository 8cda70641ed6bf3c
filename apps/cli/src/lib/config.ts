import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_API_ENDPOINT, normalizeEndpoint } from "@dagkit/client";
import { z } from "zod";

const ProfileConfigSchema = z.object({
  apiUrl: z.string(),
});

const ConfigSchema = z.object({
  currentProfile: z.string(),
  profiles: z.record(ProfileConfigSchema),
});

export type ProfileConfig = z.infer<typeof ProfileConfigSchema>;
export type Config = z.infer<typeof ConfigSchema>;

export const CONFIG_KEYS = ["apiUrl", "currentProfile"] as const;

const createDefaultConfig = (): Config => ({
  currentProfile: "default",
  profiles: {
    default: {
      apiUrl: DEFAULT_API_ENDPOINT,
    },
  },
});

export function getDagkitDir(): string {
  return path.join(os.homedir(), ".dagkit");
}

export function getConfigPath(): string {
  return path.join(getDagkitDir(), "config.json");
}

export function ensureDagkitDir(): void {
  const dir = getDagkitDir();
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true, mode: 0o700 });
  }
}

export function loadConfig(): Config {
  const configPath = getConfigPath();
  if (!fs.existsSync(configPath)) {
    return createDefaultConfig();
  }

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, "utf-8"));
  } catch (error) {
    throw new Error(`Config file ${configPath} is not valid JSON`, { cause: error });
  }

  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new Error(`Config file ${configPath} is malformed${where}`, { cause: result.error });
  }
  return result.data;
}

export function saveConfig(config: Config): void {
  ensureDagkitDir();
  const configPath = getConfigPath();
  fs.writeFileSync(configPath, JSON.stringify(config, null, 2), {
    encoding: "utf-8",
    mode: 0o600,
  });
}

export function getProfile(config: Config, profileName?: string): ProfileConfig {
  const name = profileName || config.currentProfile;
  const profile = config.profiles[name];
  if (!profile) {
    throw new Error(`Profile "${name}" not found. Run 'dagkit config add ${name}' to create it.`);
  }
  return profile;
}

export function setConfigValue(config: Config, key: string, value: string): void {
  if (key === "currentProfile") {
    if (!config.profiles[value]) {
      throw new Error(`Profile "${value}" does not exist`);
    }
    config.currentProfile = value;
  } else if (key === "apiUrl") {
    const profile = config.profiles[config.currentProfile];
    if (!profile) {
      throw new Error(`Current profile not found`);
    }
    profile.apiUrl = normalizeEndpoint(value);
  } else {
    throw new Error(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(", ")})`);
  }
}

export function getConfigValue(config: Config, key: string): string | undefined {
  if (key === "currentProfile") return config.currentProfile;
  if (key === "apiUrl") return config.profiles[config.currentProfile]?.apiUrl;
  return undefined;
}

export function listProfiles(
  config: Config
): Array<{ name: string; current: boolean; apiUrl: string }> {
  return Object.entries(config.profiles).map(([name, profile]) => ({
    name,
    current: name === config.currentProfile,
    apiUrl: profile.apiUrl,
  }));
}

export function createProfile(config: Config, name: string, apiUrl: string): void {
  if (config.profiles[name]) {
    throw new Error(`Profile "${name}" already exists`);
  }
  config.profiles[name] = { apiUrl: normalizeEndpoint(apiUrl) };
}

export function deleteProfile(config: Config, name: string): void {
  if (!config.profiles[name]) {
    throw new Error(`Profile "${name}" does not exist`);
  }
  if (name === config.currentProfile) {
    throw new Error(`Cannot delete current profile. Switch to another profile first.`);
  }
  delete config.profiles[name];
}
