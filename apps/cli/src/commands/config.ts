import type { Command } from "commander";
import {
  CONFIG_KEYS,
  createProfile,
  deleteProfile,
  getConfigPath,
  getConfigValue,
  listProfiles,
  loadConfig,
  saveConfig,
  setConfigValue,
} from "../lib/config";
import { createCommandContext } from "../lib/context";
import { exitWithError } from "../lib/output";

export function registerConfigCommands(program: Command): void {
  const config = program.command("config").description("Manage CLI configuration");

  config
    .command("list")
    .alias("ls")
    .description("List all profiles")
    .action(() => {
      const { formatter } = createCommandContext(program);

      try {
        const profiles = listProfiles(loadConfig());
        formatter.output(profiles, (list) =>
          list
            .map((p) => {
              const marker = p.current ? "* " : "  ";
              return `${marker}${p.name.padEnd(15)} ${p.apiUrl}`;
            })
            .join("\n")
        );
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  config
    .command("set <key> <value>")
    .description(`Set a configuration value (${CONFIG_KEYS.join(", ")})`)
    .action((key: string, value: string) => {
      const { formatter } = createCommandContext(program);

      try {
        const cfg = loadConfig();
        setConfigValue(cfg, key, value);
        saveConfig(cfg);
        formatter.success(`Set ${key} = ${getConfigValue(cfg, key) ?? value}`);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  config
    .command("get <key>")
    .description("Get a configuration value")
    .action((key: string) => {
      const { formatter } = createCommandContext(program);

      try {
        const value = getConfigValue(loadConfig(), key);
        if (value === undefined) {
          throw new Error(`Configuration key "${key}" not found`);
        }
        formatter.output({ key, value }, (v) => v.value);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  config
    .command("use <profile>")
    .description("Switch to a profile")
    .action((profileName: string) => {
      const { formatter } = createCommandContext(program);

      try {
        const cfg = loadConfig();
        const profile = cfg.profiles[profileName];
        if (!profile) {
          formatter.info(`Available profiles: ${Object.keys(cfg.profiles).join(", ")}`);
          throw new Error(`Profile "${profileName}" does not exist`);
        }

        cfg.currentProfile = profileName;
        saveConfig(cfg);

        formatter.success(`Switched to profile: ${profileName}`);
        formatter.info(`API URL: ${profile.apiUrl}`);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  config
    .command("path")
    .description("Show configuration file path")
    .action(() => {
      const { formatter } = createCommandContext(program);
      const configPath = getConfigPath();

      formatter.output({ path: configPath }, () => configPath);
    });

  config
    .command("add <name>")
    .description("Create a new profile")
    .requiredOption("--url <url>", "API endpoint, e.g. http://127.0.0.1:5001/api/v0/")
    .action((name: string, cmdOpts: { url: string }) => {
      const { formatter } = createCommandContext(program);

      try {
        const cfg = loadConfig();
        createProfile(cfg, name, cmdOpts.url);
        saveConfig(cfg);
        formatter.success(`Created profile: ${name}`);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });

  config
    .command("remove <name>")
    .alias("rm")
    .description("Delete a profile")
    .action((name: string) => {
      const { formatter } = createCommandContext(program);

      try {
        const cfg = loadConfig();
        deleteProfile(cfg, name);
        saveConfig(cfg);
        formatter.success(`Deleted profile: ${name}`);
      } catch (error) {
        exitWithError(formatter, error);
      }
    });
}
