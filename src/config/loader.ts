// Settings for directory selection, backup locations and output format.
// Lookup order is --config, then $PAM_MANAGER_CONFIG, then ~/.config/pam-manager/config.yaml.
// The YAML is checked against ConfigFileSchema (zod) before merging; a file it rejects is
// logged and replaced by the defaults as a whole.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { PamManagerConfig } from "../types/config.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "pam-manager");
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: PamManagerConfig = {
  directories: { system: "/etc/pam.d", sandbox: "./pam.d" },
  backup: { directory: null, snapshot_directory: null },
  output: { json: false },
};

/** Default config YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# pam-manager configuration
# Generated automatically on first run. All values shown are defaults.

directories:
  # Edited when running as root
  system: /etc/pam.d
  # Edited otherwise (relative paths resolve against the working directory)
  sandbox: ./pam.d

backup:
  # Per-file copies taken before every add/remove (null: <active dir>.backups)
  directory: null
  # Whole-directory snapshot for --action backup/restore (null: <active dir>.backup)
  snapshot_directory: null

output:
  json: false
`;

const ConfigFileSchema = z
  .object({
    directories: z
      .object({
        system: z.string().min(1),
        sandbox: z.string().min(1),
      })
      .partial(),
    backup: z
      .object({
        directory: z.string().min(1).nullable(),
        snapshot_directory: z.string().min(1).nullable(),
      })
      .partial(),
    output: z.object({ json: z.boolean() }).partial(),
  })
  .partial();

type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface ConfigResult {
  config: PamManagerConfig;
  configPath: string;
  firstRun: boolean;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? process.env.PAM_MANAGER_CONFIG ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default config file");
    }
    return { config: cloneDefaults(), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed = ConfigFileSchema.parse(parseYaml(raw) ?? {});
    return { config: mergeConfig(DEFAULT_CONFIG, parsed), configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse config, using defaults");
    return { config: cloneDefaults(), configPath, firstRun: false };
  }
}

/** Section-wise merge: `override` keys win, everything else comes from `base`. */
export function mergeConfig(base: PamManagerConfig, override: ConfigFile): PamManagerConfig {
  return {
    directories: { ...base.directories, ...override.directories },
    backup: { ...base.backup, ...override.backup },
    output: { ...base.output, ...override.output },
  };
}

function cloneDefaults(): PamManagerConfig {
  return mergeConfig(DEFAULT_CONFIG, {});
}
