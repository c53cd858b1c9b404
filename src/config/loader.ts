// Settings loader: reads ~/.config/edge-installer/config.yaml and fills
// defaults through the zod schema. On first run (no file) the commented
// default file is generated and defaults are returned with firstRun: true.
// A file that fails to parse or validate falls back to defaults with an error log.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { settingsSchema } from "./schema.js";
import type { InstallerSettings } from "../types/config.js";
import type { HostRoots } from "../host/layout.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_DIR = join(homedir(), ".config", "edge-installer");
const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

/** Default settings YAML written on first run. */
const DEFAULT_CONFIG_YAML = `# Edge runtime installer settings
# Generated automatically on first run. All values shown are defaults.

# Host roots are read from %ProgramFiles%, %ProgramData% and %SystemDrive% unless set here.
# paths:
#   program_files: "C:\\\\Program Files"
#   program_data: "C:\\\\ProgramData"
#   system_drive: "C:"

# Host detection override (auto-detected if omitted)
# host:
#   edition: full
#   build: 17763

retry:
  max_attempts: 5
  base_delay_ms: 1000

services:
  stop_grace_ms: 5000

downloads:
  runtime_package_url: "https://aka.ms/iotedged-windows-latest-cab"
  timeout_ms: 600000

logs:
  provider_name: iotedged
  default_window_minutes: 5

safety:
  confirmation_threshold: high
`;

export interface SettingsResult {
  settings: InstallerSettings;
  configPath: string;
  firstRun: boolean;
}

export function defaultSettings(): InstallerSettings {
  return settingsSchema.parse({});
}

export function loadSettings(explicitPath?: string): SettingsResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No settings file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: err }, "Could not write default settings file");
    }
    return { settings: defaultSettings(), configPath, firstRun: true };
  }

  try {
    const raw = readFileSync(configPath, "utf-8");
    const parsed: unknown = parseYaml(raw);
    const settings = settingsSchema.parse(parsed ?? {});
    return { settings, configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: err }, "Failed to parse settings, using defaults");
    return { settings: defaultSettings(), configPath, firstRun: false };
  }
}

/** Resolve host roots: explicit settings win, then the process environment. */
export function resolveHostRoots(settings: InstallerSettings, env: NodeJS.ProcessEnv = process.env): HostRoots {
  return {
    programFiles: settings.paths.program_files ?? env.ProgramFiles ?? "C:\\Program Files",
    programData: settings.paths.program_data ?? env.ProgramData ?? "C:\\ProgramData",
    systemDrive: settings.paths.system_drive ?? env.SystemDrive ?? "C:",
  };
}
