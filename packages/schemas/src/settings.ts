import { readFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { delimiter, dirname, resolve } from "node:path";
import yaml from "js-yaml";
import { DEFAULT_STAGES, type Settings } from "./types.js";
import { ConfigurationError, errorMessage } from "./errors.js";
import { validateSettingsData } from "./validator.js";

export const DEFAULT_SETTINGS: Readonly<Settings> = Object.freeze({
  identifier_key: "publishable",
  plugin_paths: [],
  host: "node",
  stages: [...DEFAULT_STAGES],
  failure_policy: "continue",
  stop_on_validation_failure: true,
});

export const SETTINGS_FILE_NAME = "pubkit.yaml";

/** Splits a PUBKIT_PLUGIN_PATH style value on the platform path delimiter. */
export function parsePluginPathVariable(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(delimiter).map((p) => p.trim()).filter(Boolean);
}

function isSettingsRecord(data: unknown): data is Partial<Settings> {
  return typeof data === "object" && data !== null && !Array.isArray(data);
}

/**
 * Parses settings YAML and merges it over the defaults. Relative plugin
 * paths are resolved against `baseDir`.
 */
export function parseSettings(raw: string, baseDir = process.cwd()): Settings {
  let data: unknown;
  try {
    data = yaml.load(raw) ?? {};
  } catch (err) {
    throw new ConfigurationError(`Failed to parse settings: ${errorMessage(err)}`, { cause: err });
  }

  const validation = validateSettingsData(data);
  if (!validation.valid || !isSettingsRecord(data)) {
    throw new ConfigurationError(`Invalid settings: ${validation.errors.join(", ")}`);
  }

  return {
    ...DEFAULT_SETTINGS,
    ...data,
    plugin_paths: (data.plugin_paths ?? DEFAULT_SETTINGS.plugin_paths).map((p) => resolve(baseDir, p)),
    stages: [...(data.stages ?? DEFAULT_SETTINGS.stages)],
  };
}

export function applyEnvironment(settings: Settings, env: NodeJS.ProcessEnv = process.env): Settings {
  const envPaths = parsePluginPathVariable(env.PUBKIT_PLUGIN_PATH).map((p) => resolve(p));
  return {
    ...settings,
    plugin_paths: [...settings.plugin_paths, ...envPaths.filter((p) => !settings.plugin_paths.includes(p))],
    host: env.PUBKIT_HOST || settings.host,
    journal_path: env.PUBKIT_JOURNAL_PATH || settings.journal_path,
  };
}

/**
 * Loads settings from `file`, or from ./pubkit.yaml when present. An explicit
 * file that does not exist is a ConfigurationError; a missing default file
 * just yields the defaults.
 */
export async function loadSettings(
  file?: string,
  env: NodeJS.ProcessEnv = process.env,
): Promise<Settings> {
  const path = resolve(file ?? SETTINGS_FILE_NAME);
  if (!existsSync(path)) {
    if (file !== undefined) {
      throw new ConfigurationError(`Settings file not found: ${path}`);
    }
    return applyEnvironment({ ...DEFAULT_SETTINGS, stages: [...DEFAULT_SETTINGS.stages] }, env);
  }

  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigurationError(`Failed to read settings file ${path}: ${errorMessage(err)}`, { cause: err });
  }
  return applyEnvironment(parseSettings(raw, dirname(path)), env);
}
