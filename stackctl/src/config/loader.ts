import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";

export type ConfigDoc = Record<string, unknown>;

export const DEFAULT_CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

/** Environment variables with this prefix override settings; `__` separates nested keys. */
export const ENV_PREFIX = "STACKCTL_";

export function isPlainObject(value: unknown): value is ConfigDoc {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: ConfigDoc, override: ConfigDoc): ConfigDoc {
  const result: ConfigDoc = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): ConfigDoc {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) {
    throw new Error(`Settings file must contain a mapping: ${filePath}`);
  }
  return parsed;
}

/**
 * Env values are read as YAML scalars or flow sequences so that
 * `STACKCTL_HEALTH__MAX_WAIT_SECONDS=45` yields a number and
 * `STACKCTL_HOST__REQUIRED_TOOLS="[docker, curl]"` a list.
 */
function parseEnvValue(raw: string): unknown {
  let parsed: unknown;
  try {
    parsed = YAML.parse(raw);
  } catch {
    return raw;
  }
  return isPlainObject(parsed) || parsed === null ? raw : parsed;
}

/** Apply STACKCTL_ prefixed environment variable overrides. */
function applyEnvOverrides(config: ConfigDoc, env: NodeJS.ProcessEnv): ConfigDoc {
  let result = config;
  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;
    // STACKCTL_HEALTH__MAX_WAIT_SECONDS → health.max_wait_seconds
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;
    let patch: ConfigDoc = { [segments[segments.length - 1]]: parseEnvValue(value) };
    for (const segment of segments.slice(0, -1).reverse()) {
      patch = { [segment]: patch };
    }
    result = deepMerge(result, patch);
  }
  return result;
}

/**
 * Load layered settings: base.yaml ← {envName}.yaml ← environment variables.
 * The result is unvalidated; pass it through `validateSettings`.
 *
 * @param envName - Optional environment name (e.g. "production").
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string, env: NodeJS.ProcessEnv = process.env): ConfigDoc {
  const dir = configDir ?? DEFAULT_CONFIG_DIR;

  const basePath = path.join(dir, "base.yaml");
  if (!fs.existsSync(basePath)) {
    throw new Error(`Missing base settings: ${basePath}`);
  }

  let merged = loadYaml(basePath);
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }

  return applyEnvOverrides(merged, env);
}
