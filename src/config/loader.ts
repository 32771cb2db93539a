import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import { isPlainObject } from "../grammar/parser.js";

const CONFIG_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config");

const PREFIX = "SNAPSPEC_";
/** SNAPSPEC_ENV_<NAME> sets `environment.<NAME>`. */
const ENVIRONMENT_PREFIX = "SNAPSPEC_ENV_";

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (isPlainObject(val)) {
      const current = result[key];
      result[key] = deepMerge(isPlainObject(current) ? current : {}, val);
    } else if (val !== undefined) {
      result[key] = val;
    }
  }
  return result;
}

/** Load a YAML file and return parsed object, or empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new Error(`Config file must contain a mapping: ${filePath}`);
  return parsed;
}

/** Apply SNAPSPEC_ prefixed environment variable overrides. */
function applyEnvOverrides(config: Record<string, unknown>): Record<string, unknown> {
  const result = { ...config };
  const environment: Record<string, unknown> = isPlainObject(result.environment) ? { ...result.environment } : {};
  for (const [key, value] of Object.entries(process.env)) {
    if (!key.startsWith(PREFIX) || value === undefined) continue;
    if (key.startsWith(ENVIRONMENT_PREFIX)) {
      environment[key.slice(ENVIRONMENT_PREFIX.length)] = value;
      continue;
    }
    // SNAPSPEC_BUILD_ARCH → build_arch
    result[key.slice(PREFIX.length).toLowerCase()] = value;
  }
  if (Object.keys(environment).length > 0) result.environment = environment;
  return result;
}

/**
 * Load layered config: base.yaml ← env.yaml ← environment variables.
 *
 * The result is unchecked; pass it through `validateConfig`.
 *
 * @param envName - Optional environment name (e.g., "ci"). Loads
 *                  `config/{envName}.yaml` as override layer.
 * @param configDir - Optional config directory path override.
 */
export function loadConfig(envName?: string, configDir?: string): Record<string, unknown> {
  const dir = configDir ?? CONFIG_DIR;

  let merged = loadYaml(path.join(dir, "base.yaml"));
  if (envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${envName}.yaml`)));
  }
  return applyEnvOverrides(merged);
}
