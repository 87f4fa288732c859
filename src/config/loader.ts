import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import type { DevboxConfig } from "../types/config.js";
import { ConfigError, errorMessage } from "../core/errors.js";
import type { SchemaRegistry } from "../schema/registry.js";
import { validateConfig } from "./validator.js";

export const DEFAULT_CONFIG_DIR = path.join(os.homedir(), ".devbox");

export const DEFAULT_CONFIG: DevboxConfig = {
  schema_version: "1.0.0",
  lock_file: "devbox.lock.json",
  parallel: {
    enabled: true,
    query_workers: 5,
    apply_workers: 4,
    query_timeout_s: 300,
    apply_timeout_s: 1800,
  },
  projects: {},
};

export type LoadConfigOpts = {
  configDir?: string;
  /** Overlay `<configDir>/<envName>.yaml` on top of base.yaml. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
  registry?: SchemaRegistry;
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Record<string, unknown>, override: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
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

/** Load a YAML file and return the parsed mapping, or an empty object if not found. */
function loadYaml(filePath: string): Record<string, unknown> {
  if (!fs.existsSync(filePath)) return {};

  let doc: unknown;
  try {
    doc = YAML.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new ConfigError(`Failed to read config ${filePath}: ${errorMessage(e)}`);
  }

  if (doc === null || doc === undefined) return {};
  if (!isPlainObject(doc)) {
    throw new ConfigError(`Config ${filePath} must contain a mapping at the top level`);
  }
  return doc;
}

const INTEGER_VARS: Array<[string, string]> = [
  ["DEVBOX_QUERY_WORKERS", "query_workers"],
  ["DEVBOX_APPLY_WORKERS", "apply_workers"],
  ["DEVBOX_QUERY_TIMEOUT", "query_timeout_s"],
  ["DEVBOX_APPLY_TIMEOUT", "apply_timeout_s"],
];

function positiveInt(value: string | undefined): number | null {
  if (value === undefined || !/^\d+$/.test(value.trim())) return null;
  const n = Number.parseInt(value.trim(), 10);
  return n > 0 ? n : null;
}

/** DEVBOX_* variables as a config layer. Malformed numbers are ignored. */
export function envLayer(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const layer: Record<string, unknown> = {};
  const parallel: Record<string, unknown> = {};

  const lockFile = env.DEVBOX_LOCK_FILE?.trim();
  if (lockFile) layer.lock_file = lockFile;

  if (env.DEVBOX_DISABLE_PARALLEL === "true") parallel.enabled = false;

  for (const [name, key] of INTEGER_VARS) {
    const n = positiveInt(env[name]);
    if (n !== null) parallel[key] = n;
  }
  if (Object.keys(parallel).length > 0) layer.parallel = parallel;

  const socket = env.DEVBOX_DOCKER_SOCKET?.trim();
  if (socket) layer.docker = { socket_path: socket };

  return layer;
}

/**
 * Load layered config: defaults ← base.yaml ← `<envName>`.yaml ← environment
 * variables, then validate the result against the config schema.
 */
export async function loadConfig(opts: LoadConfigOpts = {}): Promise<DevboxConfig> {
  const dir = opts.configDir ?? DEFAULT_CONFIG_DIR;

  let merged = deepMerge({ ...DEFAULT_CONFIG }, loadYaml(path.join(dir, "base.yaml")));
  if (opts.envName) {
    merged = deepMerge(merged, loadYaml(path.join(dir, `${opts.envName}.yaml`)));
  }
  merged = deepMerge(merged, envLayer(opts.env ?? process.env));

  const res = await validateConfig(merged, opts.registry);
  if (!res.valid) {
    throw new ConfigError(`Invalid configuration in ${dir}: ${res.errors}`);
  }
  return res.config;
}
