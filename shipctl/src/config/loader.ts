import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import YAML from "yaml";
import type { ShipConfig } from "../types/config.js";
import { validateConfig } from "./validator.js";

/** Package defaults shipped next to the sources. */
export const DEFAULTS_DIR = fileURLToPath(new URL("../../config", import.meta.url));

export const ENV_PREFIX = "SHIPCTL_";

export type ConfigResult =
  | { ok: true; config: ShipConfig }
  | { ok: false; error: { code: "CONFIG_INVALID" | "CONFIG_READ_FAILED"; message: string } };

type Layer = Record<string, unknown>;

function isPlainObject(value: unknown): value is Layer {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects. `override` values take precedence.
 * Arrays are replaced, not concatenated.
 */
export function deepMerge(base: Layer, override: Layer): Layer {
  const result: Layer = { ...base };
  for (const [key, val] of Object.entries(override)) {
    if (val === undefined || val === null) continue;
    const current = result[key];
    result[key] = isPlainObject(val) && isPlainObject(current) ? deepMerge(current, val) : val;
  }
  return result;
}

/** Load a YAML file and return the parsed mapping, or an empty one if not found. */
function loadYaml(filePath: string): Layer {
  if (!fs.existsSync(filePath)) return {};
  const parsed: unknown = YAML.parse(fs.readFileSync(filePath, "utf8"));
  if (parsed === null || parsed === undefined) return {};
  if (!isPlainObject(parsed)) throw new Error(`${filePath}: top level must be a mapping`);
  return parsed;
}

/**
 * SHIPCTL_ prefixed variables, e.g. SHIPCTL_DIST_DIR → dist_dir and
 * SHIPCTL_TOOLS__PIP → tools.pip. Values are read as YAML scalars, so
 * "[a, b]" is a list and "30" a number.
 */
export function envLayer(env: NodeJS.ProcessEnv): Layer {
  const layer: Layer = {};
  for (const [key, raw] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || raw === undefined) continue;
    const segments = key.slice(ENV_PREFIX.length).toLowerCase().split("__").filter((s) => s.length > 0);
    if (segments.length === 0) continue;

    let value: unknown;
    try {
      value = YAML.parse(raw);
    } catch {
      value = raw;
    }

    let node = layer;
    for (const segment of segments.slice(0, -1)) {
      const child = node[segment];
      const next: Layer = isPlainObject(child) ? child : {};
      node[segment] = next;
      node = next;
    }
    node[segments[segments.length - 1]] = value ?? raw;
  }
  return layer;
}

export type LoadConfigOptions = {
  /** Project config directory holding base.yaml and <env>.yaml. */
  configDir?: string;
  /** Environment name, e.g. "ci"; loads <configDir>/<envName>.yaml. */
  envName?: string;
  env?: NodeJS.ProcessEnv;
  defaultsDir?: string;
};

/**
 * Load layered config:
 * package base.yaml ← project base.yaml ← project <env>.yaml ← environment variables.
 * The merged result is validated before it is returned.
 */
export function loadConfig(opts: LoadConfigOptions = {}): ConfigResult {
  let merged: Layer;
  try {
    merged = loadYaml(path.join(opts.defaultsDir ?? DEFAULTS_DIR, "base.yaml"));
    if (opts.configDir) {
      merged = deepMerge(merged, loadYaml(path.join(opts.configDir, "base.yaml")));
      if (opts.envName) {
        merged = deepMerge(merged, loadYaml(path.join(opts.configDir, `${opts.envName}.yaml`)));
      }
    }
    merged = deepMerge(merged, envLayer(opts.env ?? process.env));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return { ok: false, error: { code: "CONFIG_READ_FAILED", message } };
  }

  const checked = validateConfig(merged);
  if (!checked.valid) {
    return { ok: false, error: { code: "CONFIG_INVALID", message: `Config invalid: ${checked.errors}` } };
  }
  return { ok: true, config: checked.config };
}
