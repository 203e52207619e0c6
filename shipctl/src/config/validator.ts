import { loadAjv } from "../schema/ajv.js";
import type { ShipConfig } from "../types/config.js";

const TOOL_COMMAND = { type: "string", minLength: 1, pattern: "\\S" };
const TIMEOUT = { type: "number", minimum: 0 };

/** Config schema; the defaults file fills everything except the freeze overrides. */
export const CONFIG_SCHEMA = {
  type: "object",
  required: ["schema_version", "project_dir", "dist_dir", "build_dir", "runs_dir", "tools", "freeze", "distribution"],
  properties: {
    schema_version: { type: "string", minLength: 1 },
    project_dir: { type: "string", minLength: 1 },
    dist_dir: { type: "string", minLength: 1 },
    build_dir: { type: "string", minLength: 1 },
    runs_dir: { type: "string", minLength: 1 },
    tools: {
      type: "object",
      required: ["python", "pip", "pyinstaller"],
      additionalProperties: false,
      properties: {
        python: TOOL_COMMAND,
        pip: TOOL_COMMAND,
        pyinstaller: TOOL_COMMAND,
      },
    },
    freeze: {
      type: "object",
      required: ["hidden_imports"],
      additionalProperties: false,
      properties: {
        entry_point: { type: "string", minLength: 1 },
        name: { type: "string", minLength: 1, pattern: "^[A-Za-z0-9][A-Za-z0-9._-]*$" },
        hidden_imports: { type: "array", items: { type: "string", minLength: 1 } },
      },
    },
    distribution: {
      type: "object",
      required: ["backend"],
      additionalProperties: false,
      properties: {
        backend: { type: "string", enum: ["setuptools", "pypa-build"] },
      },
    },
    timeouts: {
      type: "object",
      additionalProperties: false,
      properties: {
        uninstall: TIMEOUT,
        freeze: TIMEOUT,
        distribute: TIMEOUT,
        install: TIMEOUT,
      },
    },
  },
};

export type ConfigValidationResult =
  | { valid: true; config: ShipConfig; errors: null }
  | { valid: false; errors: string };

/** Validate a merged config against the config schema. */
export function validateConfig(candidate: unknown): ConfigValidationResult {
  const ajv = loadAjv();
  const validate = ajv.compile(CONFIG_SCHEMA);
  const isShipConfig = (data: unknown): data is ShipConfig => validate(data);

  if (isShipConfig(candidate)) return { valid: true, config: candidate, errors: null };
  return { valid: false, errors: ajv.errorsText(validate.errors, { dataVar: "config" }) };
}
