import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { loadAjv } from "../schema/ajv.js";
import { computeSha256 } from "../artifact-writer/checksum.js";
import { diag, type Diagnostic } from "../report/reporter.js";
import type { ReleaseManifest } from "../types/manifest.js";
import { loadProjectLayout, type ProjectOpts } from "./project.js";

export type ValidateResult = { ok: true; diagnostics: Diagnostic[] } | { ok: false; errors: Diagnostic[] };

export const SCHEMA_DIR = fileURLToPath(new URL("../../schemas", import.meta.url));

function isWithinDir(rootDir: string, candidatePath: string): boolean {
  const rel = path.relative(rootDir, candidatePath);
  return rel !== "" && !rel.startsWith("..") && !path.isAbsolute(rel);
}

/** Check a release manifest against its schema, then re-verify every artifact it lists. */
export function validateManifest(manifestPath: string, projectDir: string, schemaDir = SCHEMA_DIR): Diagnostic[] {
  const errors: Diagnostic[] = [];
  const shown = path.relative(process.cwd(), manifestPath) || manifestPath;

  if (!fs.existsSync(manifestPath)) {
    return [diag("error", "MANIFEST_MISSING", `Manifest not found: ${shown}`, { path: manifestPath })];
  }

  let manifest: unknown;
  try {
    manifest = JSON.parse(fs.readFileSync(manifestPath, "utf8"));
  } catch (e) {
    const message = e instanceof Error ? e.message : String(e);
    return [diag("error", "MANIFEST_JSON_INVALID", `Invalid JSON manifest (${shown}): ${message}`, { path: manifestPath })];
  }

  const schemaPath = path.join(schemaDir, "release-manifest.schema.json");
  if (!fs.existsSync(schemaPath)) {
    return [diag("error", "SCHEMA_MISSING", `Missing schema: ${schemaPath}`, { path: schemaPath })];
  }

  const ajv = loadAjv();
  const validate = ajv.compile(JSON.parse(fs.readFileSync(schemaPath, "utf8")));
  const isManifest = (data: unknown): data is ReleaseManifest => validate(data);
  if (!isManifest(manifest)) {
    return [
      diag("error", "MANIFEST_INVALID", `Manifest invalid (${shown}): ${ajv.errorsText(validate.errors, { dataVar: "manifest" })}`, {
        path: manifestPath,
      }),
    ];
  }

  for (const entry of manifest.artifacts) {
    const target = path.resolve(projectDir, entry.path);
    if (!isWithinDir(projectDir, target)) {
      errors.push(diag("error", "ARTIFACT_PATH_ESCAPES_PROJECT", `Manifest path escapes project dir: ${entry.path}`, { path: entry.path }));
      continue;
    }
    if (!fs.existsSync(target) || !fs.statSync(target).isFile()) {
      errors.push(diag("error", "ARTIFACT_MISSING", `Missing artifact file: ${entry.path}`, { path: target }));
      continue;
    }

    const size = fs.statSync(target).size;
    if (size !== entry.bytes) {
      errors.push(
        diag("error", "ARTIFACT_SIZE_MISMATCH", `Artifact size mismatch (${entry.path}): manifest=${entry.bytes} actual=${size}`, {
          path: target,
          details: { expectedBytes: entry.bytes, actualBytes: size },
        }),
      );
      continue;
    }

    const actual = computeSha256(target);
    if (actual !== entry.sha256) {
      errors.push(
        diag("error", "ARTIFACT_SHA256_MISMATCH", `Artifact sha256 mismatch (${entry.path}): manifest=${entry.sha256} actual=${actual}`, {
          path: target,
          details: { expectedSha256: entry.sha256, actualSha256: actual },
        }),
      );
    }
  }

  return errors;
}

/** Validate the layered config and, optionally, a release manifest. */
export function validateAll(opts: ProjectOpts & { manifest?: string; envVars?: NodeJS.ProcessEnv; cwd?: string }): ValidateResult {
  const cwd = opts.cwd ?? process.cwd();
  const resolved = loadProjectLayout(opts, { env: opts.envVars, cwd });
  if (!resolved.ok) {
    return { ok: false, errors: [diag("error", resolved.error.code, resolved.error.message)] };
  }

  const diagnostics: Diagnostic[] = [diag("info", "CONFIG_OK", "Config OK")];

  if (opts.manifest) {
    const errors = validateManifest(path.resolve(cwd, opts.manifest), resolved.layout.projectDir);
    if (errors.length > 0) return { ok: false, errors };
    diagnostics.push(diag("info", "MANIFEST_OK", "Manifest OK"));
  }

  return { ok: true, diagnostics };
}
