import fs from "node:fs";
import path from "node:path";
import { loadConfig } from "../config/loader.js";
import { readProjectMetadata, type ProjectMetadata } from "../metadata/project.js";
import { execRunner, parseCommand, type CommandRunner } from "../process/runner.js";
import type { ShipConfig } from "../types/config.js";

export type ProjectOpts = {
  /** Python project root; overrides `project_dir` from config. */
  project?: string;
  /** Config directory with base.yaml / <env>.yaml. Defaults to <project>/.shipctl when present. */
  config?: string;
  env?: string;
};

export type ProjectSession = {
  config: ShipConfig;
  projectDir: string;
  runsRoot: string;
  metadata: ProjectMetadata;
};

export type SessionResult = { ok: true; session: ProjectSession } | { ok: false; error: { code: string; message: string } };

export const DEFAULT_CONFIG_DIR = ".shipctl";

export type ProjectLayout = Omit<ProjectSession, "metadata">;

export type LayoutResult = { ok: true; layout: ProjectLayout } | { ok: false; error: { code: string; message: string } };

/** Load config and resolve the project and runs directories. */
export function loadProjectLayout(
  opts: ProjectOpts,
  deps: { env?: NodeJS.ProcessEnv; cwd?: string } = {},
): LayoutResult {
  const cwd = deps.cwd ?? process.cwd();
  const configDir = opts.config
    ? path.resolve(cwd, opts.config)
    : path.resolve(cwd, opts.project ?? ".", DEFAULT_CONFIG_DIR);

  if (opts.config && !fs.existsSync(configDir)) {
    return { ok: false, error: { code: "CONFIG_READ_FAILED", message: `Config directory not found: ${configDir}` } };
  }

  const loaded = loadConfig({
    configDir: fs.existsSync(configDir) ? configDir : undefined,
    envName: opts.env,
    env: deps.env,
  });
  if (!loaded.ok) return loaded;

  const { config } = loaded;
  const projectDir = path.resolve(cwd, opts.project ?? config.project_dir);
  return { ok: true, layout: { config, projectDir, runsRoot: path.resolve(projectDir, config.runs_dir) } };
}

/** Load config, resolve directories and read project metadata. */
export async function openProject(
  opts: ProjectOpts,
  deps: { runner?: CommandRunner; env?: NodeJS.ProcessEnv; cwd?: string } = {},
): Promise<SessionResult> {
  const resolved = loadProjectLayout(opts, deps);
  if (!resolved.ok) return resolved;

  const { config, projectDir } = resolved.layout;
  if (!fs.existsSync(projectDir) || !fs.statSync(projectDir).isDirectory()) {
    return { ok: false, error: { code: "METADATA_MISSING", message: `Project directory not found: ${projectDir}` } };
  }

  const meta = await readProjectMetadata(projectDir, {
    python: parseCommand(config.tools.python),
    runner: deps.runner ?? execRunner,
  });
  if (!meta.ok) return meta;

  return { ok: true, session: { ...resolved.layout, metadata: meta.metadata } };
}
