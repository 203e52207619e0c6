import path from "node:path";
import { resolveTargets } from "../core/targets.js";
import type { CommandRunner } from "../process/runner.js";
import { exitCodeFor } from "./exit-codes.js";
import { openProject, type ProjectOpts } from "./project.js";

export type ProjectInfo = {
  name: string;
  version: string;
  source: string;
  entryPoint: string;
  executable: string;
  sdist: string;
  wheel: string;
};

export type InfoResult = { ok: true; info: ProjectInfo } | { ok: false; exitCode: number; error: { code: string; message: string } };

/** Resolved metadata and the files a release of it produces, relative to the project. */
export async function info(
  opts: ProjectOpts,
  deps: { runner?: CommandRunner; env?: NodeJS.ProcessEnv; cwd?: string; platform?: NodeJS.Platform } = {},
): Promise<InfoResult> {
  const opened = await openProject(opts, deps);
  if (!opened.ok) return { ok: false, exitCode: exitCodeFor(opened.error.code), error: opened.error };

  const { config, projectDir, metadata } = opened.session;
  const targets = resolveTargets(config, projectDir, metadata, deps.platform);
  const rel = (p: string) => path.relative(projectDir, p);

  return {
    ok: true,
    info: {
      name: metadata.name,
      version: metadata.version,
      source: metadata.source,
      entryPoint: rel(targets.entryPoint),
      executable: rel(targets.executable),
      sdist: rel(targets.sdist),
      wheel: rel(targets.wheel),
    },
  };
}
