import { bumpVersion } from "../metadata/version.js";
import { writeProjectVersion } from "../metadata/project.js";
import type { CommandRunner } from "../process/runner.js";
import { exitCodeFor } from "./exit-codes.js";
import { openProject, type ProjectOpts } from "./project.js";

export type BumpResult =
  | { ok: true; name: string; from: string; to: string; file: string }
  | { ok: false; exitCode: number; error: { code: string; message: string } };

/** Rewrite the project's version in the metadata file it is declared in. */
export async function bump(
  target: string,
  opts: ProjectOpts,
  deps: { runner?: CommandRunner; env?: NodeJS.ProcessEnv; cwd?: string } = {},
): Promise<BumpResult> {
  const opened = await openProject(opts, deps);
  if (!opened.ok) return { ok: false, exitCode: exitCodeFor(opened.error.code), error: opened.error };

  const { metadata, projectDir } = opened.session;
  const next = bumpVersion(metadata.version, target);
  if (!next.ok) return { ok: false, exitCode: exitCodeFor(next.error.code), error: next.error };

  const written = writeProjectVersion(projectDir, metadata.source, next.version);
  if (!written.ok) return { ok: false, exitCode: exitCodeFor(written.error.code), error: written.error };

  return { ok: true, name: metadata.name, from: metadata.version, to: next.version, file: written.file };
}
