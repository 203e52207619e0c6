import { ReleasePipeline, type PlannedStep } from "../core/pipeline.js";
import { RELEASE_STEPS } from "../core/steps/index.js";
import { GitOperations, releaseTagName } from "../git/operations.js";
import { execRunner, type CommandRunner } from "../process/runner.js";
import { diag, type Reporter } from "../report/reporter.js";
import { exitCodeFor } from "./exit-codes.js";
import { openProject, type ProjectOpts } from "./project.js";

export type ReleaseOpts = ProjectOpts & {
  from?: string;
  until?: string;
  /** Resume (or name) a run. */
  run?: string;
  dryRun?: boolean;
  /** Create an annotated v<version> tag after a successful full run. */
  tag?: boolean;
};

export type ReleaseGit = {
  getCurrentSha(): Promise<string | null>;
  isRepo(): Promise<boolean>;
  tagExists(name: string): Promise<boolean>;
  createTag(name: string, message?: string): Promise<void>;
};

export type ReleaseDeps = {
  reporter: Reporter;
  runner?: CommandRunner;
  git?: (projectDir: string) => ReleaseGit;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  platform?: NodeJS.Platform;
};

export type ReleaseResult =
  | { ok: true; dryRun: true; plan: PlannedStep[] }
  | { ok: true; dryRun: false; runId: string; statePath: string; manifestPath: string | null; tag: string | null }
  | { ok: false; exitCode: number; error: { code: string; message: string }; runId?: string; statePath?: string };

export async function release(opts: ReleaseOpts, deps: ReleaseDeps): Promise<ReleaseResult> {
  const runner = deps.runner ?? execRunner;
  const opened = await openProject(opts, { runner, env: deps.env, cwd: deps.cwd });
  if (!opened.ok) return { ok: false, exitCode: exitCodeFor(opened.error.code), error: opened.error };

  const { config, projectDir, runsRoot, metadata } = opened.session;
  const git = (deps.git ?? ((dir: string) => new GitOperations(dir)))(projectDir);

  const pipeline = new ReleasePipeline({
    config,
    projectDir,
    metadata,
    runner,
    reporter: deps.reporter,
    runsRoot,
    git,
    platform: deps.platform,
  });

  deps.reporter.emit(
    diag("info", "PROJECT", `Releasing ${metadata.name} ${metadata.version} (from ${metadata.source})`),
  );

  if (opts.dryRun) {
    const planned = pipeline.plan({ from: opts.from, until: opts.until });
    if (!planned.ok) return { ok: false, exitCode: exitCodeFor(planned.error.code), error: planned.error };
    for (const p of planned.steps) {
      deps.reporter.emit(diag("info", "PLAN", `[${p.index}/${RELEASE_STEPS.length}] ${p.step}: ${p.command}`, { step: p.step }));
    }
    return { ok: true, dryRun: true, plan: planned.steps };
  }

  const res = await pipeline.run({ from: opts.from, until: opts.until, runId: opts.run });
  if (!res.ok) {
    return {
      ok: false,
      exitCode: exitCodeFor(res.error.code, res.toolExitCode),
      error: res.error,
      runId: res.runId,
      statePath: res.statePath,
    };
  }

  let tag: string | null = null;
  if (opts.tag) {
    if (opts.from || opts.until) {
      deps.reporter.emit(diag("warn", "TAG_SKIPPED", "Not tagging a partial run"));
    } else {
      tag = await createReleaseTag(git, metadata.version, deps.reporter);
    }
  }

  return { ok: true, dryRun: false, runId: res.runId, statePath: res.statePath, manifestPath: res.manifestPath, tag };
}

/** Tag HEAD as v<version>. Problems are reported as warnings; the release itself already succeeded. */
async function createReleaseTag(git: ReleaseGit, version: string, reporter: Reporter): Promise<string | null> {
  const name = releaseTagName(version);
  try {
    if (!(await git.isRepo())) {
      reporter.emit(diag("warn", "TAG_SKIPPED", "Project is not a git repository; no tag created"));
      return null;
    }
    if (await git.tagExists(name)) {
      reporter.emit(diag("warn", "TAG_EXISTS", `Tag ${name} already exists`));
      return null;
    }
    await git.createTag(name, `Release ${version}`);
    reporter.emit(diag("info", "TAGGED", `Tagged ${name}`));
    return name;
  } catch (e: unknown) {
    const message = e instanceof Error ? e.message : String(e);
    reporter.emit(diag("warn", "TAG_FAILED", `Could not create tag ${name}: ${message}`));
    return null;
  }
}
