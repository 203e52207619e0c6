import fs from "node:fs";
import type { ShipConfig } from "../types/config.js";
import type { RunState, RunStep } from "../types/state.js";
import type { ArtifactKind } from "../types/manifest.js";
import type { ProjectMetadata } from "../metadata/project.js";
import { diag, type Reporter } from "../report/reporter.js";
import { formatInvocation, parseCommand, type CommandRunner } from "../process/runner.js";
import { buildManifest, writeManifest } from "../artifact-writer/manifest-builder.js";
import { resolveTargets, type ReleaseTargets } from "./targets.js";
import {
  loadState,
  makeRunId,
  manifestPathForRun,
  newRunState,
  nowIso,
  saveState,
  statePathForRun,
} from "./run-state.js";
import {
  RELEASE_STEPS,
  releaseSteps,
  type ReleaseStep,
  type ReleaseStepDef,
  type StepContext,
  type StepOutcome,
} from "./steps/index.js";

export type PipelineErrorCode =
  | Extract<StepOutcome, { ok: false }>["code"]
  | "STEP_ERROR"
  | "STEP_RANGE_INVALID"
  | "RESUME_MISMATCH";

export type PipelineError = { code: PipelineErrorCode; message: string };

export type PlannedStep = { index: number; step: ReleaseStep; command: string };

export type PlanResult = { ok: true; steps: PlannedStep[] } | { ok: false; error: PipelineError };

export type PipelineResult =
  | { ok: true; runId: string; statePath: string; manifestPath: string | null; state: RunState }
  | {
      ok: false;
      runId?: string;
      statePath?: string;
      failedStep?: ReleaseStep;
      /** Exit status of the failing tool, when a tool exit caused the failure. */
      toolExitCode?: number;
      error: PipelineError;
    };

export type RangeOptions = { from?: string; until?: string };

export type RunOptions = RangeOptions & {
  /** Resume this run if its state exists, otherwise start it under this id. */
  runId?: string;
};

/** Anything that can report the commit a release was built from. */
export type CommitSource = { getCurrentSha(): Promise<string | null> };

/** Timeout for a step in milliseconds; undefined when none is configured. */
export function getStepTimeoutMs(step: ReleaseStep, config: ShipConfig): number | undefined {
  const seconds = config.timeouts?.[step];
  return seconds && seconds > 0 ? seconds * 1000 : undefined;
}

function resolveRange(opts: RangeOptions): { from: number; until: number } | PipelineError {
  const from = opts.from ? RELEASE_STEPS.findIndex((s) => s === opts.from) : 0;
  const until = opts.until ? RELEASE_STEPS.findIndex((s) => s === opts.until) : RELEASE_STEPS.length - 1;
  if (from === -1 || until === -1 || from > until) {
    return {
      code: "STEP_RANGE_INVALID",
      message:
        `Invalid step range: from=${opts.from ?? "(start)"} until=${opts.until ?? "(end)"}` +
        ` (steps: ${RELEASE_STEPS.join(", ")})`,
    };
  }
  return { from, until };
}

/**
 * Runs uninstall → freeze → distribute → install in order.
 *
 * Each step blocks until its tool exits; the first failure stops the run.
 * Progress is checkpointed to runs/{id}/state.json after every transition so
 * a run can be resumed from the step that failed.
 */
export class ReleasePipeline {
  readonly targets: ReleaseTargets;
  private readonly steps: ReleaseStepDef[];

  constructor(
    private readonly deps: {
      config: ShipConfig;
      projectDir: string;
      metadata: ProjectMetadata;
      runner: CommandRunner;
      reporter: Reporter;
      runsRoot: string;
      git?: CommitSource;
      platform?: NodeJS.Platform;
    },
  ) {
    this.targets = resolveTargets(deps.config, deps.projectDir, deps.metadata, deps.platform);
    this.steps = releaseSteps();
  }

  private context(step: ReleaseStep): StepContext {
    const { config } = this.deps;
    return {
      config,
      targets: this.targets,
      tools: {
        python: parseCommand(config.tools.python),
        pip: parseCommand(config.tools.pip),
        pyinstaller: parseCommand(config.tools.pyinstaller),
      },
      runner: this.deps.runner,
      timeoutMs: getStepTimeoutMs(step, config),
    };
  }

  /** The command each step in range would run. Executes nothing. */
  plan(opts: RangeOptions = {}): PlanResult {
    const range = resolveRange(opts);
    if ("code" in range) return { ok: false, error: range };

    const planned: PlannedStep[] = [];
    for (let idx = range.from; idx <= range.until; idx++) {
      const step = this.steps[idx];
      planned.push({ index: idx + 1, step: step.id, command: formatInvocation(step.plan(this.context(step.id))) });
    }
    return { ok: true, steps: planned };
  }

  async run(opts: RunOptions = {}): Promise<PipelineResult> {
    const { reporter, metadata, runsRoot } = this.deps;

    const range = resolveRange(opts);
    if ("code" in range) return { ok: false, error: range };

    const runId = opts.runId ?? makeRunId();
    const statePath = statePathForRun(runsRoot, runId);

    let state: RunState;
    if (fs.existsSync(statePath)) {
      state = loadState(statePath);
      if (state.project.name !== metadata.name || state.project.version !== metadata.version) {
        return {
          ok: false,
          runId,
          statePath,
          error: {
            code: "RESUME_MISMATCH",
            message:
              `Run ${runId} released ${state.project.name} ${state.project.version}, ` +
              `but the project now declares ${metadata.name} ${metadata.version}; start a new run`,
          },
        };
      }
      state.status = "running";
    } else {
      state = newRunState({
        runId,
        projectDir: this.deps.projectDir,
        project: { name: metadata.name, version: metadata.version },
      });
    }
    saveState(statePath, state);

    for (let idx = 0; idx < this.steps.length; idx++) {
      const def = this.steps[idx];
      const record = state.steps.find((s) => s.id === def.id);
      if (!record) continue;

      if (idx < range.from || idx > range.until) {
        if (record.status !== "ok") record.status = "skipped";
        continue;
      }
      if (record.status === "ok") {
        reporter.emit(diag("info", "STEP_DONE", `[${idx + 1}/${this.steps.length}] ${def.id}: already done`, { step: def.id }));
        continue;
      }

      const failure = await this.runStep(idx, def, record, state, statePath);
      if (failure) {
        state.status = "error";
        saveState(statePath, state);
        return { ...failure, runId, statePath };
      }
    }

    state.status = "ok";
    saveState(statePath, state);

    const manifestPath = await this.writeReleaseManifest(state);
    return { ok: true, runId, statePath, manifestPath, state };
  }

  private async runStep(
    idx: number,
    def: ReleaseStepDef,
    record: RunStep,
    state: RunState,
    statePath: string,
  ): Promise<Extract<PipelineResult, { ok: false }> | null> {
    const { reporter } = this.deps;
    const ctx = this.context(def.id);

    reporter.emit(
      diag("info", "STEP_START", `[${idx + 1}/${this.steps.length}] ${def.id}: ${formatInvocation(def.plan(ctx))}`, {
        step: def.id,
      }),
    );

    record.status = "running";
    record.startedAt = nowIso();
    record.finishedAt = undefined;
    record.error = undefined;
    record.exitCode = undefined;
    saveState(statePath, state);

    const started = Date.now();
    let outcome: StepOutcome;
    try {
      outcome = await def.run(ctx);
    } catch (e: unknown) {
      record.durationMs = Date.now() - started;
      const message = e instanceof Error ? e.message : String(e);
      return this.fail(idx, def, record, { code: "STEP_ERROR", message }, state, statePath);
    }

    record.durationMs = Date.now() - started;
    record.finishedAt = nowIso();
    record.exitCode = outcome.exitCode;
    record.diagnostics = (outcome.diagnostics ?? []).filter((d) => d.level !== "debug");
    reporter.emitAll(outcome.diagnostics ?? []);

    if (!outcome.ok) return this.fail(idx, def, record, outcome, state, statePath);

    record.status = "ok";
    record.outputs = outcome.outputs;
    saveState(statePath, state);
    return null;
  }

  private fail(
    idx: number,
    def: ReleaseStepDef,
    record: RunStep,
    failure: { code: PipelineErrorCode; message: string; exitCode?: number },
    state: RunState,
    statePath: string,
  ): Extract<PipelineResult, { ok: false }> {
    const message = `step ${idx + 1} (${def.id}) failed: ${failure.message}`;

    record.status = "error";
    record.finishedAt = record.finishedAt ?? nowIso();
    record.error = { code: failure.code, message };
    saveState(statePath, state);

    return {
      ok: false,
      failedStep: def.id,
      toolExitCode: failure.code === "TOOL_FAILED" ? failure.exitCode : undefined,
      error: { code: failure.code, message },
    };
  }

  /** Record the artifacts built by this run's completed steps; null when it built none. */
  private async writeReleaseManifest(state: RunState): Promise<string | null> {
    const done = (id: ReleaseStep) => state.steps.some((s) => s.id === id && s.status === "ok");
    const artifacts: Partial<Record<ArtifactKind, string>> = {};
    if (done("freeze")) artifacts.executable = this.targets.executable;
    if (done("distribute")) {
      artifacts.sdist = this.targets.sdist;
      artifacts.wheel = this.targets.wheel;
    }
    const built = [artifacts.executable, artifacts.sdist, artifacts.wheel];
    if (!built.some((p) => p !== undefined && fs.existsSync(p))) return null;

    const commit = this.deps.git ? await this.deps.git.getCurrentSha() : null;
    const manifest = buildManifest({
      runId: state.runId,
      projectDir: this.deps.projectDir,
      metadata: this.deps.metadata,
      commit,
      artifacts,
    });
    const manifestPath = manifestPathForRun(this.deps.runsRoot, state.runId);
    writeManifest(manifestPath, manifest);
    this.deps.reporter.emit(diag("debug", "MANIFEST_WRITTEN", `Wrote ${manifestPath}`, { path: manifestPath }));
    return manifestPath;
  }
}
