/** Checkpoint of a release run, persisted as runs/{id}/state.json. */
import type { ReleaseStep } from "../core/steps/types.js";
import type { Diagnostic } from "../report/reporter.js";

export type StepStatus = "pending" | "running" | "ok" | "error" | "skipped";

export type RunStep = {
  id: ReleaseStep;
  status: StepStatus;
  startedAt?: string;
  finishedAt?: string;
  durationMs?: number;
  exitCode?: number;
  error?: { code: string; message: string };
  diagnostics?: Diagnostic[];
  outputs?: Record<string, unknown>;
};

export type RunStatus = "running" | "ok" | "error";

export type RunState = {
  version: 1;
  runId: string;
  createdAt: string;
  updatedAt: string;
  projectDir: string;
  project: { name: string; version: string };
  status: RunStatus;
  steps: RunStep[];
};
