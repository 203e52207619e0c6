import fs from "node:fs";
import path from "node:path";
import crypto from "node:crypto";
import { RELEASE_STEPS } from "./steps/types.js";
import type { RunState } from "../types/state.js";

export function nowIso(): string {
  return new Date().toISOString();
}

export function makeRunId(): string {
  const ts = new Date().toISOString().replace(/[:.]/g, "-");
  return `${ts}-${crypto.randomBytes(3).toString("hex")}`;
}

export function runDirFor(runsRoot: string, runId: string): string {
  return path.join(runsRoot, runId);
}

export function statePathForRun(runsRoot: string, runId: string): string {
  return path.join(runDirFor(runsRoot, runId), "state.json");
}

export function manifestPathForRun(runsRoot: string, runId: string): string {
  return path.join(runDirFor(runsRoot, runId), "manifest.json");
}

export function newRunState(opts: {
  runId: string;
  projectDir: string;
  project: { name: string; version: string };
}): RunState {
  const at = nowIso();
  return {
    version: 1,
    runId: opts.runId,
    createdAt: at,
    updatedAt: at,
    projectDir: opts.projectDir,
    project: opts.project,
    status: "running",
    steps: RELEASE_STEPS.map((id) => ({ id, status: "pending" })),
  };
}

export function loadState(statePath: string): RunState {
  return JSON.parse(fs.readFileSync(statePath, "utf8")) as RunState;
}

export function saveState(statePath: string, state: RunState): void {
  state.updatedAt = nowIso();
  fs.mkdirSync(path.dirname(statePath), { recursive: true });
  fs.writeFileSync(statePath, JSON.stringify(state, null, 2) + "\n", "utf8");
}

/** All runs under the root, most recently updated first. Unreadable state files are reported as corrupted. */
export function listRuns(
  runsRoot: string,
): Array<{ runId: string; status: string; version: string; updatedAt: string }> {
  if (!fs.existsSync(runsRoot)) return [];

  const results: Array<{ runId: string; status: string; version: string; updatedAt: string }> = [];
  for (const entry of fs.readdirSync(runsRoot, { withFileTypes: true })) {
    if (!entry.isDirectory()) continue;
    const statePath = statePathForRun(runsRoot, entry.name);
    if (!fs.existsSync(statePath)) continue;

    try {
      const state = loadState(statePath);
      results.push({
        runId: entry.name,
        status: String(state.status ?? "unknown"),
        version: String(state.project?.version ?? ""),
        updatedAt: String(state.updatedAt ?? ""),
      });
    } catch {
      results.push({ runId: entry.name, status: "corrupted", version: "", updatedAt: "" });
    }
  }

  return results.sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
}
