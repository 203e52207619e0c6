import fs from "node:fs";
import { listRuns, loadState, statePathForRun } from "../core/run-state.js";
import type { RunState } from "../types/state.js";

export type StatusResult = { ok: true; state: RunState } | { ok: false; error: string };

/**
 * Read the state of one release run.
 */
export function status(opts: { runsRoot: string; runId: string }): StatusResult {
  const statePath = statePathForRun(opts.runsRoot, opts.runId);

  if (!fs.existsSync(statePath)) {
    return { ok: false, error: `No run found: ${opts.runId}` };
  }

  try {
    return { ok: true, state: loadState(statePath) };
  } catch (e: unknown) {
    return { ok: false, error: `Failed to read state: ${e instanceof Error ? e.message : String(e)}` };
  }
}

export { listRuns };
