import type { ShipConfig } from "../../types/config.js";
import type { Diagnostic } from "../../report/reporter.js";
import type { CommandRunner, Invocation } from "../../process/runner.js";
import type { ReleaseTargets } from "../targets.js";

/** All release steps in execution order. */
export const RELEASE_STEPS = ["uninstall", "freeze", "distribute", "install"] as const;

export type ReleaseStep = (typeof RELEASE_STEPS)[number];

export type ToolName = "python" | "pip" | "pyinstaller";

export type StepContext = {
  config: ShipConfig;
  targets: ReleaseTargets;
  tools: Record<ToolName, Invocation>;
  runner: CommandRunner;
  timeoutMs?: number;
};

export type StepFailureCode =
  | "TOOL_FAILED"
  | "STEP_TIMEOUT"
  | "ENTRY_POINT_MISSING"
  | "ARTIFACT_MISSING"
  | "WHEEL_NOT_FOUND";

export type StepOutcome =
  | { ok: true; exitCode?: number; diagnostics?: Diagnostic[]; outputs?: Record<string, unknown> }
  | { ok: false; code: StepFailureCode; message: string; exitCode?: number; diagnostics?: Diagnostic[] };

export interface ReleaseStepDef {
  id: ReleaseStep;
  tool: ToolName;
  /** The exact external call this step makes. */
  plan(ctx: StepContext): Invocation;
  run(ctx: StepContext): Promise<StepOutcome>;
}
