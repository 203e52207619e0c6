import path from "node:path";
import { diag, type Diagnostic } from "../../report/reporter.js";
import { formatInvocation, outputTail, type CommandResult, type Invocation } from "../../process/runner.js";
import type { ReleaseStepDef, StepContext, StepOutcome } from "./types.js";

export type ToolRun =
  | { ok: true; result: CommandResult; diagnostics: Diagnostic[] }
  | { ok: false; result: CommandResult; outcome: Extract<StepOutcome, { ok: false }> };

/** Project-relative path for command lines and messages. */
export function rel(ctx: StepContext, target: string): string {
  return path.relative(ctx.targets.projectDir, target) || ".";
}

/**
 * Run a step's tool in the project directory. A non-zero exit becomes a
 * TOOL_FAILED outcome carrying the tool's exit code and the tail of its output.
 */
export async function runTool(ctx: StepContext, step: ReleaseStepDef, invocation: Invocation): Promise<ToolRun> {
  const result = await ctx.runner(invocation, { cwd: ctx.targets.projectDir, timeoutMs: ctx.timeoutMs });
  const label = ctx.config.tools[step.tool];

  const diagnostics: Diagnostic[] = [
    diag("debug", "TOOL_COMMAND", formatInvocation(invocation), { step: step.id }),
  ];
  if (result.stdout.trim()) diagnostics.push(diag("debug", "TOOL_STDOUT", result.stdout.trimEnd(), { step: step.id }));
  if (result.stderr.trim()) diagnostics.push(diag("debug", "TOOL_STDERR", result.stderr.trimEnd(), { step: step.id }));

  if (result.timedOut) {
    const seconds = Math.round((ctx.timeoutMs ?? 0) / 1000);
    return {
      ok: false,
      result,
      outcome: {
        ok: false,
        code: "STEP_TIMEOUT",
        message: `${label} timed out after ${seconds}s`,
        diagnostics,
      },
    };
  }

  if (result.exitCode !== 0) {
    const tail = outputTail(result);
    if (tail.length > 0) {
      diagnostics.push(
        diag("error", "TOOL_OUTPUT", tail.join("\n"), { step: step.id, details: { exitCode: result.exitCode } }),
      );
    }
    return {
      ok: false,
      result,
      outcome: {
        ok: false,
        code: "TOOL_FAILED",
        message: `${label} exited with ${result.exitCode}`,
        exitCode: result.exitCode,
        diagnostics,
      },
    };
  }

  return { ok: true, result, diagnostics };
}
