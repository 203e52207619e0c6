import fs from "node:fs";
import { diag, type Diagnostic } from "../../report/reporter.js";
import { withArgs } from "../../process/runner.js";
import { rel, runTool } from "./tool.js";
import type { ReleaseStepDef, StepContext } from "./types.js";

/** Hidden imports as freezer flags, trimmed, de-duplicated, in configured order. */
export function hiddenImportArgs(hiddenImports: readonly string[]): string[] {
  const seen = new Set<string>();
  const args: string[] = [];
  for (const raw of hiddenImports) {
    const name = raw.trim();
    if (name.length === 0 || seen.has(name)) continue;
    seen.add(name);
    args.push(`--hidden-import=${name}`);
  }
  return args;
}

/** Output locations are only passed when they differ from PyInstaller's defaults. */
function locationArgs(ctx: StepContext): string[] {
  const args: string[] = [];
  const distPath = rel(ctx, ctx.targets.distDir);
  const workPath = rel(ctx, ctx.targets.buildDir);
  if (distPath !== "dist") args.push("--distpath", distPath);
  if (workPath !== "build") args.push("--workpath", workPath);
  return args;
}

/** Remove the app's previous work directory and executable. Returns what was removed. */
function cleanPrevious(ctx: StepContext): string[] {
  const removed: string[] = [];
  for (const target of [ctx.targets.workDir, ctx.targets.executable]) {
    if (!fs.existsSync(target)) continue;
    fs.rmSync(target, { recursive: true, force: true });
    removed.push(rel(ctx, target));
  }
  return removed;
}

/**
 * Freeze step: bundle the entry point into one self-contained executable.
 * Always non-interactive, single-file and from a clean cache.
 */
export const freezeStep: ReleaseStepDef = {
  id: "freeze",
  tool: "pyinstaller",

  plan(ctx) {
    return withArgs(
      ctx.tools.pyinstaller,
      "--noconfirm",
      "--onefile",
      "--clean",
      ...hiddenImportArgs(ctx.config.freeze.hidden_imports),
      ...locationArgs(ctx),
      "--name",
      ctx.targets.appName,
      rel(ctx, ctx.targets.entryPoint),
    );
  },

  async run(ctx) {
    const entry = ctx.targets.entryPoint;
    if (!fs.existsSync(entry) || !fs.statSync(entry).isFile()) {
      return { ok: false, code: "ENTRY_POINT_MISSING", message: `Entry point not found: ${rel(ctx, entry)}` };
    }

    const diagnostics: Diagnostic[] = cleanPrevious(ctx).map((p) =>
      diag("debug", "CLEANED", `Removed previous build output ${p}`, { step: this.id, path: p }),
    );

    const res = await runTool(ctx, this, this.plan(ctx));
    if (!res.ok) {
      return { ...res.outcome, diagnostics: [...diagnostics, ...(res.outcome.diagnostics ?? [])] };
    }
    diagnostics.push(...res.diagnostics);

    const executable = ctx.targets.executable;
    if (!fs.existsSync(executable) || !fs.statSync(executable).isFile()) {
      return {
        ok: false,
        code: "ARTIFACT_MISSING",
        message: `Freezer finished but produced no executable at ${rel(ctx, executable)}`,
        diagnostics,
      };
    }

    diagnostics.push(diag("info", "FROZEN", `Built executable ${rel(ctx, executable)}`, { step: this.id }));
    return { ok: true, exitCode: 0, diagnostics, outputs: { executable: rel(ctx, executable) } };
  },
};
