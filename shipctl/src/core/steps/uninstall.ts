import { diag } from "../../report/reporter.js";
import { withArgs } from "../../process/runner.js";
import { runTool } from "./tool.js";
import type { ReleaseStepDef } from "./types.js";

/** pip prints "Skipping <name> as it is not installed." for an absent package. */
const NOT_INSTALLED_RE = /^(?:WARNING: )?Skipping \S+ as it is not installed\.?\r?$/im;

/**
 * Uninstall step: remove any installed copy of the distribution. An absent
 * package is success, whatever pip's exit code says.
 */
export const uninstallStep: ReleaseStepDef = {
  id: "uninstall",
  tool: "pip",

  plan(ctx) {
    return withArgs(ctx.tools.pip, "uninstall", "-y", ctx.targets.distName);
  },

  async run(ctx) {
    const name = ctx.targets.distName;
    const res = await runTool(ctx, this, this.plan(ctx));
    const output = `${res.result.stdout}\n${res.result.stderr}`;
    const absent = NOT_INSTALLED_RE.test(output);

    if (!res.ok) {
      if (res.outcome.code !== "TOOL_FAILED" || !absent) return res.outcome;
      return {
        ok: true,
        exitCode: res.result.exitCode,
        diagnostics: [
          ...(res.outcome.diagnostics ?? []).filter((d) => d.level !== "error"),
          diag("warn", "NOT_INSTALLED", `${name} is not installed; nothing to remove`, { step: this.id }),
        ],
        outputs: { removed: false },
      };
    }

    return {
      ok: true,
      exitCode: 0,
      diagnostics: [
        ...res.diagnostics,
        absent
          ? diag("warn", "NOT_INSTALLED", `${name} is not installed; nothing to remove`, { step: this.id })
          : diag("info", "UNINSTALLED", `Removed ${name}`, { step: this.id }),
      ],
      outputs: { removed: !absent },
    };
  },
};
