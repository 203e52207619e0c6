import fs from "node:fs";
import { diag } from "../../report/reporter.js";
import { withArgs } from "../../process/runner.js";
import { rel, runTool } from "./tool.js";
import type { ReleaseStepDef } from "./types.js";

/**
 * Install step: install the wheel built for the current metadata version.
 * The path is derived, never configured, so it cannot go stale.
 */
export const installStep: ReleaseStepDef = {
  id: "install",
  tool: "pip",

  plan(ctx) {
    return withArgs(ctx.tools.pip, "install", rel(ctx, ctx.targets.wheel));
  },

  async run(ctx) {
    const wheel = ctx.targets.wheel;
    if (!fs.existsSync(wheel)) {
      const distDir = ctx.targets.distDir;
      const present = fs.existsSync(distDir)
        ? fs.readdirSync(distDir).filter((f) => f.endsWith(".whl")).sort()
        : [];
      return {
        ok: false,
        code: "WHEEL_NOT_FOUND",
        message:
          `Wheel not found: ${rel(ctx, wheel)}` +
          (present.length > 0 ? ` (wheels present: ${present.join(", ")})` : ""),
      };
    }

    const res = await runTool(ctx, this, this.plan(ctx));
    if (!res.ok) return res.outcome;

    return {
      ok: true,
      exitCode: 0,
      diagnostics: [
        ...res.diagnostics,
        diag("info", "INSTALLED", `Installed ${ctx.targets.distName} ${ctx.targets.version}`, { step: this.id }),
      ],
      outputs: { wheel: rel(ctx, wheel) },
    };
  },
};
