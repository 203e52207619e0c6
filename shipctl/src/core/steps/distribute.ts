import fs from "node:fs";
import { diag } from "../../report/reporter.js";
import { withArgs } from "../../process/runner.js";
import { rel, runTool } from "./tool.js";
import type { ReleaseStepDef } from "./types.js";

/**
 * Distribute step: build the source archive and the wheel from the project's
 * own build configuration.
 */
export const distributeStep: ReleaseStepDef = {
  id: "distribute",
  tool: "python",

  plan(ctx) {
    const distPath = rel(ctx, ctx.targets.distDir);
    if (ctx.config.distribution.backend === "pypa-build") {
      return withArgs(ctx.tools.python, "-m", "build", "--sdist", "--wheel", "--outdir", distPath);
    }
    if (distPath !== "dist") {
      return withArgs(ctx.tools.python, "setup.py", "sdist", "--dist-dir", distPath, "bdist_wheel", "--dist-dir", distPath);
    }
    return withArgs(ctx.tools.python, "setup.py", "sdist", "bdist_wheel");
  },

  async run(ctx) {
    const res = await runTool(ctx, this, this.plan(ctx));
    if (!res.ok) return res.outcome;

    const expected = [ctx.targets.sdist, ctx.targets.wheel];
    const missing = expected.filter((p) => !fs.existsSync(p));
    if (missing.length > 0) {
      // reported here, fatal at install
      const present = fs.existsSync(ctx.targets.distDir) ? fs.readdirSync(ctx.targets.distDir).sort() : [];
      return {
        ok: true,
        exitCode: 0,
        diagnostics: [
          ...res.diagnostics,
          diag(
            "warn",
            "VERSION_MISMATCH",
            `Build finished but ${missing.map((p) => rel(ctx, p)).join(", ")} not found` +
              ` (version ${ctx.targets.version}; ${rel(ctx, ctx.targets.distDir)} contains: ${present.join(", ") || "nothing"})`,
            { step: this.id, details: { missing: missing.map((p) => rel(ctx, p)) } },
          ),
        ],
        outputs: { found: present },
      };
    }

    return {
      ok: true,
      exitCode: 0,
      diagnostics: [
        ...res.diagnostics,
        ...expected.map((p) => diag("info", "BUILT", `Built ${rel(ctx, p)}`, { step: this.id })),
      ],
      outputs: { sdist: rel(ctx, ctx.targets.sdist), wheel: rel(ctx, ctx.targets.wheel) },
    };
  },
};
