import { describe, expect, it, beforeEach, afterEach } from "vitest";
import fs from "node:fs";
import path from "node:path";
import { release, type ReleaseGit, type ReleaseOpts } from "../src/commands/release.js";
import { validateManifest } from "../src/commands/validate.js";
import { listRuns, loadState } from "../src/core/run-state.js";
import type { ReleaseManifest } from "../src/types/manifest.js";
import type { RunState } from "../src/types/state.js";
import { captureReporter, fakeTools, makeProject, noGit, setVersion, type FakeTools } from "./helpers/fake-tools.js";

const commandLines = (tools: FakeTools) => tools.calls.map((c) => [c.command, ...c.args].join(" "));

const statuses = (state: RunState) => state.steps.map((s) => `${s.id}:${s.status}`);

describe("release pipeline", () => {
  let projectDir: string;

  beforeEach(() => {
    projectDir = makeProject({ name: "app", version: "1.2.0" });
  });

  afterEach(() => {
    fs.rmSync(projectDir, { recursive: true, force: true });
  });

  async function releaseWith(
    tools: FakeTools,
    opts: ReleaseOpts = {},
    extra: { git?: ReleaseGit; env?: NodeJS.ProcessEnv } = {},
  ) {
    const { reporter, out, err } = captureReporter();
    const res = await release(opts, {
      reporter,
      runner: tools.runner,
      git: () => extra.git ?? noGit,
      env: extra.env ?? {},
      cwd: projectDir,
      platform: "linux",
    });
    return { res, out, err };
  }

  it("releases app 1.2.0 end to end", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const { res, out } = await releaseWith(tools);

    expect(res.ok).toBe(true);
    if (!res.ok || res.dryRun) return;

    expect(commandLines(tools)).toEqual([
      "pip uninstall -y app",
      "pyinstaller --noconfirm --onefile --clean --hidden-import=pkg_resources.py2_warn --name app app/__main__.py",
      "python setup.py sdist bdist_wheel",
      "pip install dist/app-1.2.0-py3-none-any.whl",
    ]);
    expect(tools.calls.every((c) => c.cwd === projectDir)).toBe(true);

    for (const file of ["app", "app-1.2.0.tar.gz", "app-1.2.0-py3-none-any.whl"]) {
      expect(fs.existsSync(path.join(projectDir, "dist", file))).toBe(true);
    }
    expect(tools.installed).toEqual(new Map([["app", "1.2.0"]]));

    expect(out[0]).toBe("Releasing app 1.2.0 (from pyproject.toml)");
    expect(out[1]).toBe("[1/4] uninstall: pip uninstall -y app");
    expect(out).toContain("[4/4] install: pip install dist/app-1.2.0-py3-none-any.whl");
    expect(out).toContain("Installed app 1.2.0");

    const state = loadState(res.statePath);
    expect(state.status).toBe("ok");
    expect(statuses(state)).toEqual(["uninstall:ok", "freeze:ok", "distribute:ok", "install:ok"]);
    expect(state.steps[0].outputs).toEqual({ removed: false });

    expect(res.manifestPath).toBe(path.join(projectDir, ".shipctl", "runs", res.runId, "manifest.json"));
    if (!res.manifestPath) return;
    const manifest: ReleaseManifest = JSON.parse(fs.readFileSync(res.manifestPath, "utf8"));
    expect(manifest.project).toEqual({ name: "app", version: "1.2.0", metadata_source: "pyproject.toml" });
    expect(manifest.scm).toBeNull();
    expect(manifest.artifacts.map((a) => `${a.kind}:${a.path}:${a.bytes}`)).toEqual([
      "executable:dist/app:10",
      "sdist:dist/app-1.2.0.tar.gz:11",
      "wheel:dist/app-1.2.0-py3-none-any.whl:11",
    ]);
    expect(validateManifest(res.manifestPath, projectDir)).toEqual([]);
  });

  it("ends in the same state when run twice", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });

    const first = await releaseWith(tools);
    const second = await releaseWith(tools);

    expect(first.res.ok && second.res.ok).toBe(true);
    expect(tools.installed).toEqual(new Map([["app", "1.2.0"]]));
    expect(second.out).toContain("Removed app");
    expect(fs.readdirSync(path.join(projectDir, "dist")).sort()).toEqual([
      "app",
      "app-1.2.0-py3-none-any.whl",
      "app-1.2.0.tar.gz",
    ]);
    expect(listRuns(path.join(projectDir, ".shipctl", "runs")).map((r) => r.status)).toEqual(["ok", "ok"]);
  });

  it("fails at install when the metadata version moved past the built wheel", async () => {
    setVersion(projectDir, "app", "1.2.1");
    const tools = fakeTools({ name: "app", version: "1.2.1", builtVersion: "1.2.0" });

    const { res, err } = await releaseWith(tools);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(4);
    expect(res.error).toEqual({
      code: "WHEEL_NOT_FOUND",
      message:
        "step 4 (install) failed: Wheel not found: dist/app-1.2.1-py3-none-any.whl (wheels present: app-1.2.0-py3-none-any.whl)",
    });
    expect(err).toContain(
      "warning: Build finished but dist/app-1.2.1.tar.gz, dist/app-1.2.1-py3-none-any.whl not found" +
        " (version 1.2.1; dist contains: app, app-1.2.0-py3-none-any.whl, app-1.2.0.tar.gz)",
    );

    // steps 1-3 kept their side effects
    expect(commandLines(tools)).toHaveLength(3);
    expect(fs.existsSync(path.join(projectDir, "dist", "app"))).toBe(true);
    expect(fs.existsSync(path.join(projectDir, "dist", "app-1.2.0-py3-none-any.whl"))).toBe(true);
    expect(tools.installed.size).toBe(0);

    if (!res.statePath) throw new Error("state path expected");
    const state = loadState(res.statePath);
    expect(state.status).toBe("error");
    expect(statuses(state)).toEqual(["uninstall:ok", "freeze:ok", "distribute:ok", "install:error"]);
    expect(fs.existsSync(path.join(path.dirname(res.statePath), "manifest.json"))).toBe(false);
  });

  it("stops at the first failing tool and exits with its status", async () => {
    const tools = fakeTools({
      name: "app",
      version: "1.2.0",
      fail: { pyinstaller: { exitCode: 3, stderr: "ModuleNotFoundError: No module named 'suisei'\n" } },
    });

    const { res } = await releaseWith(tools);

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(3);
    expect(res.error).toEqual({ code: "TOOL_FAILED", message: "step 2 (freeze) failed: pyinstaller exited with 3" });
    expect(commandLines(tools)).toHaveLength(2);

    if (!res.statePath) throw new Error("state path expected");
    const state = loadState(res.statePath);
    expect(statuses(state)).toEqual(["uninstall:ok", "freeze:error", "distribute:pending", "install:pending"]);
    expect(state.steps[1].exitCode).toBe(3);
    expect(state.steps[1].diagnostics?.map((d) => d.message)).toEqual(["ModuleNotFoundError: No module named 'suisei'"]);
  });

  it("exits 127 when a tool cannot be started", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0", fail: { uninstall: { exitCode: 127, stderr: "spawn pip ENOENT" } } });
    const { res } = await releaseWith(tools);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(127);
      expect(res.error.message).toBe("step 1 (uninstall) failed: pip exited with 127");
    }
  });

  it("fails a step whose tool exceeds its timeout", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0", fail: { pyinstaller: { exitCode: 1, timedOut: true } } });
    const { res } = await releaseWith(tools, {}, { env: { SHIPCTL_TIMEOUTS__FREEZE: "90" } });
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(5);
      expect(res.error).toEqual({ code: "STEP_TIMEOUT", message: "step 2 (freeze) failed: pyinstaller timed out after 90s" });
    }
  });

  it("resumes a failed run from the failed step", async () => {
    const broken = fakeTools({ name: "app", version: "1.2.0", fail: { build: { exitCode: 1 } } });
    const first = await releaseWith(broken);
    expect(first.res.ok).toBe(false);
    if (first.res.ok || !first.res.runId) throw new Error("failed run with id expected");
    const runId = first.res.runId;

    const fixed = fakeTools({ name: "app", version: "1.2.0" });
    const second = await releaseWith(fixed, { run: runId });

    expect(second.res.ok).toBe(true);
    expect(commandLines(fixed)).toEqual(["python setup.py sdist bdist_wheel", "pip install dist/app-1.2.0-py3-none-any.whl"]);
    expect(second.out).toContain("[1/4] uninstall: already done");
    expect(second.out).toContain("[2/4] freeze: already done");
    if (second.res.ok && !second.res.dryRun) expect(second.res.runId).toBe(runId);
  });

  it("refuses to resume a run after the version changed", async () => {
    const broken = fakeTools({ name: "app", version: "1.2.0", fail: { build: { exitCode: 1 } } });
    const first = await releaseWith(broken);
    if (first.res.ok || !first.res.runId) throw new Error("failed run with id expected");

    setVersion(projectDir, "app", "1.3.0");
    const tools = fakeTools({ name: "app", version: "1.3.0" });
    const { res } = await releaseWith(tools, { run: first.res.runId });

    expect(res.ok).toBe(false);
    if (res.ok) return;
    expect(res.exitCode).toBe(2);
    expect(res.error.code).toBe("RESUME_MISMATCH");
    expect(tools.calls).toHaveLength(0);
  });

  it("runs only the requested step range", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const { res } = await releaseWith(tools, { from: "distribute", until: "distribute" });

    expect(res.ok).toBe(true);
    if (!res.ok || res.dryRun) return;
    expect(commandLines(tools)).toEqual(["python setup.py sdist bdist_wheel"]);
    expect(statuses(loadState(res.statePath))).toEqual([
      "uninstall:skipped",
      "freeze:skipped",
      "distribute:ok",
      "install:skipped",
    ]);
  });

  it("writes no manifest for a run that built nothing", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const full = await releaseWith(tools);
    expect(full.res.ok).toBe(true);

    const uninstallOnly = await releaseWith(tools, { until: "uninstall" });
    const installOnly = await releaseWith(tools, { from: "install" });

    for (const { res } of [uninstallOnly, installOnly]) {
      expect(res.ok).toBe(true);
      if (!res.ok || res.dryRun) return;
      expect(res.manifestPath).toBeNull();
      expect(fs.existsSync(path.join(path.dirname(res.statePath), "manifest.json"))).toBe(false);
    }
  });

  it("records only the artifacts built by the run's own steps", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    await releaseWith(tools);

    const { res } = await releaseWith(tools, { from: "distribute", until: "distribute" });

    expect(res.ok).toBe(true);
    if (!res.ok || res.dryRun || !res.manifestPath) throw new Error("manifest expected");
    const manifest: ReleaseManifest = JSON.parse(fs.readFileSync(res.manifestPath, "utf8"));
    expect(manifest.artifacts.map((a) => `${a.kind}:${a.path}`)).toEqual([
      "sdist:dist/app-1.2.0.tar.gz",
      "wheel:dist/app-1.2.0-py3-none-any.whl",
    ]);
  });

  it("rejects a backwards step range", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const { res } = await releaseWith(tools, { from: "install", until: "freeze" });

    expect(res).toEqual({
      ok: false,
      exitCode: 2,
      error: {
        code: "STEP_RANGE_INVALID",
        message: "Invalid step range: from=install until=freeze (steps: uninstall, freeze, distribute, install)",
      },
      runId: undefined,
      statePath: undefined,
    });
    expect(fs.existsSync(path.join(projectDir, ".shipctl"))).toBe(false);
  });

  it("prints the plan on a dry run without running anything", async () => {
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const { res, out } = await releaseWith(tools, { dryRun: true });

    expect(res.ok && res.dryRun).toBe(true);
    expect(out).toEqual([
      "Releasing app 1.2.0 (from pyproject.toml)",
      "[1/4] uninstall: pip uninstall -y app",
      "[2/4] freeze: pyinstaller --noconfirm --onefile --clean --hidden-import=pkg_resources.py2_warn --name app app/__main__.py",
      "[3/4] distribute: python setup.py sdist bdist_wheel",
      "[4/4] install: pip install dist/app-1.2.0-py3-none-any.whl",
    ]);
    expect(tools.calls).toHaveLength(0);
    expect(fs.existsSync(path.join(projectDir, ".shipctl"))).toBe(false);
  });

  it("uses the project's hidden import list", async () => {
    fs.mkdirSync(path.join(projectDir, ".shipctl"));
    fs.writeFileSync(
      path.join(projectDir, ".shipctl", "base.yaml"),
      "freeze:\n  hidden_imports:\n    - pkg_resources.py2_warn\n    - app.plugins.builtin\n",
    );
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    await releaseWith(tools, { until: "freeze" });

    expect(tools.calls[1].args).toEqual([
      "--noconfirm",
      "--onefile",
      "--clean",
      "--hidden-import=pkg_resources.py2_warn",
      "--hidden-import=app.plugins.builtin",
      "--name",
      "app",
      "app/__main__.py",
    ]);
  });

  it("exits 3 when the project has no metadata", async () => {
    fs.rmSync(path.join(projectDir, "pyproject.toml"));
    const tools = fakeTools({ name: "app", version: "1.2.0" });
    const { res } = await releaseWith(tools);
    expect(res.ok).toBe(false);
    if (!res.ok) {
      expect(res.exitCode).toBe(3);
      expect(res.error.code).toBe("METADATA_MISSING");
    }
  });

  describe("tagging", () => {
    const sha = "0123456789abcdef0123456789abcdef01234567";

    function fakeGit(existing: string[] = []) {
      const created: Array<{ name: string; message?: string }> = [];
      const git: ReleaseGit = {
        getCurrentSha: async () => sha,
        isRepo: async () => true,
        tagExists: async (name) => existing.includes(name),
        createTag: async (name, message) => {
          created.push({ name, message });
        },
      };
      return { git, created };
    }

    it("tags a successful full run and records the commit", async () => {
      const { git, created } = fakeGit();
      const tools = fakeTools({ name: "app", version: "1.2.0" });
      const { res, out } = await releaseWith(tools, { tag: true }, { git });

      expect(res.ok).toBe(true);
      if (!res.ok || res.dryRun) return;
      expect(res.tag).toBe("v1.2.0");
      expect(created).toEqual([{ name: "v1.2.0", message: "Release 1.2.0" }]);
      expect(out).toContain("Tagged v1.2.0");

      if (!res.manifestPath) throw new Error("manifest expected");
      const manifest: ReleaseManifest = JSON.parse(fs.readFileSync(res.manifestPath, "utf8"));
      expect(manifest.scm).toEqual({ commit: sha });
    });

    it("warns instead of retagging an existing version", async () => {
      const { git, created } = fakeGit(["v1.2.0"]);
      const tools = fakeTools({ name: "app", version: "1.2.0" });
      const { res, err } = await releaseWith(tools, { tag: true }, { git });

      expect(res.ok && !res.dryRun && res.tag).toBeNull();
      expect(created).toHaveLength(0);
      expect(err).toContain("warning: Tag v1.2.0 already exists");
    });

    it("does not tag a partial run", async () => {
      const { git, created } = fakeGit();
      const tools = fakeTools({ name: "app", version: "1.2.0" });
      const { err } = await releaseWith(tools, { tag: true, until: "freeze" }, { git });

      expect(created).toHaveLength(0);
      expect(err).toContain("warning: Not tagging a partial run");
    });

    it("warns when tag creation fails", async () => {
      const { git } = fakeGit();
      git.createTag = async () => {
        throw new Error("fatal: no tag message?");
      };
      const tools = fakeTools({ name: "app", version: "1.2.0" });
      const { res, err } = await releaseWith(tools, { tag: true }, { git });

      expect(res.ok).toBe(true);
      expect(err).toContain("warning: Could not create tag v1.2.0: fatal: no tag message?");
    });
  });
});
