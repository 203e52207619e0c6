#!/usr/bin/env node

import { Command, Option } from "commander";
import { release } from "./commands/release.js";
import { validateAll } from "./commands/validate.js";
import { status, listRuns } from "./commands/status.js";
import { bump } from "./commands/bump.js";
import { info } from "./commands/info.js";
import { loadProjectLayout, type ProjectOpts } from "./commands/project.js";
import { EXIT, exitCodeFor } from "./commands/exit-codes.js";
import { RELEASE_STEPS } from "./core/steps/index.js";
import { Reporter, diag, type OutputFormat } from "./report/reporter.js";

type CommonOpts = ProjectOpts & { format: OutputFormat; debug?: boolean };

function withCommon(cmd: Command): Command {
  return cmd
    .option("--project <path>", "Python project directory (default: project_dir from config)")
    .option("--config <path>", "Config directory with base.yaml and <env>.yaml (default: <project>/.shipctl)")
    .option("--env <name>", "Config environment layer to apply")
    .addOption(new Option("--format <format>", "Output format").choices(["human", "jsonl"]).default("human"))
    .option("-d, --debug", "Print tool command lines and output");
}

function reporterFor(opts: CommonOpts): Reporter {
  return new Reporter({ format: opts.format, debug: opts.debug });
}

function fail(reporter: Reporter, error: { code: string; message: string }, exitCode: number): never {
  reporter.emit(diag("error", error.code, error.message));
  process.exit(exitCode);
}

const program = new Command();

program
  .name("shipctl")
  .description("Release pipeline for Python applications: uninstall, freeze, build, install")
  .version("0.1.0");

withCommon(
  program
    .command("release")
    .description("Run the release pipeline")
    .addOption(new Option("--from <step>", "Start from this step").choices([...RELEASE_STEPS]))
    .addOption(new Option("--until <step>", "Stop after this step").choices([...RELEASE_STEPS]))
    .option("--run <id>", "Resume a run (steps already done are not repeated)")
    .option("--dry-run", "Print the commands without running them")
    .option("--tag", "Create an annotated v<version> git tag after a successful run"),
).action(async (opts: CommonOpts & { from?: string; until?: string; run?: string; dryRun?: boolean; tag?: boolean }) => {
  const reporter = reporterFor(opts);
  const res = await release(opts, { reporter });

  if (!res.ok) {
    const details = res.runId ? { runId: res.runId, statePath: res.statePath } : undefined;
    reporter.emit(diag("error", res.error.code, res.error.message, { details }));
    process.exit(res.exitCode);
  }

  if (res.dryRun) return;
  reporter.result(
    { runId: res.runId, statePath: res.statePath, manifestPath: res.manifestPath, tag: res.tag },
    `Release complete (run ${res.runId})`,
  );
});

withCommon(
  program
    .command("validate")
    .description("Validate config and (optionally) a release manifest")
    .option("--manifest <path>", "Release manifest to verify against the files on disk"),
).action((opts: CommonOpts & { manifest?: string }) => {
  const reporter = reporterFor(opts);
  const res = validateAll(opts);

  if (!res.ok) {
    reporter.emitAll(res.errors);
    process.exit(EXIT.FAILED);
  }
  if (reporter.format === "jsonl") {
    reporter.emitAll(res.diagnostics);
  } else {
    reporter.result({}, "OK");
  }
});

withCommon(
  program
    .command("status")
    .description("Show a release run, or list all runs")
    .argument("[runId]", "Run id (omit to list all)"),
).action((runId: string | undefined, opts: CommonOpts) => {
  const reporter = reporterFor(opts);
  const layout = loadProjectLayout(opts);
  if (!layout.ok) fail(reporter, layout.error, exitCodeFor(layout.error.code));
  const { runsRoot } = layout.layout;

  if (runId) {
    const res = status({ runsRoot, runId });
    if (!res.ok) fail(reporter, { code: "RUN_NOT_FOUND", message: res.error }, EXIT.FAILED);
    reporter.result({ state: res.state });
    return;
  }

  const runs = listRuns(runsRoot);
  if (reporter.format === "jsonl") {
    for (const run of runs) reporter.result(run);
    return;
  }
  if (runs.length === 0) {
    reporter.result({}, "No runs found.");
    return;
  }
  for (const run of runs) reporter.result(run, `${run.runId}  ${run.status}  ${run.version}  ${run.updatedAt}`);
});

withCommon(
  program
    .command("bump")
    .description("Set the project version: major, minor, patch or an explicit version")
    .argument("<target>", "major | minor | patch | X.Y.Z"),
).action(async (target: string, opts: CommonOpts) => {
  const reporter = reporterFor(opts);
  const res = await bump(target, opts);
  if (!res.ok) fail(reporter, res.error, res.exitCode);
  reporter.result(
    { name: res.name, from: res.from, to: res.to, file: res.file },
    `${res.name}: ${res.from} -> ${res.to} (${res.file})`,
  );
});

withCommon(
  program.command("info").description("Show project metadata and the artifacts a release produces"),
).action(async (opts: CommonOpts) => {
  const reporter = reporterFor(opts);
  const res = await info(opts);
  if (!res.ok) fail(reporter, res.error, res.exitCode);
  const i = res.info;
  reporter.result(
    { ...i },
    [
      `name:        ${i.name}`,
      `version:     ${i.version} (${i.source})`,
      `entry point: ${i.entryPoint}`,
      `executable:  ${i.executable}`,
      `sdist:       ${i.sdist}`,
      `wheel:       ${i.wheel}`,
    ].join("\n"),
  );
});

program.parseAsync(process.argv).catch((err: unknown) => {
  const message = err instanceof Error ? err.message : String(err);
  process.stderr.write(JSON.stringify({ ok: false, error: message }) + "\n");
  process.exit(EXIT.FAILED);
});
