import { describe, expect, it } from "vitest";
import os from "node:os";
import {
  EXIT_NOT_FOUND,
  execRunner,
  formatInvocation,
  outputTail,
  parseCommand,
  resultFromExecError,
  withArgs,
} from "../src/process/runner.js";

describe("command lines", () => {
  it("splits configured commands on whitespace", () => {
    expect(parseCommand("  python -m   pip ")).toEqual({ command: "python", args: ["-m", "pip"] });
    expect(parseCommand("pyinstaller")).toEqual({ command: "pyinstaller", args: [] });
  });

  it("rejects an empty command", () => {
    expect(() => parseCommand("   ")).toThrow("Empty command line");
  });

  it("appends arguments without mutating the base", () => {
    const pip = parseCommand("python -m pip");
    expect(withArgs(pip, "install", "dist/app-1.2.0-py3-none-any.whl")).toEqual({
      command: "python",
      args: ["-m", "pip", "install", "dist/app-1.2.0-py3-none-any.whl"],
    });
    expect(pip.args).toEqual(["-m", "pip"]);
  });

  it("quotes arguments that need it when printing", () => {
    expect(formatInvocation({ command: "pyinstaller", args: ["--name", "my app", "app/__main__.py"] })).toBe(
      'pyinstaller --name "my app" app/__main__.py',
    );
  });

  it("keeps the last lines of combined output", () => {
    const tail = outputTail({ exitCode: 1, stdout: "a\n\nb\n", stderr: "c\nd\n", timedOut: false }, 3);
    expect(tail).toEqual(["b", "c", "d"]);
  });
});

describe("execRunner", () => {
  it("reports a tool that cannot be started as exit 127", async () => {
    const res = await execRunner({ command: "shipctl-no-such-tool", args: [] }, { cwd: os.tmpdir() });
    expect(res.exitCode).toBe(EXIT_NOT_FOUND);
    expect(res.timedOut).toBe(false);
  });
});

describe("resultFromExecError", () => {
  const failure = (props: Record<string, unknown>) =>
    Object.assign(new Error("Command failed: pyinstaller --onefile"), { stdout: "", stderr: "", ...props });

  it("reports a signal death as 128 + the signal number", () => {
    const res = resultFromExecError(failure({ code: null, killed: false, signal: "SIGKILL" }), {});
    expect(res).toEqual({
      exitCode: 128 + os.constants.signals.SIGKILL,
      stdout: "",
      stderr: "Command failed: pyinstaller --onefile\nterminated by SIGKILL",
      timedOut: false,
    });
  });

  it("reports a timeout only when one was configured", () => {
    const killed = failure({ code: null, killed: true, signal: "SIGTERM" });
    expect(resultFromExecError(killed, { timeoutMs: 5000 })).toEqual({
      exitCode: 1,
      stdout: "",
      stderr: "Command failed: pyinstaller --onefile",
      timedOut: true,
    });
    expect(resultFromExecError(killed, {})).toEqual({
      exitCode: 128 + os.constants.signals.SIGTERM,
      stdout: "",
      stderr: "Command failed: pyinstaller --onefile\nterminated by SIGTERM",
      timedOut: false,
    });
  });

  it("does not report an output overrun as a timeout", () => {
    const overrun = failure({ code: "ERR_CHILD_PROCESS_STDIO_MAXBUFFER", killed: true, signal: "SIGTERM", stderr: "partial" });
    expect(resultFromExecError(overrun, { timeoutMs: 5000 })).toEqual({
      exitCode: 1,
      stdout: "",
      stderr: "partial\noutput exceeded the runner's buffer; tool stopped",
      timedOut: false,
    });
  });

  it("passes a numeric exit code through", () => {
    const res = resultFromExecError(failure({ code: 2, killed: false, signal: null, stderr: "usage error\n" }), {});
    expect(res).toEqual({ exitCode: 2, stdout: "", stderr: "usage error\n", timedOut: false });
  });

  it("keeps 127 for tools that never started", () => {
    const res = resultFromExecError(failure({ code: "ENOENT", errno: -2 }), {});
    expect(res.exitCode).toBe(EXIT_NOT_FOUND);
    expect(res.timedOut).toBe(false);
  });
});
