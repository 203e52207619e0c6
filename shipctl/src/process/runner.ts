import { execFile } from "node:child_process";
import os from "node:os";
import { promisify } from "node:util";

const pExecFile = promisify(execFile);

/** A fully resolved external tool call. Never goes through a shell. */
export type Invocation = {
  command: string;
  args: string[];
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
  timedOut: boolean;
};

export type RunOptions = {
  cwd: string;
  timeoutMs?: number;
};

/** Runs an invocation to completion. Non-zero exits resolve; they do not reject. */
export type CommandRunner = (invocation: Invocation, opts: RunOptions) => Promise<CommandResult>;

/** Exit status used when the tool could not be started at all. */
export const EXIT_NOT_FOUND = 127;

/** Split a configured command line ("python -m pip") into an invocation prefix. */
export function parseCommand(commandLine: string): Invocation {
  const [command, ...args] = commandLine.trim().split(/\s+/);
  if (!command) throw new Error("Empty command line");
  return { command, args };
}

export function withArgs(base: Invocation, ...args: string[]): Invocation {
  return { command: base.command, args: [...base.args, ...args] };
}

export function formatInvocation(invocation: Invocation): string {
  return [invocation.command, ...invocation.args]
    .map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

function readProp(err: unknown, key: string): unknown {
  if (typeof err !== "object" || err === null) return undefined;
  const value: unknown = Reflect.get(err, key);
  return value;
}

function asText(value: unknown): string {
  if (typeof value === "string") return value;
  if (Buffer.isBuffer(value)) return value.toString("utf8");
  return "";
}

/** Error code execFile reports when a tool's output overruns `maxBuffer`. */
const MAX_BUFFER_CODE = "ERR_CHILD_PROCESS_STDIO_MAXBUFFER";

/** Exit status of a process the OS killed with `signal`, as shells report it. */
function signalExitCode(signal: string): number {
  const num = readProp(os.constants.signals, signal);
  return typeof num === "number" ? 128 + num : 128;
}

/** Map an execFile rejection to a result: exit code, signal death, timeout or spawn failure. */
export function resultFromExecError(e: unknown, opts: Pick<RunOptions, "timeoutMs">): CommandResult {
  const code = readProp(e, "code");
  const signal = readProp(e, "signal");
  const stdout = asText(readProp(e, "stdout"));
  const message = e instanceof Error ? e.message : String(e);
  const stderr = asText(readProp(e, "stderr")) || message;

  if (code === MAX_BUFFER_CODE) {
    return { exitCode: 1, stdout, stderr: `${stderr}\noutput exceeded the runner's buffer; tool stopped`, timedOut: false };
  }
  if (readProp(e, "killed") === true && opts.timeoutMs !== undefined && opts.timeoutMs > 0) {
    return { exitCode: 1, stdout, stderr, timedOut: true };
  }
  if (typeof code === "number") {
    return { exitCode: code, stdout, stderr, timedOut: false };
  }
  if (typeof signal === "string") {
    return { exitCode: signalExitCode(signal), stdout, stderr: `${stderr}\nterminated by ${signal}`, timedOut: false };
  }
  // ENOENT, EACCES and friends: the tool never ran
  return { exitCode: EXIT_NOT_FOUND, stdout, stderr, timedOut: false };
}

/** Child-process backed runner. */
export const execRunner: CommandRunner = async (invocation, opts) => {
  try {
    const { stdout, stderr } = await pExecFile(invocation.command, invocation.args, {
      cwd: opts.cwd,
      timeout: opts.timeoutMs && opts.timeoutMs > 0 ? opts.timeoutMs : undefined,
      maxBuffer: 64 * 1024 * 1024,
      shell: false,
      windowsHide: true,
    });
    return { exitCode: 0, stdout, stderr, timedOut: false };
  } catch (e: unknown) {
    return resultFromExecError(e, opts);
  }
};

/** Last `lines` non-empty lines of combined tool output. */
export function outputTail(result: CommandResult, lines = 10): string[] {
  return `${result.stdout}\n${result.stderr}`
    .split(/\r?\n/)
    .filter((l) => l.trim().length > 0)
    .slice(-lines);
}
