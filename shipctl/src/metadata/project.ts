import fs from "node:fs";
import path from "node:path";
import { execRunner, withArgs, type CommandRunner, type Invocation } from "../process/runner.js";

export type MetadataSource = "pyproject.toml" | "setup.cfg" | "setup.py";

export type ProjectMetadata = {
  name: string;
  version: string;
  source: MetadataSource;
};

export type MetadataError = { code: "METADATA_MISSING" | "METADATA_INVALID" | "METADATA_READONLY"; message: string };

export type MetadataResult = { ok: true; metadata: ProjectMetadata } | { ok: false; error: MetadataError };

type KeyLine = { value: string; line: number };

const SECTION_RE = /^\s*\[([^\]]+)\]\s*(?:#.*)?$/;
const TOML_KEY_RE = /^\s*([A-Za-z0-9_.-]+)\s*=\s*(.*?)\s*$/;
/** configparser takes `key = value` and `key: value`. */
const CFG_KEY_RE = /^\s*([A-Za-z0-9_.-]+)\s*[=:]\s*(.*?)\s*$/;

/** Collect `key = value` lines of one section of an INI/TOML-like file. */
function readSection(content: string, section: string, keyRe: RegExp): Map<string, KeyLine> {
  const keys = new Map<string, KeyLine>();
  const lines = content.split(/\r?\n/);
  let current: string | null = null;

  for (let idx = 0; idx < lines.length; idx++) {
    const header = SECTION_RE.exec(lines[idx]);
    if (header) {
      current = header[1].trim();
      continue;
    }
    if (current !== section) continue;
    const kv = keyRe.exec(lines[idx]);
    if (kv && !keys.has(kv[1])) keys.set(kv[1], { value: kv[2], line: idx });
  }

  return keys;
}

/** TOML basic or literal string; anything else (arrays, tables, dynamic) is not a literal. */
function tomlString(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  const m = /^(?:"([^"]*)"|'([^']*)')\s*(?:#.*)?$/.exec(raw);
  if (!m) return null;
  return (m[1] ?? m[2]).trim();
}

/** setup.cfg value; `attr:` and `file:` directives are resolved by setuptools, not here. */
function cfgString(raw: string | undefined): string | null {
  if (raw === undefined) return null;
  const value = raw.replace(/\s+[#;].*$/, "").trim();
  if (value.length === 0 || /^(attr|file)\s*:/.test(value)) return null;
  return value;
}

function fromPyproject(projectDir: string): ProjectMetadata | null {
  const file = path.join(projectDir, "pyproject.toml");
  if (!fs.existsSync(file)) return null;
  const keys = readSection(fs.readFileSync(file, "utf8"), "project", TOML_KEY_RE);
  const name = tomlString(keys.get("name")?.value);
  const version = tomlString(keys.get("version")?.value);
  return name && version ? { name, version, source: "pyproject.toml" } : null;
}

function fromSetupCfg(projectDir: string): ProjectMetadata | null {
  const file = path.join(projectDir, "setup.cfg");
  if (!fs.existsSync(file)) return null;
  const keys = readSection(fs.readFileSync(file, "utf8"), "metadata", CFG_KEY_RE);
  const name = cfgString(keys.get("name")?.value);
  const version = cfgString(keys.get("version")?.value);
  return name && version ? { name, version, source: "setup.cfg" } : null;
}

async function fromSetupPy(
  projectDir: string,
  python: Invocation,
  runner: CommandRunner,
): Promise<MetadataResult | null> {
  if (!fs.existsSync(path.join(projectDir, "setup.py"))) return null;

  const res = await runner(withArgs(python, "setup.py", "--name", "--version"), { cwd: projectDir });
  if (res.exitCode !== 0) {
    return {
      ok: false,
      error: {
        code: "METADATA_INVALID",
        message: `setup.py --name --version exited with ${res.exitCode}: ${res.stderr.trim()}`,
      },
    };
  }

  const lines = res.stdout.split(/\r?\n/).map((l) => l.trim()).filter((l) => l.length > 0);
  if (lines.length < 2) {
    return { ok: false, error: { code: "METADATA_INVALID", message: "setup.py did not report a name and version" } };
  }
  const [name, version] = lines.slice(-2);
  return { ok: true, metadata: { name, version, source: "setup.py" } };
}

/**
 * Resolve the project's distribution name and version. The first source that
 * declares both as literals wins: pyproject.toml, setup.cfg, then setup.py.
 */
export async function readProjectMetadata(
  projectDir: string,
  opts: { python?: Invocation; runner?: CommandRunner } = {},
): Promise<MetadataResult> {
  const declared = fromPyproject(projectDir) ?? fromSetupCfg(projectDir);
  if (declared) return { ok: true, metadata: declared };

  const dynamic = await fromSetupPy(
    projectDir,
    opts.python ?? { command: "python", args: [] },
    opts.runner ?? execRunner,
  );
  if (dynamic) return dynamic;

  return {
    ok: false,
    error: {
      code: "METADATA_MISSING",
      message: `No project metadata found in ${projectDir} (looked for pyproject.toml, setup.cfg, setup.py)`,
    },
  };
}

/** Rewrite the version literal in the file the metadata was read from. */
export function writeProjectVersion(
  projectDir: string,
  source: MetadataSource,
  version: string,
): { ok: true; file: string } | { ok: false; error: MetadataError } {
  if (source === "setup.py") {
    return {
      ok: false,
      error: { code: "METADATA_READONLY", message: "Version declared in setup.py cannot be rewritten; move it to setup.cfg or pyproject.toml" },
    };
  }

  const file = path.join(projectDir, source);
  const content = fs.readFileSync(file, "utf8");
  const section = source === "pyproject.toml" ? "project" : "metadata";
  const entry = readSection(content, section, source === "pyproject.toml" ? TOML_KEY_RE : CFG_KEY_RE).get("version");
  if (!entry) {
    return { ok: false, error: { code: "METADATA_MISSING", message: `No version key in [${section}] of ${file}` } };
  }

  const eol = content.includes("\r\n") ? "\r\n" : "\n";
  const lines = content.split(/\r?\n/);
  const original = lines[entry.line];
  lines[entry.line] =
    source === "pyproject.toml"
      ? original.replace(/(["'])[^"']*\1/, (_m, quote: string) => `${quote}${version}${quote}`)
      : original.replace(/([=:])\s*.*$/, (_m, sep: string) => `${sep} ${version}`);
  fs.writeFileSync(file, lines.join(eol), "utf8");

  return { ok: true, file };
}
