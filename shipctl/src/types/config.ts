/** Layered configuration. */
import type { ReleaseStep } from "../core/steps/types.js";

export type DistributionBackend = "setuptools" | "pypa-build";

export type ToolsConfig = {
  /** Interpreter of the active environment, e.g. "python" or "python3". */
  python: string;
  /** Package manager command line, e.g. "pip" or "python -m pip". */
  pip: string;
  pyinstaller: string;
};

export type FreezeConfig = {
  /** Entry-point script; defaults to `<import-name>/__main__.py`. */
  entry_point?: string;
  /** Executable name; defaults to the project's import name. */
  name?: string;
  /** Modules the freezer's import analysis cannot see. */
  hidden_imports: string[];
};

export type DistributionConfig = {
  backend: DistributionBackend;
};

export type ShipConfig = {
  schema_version: string;
  project_dir: string;
  dist_dir: string;
  build_dir: string;
  runs_dir: string;
  tools: ToolsConfig;
  freeze: FreezeConfig;
  distribution: DistributionConfig;
  /** Per-step timeout in seconds. Absent or 0 means no timeout. */
  timeouts?: Partial<Record<ReleaseStep, number>>;
};
