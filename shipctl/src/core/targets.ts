import path from "node:path";
import type { ShipConfig } from "../types/config.js";
import type { ProjectMetadata } from "../metadata/project.js";

/** Wheel filename convention: runs of `-`, `_` and `.` become one `_`, lowercased. */
export function normalizeDistName(name: string): string {
  return name.trim().replace(/[-_.]+/g, "_").toLowerCase();
}

export function wheelFileName(name: string, version: string): string {
  return `${normalizeDistName(name)}-${version.replace(/-/g, "_")}-py3-none-any.whl`;
}

export function sdistFileName(name: string, version: string): string {
  return `${normalizeDistName(name)}-${version}.tar.gz`;
}

export function executableFileName(appName: string, platform: NodeJS.Platform = process.platform): string {
  return platform === "win32" ? `${appName}.exe` : appName;
}

/**
 * Every path the pipeline reads or writes, all derived from the project
 * metadata and config. Absolute paths.
 */
export type ReleaseTargets = {
  projectDir: string;
  distDir: string;
  buildDir: string;
  distName: string;
  version: string;
  appName: string;
  entryPoint: string;
  /** PyInstaller work directory for this app. */
  workDir: string;
  executable: string;
  sdist: string;
  wheel: string;
};

export function resolveTargets(
  config: ShipConfig,
  projectDir: string,
  metadata: Pick<ProjectMetadata, "name" | "version">,
  platform: NodeJS.Platform = process.platform,
): ReleaseTargets {
  const importName = normalizeDistName(metadata.name);
  const appName = config.freeze.name ?? importName;
  const distDir = path.resolve(projectDir, config.dist_dir);
  const buildDir = path.resolve(projectDir, config.build_dir);

  return {
    projectDir,
    distDir,
    buildDir,
    distName: metadata.name,
    version: metadata.version,
    appName,
    entryPoint: path.resolve(projectDir, config.freeze.entry_point ?? path.join(importName, "__main__.py")),
    workDir: path.join(buildDir, appName),
    executable: path.join(distDir, executableFileName(appName, platform)),
    sdist: path.join(distDir, sdistFileName(metadata.name, metadata.version)),
    wheel: path.join(distDir, wheelFileName(metadata.name, metadata.version)),
  };
}
