import fs from "node:fs";
import path from "node:path";
import { fingerprint } from "./checksum.js";
import type { ArtifactKind, ManifestArtifact, ReleaseManifest } from "../types/manifest.js";
import type { ProjectMetadata } from "../metadata/project.js";

export const MANIFEST_SCHEMA_VERSION = "1.0.0";

export type ManifestBuildInput = {
  runId: string;
  projectDir: string;
  metadata: ProjectMetadata;
  commit: string | null;
  /** Absolute artifact paths keyed by kind; files that do not exist are left out. */
  artifacts: Partial<Record<ArtifactKind, string>>;
};

const KIND_ORDER: ArtifactKind[] = ["executable", "sdist", "wheel"];

/**
 * Build the release manifest. Paths are stored relative to the project
 * directory with forward slashes.
 */
export function buildManifest(input: ManifestBuildInput): ReleaseManifest {
  const artifacts: ManifestArtifact[] = [];
  for (const kind of KIND_ORDER) {
    const file = input.artifacts[kind];
    if (!file || !fs.existsSync(file)) continue;
    artifacts.push({
      kind,
      path: path.relative(input.projectDir, file).split(path.sep).join("/"),
      ...fingerprint(file),
    });
  }

  return {
    schema_version: MANIFEST_SCHEMA_VERSION,
    run_id: input.runId,
    created_at: new Date().toISOString(),
    project: {
      name: input.metadata.name,
      version: input.metadata.version,
      metadata_source: input.metadata.source,
    },
    scm: input.commit ? { commit: input.commit } : null,
    artifacts,
  };
}

export function writeManifest(manifestPath: string, manifest: ReleaseManifest): void {
  fs.mkdirSync(path.dirname(manifestPath), { recursive: true });
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf8");
}
