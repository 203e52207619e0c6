/** What a successful release run produced. */
import type { MetadataSource } from "../metadata/project.js";

export type ArtifactKind = "executable" | "sdist" | "wheel";

export type ManifestArtifact = {
  kind: ArtifactKind;
  /** Path relative to the project directory. */
  path: string;
  sha256: string;
  bytes: number;
};

export type ReleaseManifest = {
  schema_version: string;
  run_id: string;
  created_at: string;
  project: {
    name: string;
    version: string;
    metadata_source: MetadataSource;
  };
  scm: { commit: string } | null;
  artifacts: ManifestArtifact[];
};
