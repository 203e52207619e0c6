import { createHash } from "node:crypto";
import fs from "node:fs";

/** SHA256 hex digest of a file. */
export function computeSha256(filePath: string): string {
  return createHash("sha256").update(fs.readFileSync(filePath)).digest("hex");
}

/** Digest and byte size in one read. */
export function fingerprint(filePath: string): { sha256: string; bytes: number } {
  const content = fs.readFileSync(filePath);
  return { sha256: createHash("sha256").update(content).digest("hex"), bytes: content.byteLength };
}
