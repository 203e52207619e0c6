export type BumpPart = "major" | "minor" | "patch";

export type BumpResult = { ok: true; version: string } | { ok: false; error: { code: "VERSION_INVALID"; message: string } };

const RELEASE_RE = /^(\d+)\.(\d+)\.(\d+)$/;

/** Public-version subset of PEP 440: release segment plus optional pre/post/dev parts. */
const EXPLICIT_RE = /^\d+(\.\d+){0,3}((a|b|rc)\d+)?(\.post\d+)?(\.dev\d+)?$/;

export function isBumpPart(value: string): value is BumpPart {
  return value === "major" || value === "minor" || value === "patch";
}

/**
 * Compute the next version. `target` is either a part to increment (lower
 * parts reset to 0) or an explicit version string.
 */
export function bumpVersion(current: string, target: string): BumpResult {
  if (!isBumpPart(target)) {
    if (!EXPLICIT_RE.test(target)) {
      return { ok: false, error: { code: "VERSION_INVALID", message: `Not a valid version: ${target}` } };
    }
    return { ok: true, version: target };
  }

  const m = RELEASE_RE.exec(current);
  if (!m) {
    return {
      ok: false,
      error: { code: "VERSION_INVALID", message: `Cannot bump ${target} of ${current}: expected MAJOR.MINOR.PATCH` },
    };
  }

  const [major, minor, patch] = [m[1], m[2], m[3]].map((n) => parseInt(n, 10));
  switch (target) {
    case "major":
      return { ok: true, version: `${major + 1}.0.0` };
    case "minor":
      return { ok: true, version: `${major}.${minor + 1}.0` };
    case "patch":
      return { ok: true, version: `${major}.${minor}.${patch + 1}` };
  }
}
