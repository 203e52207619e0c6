import { describe, expect, it } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { GitOperations, releaseTagName } from "../src/git/operations.js";

describe("git operations", () => {
  it("names release tags after the version", () => {
    expect(releaseTagName("1.2.0")).toBe("v1.2.0");
  });

  it("has no commit outside a repository", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "shipctl-git-"));
    try {
      expect(await new GitOperations(dir).getCurrentSha()).toBeNull();
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
