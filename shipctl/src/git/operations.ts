import { simpleGit, type SimpleGit } from "simple-git";

/**
 * Thin wrapper over simple-git.
 */
export class GitOperations {
  private git: SimpleGit;

  constructor(repoPath: string, git?: SimpleGit) {
    this.git = git ?? simpleGit(repoPath);
  }

  /** Whether the path is inside a git work tree. */
  async isRepo(): Promise<boolean> {
    return this.git.checkIsRepo();
  }

  /** HEAD SHA, or null outside a repository or before the first commit. */
  async getCurrentSha(): Promise<string | null> {
    try {
      if (!(await this.isRepo())) return null;
      const result = await this.git.revparse(["HEAD"]);
      return result.trim();
    } catch {
      // unborn HEAD, or no git binary
      return null;
    }
  }

  async tagExists(name: string): Promise<boolean> {
    const tags = await this.git.tags();
    return tags.all.includes(name);
  }

  /** Create an annotated tag on HEAD. */
  async createTag(name: string, message?: string): Promise<void> {
    await this.git.tag(["-a", name, "-m", message ?? name]);
  }
}

export function releaseTagName(version: string): string {
  return `v${version}`;
}
