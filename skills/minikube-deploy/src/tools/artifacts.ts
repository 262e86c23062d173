import { existsSync } from "node:fs";
import { copyFile, mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { Executor } from "./shell.js";
import type { ArtifactSourceRef } from "../types.js";

export type FetchResult = { ok: true; fetched: string[] } | { ok: false; error: string };

/**
 * Supplies manifest files that are missing from a component's working
 * directory. A fetch either delivers every requested file or fails.
 */
export interface ArtifactSource {
  fetch(files: ReadonlyArray<string>, destination: string): Promise<FetchResult>;
}

export class GitArtifactSource implements ArtifactSource {
  constructor(
    private readonly exec: Executor,
    private readonly ref: ArtifactSourceRef
  ) {}

  async fetch(files: ReadonlyArray<string>, destination: string): Promise<FetchResult> {
    const tempDir = await mkdtemp(join(tmpdir(), "mkdeploy-"));
    const repoDir = join(tempDir, "repo");
    try {
      const clone = await this.exec.execute("git", ["clone", "--depth", "1", this.ref.repo, repoDir]);
      if (!clone.ok) {
        return { ok: false, error: `Failed to clone ${this.ref.repo}: ${clone.stderr || `exit code ${clone.exitCode}`}` };
      }

      const sourceDir = this.ref.subdir ? join(repoDir, this.ref.subdir) : repoDir;
      const absent = files.filter((f) => !existsSync(join(sourceDir, f)));
      if (absent.length > 0) {
        return {
          ok: false,
          error: `Not found in ${this.ref.repo}${this.ref.subdir ? `/${this.ref.subdir}` : ""}: ${absent.join(", ")}`,
        };
      }

      for (const file of files) {
        await copyFile(join(sourceDir, file), join(destination, file));
      }
      return { ok: true, fetched: [...files] };
    } finally {
      await rm(tempDir, { recursive: true, force: true });
    }
  }
}
