import { readFile } from "node:fs/promises";
import { PreconditionError } from "../types/errors.js";
import type { ReleaseSession } from "./session.js";
import { isSnapshotMarker } from "./version.js";

export interface PreconditionReport {
  /** Raw content of the version marker file. */
  marker: string;
  startSha: string;
}

export function assertCleanTree(status: string): void {
  if (status.trim()) {
    throw new PreconditionError(
      `Working tree has uncommitted changes:\n${status.trimEnd()}`,
    );
  }
}

export function assertOnBranch(current: string, expected: string): void {
  if (current !== expected) {
    throw new PreconditionError(
      `Releases are cut from '${expected}', but '${current}' is checked out`,
    );
  }
}

export function assertSnapshot(marker: string, file: string): void {
  if (!isSnapshotMarker(marker)) {
    throw new PreconditionError(
      `${file} holds "${marker.trim()}", which is not a snapshot version; nothing to release`,
    );
  }
}

export function assertRefsAbsent(
  session: ReleaseSession,
  refs: { tags: string[]; branches: string[] },
): void {
  for (const tag of refs.tags) {
    if (session.git.tagExists(tag)) {
      throw new PreconditionError(
        `Tag '${tag}' already exists; refusing to overwrite a previous release`,
      );
    }
  }
  for (const branch of refs.branches) {
    if (session.git.branchExists(branch)) {
      throw new PreconditionError(
        `Branch '${branch}' already exists; delete it or pick another rc number`,
      );
    }
  }
}

async function readMarker(session: ReleaseSession): Promise<string> {
  const file = session.config.versionFile;
  try {
    return await readFile(session.resolve(file), "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      throw new PreconditionError(
        `Version file ${file} not found at the repository root`,
      );
    }
    throw err;
  }
}

/**
 * Checks, in order: refreshed remote refs, clean tree, main line checked out,
 * marker present and holding a snapshot version.
 */
export async function validatePreconditions(
  session: ReleaseSession,
): Promise<PreconditionReport> {
  const { git, config } = session;
  git.fetch(config.remote);
  assertCleanTree(git.statusPorcelain());
  assertOnBranch(git.currentBranch(), config.mainBranch);
  const marker = await readMarker(session);
  assertSnapshot(marker, config.versionFile);
  return { marker, startSha: git.revParse("HEAD") };
}
