// Version marker and changelog edits, each followed by its commit
import { readFile, writeFile } from "node:fs/promises";
import {
  type NotesGenerator,
  findPreviousRelease,
  prependNotes,
  semanticReleaseNotes,
} from "./changelog.js";
import type { ReleaseCalcResult } from "./release-calc.js";
import type { ReleaseSession } from "./session.js";

export async function writeVersionFile(
  session: ReleaseSession,
  version: string,
): Promise<void> {
  await writeFile(session.resolve(session.config.versionFile), `${version}\n`);
}

async function readOptional(file: string): Promise<string> {
  try {
    return await readFile(file, "utf8");
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return "";
    }
    throw err;
  }
}

/** Prepends notes for the commits since the last final release and commits the file. */
export async function commitChangelog(
  session: ReleaseSession,
  calc: ReleaseCalcResult,
  generateNotes: NotesGenerator = semanticReleaseNotes,
): Promise<void> {
  const { git, config } = session;
  const previousTag = findPreviousRelease(git, config.tagPrefix);
  const commits = git.log(previousTag);
  session.logger.debug(
    `collected ${commits.length} commits since ${previousTag ?? "the first commit"}`,
  );

  const notes = await generateNotes({
    cwd: config.rootDir,
    commits,
    ...(previousTag ? { previousTag } : {}),
    version: calc.currentVersion,
    releaseTag: calc.releaseTag,
    repositoryUrl: config.repositoryUrl ?? git.remoteUrl(config.remote),
  });

  const file = session.resolve(config.changelogFile);
  await writeFile(file, prependNotes(await readOptional(file), notes));
  git.commit(`Update ${config.changelogFile} for ${calc.currentVersion}`, [
    config.changelogFile,
  ]);
}

/** Advances the main line to the next development version. */
export async function commitNextSnapshot(
  session: ReleaseSession,
  calc: ReleaseCalcResult,
): Promise<void> {
  await writeVersionFile(session, calc.newSnapshotVersion);
  session.git.commit(
    `Prepare next development version ${calc.newSnapshotVersion}`,
    [session.config.versionFile],
  );
}

/** Creates the staging branch and pins the release version on it. */
export async function commitReleaseVersion(
  session: ReleaseSession,
  calc: ReleaseCalcResult,
): Promise<void> {
  session.git.createBranch(calc.stagingBranch);
  await writeVersionFile(session, calc.currentVersion);
  session.git.commit(
    `Set version ${calc.currentVersion} for release candidate ${calc.rcVersion}`,
    [session.config.versionFile],
  );
}
