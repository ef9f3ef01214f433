import { writeFile } from "node:fs/promises";
import * as path from "node:path";
import { type ArtifactSet, buildArtifact } from "./artifact.js";
import { type NotesGenerator, semanticReleaseNotes } from "./changelog.js";
import {
  commitChangelog,
  commitNextSnapshot,
  commitReleaseVersion,
} from "./content-update.js";
import { assertRefsAbsent, validatePreconditions } from "./guards.js";
import { composeVoteMessage } from "./notification.js";
import type { ReleaseOptions } from "./options.js";
import { type PublishResult, publishArtifacts } from "./publish.js";
import { type ReleaseCalcResult, calculateFromOptions } from "./release-calc.js";
import { toWebUrl } from "./repository-url.js";
import { withRollbackAdvice } from "./rollback.js";
import type { ReleaseSession } from "./session.js";

export interface ReleaseResult {
  calc: ReleaseCalcResult;
  startSha: string;
  /** HEAD of the staging branch the archive was built from. */
  commitSha: string;
  artifacts: ArtifactSet;
  published?: PublishResult;
  message: string;
  messageFile: string;
}

export interface RunReleaseDeps {
  generateNotes?: NotesGenerator;
}

const TOTAL_STEPS = 7;

/**
 * Cuts one release candidate. Fails before touching the repository on bad
 * preconditions; afterwards any failure prints rollback advice and rethrows.
 */
export async function runRelease(
  options: ReleaseOptions,
  session: ReleaseSession,
  deps: RunReleaseDeps = {},
): Promise<ReleaseResult> {
  const { config, git, logger } = session;
  const generateNotes = deps.generateNotes ?? semanticReleaseNotes;

  logger.step(1, TOTAL_STEPS, "checking preconditions");
  const { marker, startSha } = await validatePreconditions(session);

  const calc = calculateFromOptions(marker, config.tagPrefix, options);
  assertRefsAbsent(session, {
    tags: [calc.releaseTag, calc.rcTag],
    branches: [calc.stagingBranch],
  });
  logger.info(
    `releasing ${calc.currentVersion} as ${calc.rcTag}, next development version ${calc.newSnapshotVersion}`,
  );
  if (!options.publish) {
    logger.info("dry run: nothing will be published or pushed");
  }

  const plan = {
    mainBranch: config.mainBranch,
    startSha,
    rcTag: calc.rcTag,
    stagingBranch: calc.stagingBranch,
  };

  try {
    return await withRollbackAdvice(plan, logger, async (advisor) => {
      logger.step(2, TOTAL_STEPS, `updating ${config.changelogFile}`);
      await commitChangelog(session, calc, generateNotes);

      logger.step(3, TOTAL_STEPS, `bumping ${config.mainBranch} to ${calc.newSnapshotVersion}`);
      await commitNextSnapshot(session, calc);

      logger.step(4, TOTAL_STEPS, `creating staging branch ${calc.stagingBranch}`);
      await commitReleaseVersion(session, calc);
      const commitSha = git.revParse("HEAD");

      logger.step(5, TOTAL_STEPS, "building and signing the source archive");
      const artifacts = await buildArtifact(session, calc);

      let published: PublishResult | undefined;
      if (options.publish) {
        logger.step(6, TOTAL_STEPS, "publishing");
        advisor.markRemoteMutation();
        published = await publishArtifacts(session, calc, artifacts);
      } else {
        logger.step(6, TOTAL_STEPS, "skipping publish (dry run)");
      }

      logger.step(7, TOTAL_STEPS, "composing the vote email");
      const webUrl = toWebUrl(
        config.repositoryUrl ?? git.remoteUrl(config.remote),
      );
      const message = composeVoteMessage({
        config,
        calc,
        artifacts,
        commitSha,
        webUrl,
        generatedAt: session.now(),
      });
      const messageFile = path.join(artifacts.dir, `${calc.rcTag}.vote.txt`);
      await writeFile(messageFile, message);

      return {
        calc,
        startSha,
        commitSha,
        artifacts,
        ...(published ? { published } : {}),
        message,
        messageFile,
      };
    });
  } finally {
    restoreBranch(session);
  }
}

/** Returns to the main line when a run ends elsewhere; a failed checkout is only reported. */
function restoreBranch(session: ReleaseSession): void {
  const { git, config, logger } = session;
  try {
    if (git.currentBranch() !== config.mainBranch) {
      git.checkout(config.mainBranch);
    }
  } catch (err) {
    logger.warn(
      `could not switch back to ${config.mainBranch}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
}
