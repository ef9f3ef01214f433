import { copyFile, rm } from "node:fs/promises";
import * as path from "node:path";
import { ConfigError } from "../types/errors.js";
import { type ArtifactSet, artifactFiles } from "./artifact.js";
import type { ReleaseCalcResult } from "./release-calc.js";
import type { ReleaseSession } from "./session.js";

export interface PublishResult {
  distDirUrl: string;
  /** Remote ref the post-release main line was pushed to. */
  mainAfterRef: string;
}

export function mainAfterRef(mainBranch: string, rcTag: string): string {
  return `${mainBranch}-after-${rcTag}`;
}

export function distDirUrl(distUrl: string, rcTag: string): string {
  return `${distUrl}/${rcTag}`;
}

/**
 * Uploads the artifact set to the distribution store, pushes the signed rc tag
 * and records the post-release main line under its own ref instead of pushing
 * the shared main branch.
 */
export async function publishArtifacts(
  session: ReleaseSession,
  calc: ReleaseCalcResult,
  artifacts: ArtifactSet,
): Promise<PublishResult> {
  const { config, git, logger } = session;
  if (!config.distUrl) {
    throw new ConfigError("RC_DIST_URL is required when publishing");
  }
  const remoteDir = distDirUrl(config.distUrl, calc.rcTag);

  session.exec("svn", [
    "mkdir",
    remoteDir,
    "-m",
    `Create staging directory for ${calc.rcTag}`,
  ]);

  const checkoutDir = path.join(artifacts.dir, `.svn-${calc.rcTag}`);
  await rm(checkoutDir, { recursive: true, force: true });
  session.exec("svn", ["checkout", "--depth=empty", remoteDir, checkoutDir]);

  const files = artifactFiles(artifacts);
  for (const file of files) {
    await copyFile(path.join(artifacts.dir, file), path.join(checkoutDir, file));
  }
  const inCheckout = session.inDirectory(checkoutDir);
  inCheckout.exec("svn", ["add", ...files]);
  inCheckout.exec("svn", [
    "commit",
    "-m",
    `Add release candidate ${calc.rcTag}`,
  ]);
  logger.info(`uploaded ${files.length} files to ${remoteDir}`);

  git.signedTag(
    calc.rcTag,
    calc.stagingBranch,
    `Release candidate ${calc.rcVersion}`,
    config.signingKey,
  );
  git.push(config.remote, calc.rcTag);

  const afterRef = mainAfterRef(config.mainBranch, calc.rcTag);
  git.checkout(config.mainBranch);
  git.push(config.remote, `${config.mainBranch}:${afterRef}`);
  logger.info(`pushed ${config.mainBranch} to ${config.remote}/${afterRef}`);

  return { distDirUrl: remoteDir, mainAfterRef: afterRef };
}
