import { createHash } from "node:crypto";
import { createReadStream } from "node:fs";
import { mkdir, writeFile } from "node:fs/promises";
import * as path from "node:path";
import type { ReleaseCalcResult } from "./release-calc.js";
import type { ReleaseSession } from "./session.js";

export const CHECKSUM_ALGORITHMS = ["md5", "sha1", "sha256", "sha512"] as const;
export type ChecksumAlgorithm = (typeof CHECKSUM_ALGORITHMS)[number];

export interface ArtifactSet {
  dir: string;
  /** File name of the tarball inside `dir`. */
  archive: string;
  signature: string;
  checksums: Record<ChecksumAlgorithm, string>;
}

export function artifactNames(releaseTag: string): Omit<ArtifactSet, "dir"> {
  const archive = `${releaseTag}.tar.gz`;
  return {
    archive,
    signature: `${archive}.asc`,
    checksums: {
      md5: `${archive}.md5`,
      sha1: `${archive}.sha1`,
      sha256: `${archive}.sha256`,
      sha512: `${archive}.sha512`,
    },
  };
}

/** Every file of the set, archive first. */
export function artifactFiles(set: Omit<ArtifactSet, "dir">): string[] {
  return [
    set.archive,
    set.signature,
    ...CHECKSUM_ALGORITHMS.map((algorithm) => set.checksums[algorithm]),
  ];
}

export async function digestFile(
  file: string,
  algorithm: ChecksumAlgorithm,
): Promise<string> {
  const hash = createHash(algorithm);
  for await (const chunk of createReadStream(file)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/** One line in the format `sha256sum -c` accepts. */
export function checksumLine(digest: string, fileName: string): string {
  return `${digest}  ${fileName}\n`;
}

/**
 * Archives the staging branch into the output directory, then signs and
 * checksums it from inside that directory so the sidecar files reference the
 * bare archive name.
 */
export async function buildArtifact(
  session: ReleaseSession,
  calc: ReleaseCalcResult,
): Promise<ArtifactSet> {
  const dir = session.config.outputDir;
  const names = artifactNames(calc.releaseTag);
  await mkdir(dir, { recursive: true });

  session.git.archive(
    calc.stagingBranch,
    calc.releaseTag,
    path.join(dir, names.archive),
  );
  session.logger.debug(`archived ${calc.stagingBranch} to ${names.archive}`);

  const inDir = session.inDirectory(dir);
  const key = session.config.signingKey;
  inDir.exec("gpg", [
    "--batch",
    "--yes",
    "--armor",
    ...(key ? ["--local-user", key] : []),
    "--output",
    names.signature,
    "--detach-sign",
    names.archive,
  ]);

  for (const algorithm of CHECKSUM_ALGORITHMS) {
    const digest = await digestFile(path.join(dir, names.archive), algorithm);
    await writeFile(
      path.join(dir, names.checksums[algorithm]),
      checksumLine(digest, names.archive),
    );
  }

  return { dir, ...names };
}
