import { type ArtifactSet, CHECKSUM_ALGORITHMS } from "./artifact.js";
import type { ReleaseConfig } from "./config.js";
import { distDirUrl } from "./publish.js";
import type { ReleaseCalcResult } from "./release-calc.js";

export const VOTE_PERIOD_DAYS = 3;

const DAY_MS = 24 * 60 * 60 * 1000;

export interface VoteMessageInput {
  config: ReleaseConfig;
  calc: ReleaseCalcResult;
  artifacts: Omit<ArtifactSet, "dir">;
  commitSha: string;
  /** Browsable repository URL. */
  webUrl: string;
  generatedAt: Date;
}

export function voteClosingDate(generatedAt: Date): Date {
  return new Date(generatedAt.getTime() + VOTE_PERIOD_DAYS * DAY_MS);
}

export function composeVoteMessage(input: VoteMessageInput): string {
  const { config, calc, artifacts, commitSha, webUrl } = input;
  const dist = config.distUrl
    ? distDirUrl(config.distUrl, calc.rcTag)
    : "<dist url not configured>";
  const closes = voteClosingDate(input.generatedAt).toUTCString();

  const links = [
    `${webUrl}/blob/${calc.rcTag}/${config.changelogFile}`,
    `${webUrl}/tree/${calc.rcTag}`,
    `${dist}/${artifacts.archive}`,
    `${dist}/${artifacts.signature}`,
    ...CHECKSUM_ALGORITHMS.map(
      (algorithm) => `${dist}/${artifacts.checksums[algorithm]}`,
    ),
  ];
  const keysLine = config.keysUrl
    ? [`The signing keys are available at ${config.keysUrl}`, ""]
    : [];

  return [
    `To: ${config.mailingList}`,
    `Subject: [VOTE] Release ${config.projectName} ${calc.currentVersion} rc${calc.rc}`,
    "",
    "Hi all,",
    "",
    `Please review and vote on release candidate #${calc.rc} for ${config.projectName} version ${calc.currentVersion}.`,
    "",
    "[ ] +1 Approve the release",
    "[ ] -1 Do not approve the release (please provide specific comments)",
    "",
    "The staging area contains:",
    `* the changelog [1]`,
    `* the tag "${calc.rcTag}" [2]`,
    `* the source release ${artifacts.archive} [3]`,
    `* its detached signature [4]`,
    `* its checksums [5-8]`,
    `* commit hash ${commitSha}`,
    "",
    ...keysLine,
    `The vote will be open for at least ${VOTE_PERIOD_DAYS} days, until ${closes}.`,
    "It is adopted by majority approval, with at least 3 binding +1 votes.",
    "",
    "Thanks,",
    "",
    ...links.map((link, i) => `[${i + 1}] ${link}`),
    "",
  ].join("\n");
}
