import {
  type NotesContext,
  generateNotes,
} from "@semantic-release/release-notes-generator";
import { UnexpectedError } from "../types/errors.js";
import type { Git, RawCommit } from "./git.js";
import { toNotesRepositoryUrl } from "./repository-url.js";

export interface ChangelogInput {
  cwd: string;
  commits: RawCommit[];
  /** Last final release tag, absent for a first release. */
  previousTag?: string;
  version: string;
  releaseTag: string;
  repositoryUrl: string;
}

export type NotesGenerator = (input: ChangelogInput) => Promise<string>;

/** Conventional-commit notes, grouped the way the angular preset groups them. */
export const semanticReleaseNotes: NotesGenerator = async (input) => {
  const context: NotesContext = {
    cwd: input.cwd,
    commits: input.commits,
    lastRelease: input.previousTag ? { gitTag: input.previousTag } : {},
    nextRelease: { version: input.version, gitTag: input.releaseTag },
    options: {
      repositoryUrl: toNotesRepositoryUrl(input.repositoryUrl, input.cwd),
    },
  };
  try {
    return await generateNotes({ preset: "angular" }, context);
  } catch (err) {
    throw new UnexpectedError(
      "release notes generation failed: " +
        (err instanceof Error ? err.message : String(err)),
    );
  }
};

/**
 * Newest final release tag (`<prefix>-X.Y.Z`) reachable from HEAD; rc tags are skipped.
 */
export function findPreviousRelease(
  git: Git,
  tagPrefix: string,
): string | undefined {
  const finalTag = new RegExp(
    `^${escapeRegExp(tagPrefix)}-\\d+\\.\\d+\\.\\d+$`,
  );
  return git.mergedTags(`${tagPrefix}-*`).find((tag) => finalTag.test(tag));
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/** New notes go on top; the existing changelog is kept below them. */
export function prependNotes(existing: string, notes: string): string {
  const body = notes.trim();
  const rest = existing.trim();
  return rest ? `${body}\n\n${rest}\n` : `${body}\n`;
}
