import { PreconditionError } from "../types/errors.js";

export type IncrementLevel = "patch" | "minor" | "major";

export interface Version {
  major: number;
  minor: number;
  patch: number;
  snapshot: boolean;
}

export const SNAPSHOT_SUFFIX = "-SNAPSHOT";

const COMPONENT = "(0|[1-9]\\d*)";
const VERSION_PATTERN = new RegExp(
  `^${COMPONENT}\\.${COMPONENT}\\.${COMPONENT}(-snapshot)?$`,
  "i",
);

/**
 * Parses `MAJOR.MINOR.PATCH` with an optional `-SNAPSHOT` suffix (any case).
 * Surrounding whitespace, such as the trailing newline of a marker file, is ignored.
 */
export function parseVersion(text: string): Version {
  const match = VERSION_PATTERN.exec(text.trim());
  if (!match) {
    throw new PreconditionError(
      `Malformed version "${text.trim()}": expected MAJOR.MINOR.PATCH with an optional ${SNAPSHOT_SUFFIX} suffix`,
    );
  }
  const [, major, minor, patch, suffix] = match;
  return {
    major: toComponent(major),
    minor: toComponent(minor),
    patch: toComponent(patch),
    snapshot: suffix !== undefined,
  };
}

function toComponent(digits: string | undefined): number {
  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw new PreconditionError(`Version component ${digits} is out of range`);
  }
  return value;
}

export function formatVersion(version: Version): string {
  const base = `${version.major}.${version.minor}.${version.patch}`;
  return version.snapshot ? base + SNAPSHOT_SUFFIX : base;
}

export function isSnapshotMarker(content: string): boolean {
  return content.toLowerCase().includes("snapshot");
}

export function increment(version: Version, level: IncrementLevel): Version {
  const { major, minor, patch, snapshot } = version;
  switch (level) {
    case "patch":
      return { major, minor, patch: patch + 1, snapshot };
    case "minor":
      return { major, minor: minor + 1, patch: 0, snapshot };
    case "major":
      return { major: major + 1, minor: 0, patch: 0, snapshot };
  }
}

export function rcVersionOf(currentVersion: string, rc: number): string {
  return `${currentVersion}-rc${rc}`;
}
