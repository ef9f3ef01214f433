import type { ReleaseOptions } from "./options.js";
import {
  type IncrementLevel,
  formatVersion,
  increment,
  parseVersion,
  rcVersionOf,
} from "./version.js";

export interface ReleaseCalcResult {
  /** Version being released, without suffix. */
  currentVersion: string;
  /** Next development version written to the main line. */
  newSnapshotVersion: string;
  /** `<currentVersion>-rc<N>` */
  rcVersion: string;
  rc: number;
  releaseTag: string;
  rcTag: string;
  stagingBranch: string;
}

export interface CalculateReleaseOptions {
  marker: string;
  tagPrefix: string;
  level: IncrementLevel;
  rc: number;
  versionOverride?: string;
}

/**
 * Derives every version string and ref name of a run from the marker (or the
 * override, when given).
 */
export function calculateRelease(
  opts: CalculateReleaseOptions,
): ReleaseCalcResult {
  const parsed = parseVersion(opts.versionOverride ?? opts.marker);
  const current = { ...parsed, snapshot: false };
  const next = { ...increment(current, opts.level), snapshot: true };

  const currentVersion = formatVersion(current);
  const rcVersion = rcVersionOf(currentVersion, opts.rc);
  return {
    currentVersion,
    newSnapshotVersion: formatVersion(next),
    rcVersion,
    rc: opts.rc,
    releaseTag: `${opts.tagPrefix}-${currentVersion}`,
    rcTag: `${opts.tagPrefix}-${rcVersion}`,
    stagingBranch: rcVersion,
  };
}

export function calculateFromOptions(
  marker: string,
  tagPrefix: string,
  options: ReleaseOptions,
): ReleaseCalcResult {
  return calculateRelease({
    marker,
    tagPrefix,
    level: options.level,
    rc: options.rc,
    ...(options.versionOverride
      ? { versionOverride: options.versionOverride }
      : {}),
  });
}
