import * as path from "node:path";
import { ConfigError } from "../types/errors.js";

export interface ReleaseConfig {
  /** Absolute repository root; all relative paths resolve against it. */
  rootDir: string;
  projectName: string;
  tagPrefix: string;
  mainBranch: string;
  remote: string;
  versionFile: string;
  changelogFile: string;
  /** Absolute artifact directory. */
  outputDir: string;
  signingKey?: string;
  distUrl?: string;
  repositoryUrl?: string;
  mailingList: string;
  keysUrl?: string;
}

export type Env = Readonly<Record<string, string | undefined>>;

const REF_NAME = /^[A-Za-z0-9][A-Za-z0-9._/-]*$/;

export function slugify(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9._-]+/g, "-")
    .replace(/^-+|-+$/g, "");
}

function read(env: Env, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function refName(env: Env, key: string, fallback: string): string {
  const value = read(env, key) ?? fallback;
  if (!REF_NAME.test(value) || value.includes("..")) {
    throw new ConfigError(`${key}="${value}" is not a usable git ref name`);
  }
  return value;
}

function relativeFile(env: Env, key: string, fallback: string): string {
  const value = read(env, key) ?? fallback;
  if (path.isAbsolute(value) || value.split(/[\\/]/).includes("..")) {
    throw new ConfigError(
      `${key}="${value}" must be a path inside the repository`,
    );
  }
  return value;
}

function url(env: Env, key: string): string | undefined {
  const value = read(env, key);
  if (value === undefined) return undefined;
  try {
    new URL(value);
  } catch {
    throw new ConfigError(`${key}="${value}" is not a valid URL`);
  }
  return value.replace(/\/+$/, "");
}

/**
 * Reads RC_* environment variables. Publishing additionally requires RC_DIST_URL.
 */
export function loadConfig(
  env: Env,
  rootDir: string,
  opts: { publish: boolean },
): ReleaseConfig {
  const projectName = read(env, "RC_PROJECT_NAME") ?? path.basename(rootDir);
  const tagPrefix = refName(env, "RC_TAG_PREFIX", slugify(projectName));

  const mailingList = read(env, "RC_MAILING_LIST");
  if (!mailingList) {
    throw new ConfigError(
      "RC_MAILING_LIST is required (address the vote email is sent to)",
    );
  }

  const distUrl = url(env, "RC_DIST_URL");
  if (opts.publish && !distUrl) {
    throw new ConfigError(
      "RC_DIST_URL is required when publishing (base URL of the distribution store)",
    );
  }

  const signingKey = read(env, "RC_SIGNING_KEY");
  const repositoryUrl = read(env, "RC_REPOSITORY_URL");
  const keysUrl = url(env, "RC_KEYS_URL");

  return {
    rootDir,
    projectName,
    tagPrefix,
    mainBranch: refName(env, "RC_MAIN_BRANCH", "main"),
    remote: refName(env, "RC_REMOTE", "origin"),
    versionFile: relativeFile(env, "RC_VERSION_FILE", "VERSION"),
    changelogFile: relativeFile(env, "RC_CHANGELOG_FILE", "CHANGELOG.md"),
    outputDir: path.resolve(
      rootDir,
      read(env, "RC_OUTPUT_DIR") ?? "release-artifacts",
    ),
    mailingList,
    ...(signingKey ? { signingKey } : {}),
    ...(distUrl ? { distUrl } : {}),
    ...(repositoryUrl ? { repositoryUrl } : {}),
    ...(keysUrl ? { keysUrl } : {}),
  };
}
