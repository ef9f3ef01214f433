import { Command, CommanderError, InvalidArgumentError } from "commander";
import { UsageError } from "../types/errors.js";
import { type IncrementLevel, parseVersion } from "./version.js";

export interface ReleaseOptions {
  level: IncrementLevel;
  rc: number;
  versionOverride?: string;
  publish: boolean;
  verbose: boolean;
}

export type ParsedInvocation =
  | { kind: "help"; text: string }
  | { kind: "run"; options: ReleaseOptions };

const LEVELS: Record<string, IncrementLevel> = {
  p: "patch",
  patch: "patch",
  m: "minor",
  minor: "minor",
  M: "major",
  major: "major",
};

/** Positional keyword accepted in place of `-p`. */
export const PUBLISH_KEYWORD = "publish";

export function parseLevel(value: string): IncrementLevel {
  const level = LEVELS[value];
  if (!level) {
    throw new InvalidArgumentError(
      "Expected one of p|patch, m|minor, M|major.",
    );
  }
  return level;
}

export function parseRcNumber(value: string): number {
  if (!/^\d+$/.test(value)) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  const rc = Number(value);
  if (!Number.isSafeInteger(rc)) {
    throw new InvalidArgumentError("Release candidate number is too large.");
  }
  return rc;
}

function parseOverride(value: string): string {
  try {
    parseVersion(value);
  } catch (err) {
    throw new InvalidArgumentError(
      err instanceof Error ? err.message : String(err),
    );
  }
  return value.trim();
}

type RawOptions = {
  level: IncrementLevel;
  rc: number;
  releaseVersion?: string;
  publish: boolean;
  verbose: boolean;
};

export function buildProgram(): Command {
  return new Command()
    .name("cut-rc")
    .description(
      "Cut a release candidate: changelog, version bump, staging branch, signed source tarball and vote email.\nRuns as a dry run unless -p or the 'publish' keyword is given.",
    )
    .helpOption("-h, --help", "Show this help")
    .option(
      "-l, --level <level>",
      "Increment for the next snapshot: p|patch, m|minor, M|major",
      parseLevel,
      "patch",
    )
    .option(
      "-v, --release-version <version>",
      "Release this version instead of the one in the version file",
      parseOverride,
    )
    .option(
      "-r, --rc <number>",
      "Release candidate number",
      parseRcNumber,
      0,
    )
    .option(
      "-p, --publish",
      "Publish to the distribution store and push the rc tag",
      false,
    )
    .option("--verbose", "Enable debug logging", false)
    .argument("[action]", `'${PUBLISH_KEYWORD}' is the same as -p`)
    .allowExcessArguments(false)
    .exitOverride();
}

/**
 * Parses user arguments (without the node and script entries).
 * Never exits the process: help comes back as a result and bad input as a UsageError.
 */
export function parseOptions(
  argv: readonly string[],
  output: { writeOut?: (s: string) => void; writeErr?: (s: string) => void } = {},
): ParsedInvocation {
  const program = buildProgram();
  let helpText = "";
  program.configureOutput({
    writeOut: (s) => {
      helpText += s;
      output.writeOut?.(s);
    },
    // commander's own error text is replaced by the UsageError message
    writeErr: (s) => output.writeErr?.(s),
    outputError: () => undefined,
  });

  try {
    program.parse([...argv], { from: "user" });
  } catch (err) {
    if (err instanceof CommanderError) {
      if (err.exitCode === 0) return { kind: "help", text: helpText };
      throw new UsageError(err.message.replace(/^error: /, ""));
    }
    throw err;
  }

  const action = program.args[0];
  if (action !== undefined && action !== PUBLISH_KEYWORD) {
    throw new UsageError(
      `unknown argument '${action}' (only '${PUBLISH_KEYWORD}' is accepted)`,
    );
  }

  const raw = program.opts<RawOptions>();
  return {
    kind: "run",
    options: {
      level: raw.level,
      rc: raw.rc,
      ...(raw.releaseVersion ? { versionOverride: raw.releaseVersion } : {}),
      publish: raw.publish || action === PUBLISH_KEYWORD,
      verbose: raw.verbose,
    },
  };
}
