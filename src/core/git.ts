import { ToolInvocationError } from "../types/errors.js";
import {
  type CommandRunner,
  formatCommand,
  isSuccess,
  runChecked,
} from "./exec.js";

export interface RawCommit {
  hash: string;
  message: string;
}

/** Field and record separators used to split `git log` output. */
const FIELD_SEP = "\x1f";
const RECORD_SEP = "\x1e";

/**
 * Thin facade over the git command line, bound to one working directory.
 * Every method maps onto a single git invocation.
 */
export class Git {
  constructor(
    private readonly runner: CommandRunner,
    readonly cwd: string,
  ) {}

  private git(...args: string[]): string {
    return runChecked(this.runner, "git", args, { cwd: this.cwd });
  }

  fetch(remote: string): void {
    this.git("fetch", "--tags", remote);
  }

  /** Tracked changes only; untracked files do not make the tree dirty. */
  statusPorcelain(): string {
    return this.git("status", "--porcelain", "--untracked-files=no");
  }

  currentBranch(): string {
    return this.git("rev-parse", "--abbrev-ref", "HEAD").trim();
  }

  revParse(ref: string): string {
    return this.git("rev-parse", "--verify", `${ref}^{commit}`).trim();
  }

  tagExists(tag: string): boolean {
    return this.refExists(`refs/tags/${tag}`);
  }

  branchExists(branch: string): boolean {
    return this.refExists(`refs/heads/${branch}`);
  }

  private refExists(ref: string): boolean {
    const args = ["rev-parse", "--verify", "--quiet", ref];
    const result = this.runner.run("git", args, { cwd: this.cwd });
    if (isSuccess(result)) return true;
    // --quiet exits 1 without output for a missing ref
    if (result.exitCode === 1 && !result.error) return false;
    throw new ToolInvocationError(
      formatCommand("git", args),
      result.exitCode,
      result.stderr,
      result.error?.message,
    );
  }

  remoteUrl(remote: string): string {
    return this.git("remote", "get-url", remote).trim();
  }

  /** Tags matching a glob that are reachable from HEAD, newest version first. */
  mergedTags(pattern: string): string[] {
    return this.git(
      "tag",
      "--list",
      pattern,
      "--merged",
      "HEAD",
      "--sort=-v:refname",
    )
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean);
  }

  /** Commits in `from..HEAD` (or all of HEAD's history), newest first. */
  log(from?: string): RawCommit[] {
    const range = from ? `${from}..HEAD` : "HEAD";
    const out = this.git(
      "log",
      `--format=%H${FIELD_SEP}%B${RECORD_SEP}`,
      range,
    );
    return out
      .split(RECORD_SEP)
      .map((record) => record.replace(/^\n+/, ""))
      .filter((record) => record.includes(FIELD_SEP))
      .map((record) => {
        const at = record.indexOf(FIELD_SEP);
        return {
          hash: record.slice(0, at),
          message: record.slice(at + 1).trimEnd(),
        };
      });
  }

  commit(message: string, files: string[]): void {
    this.git("add", "--", ...files);
    this.git("commit", "-m", message);
  }

  checkout(branch: string): void {
    this.git("checkout", branch);
  }

  createBranch(branch: string): void {
    this.git("checkout", "-b", branch);
  }

  archive(ref: string, prefix: string, output: string): void {
    this.git(
      "archive",
      "--format=tar.gz",
      `--prefix=${prefix}/`,
      `--output=${output}`,
      ref,
    );
  }

  signedTag(
    tag: string,
    ref: string,
    message: string,
    signingKey?: string,
  ): void {
    const sign = signingKey ? ["-u", signingKey] : ["-s"];
    this.git("tag", ...sign, tag, "-m", message, ref);
  }

  push(remote: string, refspec: string): void {
    this.git("push", remote, refspec);
  }
}
