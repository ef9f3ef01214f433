import * as path from "node:path";
import { type Logger, logger as defaultLogger } from "../lib/logger.js";
import type { ReleaseConfig } from "./config.js";
import { type CommandRunner, ProcessRunner, runChecked } from "./exec.js";
import { Git } from "./git.js";

export interface SessionDeps {
  runner?: CommandRunner;
  logger?: Logger;
  now?: () => Date;
}

/**
 * Everything a release step needs, passed explicitly instead of relying on the
 * process working directory. `cwd` is where this session's commands run.
 */
export class ReleaseSession {
  readonly runner: CommandRunner;
  readonly logger: Logger;
  readonly now: () => Date;
  readonly git: Git;

  constructor(
    readonly config: ReleaseConfig,
    deps: SessionDeps = {},
    readonly cwd: string = config.rootDir,
  ) {
    this.runner = deps.runner ?? new ProcessRunner();
    this.logger = deps.logger ?? defaultLogger;
    this.now = deps.now ?? (() => new Date());
    this.git = new Git(this.runner, cwd);
  }

  /** A session whose commands run in `dir`; the parent session is unaffected. */
  inDirectory(dir: string): ReleaseSession {
    return new ReleaseSession(
      this.config,
      { runner: this.runner, logger: this.logger, now: this.now },
      path.resolve(this.cwd, dir),
    );
  }

  /** Resolves a repository-relative path. */
  resolve(file: string): string {
    return path.resolve(this.config.rootDir, file);
  }

  exec(command: string, args: readonly string[]): string {
    this.logger.debug(`$ ${command} ${args.join(" ")}`, { cwd: this.cwd });
    return runChecked(this.runner, command, args, { cwd: this.cwd });
  }
}
