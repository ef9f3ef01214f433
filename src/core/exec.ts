import { spawnSync } from "node:child_process";
import { ToolInvocationError } from "../types/errors.js";

export interface CommandResult {
  /** Exit code, or null when the process could not be started. */
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure (e.g. ENOENT when the tool is not installed). */
  error?: Error;
}

export interface RunOptions {
  cwd: string;
}

export interface CommandRunner {
  run(command: string, args: readonly string[], opts: RunOptions): CommandResult;
}

export function isSuccess(result: CommandResult): boolean {
  return result.exitCode === 0 && !result.error;
}

export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"'$]/.test(part) ? JSON.stringify(part) : part))
    .join(" ");
}

/**
 * Runs a command and returns its stdout, turning any failing result into a
 * ToolInvocationError.
 */
export function runChecked(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  opts: RunOptions,
): string {
  const result = runner.run(command, args, opts);
  if (!isSuccess(result)) {
    throw new ToolInvocationError(
      formatCommand(command, args),
      result.exitCode,
      result.stderr,
      result.error?.message,
    );
  }
  return result.stdout;
}

/** Runs commands synchronously; each call blocks until the tool exits. */
export class ProcessRunner implements CommandRunner {
  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  run(command: string, args: readonly string[], opts: RunOptions): CommandResult {
    const child = spawnSync(command, args, {
      cwd: opts.cwd,
      env: this.env,
      encoding: "utf8",
      // stdin stays attached so gpg can prompt for a passphrase
      stdio: ["inherit", "pipe", "pipe"],
      maxBuffer: 64 * 1024 * 1024,
    });
    return {
      exitCode: child.status,
      stdout: child.stdout ?? "",
      stderr: child.stderr ?? "",
      ...(child.error ? { error: child.error } : {}),
    };
  }
}
