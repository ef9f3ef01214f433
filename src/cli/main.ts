import { type Env, loadConfig } from "../core/config.js";
import { parseOptions } from "../core/options.js";
import { runRelease } from "../core/orchestrator.js";
import { ReleaseSession } from "../core/session.js";
import type { Logger } from "../lib/logger.js";

export interface CliContext {
  env: Env;
  cwd: string;
  logger: Logger;
  writeOut: (text: string) => void;
}

/** `Name: message` line printed for a failed run. */
export function describeFailure(err: unknown): string {
  const name = err instanceof Error ? err.name : "Error";
  const message = err instanceof Error ? err.message : String(err);
  return `${name}: ${message}`;
}

/** Runs one invocation and returns the process exit code: 0 for help or success, 1 otherwise. */
export async function runCli(argv: string[], ctx: CliContext): Promise<number> {
  const { logger } = ctx;
  try {
    const invocation = parseOptions(argv, { writeOut: ctx.writeOut });
    if (invocation.kind === "help") return 0;

    const { options } = invocation;
    logger.configure({ verbose: options.verbose });
    const config = loadConfig(ctx.env, ctx.cwd, options);
    const result = await runRelease(options, new ReleaseSession(config, { logger }));

    logger.raw(result.message);
    logger.success(
      `${result.calc.rcTag} ${result.published ? "published" : "prepared (dry run)"}; vote email saved to ${result.messageFile}`,
    );
    return 0;
  } catch (err) {
    logger.error(describeFailure(err));
    return 1;
  }
}
