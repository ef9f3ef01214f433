/**
 * Console logger for cut-rc.
 *
 * Debug lines appear only in verbose mode; silent mode keeps errors and
 * failures only, which is how the tests run.
 */

import pc from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  verbose?: boolean;
  silent?: boolean;
}

const PREFIX = "[cut-rc]";

export class Logger {
  private verbose = false;
  private silent = false;

  configure(options: LoggerOptions): void {
    this.verbose = options.verbose ?? false;
    this.silent = options.silent ?? false;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.verbose || this.silent) return;
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    if (this.silent) return;
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  /** Progress line for one workflow step. */
  step(step: number, total: number, message: string): void {
    if (this.silent) return;
    console.log(pc.dim(`${PREFIX} [${step}/${total}]`), message);
  }

  success(message: string): void {
    if (this.silent) return;
    console.log(pc.green("✓"), message);
  }

  fail(message: string): void {
    console.error(pc.red("✗"), message);
  }

  /** Unprefixed output, for text the operator copies (commands, the vote email). */
  raw(text: string): void {
    if (this.silent) return;
    console.log(text);
  }

  private log(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    const line = `${PREFIX} ${this.label(level)} ${message}`;
    if (level === "error" || level === "warn") {
      console.error(line);
    } else {
      console.log(line);
    }
    if (this.verbose && data) {
      console.log(pc.dim(JSON.stringify(data, null, 2)));
    }
  }

  private label(level: LogLevel): string {
    switch (level) {
      case "debug":
        return pc.dim("debug");
      case "info":
        return pc.blue("info");
      case "warn":
        return pc.yellow("warn");
      case "error":
        return pc.red("error");
    }
  }
}

export const logger = new Logger();
