export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}
export class PreconditionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "PreconditionError";
  }
}
export class ToolInvocationError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly stderr: string;
  constructor(
    command: string,
    exitCode: number | null,
    stderr: string,
    detail?: string,
  ) {
    const status =
      exitCode === null ? "could not be started" : `exited with ${exitCode}`;
    const reason = detail ?? stderr.trim();
    super(`\`${command}\` ${status}${reason ? `: ${reason}` : ""}`);
    this.name = "ToolInvocationError";
    this.command = command;
    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
export class UnexpectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnexpectedError";
  }
}
