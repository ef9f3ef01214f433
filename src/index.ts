export * from "./cli/main.js";
export * from "./core/artifact.js";
export * from "./core/changelog.js";
export * from "./core/config.js";
export * from "./core/content-update.js";
export * from "./core/exec.js";
export * from "./core/git.js";
export * from "./core/guards.js";
export * from "./core/notification.js";
export * from "./core/options.js";
export * from "./core/orchestrator.js";
export * from "./core/publish.js";
export * from "./core/release-calc.js";
export * from "./core/repository-url.js";
export * from "./core/rollback.js";
export * from "./core/session.js";
export * from "./core/version.js";
export * from "./lib/logger.js";
export * from "./types/errors.js";
