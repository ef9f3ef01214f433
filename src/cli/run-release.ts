#!/usr/bin/env node
import { logger } from "../lib/logger.js";
import { runCli } from "./main.js";

process.exitCode = await runCli(process.argv.slice(2), {
  env: process.env,
  cwd: process.cwd(),
  logger,
  writeOut: (s) => process.stdout.write(s),
});
