#!/usr/bin/env tsx
import { cac } from "cac";

import { createDefaultLoggerFromEnv } from "~shared/Logger";

import { registerNormalize } from "./app/Normalize";

const logger = createDefaultLoggerFromEnv();
const cli = cac("metadater");

try {
  registerNormalize(cli, logger);
  cli.help();
  cli.version("0.1.0");
  cli.parse(process.argv, { run: false });
  await cli.runMatchedCommand();
} catch (error) {
  logger.error({ error }, "執行命令時發生錯誤");
  process.exitCode = 1;
} finally {
  await logger.close();
}
