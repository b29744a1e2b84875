#!/usr/bin/env node
// Copyright (c) 2025 trsdn. MIT License — see LICENSE for details.

/**
 * pr-fleet CLI: evaluate and merge pull requests across repositories and hosting services.
 *
 * Usage:
 *   pr-fleet check [--providers github] [--repos api] [--max-age 7d]
 *   pr-fleet merge [--dry-run] [--force] [--delete-branches]
 *   pr-fleet watch [--interval 5m] [--merge]
 *   pr-fleet validate
 *   pr-fleet auth
 *   pr-fleet limits
 */

import { Command } from "commander";
import { registerCommands } from "./cli/commands.js";
import { parseLogLevelOption } from "./cli/helpers.js";
import { errorMessage } from "./errors.js";
import { logger } from "./logger.js";

const program = new Command();

program
  .name("pr-fleet")
  .description("Evaluate and merge pull requests across many repositories")
  .version("0.1.0")
  .option("--config <path>", "Path to config file (default: pr-fleet.config.yaml)")
  .option("--log-level <level>", "Log level: debug, info, warn, error, silent", parseLogLevelOption);

registerCommands(program);

program.parseAsync().catch((err: unknown) => {
  logger.error({ err: errorMessage(err) }, "command failed");
  console.error(`❌ ${errorMessage(err)}`);
  process.exit(1);
});
