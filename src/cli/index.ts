#!/usr/bin/env node

/**
 * Operator CLI.
 *
 * Usage:
 *   vaultflow approve <id>
 *   vaultflow deny <id>
 *   vaultflow report --window 7d
 *   vaultflow status --status needs_action
 */

import { loadConfig } from "../utils/config.js";
import { createLogger } from "../utils/logger.js";
import { createApp } from "../app.js";
import { USAGE, UsageError, parseArgs, runCommand } from "./commands.js";
import type { CliCommand } from "./commands.js";

async function main() {
  let cmd: CliCommand;
  try {
    cmd = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof UsageError) {
      console.error(`Error: ${err.message}\n\n${USAGE}`);
      process.exit(2);
    }
    throw err;
  }

  const logger = createLogger("vaultflow-cli");
  const app = createApp(loadConfig(), logger);
  await app.store.init();

  const code = await runCommand(cmd, app, (line) => console.log(line));
  process.exitCode = code;
}

main().catch((error) => {
  console.error("Fatal error:", error instanceof Error ? error.message : error);
  process.exit(1);
});
