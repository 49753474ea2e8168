import { loadConfig } from "./utils/config.js";
import { createLogger } from "./utils/logger.js";
import { createApp, registerJobs } from "./app.js";

const logger = createLogger();

async function main() {
  logger.info("Starting vaultflow...");

  // 1. Load configuration
  const config = loadConfig();
  logger.info({ vault: config.vault.root }, "Configuration loaded");

  if (config.approval.auto_approve_all) {
    logger.warn("AUTO_APPROVE_ALL is on: every task will bypass the approval gate");
  }

  // 2. Wire components and prepare the vault
  const app = createApp(config, logger);
  await app.store.init();
  const repaired = await app.orchestrator.recover();
  if (repaired > 0) {
    logger.warn({ repaired }, "Vault repaired after an interrupted run");
  }

  // 3. Schedule the poll pass and the periodic report
  registerJobs(app);

  // 4. Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info({ signal }, "Received shutdown signal");
    app.scheduler.shutdown();
    await app.orchestrator.shutdown();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => void shutdown("SIGTERM"));
  process.on("SIGINT", () => void shutdown("SIGINT"));

  logger.info("vaultflow is running");
}

main().catch((err) => {
  logger.fatal({ error: err }, "Fatal startup error");
  process.exit(1);
});
