import { loadConfig } from "./config.js";
import { logger } from "./utils/logger.js";
import { createNetwork } from "./network.js";
import { startApiServer } from "./api/server.js";

async function main() {
  const config = loadConfig();
  logger.level = config.logLevel;
  logger.info("Config loaded");

  const { orchestrator, rateLimiter } = createNetwork(config);
  const server = await startApiServer({ orchestrator, rateLimiter }, config.port, config.host);

  const shutdown = async () => {
    logger.info("Shutting down...");
    orchestrator.cancelTurn();
    await server.close();
    logger.info("Shutdown complete");
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.error({ err }, "Shutdown failed");
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);
}

main().catch((err) => {
  logger.fatal(err, "Fatal error");
  process.exit(1);
});
