import "reflect-metadata";
import { container } from "tsyringe";
import { loadConfig } from "./config/app.config";
import { setupDI } from "./config/di.setup";
import { IPollingScheduler } from "./services/polling-scheduler.interface";
import { createLogger } from "./utils/logger.util";

const logger = createLogger("Main");

async function main(): Promise<void> {
  const config = loadConfig();
  setupDI(config);

  const scheduler = container.resolve<IPollingScheduler>("IPollingScheduler");

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    scheduler
      .stop()
      .then(() => process.exit(0))
      .catch((error) => {
        logger.error("Shutdown failed", error);
        process.exit(1);
      });
  };

  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  logger.info(
    `Tracking ${config.tracking.vesselIds.length} vessel(s) and ${config.tracking.ports.length} port(s); ` +
      `congestion threshold ${config.congestion.threshold} (${config.congestion.metric})`,
  );
  scheduler.start();
}

main().catch((error) => {
  logger.error("Fatal error", error);
  process.exit(1);
});
