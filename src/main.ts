import { serve } from "@hono/node-server";
import dotenv from "dotenv";
import { loadConfig, SERVICE_NAME, VERSION } from "./config";
import { errorMessage } from "./errors";
import { createHealthApp } from "./http/health";
import { SchedulerService } from "./service";
import { createLogger } from "./utils/logger";

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger("Main", config.logLevel);

  const service = new SchedulerService(config, { logger: createLogger("Scheduler", config.logLevel) });
  await service.start();

  const app = createHealthApp(service, { service: SERVICE_NAME, version: VERSION });
  const server = serve({ fetch: app.fetch, port: config.http.port });
  logger.info(`Starting server on port ${config.http.port}`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info("Received signal, shutting down", { signal });
    server.close();
    try {
      await service.stop();
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", { error: errorMessage(error) });
      process.exit(1);
    }
  };

  process.on("SIGINT", () => void shutdown("SIGINT"));
  process.on("SIGTERM", () => void shutdown("SIGTERM"));
}

main().catch((error: unknown) => {
  console.error(`[Main] Failed to start: ${errorMessage(error)}`);
  process.exit(1);
});
