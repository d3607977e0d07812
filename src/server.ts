import http from "http";
import createApp from "./app";
import env from "./config/env";
import validateEnvironment from "./config/validateEnv";
import { createContainer } from "./container";
import logger from "./utils/logger";

const container = createContainer();
const server = http.createServer(createApp(container));

const start = async () => {
  try {
    const { valid } = validateEnvironment(env);
    if (!valid) {
      logger.warn("Starting with configuration errors; see above");
    }

    await container.priceSync.start();

    server.listen(env.port, () => {
      logger.info({ port: env.port }, "HTTP server is listening");
    });
  } catch (error) {
    logger.error({ err: error }, "Failed to start server");
    process.exit(1);
  }
};

void start();

let shuttingDown = false;

const shutdown = async (signal: string) => {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Received shutdown signal");

  try {
    await container.priceSync.stop();
    await container.notificationService.flush();
    await container.repository.close();
  } catch (error) {
    logger.error({ err: error }, "Error while stopping the engine");
    process.exitCode = 1;
  }

  server.close((error) => {
    if (error) {
      logger.error({ err: error }, "Error during shutdown");
      process.exitCode = 1;
    }
    logger.info("Server closed");
    process.exit();
  });
};

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
