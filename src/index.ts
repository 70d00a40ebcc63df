// index.ts - application entry point
import http from "http";
import { MongoBackend } from "@configs/database.config";
import { loadKeysFromEnvironment } from "@configs/dotenv.config";
import { createAppContext } from "@services/app-context";
import { ShutdownService } from "@services/shutdown.service";
import { logger } from "@utils/logger";
import { createApp } from "./app";

async function initializeApplication() {
  const keys = loadKeysFromEnvironment();

  // The storage mode is decided here, once
  const context = await createAppContext(keys, MongoBackend.fromKeys(keys));
  const app = createApp(context);
  const server = http.createServer(app);

  server.listen(keys.port, () => {
    logger.info(`Server running at http://localhost:${keys.port}/`);
    logger.info(`Health check available at http://localhost:${keys.port}/health`);
    logger.info(`Storage mode: ${context.gateway.mode}`);
  });

  // Signal handlers for graceful shutdown
  const handleShutdown = () => {
    void ShutdownService.handleGracefulShutdown(server, context);
  };
  process.on("SIGTERM", handleShutdown);
  process.on("SIGINT", handleShutdown);
}

// Process error handling
process.on("uncaughtException", (err) => {
  logger.error("Uncaught Exception!", err);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Promise Rejection", reason);
});

initializeApplication().catch((error: unknown) => {
  logger.error("Application initialization failed:", error);
  process.exit(1);
});
