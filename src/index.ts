import { createApp } from "./app";
import { loadConfig } from "./config";
import { connectDatabase, disconnectDatabase } from "./database/connection";
import { registerEventHandlers } from "./bootstrap/eventHandlers";
import { buildContainer } from "./services";
import { ConfigError } from "./utils/errors";
import logger from "./utils/logger";

const SHUTDOWN_TIMEOUT_MS = 30000;

const startServer = async (): Promise<void> => {
  const config = loadConfig();

  logger.info("🚀 Starting marketplace API server", {
    nodeEnv: config.nodeEnv,
    port: config.port,
    feeSplitting: config.checkout.feeSplitting,
  });

  // Connect to database
  await connectDatabase(config);

  const container = buildContainer(config);
  registerEventHandlers(container.events);

  const { credentials, checkout } = container.limiters;
  credentials.startReaper(config.rateLimit.reapIntervalMs);
  checkout.startReaper(config.rateLimit.reapIntervalMs);

  const app = createApp(container, {
    imagesDir: config.imagesDir,
    trustProxy: config.trustProxy,
    allowedOrigins: config.allowedOrigins,
  });

  // Start server
  const server = app.listen(config.port, () => {
    logger.info(`Server running on port ${config.port} in ${config.nodeEnv} mode`);
  });

  // Graceful shutdown
  const gracefulShutdown = async (signal: string): Promise<void> => {
    logger.info(`${signal} received. Starting graceful shutdown...`);

    // Force shutdown if graceful shutdown takes too long
    const forceShutdownTimeout = setTimeout(() => {
      logger.error("Graceful shutdown timed out, forcing exit...");
      process.exit(1);
    }, SHUTDOWN_TIMEOUT_MS);

    try {
      credentials.stop();
      checkout.stop();

      // Close server and wait for all connections to finish
      await new Promise<void>((resolve, reject) => {
        server.close((err) => {
          if (err) {
            reject(err);
          } else {
            logger.info("HTTP server closed");
            resolve();
          }
        });
      });

      await disconnectDatabase();
      logger.info("Graceful shutdown completed");

      clearTimeout(forceShutdownTimeout);
      process.exit(0);
    } catch (error) {
      logger.error("Error during shutdown", {
        error: error instanceof Error ? error.message : error,
      });
      clearTimeout(forceShutdownTimeout);
      process.exit(1);
    }
  };

  process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
  process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
};

startServer().catch((error: unknown) => {
  if (error instanceof ConfigError) {
    error.problems.forEach((problem) => logger.error(`❌ ${problem}`));
  }
  logger.error("Failed to start server", {
    error: error instanceof Error ? error.message : error,
  });
  process.exit(1);
});
