import { Server } from "http";
import { createApp } from "./app";
import { ConfigManager } from "./config/config.manager";
import { SyncController } from "./controllers/sync.controller";
import { describeError } from "./errors/sync.errors";
import logger from "./utils/logger";

let server: Server | undefined;

const startServer = () => {
  try {
    const config = ConfigManager.getInstance();

    for (const warning of config.warnings()) {
      logger.warn(`Configuration: ${warning}`);
    }

    const app = createApp({
      controller: new SyncController(undefined, config.server.debug),
      corsOrigin: config.server.corsOrigin,
      production: config.server.nodeEnv === "production",
    });

    server = app.listen(config.server.port, () => {
      logger.info("Server started successfully", {
        port: config.server.port,
        environment: config.server.nodeEnv,
        debug: config.server.debug,
        nodeVersion: process.version,
      });
    });

    server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        logger.error(`Port ${config.server.port} is already in use`);
      } else {
        logger.error("Server error", { error: error.message });
      }
      process.exit(1);
    });
  } catch (error) {
    logger.error("Failed to start server", { error: describeError(error) });
    process.exit(1);
  }
};

const gracefulShutdown = (signal: string) => {
  logger.info(`${signal} received, starting graceful shutdown`);

  if (!server) {
    process.exit(0);
  }

  // In-flight syncs finish, and close their FileMaker sessions, before exit
  server.close(() => {
    logger.info("HTTP server closed");
    process.exit(0);
  });

  // Force shutdown after 30 seconds
  setTimeout(() => {
    logger.error("Forced shutdown after timeout");
    process.exit(1);
  }, 30000).unref();
};

// Handle shutdown signals
process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => gracefulShutdown("SIGINT"));

process.on("uncaughtException", (error) => {
  logger.error("Uncaught Exception", { error: error.message, stack: error.stack });
  gracefulShutdown("UNCAUGHT_EXCEPTION");
});

process.on("unhandledRejection", (reason) => {
  logger.error("Unhandled Rejection", { reason: describeError(reason) });
  gracefulShutdown("UNHANDLED_REJECTION");
});

startServer();
