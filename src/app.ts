import express, { Application } from "express";
import helmet from "helmet";
import compression from "compression";
import cors from "cors";
import morgan from "morgan";
import { v4 as uuidv4 } from "uuid";

import healthRoutes from "./routes/health.routes";
import { createRoutes } from "./routes";
import { createSyncRouter } from "./routes/sync.routes";
import { SyncController } from "./controllers/sync.controller";

import { errorHandler, notFoundHandler } from "./middleware/error.middleware";
import logger from "./utils/logger";

export interface AppOptions {
  controller?: SyncController;
  corsOrigin?: string;
  production?: boolean;
}

export const createApp = (options: AppOptions = {}): Application => {
  const app = express();
  const controller = options.controller ?? new SyncController();

  app.use(helmet());
  app.use(
    cors({
      origin: options.corsOrigin || "*",
      credentials: true,
    }),
  );

  // Compression
  app.use(compression());

  // Body parsing
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true, limit: "1mb" }));

  // Request logging
  app.use(
    morgan(options.production ? "combined" : "dev", {
      stream: {
        write: (message) => logger.info(message.trim()),
      },
    }),
  );

  app.use((req, res, next) => {
    const header = req.headers["x-request-id"];
    const requestId = typeof header === "string" && header ? header : uuidv4();
    res.locals.requestId = requestId;
    res.setHeader("X-Request-ID", requestId);
    next();
  });

  // Routes
  app.use("/", healthRoutes);
  app.use("/", createSyncRouter(controller));
  app.use("/api/v1", createRoutes(controller));

  // 404 handler
  app.use(notFoundHandler);

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
};
