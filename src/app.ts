import express, { Express } from "express";
import { correlationIdMiddleware } from "@/api/middleware/correlationId";
import { rateLimiter } from "@/api/middleware/rateLimiter";
import { errorHandler, notFoundHandler } from "@/api/middleware/errorHandler";
import { healthCheck } from "@/monitoring/healthCheck";
import { apiRoutes } from "@/api/routes";
import { closeRecordStore } from "@/database";
import { logger } from "@/monitoring/logger";
import type http from "http";

export const createApp = (): Express => {
  const app = express();

  // Trust proxy for rate limiting
  app.set("trust proxy", 1);

  // Basic middleware
  app.use(express.json({ limit: "1mb" }));
  app.use(express.urlencoded({ extended: true }));

  // Custom middleware
  app.use(correlationIdMiddleware);
  app.use(rateLimiter);

  app.get("/health", healthCheck);

  // API routes
  app.use("/api", apiRoutes);

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};

export const setupGracefulShutdown = (server: http.Server) => {
  const shutdown = (signal: string) => {
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    server.close(() => {
      logger.info("HTTP server closed");
      closeRecordStore()
        .then(() => {
          logger.info("Record store closed");
          process.exit(0);
        })
        .catch((error: unknown) => {
          logger.error("Failed to close record store", { error });
          process.exit(1);
        });
    });

    // Force close after 10 seconds
    setTimeout(() => {
      logger.error(
        "Could not close connections in time, forcefully shutting down"
      );
      process.exit(1);
    }, 10000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
};
