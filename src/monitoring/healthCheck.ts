import { Request, Response } from "express";
import { config } from "@/config/env";
import { recordStore } from "@/database";
import { logger } from "./logger";

interface HealthStatus {
  status: "healthy" | "unhealthy";
  timestamp: string;
  services: {
    database: "up" | "down";
    api: "up" | "down";
  };
  uptime: number;
}

const pingWithTimeout = (timeoutMs: number): Promise<void> => {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`Store ping timed out after ${timeoutMs}ms`)),
      timeoutMs
    );
  });
  return Promise.race([recordStore.ping(), timeout]).finally(() =>
    clearTimeout(timer)
  );
};

const errorCode = (error: unknown): string | undefined =>
  typeof error === "object" &&
  error !== null &&
  "code" in error &&
  typeof error.code === "string"
    ? error.code
    : undefined;

// Store connection check (for startup)
export const checkStoreConnection = async (): Promise<void> => {
  try {
    await recordStore.ping();
    logger.info("Record store connection verified", {
      driver: config.store.driver,
    });
  } catch (error) {
    const cause = error instanceof Error ? error.cause : undefined;
    const code = errorCode(error) ?? errorCode(cause);
    if (code === "ECONNREFUSED") {
      logger.error("Database connection failed. Is PostgreSQL running?", {
        error,
      });
    }
    if (code === "3D000") {
      logger.error("Database not found. Run `npm run db:create` first.", {
        error,
      });
    }
    throw error;
  }
};

// Health check endpoint handler
export const healthCheck = async (req: Request, res: Response) => {
  const startTime = Date.now();

  try {
    await pingWithTimeout(config.healthCheck.timeout);

    const healthStatus: HealthStatus = {
      status: "healthy",
      timestamp: new Date().toISOString(),
      services: {
        database: "up",
        api: "up",
      },
      uptime: process.uptime(),
    };

    const responseTime = Date.now() - startTime;
    logger.debug("Health check completed", { responseTime });

    res.status(200).json(healthStatus);
  } catch (error) {
    const healthStatus: HealthStatus = {
      status: "unhealthy",
      timestamp: new Date().toISOString(),
      services: {
        database: "down",
        api: "up",
      },
      uptime: process.uptime(),
    };

    logger.error("Health check failed", {
      error: error instanceof Error ? error.message : error,
    });
    res.status(503).json(healthStatus);
  }
};
