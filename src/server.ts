import { createApp, setupGracefulShutdown } from "./app";
import { config } from "@/config/env";
import { logger } from "@/monitoring/logger";
import { checkStoreConnection } from "@/monitoring/healthCheck";

const startServer = async () => {
  try {
    await checkStoreConnection();

    const app = createApp();

    const server = app.listen(config.port, () => {
      logger.info(`Order desk started on port ${config.port}`, {
        environment: process.env.NODE_ENV || "development",
        port: config.port,
        store: config.store.driver,
      });
    });

    setupGracefulShutdown(server);

    return server;
  } catch (error) {
    logger.error("Failed to start server", { error });
    process.exit(1);
  }
};

if (require.main === module) {
  void startServer();
}
