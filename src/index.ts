import "dotenv/config";
import { buildApp } from "./app";
import { env } from "./config/env";
import { createContainer } from "./container";
import { logger } from "./infrastructure/logger";

const bootstrap = async () => {
  const container = createContainer(env, logger);
  const app = buildApp({
    environment: env.ENVIRONMENT,
    logger,
    uploadUrlController: container.uploadUrlController,
    registrationController: container.registrationController,
  });

  const server = app.listen(env.PORT, "0.0.0.0", () => {
    logger.info({
      type: "SERVER_STARTED",
      message: `Server listening on port ${env.PORT}`,
      payload: { environment: env.ENVIRONMENT, uploadMode: env.REGISTRATION_UPLOAD_MODE },
    });
  });

  const shutdown = async (signal: NodeJS.Signals) => {
    logger.info({ type: "SERVER_SHUTDOWN", message: `Received ${signal}, shutting down` });

    await new Promise<void>((resolve) => server.close(() => resolve()));
    if (container.pool) {
      await container.pool.end();
    }
    container.s3Client.destroy();

    logger.info({ type: "SERVER_SHUTDOWN_COMPLETE", message: "Server stopped" });
    process.exit(0);
  };

  const onSignal = (signal: NodeJS.Signals) => {
    shutdown(signal).catch((error) => {
      logger.error({ type: "SERVER_SHUTDOWN_FAILED", message: "Graceful shutdown failed", error });
      process.exit(1);
    });
  };

  process.on("SIGTERM", onSignal);
  process.on("SIGINT", onSignal);
};

if (process.env.NODE_ENV !== "test") {
  bootstrap().catch((error) => {
    logger.error({ type: "SERVER_BOOTSTRAP_FAILED", message: "Bootstrap failed", error });
    process.exit(1);
  });
}
