/**
 * Service entry point: wires the adapters, starts the HTTP server and closes
 * the database pool on shutdown.
 */
import { createServices } from "@app/container";
import { config } from "@config/index";
import { logger } from "@infrastructure/logging/Logger";
import { createApp } from "@interfaces/http/app";

const services = createServices();
const app = createApp(services);

const server = app.listen(config.port, () => {
  logger.log("info", "SERVER_STARTED", {
    port: config.port,
    model: config.openai.model,
    embeddingModel: config.openai.embeddingModel,
    tokenizer: services.estimator.strategy,
  });
});

function shutdown(signal: string): void {
  logger.log("info", "SERVER_STOPPING", { signal });
  server.close(() => {
    services
      .close()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        logger.log("error", "SHUTDOWN_FAILED", {
          message: error instanceof Error ? error.message : String(error),
        });
        process.exit(1);
      });
  });
}

process.on("SIGTERM", () => shutdown("SIGTERM"));
process.on("SIGINT", () => shutdown("SIGINT"));
