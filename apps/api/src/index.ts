/**
 * Shortbox API Service
 *
 * Entry point: owns the link store and the HTTP server for the lifetime of
 * the process.
 *
 * Endpoints:
 *   POST   /links          - Create new short link
 *   GET    /links          - List the caller's links
 *   GET    /links/:code    - Look up a link
 *   DELETE /links/:code    - Delete a link
 *   GET    /notifications  - Drain the caller's mailbox
 *   GET    /:code          - Redirect to target URL
 *   GET    /health         - Health check
 */

import { createLogger, logger } from "@shortbox/logger";
import { createLinkStore, validateStoreConfig } from "@shortbox/store";
import { buildApp } from "./app.js";
import { loadApiConfig } from "./config.js";

const config = loadApiConfig();
validateStoreConfig(config.store, logger);

const store = createLinkStore({ config: config.store, logger: createLogger("store") });

async function start(): Promise<void> {
  try {
    const fastify = await buildApp({ store, config });

    // ========================================================================
    // Graceful Shutdown
    // ========================================================================

    const gracefulShutdown = async (signal: string): Promise<void> => {
      logger.info({ signal }, "Received shutdown signal");

      try {
        await fastify.close();
        logger.info("Fastify server closed");

        store.shutdown();
        process.exit(0);
      } catch (err) {
        logger.error({ err }, "Error during shutdown");
        process.exit(1);
      }
    };

    process.on("SIGINT", () => void gracefulShutdown("SIGINT"));
    process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));

    await fastify.listen({ port: config.port, host: config.host });

    logger.info(`Shortbox API running on http://${config.host}:${config.port}`);
    logger.info(`Swagger docs: http://${config.host}:${config.port}/docs`);
  } catch (err) {
    logger.error({ err }, "Failed to start server");
    store.shutdown();
    process.exit(1);
  }
}

void start();
