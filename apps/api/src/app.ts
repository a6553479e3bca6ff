/**
 * Shortbox API Application
 *
 * Builds the Fastify instance around an injected link store. The entry
 * point owns the store and the listening socket; tests call `buildApp`
 * and drive it with `inject()`.
 */

import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import helmet from "@fastify/helmet";
import rateLimit from "@fastify/rate-limit";
import swagger from "@fastify/swagger";
import swaggerUi from "@fastify/swagger-ui";
import type { ApiError } from "@shortbox/shared";
import type { LinkStore } from "@shortbox/store";

import type { ApiConfig } from "./config.js";
import { OWNER_HEADER, ownerPlugin } from "./middleware/owner.js";
import { healthRoutes } from "./routes/health.js";
import { linksRoutes } from "./routes/links/index.js";
import { notificationsRoutes } from "./routes/notifications.js";

export interface BuildAppOptions {
  store: LinkStore;
  config: ApiConfig;

  /** Fastify logger settings; defaults to pino at info (debug outside production) */
  logger?: FastifyServerOptions["logger"];
}

// ============================================================================
// Plugins
// ============================================================================

async function registerPlugins(fastify: FastifyInstance, config: ApiConfig): Promise<void> {
  // Security headers
  await fastify.register(helmet, {
    contentSecurityPolicy: config.nodeEnv === "production",
  });

  await fastify.register(cors, {
    origin: config.corsOrigin,
  });

  // In-memory, per client IP
  await fastify.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: "1 minute",
    keyGenerator: (request) => request.ip || "unknown",
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      success: false,
      error: `Too many requests: limit is ${context.max} per ${context.after}`,
    }),
  });

  await fastify.register(swagger, {
    openapi: {
      info: {
        title: "Shortbox API",
        description: "Short links with click limits and expiry",
        version: "1.0.0",
      },
      servers: [
        {
          url: `http://localhost:${config.port}`,
          description: "Development server",
        },
      ],
      tags: [
        { name: "links", description: "Link management endpoints" },
        { name: "redirect", description: "URL redirection" },
        { name: "notifications", description: "Owner mailbox" },
        { name: "health", description: "Health check endpoints" },
      ],
      components: {
        securitySchemes: {
          ownerId: {
            type: "apiKey",
            in: "header",
            name: OWNER_HEADER,
          },
        },
      },
    },
  });

  await fastify.register(swaggerUi, {
    routePrefix: "/docs",
    uiConfig: {
      docExpansion: "list",
      deepLinking: true,
    },
  });
}

// ============================================================================
// App Factory
// ============================================================================

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { store, config } = options;

  const fastify = Fastify({
    logger: options.logger ?? {
      level: config.nodeEnv === "production" ? "info" : "debug",
      transport:
        config.nodeEnv === "development"
          ? {
              target: "pino-pretty",
              options: { colorize: true },
            }
          : undefined,
    },
    trustProxy: true,
    requestIdHeader: "x-request-id",
  });

  // ==========================================================================
  // Lifecycle Hooks
  // ==========================================================================

  // Hooks and the error handler must precede every register() below: each
  // plugin context copies them when it loads.

  fastify.addHook("onResponse", async (request, reply) => {
    request.log.info(
      {
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
        responseTime: reply.elapsedTime,
      },
      "Request completed"
    );
  });

  // ==========================================================================
  // Error Handling
  // ==========================================================================

  fastify.setErrorHandler((error, request, reply) => {
    request.log.error({ err: error }, "Request error");

    if (error.statusCode === 429) {
      const body: ApiError = { success: false, error: error.message || "Too many requests" };
      return reply.status(429).send(body);
    }

    if (error.validation) {
      const body: ApiError = {
        success: false,
        error: "Validation error",
        details: { validation: error.validation },
      };
      return reply.status(400).send(body);
    }

    // Malformed JSON and other client errors keep their status
    const statusCode = error.statusCode && error.statusCode < 500 ? error.statusCode : 500;
    const body: ApiError = {
      success: false,
      error:
        statusCode === 500 && config.nodeEnv === "production"
          ? "Internal server error"
          : error.message,
    };
    return reply.status(statusCode).send(body);
  });

  await registerPlugins(fastify, config);

  await fastify.register(ownerPlugin);
  await fastify.register(healthRoutes, { store });
  await fastify.register(notificationsRoutes, { store });
  await fastify.register(linksRoutes, { store });

  return fastify;
}
