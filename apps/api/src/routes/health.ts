/**
 * Health Check Routes
 *
 * Liveness only: there are no external dependencies to probe.
 */

import type { FastifyInstance } from "fastify";
import type { LinkStore } from "@shortbox/store";

export async function healthRoutes(fastify: FastifyInstance, options: { store: LinkStore }) {
  fastify.get("/health", {
    schema: {
      description: "Liveness probe with the number of live links",
      tags: ["health"],
    },
    handler: async () => {
      return {
        status: "ok",
        links: options.store.registry.size,
        sweeper: options.store.sweeper.isRunning ? "running" : "stopped",
        timestamp: new Date().toISOString(),
      };
    },
  });
}
