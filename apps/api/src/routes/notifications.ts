/**
 * Notification Routes
 *
 *   GET /notifications - Drain the caller's mailbox
 */

import type { FastifyInstance } from "fastify";
import type { ApiResponse } from "@shortbox/shared";
import type { LinkStore } from "@shortbox/store";
import { requireOwner } from "../middleware/owner.js";
import { toNotificationView, type NotificationView } from "../views.js";

export async function notificationsRoutes(
  fastify: FastifyInstance,
  options: { store: LinkStore }
): Promise<void> {
  const { mailbox } = options.store;

  fastify.get("/notifications", {
    preHandler: requireOwner,
    schema: {
      description: "Return and clear the caller's queued notifications, oldest first",
      tags: ["notifications"],
    },
    handler: async (request, reply) => {
      const notifications = mailbox.drain(request.ownerId ?? "").map(toNotificationView);
      const body: ApiResponse<{ notifications: NotificationView[] }> = {
        success: true,
        data: { notifications },
      };
      return reply.status(200).send(body);
    },
  });
}
