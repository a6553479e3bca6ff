/**
 * Link Routes
 *
 * Endpoints:
 *   POST   /links        - Create a new short link
 *   GET    /links        - List the caller's links
 *   GET    /links/:code  - Look a link up without counting a click
 *   DELETE /links/:code  - Delete one of the caller's links
 *   GET    /:code        - Count a click and redirect to the target URL
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { z, type ZodIssue } from "zod";
import {
  ErrorCode,
  generateOwnerId,
  validateSlug,
  type ApiError,
  type ApiResponse,
  type OwnerId,
} from "@shortbox/shared";
import type { LinkStore } from "@shortbox/store";
import { optionalOwner, requireOwner } from "../../middleware/owner.js";
import { sendFailure } from "../errors.js";
import { toLinkView, type LinkSummaryView, type LinkView } from "../../views.js";

export interface LinksRoutesOptions {
  store: LinkStore;
}

// ============================================================================
// Request Schemas (Zod)
// ============================================================================

const createLinkSchema = z
  .object({
    url: z.string({
      required_error: "url is required",
      invalid_type_error: "url must be a string",
    }),
    // Integer and range checks live in the registry
    maxClicks: z
      .number({ invalid_type_error: "Click limit must be an integer >= 1" })
      .optional(),
  })
  .strict();

type CreateLinkBody = z.infer<typeof createLinkSchema>;

type CodeParams = { code: string };

/**
 * Map the first relevant zod issue onto an error code. Unknown options win
 * over everything else.
 */
function bodyError(issues: ZodIssue[]): ApiError {
  for (const issue of issues) {
    if (issue.code === "unrecognized_keys") {
      return {
        success: false,
        error: `Unknown option: ${issue.keys.join(", ")}`,
        errorCode: ErrorCode.UNKNOWN_OPTION,
      };
    }
  }

  const [first] = issues;
  if (first && first.path[0] === "maxClicks") {
    return { success: false, error: first.message, errorCode: ErrorCode.INVALID_LIMIT };
  }

  return {
    success: false,
    error: first && first.path.length > 0 ? first.message : "Request body must be a JSON object",
    errorCode: ErrorCode.INVALID_URL,
  };
}

function notFound(code: string): ApiError {
  return { success: false, error: `Link not found: ${code}`, errorCode: ErrorCode.NOT_FOUND };
}

// ============================================================================
// Route Registration
// ============================================================================

export async function linksRoutes(
  fastify: FastifyInstance,
  options: LinksRoutesOptions
): Promise<void> {
  const { registry } = options.store;

  /**
   * POST /links - Create a new short link. Callers without an identity get
   * a fresh one in the response.
   */
  async function createLinkHandler(
    request: FastifyRequest<{ Body: CreateLinkBody }>,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const parseResult = createLinkSchema.safeParse(request.body);
    if (!parseResult.success) {
      return reply.status(400).send(bodyError(parseResult.error.issues));
    }

    const ownerId: OwnerId = request.ownerId ?? generateOwnerId();
    const result = registry.create({
      ownerId,
      targetUrl: parseResult.data.url,
      maxClicks: parseResult.data.maxClicks,
    });

    if (!result.success) {
      return sendFailure(reply, result);
    }

    const body: ApiResponse<LinkView> = { success: true, data: toLinkView(result.data) };
    return reply.status(201).send(body);
  }

  /**
   * GET /links - The caller's links, oldest first
   */
  async function listLinksHandler(
    request: FastifyRequest,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const ownerId = request.ownerId ?? "";
    const links: LinkSummaryView[] = registry.listByOwner(ownerId).map((link) => ({
      ...toLinkView(link),
      expired: registry.isExpired(link),
    }));

    const body: ApiResponse<{ links: LinkSummaryView[] }> = { success: true, data: { links } };
    return reply.status(200).send(body);
  }

  /**
   * GET /links/:code - Pure lookup
   */
  async function getLinkHandler(
    request: FastifyRequest<{ Params: CodeParams }>,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const { code } = request.params;
    if (!validateSlug(code).valid) {
      return reply.status(404).send(notFound(code));
    }

    const result = registry.resolve(code);
    if (!result.success) {
      return sendFailure(reply, result);
    }

    const body: ApiResponse<LinkView> = { success: true, data: toLinkView(result.data) };
    return reply.status(200).send(body);
  }

  /**
   * DELETE /links/:code - Owner-only removal
   */
  async function deleteLinkHandler(
    request: FastifyRequest<{ Params: CodeParams }>,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const { code } = request.params;
    if (!validateSlug(code).valid) {
      return reply.status(404).send(notFound(code));
    }

    const result = registry.delete(code, request.ownerId ?? "");
    if (!result.success) {
      return sendFailure(reply, result);
    }

    const body: ApiResponse<LinkView> = { success: true, data: toLinkView(result.data) };
    return reply.status(200).send(body);
  }

  /**
   * GET /:code - Count a click and redirect
   */
  async function redirectHandler(
    request: FastifyRequest<{ Params: CodeParams }>,
    reply: FastifyReply
  ): Promise<FastifyReply> {
    const { code } = request.params;
    if (!validateSlug(code).valid) {
      return reply.status(404).send(notFound(code));
    }

    const result = registry.consume(code);
    if (!result.success) {
      return sendFailure(reply, result);
    }

    // Always temporary: every hit has to come back here to be counted
    return reply.code(302).redirect(result.data.targetUrl);
  }

  fastify.post<{ Body: CreateLinkBody }>("/links", {
    preHandler: optionalOwner,
    schema: {
      description: "Create a new short link",
      tags: ["links"],
    },
    handler: createLinkHandler,
  });

  fastify.get("/links", {
    preHandler: requireOwner,
    schema: {
      description: "List the caller's links, oldest first",
      tags: ["links"],
    },
    handler: listLinksHandler,
  });

  fastify.get<{ Params: CodeParams }>("/links/:code", {
    schema: {
      description: "Look a link up without counting a click",
      tags: ["links"],
    },
    handler: getLinkHandler,
  });

  fastify.delete<{ Params: CodeParams }>("/links/:code", {
    preHandler: requireOwner,
    schema: {
      description: "Delete one of the caller's links",
      tags: ["links"],
    },
    handler: deleteLinkHandler,
  });

  fastify.get<{ Params: CodeParams }>("/:code", {
    schema: {
      description: "Redirect to the target URL of a short link",
      tags: ["redirect"],
    },
    handler: redirectHandler,
  });

  fastify.log.debug("Links routes registered");
}
