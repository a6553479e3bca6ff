/**
 * Owner Identity Middleware
 *
 * Callers identify themselves with the `x-owner-id` header carrying the
 * UUID handed out when they created their first link. There is no
 * authentication beyond holding the identifier.
 */

import type { FastifyInstance, FastifyPluginAsync, FastifyReply, FastifyRequest } from "fastify";
import fp from "fastify-plugin";
import { ErrorCode, parseOwnerId, type ApiError, type OwnerId } from "@shortbox/shared";

export const OWNER_HEADER = "x-owner-id";

// ============================================================================
// Type Augmentation
// ============================================================================

declare module "fastify" {
  interface FastifyRequest {
    /** Caller identity, when the header was present and well-formed */
    ownerId: OwnerId | null;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

type OwnerHeader =
  | { kind: "missing" }
  | { kind: "invalid"; raw: string }
  | { kind: "valid"; ownerId: OwnerId };

function readOwnerHeader(request: FastifyRequest): OwnerHeader {
  const header = request.headers[OWNER_HEADER];
  const raw = Array.isArray(header) ? header[0] : header;

  if (raw === undefined || raw.trim() === "") {
    return { kind: "missing" };
  }

  const ownerId = parseOwnerId(raw);
  return ownerId ? { kind: "valid", ownerId } : { kind: "invalid", raw };
}

function rejectInvalid(reply: FastifyReply, raw: string): FastifyReply {
  const body: ApiError = {
    success: false,
    error: `Malformed owner identity: ${raw}`,
    errorCode: ErrorCode.INVALID_IDENTITY,
  };
  return reply.status(400).send(body);
}

// ============================================================================
// Middleware Hooks
// ============================================================================

/**
 * Required identity hook. 401 without the header, 400 when it is malformed.
 *
 * Usage:
 * ```ts
 * fastify.get("/links", { preHandler: requireOwner }, handler);
 * ```
 */
export async function requireOwner(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  const header = readOwnerHeader(request);

  switch (header.kind) {
    case "missing": {
      const body: ApiError = {
        success: false,
        error: `Owner identity required (${OWNER_HEADER} header)`,
        errorCode: ErrorCode.INVALID_IDENTITY,
      };
      return reply.status(401).send(body);
    }
    case "invalid":
      return rejectInvalid(reply, header.raw);
    case "valid":
      request.ownerId = header.ownerId;
      return undefined;
  }
}

/**
 * Optional identity hook. A missing header is fine, a malformed one is not.
 */
export async function optionalOwner(
  request: FastifyRequest,
  reply: FastifyReply
): Promise<FastifyReply | undefined> {
  const header = readOwnerHeader(request);

  if (header.kind === "invalid") {
    return rejectInvalid(reply, header.raw);
  }
  if (header.kind === "valid") {
    request.ownerId = header.ownerId;
  }
  return undefined;
}

// ============================================================================
// Fastify Plugin
// ============================================================================

const ownerPluginCallback: FastifyPluginAsync = async (fastify: FastifyInstance): Promise<void> => {
  fastify.decorateRequest("ownerId", null);
};

export const ownerPlugin = fp(ownerPluginCallback, {
  name: "owner-plugin",
  fastify: "4.x",
});
