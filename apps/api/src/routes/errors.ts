/**
 * Error code to HTTP status mapping
 */

import type { FastifyReply } from "fastify";
import type { ApiError, ErrorCode, Failure } from "@shortbox/shared";

export const STATUS_BY_ERROR_CODE: Record<ErrorCode, number> = {
  INVALID_URL: 400,
  INVALID_LIMIT: 400,
  UNKNOWN_OPTION: 400,
  INVALID_IDENTITY: 400,
  NOT_FOUND: 404,
  FORBIDDEN: 403,
  EXPIRED: 410,
  LIMIT_EXHAUSTED: 410,
};

/**
 * Send a store failure with its mapped status
 */
export function sendFailure(reply: FastifyReply, failure: Failure): FastifyReply {
  const body: ApiError = {
    success: false,
    error: failure.error,
    errorCode: failure.errorCode,
  };
  return reply.status(STATUS_BY_ERROR_CODE[failure.errorCode]).send(body);
}
