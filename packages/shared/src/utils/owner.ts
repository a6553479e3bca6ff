/**
 * Owner identities are random UUIDs handed out on first link creation.
 */

import { randomUUID } from "node:crypto";
import type { OwnerId } from "../types/index.js";

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

/**
 * Generate a fresh owner identity.
 */
export function generateOwnerId(): OwnerId {
  return randomUUID();
}

/**
 * Parse a user-supplied owner identity.
 *
 * @returns The lowercased UUID, or null when the token is malformed
 */
export function parseOwnerId(raw: string): OwnerId | null {
  const trimmed = raw.trim();
  return UUID_PATTERN.test(trimmed) ? trimmed.toLowerCase() : null;
}
