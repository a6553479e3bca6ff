/**
 * Store Type Definitions
 */

import type { Logger } from "@shortbox/logger";
import type { LinkRecord, OwnerId } from "@shortbox/shared";

/**
 * Millisecond clock. Injected everywhere time matters so tests can move it.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Date.now();

/**
 * The logging surface the store uses (a pino logger satisfies it)
 */
export type StoreLogger = Pick<Logger, "debug" | "info" | "warn" | "error">;

/**
 * Receives state-transition messages for an owner
 */
export interface Notifier {
  notify(ownerId: OwnerId, message: string): void;
}

/**
 * Link creation request
 */
export interface CreateLinkInput {
  /** Owner of the new link */
  ownerId: OwnerId;

  /** URL to shorten; must be absolute */
  targetUrl: string;

  /** Optional click limit (absent = unlimited) */
  maxClicks?: number;
}

/**
 * A successful click-through
 */
export interface ConsumedLink {
  /** Where to send the caller */
  targetUrl: string;

  /** Snapshot of the link after the click was counted */
  link: LinkRecord;
}
