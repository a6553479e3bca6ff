/**
 * Link Registry
 *
 * Owns slug -> link records and the owner index beside it.
 *
 * Concurrency:
 * Every public method is synchronous and never yields to the event loop, so
 * each call is one atomic transition. The slug-free check and the insert in
 * `create`, the expiry/limit/decrement sequence in `consume`, and the paired
 * updates of the primary map and the owner index can never interleave with
 * another caller. Cross-link reads (`listByOwner`, `findExpired`) return
 * snapshots.
 *
 * Flow of `consume`:
 * 1. Unknown slug            -> NOT_FOUND
 * 2. Past expiry             -> evict, notify owner, EXPIRED
 * 3. Limited and 0 remaining -> notify owner, LIMIT_EXHAUSTED
 * 4. Otherwise               -> count the click (notify at exactly 0), target URL
 */

import { createLogger } from "@shortbox/logger";
import {
  ErrorCode,
  LINK_TTL_CONFIG,
  formatShortUrl,
  generateSlug,
  validateTargetUrl,
  type Failure,
  type LinkRecord,
  type OwnerId,
  type Result,
  type SlugGenerator,
} from "@shortbox/shared";
import { OwnerIndex } from "./owner-index.js";
import {
  systemClock,
  type Clock,
  type ConsumedLink,
  type CreateLinkInput,
  type Notifier,
  type StoreLogger,
} from "./types.js";

// =============================================================================
// Types
// =============================================================================

export interface LinkRegistryOptions {
  /** Lifetime of every new link */
  ttlSeconds: number;

  /** Receives expiry and click-limit messages */
  notifier: Notifier;

  clock?: Clock;
  generateSlug?: SlugGenerator;
  logger?: StoreLogger;
}

export type CreateLinkResult = Result<LinkRecord, typeof ErrorCode.INVALID_URL | typeof ErrorCode.INVALID_LIMIT>;

export type ResolveLinkResult = Result<LinkRecord, typeof ErrorCode.NOT_FOUND | typeof ErrorCode.EXPIRED>;

export type ConsumeLinkResult = Result<
  ConsumedLink,
  typeof ErrorCode.NOT_FOUND | typeof ErrorCode.EXPIRED | typeof ErrorCode.LIMIT_EXHAUSTED
>;

export type DeleteLinkResult = Result<LinkRecord, typeof ErrorCode.NOT_FOUND | typeof ErrorCode.FORBIDDEN>;

// =============================================================================
// Owner Messages
// =============================================================================

export function expiredMessage(slug: string): string {
  return `Your link ${formatShortUrl(slug)} has expired and was removed.`;
}

export function limitReachedMessage(slug: string): string {
  return `Click limit for link ${formatShortUrl(slug)} has been reached.`;
}

// =============================================================================
// Helpers
// =============================================================================

function failure<C extends ErrorCode>(errorCode: C, error: string): Failure<C> {
  return { success: false, errorCode, error };
}

/**
 * Copy a stored record so callers can never reach the registry's state.
 */
function snapshot(link: LinkRecord): LinkRecord {
  return {
    ...link,
    clicks: { ...link.clicks },
    createdAt: new Date(link.createdAt.getTime()),
    expiresAt: new Date(link.expiresAt.getTime()),
  };
}

// =============================================================================
// Registry
// =============================================================================

export class LinkRegistry {
  private readonly links = new Map<string, LinkRecord>();
  private readonly owners = new OwnerIndex();
  private readonly ttlMs: number;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private readonly nextSlug: SlugGenerator;
  private readonly logger: StoreLogger;

  constructor(options: LinkRegistryOptions) {
    if (!Number.isFinite(options.ttlSeconds) || options.ttlSeconds <= 0) {
      throw new Error(`Link TTL must be a positive number of seconds, got ${options.ttlSeconds}`);
    }
    if (options.ttlSeconds > LINK_TTL_CONFIG.MAX_SECONDS) {
      throw new Error(
        `Link TTL must not exceed ${LINK_TTL_CONFIG.MAX_SECONDS} seconds, got ${options.ttlSeconds}`
      );
    }

    this.ttlMs = options.ttlSeconds * 1000;
    this.notifier = options.notifier;
    this.clock = options.clock ?? systemClock;
    this.nextSlug = options.generateSlug ?? (() => generateSlug());
    this.logger = options.logger ?? createLogger("registry");
  }

  /** Number of live records */
  get size(): number {
    return this.links.size;
  }

  /**
   * Create a link for an owner.
   *
   * Slugs are drawn until one is free. The check and the insert happen in
   * the same synchronous call, so no other create can claim the slug in
   * between.
   */
  create(input: CreateLinkInput): CreateLinkResult {
    const { ownerId, targetUrl, maxClicks } = input;

    const urlCheck = validateTargetUrl(targetUrl);
    if (!urlCheck.valid) {
      return failure(ErrorCode.INVALID_URL, urlCheck.error ?? "Invalid URL");
    }

    if (maxClicks !== undefined && (!Number.isInteger(maxClicks) || maxClicks < 1)) {
      return failure(ErrorCode.INVALID_LIMIT, "Click limit must be an integer >= 1");
    }

    let slug = this.nextSlug();
    while (this.links.has(slug)) {
      this.logger.debug({ slug }, "Slug collision, drawing again");
      slug = this.nextSlug();
    }

    const now = this.clock();
    const link: LinkRecord = {
      slug,
      targetUrl,
      ownerId,
      clicks:
        maxClicks === undefined
          ? { kind: "unlimited" }
          : { kind: "limited", max: maxClicks, remaining: maxClicks },
      createdAt: new Date(now),
      expiresAt: new Date(now + this.ttlMs),
    };

    this.links.set(slug, link);
    this.owners.add(ownerId, slug);

    this.logger.info({ slug, ownerId, maxClicks: maxClicks ?? null }, "Link created");

    return { success: true, data: snapshot(link) };
  }

  /**
   * Look a link up without touching it. A link past its expiry reports
   * EXPIRED but stays in place until it is consumed or swept.
   */
  resolve(slug: string): ResolveLinkResult {
    const link = this.links.get(slug);
    if (!link) {
      return failure(ErrorCode.NOT_FOUND, `Link not found: ${slug}`);
    }

    if (this.isExpired(link, this.clock())) {
      return failure(ErrorCode.EXPIRED, `Link ${formatShortUrl(slug)} has expired`);
    }

    return { success: true, data: snapshot(link) };
  }

  /**
   * Count one click-through and return the target URL.
   *
   * Every attempt on an exhausted link notifies the owner again.
   */
  consume(slug: string): ConsumeLinkResult {
    const link = this.links.get(slug);
    if (!link) {
      return failure(ErrorCode.NOT_FOUND, `Link not found: ${slug}`);
    }

    if (this.isExpired(link, this.clock())) {
      this.expire(slug);
      return failure(ErrorCode.EXPIRED, `Link ${formatShortUrl(slug)} has expired`);
    }

    const { clicks } = link;
    if (clicks.kind === "limited") {
      if (clicks.remaining <= 0) {
        this.notifier.notify(link.ownerId, limitReachedMessage(slug));
        return failure(
          ErrorCode.LIMIT_EXHAUSTED,
          `Click limit for ${formatShortUrl(slug)} has been reached`
        );
      }

      clicks.remaining -= 1;

      if (clicks.remaining === 0) {
        this.notifier.notify(link.ownerId, limitReachedMessage(slug));
      }
    }

    return {
      success: true,
      data: { targetUrl: link.targetUrl, link: snapshot(link) },
    };
  }

  /**
   * Delete a link on behalf of its owner
   */
  delete(slug: string, requester: OwnerId): DeleteLinkResult {
    const link = this.links.get(slug);
    if (!link) {
      return failure(ErrorCode.NOT_FOUND, `Link not found: ${slug}`);
    }

    if (link.ownerId !== requester) {
      return failure(ErrorCode.FORBIDDEN, "Only the owner can delete this link");
    }

    this.remove(link);
    this.logger.info({ slug, ownerId: requester }, "Link deleted by owner");

    return { success: true, data: snapshot(link) };
  }

  /**
   * Snapshot of an owner's links, oldest first
   */
  listByOwner(ownerId: OwnerId): LinkRecord[] {
    const result: LinkRecord[] = [];
    for (const slug of this.owners.slugsOf(ownerId)) {
      const link = this.links.get(slug);
      if (link) result.push(snapshot(link));
    }
    return result;
  }

  /**
   * Snapshot of links whose expiry is strictly before `at`
   */
  findExpired(at: number): LinkRecord[] {
    const result: LinkRecord[] = [];
    for (const link of this.links.values()) {
      if (this.isExpired(link, at)) result.push(snapshot(link));
    }
    return result;
  }

  /**
   * Evict a link with system authority (no ownership check) and tell its
   * owner. Returns null when the link is already gone, so a link evicted
   * twice is only announced once.
   */
  expire(slug: string): LinkRecord | null {
    const link = this.links.get(slug);
    if (!link) return null;

    this.remove(link);
    this.notifier.notify(link.ownerId, expiredMessage(slug));
    this.logger.info({ slug, ownerId: link.ownerId }, "Link expired");

    return snapshot(link);
  }

  /**
   * True when the link exists in the owner index under `ownerId`
   */
  isIndexed(ownerId: OwnerId, slug: string): boolean {
    return this.owners.has(ownerId, slug);
  }

  /**
   * True when `at` (default: now) is past the link's expiry
   */
  isExpired(link: LinkRecord, at: number = this.clock()): boolean {
    return at > link.expiresAt.getTime();
  }

  private remove(link: LinkRecord): void {
    this.links.delete(link.slug);
    this.owners.remove(link.ownerId, link.slug);
  }
}
