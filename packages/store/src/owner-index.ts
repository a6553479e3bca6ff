/**
 * Owner Index
 *
 * Secondary mapping owner -> slugs, kept by the registry. It is only ever
 * touched from inside a registry method, together with the primary map.
 */

import type { OwnerId } from "@shortbox/shared";

export class OwnerIndex {
  private readonly slugsByOwner = new Map<OwnerId, Set<string>>();

  add(ownerId: OwnerId, slug: string): void {
    let slugs = this.slugsByOwner.get(ownerId);
    if (!slugs) {
      slugs = new Set();
      this.slugsByOwner.set(ownerId, slugs);
    }
    slugs.add(slug);
  }

  remove(ownerId: OwnerId, slug: string): void {
    const slugs = this.slugsByOwner.get(ownerId);
    if (!slugs) return;

    slugs.delete(slug);
    if (slugs.size === 0) {
      this.slugsByOwner.delete(ownerId);
    }
  }

  /**
   * Slugs of an owner in insertion order. Returns a copy.
   */
  slugsOf(ownerId: OwnerId): string[] {
    return Array.from(this.slugsByOwner.get(ownerId) ?? []);
  }

  has(ownerId: OwnerId, slug: string): boolean {
    return this.slugsByOwner.get(ownerId)?.has(slug) ?? false;
  }
}
