/**
 * Short form helpers: `sbx.li/<slug>` and back.
 */

import { SHORT_LINK_CONFIG } from "../constants/index.js";

/**
 * Build the display form of a slug.
 *
 * @example
 * ```ts
 * formatShortUrl("aB3xY9kQ") // "sbx.li/aB3xY9kQ"
 * ```
 */
export function formatShortUrl(slug: string): string {
  return `${SHORT_LINK_CONFIG.PREFIX}${slug}`;
}

/**
 * Pull the slug out of whatever the user typed.
 *
 * Accepts the short form, a full `http(s)://host/<slug>` URL, or the bare
 * slug. For prefixed input the last path segment wins; a trailing slash
 * leaves the input unchanged.
 *
 * @example
 * ```ts
 * extractSlug("sbx.li/aB3xY9kQ")         // "aB3xY9kQ"
 * extractSlug("https://sbx.li/aB3xY9kQ") // "aB3xY9kQ"
 * extractSlug("aB3xY9kQ")                // "aB3xY9kQ"
 * ```
 */
export function extractSlug(raw: string): string {
  const input = raw.trim();
  const prefixed =
    input.startsWith("http://") ||
    input.startsWith("https://") ||
    input.startsWith(SHORT_LINK_CONFIG.PREFIX);

  if (prefixed) {
    const idx = input.lastIndexOf("/");
    if (idx !== -1 && idx + 1 < input.length) {
      return input.slice(idx + 1);
    }
  }

  return input;
}
