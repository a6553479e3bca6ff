/**
 * Slug Generation Module
 *
 * ┌─────────────────────────────────────────────────────────────────────────┐
 * │ RESPONSIBILITIES                                                        │
 * ├─────────────────────────────────────────────────────────────────────────┤
 * │ 1. GENERATION  - Random alphanumeric slug creation                     │
 * │ 2. VALIDATION  - Length and alphabet checking                          │
 * └─────────────────────────────────────────────────────────────────────────┘
 *
 * Strategy: Random Base62
 * - Length: 8 characters (62^8 = ~218 trillion combinations)
 * - Alphabet: a-zA-Z0-9 (62 URL-safe characters)
 * - Collision handling: the registry retries until the slug is free
 *
 * Generation holds no state, so concurrent callers never share anything.
 */

import { webcrypto } from "node:crypto";
import { SLUG_CONFIG } from "../constants/index.js";

// =============================================================================
// TYPES
// =============================================================================

/**
 * Result of a validation operation
 */
export interface ValidationResult {
  /** Whether the input is valid */
  valid: boolean;
  /** Human-readable error message if invalid */
  error?: string;
}

/**
 * Source of fresh slugs. The registry takes one so tests can force collisions.
 */
export type SlugGenerator = () => string;

// =============================================================================
// SECTION 1: GENERATION
// =============================================================================

/**
 * Largest multiple of the alphabet size that fits in a byte (62 * 4 = 248).
 * Bytes at or above it are discarded so every character is equally likely.
 */
const UNBIASED_BYTE_LIMIT = 256 - (256 % SLUG_CONFIG.ALPHABET.length);

/**
 * Generate a random Base62 slug.
 *
 * Uses `crypto.getRandomValues()` with rejection sampling, so each
 * character is drawn uniformly from the alphabet.
 *
 * @example
 * ```ts
 * generateSlug();    // "aB3xY9kQ"
 * generateSlug(12);  // "aB3xY9kQm2Pz"
 * ```
 */
export function generateSlug(length: number = SLUG_CONFIG.LENGTH): string {
  const { ALPHABET } = SLUG_CONFIG;
  let slug = "";

  while (slug.length < length) {
    // Draw a few spare bytes so one batch usually suffices
    const bytes = new Uint8Array(length - slug.length + 4);
    webcrypto.getRandomValues(bytes);

    for (const byte of bytes) {
      if (byte >= UNBIASED_BYTE_LIMIT) continue;
      slug += ALPHABET[byte % ALPHABET.length];
      if (slug.length === length) break;
    }
  }

  return slug;
}

// =============================================================================
// SECTION 2: VALIDATION
// =============================================================================

/**
 * Validate a slug's format.
 *
 * Rules:
 * - Exactly LENGTH (8) characters
 * - Alphanumeric only
 *
 * @example
 * ```ts
 * validateSlug("aB3xY9kQ") // { valid: true }
 * validateSlug("abc")      // { valid: false, error: "..." }
 * ```
 */
export function validateSlug(slug: string): ValidationResult {
  const { LENGTH, ALPHABET } = SLUG_CONFIG;

  if (slug.length !== LENGTH) {
    return {
      valid: false,
      error: `Slug must be exactly ${LENGTH} characters`,
    };
  }

  for (const char of slug) {
    if (!ALPHABET.includes(char)) {
      return {
        valid: false,
        error: "Slug must contain only alphanumeric characters (a-z, A-Z, 0-9)",
      };
    }
  }

  return { valid: true };
}
