/**
 * Slug Configuration Constants
 *
 * Single source of truth for slug generation parameters.
 */
export const SLUG_CONFIG = {
  /**
   * Length of generated slugs.
   * 8 chars = 62^8 = ~218 trillion combinations.
   */
  LENGTH: 8,

  /**
   * Alphanumeric alphabet: a-zA-Z0-9
   * URL-safe, case-sensitive, 62 characters total.
   */
  ALPHABET: "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789",
} as const;

/**
 * Short Link Display Constants
 */
export const SHORT_LINK_CONFIG = {
  /** Fixed prefix of the short form: `<PREFIX><slug>` */
  PREFIX: "sbx.li/",
} as const;

/**
 * Link Lifetime Constants
 */
export const LINK_TTL_CONFIG = {
  /** Default time-to-live of a link (24 hours) */
  DEFAULT_SECONDS: 86_400,

  /** Longest accepted time-to-live (10 years); keeps expiry dates representable */
  MAX_SECONDS: 315_360_000,
} as const;
