/**
 * Shared Utility Functions
 */

// Slug generation and validation
export { generateSlug, validateSlug } from "./slug.js";
export type { ValidationResult, SlugGenerator } from "./slug.js";

// Target URL validation
export { validateTargetUrl } from "./url.js";

// Owner identities
export { generateOwnerId, parseOwnerId } from "./owner.js";

// Short form display and parsing
export { formatShortUrl, extractSlug } from "./short-url.js";
