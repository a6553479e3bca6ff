/**
 * Target URL validation
 */

import type { ValidationResult } from "./slug.js";

/**
 * Check that a target URL is absolute: it must parse and carry both a
 * scheme and a host. `https://example.com` passes, `example.com`,
 * `/path` and `mailto:a@b.c` do not.
 */
export function validateTargetUrl(raw: string): ValidationResult {
  let parsed: URL;
  try {
    parsed = new URL(raw);
  } catch {
    return { valid: false, error: `URL must be absolute (scheme and host): ${raw}` };
  }

  if (!parsed.protocol || !parsed.host) {
    return { valid: false, error: `URL must be absolute (scheme and host): ${raw}` };
  }

  return { valid: true };
}
