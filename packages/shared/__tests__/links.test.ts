/**
 * URL, Owner and Short Form Helper Tests
 */

import { describe, it, expect } from "@jest/globals";
import {
  extractSlug,
  formatShortUrl,
  generateOwnerId,
  parseOwnerId,
  validateTargetUrl,
} from "../src/index.js";

describe("validateTargetUrl", () => {
  it.each([
    ["https://example.com"],
    ["http://example.com/a/b?c=d#e"],
    ["ftp://files.example.org/x"],
  ])("should accept %p", (url) => {
    expect(validateTargetUrl(url)).toEqual({ valid: true });
  });

  it.each([["example.com"], ["/path/only"], ["not a url"], [""], ["mailto:a@b.c"]])(
    "should reject %p",
    (url) => {
      expect(validateTargetUrl(url)).toEqual({
        valid: false,
        error: `URL must be absolute (scheme and host): ${url}`,
      });
    }
  );
});

describe("Owner identities", () => {
  it("should generate parseable UUIDs", () => {
    const id = generateOwnerId();

    expect(parseOwnerId(id)).toBe(id);
  });

  it("should generate distinct identities", () => {
    expect(generateOwnerId()).not.toBe(generateOwnerId());
  });

  it("should trim and lowercase a valid token", () => {
    expect(parseOwnerId("  AAAAAAAA-BBBB-4CCC-8DDD-EEEEEEEEEEEE ")).toBe(
      "aaaaaaaa-bbbb-4ccc-8ddd-eeeeeeeeeeee"
    );
  });

  it.each([["not-a-uuid"], [""], ["11111111-1111-4111-8111-11111111111"]])(
    "should reject %p",
    (raw) => {
      expect(parseOwnerId(raw)).toBeNull();
    }
  );
});

describe("Short form", () => {
  it("should format a slug with the fixed prefix", () => {
    expect(formatShortUrl("aB3xY9kQ")).toBe("sbx.li/aB3xY9kQ");
  });

  it.each([
    ["sbx.li/aB3xY9kQ", "aB3xY9kQ"],
    ["https://sbx.li/aB3xY9kQ", "aB3xY9kQ"],
    ["http://localhost:3000/aB3xY9kQ", "aB3xY9kQ"],
    ["  aB3xY9kQ  ", "aB3xY9kQ"],
    ["aB3xY9kQ", "aB3xY9kQ"],
    ["sbx.li/", "sbx.li/"],
  ])("should extract the slug from %p", (input, expected) => {
    expect(extractSlug(input)).toBe(expected);
  });
});
