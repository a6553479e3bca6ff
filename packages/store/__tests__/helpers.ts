/**
 * Test helpers for the store package.
 */

import { jest } from "@jest/globals";
import type { Clock, StoreLogger } from "../src/index.js";

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

export const OWNER_A = "11111111-1111-4111-8111-111111111111";
export const OWNER_B = "22222222-2222-4222-8222-222222222222";

export interface TestClock {
  clock: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

/**
 * Manually driven clock starting at T0
 */
export function createTestClock(start: number = T0): TestClock {
  let now = start;
  return {
    clock: () => now,
    advance: (ms) => {
      now += ms;
    },
    set: (ms) => {
      now = ms;
    },
  };
}

export function createTestLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  } satisfies StoreLogger;
}

/**
 * Slug source that replays the given slugs in order
 */
export function sequenceSlugs(...slugs: string[]): () => string {
  let index = 0;
  return () => {
    const slug = slugs[index];
    if (slug === undefined) {
      throw new Error("sequenceSlugs ran out of slugs");
    }
    index++;
    return slug;
  };
}
