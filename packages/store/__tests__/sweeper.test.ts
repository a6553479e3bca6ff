/**
 * Expiration Sweeper Tests
 *
 * Schedule, eviction, failure containment and cancellation. Uses Jest fake
 * timers, which also drive Date.now().
 * @see packages/store/src/sweeper.ts
 */

import { describe, it, expect, jest, beforeEach, afterEach } from "@jest/globals";
import type { LinkRecord } from "@shortbox/shared";
import { ExpirationSweeper, LinkStore, expiredMessage } from "../src/index.js";
import { OWNER_A, OWNER_B, T0, createTestLogger } from "./helpers.js";

const INITIAL_DELAY_MS = 10_000;
const INTERVAL_MS = 30_000;

function fakeLink(slug: string): LinkRecord {
  return {
    slug,
    targetUrl: "https://example.com",
    ownerId: OWNER_A,
    clicks: { kind: "unlimited" },
    createdAt: new Date(T0),
    expiresAt: new Date(T0 + 1000),
  };
}

function createFakeTarget() {
  return {
    findExpired: jest.fn<(at: number) => LinkRecord[]>().mockReturnValue([]),
    expire: jest.fn<(slug: string) => LinkRecord | null>().mockReturnValue(null),
  };
}

describe("ExpirationSweeper", () => {
  let logger: ReturnType<typeof createTestLogger>;

  beforeEach(() => {
    jest.useFakeTimers({ now: T0 });
    logger = createTestLogger();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  describe("schedule", () => {
    it("should wait for the initial delay, then run every interval", () => {
      const target = createFakeTarget();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      sweeper.start();

      jest.advanceTimersByTime(INITIAL_DELAY_MS - 1);
      expect(target.findExpired).not.toHaveBeenCalled();

      jest.advanceTimersByTime(1);
      expect(target.findExpired).toHaveBeenCalledTimes(1);
      expect(target.findExpired).toHaveBeenLastCalledWith(T0 + INITIAL_DELAY_MS);

      jest.advanceTimersByTime(INTERVAL_MS);
      expect(target.findExpired).toHaveBeenCalledTimes(2);

      jest.advanceTimersByTime(INTERVAL_MS * 3);
      expect(target.findExpired).toHaveBeenCalledTimes(5);

      sweeper.stop();
    });

    it("should ignore a second start while running", () => {
      const target = createFakeTarget();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      sweeper.start();
      sweeper.start();
      jest.advanceTimersByTime(INITIAL_DELAY_MS);

      expect(target.findExpired).toHaveBeenCalledTimes(1);
      sweeper.stop();
    });

    it("should stop running after stop()", () => {
      const target = createFakeTarget();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      sweeper.start();
      jest.advanceTimersByTime(INITIAL_DELAY_MS);
      expect(sweeper.isRunning).toBe(true);

      sweeper.stop();
      jest.advanceTimersByTime(INTERVAL_MS * 10);

      expect(sweeper.isRunning).toBe(false);
      expect(target.findExpired).toHaveBeenCalledTimes(1);
    });

    it("should cancel before the first run when stopped early", () => {
      const target = createFakeTarget();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      sweeper.start();
      sweeper.stop();
      jest.advanceTimersByTime(INITIAL_DELAY_MS * 10);

      expect(target.findExpired).not.toHaveBeenCalled();
    });
  });

  describe("runOnce", () => {
    it("should count only the links it actually evicted", () => {
      const target = createFakeTarget();
      target.findExpired.mockReturnValue([fakeLink("aaaaaaaa"), fakeLink("bbbbbbbb")]);
      target.expire.mockImplementation((slug) => (slug === "aaaaaaaa" ? fakeLink(slug) : null));
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      expect(sweeper.runOnce()).toBe(1);
      expect(target.expire).toHaveBeenCalledWith("aaaaaaaa");
      expect(target.expire).toHaveBeenCalledWith("bbbbbbbb");
      expect(logger.info).toHaveBeenCalledWith({ evicted: 1 }, "Expired links removed");
    });

    it("should have no side effects when nothing expired", () => {
      const target = createFakeTarget();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      expect(sweeper.runOnce()).toBe(0);
      expect(target.expire).not.toHaveBeenCalled();
      expect(logger.info).not.toHaveBeenCalled();
    });

    it("should report evictions to onSweep, skipping empty runs", () => {
      const target = createFakeTarget();
      const onSweep = jest.fn<(evicted: number) => void>();
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
        onSweep,
      });

      sweeper.runOnce();
      target.findExpired.mockReturnValue([fakeLink("aaaaaaaa"), fakeLink("bbbbbbbb")]);
      target.expire.mockImplementation((slug) => fakeLink(slug));
      sweeper.runOnce();

      expect(onSweep).toHaveBeenCalledTimes(1);
      expect(onSweep).toHaveBeenCalledWith(2);
    });
  });

  describe("failure handling", () => {
    it("should log a failing run and keep the schedule alive", () => {
      const target = createFakeTarget();
      const failure = new Error("scan exploded");
      target.findExpired.mockImplementationOnce(() => {
        throw failure;
      });
      const sweeper = new ExpirationSweeper(target, {
        initialDelayMs: INITIAL_DELAY_MS,
        intervalMs: INTERVAL_MS,
        logger,
      });

      sweeper.start();
      jest.advanceTimersByTime(INITIAL_DELAY_MS);

      expect(logger.error).toHaveBeenCalledWith({ err: failure }, "Expired link sweep failed");
      expect(sweeper.isRunning).toBe(true);

      jest.advanceTimersByTime(INTERVAL_MS);
      expect(target.findExpired).toHaveBeenCalledTimes(2);
      expect(sweeper.getMetrics()).toEqual({ runs: 1, evicted: 0, failures: 1 });

      sweeper.stop();
    });
  });

  describe("with a live store", () => {
    it("should evict an expired link from registry and owner index and notify once", () => {
      const store = new LinkStore({
        config: { linkTtlSeconds: 60, sweepInitialDelaySeconds: 10, sweepIntervalSeconds: 30 },
        logger,
      });
      const created = store.registry.create({ ownerId: OWNER_A, targetUrl: "https://example.com" });
      const other = store.registry.create({ ownerId: OWNER_B, targetUrl: "https://other.example" });
      if (!created.success || !other.success) throw new Error("setup failed");
      const { slug } = created.data;

      // Runs at 10s and 40s find nothing; the link expires at 60s
      jest.advanceTimersByTime(40_000);
      expect(store.registry.size).toBe(2);

      // Run at 70s evicts both links
      jest.advanceTimersByTime(30_000);
      expect(store.registry.size).toBe(0);

      expect(store.registry.resolve(slug).success).toBe(false);
      expect(store.registry.isIndexed(OWNER_A, slug)).toBe(false);
      expect(store.registry.listByOwner(OWNER_A)).toEqual([]);
      expect(store.mailbox.drain(OWNER_A)).toEqual([
        { timestamp: new Date(T0 + 70_000), message: expiredMessage(slug) },
      ]);

      // Later runs do not repeat the notification
      jest.advanceTimersByTime(INTERVAL_MS * 2);
      expect(store.mailbox.pending(OWNER_A)).toBe(0);
      expect(store.mailbox.pending(OWNER_B)).toBe(1);

      store.shutdown();
    });
  });
});
