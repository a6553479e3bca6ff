/**
 * Mailbox Tests
 */

import { describe, it, expect, beforeEach } from "@jest/globals";
import { Mailbox } from "../src/index.js";
import { OWNER_A, OWNER_B, T0, createTestClock, createTestLogger, type TestClock } from "./helpers.js";

describe("Mailbox", () => {
  let time: TestClock;
  let logger: ReturnType<typeof createTestLogger>;
  let mailbox: Mailbox;

  beforeEach(() => {
    time = createTestClock();
    logger = createTestLogger();
    mailbox = new Mailbox({ clock: time.clock, logger });
  });

  it("should return an empty list for an owner with no messages", () => {
    expect(mailbox.drain(OWNER_A)).toEqual([]);
    expect(mailbox.pending(OWNER_A)).toBe(0);
  });

  it("should drain messages in the order they were queued", () => {
    mailbox.notify(OWNER_A, "first");
    time.advance(1500);
    mailbox.notify(OWNER_A, "second");

    expect(mailbox.drain(OWNER_A)).toEqual([
      { timestamp: new Date(T0), message: "first" },
      { timestamp: new Date(T0 + 1500), message: "second" },
    ]);
  });

  it("should empty the queue on drain", () => {
    mailbox.notify(OWNER_A, "only once");

    expect(mailbox.drain(OWNER_A)).toHaveLength(1);
    expect(mailbox.drain(OWNER_A)).toEqual([]);
  });

  it("should keep queues per owner", () => {
    mailbox.notify(OWNER_A, "for a");
    mailbox.notify(OWNER_B, "for b");
    mailbox.notify(OWNER_B, "for b again");

    expect(mailbox.pending(OWNER_A)).toBe(1);
    expect(mailbox.pending(OWNER_B)).toBe(2);
    expect(mailbox.drain(OWNER_B).map((n) => n.message)).toEqual(["for b", "for b again"]);
    expect(mailbox.pending(OWNER_A)).toBe(1);
  });

  it("should hand over the drained list, unaffected by later messages", () => {
    mailbox.notify(OWNER_A, "before");
    const drained = mailbox.drain(OWNER_A);

    mailbox.notify(OWNER_A, "after");

    expect(drained.map((n) => n.message)).toEqual(["before"]);
    expect(mailbox.pending(OWNER_A)).toBe(1);
  });

  it("should mirror every message to the log", () => {
    mailbox.notify(OWNER_A, "link expired");

    expect(logger.info).toHaveBeenCalledWith({ ownerId: OWNER_A }, "link expired");
  });
});
