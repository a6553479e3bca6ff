/**
 * Notification Mailbox
 *
 * Per-owner FIFO of system messages about their links (expiry, click limit
 * reached). Reading is destructive: `drain` hands back the queue and empties
 * it. Queues are unbounded.
 */

import { createLogger } from "@shortbox/logger";
import type { Notification, OwnerId } from "@shortbox/shared";
import { systemClock, type Clock, type Notifier, type StoreLogger } from "./types.js";

export interface MailboxOptions {
  clock?: Clock;
  logger?: StoreLogger;
}

export class Mailbox implements Notifier {
  private readonly queues = new Map<OwnerId, Notification[]>();
  private readonly clock: Clock;
  private readonly logger: StoreLogger;

  constructor(options: MailboxOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("mailbox");
  }

  /**
   * Append a timestamped message to the owner's queue
   */
  notify(ownerId: OwnerId, message: string): void {
    let queue = this.queues.get(ownerId);
    if (!queue) {
      queue = [];
      this.queues.set(ownerId, queue);
    }
    queue.push({ timestamp: new Date(this.clock()), message });

    this.logger.info({ ownerId }, message);
  }

  /**
   * Take every queued message, oldest first, leaving the queue empty
   */
  drain(ownerId: OwnerId): Notification[] {
    const queue = this.queues.get(ownerId);
    if (!queue) return [];

    this.queues.delete(ownerId);
    return queue;
  }

  /**
   * Number of messages waiting for an owner
   */
  pending(ownerId: OwnerId): number {
    return this.queues.get(ownerId)?.length ?? 0;
  }
}
