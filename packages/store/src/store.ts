/**
 * Link Store
 *
 * The one explicitly-owned object behind every surface: registry (with its
 * owner index), mailbox and expiration sweeper. Created by an entry point,
 * injected into whatever needs it, shut down with the process.
 */

import { createLogger } from "@shortbox/logger";
import type { SlugGenerator } from "@shortbox/shared";
import { DEFAULT_STORE_CONFIG, type StoreConfig } from "./config.js";
import { LinkRegistry } from "./link-registry.js";
import { Mailbox } from "./mailbox.js";
import { ExpirationSweeper } from "./sweeper.js";
import { systemClock, type Clock, type Notifier, type StoreLogger } from "./types.js";

export interface LinkStoreOptions {
  config?: StoreConfig;
  clock?: Clock;
  generateSlug?: SlugGenerator;
  logger?: StoreLogger;

  /** Start the sweeper on construction (default: true) */
  startSweeper?: boolean;

  /** Receives a copy of every message delivered to a mailbox */
  echo?: Notifier;

  /** Called after a sweep that evicted at least one link */
  onSweep?: (evicted: number) => void;
}

export class LinkStore {
  readonly config: StoreConfig;
  readonly mailbox: Mailbox;
  readonly registry: LinkRegistry;
  readonly sweeper: ExpirationSweeper;
  private readonly logger: StoreLogger;

  constructor(options: LinkStoreOptions = {}) {
    const clock = options.clock ?? systemClock;
    this.config = options.config ?? DEFAULT_STORE_CONFIG;
    this.logger = options.logger ?? createLogger("store");

    this.mailbox = new Mailbox({ clock, logger: this.logger });
    const mailbox = this.mailbox;
    const echo = options.echo;
    const notifier: Notifier = echo
      ? {
          notify(ownerId, message) {
            mailbox.notify(ownerId, message);
            echo.notify(ownerId, message);
          },
        }
      : mailbox;

    this.registry = new LinkRegistry({
      ttlSeconds: this.config.linkTtlSeconds,
      notifier,
      clock,
      generateSlug: options.generateSlug,
      logger: this.logger,
    });
    this.sweeper = new ExpirationSweeper(this.registry, {
      initialDelayMs: this.config.sweepInitialDelaySeconds * 1000,
      intervalMs: this.config.sweepIntervalSeconds * 1000,
      clock,
      logger: this.logger,
      onSweep: options.onSweep,
    });

    if (options.startSweeper ?? true) {
      this.sweeper.start();
    }
  }

  /**
   * Stop background work. State stays readable until the process exits.
   */
  shutdown(): void {
    this.sweeper.stop();
    this.logger.info({ links: this.registry.size }, "Link store shut down");
  }
}

export function createLinkStore(options: LinkStoreOptions = {}): LinkStore {
  return new LinkStore(options);
}
