/**
 * Expiration Sweeper
 *
 * Periodic background job that evicts expired links and notifies their
 * owners.
 *
 * Schedule:
 *   start ──initialDelay──▶ run ──interval──▶ run ──interval──▶ run ...
 *
 * - One clock snapshot per run; links expiring strictly before it go
 * - Eviction goes through `LinkRegistry.expire`, which skips links that
 *   were deleted or consumed-as-expired in the meantime
 * - A failing run is logged and the schedule keeps going
 * - Timers are unref'd: the sweeper alone never keeps the process alive
 */

import { createLogger } from "@shortbox/logger";
import type { LinkRegistry } from "./link-registry.js";
import { systemClock, type Clock, type StoreLogger } from "./types.js";

export interface SweeperOptions {
  /** Delay before the first run */
  initialDelayMs: number;

  /** Period between runs */
  intervalMs: number;

  clock?: Clock;
  logger?: StoreLogger;

  /** Called after a run that evicted at least one link */
  onSweep?: (evicted: number) => void;
}

type SweepTarget = Pick<LinkRegistry, "findExpired" | "expire">;

export class ExpirationSweeper {
  private initialTimer: ReturnType<typeof setTimeout> | null = null;
  private intervalTimer: ReturnType<typeof setInterval> | null = null;
  private readonly clock: Clock;
  private readonly logger: StoreLogger;

  // Metrics
  private totalRuns = 0;
  private totalEvicted = 0;
  private totalFailures = 0;

  constructor(
    private readonly registry: SweepTarget,
    private readonly options: SweeperOptions
  ) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger("sweeper");
  }

  get isRunning(): boolean {
    return this.initialTimer !== null || this.intervalTimer !== null;
  }

  /**
   * Schedule the periodic runs. Calling it again while running is a no-op.
   */
  start(): void {
    if (this.isRunning) return;

    this.initialTimer = setTimeout(() => {
      this.initialTimer = null;
      this.tick();
      this.intervalTimer = setInterval(() => this.tick(), this.options.intervalMs);
      this.intervalTimer.unref();
    }, this.options.initialDelayMs);
    this.initialTimer.unref();

    this.logger.debug(
      { initialDelayMs: this.options.initialDelayMs, intervalMs: this.options.intervalMs },
      "Expiration sweeper started"
    );
  }

  /**
   * Cancel the schedule. A run already executing completes first, since
   * runs are synchronous.
   */
  stop(): void {
    if (this.initialTimer) {
      clearTimeout(this.initialTimer);
      this.initialTimer = null;
    }
    if (this.intervalTimer) {
      clearInterval(this.intervalTimer);
      this.intervalTimer = null;
    }
    this.logger.debug("Expiration sweeper stopped");
  }

  /**
   * Evict everything that expired before now.
   *
   * @returns Number of links evicted by this run
   */
  runOnce(): number {
    const now = this.clock();
    const expired = this.registry.findExpired(now);

    let evicted = 0;
    for (const link of expired) {
      if (this.registry.expire(link.slug)) {
        evicted++;
      }
    }

    this.totalRuns++;
    this.totalEvicted += evicted;

    if (evicted > 0) {
      this.logger.info({ evicted }, "Expired links removed");
      this.options.onSweep?.(evicted);
    }

    return evicted;
  }

  getMetrics(): { runs: number; evicted: number; failures: number } {
    return {
      runs: this.totalRuns,
      evicted: this.totalEvicted,
      failures: this.totalFailures,
    };
  }

  private tick(): void {
    try {
      this.runOnce();
    } catch (err) {
      this.totalFailures++;
      this.logger.error({ err }, "Expired link sweep failed");
    }
  }
}
