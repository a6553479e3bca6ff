/**
 * Configuration Module
 *
 * Loads store settings from environment variables.
 * No validation libraries - just simple parsing with defaults.
 */

import { LINK_TTL_CONFIG } from "@shortbox/shared";
import type { StoreLogger } from "./types.js";

/**
 * Store configuration
 */
export interface StoreConfig {
  /** Lifetime of every new link (LINK_TTL_SECONDS, default 86400) */
  linkTtlSeconds: number;

  /** Delay before the first sweep (SWEEP_INITIAL_DELAY_SECONDS, default 10) */
  sweepInitialDelaySeconds: number;

  /** Period between sweeps (SWEEP_INTERVAL_SECONDS, default 30) */
  sweepIntervalSeconds: number;
}

export const DEFAULT_STORE_CONFIG: StoreConfig = {
  linkTtlSeconds: LINK_TTL_CONFIG.DEFAULT_SECONDS,
  sweepInitialDelaySeconds: 10,
  sweepIntervalSeconds: 30,
};

type Env = Record<string, string | undefined>;

// =============================================================================
// Environment Parsing Helpers
// =============================================================================

/**
 * Get optional environment variable with default.
 */
export function optional(env: Env, name: string, defaultValue: string): string {
  return env[name] || defaultValue;
}

/**
 * Parse integer with default. Values outside `[min, max]` fall back to the default.
 */
export function optionalInt(
  env: Env,
  name: string,
  defaultValue: number,
  min = 1,
  max = Number.MAX_SAFE_INTEGER
): number {
  const value = env[name];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < min || parsed > max ? defaultValue : parsed;
}

// =============================================================================
// Configuration Loading
// =============================================================================

/**
 * Load store configuration from the environment.
 */
export function loadStoreConfig(env: Env = process.env): StoreConfig {
  return {
    linkTtlSeconds: optionalInt(
      env,
      "LINK_TTL_SECONDS",
      DEFAULT_STORE_CONFIG.linkTtlSeconds,
      1,
      LINK_TTL_CONFIG.MAX_SECONDS
    ),
    sweepInitialDelaySeconds: optionalInt(
      env,
      "SWEEP_INITIAL_DELAY_SECONDS",
      DEFAULT_STORE_CONFIG.sweepInitialDelaySeconds,
      0
    ),
    sweepIntervalSeconds: optionalInt(
      env,
      "SWEEP_INTERVAL_SECONDS",
      DEFAULT_STORE_CONFIG.sweepIntervalSeconds
    ),
  };
}

/**
 * Warn about settings that work but behave unexpectedly.
 *
 * @returns The warnings that were logged
 */
export function validateStoreConfig(config: StoreConfig, logger: StoreLogger): string[] {
  const warnings: string[] = [];

  if (config.linkTtlSeconds < config.sweepIntervalSeconds) {
    warnings.push(
      `LINK_TTL_SECONDS=${config.linkTtlSeconds}s is shorter than SWEEP_INTERVAL_SECONDS=${config.sweepIntervalSeconds}s. ` +
        "Expired links linger until the next sweep or access."
    );
  }

  for (const warning of warnings) {
    logger.warn({ config }, warning);
  }

  return warnings;
}
