/**
 * API Configuration
 *
 * Server settings plus the store settings, all from environment variables.
 */

import { loadStoreConfig, optional, optionalInt, type StoreConfig } from "@shortbox/store";

type Env = Record<string, string | undefined>;

export interface ApiConfig {
  port: number;
  host: string;
  nodeEnv: string;

  /** Allowed CORS origin; `true` reflects any origin */
  corsOrigin: string | true;

  /** Requests per minute per client IP */
  rateLimitMax: number;

  store: StoreConfig;
}

export function loadApiConfig(env: Env = process.env): ApiConfig {
  return {
    port: optionalInt(env, "PORT", 3000),
    host: optional(env, "HOST", "0.0.0.0"),
    nodeEnv: optional(env, "NODE_ENV", "development"),
    corsOrigin: env.CORS_ORIGIN || true,
    rateLimitMax: optionalInt(env, "RATE_LIMIT_MAX", 100),
    store: loadStoreConfig(env),
  };
}
