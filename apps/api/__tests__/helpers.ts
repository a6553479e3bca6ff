/**
 * API Test Helpers
 */

import { jest } from "@jest/globals";
import type { FastifyInstance } from "fastify";
import { createLinkStore, type LinkStore, type StoreLogger } from "@shortbox/store";
import { buildApp } from "../src/app.js";
import type { ApiConfig } from "../src/config.js";

export const T0 = Date.UTC(2024, 0, 1, 12, 0, 0);

export const OWNER_A = "11111111-1111-4111-8111-111111111111";
export const OWNER_B = "22222222-2222-4222-8222-222222222222";

export const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

export const TEST_CONFIG: ApiConfig = {
  port: 3000,
  host: "127.0.0.1",
  nodeEnv: "test",
  corsOrigin: true,
  rateLimitMax: 100,
  store: {
    linkTtlSeconds: 3600,
    sweepInitialDelaySeconds: 10,
    sweepIntervalSeconds: 30,
  },
};

export interface TestApp {
  app: FastifyInstance;
  store: LinkStore;
  /** Move the store's clock forward */
  advance(ms: number): void;
}

export function createTestLogger() {
  return {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  } satisfies StoreLogger;
}

export async function createTestApp(overrides: Partial<ApiConfig> = {}): Promise<TestApp> {
  let now = T0;
  const config = { ...TEST_CONFIG, ...overrides };
  const store = createLinkStore({
    config: config.store,
    clock: () => now,
    logger: createTestLogger(),
    startSweeper: false,
  });

  const app = await buildApp({ store, config, logger: false });
  await app.ready();

  return {
    app,
    store,
    advance: (ms) => {
      now += ms;
    },
  };
}
