/**
 * Store Configuration Tests
 */

import { describe, it, expect } from "@jest/globals";
import { DEFAULT_STORE_CONFIG, loadStoreConfig, validateStoreConfig } from "../src/index.js";
import { createTestLogger } from "./helpers.js";

describe("loadStoreConfig", () => {
  it("should use defaults when nothing is set", () => {
    expect(loadStoreConfig({})).toEqual({
      linkTtlSeconds: 86_400,
      sweepInitialDelaySeconds: 10,
      sweepIntervalSeconds: 30,
    });
    expect(loadStoreConfig({})).toEqual(DEFAULT_STORE_CONFIG);
  });

  it("should read overrides from the environment", () => {
    const config = loadStoreConfig({
      LINK_TTL_SECONDS: "3600",
      SWEEP_INITIAL_DELAY_SECONDS: "0",
      SWEEP_INTERVAL_SECONDS: "5",
    });

    expect(config).toEqual({
      linkTtlSeconds: 3600,
      sweepInitialDelaySeconds: 0,
      sweepIntervalSeconds: 5,
    });
  });

  it.each([["abc"], ["0"], ["-30"], ["9000000000000"]])(
    "should fall back to the default TTL for %p",
    (value) => {
      expect(loadStoreConfig({ LINK_TTL_SECONDS: value }).linkTtlSeconds).toBe(86_400);
    }
  );
});

describe("validateStoreConfig", () => {
  it("should accept the defaults silently", () => {
    const logger = createTestLogger();

    expect(validateStoreConfig(DEFAULT_STORE_CONFIG, logger)).toEqual([]);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("should warn when links live shorter than a sweep interval", () => {
    const logger = createTestLogger();
    const config = { linkTtlSeconds: 10, sweepInitialDelaySeconds: 10, sweepIntervalSeconds: 30 };

    const warnings = validateStoreConfig(config, logger);

    expect(warnings).toEqual([
      "LINK_TTL_SECONDS=10s is shorter than SWEEP_INTERVAL_SECONDS=30s. Expired links linger until the next sweep or access.",
    ]);
    expect(logger.warn).toHaveBeenCalledWith({ config }, warnings[0]);
  });
});
