import os from "node:os";
import path from "node:path";
import { describe, it, expect } from "vitest";
import { DEFAULT_PRICE_CACHE_TTL_MS, DEFAULT_PRICE_FEED_URL, loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({
      dataDir: path.join(os.homedir(), ".perp-market"),
      symbol: "ETHUSDT",
      priceFeedUrl: DEFAULT_PRICE_FEED_URL,
      priceCacheTtlMs: DEFAULT_PRICE_CACHE_TTL_MS,
      logLevel: "info",
    });
  });

  it("reads the environment", () => {
    const config = loadConfig({
      MARKET_DATA_DIR: "/tmp/markets",
      MARKET_SYMBOL: "btcusdt",
      PRICE_FEED_URL: "http://localhost:9000",
      PRICE_CACHE_TTL_MS: "5000",
      LOG_LEVEL: "debug",
    });
    expect(config).toEqual({
      dataDir: "/tmp/markets",
      symbol: "BTCUSDT",
      priceFeedUrl: "http://localhost:9000",
      priceCacheTtlMs: 5000,
      logLevel: "debug",
    });
  });

  it("ignores an unusable cache ttl", () => {
    expect(loadConfig({ PRICE_CACHE_TTL_MS: "soon" }).priceCacheTtlMs).toBe(DEFAULT_PRICE_CACHE_TTL_MS);
    expect(loadConfig({ PRICE_CACHE_TTL_MS: "-1" }).priceCacheTtlMs).toBe(DEFAULT_PRICE_CACHE_TTL_MS);
  });
});
