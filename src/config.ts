import dotenv from "dotenv";
import os from "node:os";
import path from "node:path";
import { parseLevel, type LogLevel } from "./logging/logger.js";

dotenv.config();

export interface MarketConfig {
  dataDir: string;
  symbol: string;
  priceFeedUrl: string;
  priceCacheTtlMs: number;
  logLevel: LogLevel;
}

export const DEFAULT_PRICE_FEED_URL = "https://api.binance.com";
export const DEFAULT_PRICE_CACHE_TTL_MS = 30_000;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): MarketConfig {
  const ttl = env.PRICE_CACHE_TTL_MS ? Number(env.PRICE_CACHE_TTL_MS) : DEFAULT_PRICE_CACHE_TTL_MS;
  return {
    dataDir: env.MARKET_DATA_DIR || path.join(os.homedir(), ".perp-market"),
    symbol: (env.MARKET_SYMBOL || "ETHUSDT").toUpperCase(),
    priceFeedUrl: env.PRICE_FEED_URL || DEFAULT_PRICE_FEED_URL,
    priceCacheTtlMs: Number.isNaN(ttl) || ttl < 0 ? DEFAULT_PRICE_CACHE_TTL_MS : ttl,
    logLevel: parseLevel(env.LOG_LEVEL),
  };
}
