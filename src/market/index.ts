export { Market } from "./market-engine.js";
export type { BroadcastFn, MarketOptions, Solvency } from "./market-engine.js";
export { MarketStore, encodeState, decodeState } from "./market-store.js";
export type { StoredMarketState } from "./market-store.js";
export { MarketTransaction, emptyMarketState } from "./market-state.js";
export type { MarketState } from "./market-state.js";
export { SerialQueue } from "./serial-queue.js";
export { checkLiquidations } from "./liquidation-keeper.js";
export type { KeeperSweep } from "./liquidation-keeper.js";
export { EMPTY_ACCOUNT, settleLocal, evaluateLiquidation, isUnderMaintenance } from "./account.js";
export type { Account } from "./account.js";
export { EMPTY_GLOBAL, advance } from "./global.js";
export type { Global } from "./global.js";
export {
  parseMarketParameter,
  parseProtocolParameter,
  MarketParameterSchema,
  ProtocolParameterSchema,
} from "./market-parameter.js";
export type {
  MarketParameter,
  MarketParameterInput,
  ProtocolParameter,
  ProtocolParameterInput,
} from "./market-parameter.js";
export type { Position, PendingOrder } from "./position.js";
export { accumulate, valueBetween, rewardBetween, EMPTY_VERSION } from "./version.js";
export type { Version, Fee } from "./version.js";
export { computeRate } from "./utilization-curve.js";
export type { UtilizationCurve } from "./utilization-curve.js";

import { loadConfig, type MarketConfig } from "../config.js";
import type { TokenLedger } from "../ledger/token-ledger.js";
import { logger, setLogLevel } from "../logging/logger.js";
import { FeedOracle, OracleStore } from "../oracle/feed-oracle.js";
import { HttpPriceFeed, type PriceFeed } from "../oracle/price-feed.js";
import type { ParameterSource } from "../params/parameter-source.js";
import { Market, type BroadcastFn } from "./market-engine.js";
import { MarketStore } from "./market-store.js";

export interface MarketService {
  market: Market;
  oracle: FeedOracle;
  marketStore: MarketStore;
  config: MarketConfig;
}

export interface MarketServiceOptions {
  params: ParameterSource;
  ledger: TokenLedger;
  rewardLedger: TokenLedger;
  /** Ledger holder for the market's funds. */
  address: string;
  config?: MarketConfig;
  priceFeed?: PriceFeed;
  broadcast?: BroadcastFn;
}

/** Wire a market to its oracle and stores under the configured data directory. */
export async function createMarketService(options: MarketServiceOptions): Promise<MarketService> {
  const config = options.config ?? loadConfig();
  setLogLevel(config.logLevel);

  const priceFeed =
    options.priceFeed ??
    new HttpPriceFeed({ baseUrl: config.priceFeedUrl, cacheTtlMs: config.priceCacheTtlMs });
  const oracle = await FeedOracle.create(priceFeed, config.symbol, {
    store: new OracleStore(config.dataDir),
  });
  const marketStore = new MarketStore(config.dataDir);
  const market = await Market.create({
    oracle,
    params: options.params,
    ledger: options.ledger,
    rewardLedger: options.rewardLedger,
    address: options.address,
    store: marketStore,
    broadcast: options.broadcast,
  });

  logger.info("market", `Market service ready for ${config.symbol}`, {
    dataDir: config.dataDir,
    latestVersion: market.global().latestVersion,
  });
  return { market, oracle, marketStore, config };
}

let servicePromise: Promise<MarketService> | null = null;

/** Lazily initialise and return the singleton market service. */
export function getMarketService(options: MarketServiceOptions): Promise<MarketService> {
  if (!servicePromise) {
    servicePromise = createMarketService(options).catch((err: unknown) => {
      servicePromise = null;
      throw err;
    });
  }
  return servicePromise;
}

/** Drops the singleton so the next call builds a fresh service. */
export function resetMarketService(): void {
  servicePromise = null;
}
