export * from "./market/index.js";
export { MarketError, MarketErrorCode, isMarketError } from "./errors.js";
export type { MarketErrorCodeType } from "./errors.js";
export { Fixed6, Fixed18, UFixed6, UFixed18, parseDecimal, formatDecimal } from "./math/fixed-point.js";
export { FeedOracle, OracleStore } from "./oracle/feed-oracle.js";
export type { FeedOracleOptions } from "./oracle/feed-oracle.js";
export { HttpPriceFeed } from "./oracle/price-feed.js";
export type { PriceFeed, PriceQuote, HttpPriceFeedOptions } from "./oracle/price-feed.js";
export { GENESIS_VERSION } from "./oracle/oracle-provider.js";
export type { OracleProvider, OracleVersion } from "./oracle/oracle-provider.js";
export { InMemoryTokenLedger } from "./ledger/token-ledger.js";
export type { TokenLedger } from "./ledger/token-ledger.js";
export { StaticParameterSource } from "./params/parameter-source.js";
export type { ParameterSource } from "./params/parameter-source.js";
export { loadConfig } from "./config.js";
export type { MarketConfig } from "./config.js";
export { logger, setLogLevel } from "./logging/logger.js";
export type { LogLevel } from "./logging/logger.js";
