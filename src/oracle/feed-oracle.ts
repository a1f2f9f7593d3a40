import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MarketError, MarketErrorCode } from "../errors.js";
import { logger } from "../logging/logger.js";
import { Fixed6 } from "../math/fixed-point.js";
import { readJsonFile, writeJsonAtomic } from "../storage/json-file.js";
import { GENESIS_VERSION, type OracleProvider, type OracleVersion } from "./oracle-provider.js";
import type { PriceFeed } from "./price-feed.js";

const StoredVersionSchema = Type.Object({
  version: Type.Integer({ minimum: 1 }),
  timestamp: Type.Integer({ minimum: 0 }),
  price: Type.String({ pattern: "^-?\\d+$" }),
});

const OracleHistorySchema = Type.Object({
  symbol: Type.String(),
  versions: Type.Array(StoredVersionSchema),
});

type OracleHistory = Static<typeof OracleHistorySchema>;

/** Persists published versions so a restarted oracle keeps its numbering. */
export class OracleStore {
  private storagePath: string;

  constructor(dir: string) {
    this.storagePath = path.join(dir, "oracle-history.json");
  }

  async load(symbol: string): Promise<OracleVersion[]> {
    const data = await readJsonFile(this.storagePath);
    if (data === undefined) {
      return [];
    }
    if (!Value.Check(OracleHistorySchema, data)) {
      throw new Error(`Corrupt oracle history at ${this.storagePath}`);
    }
    if (data.symbol !== symbol) {
      throw new Error(`Oracle history at ${this.storagePath} belongs to ${data.symbol}, not ${symbol}`);
    }
    return data.versions.map((v) => ({
      version: v.version,
      timestamp: v.timestamp,
      price: Fixed6.fromRaw(v.price),
    }));
  }

  async save(symbol: string, versions: OracleVersion[]): Promise<void> {
    const data: OracleHistory = {
      symbol,
      versions: versions.map((v) => ({
        version: v.version,
        timestamp: v.timestamp,
        price: v.price.value.toString(),
      })),
    };
    await writeJsonAtomic(this.storagePath, data);
  }
}

export interface FeedOracleOptions {
  store?: OracleStore;
  /** Unix seconds. */
  clock?: () => number;
}

function systemClock(): number {
  return Math.floor(Date.now() / 1000);
}

/**
 * Oracle that publishes a new version from a price feed whenever its clock
 * has moved past the latest published timestamp.
 */
export class FeedOracle implements OracleProvider {
  private versions: OracleVersion[];
  private feed: PriceFeed;
  private symbol: string;
  private store?: OracleStore;
  private clock: () => number;

  private constructor(
    feed: PriceFeed,
    symbol: string,
    versions: OracleVersion[],
    options: FeedOracleOptions,
  ) {
    this.feed = feed;
    this.symbol = symbol.toUpperCase();
    this.versions = versions;
    this.store = options.store;
    this.clock = options.clock ?? systemClock;
  }

  static async create(
    feed: PriceFeed,
    symbol: string,
    options: FeedOracleOptions = {},
  ): Promise<FeedOracle> {
    const versions = options.store ? await options.store.load(symbol.toUpperCase()) : [];
    return new FeedOracle(feed, symbol, versions, options);
  }

  async currentVersion(): Promise<OracleVersion> {
    return this.versions.at(-1) ?? GENESIS_VERSION;
  }

  async atVersion(version: number): Promise<OracleVersion> {
    if (version === 0) {
      return GENESIS_VERSION;
    }
    const found = this.versions[version - 1];
    if (!found) {
      throw new MarketError(
        MarketErrorCode.INVALID_ORACLE_VERSION,
        `Oracle version ${version} has not been published`,
        { version, latest: this.versions.length },
      );
    }
    return found;
  }

  async sync(): Promise<OracleVersion> {
    const latest = await this.currentVersion();
    const now = this.clock();
    if (latest.version > 0 && now <= latest.timestamp) {
      return latest;
    }

    let price: Fixed6;
    try {
      price = (await this.feed.fetchQuote(this.symbol)).price;
    } catch (err) {
      if (latest.version === 0) {
        throw err;
      }
      // feed outage: the last published version stays current
      logger.warn("oracle", `Price feed unavailable for ${this.symbol}, staying at version ${latest.version}`, {
        error: err instanceof Error ? err.message : String(err),
      });
      return latest;
    }

    const next: OracleVersion = { version: latest.version + 1, timestamp: now, price };
    if (this.store) {
      await this.store.save(this.symbol, [...this.versions, next]);
    }
    this.versions.push(next);
    logger.debug("oracle", `Published version ${next.version}`, {
      symbol: this.symbol,
      timestamp: now,
      price: price.toString(),
    });
    return next;
  }
}
