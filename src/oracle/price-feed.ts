import { Fixed6 } from "../math/fixed-point.js";
import { DEFAULT_PRICE_CACHE_TTL_MS, DEFAULT_PRICE_FEED_URL } from "../config.js";

export interface PriceQuote {
  symbol: string;
  price: Fixed6;
}

export interface PriceFeed {
  fetchQuote(symbol: string): Promise<PriceQuote>;
}

interface CachedQuote {
  price: Fixed6;
  timestamp: number;
}

export interface HttpPriceFeedOptions {
  baseUrl?: string;
  cacheTtlMs?: number;
  /** Injected for tests. */
  fetchFn?: typeof fetch;
  now?: () => number;
}

/**
 * Spot quotes from a ticker-price endpoint (`/api/v3/ticker/price`).
 * Prices are parsed from their decimal strings straight into fixed point.
 */
export class HttpPriceFeed implements PriceFeed {
  private cache = new Map<string, CachedQuote>();
  private baseUrl: string;
  private cacheTtlMs: number;
  private fetchFn: typeof fetch;
  private now: () => number;

  constructor(options: HttpPriceFeedOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_PRICE_FEED_URL).replace(/\/+$/, "");
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_PRICE_CACHE_TTL_MS;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? Date.now;
  }

  clearCache(): void {
    this.cache.clear();
  }

  async fetchQuote(symbol: string): Promise<PriceQuote> {
    const key = symbol.toUpperCase();
    const cached = this.cache.get(key);
    if (cached && this.now() - cached.timestamp < this.cacheTtlMs) {
      return { symbol: key, price: cached.price };
    }

    const url = `${this.baseUrl}/api/v3/ticker/price?symbol=${encodeURIComponent(key)}`;
    const res = await this.fetchFn(url, {
      headers: {
        Accept: "application/json",
        "User-Agent": "perp-market/1.0",
      },
    });

    if (!res.ok) {
      const body = await res.text();
      throw new Error(`Price feed error (${res.status}): ${body}`);
    }

    const data: unknown = await res.json();
    const price = Fixed6.from(readPrice(data, key));

    this.cache.set(key, { price, timestamp: this.now() });
    return { symbol: key, price };
  }
}

function readPrice(data: unknown, symbol: string): string {
  if (data !== null && typeof data === "object" && "price" in data && typeof data.price === "string") {
    return data.price;
  }
  throw new Error(`Price feed returned no price for ${symbol}`);
}
