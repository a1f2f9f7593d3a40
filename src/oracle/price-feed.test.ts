import { describe, it, expect, vi } from "vitest";
import { HttpPriceFeed } from "./price-feed.js";

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}

describe("HttpPriceFeed", () => {
  it("parses the quoted price without going through floats", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request) =>
      jsonResponse({ symbol: "ETHUSDT", price: "3150.12345678" }),
    );
    const feed = new HttpPriceFeed({ baseUrl: "https://prices.test/", fetchFn });

    const quote = await feed.fetchQuote("ethusdt");
    expect(quote.symbol).toBe("ETHUSDT");
    expect(quote.price.toString()).toBe("3150.123456");
    expect(fetchFn).toHaveBeenCalledWith(
      "https://prices.test/api/v3/ticker/price?symbol=ETHUSDT",
      expect.objectContaining({ headers: expect.objectContaining({ Accept: "application/json" }) }),
    );
  });

  it("serves cached quotes until the ttl expires", async () => {
    let now = 0;
    const fetchFn = vi.fn(async (_input: string | URL | Request) =>
      jsonResponse({ symbol: "ETHUSDT", price: "100" }),
    );
    const feed = new HttpPriceFeed({ fetchFn, cacheTtlMs: 1_000, now: () => now });

    await feed.fetchQuote("ETHUSDT");
    now = 999;
    await feed.fetchQuote("ETHUSDT");
    expect(fetchFn).toHaveBeenCalledTimes(1);

    now = 1_000;
    await feed.fetchQuote("ETHUSDT");
    expect(fetchFn).toHaveBeenCalledTimes(2);

    feed.clearCache();
    await feed.fetchQuote("ETHUSDT");
    expect(fetchFn).toHaveBeenCalledTimes(3);
  });

  it("surfaces http errors with the response body", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request) =>
      new Response("invalid symbol", { status: 400 }),
    );
    const feed = new HttpPriceFeed({ fetchFn });
    await expect(feed.fetchQuote("NOPE")).rejects.toThrow("Price feed error (400): invalid symbol");
  });

  it("rejects responses without a price", async () => {
    const fetchFn = vi.fn(async (_input: string | URL | Request) => jsonResponse({ symbol: "ETHUSDT" }));
    const feed = new HttpPriceFeed({ fetchFn });
    await expect(feed.fetchQuote("ETHUSDT")).rejects.toThrow("Price feed returned no price for ETHUSDT");
  });
});
