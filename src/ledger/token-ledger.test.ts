import { describe, it, expect } from "vitest";
import { MarketErrorCode, isMarketError } from "../errors.js";
import { UFixed18 } from "../math/fixed-point.js";
import { InMemoryTokenLedger } from "./token-ledger.js";

describe("InMemoryTokenLedger", () => {
  it("moves balances between holders", async () => {
    const ledger = new InMemoryTokenLedger({ alice: UFixed18.from("100") });
    await ledger.transferFrom("alice", "market", UFixed18.from("40"));
    await ledger.transfer("market", "bob", UFixed18.from("15.5"));

    expect((await ledger.balanceOf("alice")).toString()).toBe("60");
    expect((await ledger.balanceOf("market")).toString()).toBe("24.5");
    expect((await ledger.balanceOf("bob")).toString()).toBe("15.5");
    expect((await ledger.balanceOf("nobody")).isZero()).toBe(true);
  });

  it("rejects overdrafts and leaves balances untouched", async () => {
    const ledger = new InMemoryTokenLedger();
    ledger.mint("alice", UFixed18.from("1"));

    let caught: unknown;
    try {
      await ledger.transferFrom("alice", "market", UFixed18.from("2"));
    } catch (err) {
      caught = err;
    }
    expect(isMarketError(caught, MarketErrorCode.INSUFFICIENT_BALANCE)).toBe(true);
    expect((await ledger.balanceOf("alice")).toString()).toBe("1");
    expect((await ledger.balanceOf("market")).isZero()).toBe(true);
  });

  it("ignores zero transfers from empty holders", async () => {
    const ledger = new InMemoryTokenLedger();
    await ledger.transfer("market", "bob", UFixed18.ZERO);
    expect((await ledger.balanceOf("bob")).isZero()).toBe(true);
  });
});
