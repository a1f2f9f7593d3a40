/**
 * Settlement engine scenarios. Prices and versions come from a hand-driven
 * oracle; collateral moves through an in-memory ledger.
 */

import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { MarketErrorCode, isMarketError, type MarketErrorCodeType } from "../errors.js";
import { UFixed18, UFixed6 } from "../math/fixed-point.js";
import { EMPTY_ACCOUNT } from "./account.js";
import { MarketStore } from "./market-store.js";
import {
  HOUR,
  MARKET_ADDRESS,
  START_TIME,
  createTestMarket,
  f6,
  u6,
  type TestMarket,
} from "./test-harness.js";

const ZERO = u6("0");

async function expectCode(promise: Promise<unknown>, code: MarketErrorCodeType): Promise<void> {
  let caught: unknown;
  try {
    await promise;
  } catch (err) {
    caught = err;
  }
  expect(isMarketError(caught) ? caught.code : caught).toBe(code);
}

async function balance(t: TestMarket, holder: string): Promise<string> {
  return (await t.ledger.balanceOf(holder)).toString();
}

function eventNames(t: TestMarket): string[] {
  return t.events.map((e) => e.event);
}

/** Maker with 10 units and a 5 unit long, both opened at version 1 at price 123. */
async function openBook(t: TestMarket): Promise<void> {
  t.oracle.publish("123", START_TIME);
  await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
  await t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("10000"));
}

describe("settlement", () => {
  let t: TestMarket;

  beforeEach(async () => {
    t = await createTestMarket({ balances: { maker: "20000", user: "20000" } });
  });

  it("jumps straight to the current version on first settle", async () => {
    t.oracle.publish("100", START_TIME);
    t.oracle.publish("101", START_TIME + 10);
    const global = await t.market.settle();

    expect(global.latestVersion).toBe(2);
    expect(t.market.version(1)).toBeUndefined();
    expect(t.market.version(2)?.makerValue.isZero()).toBe(true);
  });

  it("fails before the oracle publishes anything", async () => {
    await expectCode(t.market.settle(), MarketErrorCode.INVALID_ORACLE_VERSION);
  });

  it("records pending orders that become live one version later", async () => {
    await openBook(t);

    const global = t.market.global();
    expect(global.latestVersion).toBe(1);
    expect(global.position.maker.isZero()).toBe(true);
    expect(global.pendingOrder.maker.toString()).toBe("10");
    expect(global.pendingOrder.long.toString()).toBe("5");
    expect(await balance(t, MARKET_ADDRESS)).toBe("20000");

    t.oracle.publish("123", START_TIME + HOUR);
    await t.market.settle();
    expect(t.market.global().position.long.toString()).toBe("5");
  });

  it("accrues funding from maker-backed takers to makers", async () => {
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    t.oracle.publish("123", START_TIME + 2 * HOUR);

    await t.market.settle();
    const maker = await t.market.settleAccount("maker");
    const user = await t.market.settleAccount("user");

    expect(t.market.version(3)?.makerValue.value).toBe(631n);
    expect(t.market.version(3)?.longValue.value).toBe(-1404n);
    expect(maker.collateral.toString()).toBe("10000.00631");
    expect(user.collateral.toString()).toBe("9999.99298");
    expect(t.market.global().fee.protocol.toString()).toBe("0.000351");
    expect(t.market.global().fee.market.toString()).toBe("0.000351");

    const solvency = await t.market.solvency();
    expect(solvency.surplus.value).toBe(8n);
  });

  it("is idempotent at a version", async () => {
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);

    const first = await t.market.settle();
    const settledEvents = eventNames(t).filter((e) => e === "market.settled").length;
    const second = await t.market.settle();

    expect(second).toBe(first);
    expect(eventNames(t).filter((e) => e === "market.settled").length).toBe(settledEvents);
  });

  it("syncs the oracle at the start of every call", async () => {
    t.oracle.publish("123", START_TIME);
    await t.market.settle();
    await t.market.settleAccount("user");
    expect(t.oracle.syncCalls).toBe(2);
  });

  it("does not store accounts that never held anything", async () => {
    t.oracle.publish("123", START_TIME);
    const account = await t.market.settleAccount("stranger");
    expect(account.latestVersion).toBe(1);
    expect(t.market.accounts()).toEqual([]);
  });

  it("distributes the taker fee to makers at the next version", async () => {
    const withFee = await createTestMarket({
      market: { takerFee: "0.01" },
      balances: { maker: "20000", user: "20000" },
    });
    withFee.oracle.publish("123", START_TIME);
    await withFee.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
    withFee.oracle.publish("123", START_TIME);

    const user = await withFee.market.update("user", "user", ZERO, u6("5"), ZERO, f6("10000"));
    expect(user.collateral.toString()).toBe("9993.85");
    expect(withFee.market.global().pendingPositionFee.toString()).toBe("6.15");

    withFee.oracle.publish("123", START_TIME);
    const maker = await withFee.market.settleAccount("maker");
    expect(maker.collateral.toString()).toBe("10006.15");
    expect(withFee.market.global().pendingPositionFee.isZero()).toBe(true);
    expect((await withFee.market.solvency()).surplus.isZero()).toBe(true);
  });
});

describe("update", () => {
  let t: TestMarket;

  beforeEach(async () => {
    t = await createTestMarket({
      balances: { maker: "20000", user: "20000", friend: "1000", "protocol-treasury": "0" },
    });
  });

  it("overwrites a pending order placed at the same version", async () => {
    await openBook(t);
    await t.market.update("user", "user", ZERO, u6("3"), ZERO, f6("0"));

    expect(t.market.global().pendingOrder.long.toString()).toBe("3");
    expect(t.market.account("user").pendingOrder.long.toString()).toBe("3");
    expect(t.market.account("user").pendingOrder.version).toBe(1);
  });

  it("rejects takers beyond available maker liquidity", async () => {
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));

    await expectCode(
      t.market.update("user", "user", ZERO, u6("40"), ZERO, f6("10000")),
      MarketErrorCode.INSUFFICIENT_LIQUIDITY,
    );
    expect(t.market.account("user")).toBe(EMPTY_ACCOUNT);
    expect(t.market.global().pendingOrder.long.isZero()).toBe(true);
    expect(await balance(t, "user")).toBe("20000");
  });

  it("allows closing while liquidity is short", async () => {
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    // maker leaves; the long is now unbacked
    await t.market.update("maker", "maker", ZERO, ZERO, ZERO, f6("0"));

    await expectCode(
      t.market.update("user", "user", ZERO, u6("6"), ZERO, f6("0")),
      MarketErrorCode.INSUFFICIENT_LIQUIDITY,
    );
    const user = await t.market.update("user", "user", ZERO, u6("2"), ZERO, f6("0"));
    expect(user.pendingOrder.long.toString()).toBe("2");
  });

  it("rejects makers over the limit", async () => {
    const limited = await createTestMarket({
      market: { makerLimit: "15" },
      balances: { maker: "20000" },
    });
    limited.oracle.publish("123", START_TIME);
    await expectCode(
      limited.market.update("maker", "maker", u6("20"), ZERO, ZERO, f6("10000")),
      MarketErrorCode.MAKER_OVER_LIMIT,
    );
  });

  it("rejects every update while paused", async () => {
    t.oracle.publish("123", START_TIME);
    t.params.updateProtocol({ paused: true });
    await expectCode(
      t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000")),
      MarketErrorCode.PAUSED,
    );
  });

  it("requires collateral for the larger of live and pending positions", async () => {
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));

    // 5 × 123 × 0.3 = 184.5
    await expectCode(
      t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("150")),
      MarketErrorCode.INSUFFICIENT_COLLATERAL,
    );
    const user = await t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("184.5"));
    expect(user.collateral.toString()).toBe("184.5");
  });

  it("enforces the minimum collateral", async () => {
    t.oracle.publish("123", START_TIME);
    await expectCode(
      t.market.update("user", "user", ZERO, ZERO, ZERO, f6("50")),
      MarketErrorCode.INSUFFICIENT_COLLATERAL,
    );
    await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("500"));
    await expectCode(
      t.market.update("user", "user", ZERO, ZERO, ZERO, f6("-450")),
      MarketErrorCode.INSUFFICIENT_COLLATERAL,
    );
    await expectCode(
      t.market.update("user", "user", ZERO, ZERO, ZERO, f6("-501")),
      MarketErrorCode.INSUFFICIENT_COLLATERAL,
    );
    const emptied = await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("-500"));
    expect(emptied.collateral.isZero()).toBe(true);
    expect(await balance(t, "user")).toBe("20000");
  });

  it("lets others deposit but not trade on an account", async () => {
    await openBook(t);
    await expectCode(
      t.market.update("friend", "user", ZERO, u6("1"), ZERO, f6("0")),
      MarketErrorCode.UNAUTHORIZED,
    );
    await expectCode(
      t.market.update("friend", "user", ZERO, u6("5"), ZERO, f6("-10")),
      MarketErrorCode.UNAUTHORIZED,
    );

    const user = await t.market.update("friend", "user", ZERO, u6("5"), ZERO, f6("500"));
    expect(user.collateral.toString()).toBe("10500");
    expect(await balance(t, "friend")).toBe("500");
  });

  it("leaves no trace when the ledger transfer fails", async () => {
    t.oracle.publish("123", START_TIME);
    await expectCode(
      t.market.update("broke", "broke", u6("1"), ZERO, ZERO, f6("500")),
      MarketErrorCode.INSUFFICIENT_BALANCE,
    );
    expect(t.market.account("broke")).toBe(EMPTY_ACCOUNT);
    expect(t.market.global().pendingOrder.maker.isZero()).toBe(true);
    expect(eventNames(t)).not.toContain("market.updated");
  });

  it("runs concurrent calls one at a time", async () => {
    t.oracle.publish("123", START_TIME);
    const [maker, user] = await Promise.all([
      t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000")),
      t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("10000")),
    ]);
    expect(maker.pendingOrder.maker.toString()).toBe("10");
    expect(user.pendingOrder.long.toString()).toBe("5");
    expect(t.market.global().pendingOrder.maker.toString()).toBe("10");
    expect(t.market.global().pendingOrder.long.toString()).toBe("5");
  });

  it("emits an updated event with the request", async () => {
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
    const updated = t.events.find((e) => e.event === "market.updated");
    expect(updated?.data).toEqual({
      sender: "maker",
      account: "maker",
      version: 1,
      maker: "10",
      long: "0",
      short: "0",
      collateral: "10000",
      fee: "0",
    });
  });
});

describe("closed market", () => {
  it("freezes value accrual and new risk but allows closing", async () => {
    const t = await createTestMarket({ balances: { maker: "20000", user: "20000" } });
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    await t.market.settle();
    const before = t.market.version(2);

    t.params.updateMarket({ closed: true });
    t.oracle.publish("200", START_TIME + 2 * HOUR);
    await t.market.settle();

    expect(t.market.global().closed).toBe(true);
    expect(t.events).toContainEqual({ event: "market.closedUpdated", data: { closed: true, version: 3 } });
    expect(t.market.version(3)?.makerValue.eq(before?.makerValue ?? u6("1"))).toBe(true);
    expect(t.market.version(3)?.longValue.eq(before?.longValue ?? u6("1"))).toBe(true);

    await expectCode(
      t.market.update("user", "user", ZERO, u6("6"), ZERO, f6("0")),
      MarketErrorCode.CLOSED,
    );
    const user = await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("0"));
    expect(user.pendingOrder.long.isZero()).toBe(true);
  });
});

describe("liquidation", () => {
  let t: TestMarket;

  beforeEach(async () => {
    t = await createTestMarket({ balances: { maker: "20000", user: "20000" } });
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
    await t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("200"));
    t.oracle.publish("123", START_TIME);
    await t.market.settle();
  });

  it("flags an account once price moves it under maintenance", async () => {
    t.oracle.publish("80", START_TIME);
    const user = await t.market.settleAccount("user");

    // 200 − 5 × 43
    expect(user.collateral.toString()).toBe("-15");
    expect(user.liquidation).toBe(true);
    await expectCode(
      t.market.update("user", "user", ZERO, ZERO, ZERO, f6("0")),
      MarketErrorCode.IN_LIQUIDATION,
    );
  });

  it("pays the liquidator and records the shortfall", async () => {
    t.oracle.publish("80", START_TIME);
    const user = await t.market.liquidate("keeper", "user");

    // maintenance 5 × 80 × 0.3 = 120, fee 10% of that
    expect(user.collateral.toString()).toBe("-27");
    expect(user.pendingOrder.long.isZero()).toBe(true);
    expect(user.liquidation).toBe(true);
    expect(await balance(t, "keeper")).toBe("12");
    expect(t.events).toContainEqual({
      event: "market.liquidation",
      data: { account: "user", liquidator: "keeper", fee: "12", version: 3 },
    });
    expect(t.events).toContainEqual({
      event: "market.shortfall",
      data: { account: "user", shortfall: "27", version: 3 },
    });

    await expectCode(t.market.liquidate("keeper", "user"), MarketErrorCode.IN_LIQUIDATION);
  });

  it("clears the flag once the close is live and stays solvent", async () => {
    t.oracle.publish("80", START_TIME);
    await t.market.liquidate("keeper", "user");
    t.oracle.publish("80", START_TIME);

    const user = await t.market.settleAccount("user");
    const maker = await t.market.settleAccount("maker");

    expect(user.position.long.isZero()).toBe(true);
    expect(user.liquidation).toBe(false);
    expect(user.collateral.toString()).toBe("-27");
    expect(maker.collateral.toString()).toBe("10215");
    expect((await t.market.solvency()).surplus.isZero()).toBe(true);
  });

  it("refuses to liquidate a healthy account", async () => {
    await expectCode(t.market.liquidate("keeper", "user"), MarketErrorCode.UNAUTHORIZED);
  });
});

describe("claims", () => {
  it("pays fees to each treasury once", async () => {
    const t = await createTestMarket({ balances: { maker: "20000", user: "20000" } });
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    t.oracle.publish("123", START_TIME + 2 * HOUR);
    await t.market.settle();

    const protocol = await t.market.claimFee("protocol-treasury");
    expect(protocol.toString()).toBe("0.000351");
    expect(await balance(t, "protocol-treasury")).toBe("0.000351");
    expect(t.market.global().fee.protocol.isZero()).toBe(true);
    expect(t.market.global().fee.market.toString()).toBe("0.000351");

    expect((await t.market.claimFee("market-treasury")).toString()).toBe("0.000351");
    expect((await t.market.claimFee("protocol-treasury")).isZero()).toBe(true);
    await expectCode(t.market.claimFee("user"), MarketErrorCode.UNAUTHORIZED);
  });

  it("refuses to pay out while paused", async () => {
    const t = await createTestMarket({
      market: { makerRewardRate: "0.01" },
      balances: { maker: "20000", user: "20000" },
    });
    t.rewardLedger.mint(MARKET_ADDRESS, UFixed18.from("1000"));
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    t.oracle.publish("123", START_TIME + 2 * HOUR);
    await t.market.settle();

    t.params.updateProtocol({ paused: true });
    await expectCode(t.market.claimFee("protocol-treasury"), MarketErrorCode.PAUSED);
    await expectCode(t.market.claimReward("maker"), MarketErrorCode.PAUSED);

    expect(await balance(t, "protocol-treasury")).toBe("0");
    expect(t.market.global().fee.protocol.toString()).toBe("0.000351");
    expect((await t.rewardLedger.balanceOf("maker")).isZero()).toBe(true);
  });

  it("pays settled rewards in the reward token", async () => {
    const t = await createTestMarket({
      market: { makerRewardRate: "0.01" },
      balances: { maker: "20000" },
    });
    t.rewardLedger.mint(MARKET_ADDRESS, UFixed18.from("1000"));
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
    t.oracle.publish("123", START_TIME + HOUR);
    t.oracle.publish("123", START_TIME + 2 * HOUR);

    // 0.01 per second for an hour, all to the only maker
    const claimed = await t.market.claimReward("maker");
    expect(claimed.toString()).toBe("36");
    expect((await t.rewardLedger.balanceOf("maker")).toString()).toBe("36");
    expect(t.market.account("maker").reward.isZero()).toBe(true);
    expect(t.events.at(-1)).toEqual({ event: "market.rewardClaimed", data: { account: "maker", amount: "36" } });
  });
});

describe("persistence", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "perp-market-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("reloads committed state from the store", async () => {
    const store = new MarketStore(tmpDir);
    const t = await createTestMarket({ store, balances: { maker: "20000", user: "20000" } });
    await openBook(t);
    t.oracle.publish("123", START_TIME + HOUR);
    await t.market.settle();

    const reloaded = await store.load();
    expect(reloaded.global.latestVersion).toBe(2);
    expect(reloaded.global.position.long.toString()).toBe("5");
    expect(reloaded.accounts.get("user")?.collateral.toString()).toBe("10000");
    expect([...reloaded.versions.keys()]).toEqual([1, 2]);
    expect(UFixed6.ZERO.eq(reloaded.global.fee.protocol)).toBe(true);
  });

  it("moves no tokens when the new state cannot be saved", async () => {
    const store = new MarketStore(tmpDir);
    const t = await createTestMarket({ store, balances: { user: "1000" } });
    t.oracle.publish("123", START_TIME);
    await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("500"));

    vi.spyOn(store, "save").mockRejectedValueOnce(new Error("disk full"));
    await expect(t.market.update("user", "user", ZERO, ZERO, ZERO, f6("-500"))).rejects.toThrow("disk full");
    expect(await balance(t, "user")).toBe("500");
    expect(await balance(t, MARKET_ADDRESS)).toBe("500");
    expect(t.market.account("user").collateral.toString()).toBe("500");

    await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("-500"));
    expect(await balance(t, "user")).toBe("1000");
    expect(t.market.account("user").collateral.isZero()).toBe(true);
  });

  it("restores the stored state when a transfer fails", async () => {
    const store = new MarketStore(tmpDir);
    const t = await createTestMarket({ store, balances: { user: "1000" } });
    t.oracle.publish("123", START_TIME);
    await t.market.update("user", "user", ZERO, ZERO, ZERO, f6("500"));

    await expectCode(
      t.market.update("broke", "broke", ZERO, ZERO, ZERO, f6("500")),
      MarketErrorCode.INSUFFICIENT_BALANCE,
    );
    const reloaded = await store.load();
    expect(reloaded.accounts.has("broke")).toBe(false);
    expect(reloaded.accounts.get("user")?.collateral.toString()).toBe("500");
  });
});
