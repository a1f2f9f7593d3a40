import { describe, it, expect, vi, beforeEach } from "vitest";
import { checkLiquidations } from "./liquidation-keeper.js";
import { START_TIME, createTestMarket, f6, u6, type TestMarket } from "./test-harness.js";

const ZERO = u6("0");

describe("checkLiquidations", () => {
  let t: TestMarket;

  beforeEach(async () => {
    t = await createTestMarket({ balances: { maker: "20000", user: "20000" } });
    t.oracle.publish("123", START_TIME);
    await t.market.update("maker", "maker", u6("10"), ZERO, ZERO, f6("10000"));
    await t.market.update("user", "user", ZERO, u6("5"), ZERO, f6("200"));
    t.oracle.publish("123", START_TIME);
  });

  it("leaves healthy accounts alone", async () => {
    const broadcast = vi.fn();
    const sweep = await checkLiquidations(t.market, "keeper", broadcast);

    expect(sweep).toEqual({ checked: 2, liquidated: [], failed: [] });
    expect(broadcast).not.toHaveBeenCalled();
  });

  it("liquidates flagged accounts and reports the sweep", async () => {
    t.oracle.publish("80", START_TIME);
    const broadcast = vi.fn();
    const sweep = await checkLiquidations(t.market, "keeper", broadcast);

    expect(sweep.liquidated).toEqual(["user"]);
    expect(t.market.account("user").pendingOrder.long.isZero()).toBe(true);
    expect((await t.ledger.balanceOf("keeper")).toString()).toBe("12");
    expect(broadcast).toHaveBeenCalledWith(
      "market.keeperSwept",
      expect.objectContaining({ checked: 2, liquidated: ["user"], failed: [] }),
    );
  });

  it("does not liquidate twice while the close is pending", async () => {
    t.oracle.publish("80", START_TIME);
    await checkLiquidations(t.market, "keeper");
    const second = await checkLiquidations(t.market, "keeper");

    expect(second.liquidated).toEqual([]);
    expect((await t.ledger.balanceOf("keeper")).toString()).toBe("12");
  });

  it("records per-account failures and keeps sweeping", async () => {
    t.oracle.publish("80", START_TIME);
    t.params.updateProtocol({ paused: true });
    const sweep = await checkLiquidations(t.market, "keeper");

    expect(sweep.failed).toEqual(["user"]);
    expect(sweep.checked).toBe(2);
  });
});
