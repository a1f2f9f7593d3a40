import { isMarketError } from "../errors.js";
import { logger } from "../logging/logger.js";
import { isEmpty } from "./position.js";
import type { BroadcastFn, Market } from "./market-engine.js";

export interface KeeperSweep {
  checked: number;
  liquidated: string[];
  failed: string[];
}

/**
 * Settle every known account and liquidate the flagged ones whose close is
 * not already pending. Called on an interval by the service host.
 *
 * Failures are per account: one bad account does not stop the sweep.
 */
export async function checkLiquidations(
  market: Market,
  keeper: string,
  broadcast?: BroadcastFn,
): Promise<KeeperSweep> {
  const sweep: KeeperSweep = { checked: 0, liquidated: [], failed: [] };

  for (const id of market.accounts()) {
    if (id === keeper) {
      continue;
    }
    sweep.checked += 1;
    try {
      const account = await market.settleAccount(id);
      if (!account.liquidation || isEmpty(account.pendingOrder)) {
        continue;
      }
      await market.liquidate(keeper, id);
      sweep.liquidated.push(id);
    } catch (err) {
      sweep.failed.push(id);
      if (isMarketError(err)) {
        logger.warn("liquidation-keeper", `Skipped ${id}: ${err.code}`, { message: err.message });
      } else {
        logger.error("liquidation-keeper", `Failed to process ${id}`, err);
      }
    }
  }

  if (sweep.liquidated.length > 0 || sweep.failed.length > 0) {
    broadcast?.("market.keeperSwept", {
      checked: sweep.checked,
      liquidated: sweep.liquidated,
      failed: sweep.failed,
      sweptAt: new Date().toISOString(),
    });
  }
  return sweep;
}
