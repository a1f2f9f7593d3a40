import { Fixed6, UFixed6 } from "../math/fixed-point.js";
import {
  EMPTY_POSITION,
  emptyPendingOrder,
  isEmpty,
  maintenance,
  positionEq,
  toPosition,
  type PendingOrder,
  type Position,
} from "./position.js";
import { rewardBetween, valueBetween, type Version } from "./version.js";

/** A participant's local state in one market. */
export interface Account {
  /** Latest settled, value-accruing position. */
  readonly position: Position;
  readonly pendingOrder: PendingOrder;
  /** May be negative after a liquidation: the shortfall. */
  readonly collateral: Fixed6;
  readonly reward: UFixed6;
  readonly latestVersion: number;
  readonly liquidation: boolean;
}

export const EMPTY_ACCOUNT: Account = {
  position: EMPTY_POSITION,
  pendingOrder: emptyPendingOrder(),
  collateral: Fixed6.ZERO,
  reward: UFixed6.ZERO,
  latestVersion: 0,
  liquidation: false,
};

export type VersionLookup = (version: number) => Version;

function accrue(
  account: Account,
  position: Position,
  from: number,
  to: number,
  versionAt: VersionLookup,
): Account {
  if (from >= to || isEmpty(position)) {
    return account;
  }
  const start = versionAt(from);
  const end = versionAt(to);
  return {
    ...account,
    collateral: account.collateral.add(valueBetween(start, end, position)),
    reward: account.reward.add(rewardBetween(start, end, position)),
  };
}

/**
 * Catch an account up to `toVersion`. The position can change only once in
 * the range, when the pending order becomes live, so at most two intervals
 * are read from the accumulator.
 */
export function settleLocal(account: Account, toVersion: number, versionAt: VersionLookup): Account {
  if (toVersion <= account.latestVersion) {
    return account;
  }

  let next = account;
  let from = account.latestVersion;
  const pending = account.pendingOrder;
  const liveAt = pending.version + 1;

  if (liveAt <= toVersion && !positionEq(pending, account.position)) {
    if (liveAt > from) {
      next = accrue(next, next.position, from, liveAt, versionAt);
      from = liveAt;
    }
    next = { ...next, position: toPosition(pending) };
  }

  next = accrue(next, next.position, from, toVersion, versionAt);
  return { ...next, latestVersion: toVersion };
}

export function isUnderMaintenance(account: Account, price: Fixed6, ratio: UFixed6): boolean {
  return account.collateral.lt(maintenance(account.position, price, ratio));
}

/**
 * Advisory liquidation flag: set while the live position is under
 * maintenance, and kept while a liquidation close is waiting to become live.
 */
export function evaluateLiquidation(account: Account, price: Fixed6, ratio: UFixed6): boolean {
  if (isEmpty(account.position) && isEmpty(account.pendingOrder)) {
    return false;
  }
  const closing = account.liquidation && isEmpty(account.pendingOrder);
  return closing || isUnderMaintenance(account, price, ratio);
}
