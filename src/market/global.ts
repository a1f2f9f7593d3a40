import { UFixed6 } from "../math/fixed-point.js";
import type { OracleVersion } from "../oracle/oracle-provider.js";
import type { MarketParameter, ProtocolParameter } from "./market-parameter.js";
import { EMPTY_POSITION, emptyPendingOrder, toPosition, type PendingOrder, type Position } from "./position.js";
import { accumulate, addFee, NO_FEE, type Accumulation, type Fee, type Version } from "./version.js";

/** Aggregate market state. */
export interface Global {
  readonly position: Position;
  readonly pendingOrder: PendingOrder;
  readonly latestVersion: number;
  readonly fee: Fee;
  /** Position fees collected at `latestVersion`, distributed on the next transition. */
  readonly pendingPositionFee: UFixed6;
  readonly closed: boolean;
}

export const EMPTY_GLOBAL: Global = {
  position: EMPTY_POSITION,
  pendingOrder: emptyPendingOrder(),
  latestVersion: 0,
  fee: NO_FEE,
  pendingPositionFee: UFixed6.ZERO,
  closed: false,
};

export interface Advance {
  global: Global;
  /** Cumulative entry to store at `to.version`. */
  version: Version;
  accumulation: Accumulation;
}

/**
 * Move the market from `from` (its latest version) to `to`.
 * Accrual uses the position live during the interval; the pending order is
 * folded afterwards so it starts accruing from `to` onward.
 */
export function advance(
  global: Global,
  previous: Version,
  from: OracleVersion,
  to: OracleVersion,
  marketParameter: MarketParameter,
  protocolParameter: ProtocolParameter,
): Advance {
  const accumulation = accumulate(previous, {
    from,
    to,
    position: global.position,
    positionFee: global.pendingPositionFee,
    closed: global.closed,
    marketParameter,
    protocolParameter,
  });

  const position =
    global.pendingOrder.version < to.version ? toPosition(global.pendingOrder) : global.position;

  return {
    global: {
      ...global,
      position,
      latestVersion: to.version,
      fee: addFee(global.fee, accumulation.fee),
      pendingPositionFee: UFixed6.ZERO,
    },
    version: accumulation.version,
    accumulation,
  };
}
