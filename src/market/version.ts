/**
 * Version accumulator: cumulative per-unit value and reward for each side,
 * keyed by oracle version. An account catches up across any number of
 * versions by differencing two entries.
 */
import { MarketError, MarketErrorCode } from "../errors.js";
import { Fixed6, UFixed6 } from "../math/fixed-point.js";
import type { OracleVersion } from "../oracle/oracle-provider.js";
import type { MarketParameter, ProtocolParameter } from "./market-parameter.js";
import { minor, net, socializedNet, utilization, type Position } from "./position.js";
import { computeRate } from "./utilization-curve.js";

export const SECONDS_PER_YEAR = 365 * 24 * 60 * 60;

export interface Version {
  readonly makerValue: Fixed6;
  readonly longValue: Fixed6;
  readonly shortValue: Fixed6;
  readonly makerReward: UFixed6;
  readonly longReward: UFixed6;
  readonly shortReward: UFixed6;
}

export const EMPTY_VERSION: Version = {
  makerValue: Fixed6.ZERO,
  longValue: Fixed6.ZERO,
  shortValue: Fixed6.ZERO,
  makerReward: UFixed6.ZERO,
  longReward: UFixed6.ZERO,
  shortReward: UFixed6.ZERO,
};

export interface Fee {
  readonly protocol: UFixed6;
  readonly market: UFixed6;
}

export const NO_FEE: Fee = { protocol: UFixed6.ZERO, market: UFixed6.ZERO };

export function splitFee(amount: UFixed6, protocolShare: UFixed6): Fee {
  const protocol = amount.mul(protocolShare);
  return { protocol, market: amount.sub(protocol) };
}

export function addFee(a: Fee, b: Fee): Fee {
  return { protocol: a.protocol.add(b.protocol), market: a.market.add(b.market) };
}

export interface Transition {
  from: OracleVersion;
  to: OracleVersion;
  /** Position live during the interval. */
  position: Position;
  /** Position fees collected at `from`, distributed over this transition. */
  positionFee: UFixed6;
  closed: boolean;
  marketParameter: MarketParameter;
  protocolParameter: ProtocolParameter;
}

export interface Accumulation {
  version: Version;
  fee: Fee;
  /** Funding paid by the paying side before fee withholding, signed toward makers. */
  funding: Fixed6;
}

/** Total amounts per side for one transition, before conversion to per-unit values. */
interface SideAmounts {
  maker: Fixed6;
  long: Fixed6;
  short: Fixed6;
}

const NO_AMOUNTS: SideAmounts = { maker: Fixed6.ZERO, long: Fixed6.ZERO, short: Fixed6.ZERO };

function perUnit(amount: Fixed6, size: UFixed6): Fixed6 {
  return size.isZero() ? Fixed6.ZERO : amount.div(size);
}

/** Amount credited to the major taker side; funding flows between it and makers. */
function creditMajor(position: Position, amount: Fixed6): SideAmounts {
  const isLong = net(position).sign() >= 0;
  return {
    maker: Fixed6.ZERO,
    long: isLong ? amount : Fixed6.ZERO,
    short: isLong ? Fixed6.ZERO : amount,
  };
}

function accumulateFunding(
  t: Transition,
  elapsed: number,
): { values: Version; fee: UFixed6; funding: Fixed6 } {
  const { position, marketParameter, protocolParameter } = t;
  const backed = socializedNet(position);
  if (elapsed === 0 || backed.isZero()) {
    return { values: EMPTY_VERSION, fee: UFixed6.ZERO, funding: Fixed6.ZERO };
  }

  const rate = computeRate(marketParameter.utilizationCurve, utilization(position));
  const periodRate = rate.toFixed18().mulInt(elapsed).divInt(SECONDS_PER_YEAR);
  const notional = backed.mul(t.from.price.abs());
  const funding = periodRate.mul(notional.toUFixed18()).toFixed6();

  const feeShare = marketParameter.fundingFee.max(protocolParameter.minFundingFee);
  const fee = funding.abs().mul(feeShare);
  const received = funding.abs().sub(fee).toSigned();

  // positive funding: the major side pays makers; negative: makers pay the major side
  const amounts: SideAmounts =
    funding.sign() >= 0
      ? { ...creditMajor(position, funding.neg()), maker: received }
      : { ...creditMajor(position, received), maker: funding };

  return { values: toPerUnit(position, amounts), fee, funding };
}

function accumulatePnl(t: Transition): Version {
  const { position } = t;
  const delta = t.to.price.sub(t.from.price);
  if (delta.isZero()) {
    return EMPTY_VERSION;
  }

  const backedMajor = minor(position).add(socializedNet(position));
  const longIsMajor = position.long.gte(position.short);
  const longExposure = longIsMajor ? backedMajor : position.long;
  const shortExposure = longIsMajor ? position.short : backedMajor;

  const long = longExposure.toSigned().mul(delta);
  const short = shortExposure.toSigned().mul(delta).neg();
  const maker = long.add(short).neg();

  return toPerUnit(position, { maker, long, short });
}

function toPerUnit(position: Position, amounts: SideAmounts): Version {
  return {
    ...EMPTY_VERSION,
    makerValue: perUnit(amounts.maker, position.maker),
    longValue: perUnit(amounts.long, position.long),
    shortValue: perUnit(amounts.short, position.short),
  };
}

function accumulateReward(t: Transition, elapsed: number): Version {
  const { position, marketParameter } = t;
  const reward = (rate: UFixed6, size: UFixed6): UFixed6 =>
    size.isZero() ? UFixed6.ZERO : rate.mulInt(elapsed).div(size);
  return {
    ...EMPTY_VERSION,
    makerReward: reward(marketParameter.makerRewardRate, position.maker),
    longReward: reward(marketParameter.longRewardRate, position.long),
    shortReward: reward(marketParameter.shortRewardRate, position.short),
  };
}

function accumulatePositionFee(t: Transition): { values: Version; fee: UFixed6 } {
  if (t.positionFee.isZero()) {
    return { values: EMPTY_VERSION, fee: UFixed6.ZERO };
  }
  if (t.position.maker.isZero()) {
    return { values: EMPTY_VERSION, fee: t.positionFee };
  }
  const fee = t.positionFee.mul(t.marketParameter.positionFee);
  const makers = t.positionFee.sub(fee).toSigned();
  return { values: toPerUnit(t.position, { ...NO_AMOUNTS, maker: makers }), fee };
}

function addVersion(a: Version, b: Version): Version {
  return {
    makerValue: a.makerValue.add(b.makerValue),
    longValue: a.longValue.add(b.longValue),
    shortValue: a.shortValue.add(b.shortValue),
    makerReward: a.makerReward.add(b.makerReward),
    longReward: a.longReward.add(b.longReward),
    shortReward: a.shortReward.add(b.shortReward),
  };
}

/**
 * Accrue one transition `from → to` onto the cumulative entry at `from`.
 * Returns the entry to store at `to` and the fee withheld along the way.
 */
export function accumulate(previous: Version, t: Transition): Accumulation {
  if (t.from.version === t.to.version || t.from.version === 0) {
    return { version: previous, fee: NO_FEE, funding: Fixed6.ZERO };
  }

  const elapsed = t.to.timestamp - t.from.timestamp;
  if (elapsed < 0) {
    throw new MarketError(
      MarketErrorCode.INVALID_ORACLE_VERSION,
      `Oracle version ${t.to.version} is older than version ${t.from.version}`,
    );
  }
  const positionFee = accumulatePositionFee(t);
  let version = addVersion(previous, positionFee.values);
  let fee = positionFee.fee;
  let funding = Fixed6.ZERO;

  if (!t.closed) {
    const fundingResult = accumulateFunding(t, elapsed);
    version = addVersion(addVersion(version, fundingResult.values), accumulatePnl(t));
    fee = fee.add(fundingResult.fee);
    funding = fundingResult.funding;
  }

  version = addVersion(version, accumulateReward(t, elapsed));

  return { version, fee: splitFee(fee, t.protocolParameter.protocolFee), funding };
}

/** Value accrued by `position` between two cumulative entries. */
export function valueBetween(from: Version, to: Version, position: Position): Fixed6 {
  return to.makerValue
    .sub(from.makerValue)
    .mul(position.maker)
    .add(to.longValue.sub(from.longValue).mul(position.long))
    .add(to.shortValue.sub(from.shortValue).mul(position.short));
}

export function rewardBetween(from: Version, to: Version, position: Position): UFixed6 {
  return to.makerReward
    .sub(from.makerReward)
    .mul(position.maker)
    .add(to.longReward.sub(from.longReward).mul(position.long))
    .add(to.shortReward.sub(from.shortReward).mul(position.short));
}
