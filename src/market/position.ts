import { Fixed6, UFixed6 } from "../math/fixed-point.js";

export interface Position {
  readonly maker: UFixed6;
  readonly long: UFixed6;
  readonly short: UFixed6;
}

/** The position requested as of `version`; it becomes live at `version + 1`. */
export interface PendingOrder extends Position {
  readonly version: number;
}

export const EMPTY_POSITION: Position = {
  maker: UFixed6.ZERO,
  long: UFixed6.ZERO,
  short: UFixed6.ZERO,
};

export function emptyPendingOrder(version = 0): PendingOrder {
  return { version, ...EMPTY_POSITION };
}

export function toPosition(order: Position): Position {
  return { maker: order.maker, long: order.long, short: order.short };
}

export function isEmpty(position: Position): boolean {
  return position.maker.isZero() && position.long.isZero() && position.short.isZero();
}

export function positionEq(a: Position, b: Position): boolean {
  return a.maker.eq(b.maker) && a.long.eq(b.long) && a.short.eq(b.short);
}

/** Net taker exposure, long − short. */
export function net(position: Position): Fixed6 {
  return position.long.toSigned().sub(position.short);
}

export function major(position: Position): UFixed6 {
  return position.long.max(position.short);
}

export function minor(position: Position): UFixed6 {
  return position.long.min(position.short);
}

/** |net| / maker; zero without makers, may exceed one when over-utilized. */
export function utilization(position: Position): UFixed6 {
  if (position.maker.isZero()) {
    return UFixed6.ZERO;
  }
  return net(position).abs().div(position.maker);
}

/** min(1, (maker + minor) / major): the share of the major side's exposure that is backed. */
export function socializationFactor(position: Position): UFixed6 {
  const majorSize = major(position);
  if (majorSize.isZero()) {
    return UFixed6.ONE;
  }
  return UFixed6.ONE.min(position.maker.add(minor(position)).div(majorSize));
}

/** Net exposure makers actually back: min(|net|, maker). */
export function socializedNet(position: Position): UFixed6 {
  return net(position).abs().min(position.maker);
}

/** `base + (next − prev)` per side; fails with UNDERFLOW if any side would go negative. */
export function applyDelta(base: Position, prev: Position, next: Position): Position {
  return {
    maker: base.maker.add(next.maker).sub(prev.maker),
    long: base.long.add(next.long).sub(prev.long),
    short: base.short.add(next.short).sub(prev.short),
  };
}

/** True when any side of `next` is larger than in `prev`. */
export function increasesRisk(prev: Position, next: Position): boolean {
  return next.maker.gt(prev.maker) || next.long.gt(prev.long) || next.short.gt(prev.short);
}

export function increasesTaker(prev: Position, next: Position): boolean {
  return next.long.gt(prev.long) || next.short.gt(prev.short);
}

export function notional(position: Position, price: Fixed6): UFixed6 {
  return position.maker.add(position.long).add(position.short).mul(price.abs());
}

/** Maintenance requirement = notional × maintenance ratio. */
export function maintenance(position: Position, price: Fixed6, ratio: UFixed6): UFixed6 {
  return notional(position, price).mul(ratio);
}

/** Side-wise maximum, used to hold collateral against both the live and the requested position. */
export function maxPosition(a: Position, b: Position): Position {
  return { maker: a.maker.max(b.maker), long: a.long.max(b.long), short: a.short.max(b.short) };
}

/** Fee for moving from `prev` to `next`: |Δmaker| × price × makerFee + |Δtaker| × price × takerFee. */
export function positionFee(
  prev: Position,
  next: Position,
  price: Fixed6,
  makerFee: UFixed6,
  takerFee: UFixed6,
): UFixed6 {
  const absPrice = price.abs();
  const makerDelta = next.maker.toSigned().sub(prev.maker).abs();
  const takerDelta = next.long
    .toSigned()
    .sub(prev.long)
    .abs()
    .add(next.short.toSigned().sub(prev.short).abs());
  return makerDelta.mul(absPrice).mul(makerFee).add(takerDelta.mul(absPrice).mul(takerFee));
}
