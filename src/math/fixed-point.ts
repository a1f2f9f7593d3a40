/**
 * Deterministic decimal fixed point over bigint.
 *
 * Two precisions coexist: 6 decimals for collateral, positions and per-unit
 * values, 18 decimals for rate math and token amounts. Every result is
 * range-checked against the 256-bit word the values are modelled on, and
 * division truncates toward zero.
 */
import { MarketError, MarketErrorCode } from "../errors.js";

const UINT256_MAX = (1n << 256n) - 1n;
const INT256_MAX = (1n << 255n) - 1n;
const INT256_MIN = -(1n << 255n);

const BASE_6 = 10n ** 6n;
const BASE_18 = 10n ** 18n;

type Decimals = 6 | 18;

function baseOf(decimals: Decimals): bigint {
  return decimals === 6 ? BASE_6 : BASE_18;
}

function checkUnsigned(value: bigint): bigint {
  if (value < 0n) {
    throw new MarketError(MarketErrorCode.UNDERFLOW, `Unsigned fixed point underflow: ${value}`);
  }
  if (value > UINT256_MAX) {
    throw new MarketError(MarketErrorCode.OVERFLOW, `Unsigned fixed point overflow: ${value}`);
  }
  return value;
}

function checkSigned(value: bigint): bigint {
  if (value < INT256_MIN) {
    throw new MarketError(MarketErrorCode.UNDERFLOW, `Signed fixed point underflow: ${value}`);
  }
  if (value > INT256_MAX) {
    throw new MarketError(MarketErrorCode.OVERFLOW, `Signed fixed point overflow: ${value}`);
  }
  return value;
}

function divide(numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new MarketError(MarketErrorCode.DIVISION_BY_ZERO, "Fixed point division by zero");
  }
  return numerator / denominator;
}

/** Parse "123" or "-0.5" style input into a raw scaled integer, truncating extra digits. */
export function parseDecimal(input: string | number, decimals: Decimals): bigint {
  const text = typeof input === "number" ? numberToPlain(input) : input.trim();
  const match = /^([+-])?(\d+)(?:\.(\d*))?$/.exec(text);
  if (!match) {
    throw new MarketError(MarketErrorCode.INVALID_PARAMETER, `Not a decimal number: "${text}"`);
  }
  const [, sign, whole, fraction = ""] = match;
  const padded = fraction.slice(0, decimals).padEnd(decimals, "0");
  const raw = BigInt(whole) * baseOf(decimals) + BigInt(padded === "" ? "0" : padded);
  return sign === "-" ? -raw : raw;
}

function numberToPlain(value: number): string {
  if (!Number.isFinite(value)) {
    throw new MarketError(MarketErrorCode.INVALID_PARAMETER, `Not a finite number: ${value}`);
  }
  const text = String(value);
  // small magnitudes stringify as "1e-7"
  return /e/i.test(text) ? value.toFixed(18) : text;
}

export function formatDecimal(raw: bigint, decimals: Decimals): string {
  const negative = raw < 0n;
  const magnitude = negative ? -raw : raw;
  const base = baseOf(decimals);
  const whole = magnitude / base;
  const fraction = (magnitude % base).toString().padStart(decimals, "0").replace(/0+$/, "");
  const body = fraction.length > 0 ? `${whole}.${fraction}` : `${whole}`;
  return negative ? `-${body}` : body;
}

/** Any fixed point value of the given precision, signed or not. */
export interface FixedValue<D extends Decimals> {
  readonly value: bigint;
  readonly decimals: D;
}

abstract class FixedPoint<T extends FixedPoint<T, D>, D extends Decimals> implements FixedValue<D> {
  abstract readonly decimals: D;
  readonly value: bigint;

  protected constructor(value: bigint) {
    this.value = value;
  }

  protected abstract create(value: bigint): T;

  protected get base(): bigint {
    return baseOf(this.decimals);
  }

  add(other: FixedValue<D>): T {
    return this.create(this.value + other.value);
  }

  sub(other: FixedValue<D>): T {
    return this.create(this.value - other.value);
  }

  mul(other: FixedValue<D>): T {
    return this.create((this.value * other.value) / this.base);
  }

  div(other: FixedValue<D>): T {
    return this.create(divide(this.value * this.base, other.value));
  }

  /** `this × numerator / denominator` with a single truncation. */
  muldiv(numerator: FixedValue<D>, denominator: FixedValue<D>): T {
    return this.create(divide(this.value * numerator.value, denominator.value));
  }

  /** Scale by a plain integer such as a number of seconds. */
  mulInt(factor: number | bigint): T {
    return this.create(this.value * BigInt(factor));
  }

  divInt(divisor: number | bigint): T {
    return this.create(divide(this.value, BigInt(divisor)));
  }

  isZero(): boolean {
    return this.value === 0n;
  }

  eq(other: FixedValue<D>): boolean {
    return this.value === other.value;
  }

  gt(other: FixedValue<D>): boolean {
    return this.value > other.value;
  }

  gte(other: FixedValue<D>): boolean {
    return this.value >= other.value;
  }

  lt(other: FixedValue<D>): boolean {
    return this.value < other.value;
  }

  lte(other: FixedValue<D>): boolean {
    return this.value <= other.value;
  }

  min(other: T): T {
    return this.value <= other.value ? this.create(this.value) : other;
  }

  max(other: T): T {
    return this.value >= other.value ? this.create(this.value) : other;
  }

  toString(): string {
    return formatDecimal(this.value, this.decimals);
  }

  toJSON(): string {
    return this.value.toString();
  }
}

export class UFixed6 extends FixedPoint<UFixed6, 6> {
  readonly decimals = 6 as const;

  static readonly ZERO = new UFixed6(0n);
  static readonly ONE = new UFixed6(BASE_6);

  private constructor(value: bigint) {
    super(checkUnsigned(value));
  }

  static fromRaw(raw: bigint | string): UFixed6 {
    return new UFixed6(BigInt(raw));
  }

  static from(value: string | number): UFixed6 {
    return new UFixed6(parseDecimal(value, 6));
  }

  protected create(value: bigint): UFixed6 {
    return new UFixed6(value);
  }

  toSigned(): Fixed6 {
    return Fixed6.fromRaw(this.value);
  }

  toUFixed18(): UFixed18 {
    return UFixed18.fromRaw(this.value * 10n ** 12n);
  }
}

export class Fixed6 extends FixedPoint<Fixed6, 6> {
  readonly decimals = 6 as const;

  static readonly ZERO = new Fixed6(0n);
  static readonly ONE = new Fixed6(BASE_6);

  private constructor(value: bigint) {
    super(checkSigned(value));
  }

  static fromRaw(raw: bigint | string): Fixed6 {
    return new Fixed6(BigInt(raw));
  }

  static from(value: string | number): Fixed6 {
    return new Fixed6(parseDecimal(value, 6));
  }

  protected create(value: bigint): Fixed6 {
    return new Fixed6(value);
  }

  neg(): Fixed6 {
    return new Fixed6(-this.value);
  }

  abs(): UFixed6 {
    return UFixed6.fromRaw(this.value < 0n ? -this.value : this.value);
  }

  sign(): -1 | 0 | 1 {
    return this.value > 0n ? 1 : this.value < 0n ? -1 : 0;
  }

  /** Fails with UNDERFLOW when negative. */
  toUnsigned(): UFixed6 {
    return UFixed6.fromRaw(this.value);
  }

  toFixed18(): Fixed18 {
    return Fixed18.fromRaw(this.value * 10n ** 12n);
  }
}

export class UFixed18 extends FixedPoint<UFixed18, 18> {
  readonly decimals = 18 as const;

  static readonly ZERO = new UFixed18(0n);
  static readonly ONE = new UFixed18(BASE_18);

  private constructor(value: bigint) {
    super(checkUnsigned(value));
  }

  static fromRaw(raw: bigint | string): UFixed18 {
    return new UFixed18(BigInt(raw));
  }

  static from(value: string | number): UFixed18 {
    return new UFixed18(parseDecimal(value, 18));
  }

  protected create(value: bigint): UFixed18 {
    return new UFixed18(value);
  }

  /** Truncates the 12 low digits. */
  toUFixed6(): UFixed6 {
    return UFixed6.fromRaw(this.value / 10n ** 12n);
  }
}

export class Fixed18 extends FixedPoint<Fixed18, 18> {
  readonly decimals = 18 as const;

  static readonly ZERO = new Fixed18(0n);
  static readonly ONE = new Fixed18(BASE_18);

  private constructor(value: bigint) {
    super(checkSigned(value));
  }

  static fromRaw(raw: bigint | string): Fixed18 {
    return new Fixed18(BigInt(raw));
  }

  static from(value: string | number): Fixed18 {
    return new Fixed18(parseDecimal(value, 18));
  }

  protected create(value: bigint): Fixed18 {
    return new Fixed18(value);
  }

  neg(): Fixed18 {
    return new Fixed18(-this.value);
  }

  /** Truncates toward zero. */
  toFixed6(): Fixed6 {
    return Fixed6.fromRaw(this.value / 10n ** 12n);
  }
}
