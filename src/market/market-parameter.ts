import { Type, type Static, type TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MarketError, MarketErrorCode } from "../errors.js";
import { Fixed6, UFixed6 } from "../math/fixed-point.js";
import type { UtilizationCurve } from "./utilization-curve.js";

const SignedDecimal = Type.String({ pattern: "^-?\\d+(\\.\\d+)?$" });
const UnsignedDecimal = Type.String({ pattern: "^\\d+(\\.\\d+)?$" });

export const UtilizationCurveSchema = Type.Object({
  minRate: SignedDecimal,
  targetRate: SignedDecimal,
  maxRate: SignedDecimal,
  targetUtilization: UnsignedDecimal,
});

export const MarketParameterSchema = Type.Object({
  /** Maintenance collateral as a fraction of notional. */
  maintenance: UnsignedDecimal,
  /** Share of funding withheld as fee. */
  fundingFee: UnsignedDecimal,
  makerFee: UnsignedDecimal,
  takerFee: UnsignedDecimal,
  /** Share of position fees withheld as fee; the rest goes to makers. */
  positionFee: UnsignedDecimal,
  /** Tolerated shortfall of maker liquidity when takers open, as a fraction. */
  makerLiquidity: UnsignedDecimal,
  makerLimit: UnsignedDecimal,
  closed: Type.Boolean(),
  utilizationCurve: UtilizationCurveSchema,
  /** Reward emitted to each side per second. */
  makerRewardRate: UnsignedDecimal,
  longRewardRate: UnsignedDecimal,
  shortRewardRate: UnsignedDecimal,
  treasury: Type.String({ minLength: 1 }),
});

export const ProtocolParameterSchema = Type.Object({
  /** Share of every collected fee that goes to the protocol treasury. */
  protocolFee: UnsignedDecimal,
  /** Floor applied to each market's funding fee share. */
  minFundingFee: UnsignedDecimal,
  /** Liquidator reward as a fraction of the maintenance requirement. */
  liquidationFee: UnsignedDecimal,
  minCollateral: UnsignedDecimal,
  paused: Type.Boolean(),
  treasury: Type.String({ minLength: 1 }),
});

export type MarketParameterInput = Static<typeof MarketParameterSchema>;
export type ProtocolParameterInput = Static<typeof ProtocolParameterSchema>;

export interface MarketParameter {
  maintenance: UFixed6;
  fundingFee: UFixed6;
  makerFee: UFixed6;
  takerFee: UFixed6;
  positionFee: UFixed6;
  makerLiquidity: UFixed6;
  makerLimit: UFixed6;
  closed: boolean;
  utilizationCurve: UtilizationCurve;
  makerRewardRate: UFixed6;
  longRewardRate: UFixed6;
  shortRewardRate: UFixed6;
  treasury: string;
}

export interface ProtocolParameter {
  protocolFee: UFixed6;
  minFundingFee: UFixed6;
  liquidationFee: UFixed6;
  minCollateral: UFixed6;
  paused: boolean;
  treasury: string;
}

function assertSchema<T extends TSchema>(schema: T, input: unknown, label: string): Static<T> {
  if (Value.Check(schema, input)) {
    return input;
  }
  const problems = [...Value.Errors(schema, input)].map((e) => `${e.path || "/"} ${e.message}`);
  throw new MarketError(
    MarketErrorCode.INVALID_PARAMETER,
    `Invalid ${label}: ${problems.slice(0, 3).join("; ")}`,
    { problems },
  );
}

function assertRatio(value: UFixed6, name: string): UFixed6 {
  if (value.gt(UFixed6.ONE)) {
    throw new MarketError(MarketErrorCode.INVALID_PARAMETER, `${name} must be at most 1, got ${value}`);
  }
  return value;
}

export function parseMarketParameter(input: unknown): MarketParameter {
  const raw = assertSchema(MarketParameterSchema, input, "market parameter");
  return {
    maintenance: UFixed6.from(raw.maintenance),
    fundingFee: assertRatio(UFixed6.from(raw.fundingFee), "fundingFee"),
    makerFee: UFixed6.from(raw.makerFee),
    takerFee: UFixed6.from(raw.takerFee),
    positionFee: assertRatio(UFixed6.from(raw.positionFee), "positionFee"),
    makerLiquidity: assertRatio(UFixed6.from(raw.makerLiquidity), "makerLiquidity"),
    makerLimit: UFixed6.from(raw.makerLimit),
    closed: raw.closed,
    utilizationCurve: {
      minRate: Fixed6.from(raw.utilizationCurve.minRate),
      targetRate: Fixed6.from(raw.utilizationCurve.targetRate),
      maxRate: Fixed6.from(raw.utilizationCurve.maxRate),
      targetUtilization: UFixed6.from(raw.utilizationCurve.targetUtilization),
    },
    makerRewardRate: UFixed6.from(raw.makerRewardRate),
    longRewardRate: UFixed6.from(raw.longRewardRate),
    shortRewardRate: UFixed6.from(raw.shortRewardRate),
    treasury: raw.treasury,
  };
}

export function parseProtocolParameter(input: unknown): ProtocolParameter {
  const raw = assertSchema(ProtocolParameterSchema, input, "protocol parameter");
  return {
    protocolFee: assertRatio(UFixed6.from(raw.protocolFee), "protocolFee"),
    minFundingFee: assertRatio(UFixed6.from(raw.minFundingFee), "minFundingFee"),
    liquidationFee: assertRatio(UFixed6.from(raw.liquidationFee), "liquidationFee"),
    minCollateral: UFixed6.from(raw.minCollateral),
    paused: raw.paused,
    treasury: raw.treasury,
  };
}
