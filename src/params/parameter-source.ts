import {
  parseMarketParameter,
  parseProtocolParameter,
  type MarketParameter,
  type MarketParameterInput,
  type ProtocolParameter,
  type ProtocolParameterInput,
} from "../market/market-parameter.js";

/** Supplies the parameters in effect; the market snapshots them once per call. */
export interface ParameterSource {
  marketParameter(): Promise<MarketParameter>;
  protocolParameter(): Promise<ProtocolParameter>;
}

/** Parameters held in memory and replaced by the operator. */
export class StaticParameterSource implements ParameterSource {
  private market: MarketParameter;
  private protocol: ProtocolParameter;

  constructor(market: MarketParameterInput, protocol: ProtocolParameterInput) {
    this.market = parseMarketParameter(market);
    this.protocol = parseProtocolParameter(protocol);
  }

  async marketParameter(): Promise<MarketParameter> {
    return this.market;
  }

  async protocolParameter(): Promise<ProtocolParameter> {
    return this.protocol;
  }

  /** Validates and merges a partial update. Throws INVALID_PARAMETER and keeps the old values on failure. */
  updateMarket(patch: Partial<MarketParameterInput>): void {
    this.market = parseMarketParameter({ ...toMarketInput(this.market), ...patch });
  }

  updateProtocol(patch: Partial<ProtocolParameterInput>): void {
    this.protocol = parseProtocolParameter({ ...toProtocolInput(this.protocol), ...patch });
  }
}

export function toMarketInput(p: MarketParameter): MarketParameterInput {
  return {
    maintenance: p.maintenance.toString(),
    fundingFee: p.fundingFee.toString(),
    makerFee: p.makerFee.toString(),
    takerFee: p.takerFee.toString(),
    positionFee: p.positionFee.toString(),
    makerLiquidity: p.makerLiquidity.toString(),
    makerLimit: p.makerLimit.toString(),
    closed: p.closed,
    utilizationCurve: {
      minRate: p.utilizationCurve.minRate.toString(),
      targetRate: p.utilizationCurve.targetRate.toString(),
      maxRate: p.utilizationCurve.maxRate.toString(),
      targetUtilization: p.utilizationCurve.targetUtilization.toString(),
    },
    makerRewardRate: p.makerRewardRate.toString(),
    longRewardRate: p.longRewardRate.toString(),
    shortRewardRate: p.shortRewardRate.toString(),
    treasury: p.treasury,
  };
}

export function toProtocolInput(p: ProtocolParameter): ProtocolParameterInput {
  return {
    protocolFee: p.protocolFee.toString(),
    minFundingFee: p.minFundingFee.toString(),
    liquidationFee: p.liquidationFee.toString(),
    minCollateral: p.minCollateral.toString(),
    paused: p.paused,
    treasury: p.treasury,
  };
}
