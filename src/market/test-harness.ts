/**
 * In-process stand-ins shared by the market tests.
 */
import { MarketError, MarketErrorCode } from "../errors.js";
import { InMemoryTokenLedger } from "../ledger/token-ledger.js";
import { Fixed6, UFixed18, UFixed6 } from "../math/fixed-point.js";
import { GENESIS_VERSION, type OracleProvider, type OracleVersion } from "../oracle/oracle-provider.js";
import { StaticParameterSource } from "../params/parameter-source.js";
import { Market } from "./market-engine.js";
import type { MarketParameterInput, ProtocolParameterInput } from "./market-parameter.js";
import type { MarketStore } from "./market-store.js";

export const MARKET_ADDRESS = "market";
export const START_TIME = 1_700_000_000;
export const HOUR = 3600;

/** Oracle whose versions are published by hand. */
export class ManualOracle implements OracleProvider {
  private versions: OracleVersion[] = [];
  syncCalls = 0;

  publish(price: string, timestamp: number): OracleVersion {
    const next: OracleVersion = {
      version: this.versions.length + 1,
      timestamp,
      price: Fixed6.from(price),
    };
    this.versions.push(next);
    return next;
  }

  async currentVersion(): Promise<OracleVersion> {
    return this.versions.at(-1) ?? GENESIS_VERSION;
  }

  async atVersion(version: number): Promise<OracleVersion> {
    if (version === 0) return GENESIS_VERSION;
    const found = this.versions[version - 1];
    if (!found) {
      throw new MarketError(MarketErrorCode.INVALID_ORACLE_VERSION, `Version ${version} not published`);
    }
    return found;
  }

  async sync(): Promise<OracleVersion> {
    this.syncCalls += 1;
    return this.currentVersion();
  }
}

export const MARKET_PARAMS: MarketParameterInput = {
  maintenance: "0.3",
  fundingFee: "0.1",
  makerFee: "0",
  takerFee: "0",
  positionFee: "0",
  makerLiquidity: "0.2",
  makerLimit: "1000",
  closed: false,
  utilizationCurve: {
    minRate: "0.1",
    targetRate: "0.1",
    maxRate: "0.1",
    targetUtilization: "1",
  },
  makerRewardRate: "0",
  longRewardRate: "0",
  shortRewardRate: "0",
  treasury: "market-treasury",
};

export const PROTOCOL_PARAMS: ProtocolParameterInput = {
  protocolFee: "0.5",
  minFundingFee: "0",
  liquidationFee: "0.1",
  minCollateral: "100",
  paused: false,
  treasury: "protocol-treasury",
};

export interface TestMarket {
  market: Market;
  oracle: ManualOracle;
  params: StaticParameterSource;
  ledger: InMemoryTokenLedger;
  rewardLedger: InMemoryTokenLedger;
  events: Array<{ event: string; data: unknown }>;
}

export async function createTestMarket(
  options: {
    market?: Partial<MarketParameterInput>;
    protocol?: Partial<ProtocolParameterInput>;
    balances?: Record<string, string>;
    store?: MarketStore;
  } = {},
): Promise<TestMarket> {
  const oracle = new ManualOracle();
  const params = new StaticParameterSource(
    { ...MARKET_PARAMS, ...options.market },
    { ...PROTOCOL_PARAMS, ...options.protocol },
  );
  const ledger = new InMemoryTokenLedger();
  for (const [holder, amount] of Object.entries(options.balances ?? {})) {
    ledger.mint(holder, UFixed18.from(amount));
  }
  const rewardLedger = new InMemoryTokenLedger();
  const events: Array<{ event: string; data: unknown }> = [];
  const market = await Market.create({
    oracle,
    params,
    ledger,
    rewardLedger,
    address: MARKET_ADDRESS,
    store: options.store,
    broadcast: (event, data) => {
      events.push({ event, data });
    },
  });
  return { market, oracle, params, ledger, rewardLedger, events };
}

export function u6(value: string): UFixed6 {
  return UFixed6.from(value);
}

export function f6(value: string): Fixed6 {
  return Fixed6.from(value);
}
