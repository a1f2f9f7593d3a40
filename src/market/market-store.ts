import os from "node:os";
import path from "node:path";
import { Type, type Static } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { Fixed6, UFixed6 } from "../math/fixed-point.js";
import { readJsonFile, writeJsonAtomic } from "../storage/json-file.js";
import type { Account } from "./account.js";
import type { Global } from "./global.js";
import { emptyMarketState, type MarketState } from "./market-state.js";
import type { PendingOrder, Position } from "./position.js";
import type { Version } from "./version.js";

// Fixed point values are stored as raw scaled integers.
const Unsigned = Type.String({ pattern: "^\\d+$" });
const Signed = Type.String({ pattern: "^-?\\d+$" });
const VersionNumber = Type.Integer({ minimum: 0 });

const PositionSchema = Type.Object({ maker: Unsigned, long: Unsigned, short: Unsigned });
const PendingOrderSchema = Type.Object({
  version: VersionNumber,
  maker: Unsigned,
  long: Unsigned,
  short: Unsigned,
});

const GlobalSchema = Type.Object({
  position: PositionSchema,
  pendingOrder: PendingOrderSchema,
  latestVersion: VersionNumber,
  fee: Type.Object({ protocol: Unsigned, market: Unsigned }),
  pendingPositionFee: Unsigned,
  closed: Type.Boolean(),
});

const AccountSchema = Type.Object({
  id: Type.String({ minLength: 1 }),
  position: PositionSchema,
  pendingOrder: PendingOrderSchema,
  collateral: Signed,
  reward: Unsigned,
  latestVersion: VersionNumber,
  liquidation: Type.Boolean(),
});

const VersionSchema = Type.Object({
  version: VersionNumber,
  makerValue: Signed,
  longValue: Signed,
  shortValue: Signed,
  makerReward: Unsigned,
  longReward: Unsigned,
  shortReward: Unsigned,
});

export const StoredMarketStateSchema = Type.Object({
  global: GlobalSchema,
  accounts: Type.Array(AccountSchema),
  versions: Type.Array(VersionSchema),
});

export type StoredMarketState = Static<typeof StoredMarketStateSchema>;

type StoredPosition = Static<typeof PositionSchema>;
type StoredPendingOrder = Static<typeof PendingOrderSchema>;

function encodePosition(p: Position): StoredPosition {
  return { maker: p.maker.toJSON(), long: p.long.toJSON(), short: p.short.toJSON() };
}

function encodePending(p: PendingOrder): StoredPendingOrder {
  return { version: p.version, ...encodePosition(p) };
}

function decodePosition(p: StoredPosition): Position {
  return { maker: UFixed6.fromRaw(p.maker), long: UFixed6.fromRaw(p.long), short: UFixed6.fromRaw(p.short) };
}

function decodePending(p: StoredPendingOrder): PendingOrder {
  return { version: p.version, ...decodePosition(p) };
}

export function encodeState(state: MarketState): StoredMarketState {
  const g = state.global;
  return {
    global: {
      position: encodePosition(g.position),
      pendingOrder: encodePending(g.pendingOrder),
      latestVersion: g.latestVersion,
      fee: { protocol: g.fee.protocol.toJSON(), market: g.fee.market.toJSON() },
      pendingPositionFee: g.pendingPositionFee.toJSON(),
      closed: g.closed,
    },
    accounts: [...state.accounts].map(([id, a]) => ({
      id,
      position: encodePosition(a.position),
      pendingOrder: encodePending(a.pendingOrder),
      collateral: a.collateral.toJSON(),
      reward: a.reward.toJSON(),
      latestVersion: a.latestVersion,
      liquidation: a.liquidation,
    })),
    versions: [...state.versions]
      .sort(([a], [b]) => a - b)
      .map(([version, v]) => ({
        version,
        makerValue: v.makerValue.toJSON(),
        longValue: v.longValue.toJSON(),
        shortValue: v.shortValue.toJSON(),
        makerReward: v.makerReward.toJSON(),
        longReward: v.longReward.toJSON(),
        shortReward: v.shortReward.toJSON(),
      })),
  };
}

export function decodeState(data: StoredMarketState): MarketState {
  const g = data.global;
  const global: Global = {
    position: decodePosition(g.position),
    pendingOrder: decodePending(g.pendingOrder),
    latestVersion: g.latestVersion,
    fee: { protocol: UFixed6.fromRaw(g.fee.protocol), market: UFixed6.fromRaw(g.fee.market) },
    pendingPositionFee: UFixed6.fromRaw(g.pendingPositionFee),
    closed: g.closed,
  };

  const accounts = new Map<string, Account>();
  for (const a of data.accounts) {
    accounts.set(a.id, {
      position: decodePosition(a.position),
      pendingOrder: decodePending(a.pendingOrder),
      collateral: Fixed6.fromRaw(a.collateral),
      reward: UFixed6.fromRaw(a.reward),
      latestVersion: a.latestVersion,
      liquidation: a.liquidation,
    });
  }

  const versions = new Map<number, Version>();
  for (const v of data.versions) {
    versions.set(v.version, {
      makerValue: Fixed6.fromRaw(v.makerValue),
      longValue: Fixed6.fromRaw(v.longValue),
      shortValue: Fixed6.fromRaw(v.shortValue),
      makerReward: UFixed6.fromRaw(v.makerReward),
      longReward: UFixed6.fromRaw(v.longReward),
      shortReward: UFixed6.fromRaw(v.shortReward),
    });
  }

  return { global, accounts, versions };
}

export class MarketStore {
  private storagePath: string;

  constructor(storagePath?: string) {
    const dir = storagePath ?? path.join(os.homedir(), ".perp-market");
    this.storagePath = path.join(dir, "market-state.json");
  }

  get filePath(): string {
    return this.storagePath;
  }

  async load(): Promise<MarketState> {
    const data = await readJsonFile(this.storagePath);
    if (data === undefined) {
      const initial = emptyMarketState();
      await this.save(initial);
      return initial;
    }
    if (!Value.Check(StoredMarketStateSchema, data)) {
      const first = [...Value.Errors(StoredMarketStateSchema, data)][0];
      throw new Error(
        `Corrupt market state at ${this.storagePath}: ${first ? `${first.path} ${first.message}` : "unknown"}`,
      );
    }
    return decodeState(data);
  }

  async save(state: MarketState): Promise<void> {
    await writeJsonAtomic(this.storagePath, encodeState(state));
  }
}
