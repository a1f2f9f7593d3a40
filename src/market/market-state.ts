import { MarketError, MarketErrorCode } from "../errors.js";
import { EMPTY_ACCOUNT, type Account } from "./account.js";
import { EMPTY_GLOBAL, type Global } from "./global.js";
import type { Version } from "./version.js";

/** Committed market state. Entries are replaced, never mutated. */
export interface MarketState {
  readonly global: Global;
  readonly accounts: ReadonlyMap<string, Account>;
  /** Cumulative accumulator entries keyed by oracle version. */
  readonly versions: ReadonlyMap<number, Version>;
}

export function emptyMarketState(): MarketState {
  return { global: EMPTY_GLOBAL, accounts: new Map(), versions: new Map() };
}

/**
 * Draft over a committed state. Reads fall through to the base; writes stay
 * in the draft until `commit`, so a call that throws leaves nothing behind.
 */
export class MarketTransaction {
  global: Global;
  private readonly base: MarketState;
  private readonly accounts = new Map<string, Account>();
  private readonly versions = new Map<number, Version>();

  constructor(base: MarketState) {
    this.base = base;
    this.global = base.global;
  }

  hasAccount(id: string): boolean {
    return this.accounts.has(id) || this.base.accounts.has(id);
  }

  account(id: string): Account {
    return this.accounts.get(id) ?? this.base.accounts.get(id) ?? EMPTY_ACCOUNT;
  }

  setAccount(id: string, account: Account): void {
    this.accounts.set(id, account);
  }

  version(version: number): Version | undefined {
    return this.versions.get(version) ?? this.base.versions.get(version);
  }

  /** Throws INVALID_ORACLE_VERSION when the entry was never written. */
  requireVersion(version: number): Version {
    const entry = this.version(version);
    if (!entry) {
      throw new MarketError(
        MarketErrorCode.INVALID_ORACLE_VERSION,
        `No accumulator entry at version ${version}`,
        { version },
      );
    }
    return entry;
  }

  setVersion(version: number, entry: Version): void {
    if (this.version(version)) {
      throw new MarketError(
        MarketErrorCode.INVALID_ORACLE_VERSION,
        `Accumulator entry at version ${version} is already written`,
        { version },
      );
    }
    this.versions.set(version, entry);
  }

  commit(): MarketState {
    const accounts = new Map(this.base.accounts);
    for (const [id, account] of this.accounts) {
      accounts.set(id, account);
    }
    const versions = new Map(this.base.versions);
    for (const [version, entry] of this.versions) {
      versions.set(version, entry);
    }
    return { global: this.global, accounts, versions };
  }
}
