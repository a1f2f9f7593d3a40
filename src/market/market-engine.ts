import { MarketError, MarketErrorCode } from "../errors.js";
import type { TokenLedger } from "../ledger/token-ledger.js";
import { logger } from "../logging/logger.js";
import { Fixed6, UFixed18, UFixed6 } from "../math/fixed-point.js";
import type { OracleProvider, OracleVersion } from "../oracle/oracle-provider.js";
import type { ParameterSource } from "../params/parameter-source.js";
import {
  EMPTY_ACCOUNT,
  evaluateLiquidation,
  isUnderMaintenance,
  settleLocal,
  type Account,
} from "./account.js";
import { advance, type Global } from "./global.js";
import type { MarketParameter, ProtocolParameter } from "./market-parameter.js";
import { MarketTransaction, emptyMarketState, type MarketState } from "./market-state.js";
import type { MarketStore } from "./market-store.js";
import {
  applyDelta,
  increasesRisk,
  increasesTaker,
  isEmpty,
  maintenance,
  maxPosition,
  positionEq,
  positionFee,
  socializationFactor,
  type PendingOrder,
  type Position,
} from "./position.js";
import { SerialQueue } from "./serial-queue.js";
import { EMPTY_VERSION, type Version } from "./version.js";

export type BroadcastFn = (event: string, data: unknown) => void;

export interface MarketOptions {
  oracle: OracleProvider;
  params: ParameterSource;
  /** Collateral token. */
  ledger: TokenLedger;
  /** Token rewards are paid in. */
  rewardLedger: TokenLedger;
  /** Ledger holder of the market's collateral, fees and reward funds. */
  address: string;
  store?: MarketStore;
  broadcast?: BroadcastFn;
}

export interface Solvency {
  balance: UFixed18;
  /** Sum of collateral, fees and undistributed position fees. */
  obligations: Fixed6;
  /** balance − obligations; rounding keeps it within a few units. */
  surplus: Fixed6;
}

interface CallContext {
  tx: MarketTransaction;
  current: OracleVersion;
  marketParameter: MarketParameter;
  protocolParameter: ProtocolParameter;
  events: Array<{ event: string; data: unknown }>;
  /** Token movements, run once the new state is saved. */
  transfers: Transfer[];
}

interface Transfer {
  ledger: TokenLedger;
  kind: "pull" | "push";
  holder: string;
  amount: UFixed6;
}

const LOG_CONTEXT = "market";

function isBlank(account: Account): boolean {
  return (
    isEmpty(account.position) &&
    isEmpty(account.pendingOrder) &&
    account.collateral.isZero() &&
    account.reward.isZero()
  );
}

export class Market {
  private state: MarketState;
  private readonly queue = new SerialQueue();
  private readonly options: MarketOptions;

  private constructor(options: MarketOptions, state: MarketState) {
    this.options = options;
    this.state = state;
  }

  static async create(options: MarketOptions): Promise<Market> {
    const state = options.store ? await options.store.load() : emptyMarketState();
    return new Market(options, state);
  }

  get address(): string {
    return this.options.address;
  }

  // ── Views over committed state ──

  global(): Global {
    return this.state.global;
  }

  account(id: string): Account {
    return this.state.accounts.get(id) ?? EMPTY_ACCOUNT;
  }

  accounts(): string[] {
    return [...this.state.accounts.keys()];
  }

  version(version: number): Version | undefined {
    return this.state.versions.get(version);
  }

  async solvency(): Promise<Solvency> {
    const balance = await this.options.ledger.balanceOf(this.options.address);
    const { global, accounts } = this.state;
    let obligations = global.fee.protocol
      .add(global.fee.market)
      .add(global.pendingPositionFee)
      .toSigned();
    for (const account of accounts.values()) {
      obligations = obligations.add(account.collateral);
    }
    return {
      balance,
      obligations,
      surplus: balance.toUFixed6().toSigned().sub(obligations),
    };
  }

  // ── Operations ──

  /** Advances the market to the oracle's current version. */
  settle(): Promise<Global> {
    return this.execute(async (ctx) => {
      await this.settleGlobal(ctx);
      return ctx.tx.global;
    });
  }

  /** Settles the market, then catches `id` up to the same version. */
  settleAccount(id: string): Promise<Account> {
    return this.execute(async (ctx) => {
      await this.settleGlobal(ctx);
      return this.settleOne(ctx, id);
    });
  }

  /**
   * Replaces the pending order of `id` with the target sizes and moves
   * `collateralDelta` between the sender and the account. A non-owner may
   * deposit, or liquidate an account under maintenance by requesting an
   * empty position.
   */
  update(
    sender: string,
    id: string,
    maker: UFixed6,
    long: UFixed6,
    short: UFixed6,
    collateralDelta: Fixed6,
  ): Promise<Account> {
    return this.execute(async (ctx) => {
      await this.settleGlobal(ctx);
      const account = this.settleOne(ctx, id);
      this.applyUpdate(ctx, sender, id, account, { maker, long, short }, collateralDelta);
      return ctx.tx.account(id);
    });
  }

  liquidate(liquidator: string, id: string): Promise<Account> {
    return this.update(liquidator, id, UFixed6.ZERO, UFixed6.ZERO, UFixed6.ZERO, Fixed6.ZERO);
  }

  /** Pays out the fees owed to `sender` as protocol and/or market treasury. */
  claimFee(sender: string): Promise<UFixed6> {
    return this.execute(async (ctx) => {
      this.requireUnpaused(ctx);
      await this.settleGlobal(ctx);
      const { fee } = ctx.tx.global;
      const isProtocol = sender === ctx.protocolParameter.treasury;
      const isMarket = sender === ctx.marketParameter.treasury;
      if (!isProtocol && !isMarket) {
        throw new MarketError(MarketErrorCode.UNAUTHORIZED, `${sender} is not a fee treasury`);
      }
      const amount = (isProtocol ? fee.protocol : UFixed6.ZERO).add(isMarket ? fee.market : UFixed6.ZERO);
      ctx.tx.global = {
        ...ctx.tx.global,
        fee: {
          protocol: isProtocol ? UFixed6.ZERO : fee.protocol,
          market: isMarket ? UFixed6.ZERO : fee.market,
        },
      };
      ctx.transfers.push({ ledger: this.options.ledger, kind: "push", holder: sender, amount });
      ctx.events.push({ event: "market.claimed", data: { account: sender, amount: amount.toString() } });
      return amount;
    });
  }

  /** Pays the settled reward balance of `id` in the reward token. */
  claimReward(id: string): Promise<UFixed6> {
    return this.execute(async (ctx) => {
      this.requireUnpaused(ctx);
      await this.settleGlobal(ctx);
      const account = this.settleOne(ctx, id);
      const amount = account.reward;
      if (amount.isZero()) {
        return amount;
      }
      ctx.tx.setAccount(id, { ...account, reward: UFixed6.ZERO });
      ctx.transfers.push({ ledger: this.options.rewardLedger, kind: "push", holder: id, amount });
      ctx.events.push({ event: "market.rewardClaimed", data: { account: id, amount: amount.toString() } });
      return amount;
    });
  }

  // ── Internals ──

  private execute<T>(body: (ctx: CallContext) => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      const ctx = await this.begin();
      const result = await body(ctx);
      const previous = this.state;
      const next = ctx.tx.commit();
      await this.persist(next);
      try {
        await this.runTransfers(ctx.transfers);
      } catch (err) {
        await this.rollback(previous, err);
        throw err;
      }
      this.state = next;
      this.emit(ctx.events);
      return result;
    });
  }

  private async persist(state: MarketState): Promise<void> {
    if (this.options.store) {
      await this.options.store.save(state);
    }
  }

  /** Restores the stored state after a failed transfer. */
  private async rollback(previous: MarketState, cause: unknown): Promise<void> {
    try {
      await this.persist(previous);
    } catch (err) {
      logger.error(LOG_CONTEXT, "Failed to restore market state after a failed transfer", {
        cause: cause instanceof Error ? cause.message : String(cause),
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private requireUnpaused(ctx: CallContext): void {
    if (ctx.protocolParameter.paused) {
      throw new MarketError(MarketErrorCode.PAUSED, "Protocol is paused");
    }
  }

  private async begin(): Promise<CallContext> {
    const current = await this.options.oracle.sync();
    if (current.version === 0) {
      throw new MarketError(MarketErrorCode.INVALID_ORACLE_VERSION, "Oracle has not published a version yet");
    }
    const [marketParameter, protocolParameter] = await Promise.all([
      this.options.params.marketParameter(),
      this.options.params.protocolParameter(),
    ]);
    const ctx: CallContext = {
      tx: new MarketTransaction(this.state),
      current,
      marketParameter,
      protocolParameter,
      events: [],
      transfers: [],
    };

    if (marketParameter.closed !== ctx.tx.global.closed) {
      ctx.tx.global = { ...ctx.tx.global, closed: marketParameter.closed };
      ctx.events.push({
        event: "market.closedUpdated",
        data: { closed: marketParameter.closed, version: current.version },
      });
    }
    return ctx;
  }

  private async settleGlobal(ctx: CallContext): Promise<void> {
    const { tx, current } = ctx;
    const latest = tx.global.latestVersion;
    if (current.version < latest) {
      throw new MarketError(
        MarketErrorCode.INVALID_ORACLE_VERSION,
        `Oracle version ${current.version} is behind settled version ${latest}`,
      );
    }
    if (current.version === latest) {
      return;
    }

    if (latest === 0) {
      tx.global = { ...tx.global, latestVersion: current.version };
      tx.setVersion(current.version, EMPTY_VERSION);
    } else {
      let from = await this.options.oracle.atVersion(latest);
      let previous = tx.requireVersion(latest);
      for (let v = latest + 1; v <= current.version; v++) {
        const to = v === current.version ? current : await this.options.oracle.atVersion(v);
        const step = advance(tx.global, previous, from, to, ctx.marketParameter, ctx.protocolParameter);
        tx.global = step.global;
        tx.setVersion(v, step.version);
        previous = step.version;
        from = to;
      }
    }

    ctx.events.push({
      event: "market.settled",
      data: { fromVersion: latest, toVersion: current.version, price: current.price.toString() },
    });
  }

  private settleOne(ctx: CallContext, id: string): Account {
    const { tx, current, marketParameter } = ctx;
    const before = tx.account(id);
    const settled = settleLocal(before, tx.global.latestVersion, (v) => tx.requireVersion(v));
    const account: Account = {
      ...settled,
      liquidation: evaluateLiquidation(settled, current.price, marketParameter.maintenance),
    };

    if (tx.hasAccount(id) || !isBlank(account)) {
      tx.setAccount(id, account);
    }
    if (account.latestVersion !== before.latestVersion && tx.hasAccount(id)) {
      ctx.events.push({
        event: "market.accountSettled",
        data: {
          account: id,
          version: account.latestVersion,
          collateral: account.collateral.toString(),
          liquidation: account.liquidation,
        },
      });
    }
    if (account.liquidation && !before.liquidation) {
      logger.warn(LOG_CONTEXT, `Account ${id} is under maintenance`, {
        version: account.latestVersion,
        collateral: account.collateral.toString(),
      });
    }
    return account;
  }

  private applyUpdate(
    ctx: CallContext,
    sender: string,
    id: string,
    account: Account,
    target: Position,
    collateralDelta: Fixed6,
  ): void {
    const { tx, current, marketParameter, protocolParameter } = ctx;
    const price = current.price;
    const prevPending = account.pendingOrder;
    const pendingChanged = !positionEq(target, prevPending);

    this.requireUnpaused(ctx);

    const isLiquidation =
      sender !== id &&
      isEmpty(target) &&
      collateralDelta.sign() >= 0 &&
      !isEmpty(prevPending) &&
      isUnderMaintenance(account, price, marketParameter.maintenance);

    if (sender !== id && !isLiquidation && (pendingChanged || collateralDelta.sign() < 0)) {
      throw new MarketError(MarketErrorCode.UNAUTHORIZED, `${sender} may not update ${id}`, {
        sender,
        account: id,
      });
    }
    if (!isLiquidation && account.liquidation) {
      throw new MarketError(MarketErrorCode.IN_LIQUIDATION, `Account ${id} is being liquidated`, { account: id });
    }
    if (marketParameter.closed && increasesRisk(prevPending, target)) {
      throw new MarketError(MarketErrorCode.CLOSED, "Market is closed to new risk");
    }

    const nextPending: PendingOrder = pendingChanged
      ? { version: current.version, ...target }
      : prevPending;
    const globalPending: PendingOrder = pendingChanged
      ? { version: current.version, ...applyDelta(tx.global.pendingOrder, prevPending, nextPending) }
      : tx.global.pendingOrder;

    if (nextPending.maker.gt(prevPending.maker) && globalPending.maker.gt(marketParameter.makerLimit)) {
      throw new MarketError(
        MarketErrorCode.MAKER_OVER_LIMIT,
        `Maker position ${globalPending.maker} exceeds limit ${marketParameter.makerLimit}`,
      );
    }

    if (increasesTaker(prevPending, nextPending)) {
      const factor = socializationFactor(globalPending);
      const floor = UFixed6.ONE.sub(marketParameter.makerLiquidity);
      if (factor.lt(floor)) {
        throw new MarketError(
          MarketErrorCode.INSUFFICIENT_LIQUIDITY,
          `Taker exposure exceeds maker liquidity (socialization factor ${factor})`,
          { socializationFactor: factor.toString(), required: floor.toString() },
        );
      }
    }

    const { ledger } = this.options;
    let collateral = account.collateral.add(collateralDelta);
    let fee = UFixed6.ZERO;

    if (isLiquidation) {
      const reward = maintenance(account.position, price, marketParameter.maintenance).mul(
        protocolParameter.liquidationFee,
      );
      collateral = collateral.sub(reward);
      // liquidator deposit and reward settle as one movement
      const net = reward.toSigned().sub(collateralDelta);
      if (net.sign() > 0) {
        ctx.transfers.push({ ledger, kind: "push", holder: sender, amount: net.toUnsigned() });
      } else if (net.sign() < 0) {
        ctx.transfers.push({ ledger, kind: "pull", holder: sender, amount: net.abs() });
      }

      ctx.events.push({
        event: "market.liquidation",
        data: { account: id, liquidator: sender, fee: reward.toString(), version: current.version },
      });
      logger.info(LOG_CONTEXT, `Liquidated ${id}`, {
        liquidator: sender,
        fee: reward.toString(),
        collateral: collateral.toString(),
      });
      if (collateral.sign() < 0) {
        ctx.events.push({
          event: "market.shortfall",
          data: { account: id, shortfall: collateral.neg().toString(), version: current.version },
        });
        logger.warn(LOG_CONTEXT, `Account ${id} left with shortfall`, { shortfall: collateral.neg().toString() });
      }
    } else {
      fee = positionFee(prevPending, nextPending, price, marketParameter.makerFee, marketParameter.takerFee);
      collateral = collateral.sub(fee);
      this.checkCollateral(account, nextPending, collateral, collateralDelta, ctx);

      if (collateralDelta.sign() > 0) {
        ctx.transfers.push({ ledger, kind: "pull", holder: sender, amount: collateralDelta.toUnsigned() });
      } else if (collateralDelta.sign() < 0) {
        ctx.transfers.push({ ledger, kind: "push", holder: sender, amount: collateralDelta.abs() });
      }
    }

    tx.setAccount(id, {
      ...account,
      pendingOrder: nextPending,
      collateral,
      liquidation: isLiquidation || account.liquidation,
    });
    tx.global = {
      ...tx.global,
      pendingOrder: globalPending,
      pendingPositionFee: tx.global.pendingPositionFee.add(fee),
    };

    ctx.events.push({
      event: "market.updated",
      data: {
        sender,
        account: id,
        version: current.version,
        maker: target.maker.toString(),
        long: target.long.toString(),
        short: target.short.toString(),
        collateral: collateralDelta.toString(),
        fee: fee.toString(),
      },
    });
  }

  private checkCollateral(
    account: Account,
    nextPending: PendingOrder,
    collateral: Fixed6,
    collateralDelta: Fixed6,
    ctx: CallContext,
  ): void {
    const { current, marketParameter, protocolParameter } = ctx;
    const fail = (reason: string): never => {
      throw new MarketError(MarketErrorCode.INSUFFICIENT_COLLATERAL, reason, {
        collateral: collateral.toString(),
      });
    };

    const exposure = maxPosition(account.position, nextPending);
    if (!isEmpty(exposure)) {
      const required = maintenance(exposure, current.price, marketParameter.maintenance);
      if (collateral.lt(protocolParameter.minCollateral)) {
        fail(`Collateral ${collateral} is below the minimum ${protocolParameter.minCollateral}`);
      }
      if (collateral.lt(required)) {
        fail(`Collateral ${collateral} is below the maintenance requirement ${required}`);
      }
      return;
    }

    if (collateralDelta.sign() < 0 && collateral.sign() < 0) {
      fail(`Withdrawal exceeds collateral ${account.collateral}`);
    }
    if (collateral.sign() > 0 && collateral.lt(protocolParameter.minCollateral)) {
      fail(`Remaining collateral ${collateral} is below the minimum ${protocolParameter.minCollateral}`);
    }
  }

  private async runTransfers(transfers: Transfer[]): Promise<void> {
    for (const t of transfers) {
      if (t.amount.isZero()) continue;
      if (t.kind === "pull") {
        await t.ledger.transferFrom(t.holder, this.options.address, t.amount.toUFixed18());
      } else {
        await t.ledger.transfer(this.options.address, t.holder, t.amount.toUFixed18());
      }
    }
  }

  private emit(events: CallContext["events"]): void {
    const { broadcast } = this.options;
    for (const { event, data } of events) {
      logger.debug(LOG_CONTEXT, event, data);
      broadcast?.(event, data);
    }
  }
}
