import { MarketError, MarketErrorCode } from "../errors.js";
import { UFixed18 } from "../math/fixed-point.js";

/** Collateral and reward token movements, in 18-decimal units. */
export interface TokenLedger {
  /** Pulls `amount` from `payer` into `payee`. */
  transferFrom(payer: string, payee: string, amount: UFixed18): Promise<void>;
  /** Pushes `amount` held by `from` to `payee`. */
  transfer(from: string, payee: string, amount: UFixed18): Promise<void>;
  balanceOf(holder: string): Promise<UFixed18>;
}

export class InMemoryTokenLedger implements TokenLedger {
  private balances = new Map<string, UFixed18>();

  constructor(initial: Record<string, UFixed18> = {}) {
    for (const [holder, amount] of Object.entries(initial)) {
      this.balances.set(holder, amount);
    }
  }

  /** Credits `holder` out of thin air. */
  mint(holder: string, amount: UFixed18): void {
    this.balances.set(holder, this.balance(holder).add(amount));
  }

  async transferFrom(payer: string, payee: string, amount: UFixed18): Promise<void> {
    this.move(payer, payee, amount);
  }

  async transfer(from: string, payee: string, amount: UFixed18): Promise<void> {
    this.move(from, payee, amount);
  }

  async balanceOf(holder: string): Promise<UFixed18> {
    return this.balance(holder);
  }

  private balance(holder: string): UFixed18 {
    return this.balances.get(holder) ?? UFixed18.ZERO;
  }

  private move(from: string, to: string, amount: UFixed18): void {
    if (amount.isZero()) return;
    const available = this.balance(from);
    if (available.lt(amount)) {
      throw new MarketError(
        MarketErrorCode.INSUFFICIENT_BALANCE,
        `${from} holds ${available} but ${amount} was requested`,
        { holder: from, available: available.toString(), requested: amount.toString() },
      );
    }
    this.balances.set(from, available.sub(amount));
    this.balances.set(to, this.balance(to).add(amount));
  }
}
