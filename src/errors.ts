/**
 * Error codes raised by the market. Every failure aborts the whole call;
 * no operation leaves partially applied state behind.
 */
export const MarketErrorCode = {
  PAUSED: "PAUSED",
  CLOSED: "CLOSED",
  MAKER_OVER_LIMIT: "MAKER_OVER_LIMIT",
  INSUFFICIENT_LIQUIDITY: "INSUFFICIENT_LIQUIDITY",
  INSUFFICIENT_COLLATERAL: "INSUFFICIENT_COLLATERAL",
  IN_LIQUIDATION: "IN_LIQUIDATION",
  UNAUTHORIZED: "UNAUTHORIZED",
  OVERFLOW: "OVERFLOW",
  UNDERFLOW: "UNDERFLOW",
  DIVISION_BY_ZERO: "DIVISION_BY_ZERO",
  INVALID_ORACLE_VERSION: "INVALID_ORACLE_VERSION",
  INVALID_PARAMETER: "INVALID_PARAMETER",
  INSUFFICIENT_BALANCE: "INSUFFICIENT_BALANCE",
} as const;

export type MarketErrorCodeType = (typeof MarketErrorCode)[keyof typeof MarketErrorCode];

export class MarketError extends Error {
  readonly code: MarketErrorCodeType;
  readonly details?: Record<string, unknown>;

  constructor(code: MarketErrorCodeType, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "MarketError";
    this.code = code;
    this.details = details;
  }
}

export function isMarketError(err: unknown, code?: MarketErrorCodeType): err is MarketError {
  return err instanceof MarketError && (code === undefined || err.code === code);
}
