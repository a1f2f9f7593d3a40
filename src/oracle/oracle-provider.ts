import { Fixed6 } from "../math/fixed-point.js";

export interface OracleVersion {
  version: number;
  /** Unix seconds. */
  timestamp: number;
  price: Fixed6;
}

/** Pre-genesis sentinel. */
export const GENESIS_VERSION: OracleVersion = { version: 0, timestamp: 0, price: Fixed6.ZERO };

/**
 * Monotonically versioned, immutable price history.
 * Versions are consecutive integers starting at 1.
 */
export interface OracleProvider {
  currentVersion(): Promise<OracleVersion>;
  /** Exact record of a published version; unpublished versions are an error. */
  atVersion(version: number): Promise<OracleVersion>;
  /** Requests publication of a new version and returns the latest one. */
  sync(): Promise<OracleVersion>;
}
