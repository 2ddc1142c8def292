import Decimal from "decimal.js";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";

export const FEE_SOURCE = "FEE_SOURCE";

/** Independent fee lookup used to corroborate a zero fee claim */
export interface FeeSource {
  /** Taker fee charged on the denom pair, in either order, when swapped through the pool */
  getPairFee(denomA: string, denomB: string, poolId: string): Decimal;
  /** Swap fee of the pool, undefined when the pool is unknown */
  getPoolFee(poolId: string): Decimal | undefined;
}

/**
 * Reads fees from the reference snapshot. A pair without an explicit taker
 * fee entry falls back to the taker fee of the pool the hop goes through.
 */
export class ReferenceFeeSource implements FeeSource {
  constructor(private readonly store: ReferenceDataStore) {}

  getPairFee(denomA: string, denomB: string, poolId: string): Decimal {
    return (
      this.store.getTakerFee(denomA, denomB) ??
      this.store.getPool(poolId)?.takerFee ??
      new Decimal(0)
    );
  }

  getPoolFee(poolId: string): Decimal | undefined {
    return this.store.getPool(poolId)?.swapFee;
  }
}
