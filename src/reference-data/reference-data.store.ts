import Decimal from "decimal.js";
import {
  ReferenceSnapshot,
  ReferenceSummary,
} from "src/types/reference/snapshot";
import { DenomInfo } from "src/types/verification/denom";
import { PoolInfo, PoolType } from "src/types/verification/pool";

export interface TakerFeeEntry {
  denomA: string;
  denomB: string;
  fee: Decimal;
}

/** Taker fees are keyed by the lexicographically sorted denom pair */
export const takerFeeKey = (denomA: string, denomB: string): string =>
  denomA < denomB ? `${denomA}|${denomB}` : `${denomB}|${denomA}`;

const POOL_TYPES: ReadonlySet<string> = new Set(Object.values(PoolType));

const isPoolType = (value: string): value is PoolType => POOL_TYPES.has(value);

/**
 * Immutable snapshot of denoms, pools and taker fees.
 *
 * Built once per verification run (or loaded from the shared snapshot) and
 * passed explicitly to every check. Nothing mutates it after construction.
 */
export class ReferenceDataStore {
  private readonly denoms: ReadonlyMap<string, DenomInfo>;
  private readonly pools: ReadonlyMap<string, PoolInfo>;
  private readonly takerFees: ReadonlyMap<string, Decimal>;

  constructor(
    denoms: DenomInfo[],
    pools: PoolInfo[],
    takerFees: TakerFeeEntry[] = [],
    readonly builtAt: Date = new Date(),
  ) {
    this.denoms = new Map(
      denoms.map((denom) => [denom.denom, Object.freeze({ ...denom })]),
    );
    this.pools = new Map(
      pools.map((pool) => [
        pool.id,
        Object.freeze({ ...pool, tokens: Object.freeze([...pool.tokens]) }),
      ]),
    );
    this.takerFees = new Map(
      takerFees.map((entry) => [
        takerFeeKey(entry.denomA, entry.denomB),
        entry.fee,
      ]),
    );
    Object.freeze(this);
  }

  getDenom(denom: string): DenomInfo | undefined {
    return this.denoms.get(denom);
  }

  getPool(poolId: string): PoolInfo | undefined {
    return this.pools.get(poolId);
  }

  /** Taker fee recorded for the denom pair, in either order */
  getTakerFee(denomA: string, denomB: string): Decimal | undefined {
    return this.takerFees.get(takerFeeKey(denomA, denomB));
  }

  listPools(): PoolInfo[] {
    return [...this.pools.values()];
  }

  listDenoms(): DenomInfo[] {
    return [...this.denoms.values()];
  }

  summary(): ReferenceSummary {
    const poolsByType: Partial<Record<PoolType, number>> = {};
    for (const pool of this.pools.values()) {
      poolsByType[pool.type] = (poolsByType[pool.type] ?? 0) + 1;
    }
    const denoms = this.listDenoms();
    return {
      builtAt: this.builtAt.toISOString(),
      denomCount: denoms.length,
      pricedDenomCount: denoms.filter((d) => d.referencePriceUsd !== undefined)
        .length,
      poolCount: this.pools.size,
      poolsByType,
    };
  }

  toSnapshot(): ReferenceSnapshot {
    return {
      builtAt: this.builtAt.toISOString(),
      denoms: this.listDenoms().map((denom) => ({
        denom: denom.denom,
        exponent: denom.exponent,
        referencePriceUsd: denom.referencePriceUsd?.toString(),
        displayName: denom.displayName,
        liquidityUsd: denom.liquidityUsd,
        volume24hUsd: denom.volume24hUsd,
      })),
      pools: this.listPools().map((pool) => ({
        id: pool.id,
        type: pool.type,
        tokens: [...pool.tokens],
        liquidityUsd: pool.liquidityUsd,
        swapFee: pool.swapFee.toString(),
        takerFee: pool.takerFee.toString(),
        codeId: pool.codeId,
      })),
      takerFees: [...this.takerFees.entries()].map(([key, fee]) => {
        const [denomA = "", denomB = ""] = key.split("|");
        return { denomA, denomB, fee: fee.toString() };
      }),
    };
  }

  static fromSnapshot(snapshot: ReferenceSnapshot): ReferenceDataStore {
    const pools = snapshot.pools.map((pool): PoolInfo => {
      if (!isPoolType(pool.type)) {
        throw new Error(`Snapshot contains unknown pool type ${pool.type}`);
      }
      return {
        id: pool.id,
        type: pool.type,
        tokens: pool.tokens,
        liquidityUsd: pool.liquidityUsd,
        swapFee: new Decimal(pool.swapFee),
        takerFee: new Decimal(pool.takerFee),
        codeId: pool.codeId,
      };
    });

    return new ReferenceDataStore(
      snapshot.denoms.map((denom) => ({
        denom: denom.denom,
        exponent: denom.exponent,
        referencePriceUsd:
          denom.referencePriceUsd === undefined
            ? undefined
            : new Decimal(denom.referencePriceUsd),
        displayName: denom.displayName,
        liquidityUsd: denom.liquidityUsd,
        volume24hUsd: denom.volume24hUsd,
      })),
      pools,
      snapshot.takerFees.map((entry) => ({
        denomA: entry.denomA,
        denomB: entry.denomB,
        fee: new Decimal(entry.fee),
      })),
      new Date(snapshot.builtAt),
    );
  }
}
