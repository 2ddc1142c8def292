import { Inject, Injectable, Logger } from "@nestjs/common";
import Decimal from "decimal.js";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import {
  IndexerPool,
  IndexerPoolToken,
  IndexerToken,
} from "src/types/reference/indexer";
import { DenomInfo } from "src/types/verification/denom";
import { PoolInfo } from "src/types/verification/pool";
import { PoolClassifier } from "src/verification/pool-classifier.service";
import {
  ReferenceDataStore,
  TakerFeeEntry,
  takerFeeKey,
} from "./reference-data.store";

const toDecimal = (value: number | string | null | undefined): Decimal | undefined => {
  if (value === null || value === undefined || value === "") return undefined;
  const parsed = new Decimal(value);
  return parsed.isFinite() ? parsed : undefined;
};

const toOptionalNumber = (value: number | null | undefined): number | undefined =>
  value ?? undefined;

/** Concentrated pools list {asset0, asset1}, every other type an array */
export function poolTokenDenoms(tokens: IndexerPool["pool_tokens"]): string[] {
  const entries: Array<IndexerPoolToken | undefined> = Array.isArray(tokens)
    ? tokens
    : [tokens.asset0, tokens.asset1];
  return entries.flatMap((entry) => (entry?.denom ? [entry.denom] : []));
}

@Injectable()
export class ReferenceDataBuilder {
  private readonly logger = new Logger(ReferenceDataBuilder.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
    private readonly classifier: PoolClassifier,
  ) {}

  /**
   * Builds a store from the indexer listings. Throws UnknownPoolTypeError
   * when a pool has a type the classifier does not know.
   */
  build(tokens: IndexerToken[], pools: IndexerPool[]): ReferenceDataStore {
    const blacklist = new Set(this.settings.tokenBlacklist);
    const denoms = tokens
      .filter((token) => !blacklist.has(token.denom))
      .map((token) => this.toDenom(token));

    const poolInfos = pools.map((pool) => this.toPool(pool));
    const unpriced = denoms.filter((denom) => !denom.referencePriceUsd).length;
    if (unpriced > 0) {
      this.logger.warn(`${unpriced} of ${denoms.length} denoms have no USD price`);
    }
    this.logger.log(
      `Built reference data: ${denoms.length} denoms, ${poolInfos.length} pools`,
    );
    return new ReferenceDataStore(denoms, poolInfos, this.takerFees(poolInfos));
  }

  private toDenom(token: IndexerToken): DenomInfo {
    const price = toDecimal(token.price);
    return {
      denom: token.denom,
      exponent: token.exponent,
      referencePriceUsd: price && price.gt(0) ? price : undefined,
      displayName: token.display ?? token.name ?? token.denom,
      liquidityUsd: toOptionalNumber(token.liquidity),
      volume24hUsd: toOptionalNumber(token.volume_24h),
    };
  }

  private toPool(pool: IndexerPool): PoolInfo {
    const codeId =
      pool.code_id === null || pool.code_id === undefined
        ? undefined
        : Number(pool.code_id);
    return {
      id: String(pool.pool_id),
      type: this.classifier.classify({ type: pool.type, codeId }),
      tokens: poolTokenDenoms(pool.pool_tokens),
      liquidityUsd: pool.liquidity,
      swapFee: toDecimal(pool.swap_fees) ?? new Decimal(0),
      takerFee: toDecimal(pool.taker_fee) ?? new Decimal(0),
      codeId,
    };
  }

  // The most liquid pool holding a pair decides its taker fee.
  private takerFees(pools: PoolInfo[]): TakerFeeEntry[] {
    const seen = new Set<string>();
    const entries: TakerFeeEntry[] = [];
    const byLiquidity = [...pools].sort((a, b) => b.liquidityUsd - a.liquidityUsd);
    for (const pool of byLiquidity) {
      pool.tokens.forEach((denomA, i) => {
        for (const denomB of pool.tokens.slice(i + 1)) {
          const key = takerFeeKey(denomA, denomB);
          if (seen.has(key)) continue;
          seen.add(key);
          entries.push({ denomA, denomB, fee: pool.takerFee });
        }
      });
    }
    return entries;
  }
}
