import { PoolType } from "src/types/verification/pool";

/** JSON form of a denom, decimals as strings */
export interface DenomRecord {
  denom: string;
  exponent: number;
  referencePriceUsd?: string;
  displayName: string;
  liquidityUsd?: number;
  volume24hUsd?: number;
}

export interface PoolRecord {
  id: string;
  type: PoolType;
  tokens: string[];
  liquidityUsd: number;
  swapFee: string;
  takerFee: string;
  codeId?: number;
}

export interface TakerFeeRecord {
  denomA: string;
  denomB: string;
  fee: string;
}

/** Serialised reference data shared between processes */
export interface ReferenceSnapshot {
  builtAt: string;
  denoms: DenomRecord[];
  pools: PoolRecord[];
  takerFees: TakerFeeRecord[];
}

export interface ReferenceSummary {
  builtAt: string;
  denomCount: number;
  pricedDenomCount: number;
  poolCount: number;
  poolsByType: Partial<Record<PoolType, number>>;
}
