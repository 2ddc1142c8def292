import Decimal from "decimal.js";

export enum PoolType {
  Balancer = "Balancer",
  Stableswap = "Stableswap",
  Concentrated = "Concentrated",
  CosmWasmMisc = "CosmWasmMisc",
  CosmWasmTransmuterV1 = "CosmWasmTransmuterV1",
  CosmWasmAstroportPCL = "CosmWasmAstroportPCL",
  CosmWasmOrderbook = "CosmWasmOrderbook",
}

/** Pool module type plus the contract code id for CosmWasm pools */
export interface RawPoolKind {
  type: string;
  codeId?: number;
}

export interface PoolInfo {
  id: string;
  type: PoolType;
  /** Ordered for display, membership is order-insensitive */
  tokens: readonly string[];
  liquidityUsd: number;
  swapFee: Decimal;
  takerFee: Decimal;
  codeId?: number;
}
