import Decimal from "decimal.js";

/** A single pool traversal, always in input → output order */
export interface PoolHop {
  poolId: string;
  tokenInDenom: string;
  tokenOutDenom: string;
}

export interface Route {
  hops: PoolHop[];
  amountIn: Decimal;
  amountOut: Decimal;
}

/** Route as returned by the router's candidate route search */
export interface CandidateRoute {
  pools: Array<{ poolId: string; tokenOutDenom: string }>;
}
