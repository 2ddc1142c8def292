import Decimal from "decimal.js";
import { Route } from "./route";

export type SwapDirection = "exact-in" | "exact-out";

interface QuoteRequestBase {
  denomIn: string;
  denomOut: string;
  /** Pins the quote to these pools, in order (direct/custom quote) */
  poolIds?: string[];
  /**
   * One denom per pinned pool, in `poolIds` order: the token out of each
   * hop for exact-in, the token in of each hop for exact-out. May be left
   * out when a single pool is pinned.
   */
  hopDenoms?: string[];
}

export interface ExactInQuoteRequest extends QuoteRequestBase {
  direction: "exact-in";
  amountIn: Decimal;
}

export interface ExactOutQuoteRequest extends QuoteRequestBase {
  direction: "exact-out";
  amountOut: Decimal;
}

export type QuoteRequest = ExactInQuoteRequest | ExactOutQuoteRequest;

export interface QuoteResult {
  direction: SwapDirection;
  amountIn: Decimal;
  amountOut: Decimal;
  /** Denom of the amount the router echoed back (token in for exact-in) */
  echoedDenom: string;
  routes: Route[];
  effectiveFee: Decimal;
  priceImpact: Decimal;
  /** Counter raw units per specified raw unit */
  spotPrice: Decimal;
}

export const isDirectQuote = (request: QuoteRequest): boolean =>
  (request.poolIds?.length ?? 0) > 0;

export const specifiedAmount = (request: QuoteRequest): Decimal =>
  request.direction === "exact-in" ? request.amountIn : request.amountOut;

export const specifiedDenom = (request: QuoteRequest): string =>
  request.direction === "exact-in" ? request.denomIn : request.denomOut;

/**
 * Denoms the router pairs with the pinned pools, one per pool. A single
 * pinned pool defaults to the counter denom of the request.
 */
export function pinnedHopDenoms(request: QuoteRequest): string[] {
  const poolIds = request.poolIds ?? [];
  const hopDenoms =
    request.hopDenoms ??
    (poolIds.length === 1
      ? [request.direction === "exact-in" ? request.denomOut : request.denomIn]
      : []);
  if (hopDenoms.length !== poolIds.length) {
    throw new Error(
      `Quote pinned to ${poolIds.length} pool(s) has ${hopDenoms.length} hop denom(s)`,
    );
  }
  return hopDenoms;
}
