import {
  ExactAmountInQuoteResponse,
  ExactAmountOutQuoteResponse,
  RouterRouteDto,
} from "src/dto/RouterQuoteResponse";
import { validatePlain } from "src/dto/validate";
import { QuoteRequest, QuoteResult } from "src/types/verification/quote";
import { PoolHop, Route } from "src/types/verification/route";
import { MalformedQuoteError } from "./errors";
import { Decimal } from "./math";

function parse<T extends object>(
  cls: new () => T,
  raw: unknown,
): T {
  const result = validatePlain(cls, raw);
  if (!result.ok) {
    throw new MalformedQuoteError(
      `Router quote is malformed: ${result.problems[0]}`,
      { problems: result.problems.join("; ") },
    );
  }
  return result.value;
}

// Exact-in hops are listed head first and name only their output denom.
function exactInHops(route: RouterRouteDto, denomIn: string): PoolHop[] {
  let tokenIn = denomIn;
  return route.pools.map((pool) => {
    if (!pool.token_out_denom) {
      throw new MalformedQuoteError(`Pool ${pool.id} has no token_out_denom`, {
        poolId: pool.id,
      });
    }
    const hop = {
      poolId: pool.id,
      tokenInDenom: tokenIn,
      tokenOutDenom: pool.token_out_denom,
    };
    tokenIn = pool.token_out_denom;
    return hop;
  });
}

// Exact-out hops are listed tail first and name only their input denom.
function exactOutHops(route: RouterRouteDto, denomOut: string): PoolHop[] {
  const canonical = [...route.pools].reverse();
  const hops: PoolHop[] = [];
  for (let i = canonical.length - 1; i >= 0; i--) {
    const pool = canonical[i];
    if (!pool) continue;
    if (!pool.token_in_denom) {
      throw new MalformedQuoteError(`Pool ${pool.id} has no token_in_denom`, {
        poolId: pool.id,
      });
    }
    hops.unshift({
      poolId: pool.id,
      tokenInDenom: pool.token_in_denom,
      tokenOutDenom: hops[0]?.tokenInDenom ?? denomOut,
    });
  }
  return hops;
}

/**
 * Validates a raw router response against the wire DTOs and converts it to
 * a QuoteResult with every route in input → output order.
 */
export function toQuoteResult(request: QuoteRequest, raw: unknown): QuoteResult {
  if (request.direction === "exact-in") {
    const dto = parse(ExactAmountInQuoteResponse, raw);
    return {
      direction: "exact-in",
      amountIn: new Decimal(dto.amount_in.amount),
      amountOut: new Decimal(dto.amount_out),
      echoedDenom: dto.amount_in.denom,
      routes: dto.route.map(
        (route): Route => ({
          hops: exactInHops(route, request.denomIn),
          amountIn: new Decimal(route.in_amount),
          amountOut: new Decimal(route.out_amount),
        }),
      ),
      effectiveFee: new Decimal(dto.effective_fee),
      priceImpact: new Decimal(dto.price_impact),
      spotPrice: new Decimal(dto.in_base_out_quote_spot_price),
    };
  }

  const dto = parse(ExactAmountOutQuoteResponse, raw);
  return {
    direction: "exact-out",
    amountIn: new Decimal(dto.amount_in),
    amountOut: new Decimal(dto.amount_out.amount),
    echoedDenom: dto.amount_out.denom,
    routes: dto.route.map(
      (route): Route => ({
        hops: exactOutHops(route, request.denomOut),
        amountIn: new Decimal(route.in_amount),
        amountOut: new Decimal(route.out_amount),
      }),
    ),
    effectiveFee: new Decimal(dto.effective_fee),
    priceImpact: new Decimal(dto.price_impact),
    spotPrice: new Decimal(dto.in_base_out_quote_spot_price),
  };
}
