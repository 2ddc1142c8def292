import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { PoolInfo } from "src/types/verification/pool";
import {
  isDirectQuote,
  QuoteRequest,
  QuoteResult,
} from "src/types/verification/quote";
import { CandidateRoute, Route } from "src/types/verification/route";
import { CheckFailure, FailureKind } from "src/types/verification/verdict";
import { MissingReferenceDataError } from "./errors";
import { PoolClassifier } from "./pool-classifier.service";

export interface RouteCountBounds {
  minRoutes: number;
  maxRoutes: number;
}

const violation = (
  message: string,
  details?: Record<string, string>,
): CheckFailure => ({
  check: "route",
  kind: FailureKind.RouteStructureViolation,
  message,
  details,
});

@Injectable()
export class RouteValidator {
  private readonly logger = new Logger(RouteValidator.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
    private readonly classifier: PoolClassifier,
  ) {}

  /**
   * Structural checks on a single canonical (input → output) route.
   * Throws MissingReferenceDataError when a hop names an unknown pool.
   */
  validate(
    store: ReferenceDataStore,
    route: Route,
    denomIn: string,
    denomOut: string,
    isDirect: boolean,
  ): CheckFailure[] {
    const failures: CheckFailure[] = [];
    const { hops } = route;

    if (hops.length === 0) {
      return [violation("Route has no hops")];
    }

    hops.forEach((hop, index) => {
      const pool = this.requirePool(store, hop.poolId);
      for (const denom of [hop.tokenInDenom, hop.tokenOutDenom]) {
        if (!this.isMember(pool, denom)) {
          failures.push(
            violation(`Denom ${denom} is not a token of pool ${pool.id}`, {
              poolId: pool.id,
              denom,
              hop: String(index),
            }),
          );
        }
      }

      const next = hops[index + 1];
      if (next && next.tokenInDenom !== hop.tokenOutDenom) {
        failures.push(
          violation(
            `Hop ${index} outputs ${hop.tokenOutDenom} but hop ${index + 1} takes ${next.tokenInDenom}`,
            { hop: String(index) },
          ),
        );
      }
    });

    if (!isDirect) {
      const first = hops[0];
      const last = hops[hops.length - 1];
      if (first && first.tokenInDenom !== denomIn) {
        failures.push(
          violation(`Route starts at ${first.tokenInDenom}, expected ${denomIn}`),
        );
      }
      if (last && last.tokenOutDenom !== denomOut) {
        failures.push(
          violation(`Route ends at ${last.tokenOutDenom}, expected ${denomOut}`),
        );
      }
    }

    return failures;
  }

  /**
   * Validates every route of a quote. Direct quotes skip the per-route
   * endpoint checks in favour of one check on the combined input denom and
   * on the pinned pool sequence.
   */
  validateQuoteRoutes(
    store: ReferenceDataStore,
    request: QuoteRequest,
    quote: QuoteResult,
  ): CheckFailure[] {
    const direct = isDirectQuote(request);
    if (quote.routes.length === 0) {
      return [violation("Quote has no routes")];
    }

    const failures = quote.routes.flatMap((route) =>
      this.validate(store, route, request.denomIn, request.denomOut, direct),
    );

    if (direct) {
      const firstDenom = quote.routes[0]?.hops[0]?.tokenInDenom;
      if (firstDenom !== request.denomIn) {
        failures.push(
          violation(
            `Direct quote starts at ${firstDenom ?? "nothing"}, expected ${request.denomIn}`,
          ),
        );
      }

      const pinned = request.poolIds ?? [];
      const used = quote.routes.flatMap((route) =>
        route.hops.map((hop) => hop.poolId),
      );
      if (used.join(",") !== pinned.join(",")) {
        failures.push(
          violation(`Direct quote used pools ${used.join(",")}`, {
            expected: pinned.join(","),
            actual: used.join(","),
          }),
        );
      }
    }

    if (failures.length > 0) {
      this.logger.debug(`Route validation found ${failures.length} violation(s)`);
    }
    return failures;
  }

  /** Exactly one route with exactly one hop through a zero-slippage pool */
  isZeroSlippage(store: ReferenceDataStore, routes: Route[]): boolean {
    if (routes.length !== 1) return false;
    const [route] = routes;
    if (!route || route.hops.length !== 1) return false;
    const [hop] = route.hops;
    if (!hop) return false;
    return this.classifier.isZeroSlippage(this.requirePool(store, hop.poolId).type);
  }

  /**
   * Checks the router's candidate routes for a pair. Identical denoms must
   * yield no routes at all.
   */
  validateCandidateRoutes(
    store: ReferenceDataStore,
    routes: CandidateRoute[],
    denomIn: string,
    denomOut: string,
    bounds: RouteCountBounds,
  ): CheckFailure[] {
    if (denomIn === denomOut) {
      return routes.length === 0
        ? []
        : [violation("Identical denoms in and out must have no candidate routes")];
    }

    const failures: CheckFailure[] = [];
    if (routes.length < bounds.minRoutes || routes.length > bounds.maxRoutes) {
      failures.push(
        violation(
          `Found ${routes.length} candidate routes, expected between ${bounds.minRoutes} and ${bounds.maxRoutes}`,
        ),
      );
    }

    routes.forEach((route, routeIndex) => {
      if (route.pools.length === 0) {
        failures.push(violation(`Candidate route ${routeIndex} has no pools`));
        return;
      }

      let current = denomIn;
      for (const hop of route.pools) {
        const pool = store.getPool(hop.poolId);
        if (!pool) {
          failures.push(
            new MissingReferenceDataError(`Pool ${hop.poolId} not in reference data`, {
              poolId: hop.poolId,
            }).toFailure(),
          );
          return;
        }
        if (!this.isMember(pool, current)) {
          failures.push(
            violation(`Denom ${current} is not a token of pool ${pool.id}`, {
              poolId: pool.id,
              denom: current,
              route: String(routeIndex),
            }),
          );
        }
        current = hop.tokenOutDenom;
      }

      if (current !== denomOut) {
        failures.push(
          violation(
            `Candidate route ${routeIndex} ends at ${current}, expected ${denomOut}`,
          ),
        );
      }
    });

    return failures;
  }

  /** Some route uses exactly these pools, in this order */
  containsPoolSequence(routes: CandidateRoute[], poolIds: string[]): boolean {
    const wanted = poolIds.join(",");
    return routes.some(
      (route) => route.pools.map((pool) => pool.poolId).join(",") === wanted,
    );
  }

  private requirePool(store: ReferenceDataStore, poolId: string): PoolInfo {
    const pool = store.getPool(poolId);
    if (!pool) {
      throw new MissingReferenceDataError(`Pool ${poolId} not in reference data`, {
        poolId,
      });
    }
    return pool;
  }

  // Synthetic (alloyed) denoms are minted by the pool itself and never
  // appear in the indexer's token listing.
  private isMember(pool: PoolInfo, denom: string): boolean {
    return (
      denom.includes(this.settings.syntheticDenomMarker) ||
      pool.tokens.includes(denom)
    );
  }
}
