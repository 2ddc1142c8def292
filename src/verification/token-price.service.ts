import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { DenomInfo } from "src/types/verification/denom";
import { CheckFailure, FailureKind } from "src/types/verification/verdict";
import { Decimal } from "./math";

export interface TokenPriceReport {
  passed: boolean;
  comparedDenoms: string[];
  /** Priced by the router, but too quiet or unpriced in the reference data to compare */
  supportOnlyDenoms: string[];
  /** No positive router price */
  unsupportedDenoms: string[];
  failures: CheckFailure[];
}

/**
 * Compares router token prices with the reference USD prices. Busier tokens
 * get tighter bounds; quiet ones only need to be priced at all.
 */
@Injectable()
export class TokenPriceValidator {
  private readonly logger = new Logger(TokenPriceValidator.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  get quoteDenom(): string {
    return this.settings.tokenPrices.quoteDenom;
  }

  /** Relative error allowed for the token, undefined when only support is checked */
  tolerance(denom: DenomInfo): Decimal | undefined {
    const tiers = this.settings.tokenPrices;
    const volume = denom.volume24hUsd ?? 0;
    const liquidity = denom.liquidityUsd ?? 0;

    if (volume > tiers.midVolumeMaxUsd) return tiers.highVolumeTolerance;
    if (volume > tiers.lowVolumeMaxUsd) return tiers.midVolumeTolerance;
    if (volume >= tiers.minActivityUsd || liquidity >= tiers.minActivityUsd) {
      return tiers.lowActivityTolerance;
    }
    return undefined;
  }

  validate(
    store: ReferenceDataStore,
    routerPrices: ReadonlyMap<string, Decimal>,
  ): TokenPriceReport {
    const comparedDenoms: string[] = [];
    const supportOnlyDenoms: string[] = [];
    const unsupportedDenoms: string[] = [];
    const failures: CheckFailure[] = [];

    for (const denom of store.listDenoms()) {
      const price = routerPrices.get(denom.denom);
      if (price === undefined || price.lte(0)) {
        unsupportedDenoms.push(denom.denom);
        continue;
      }

      const tolerance = this.tolerance(denom);
      const reference = denom.referencePriceUsd;
      if (tolerance === undefined || reference === undefined) {
        supportOnlyDenoms.push(denom.denom);
        continue;
      }
      comparedDenoms.push(denom.denom);

      const error = reference.minus(price).abs().div(price);
      if (error.gte(tolerance)) {
        failures.push({
          check: "tokenPrice",
          kind: FailureKind.ToleranceExceeded,
          message: `Router price ${price.toString()} for ${denom.denom} deviates from ${reference.toString()} by ${error.toString()}`,
          details: {
            denom: denom.denom,
            actual: price.toString(),
            expected: reference.toString(),
            relativeError: error.toString(),
            tolerance: tolerance.toString(),
          },
        });
      }
    }

    const { maxUnsupportedTokens } = this.settings.tokenPrices;
    if (unsupportedDenoms.length > maxUnsupportedTokens) {
      failures.push({
        check: "tokenPrice",
        kind: FailureKind.UnsupportedToken,
        message: `${unsupportedDenoms.length} tokens have no router price, at most ${maxUnsupportedTokens} allowed`,
        details: {
          unsupported: String(unsupportedDenoms.length),
          allowed: String(maxUnsupportedTokens),
        },
      });
    }

    this.logger.log(
      `Token prices: ${comparedDenoms.length} compared, ${unsupportedDenoms.length} unsupported, ${failures.length} failed`,
    );
    return {
      passed: failures.length === 0,
      comparedDenoms,
      supportOnlyDenoms,
      unsupportedDenoms,
      failures,
    };
  }
}
