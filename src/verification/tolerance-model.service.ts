import { Inject, Injectable } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { Decimal } from "./math";

@Injectable()
export class ToleranceModel {
  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  /**
   * Acceptable relative error for a trade of the given size.
   *
   * Larger trades see more market movement between the reference snapshot
   * and the quote, so the bound widens in steps. Under the `raw-amount`
   * policy `amount` is the raw integer amount of the specified token.
   */
  tolerance(amount: Decimal.Value): Decimal {
    const size = new Decimal(amount);
    let selected = this.settings.baseTolerance;
    for (const band of this.settings.toleranceBands) {
      if (size.gte(band.minAmount) && band.tolerance.gt(selected)) {
        selected = band.tolerance;
      }
    }
    return selected;
  }

  /**
   * Picks the banding input according to the configured policy.
   */
  select(amountSpecified: Decimal, notionalUsd: Decimal): Decimal {
    return this.settings.tolerancePolicy === "usd-notional"
      ? this.tolerance(notionalUsd)
      : this.tolerance(amountSpecified);
  }

  /** Tolerance for a single hop through a zero-slippage pool */
  zeroSlippageTolerance(): Decimal {
    return this.settings.zeroSlippageTolerance;
  }

  /**
   * A route's own price impact is a legitimate source of deviation from the
   * spot-derived expectation: max(tolerance, |impact| * (1 + tolerance)).
   */
  adjustForPriceImpact(tolerance: Decimal, priceImpactAbs: Decimal): Decimal {
    return Decimal.max(tolerance, priceImpactAbs.mul(tolerance.plus(1)));
  }
}
