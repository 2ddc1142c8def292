import { Injectable, Logger } from "@nestjs/common";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { DenomInfo } from "src/types/verification/denom";
import { SwapDirection } from "src/types/verification/quote";
import { MissingReferenceDataError } from "./errors";
import { Decimal, pow10 } from "./math";

export interface ExpectedValues {
  /** Display units of the counter token per display unit of the specified token */
  expectedUnitPrice: Decimal;
  /** Counter amount at the specified token's raw scale */
  expectedCounterAmount: Decimal;
  /** 10^exp(S) / 10^exp(C), applied to the router's raw spot price and counter amount */
  scalingFactor: Decimal;
  notionalUsd: Decimal;
}

interface PricedDenom {
  info: DenomInfo;
  price: Decimal;
}

@Injectable()
export class ExpectedValueCalculator {
  private readonly logger = new Logger(ExpectedValueCalculator.name);

  /**
   * Derives what the router should answer from reference prices alone.
   *
   * S is the specified denom (token in for exact-in, token out for
   * exact-out) and C the counter denom. `amountSpecified` is raw.
   */
  expected(
    store: ReferenceDataStore,
    denomIn: string,
    denomOut: string,
    amountSpecified: Decimal,
    direction: SwapDirection,
  ): ExpectedValues {
    const tokenIn = this.priced(store, denomIn);
    const tokenOut = this.priced(store, denomOut);
    const [specified, counter] =
      direction === "exact-in" ? [tokenIn, tokenOut] : [tokenOut, tokenIn];

    const scalingFactor = pow10(specified.info.exponent).div(
      pow10(counter.info.exponent),
    );
    const expectedUnitPrice = specified.price.div(counter.price);
    const expectedCounterAmount = amountSpecified.mul(expectedUnitPrice);
    const notionalUsd = specified.price
      .mul(amountSpecified)
      .div(pow10(specified.info.exponent));

    this.logger.debug(
      `${direction} ${denomIn} -> ${denomOut}: unit price ${expectedUnitPrice.toString()}, notional ${notionalUsd.toFixed(2)} USD`,
    );

    return {
      expectedUnitPrice,
      expectedCounterAmount,
      scalingFactor,
      notionalUsd,
    };
  }

  private priced(store: ReferenceDataStore, denom: string): PricedDenom {
    const info = store.getDenom(denom);
    if (!info) {
      throw new MissingReferenceDataError(`Denom ${denom} not in reference data`, {
        denom,
      });
    }
    if (!info.referencePriceUsd || info.referencePriceUsd.lte(0)) {
      throw new MissingReferenceDataError(`Denom ${denom} has no USD price`, {
        denom,
      });
    }
    return { info, price: info.referencePriceUsd };
  }
}
