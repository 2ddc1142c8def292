import { Inject, Injectable, Logger, Optional } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import {
  QuoteRequest,
  QuoteResult,
  specifiedAmount,
  specifiedDenom,
} from "src/types/verification/quote";
import {
  CheckFailure,
  FailureKind,
  Verdict,
  VerdictDiagnostics,
  VerificationStage,
} from "src/types/verification/verdict";
import { VerificationError } from "./errors";
import { ExpectedValueCalculator, ExpectedValues } from "./expected-value.service";
import { FEE_SOURCE, FeeSource, ReferenceFeeSource } from "./fee-source";
import { FeeValidator } from "./fee-validator.service";
import { Decimal, relativeError } from "./math";
import { toQuoteResult } from "./quote-normalizer";
import { RouteValidator } from "./route-validator.service";
import { ToleranceModel } from "./tolerance-model.service";

interface Progress {
  stage: VerificationStage;
}

/**
 * Checks one router quote against the reference data.
 *
 * Runs Received → ExpectedComputed → ToleranceSelected → RouteChecked →
 * FeeChecked → Verdicted. Missing reference data, unknown pool types and
 * malformed quotes stop the run with a single failure; every other check
 * contributes its failures to the verdict.
 */
@Injectable()
export class QuoteVerifier {
  private readonly logger = new Logger(QuoteVerifier.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
    private readonly calculator: ExpectedValueCalculator,
    private readonly toleranceModel: ToleranceModel,
    private readonly routeValidator: RouteValidator,
    private readonly feeValidator: FeeValidator,
    @Optional()
    @Inject(FEE_SOURCE)
    private readonly feeSource?: FeeSource,
  ) {}

  verify(
    request: QuoteRequest,
    quote: QuoteResult,
    store: ReferenceDataStore,
  ): Verdict {
    const progress: Progress = { stage: VerificationStage.Received };
    return this.guard(progress, () => this.run(request, quote, store, progress));
  }

  /** Same as verify, for a router response that has not been parsed yet */
  verifyRaw(
    request: QuoteRequest,
    rawQuote: unknown,
    store: ReferenceDataStore,
  ): Verdict {
    const progress: Progress = { stage: VerificationStage.Received };
    return this.guard(progress, () =>
      this.run(request, toQuoteResult(request, rawQuote), store, progress),
    );
  }

  private guard(progress: Progress, body: () => Verdict): Verdict {
    try {
      return body();
    } catch (error) {
      if (error instanceof VerificationError) {
        this.logger.warn(
          `Verification stopped at ${progress.stage}: ${error.message}`,
        );
        return {
          passed: false,
          stage: progress.stage,
          failures: [error.toFailure()],
        };
      }
      throw error;
    }
  }

  private run(
    request: QuoteRequest,
    quote: QuoteResult,
    store: ReferenceDataStore,
    progress: Progress,
  ): Verdict {
    const failures: CheckFailure[] = [];
    const amount = specifiedAmount(request);

    const expected = this.calculator.expected(
      store,
      request.denomIn,
      request.denomOut,
      amount,
      request.direction,
    );
    progress.stage = VerificationStage.ExpectedComputed;

    let tolerance = this.toleranceModel.select(amount, expected.notionalUsd);
    progress.stage = VerificationStage.ToleranceSelected;

    failures.push(
      ...this.routeValidator.validateQuoteRoutes(store, request, quote),
    );
    const isZeroSlippage = this.routeValidator.isZeroSlippage(
      store,
      quote.routes,
    );
    if (isZeroSlippage) {
      tolerance = this.toleranceModel.zeroSlippageTolerance();
    }
    progress.stage = VerificationStage.RouteChecked;

    failures.push(...this.checkPriceImpactSign(quote.priceImpact, isZeroSlippage));

    const impact = quote.priceImpact.abs();
    const widenedTolerance =
      !isZeroSlippage && impact.gt(tolerance)
        ? this.toleranceModel.adjustForPriceImpact(tolerance, impact)
        : tolerance;

    failures.push(...this.checkSpotPrice(quote, expected, tolerance));
    failures.push(
      ...this.checkCounterAmount(quote, expected, widenedTolerance),
    );

    failures.push(
      ...this.feeValidator.validate(
        quote.routes,
        quote.effectiveFee,
        this.feeSource ?? new ReferenceFeeSource(store),
      ),
    );
    progress.stage = VerificationStage.FeeChecked;

    failures.push(...this.checkEcho(request, quote));
    failures.push(...this.checkPriceImpactThreshold(quote, expected));

    progress.stage = VerificationStage.Verdicted;
    const diagnostics: VerdictDiagnostics = {
      expectedUnitPrice: expected.expectedUnitPrice.toString(),
      expectedCounterAmount: expected.expectedCounterAmount.toString(),
      scalingFactor: expected.scalingFactor.toString(),
      notionalUsd: expected.notionalUsd.toString(),
      tolerance: tolerance.toString(),
      widenedTolerance: widenedTolerance.toString(),
      isZeroSlippage,
    };

    this.logger.debug(
      `${request.direction} ${request.denomIn} -> ${request.denomOut}: ${failures.length} failure(s)`,
    );
    return {
      passed: failures.length === 0,
      stage: progress.stage,
      failures,
      diagnostics,
    };
  }

  // Zero-slippage pools have a fixed rate: zero impact there, strictly
  // negative impact everywhere else.
  private checkPriceImpactSign(
    priceImpact: Decimal,
    isZeroSlippage: boolean,
  ): CheckFailure[] {
    const valid = isZeroSlippage ? priceImpact.isZero() : priceImpact.lt(0);
    if (valid) return [];
    return [
      {
        check: "priceImpact",
        kind: FailureKind.PriceImpactSignViolation,
        message: isZeroSlippage
          ? `Zero-slippage route reported price impact ${priceImpact.toString()}`
          : `Price impact ${priceImpact.toString()} is not negative`,
        details: { priceImpact: priceImpact.toString() },
      },
    ];
  }

  private checkSpotPrice(
    quote: QuoteResult,
    expected: ExpectedValues,
    tolerance: Decimal,
  ): CheckFailure[] {
    const actual = quote.spotPrice.mul(expected.scalingFactor);
    const error = relativeError(actual, expected.expectedUnitPrice);
    if (error.lt(tolerance)) return [];
    return [
      {
        check: "spotPrice",
        kind: FailureKind.ToleranceExceeded,
        message: `Spot price ${actual.toString()} deviates from ${expected.expectedUnitPrice.toString()} by ${error.toString()}`,
        details: {
          actual: actual.toString(),
          expected: expected.expectedUnitPrice.toString(),
          relativeError: error.toString(),
          tolerance: tolerance.toString(),
        },
      },
    ];
  }

  private checkCounterAmount(
    quote: QuoteResult,
    expected: ExpectedValues,
    tolerance: Decimal,
  ): CheckFailure[] {
    const counter =
      quote.direction === "exact-in" ? quote.amountOut : quote.amountIn;
    const actual = counter.mul(expected.scalingFactor);
    const error = relativeError(actual, expected.expectedCounterAmount);
    if (error.lt(tolerance)) return [];
    return [
      {
        check: "amount",
        kind: FailureKind.ToleranceExceeded,
        message: `Counter amount ${actual.toString()} deviates from ${expected.expectedCounterAmount.toString()} by ${error.toString()}`,
        details: {
          actual: actual.toString(),
          expected: expected.expectedCounterAmount.toString(),
          relativeError: error.toString(),
          tolerance: tolerance.toString(),
        },
      },
    ];
  }

  private checkEcho(request: QuoteRequest, quote: QuoteResult): CheckFailure[] {
    const echoedAmount =
      quote.direction === "exact-in" ? quote.amountIn : quote.amountOut;
    const amount = specifiedAmount(request);
    const denom = specifiedDenom(request);
    if (
      quote.direction === request.direction &&
      echoedAmount.eq(amount) &&
      quote.echoedDenom === denom
    ) {
      return [];
    }
    return [
      {
        check: "echo",
        kind: FailureKind.EchoMismatch,
        message: `Router echoed ${echoedAmount.toString()}${quote.echoedDenom}, requested ${amount.toString()}${denom}`,
        details: {
          echoedAmount: echoedAmount.toString(),
          echoedDenom: quote.echoedDenom,
        },
      },
    ];
  }

  private checkPriceImpactThreshold(
    quote: QuoteResult,
    expected: ExpectedValues,
  ): CheckFailure[] {
    const { maxNotionalUsd, maxPriceImpact } = this.settings.priceImpactCheck;
    if (expected.notionalUsd.gte(maxNotionalUsd)) return [];
    const impact = quote.priceImpact.abs();
    if (impact.lt(maxPriceImpact)) return [];
    return [
      {
        check: "priceImpact",
        kind: FailureKind.PriceImpactThresholdExceeded,
        message: `Price impact ${impact.toString()} on a ${expected.notionalUsd.toFixed(2)} USD trade exceeds ${maxPriceImpact.toString()}`,
        details: {
          priceImpact: quote.priceImpact.toString(),
          notionalUsd: expected.notionalUsd.toString(),
        },
      },
    ];
  }
}
