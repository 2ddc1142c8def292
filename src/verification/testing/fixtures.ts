import Decimal from "decimal.js";
import { loadVerificationSettings } from "src/config/verification.config";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { PoolType } from "src/types/verification/pool";
import { ExpectedValueCalculator } from "../expected-value.service";
import { FeeValidator } from "../fee-validator.service";
import { PoolClassifier } from "../pool-classifier.service";
import { QuoteVerifier } from "../quote-verifier.service";
import { RouteValidator } from "../route-validator.service";
import { ToleranceModel } from "../tolerance-model.service";

export const DENOM_A = "ua";
export const DENOM_A2 = "ua2";
export const DENOM_B = "ub";
export const DENOM_C = "wei-c";
export const DENOM_UNPRICED = "unpriced";
export const ALLOYED_DENOM = "factory/osmo1test/alloyed/allbtc";

/**
 * A: $1, 6 decimals. A2: $1, 6 decimals. B: $2, 6 decimals.
 * C: $4, 18 decimals.
 *
 * Pool 1 Balancer A/B, pool 2 Concentrated B/C, pool 3 transmuter A/A2
 * (fee free), pool 4 Stableswap A/B.
 */
export function buildTestStore(): ReferenceDataStore {
  return new ReferenceDataStore(
    [
      { denom: DENOM_A, exponent: 6, referencePriceUsd: new Decimal(1), displayName: "A" },
      { denom: DENOM_A2, exponent: 6, referencePriceUsd: new Decimal(1), displayName: "A2" },
      { denom: DENOM_B, exponent: 6, referencePriceUsd: new Decimal(2), displayName: "B" },
      { denom: DENOM_C, exponent: 18, referencePriceUsd: new Decimal(4), displayName: "C" },
      { denom: DENOM_UNPRICED, exponent: 6, displayName: "Unpriced" },
    ],
    [
      {
        id: "1",
        type: PoolType.Balancer,
        tokens: [DENOM_A, DENOM_B],
        liquidityUsd: 1_000_000,
        swapFee: new Decimal("0.002"),
        takerFee: new Decimal("0.001"),
      },
      {
        id: "2",
        type: PoolType.Concentrated,
        tokens: [DENOM_B, DENOM_C],
        liquidityUsd: 200_000,
        swapFee: new Decimal("0.0005"),
        takerFee: new Decimal("0.001"),
      },
      {
        id: "3",
        type: PoolType.CosmWasmTransmuterV1,
        tokens: [DENOM_A, DENOM_A2],
        liquidityUsd: 40_000,
        swapFee: new Decimal(0),
        takerFee: new Decimal(0),
        codeId: 148,
      },
      {
        id: "4",
        type: PoolType.Stableswap,
        tokens: [DENOM_A, DENOM_B],
        liquidityUsd: 60_000,
        swapFee: new Decimal(0),
        takerFee: new Decimal(0),
      },
    ],
    [],
    new Date("2026-01-01T00:00:00.000Z"),
  );
}

export const testSettings = (env: NodeJS.ProcessEnv = {}) =>
  loadVerificationSettings(env);

export function buildVerifier(env: NodeJS.ProcessEnv = {}): QuoteVerifier {
  const settings = testSettings(env);
  const classifier = new PoolClassifier(settings);
  return new QuoteVerifier(
    settings,
    new ExpectedValueCalculator(),
    new ToleranceModel(settings),
    new RouteValidator(settings, classifier),
    new FeeValidator(),
  );
}

interface ExactInResponseOptions {
  amountIn?: string;
  denomIn?: string;
  amountOut?: string;
  pools?: Array<{ id: string | number; token_out_denom?: string }>;
  spot?: string;
  priceImpact?: string;
  effectiveFee?: string;
}

/** Router /router/quote body for a token-in-specified quote */
export function exactInResponse(options: ExactInResponseOptions = {}) {
  const amountIn = options.amountIn ?? "1000000";
  const amountOut = options.amountOut ?? "495000";
  return {
    amount_in: { denom: options.denomIn ?? DENOM_A, amount: amountIn },
    amount_out: amountOut,
    route: [
      {
        pools: options.pools ?? [
          { id: 1, type: 0, spread_factor: "0.002", taker_fee: "0.001", token_out_denom: DENOM_B },
        ],
        in_amount: amountIn,
        out_amount: amountOut,
      },
    ],
    effective_fee: options.effectiveFee ?? "0.002",
    price_impact: options.priceImpact ?? "-0.01",
    in_base_out_quote_spot_price: options.spot ?? "0.495",
  };
}

interface ExactOutResponseOptions {
  amountIn?: string;
  amountOut?: string;
  denomOut?: string;
  pools?: Array<{ id: string | number; token_in_denom?: string }>;
  spot?: string;
  priceImpact?: string;
  effectiveFee?: string;
}

/** Router /router/quote body for a token-out-specified quote */
export function exactOutResponse(options: ExactOutResponseOptions = {}) {
  const amountIn = options.amountIn ?? "2020000";
  const amountOut = options.amountOut ?? "1000000";
  return {
    amount_in: amountIn,
    amount_out: { denom: options.denomOut ?? DENOM_B, amount: amountOut },
    route: [
      {
        pools: options.pools ?? [{ id: "1", token_in_denom: DENOM_A }],
        in_amount: amountIn,
        out_amount: amountOut,
      },
    ],
    effective_fee: options.effectiveFee ?? "0.002",
    price_impact: options.priceImpact ?? "-0.01",
    in_base_out_quote_spot_price: options.spot ?? "2.02",
  };
}
