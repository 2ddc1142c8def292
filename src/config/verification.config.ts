import { ConfigService, registerAs } from "@nestjs/config";
import Decimal from "decimal.js";

export const VERIFICATION_SETTINGS = "VERIFICATION_SETTINGS";

/**
 * `raw-amount` keys the tolerance bands on the raw integer amount of the
 * specified token, `usd-notional` on its USD value. One policy per process.
 */
export type TolerancePolicy = "raw-amount" | "usd-notional";

export interface ToleranceBand {
  /** Inclusive lower bound */
  minAmount: Decimal;
  tolerance: Decimal;
}

export interface VerificationSettings {
  tolerancePolicy: TolerancePolicy;
  baseTolerance: Decimal;
  /** Ascending by minAmount */
  toleranceBands: ToleranceBand[];
  zeroSlippageTolerance: Decimal;
  codeIds: {
    transmuterV1: number;
    astroportPcl: number;
    orderbook: number;
  };
  /** Denoms containing this marker are not enumerated by the indexer */
  syntheticDenomMarker: string;
  priceImpactCheck: {
    maxNotionalUsd: Decimal;
    maxPriceImpact: Decimal;
  };
  liquidityCap: {
    minLiquidityUsd: number;
    tolerance: Decimal;
  };
  tokenPrices: {
    /** Quote denom the router prices tokens in (USDC) */
    quoteDenom: string;
    /** Tokens below this volume and liquidity are only checked for a price */
    minActivityUsd: number;
    lowVolumeMaxUsd: number;
    midVolumeMaxUsd: number;
    lowActivityTolerance: Decimal;
    midVolumeTolerance: Decimal;
    highVolumeTolerance: Decimal;
    maxUnsupportedTokens: number;
  };
  tokenBlacklist: string[];
  poolBlacklist: string[];
}

export const USDC_DENOM =
  "ibc/498A0751C798A0D9A389AA3691123DADA57DAA4FE165D5C75894505B876BA6E4";

const DEFAULT_TOLERANCE_BANDS = "10000000000:0.10,30000000000:0.13,60000000000:0.16";

const parseList = (value: string | undefined): string[] =>
  (value ?? "")
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);

export function parseToleranceBands(value: string): ToleranceBand[] {
  return parseList(value)
    .map((entry) => {
      const [minAmount, tolerance] = entry.split(":");
      if (minAmount === undefined || tolerance === undefined) {
        throw new Error(`Invalid tolerance band "${entry}", expected <amount>:<tolerance>`);
      }
      return {
        minAmount: new Decimal(minAmount),
        tolerance: new Decimal(tolerance),
      };
    })
    .sort((a, b) => a.minAmount.comparedTo(b.minAmount));
}

function parsePolicy(value: string | undefined): TolerancePolicy {
  if (value === undefined || value === "" || value === "raw-amount") {
    return "raw-amount";
  }
  if (value === "usd-notional") return "usd-notional";
  throw new Error(`Unknown TOLERANCE_POLICY "${value}"`);
}

function parseInteger(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new Error(`Expected an integer, got "${value}"`);
  }
  return parsed;
}

export function loadVerificationSettings(
  env: NodeJS.ProcessEnv,
): VerificationSettings {
  return {
    tolerancePolicy: parsePolicy(env.TOLERANCE_POLICY),
    baseTolerance: new Decimal(env.BASE_TOLERANCE || "0.07"),
    toleranceBands: parseToleranceBands(
      env.TOLERANCE_BANDS || DEFAULT_TOLERANCE_BANDS,
    ),
    zeroSlippageTolerance: new Decimal(env.ZERO_SLIPPAGE_TOLERANCE || "0.05"),
    codeIds: {
      transmuterV1: parseInteger(env.TRANSMUTER_V1_CODE_ID, 148),
      astroportPcl: parseInteger(env.ASTROPORT_PCL_CODE_ID, 773),
      orderbook: parseInteger(env.ORDERBOOK_CODE_ID, 885),
    },
    syntheticDenomMarker: env.SYNTHETIC_DENOM_MARKER || "/alloyed/",
    priceImpactCheck: {
      maxNotionalUsd: new Decimal(
        env.PRICE_IMPACT_CHECK_MAX_NOTIONAL_USD || "5000",
      ),
      maxPriceImpact: new Decimal(env.PRICE_IMPACT_CHECK_MAX_IMPACT || "0.5"),
    },
    liquidityCap: {
      minLiquidityUsd: parseInteger(env.LIQUIDITY_CAP_MIN_USD, 50_000),
      tolerance: new Decimal(env.LIQUIDITY_CAP_TOLERANCE || "0.07"),
    },
    tokenPrices: {
      quoteDenom: env.PRICE_QUOTE_DENOM || USDC_DENOM,
      minActivityUsd: parseInteger(env.TOKEN_PRICE_MIN_ACTIVITY_USD, 5_000),
      lowVolumeMaxUsd: parseInteger(env.TOKEN_PRICE_LOW_VOLUME_MAX_USD, 10_000),
      midVolumeMaxUsd: parseInteger(env.TOKEN_PRICE_MID_VOLUME_MAX_USD, 15_000),
      lowActivityTolerance: new Decimal(env.TOKEN_PRICE_LOW_ACTIVITY_TOLERANCE || "0.08"),
      midVolumeTolerance: new Decimal(env.TOKEN_PRICE_MID_VOLUME_TOLERANCE || "0.05"),
      highVolumeTolerance: new Decimal(env.TOKEN_PRICE_HIGH_VOLUME_TOLERANCE || "0.02"),
      maxUnsupportedTokens: parseInteger(env.TOKEN_PRICE_MAX_UNSUPPORTED, 10),
    },
    tokenBlacklist: parseList(env.TOKEN_BLACKLIST),
    poolBlacklist: parseList(env.POOL_BLACKLIST),
  };
}

export default registerAs("verification", () =>
  loadVerificationSettings(process.env),
);

export const verificationSettingsProvider = {
  provide: VERIFICATION_SETTINGS,
  useFactory: (config: ConfigService): VerificationSettings =>
    config.getOrThrow<VerificationSettings>("verification"),
  inject: [ConfigService],
};
