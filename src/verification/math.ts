import Decimal from "decimal.js";

// Router amounts reach 10^20 and above; keep enough digits for exact ratios.
Decimal.set({ precision: 40, rounding: Decimal.ROUND_HALF_EVEN });

/**
 * |a - b| / max(|a|, |b|). Zero when both values are zero.
 */
export function relativeError(a: Decimal.Value, b: Decimal.Value): Decimal {
  const x = new Decimal(a);
  const y = new Decimal(b);
  const denominator = Decimal.max(x.abs(), y.abs());
  if (denominator.isZero()) return new Decimal(0);
  return x.minus(y).abs().div(denominator);
}

export const pow10 = (exponent: number): Decimal =>
  new Decimal(10).pow(exponent);

export { Decimal };
