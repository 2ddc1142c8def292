import Decimal from "decimal.js";

export interface DenomInfo {
  /** Chain denom, e.g. "uosmo" or an ibc/... hash */
  denom: string;
  /** Decimal places between the raw unit and the display unit */
  exponent: number;
  /** USD price of one display unit. Absent when the price service has none */
  referencePriceUsd?: Decimal;
  displayName: string;
  liquidityUsd?: number;
  volume24hUsd?: number;
}
