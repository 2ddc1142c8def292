export enum FailureKind {
  MissingReferenceData = "MissingReferenceData",
  UnknownPoolType = "UnknownPoolType",
  MalformedQuote = "MalformedQuote",
  RouteStructureViolation = "RouteStructureViolation",
  ToleranceExceeded = "ToleranceExceeded",
  UnexpectedZeroFee = "UnexpectedZeroFee",
  PriceImpactSignViolation = "PriceImpactSignViolation",
  PriceImpactThresholdExceeded = "PriceImpactThresholdExceeded",
  EchoMismatch = "EchoMismatch",
  UnsupportedToken = "UnsupportedToken",
}

export type VerificationCheck =
  | "reference"
  | "classification"
  | "quote"
  | "route"
  | "priceImpact"
  | "spotPrice"
  | "amount"
  | "fee"
  | "echo"
  | "liquidityCap"
  | "tokenPrice";

export enum VerificationStage {
  Received = "Received",
  ExpectedComputed = "ExpectedComputed",
  ToleranceSelected = "ToleranceSelected",
  RouteChecked = "RouteChecked",
  FeeChecked = "FeeChecked",
  Verdicted = "Verdicted",
}

export interface CheckFailure {
  check: VerificationCheck;
  kind: FailureKind;
  message: string;
  details?: Record<string, string>;
}

export interface VerdictDiagnostics {
  expectedUnitPrice: string;
  expectedCounterAmount: string;
  scalingFactor: string;
  notionalUsd: string;
  tolerance: string;
  widenedTolerance: string;
  isZeroSlippage: boolean;
}

export interface Verdict {
  passed: boolean;
  /** Last stage reached; earlier than Verdicted when a precondition failed */
  stage: VerificationStage;
  failures: CheckFailure[];
  diagnostics?: VerdictDiagnostics;
}
