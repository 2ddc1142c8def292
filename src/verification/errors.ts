import {
  CheckFailure,
  FailureKind,
  VerificationCheck,
} from "src/types/verification/verdict";

/**
 * Precondition failures. They stop a verification run early and are turned
 * into a single-failure verdict by the verifier.
 */
export abstract class VerificationError extends Error {
  abstract readonly kind: FailureKind;
  abstract readonly check: VerificationCheck;

  constructor(
    message: string,
    readonly details?: Record<string, string>,
  ) {
    super(message);
    this.name = new.target.name;
  }

  toFailure(): CheckFailure {
    return {
      check: this.check,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

export class MissingReferenceDataError extends VerificationError {
  readonly kind = FailureKind.MissingReferenceData;
  readonly check = "reference";
}

export class UnknownPoolTypeError extends VerificationError {
  readonly kind = FailureKind.UnknownPoolType;
  readonly check = "classification";
}

export class MalformedQuoteError extends VerificationError {
  readonly kind = FailureKind.MalformedQuote;
  readonly check = "quote";
}
