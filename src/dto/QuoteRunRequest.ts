import {
  ArrayNotEmpty,
  IsArray,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from "class-validator";
import Decimal from "decimal.js";
import { QuoteRequest, SwapDirection } from "src/types/verification/quote";

/** `hopDenoms` must name one denom per pinned pool; one pool may omit it */
@ValidatorConstraint({ name: "hopDenomsMatchPools" })
class HopDenomsMatchPools implements ValidatorConstraintInterface {
  validate(_value: unknown, args: ValidationArguments): boolean {
    if (!(args.object instanceof QuoteRunRequest)) return false;
    const { poolIds, hopDenoms } = args.object;
    if (hopDenoms === undefined) return (poolIds?.length ?? 0) <= 1;
    return poolIds !== undefined && poolIds.length === hopDenoms.length;
  }

  defaultMessage(): string {
    return "hopDenoms must list one denom per pool in poolIds";
  }
}

export class QuoteRunRequest {
  @IsIn(["exact-in", "exact-out"])
  direction!: SwapDirection;

  @IsString()
  @IsNotEmpty()
  denomIn!: string;

  @IsString()
  @IsNotEmpty()
  denomOut!: string;

  /** Raw integer amount of the specified token (in for exact-in, out for exact-out) */
  @Matches(/^[1-9][0-9]*$/, { message: "amount must be a positive integer string" })
  amount!: string;

  /** Pins the quote to these pools, e.g. ["1", "1263"] */
  @IsOptional()
  @IsArray()
  @ArrayNotEmpty()
  @Matches(/^[0-9]+$/, { each: true })
  @Validate(HopDenomsMatchPools)
  poolIds?: string[];

  /**
   * Counter denom of each pinned pool, in poolIds order: token out per hop
   * for exact-in, token in per hop for exact-out
   */
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  @IsNotEmpty({ each: true })
  @Validate(HopDenomsMatchPools)
  hopDenoms?: string[];

  toQuoteRequest(): QuoteRequest {
    const amount = new Decimal(this.amount);
    const base = {
      denomIn: this.denomIn,
      denomOut: this.denomOut,
      poolIds: this.poolIds,
      hopDenoms: this.hopDenoms,
    };
    return this.direction === "exact-in"
      ? { ...base, direction: "exact-in", amountIn: amount }
      : { ...base, direction: "exact-out", amountOut: amount };
  }
}
