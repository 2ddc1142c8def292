import { Transform, Type } from "class-transformer";
import {
  ArrayNotEmpty,
  IsArray,
  IsInt,
  IsOptional,
  IsString,
  Matches,
  ValidateNested,
} from "class-validator";
import { numberToString } from "./validate";

const RAW_AMOUNT = /^[0-9]+$/;
const DECIMAL = /^-?[0-9]+(\.[0-9]+)?$/;

export class CoinDto {
  @IsString()
  denom!: string;

  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  amount!: string;
}

export class RouterPoolDto {
  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  id!: string;

  @IsOptional()
  @IsInt()
  type?: number;

  @IsOptional()
  @Transform(numberToString)
  @Matches(DECIMAL)
  spread_factor?: string;

  @IsOptional()
  @Transform(numberToString)
  @Matches(DECIMAL)
  taker_fee?: string;

  /** Set on exact-out hops */
  @IsOptional()
  @IsString()
  token_in_denom?: string;

  /** Set on exact-in hops */
  @IsOptional()
  @IsString()
  token_out_denom?: string;

  @IsOptional()
  @IsInt()
  code_id?: number;
}

export class RouterRouteDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => RouterPoolDto)
  pools!: RouterPoolDto[];

  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  in_amount!: string;

  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  out_amount!: string;
}

class RouterQuoteBase {
  @IsArray()
  @ArrayNotEmpty()
  @ValidateNested({ each: true })
  @Type(() => RouterRouteDto)
  route!: RouterRouteDto[];

  @Transform(numberToString)
  @Matches(DECIMAL)
  effective_fee!: string;

  @Transform(numberToString)
  @Matches(DECIMAL)
  price_impact!: string;

  @Transform(numberToString)
  @Matches(DECIMAL)
  in_base_out_quote_spot_price!: string;
}

/** /router/quote and /router/custom-direct-quote, token in specified */
export class ExactAmountInQuoteResponse extends RouterQuoteBase {
  @ValidateNested()
  @Type(() => CoinDto)
  amount_in!: CoinDto;

  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  amount_out!: string;
}

/** /router/quote and /router/custom-direct-quote, token out specified */
export class ExactAmountOutQuoteResponse extends RouterQuoteBase {
  @Transform(numberToString)
  @Matches(RAW_AMOUNT)
  amount_in!: string;

  @ValidateNested()
  @Type(() => CoinDto)
  amount_out!: CoinDto;
}

export type RouterQuoteResponse =
  | ExactAmountInQuoteResponse
  | ExactAmountOutQuoteResponse;
