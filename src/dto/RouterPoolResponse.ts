import { Transform, Type } from "class-transformer";
import { IsOptional, Matches, ValidateNested } from "class-validator";
import { numberToString } from "./validate";

class ChainModelDto {
  @IsOptional()
  @Transform(numberToString)
  @Matches(/^[0-9]+$/)
  id?: string;

  @IsOptional()
  @Transform(numberToString)
  @Matches(/^[0-9]+$/)
  pool_id?: string;
}

/** Entry of the /pools listing */
export class RouterPoolResponse {
  @ValidateNested()
  @Type(() => ChainModelDto)
  chain_model!: ChainModelDto;

  @Transform(numberToString)
  @Matches(/^[0-9]+(\.[0-9]+)?$/)
  liquidity_cap!: string;
}
