import { Transform, Type } from "class-transformer";
import { IsArray, IsInt, IsOptional, IsString, Matches, Min, ValidateNested } from "class-validator";
import { numberToString } from "./validate";

export class CandidatePoolDto {
  @Transform(numberToString)
  @Matches(/^[0-9]+$/)
  ID!: string;

  @IsString()
  TokenOutDenom!: string;
}

export class CandidateRouteDto {
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CandidatePoolDto)
  Pools!: CandidatePoolDto[];
}

/** /router/routes */
export class RouterCandidateRoutesResponse {
  /** null when the router finds no route */
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => CandidateRouteDto)
  Routes?: CandidateRouteDto[] | null;
}

class RouterSettingsDto {
  @IsInt()
  @Min(1)
  MaxRoutes!: number;
}

/** /config, only the fields the verifier reads */
export class RouterConfigResponse {
  @ValidateNested()
  @Type(() => RouterSettingsDto)
  Router!: RouterSettingsDto;
}
