import { IsNotEmpty, IsString } from "class-validator";

export class CandidateRoutesQuery {
  @IsString()
  @IsNotEmpty()
  denomIn!: string;

  @IsString()
  @IsNotEmpty()
  denomOut!: string;
}
