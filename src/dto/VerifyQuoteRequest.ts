import { Type } from "class-transformer";
import { IsObject, ValidateNested } from "class-validator";
import { QuoteRunRequest } from "./QuoteRunRequest";

export class VerifyQuoteRequest {
  @ValidateNested()
  @Type(() => QuoteRunRequest)
  request!: QuoteRunRequest;

  /** Router response body as received; its shape is checked by the verifier */
  @IsObject()
  quote!: Record<string, unknown>;
}
