import { Body, Controller, Get, HttpCode, Post, Query } from "@nestjs/common";
import { CandidateRoutesQuery } from "src/dto/CandidateRoutesQuery";
import { QuoteRunRequest } from "src/dto/QuoteRunRequest";
import {
  CandidateRoutesReport,
  LiquidityCapRunReport,
  TokenPriceRunReport,
  VerificationReport,
} from "src/dto/VerificationReport";
import { VerifyQuoteRequest } from "src/dto/VerifyQuoteRequest";
import { ReferenceSummary } from "src/types/reference/snapshot";
import { VerificationRunService } from "./verification-run.service";

@Controller("verification")
export class VerificationController {
  constructor(private readonly runs: VerificationRunService) {}

  /**
   * Verifies a router response the caller already has.
   * Example: POST /verification/quote {"request": {...}, "quote": {...}}
   */
  @Post("quote")
  @HttpCode(200)
  async verifyQuote(@Body() body: VerifyQuoteRequest): Promise<VerificationReport> {
    return this.runs.verifySupplied(body.request, body.quote);
  }

  /** Fetches the quote from the router, then verifies it */
  @Post("run")
  @HttpCode(200)
  async runQuote(@Body() request: QuoteRunRequest): Promise<VerificationReport> {
    return this.runs.run(request);
  }

  /** Example: GET /verification/candidate-routes?denomIn=uosmo&denomOut=uatom */
  @Get("candidate-routes")
  async candidateRoutes(
    @Query() query: CandidateRoutesQuery,
  ): Promise<CandidateRoutesReport> {
    return this.runs.checkCandidateRoutes(query.denomIn, query.denomOut);
  }

  @Get("pools/liquidity")
  async liquidityCaps(): Promise<LiquidityCapRunReport> {
    return this.runs.checkLiquidityCaps();
  }

  /** Router /tokens/prices against the reference USD prices */
  @Get("tokens/prices")
  async tokenPrices(): Promise<TokenPriceRunReport> {
    return this.runs.checkTokenPrices();
  }

  @Get("reference")
  async reference(): Promise<ReferenceSummary> {
    return this.runs.referenceSummary();
  }
}
