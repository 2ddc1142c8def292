import { CheckFailure, Verdict } from "src/types/verification/verdict";
import { LiquidityCapReport } from "src/verification/liquidity-cap.service";
import { TokenPriceReport } from "src/verification/token-price.service";

export interface VerificationReport {
  runId: string;
  verifiedAt: string;
  direction: string;
  denomIn: string;
  denomOut: string;
  amount: string;
  verdict: Verdict;
  /** Router response, present when the quote was fetched by the service */
  quote?: unknown;
}

export interface CandidateRoutesReport {
  runId: string;
  denomIn: string;
  denomOut: string;
  routeCount: number;
  maxRoutes: number;
  passed: boolean;
  failures: CheckFailure[];
}

export interface LiquidityCapRunReport {
  runId: string;
  verifiedAt: string;
  report: LiquidityCapReport;
}

export interface TokenPriceRunReport {
  runId: string;
  verifiedAt: string;
  report: TokenPriceReport;
}
