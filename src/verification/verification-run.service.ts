import {
  BadGatewayException,
  Injectable,
  Logger,
  ServiceUnavailableException,
} from "@nestjs/common";
import { v4 as uuidv4 } from "uuid";
import { QuoteRunRequest } from "src/dto/QuoteRunRequest";
import {
  CandidateRoutesReport,
  LiquidityCapRunReport,
  TokenPriceRunReport,
  VerificationReport,
} from "src/dto/VerificationReport";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { ReferenceSnapshotService } from "src/reference-data/reference-snapshot.service";
import { RouterClient, RouterRequestError } from "src/routing/router.client";
import { ReferenceSummary } from "src/types/reference/snapshot";
import { LiquidityCapValidator } from "./liquidity-cap.service";
import { Decimal } from "./math";
import { QuoteVerifier } from "./quote-verifier.service";
import { RouteValidator } from "./route-validator.service";
import { TokenPriceValidator } from "./token-price.service";

const POOLS_PER_REQUEST = 100;
const TOKENS_PER_REQUEST = 50;

/**
 * Drives verification runs: loads the reference store, talks to the router
 * and hands both to the checks.
 */
@Injectable()
export class VerificationRunService {
  private readonly logger = new Logger(VerificationRunService.name);

  constructor(
    private readonly snapshots: ReferenceSnapshotService,
    private readonly router: RouterClient,
    private readonly verifier: QuoteVerifier,
    private readonly routeValidator: RouteValidator,
    private readonly liquidityCaps: LiquidityCapValidator,
    private readonly tokenPrices: TokenPriceValidator,
  ) {}

  /** Verifies a router response supplied by the caller */
  async verifySupplied(
    dto: QuoteRunRequest,
    rawQuote: unknown,
  ): Promise<VerificationReport> {
    const store = await this.store();
    return this.report(dto, store, rawQuote, false);
  }

  /** Fetches a quote from the router and verifies it */
  async run(dto: QuoteRunRequest): Promise<VerificationReport> {
    const store = await this.store();
    const rawQuote = await this.fromRouter(() =>
      this.router.getQuote(dto.toQuoteRequest()),
    );
    return this.report(dto, store, rawQuote, true);
  }

  async checkCandidateRoutes(
    denomIn: string,
    denomOut: string,
  ): Promise<CandidateRoutesReport> {
    const runId = uuidv4();
    const store = await this.store();
    const [routes, config] = await this.fromRouter(() =>
      Promise.all([
        this.router.getCandidateRoutes(denomIn, denomOut),
        this.router.getConfig(),
      ]),
    );

    const failures = this.routeValidator.validateCandidateRoutes(
      store,
      routes,
      denomIn,
      denomOut,
      { minRoutes: 1, maxRoutes: config.maxRoutes },
    );
    this.logger.log(
      `[${runId}] candidate routes ${denomIn} -> ${denomOut}: ${routes.length} route(s), ${failures.length} failure(s)`,
    );
    return {
      runId,
      denomIn,
      denomOut,
      routeCount: routes.length,
      maxRoutes: config.maxRoutes,
      passed: failures.length === 0,
      failures,
    };
  }

  async checkLiquidityCaps(): Promise<LiquidityCapRunReport> {
    const runId = uuidv4();
    const store = await this.store();
    const poolIds = this.liquidityCaps.eligiblePools(store).map((pool) => pool.id);

    const caps = new Map<string, Decimal>();
    for (let i = 0; i < poolIds.length; i += POOLS_PER_REQUEST) {
      const batch = poolIds.slice(i, i + POOLS_PER_REQUEST);
      const pools = await this.fromRouter(() => this.router.getPools(batch));
      for (const pool of pools) caps.set(pool.poolId, pool.liquidityCap);
    }

    const report = this.liquidityCaps.validate(store, caps);
    this.logger.log(
      `[${runId}] liquidity caps: ${report.passed ? "passed" : "failed"}`,
    );
    return { runId, verifiedAt: new Date().toISOString(), report };
  }

  async checkTokenPrices(): Promise<TokenPriceRunReport> {
    const runId = uuidv4();
    const store = await this.store();
    const denoms = store.listDenoms().map((denom) => denom.denom);
    const quoteDenom = this.tokenPrices.quoteDenom;

    const prices = new Map<string, Decimal>();
    for (let i = 0; i < denoms.length; i += TOKENS_PER_REQUEST) {
      const batch = denoms.slice(i, i + TOKENS_PER_REQUEST);
      const batchPrices = await this.fromRouter(() =>
        this.router.getTokenPrices(batch, quoteDenom),
      );
      for (const [denom, price] of batchPrices) prices.set(denom, price);
    }

    const report = this.tokenPrices.validate(store, prices);
    this.logger.log(
      `[${runId}] token prices: ${report.passed ? "passed" : "failed"}`,
    );
    return { runId, verifiedAt: new Date().toISOString(), report };
  }

  async referenceSummary(): Promise<ReferenceSummary> {
    return (await this.store()).summary();
  }

  private report(
    dto: QuoteRunRequest,
    store: ReferenceDataStore,
    rawQuote: unknown,
    includeQuote: boolean,
  ): VerificationReport {
    const runId = uuidv4();
    const verdict = this.verifier.verifyRaw(dto.toQuoteRequest(), rawQuote, store);
    const summary = `${dto.direction} ${dto.amount} ${dto.denomIn} -> ${dto.denomOut}`;
    if (verdict.passed) {
      this.logger.log(`[${runId}] ${summary}: passed`);
    } else {
      this.logger.warn(
        `[${runId}] ${summary}: ${verdict.failures.map((f) => `${f.check}/${f.kind}`).join(", ")}`,
      );
    }

    return {
      runId,
      verifiedAt: new Date().toISOString(),
      direction: dto.direction,
      denomIn: dto.denomIn,
      denomOut: dto.denomOut,
      amount: dto.amount,
      verdict,
      quote: includeQuote ? rawQuote : undefined,
    };
  }

  private async store(): Promise<ReferenceDataStore> {
    try {
      return await this.snapshots.getStore();
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Reference data unavailable: ${message}`);
      throw new ServiceUnavailableException(`Reference data unavailable: ${message}`);
    }
  }

  private async fromRouter<T>(call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (error) {
      if (error instanceof RouterRequestError) {
        throw new BadGatewayException({
          message: error.message,
          routerStatus: error.status,
          routerBody: error.body,
        });
      }
      throw error;
    }
  }
}
