import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import Decimal from "decimal.js";
import { ServicesSettings } from "src/config/services.config";
import {
  RouterCandidateRoutesResponse,
  RouterConfigResponse,
} from "src/dto/RouterCandidateRoutesResponse";
import { RouterPoolResponse } from "src/dto/RouterPoolResponse";
import { validatePlain } from "src/dto/validate";
import {
  QuoteRequest,
  isDirectQuote,
  pinnedHopDenoms,
} from "src/types/verification/quote";
import { CandidateRoute } from "src/types/verification/route";

export const ROUTER_HTTP = "ROUTER_HTTP";

export const routerHttpProvider = {
  provide: ROUTER_HTTP,
  useFactory: (config: ConfigService): AxiosInstance => {
    const { router } = config.getOrThrow<ServicesSettings>("services");
    return axios.create({
      baseURL: router.url,
      timeout: router.timeoutMs,
      headers: router.apiKey ? { "x-api-key": router.apiKey } : undefined,
    });
  },
  inject: [ConfigService],
};

/** Transport failure or non-2xx answer from the router */
export class RouterRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
    readonly body?: unknown,
  ) {
    super(message);
    this.name = RouterRequestError.name;
  }
}

const PRICE = /^-?[0-9]+(\.[0-9]+)?([eE][-+]?[0-9]+)?$/;

function toPrice(value: unknown): Decimal | undefined {
  if (typeof value === "number" && Number.isFinite(value)) return new Decimal(value);
  if (typeof value === "string" && PRICE.test(value)) return new Decimal(value);
  return undefined;
}

export interface RouterConfig {
  maxRoutes: number;
}

export interface RouterPoolLiquidity {
  poolId: string;
  liquidityCap: Decimal;
}

/**
 * HTTP client for the router under test. Quotes are returned unparsed so
 * the verifier can report shape problems as verdict failures. No retries.
 */
@Injectable()
export class RouterClient {
  private readonly logger = new Logger(RouterClient.name);

  constructor(@Inject(ROUTER_HTTP) private readonly http: AxiosInstance) {}

  async getQuote(request: QuoteRequest): Promise<unknown> {
    const direct = isDirectQuote(request);
    // The custom quote endpoint takes one counter denom per pinned pool.
    const counterDenoms = direct
      ? pinnedHopDenoms(request).join(",")
      : request.direction === "exact-in"
        ? request.denomOut
        : request.denomIn;
    const params: Record<string, string> =
      request.direction === "exact-in"
        ? {
            tokenIn: `${request.amountIn.toFixed(0)}${request.denomIn}`,
            tokenOutDenom: counterDenoms,
          }
        : {
            tokenOut: `${request.amountOut.toFixed(0)}${request.denomOut}`,
            tokenInDenom: counterDenoms,
          };

    if (direct) {
      params.poolID = (request.poolIds ?? []).join(",");
      return this.get("/router/custom-direct-quote", params);
    }
    return this.get("/router/quote", params);
  }

  async getCandidateRoutes(
    denomIn: string,
    denomOut: string,
  ): Promise<CandidateRoute[]> {
    const raw = await this.get("/router/routes", {
      tokenIn: denomIn,
      tokenOutDenom: denomOut,
    });
    const { Routes } = this.expect(RouterCandidateRoutesResponse, raw, "/router/routes");
    return (Routes ?? []).map((route) => ({
      pools: route.Pools.map((pool) => ({
        poolId: pool.ID,
        tokenOutDenom: pool.TokenOutDenom,
      })),
    }));
  }

  async getConfig(): Promise<RouterConfig> {
    const raw = await this.get("/config");
    const { Router } = this.expect(RouterConfigResponse, raw, "/config");
    return { maxRoutes: Router.MaxRoutes };
  }

  async getPools(poolIds: string[]): Promise<RouterPoolLiquidity[]> {
    const raw = await this.get("/pools", { IDs: poolIds.join(",") });
    if (!Array.isArray(raw)) {
      throw new RouterRequestError("Unexpected /pools response", undefined, raw);
    }
    return raw.flatMap((entry: unknown) => {
      const pool = this.expect(RouterPoolResponse, entry, "/pools");
      const poolId = pool.chain_model.id ?? pool.chain_model.pool_id;
      if (poolId === undefined) {
        this.logger.warn("Skipping /pools entry without an id");
        return [];
      }
      return [{ poolId, liquidityCap: new Decimal(pool.liquidity_cap) }];
    });
  }

  /**
   * Router prices of the given tokens in `quoteDenom`. Tokens the router
   * leaves out, or prices it cannot express as a number, are absent.
   */
  async getTokenPrices(
    denoms: string[],
    quoteDenom: string,
  ): Promise<Map<string, Decimal>> {
    const raw = await this.get("/tokens/prices", {
      base: denoms.join(","),
      humanDenoms: "false",
    });
    if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
      throw new RouterRequestError("Unexpected /tokens/prices response", undefined, raw);
    }

    const prices = new Map<string, Decimal>();
    const entries: [string, unknown][] = Object.entries(raw);
    for (const [denom, quotes] of entries) {
      if (typeof quotes !== "object" || quotes === null) continue;
      const value = new Map<string, unknown>(Object.entries(quotes)).get(quoteDenom);
      const price = toPrice(value);
      if (price) {
        prices.set(denom, price);
      } else if (value !== undefined) {
        this.logger.warn(`Ignoring unreadable price for ${denom}: ${String(value)}`);
      }
    }
    return prices;
  }

  private async get(path: string, params?: Record<string, string>): Promise<unknown> {
    try {
      const { data } = await this.http.get<unknown>(path, { params });
      return data;
    } catch (error) {
      if (axios.isAxiosError(error)) {
        this.logger.error(`Router ${path} failed: ${error.message}`);
        throw new RouterRequestError(
          `Router ${path} failed: ${error.message}`,
          error.response?.status,
          error.response?.data,
        );
      }
      throw error;
    }
  }

  private expect<T extends object>(
    cls: new () => T,
    raw: unknown,
    path: string,
  ): T {
    const result = validatePlain(cls, raw);
    if (!result.ok) {
      throw new RouterRequestError(
        `Unexpected ${path} response: ${result.problems.join("; ")}`,
        undefined,
        raw,
      );
    }
    return result.value;
  }
}
