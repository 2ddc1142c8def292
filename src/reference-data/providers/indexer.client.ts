import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import axios, { AxiosInstance } from "axios";
import { ServicesSettings } from "src/config/services.config";
import {
  IndexerPool,
  IndexerPoolPage,
  IndexerToken,
} from "src/types/reference/indexer";

export const INDEXER_HTTP = "INDEXER_HTTP";

const POOL_PAGE_SIZE = 100;

export const indexerHttpProvider = {
  provide: INDEXER_HTTP,
  useFactory: (config: ConfigService): AxiosInstance => {
    const { indexer } = config.getOrThrow<ServicesSettings>("services");
    return axios.create({ baseURL: indexer.url, timeout: indexer.timeoutMs });
  },
  inject: [ConfigService],
};

/**
 * Chain-indexing service: token prices and pool listings used to build
 * the reference data.
 */
@Injectable()
export class IndexerClient {
  private readonly logger = new Logger(IndexerClient.name);

  constructor(@Inject(INDEXER_HTTP) private readonly http: AxiosInstance) {}

  async fetchTokens(): Promise<IndexerToken[]> {
    try {
      const { data } = await this.http.get<IndexerToken[]>("/tokens/v2/all");
      this.logger.log(`Fetched ${data.length} tokens`);
      return data;
    } catch (error) {
      this.logFailure("tokens", error);
      throw error;
    }
  }

  /** Walks the offset pagination until the indexer reports no next page */
  async fetchPools(): Promise<IndexerPool[]> {
    const pools: IndexerPool[] = [];
    let offset: number | null | undefined = 0;

    try {
      while (offset !== null && offset !== undefined) {
        const { data }: { data: IndexerPoolPage } =
          await this.http.get<IndexerPoolPage>("/stream/pool/v1/all", {
            params: { offset, limit: POOL_PAGE_SIZE },
          });
        const page: IndexerPool[] = data.pools ?? [];
        pools.push(...page);
        const next: number | null | undefined = data.pagination?.next_offset;
        // An empty page with a next offset would loop forever.
        offset = page.length > 0 && next !== offset ? next : null;
      }
    } catch (error) {
      this.logFailure("pools", error);
      throw error;
    }

    this.logger.log(`Fetched ${pools.length} pools`);
    return pools;
  }

  private logFailure(resource: string, error: unknown): void {
    if (axios.isAxiosError(error)) {
      this.logger.error(
        `HTTP error fetching ${resource} from indexer: ${error.message}`,
      );
    } else if (error instanceof Error) {
      this.logger.error(
        `Unexpected error fetching ${resource} from indexer: ${error.message}`,
      );
    }
  }
}
