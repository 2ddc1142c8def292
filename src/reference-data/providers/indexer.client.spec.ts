import { httpError, stubHttp } from "src/testing/http-stub";
import { IndexerPool } from "src/types/reference/indexer";
import { IndexerClient } from "./indexer.client";

const pool = (id: number): IndexerPool => ({
  pool_id: id,
  type: "osmosis.gamm.v1beta1.Pool",
  pool_tokens: [{ denom: "uosmo" }, { denom: "uatom" }],
  liquidity: 1000,
});

describe("IndexerClient", () => {
  it("should fetch the token listing", async () => {
    const { http, requests } = stubHttp(() => [
      { denom: "uosmo", exponent: 6, price: 0.5 },
    ]);
    const tokens = await new IndexerClient(http).fetchTokens();
    expect(tokens).toEqual([{ denom: "uosmo", exponent: 6, price: 0.5 }]);
    expect(requests[0]?.url).toBe("/tokens/v2/all");
  });

  it("should follow pool pagination until there is no next offset", async () => {
    const { http, requests } = stubHttp((config) =>
      config.params.offset === 0
        ? { pools: [pool(1), pool(2)], pagination: { next_offset: 2 } }
        : { pools: [pool(3)], pagination: { next_offset: null } },
    );
    const pools = await new IndexerClient(http).fetchPools();
    expect(pools.map((p) => p.pool_id)).toEqual([1, 2, 3]);
    expect(requests.map((r) => r.params)).toEqual([
      { offset: 0, limit: 100 },
      { offset: 2, limit: 100 },
    ]);
  });

  it("should stop on an empty page", async () => {
    const { http, requests } = stubHttp(() => ({
      pools: [],
      pagination: { next_offset: 100 },
    }));
    await expect(new IndexerClient(http).fetchPools()).resolves.toEqual([]);
    expect(requests).toHaveLength(1);
  });

  it("should rethrow transport errors", async () => {
    const { http } = stubHttp((config) => {
      throw httpError(config, 503, "unavailable");
    });
    await expect(new IndexerClient(http).fetchTokens()).rejects.toThrow(
      "Request failed with status code 503",
    );
  });
});
