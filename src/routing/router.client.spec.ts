import Decimal from "decimal.js";
import { httpError, stubHttp } from "src/testing/http-stub";
import { RouterClient, RouterRequestError } from "./router.client";

describe("RouterClient", () => {
  describe("getQuote", () => {
    it("should request an exact-in quote", async () => {
      const { http, requests } = stubHttp(() => ({ ok: true }));
      const raw = await new RouterClient(http).getQuote({
        direction: "exact-in",
        denomIn: "uosmo",
        denomOut: "uatom",
        amountIn: new Decimal("1000000"),
      });
      expect(raw).toEqual({ ok: true });
      expect(requests[0]?.url).toBe("/router/quote");
      expect(requests[0]?.params).toEqual({
        tokenIn: "1000000uosmo",
        tokenOutDenom: "uatom",
      });
    });

    it("should request an exact-out quote", async () => {
      const { http, requests } = stubHttp(() => ({}));
      await new RouterClient(http).getQuote({
        direction: "exact-out",
        denomIn: "uosmo",
        denomOut: "uatom",
        amountOut: new Decimal("25000000000"),
      });
      expect(requests[0]?.params).toEqual({
        tokenOut: "25000000000uatom",
        tokenInDenom: "uosmo",
      });
    });

    it("should use the custom direct quote endpoint for pinned pools", async () => {
      const { http, requests } = stubHttp(() => ({}));
      await new RouterClient(http).getQuote({
        direction: "exact-in",
        denomIn: "uosmo",
        denomOut: "uatom",
        amountIn: new Decimal(5),
        poolIds: ["1", "1135"],
        hopDenoms: ["uion", "uatom"],
      });
      expect(requests[0]?.url).toBe("/router/custom-direct-quote");
      expect(requests[0]?.params).toEqual({
        tokenIn: "5uosmo",
        tokenOutDenom: "uion,uatom",
        poolID: "1,1135",
      });
    });

    it("should send one token in denom per pinned pool for exact-out", async () => {
      const { http, requests } = stubHttp(() => ({}));
      await new RouterClient(http).getQuote({
        direction: "exact-out",
        denomIn: "uosmo",
        denomOut: "uatom",
        amountOut: new Decimal(7),
        poolIds: ["1135", "1"],
        hopDenoms: ["uion", "uosmo"],
      });
      expect(requests[0]?.params).toEqual({
        tokenOut: "7uatom",
        tokenInDenom: "uion,uosmo",
        poolID: "1135,1",
      });
    });

    it("should default the hop denom of a single pinned pool", async () => {
      const { http, requests } = stubHttp(() => ({}));
      await new RouterClient(http).getQuote({
        direction: "exact-out",
        denomIn: "uosmo",
        denomOut: "uatom",
        amountOut: new Decimal(7),
        poolIds: ["1"],
      });
      expect(requests[0]?.params).toEqual({
        tokenOut: "7uatom",
        tokenInDenom: "uosmo",
        poolID: "1",
      });
    });

    it("should refuse several pinned pools without their hop denoms", async () => {
      const { http, requests } = stubHttp(() => ({}));
      await expect(
        new RouterClient(http).getQuote({
          direction: "exact-in",
          denomIn: "uosmo",
          denomOut: "uatom",
          amountIn: new Decimal(5),
          poolIds: ["1", "1135"],
        }),
      ).rejects.toThrow("Quote pinned to 2 pool(s) has 0 hop denom(s)");
      expect(requests).toHaveLength(0);
    });

    it("should surface HTTP failures with status and body", async () => {
      const { http } = stubHttp((config) => {
        throw httpError(config, 400, { message: "no route found" });
      });
      const error = await new RouterClient(http)
        .getQuote({
          direction: "exact-in",
          denomIn: "uosmo",
          denomOut: "uatom",
          amountIn: new Decimal(1),
        })
        .catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(RouterRequestError);
      expect(error).toMatchObject({
        status: 400,
        body: { message: "no route found" },
      });
    });
  });

  it("should map candidate routes", async () => {
    const { http, requests } = stubHttp(() => ({
      Routes: [
        { Pools: [{ ID: 1, TokenOutDenom: "uatom" }] },
        { Pools: [{ ID: 1135, TokenOutDenom: "uatom" }] },
      ],
      UniquePoolIDs: { 1: {}, 1135: {} },
    }));
    const routes = await new RouterClient(http).getCandidateRoutes("uosmo", "uatom");
    expect(routes).toEqual([
      { pools: [{ poolId: "1", tokenOutDenom: "uatom" }] },
      { pools: [{ poolId: "1135", tokenOutDenom: "uatom" }] },
    ]);
    expect(requests[0]?.params).toEqual({ tokenIn: "uosmo", tokenOutDenom: "uatom" });
  });

  it("should treat missing candidate routes as none", async () => {
    const { http } = stubHttp(() => ({ Routes: null }));
    await expect(new RouterClient(http).getCandidateRoutes("uosmo", "uosmo")).resolves.toEqual([]);
  });

  it("should read the maximum route count from the config", async () => {
    const { http } = stubHttp(() => ({ Router: { MaxRoutes: 5, MaxPoolsPerRoute: 4 } }));
    await expect(new RouterClient(http).getConfig()).resolves.toEqual({ maxRoutes: 5 });
  });

  it("should reject an unexpected config shape", async () => {
    const { http } = stubHttp(() => ({ Router: {} }));
    await expect(new RouterClient(http).getConfig()).rejects.toThrow(RouterRequestError);
  });

  it("should read pool liquidity caps", async () => {
    const { http, requests } = stubHttp(() => [
      { chain_model: { id: 1 }, liquidity_cap: "120000" },
      { chain_model: { pool_id: "1212" }, liquidity_cap: 3000 },
      { chain_model: {}, liquidity_cap: "1" },
    ]);
    const pools = await new RouterClient(http).getPools(["1", "1212"]);
    expect(requests[0]?.params).toEqual({ IDs: "1,1212" });
    expect(pools.map((p) => [p.poolId, p.liquidityCap.toString()])).toEqual([
      ["1", "120000"],
      ["1212", "3000"],
    ]);
  });

  describe("getTokenPrices", () => {
    const USDC = "ibc/USDC";

    it("should read prices quoted in the given denom", async () => {
      const { http, requests } = stubHttp(() => ({
        uosmo: { [USDC]: "0.52" },
        uatom: { [USDC]: 7.25 },
        uion: { "ibc/OTHER": "1" },
        ujuno: { [USDC]: "n/a" },
      }));
      const prices = await new RouterClient(http).getTokenPrices(
        ["uosmo", "uatom", "uion", "ujuno"],
        USDC,
      );
      expect(requests[0]?.url).toBe("/tokens/prices");
      expect(requests[0]?.params).toEqual({
        base: "uosmo,uatom,uion,ujuno",
        humanDenoms: "false",
      });
      expect([...prices].map(([denom, price]) => [denom, price.toString()])).toEqual([
        ["uosmo", "0.52"],
        ["uatom", "7.25"],
      ]);
    });

    it("should reject a response that is not a price map", async () => {
      const { http } = stubHttp(() => ["uosmo"]);
      await expect(
        new RouterClient(http).getTokenPrices(["uosmo"], USDC),
      ).rejects.toThrow(RouterRequestError);
    });
  });
});
