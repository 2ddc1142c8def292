import { INestApplication } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { Test, TestingModule } from "@nestjs/testing";
import request from "supertest";
import { AppController } from "src/app.controller";
import { configureApp } from "src/app.setup";
import { REDIS_CLIENT } from "src/config/redis";
import servicesConfig from "src/config/services.config";
import verificationConfig, { USDC_DENOM } from "src/config/verification.config";
import { INDEXER_HTTP } from "src/reference-data/providers/indexer.client";
import { ReferenceDataModule } from "src/reference-data/reference-data.module";
import { REFERENCE_SNAPSHOT_REPOSITORY } from "src/reference-data/reference-snapshot.repository";
import { InMemoryReferenceSnapshotRepository } from "src/reference-data/testing/in-memory-snapshot.repository";
import { ROUTER_HTTP } from "src/routing/router.client";
import { httpError, StubbedHttp, stubHttp } from "src/testing/http-stub";
import { FailureKind } from "src/types/verification/verdict";
import {
  buildTestStore,
  DENOM_A,
  DENOM_A2,
  DENOM_B,
  DENOM_C,
  DENOM_UNPRICED,
  exactInResponse,
} from "./testing/fixtures";
import { VerificationModule } from "./verification.module";

describe("VerificationController (e2e)", () => {
  let app: INestApplication;
  let repository: InMemoryReferenceSnapshotRepository;
  let router: StubbedHttp;
  let routerDown: boolean;

  const exactInRequest = {
    direction: "exact-in",
    denomIn: DENOM_A,
    denomOut: DENOM_B,
    amount: "1000000",
  };

  beforeEach(async () => {
    routerDown = false;
    repository = new InMemoryReferenceSnapshotRepository();
    repository.snapshot = buildTestStore().toSnapshot();

    router = stubHttp((config) => {
      if (routerDown) throw httpError(config, 500, "router exploded");
      switch (config.url) {
        case "/router/quote":
        case "/router/custom-direct-quote":
          return exactInResponse();
        case "/router/routes":
          return { Routes: [{ Pools: [{ ID: 1, TokenOutDenom: DENOM_B }] }] };
        case "/config":
          return { Router: { MaxRoutes: 3 } };
        case "/tokens/prices":
          return {
            [DENOM_A]: { [USDC_DENOM]: "1.01" },
            [DENOM_B]: { [USDC_DENOM]: "2" },
            [DENOM_C]: { uother: "4" },
          };
        case "/pools":
          return [
            { chain_model: { id: 1 }, liquidity_cap: "1000000" },
            { chain_model: { id: 2 }, liquidity_cap: "200000" },
            { chain_model: { id: 4 }, liquidity_cap: "61000" },
          ];
        default:
          throw httpError(config, 404, "not found");
      }
    });
    const indexer = stubHttp((config) => {
      throw httpError(config, 503, "indexer unavailable");
    });

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [
        ConfigModule.forRoot({
          isGlobal: true,
          ignoreEnvFile: true,
          load: [verificationConfig, servicesConfig],
        }),
        ReferenceDataModule,
        VerificationModule.register(),
      ],
      controllers: [AppController],
    })
      .overrideProvider(REDIS_CLIENT)
      .useValue({})
      .overrideProvider(REFERENCE_SNAPSHOT_REPOSITORY)
      .useValue(repository)
      .overrideProvider(ROUTER_HTTP)
      .useValue(router.http)
      .overrideProvider(INDEXER_HTTP)
      .useValue(indexer.http)
      .compile();

    app = configureApp(moduleFixture.createNestApplication());
    await app.init();
  });

  afterEach(async () => {
    if (app) {
      await app.close();
    }
  });

  describe("GET /health", () => {
    it("should report liveness before reference data is loaded", async () => {
      const response = await request(app.getHttpServer()).get("/health").expect(200);
      expect(response.body).toEqual({ status: "ok", referenceLoaded: false });
    });
  });

  describe("POST /verification/quote", () => {
    it("should verify a supplied quote", async () => {
      const response = await request(app.getHttpServer())
        .post("/verification/quote")
        .send({ request: exactInRequest, quote: exactInResponse() })
        .expect(200);

      expect(response.body.verdict.passed).toBe(true);
      expect(response.body.verdict.stage).toBe("Verdicted");
      expect(response.body.runId).toMatch(/^[0-9a-f-]{36}$/);
      expect(response.body.quote).toBeUndefined();
    });

    it("should report a counter amount outside tolerance", async () => {
      const response = await request(app.getHttpServer())
        .post("/verification/quote")
        .send({ request: exactInRequest, quote: exactInResponse({ amountOut: "400000" }) })
        .expect(200);

      expect(response.body.verdict.passed).toBe(false);
      expect(response.body.verdict.failures).toHaveLength(1);
      expect(response.body.verdict.failures[0].check).toBe("amount");
      expect(response.body.verdict.failures[0].kind).toBe(FailureKind.ToleranceExceeded);
    });

    it("should report a malformed router response in the verdict", async () => {
      const response = await request(app.getHttpServer())
        .post("/verification/quote")
        .send({ request: exactInRequest, quote: { amount_in: "oops" } })
        .expect(200);

      expect(response.body.verdict.failures[0].kind).toBe(FailureKind.MalformedQuote);
    });

    it("should reject a non-integer amount", async () => {
      await request(app.getHttpServer())
        .post("/verification/quote")
        .send({ request: { ...exactInRequest, amount: "12.5" }, quote: exactInResponse() })
        .expect(400);
    });

    it("should reject an unknown direction", async () => {
      await request(app.getHttpServer())
        .post("/verification/quote")
        .send({ request: { ...exactInRequest, direction: "sideways" }, quote: exactInResponse() })
        .expect(400);
    });
  });

  describe("POST /verification/run", () => {
    it("should fetch the quote from the router and verify it", async () => {
      const response = await request(app.getHttpServer())
        .post("/verification/run")
        .send(exactInRequest)
        .expect(200);

      expect(response.body.verdict.passed).toBe(true);
      expect(response.body.quote.amount_out).toBe("495000");
      expect(router.requests[0]?.params).toEqual({
        tokenIn: `1000000${DENOM_A}`,
        tokenOutDenom: DENOM_B,
      });
    });

    it("should pass one hop denom per pinned pool to the router", async () => {
      await request(app.getHttpServer())
        .post("/verification/run")
        .send({
          ...exactInRequest,
          denomOut: DENOM_C,
          poolIds: ["1", "2"],
          hopDenoms: [DENOM_B, DENOM_C],
        })
        .expect(200);

      expect(router.requests[0]?.url).toBe("/router/custom-direct-quote");
      expect(router.requests[0]?.params).toEqual({
        tokenIn: `1000000${DENOM_A}`,
        tokenOutDenom: `${DENOM_B},${DENOM_C}`,
        poolID: "1,2",
      });
    });

    it("should reject pinned pools without matching hop denoms", async () => {
      await request(app.getHttpServer())
        .post("/verification/run")
        .send({ ...exactInRequest, denomOut: DENOM_C, poolIds: ["1", "2"] })
        .expect(400);
      await request(app.getHttpServer())
        .post("/verification/run")
        .send({ ...exactInRequest, poolIds: ["1"], hopDenoms: [DENOM_A, DENOM_B] })
        .expect(400);
      expect(router.requests).toHaveLength(0);
    });

    it("should answer 502 when the router fails", async () => {
      routerDown = true;
      const response = await request(app.getHttpServer())
        .post("/verification/run")
        .send(exactInRequest)
        .expect(502);

      expect(response.body.routerStatus).toBe(500);
    });
  });

  describe("GET /verification/candidate-routes", () => {
    it("should validate the router's candidate routes", async () => {
      const response = await request(app.getHttpServer())
        .get("/verification/candidate-routes")
        .query({ denomIn: DENOM_A, denomOut: DENOM_B })
        .expect(200);

      expect(response.body).toMatchObject({
        denomIn: DENOM_A,
        denomOut: DENOM_B,
        routeCount: 1,
        maxRoutes: 3,
        passed: true,
        failures: [],
      });
    });

    it("should require both denoms", async () => {
      await request(app.getHttpServer())
        .get("/verification/candidate-routes")
        .query({ denomIn: DENOM_A })
        .expect(400);
    });
  });

  describe("GET /verification/pools/liquidity", () => {
    it("should compare router liquidity caps with reference liquidity", async () => {
      const response = await request(app.getHttpServer())
        .get("/verification/pools/liquidity")
        .expect(200);

      expect(response.body.report).toEqual({
        passed: true,
        checkedPoolIds: ["1", "2", "4"],
        skippedPoolIds: ["3"],
        failures: [],
      });
      expect(router.requests[0]?.params).toEqual({ IDs: "1,2,4" });
    });
  });

  describe("GET /verification/tokens/prices", () => {
    it("should check router token prices for every reference denom", async () => {
      const response = await request(app.getHttpServer())
        .get("/verification/tokens/prices")
        .expect(200);

      expect(response.body.report).toEqual({
        passed: true,
        comparedDenoms: [],
        supportOnlyDenoms: [DENOM_A, DENOM_B],
        unsupportedDenoms: [DENOM_A2, DENOM_C, DENOM_UNPRICED],
        failures: [],
      });
      expect(router.requests[0]?.params).toEqual({
        base: [DENOM_A, DENOM_A2, DENOM_B, DENOM_C, DENOM_UNPRICED].join(","),
        humanDenoms: "false",
      });
    });

    it("should answer 502 when the router fails", async () => {
      routerDown = true;
      await request(app.getHttpServer()).get("/verification/tokens/prices").expect(502);
    });
  });

  describe("GET /verification/reference", () => {
    it("should summarise the loaded snapshot", async () => {
      const response = await request(app.getHttpServer())
        .get("/verification/reference")
        .expect(200);

      expect(response.body.poolCount).toBe(4);
      expect(response.body.builtAt).toBe("2026-01-01T00:00:00.000Z");
    });

    it("should answer 503 when no snapshot can be built", async () => {
      repository.snapshot = undefined;
      await request(app.getHttpServer()).get("/verification/reference").expect(503);
    });
  });
});
