import { loadServicesSettings } from "./services.config";

describe("services config", () => {
  it("should fall back to local defaults", () => {
    const settings = loadServicesSettings({});
    expect(settings.router).toEqual({
      url: "http://localhost:9092",
      apiKey: undefined,
      timeoutMs: 15_000,
    });
    expect(settings.redis.port).toBe(6379);
    expect(settings.snapshot.refreshEnabled).toBe(false);
  });

  it("should treat blank and non-numeric values as unset", () => {
    const settings = loadServicesSettings({
      ROUTER_API_KEY: "",
      REDIS_PORT: "not-a-port",
      SNAPSHOT_POLL_INTERVAL_MS: "250",
      REFERENCE_REFRESH_ENABLED: "true",
    });
    expect(settings.router.apiKey).toBeUndefined();
    expect(settings.redis.port).toBe(6379);
    expect(settings.snapshot.pollIntervalMs).toBe(250);
    expect(settings.snapshot.refreshEnabled).toBe(true);
  });
});
