import { registerAs } from "@nestjs/config";

export interface ServicesSettings {
  router: {
    url: string;
    apiKey?: string;
    timeoutMs: number;
  };
  indexer: {
    url: string;
    timeoutMs: number;
  };
  redis: {
    host: string;
    port: number;
    username?: string;
    password?: string;
  };
  snapshot: {
    ttlMs: number;
    lockTtlMs: number;
    pollIntervalMs: number;
    waitTimeoutMs: number;
    refreshEnabled: boolean;
  };
}

const numberOr = (value: string | undefined, fallback: number): number => {
  const parsed = Number(value);
  return value === undefined || value === "" || Number.isNaN(parsed)
    ? fallback
    : parsed;
};

const optional = (value: string | undefined): string | undefined =>
  value === undefined || value === "" ? undefined : value;

export function loadServicesSettings(env: NodeJS.ProcessEnv): ServicesSettings {
  return {
    router: {
      url: env.ROUTER_URL || "http://localhost:9092",
      apiKey: optional(env.ROUTER_API_KEY),
      timeoutMs: numberOr(env.ROUTER_TIMEOUT_MS, 15_000),
    },
    indexer: {
      url: env.INDEXER_URL || "http://localhost:9100",
      timeoutMs: numberOr(env.INDEXER_TIMEOUT_MS, 30_000),
    },
    redis: {
      host: env.REDIS_HOST || "localhost",
      port: numberOr(env.REDIS_PORT, 6379),
      username: optional(env.REDIS_USERNAME),
      password: optional(env.REDIS_PASSWORD),
    },
    snapshot: {
      ttlMs: numberOr(env.SNAPSHOT_TTL_MS, 60 * 60 * 1000),
      lockTtlMs: numberOr(env.SNAPSHOT_LOCK_TTL_MS, 2 * 60 * 1000),
      pollIntervalMs: numberOr(env.SNAPSHOT_POLL_INTERVAL_MS, 500),
      waitTimeoutMs: numberOr(env.SNAPSHOT_WAIT_TIMEOUT_MS, 3 * 60 * 1000),
      refreshEnabled: env.REFERENCE_REFRESH_ENABLED === "true",
    },
  };
}

export default registerAs("services", () => loadServicesSettings(process.env));
