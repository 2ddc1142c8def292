import { ConfigService } from "@nestjs/config";
import { Redis as IoRedis } from "ioredis";
import { ServicesSettings } from "./services.config";

export const REDIS_CLIENT = "REDIS_CLIENT";

/**
 * Connects on first command, so modules that never touch the snapshot
 * (and tests that replace the repository) open no socket.
 */
export function createRedisClient(settings: ServicesSettings["redis"]): IoRedis {
  return new IoRedis({
    host: settings.host,
    port: settings.port,
    username: settings.username,
    password: settings.password,
    lazyConnect: true,
    maxRetriesPerRequest: 3,
  });
}

export const redisClientProvider = {
  provide: REDIS_CLIENT,
  useFactory: (config: ConfigService): IoRedis =>
    createRedisClient(config.getOrThrow<ServicesSettings>("services").redis),
  inject: [ConfigService],
};
