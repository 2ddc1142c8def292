import { Inject, Injectable, Logger, OnModuleDestroy } from "@nestjs/common";
import { Redis as IoRedis } from "ioredis";
import { REDIS_CLIENT } from "src/config/redis";
import { ReferenceSnapshot } from "src/types/reference/snapshot";
import { RedisKey } from "src/types/verification/redis";

export const REFERENCE_SNAPSHOT_REPOSITORY = "REFERENCE_SNAPSHOT_REPOSITORY";

/** Shared storage for the serialised reference snapshot and its build lock */
export interface ReferenceSnapshotRepository {
  /** True when this owner now holds the lock */
  tryAcquireLock(owner: string, ttlMs: number): Promise<boolean>;
  /** Releases the lock only if this owner still holds it */
  releaseLock(owner: string): Promise<void>;
  read(): Promise<ReferenceSnapshot | undefined>;
  write(snapshot: ReferenceSnapshot, ttlMs: number): Promise<void>;
}

// Compare-and-delete, so an expired lock taken over by another process is
// never released by its previous owner.
const RELEASE_LOCK_SCRIPT = `
if redis.call("get", KEYS[1]) == ARGV[1] then
  return redis.call("del", KEYS[1])
end
return 0
`;

@Injectable()
export class RedisReferenceSnapshotRepository
  implements ReferenceSnapshotRepository, OnModuleDestroy
{
  private readonly logger = new Logger(RedisReferenceSnapshotRepository.name);

  constructor(@Inject(REDIS_CLIENT) private readonly redis: IoRedis) {}

  async tryAcquireLock(owner: string, ttlMs: number): Promise<boolean> {
    const result = await this.redis.set(
      RedisKey.referenceSnapshotLock(),
      owner,
      "PX",
      ttlMs,
      "NX",
    );
    return result === "OK";
  }

  async releaseLock(owner: string): Promise<void> {
    await this.redis.eval(
      RELEASE_LOCK_SCRIPT,
      1,
      RedisKey.referenceSnapshotLock(),
      owner,
    );
  }

  async read(): Promise<ReferenceSnapshot | undefined> {
    const raw = await this.redis.get(RedisKey.referenceSnapshot());
    if (raw === null) return undefined;
    const parsed: ReferenceSnapshot = JSON.parse(raw);
    return parsed;
  }

  async write(snapshot: ReferenceSnapshot, ttlMs: number): Promise<void> {
    await this.redis.set(
      RedisKey.referenceSnapshot(),
      JSON.stringify(snapshot),
      "PX",
      ttlMs,
    );
  }

  async onModuleDestroy(): Promise<void> {
    if (this.redis.status === "wait" || this.redis.status === "end") return;
    this.logger.log("Closing Redis connection");
    await this.redis.quit();
  }
}
