import { Inject, Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { setTimeout as sleep } from "node:timers/promises";
import { v4 as uuidv4 } from "uuid";
import { ServicesSettings } from "src/config/services.config";
import { IndexerClient } from "./providers/indexer.client";
import { ReferenceDataBuilder } from "./reference-data.builder";
import { ReferenceDataStore } from "./reference-data.store";
import {
  REFERENCE_SNAPSHOT_REPOSITORY,
  ReferenceSnapshotRepository,
} from "./reference-snapshot.repository";

export class SnapshotUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = SnapshotUnavailableError.name;
  }
}

/**
 * Owns the process-wide ReferenceDataStore.
 *
 * The first caller loads it: read the shared snapshot, or take the lock,
 * build from the indexer and publish. Processes that lose the lock race
 * poll until the winner has written the snapshot. Concurrent callers within
 * one process share a single in-flight load.
 */
@Injectable()
export class ReferenceSnapshotService {
  private readonly logger = new Logger(ReferenceSnapshotService.name);
  private readonly ownerId = uuidv4();
  private store?: ReferenceDataStore;
  private loading?: Promise<ReferenceDataStore>;

  constructor(
    @Inject(REFERENCE_SNAPSHOT_REPOSITORY)
    private readonly repository: ReferenceSnapshotRepository,
    private readonly indexer: IndexerClient,
    private readonly builder: ReferenceDataBuilder,
    private readonly config: ConfigService,
  ) {}

  private get settings(): ServicesSettings["snapshot"] {
    return this.config.getOrThrow<ServicesSettings>("services").snapshot;
  }

  /** Current store, loaded on first use */
  async getStore(): Promise<ReferenceDataStore> {
    if (this.store) return this.store;
    this.loading ??= this.load().finally(() => {
      this.loading = undefined;
    });
    return this.loading;
  }

  /** Loaded store, or undefined before the first load completes */
  peek(): ReferenceDataStore | undefined {
    return this.store;
  }

  /**
   * Rebuilds from the indexer and republishes. Callers holding the previous
   * store keep using it.
   */
  async refresh(): Promise<ReferenceDataStore> {
    const { lockTtlMs } = this.settings;
    if (!(await this.repository.tryAcquireLock(this.ownerId, lockTtlMs))) {
      this.logger.log("Snapshot build in progress elsewhere, skipping refresh");
      return this.getStore();
    }
    try {
      this.store = await this.buildAndPublish();
      return this.store;
    } finally {
      await this.repository.releaseLock(this.ownerId);
    }
  }

  private async load(): Promise<ReferenceDataStore> {
    const { lockTtlMs, pollIntervalMs, waitTimeoutMs } = this.settings;

    const existing = await this.readShared();
    if (existing) return (this.store = existing);

    if (await this.repository.tryAcquireLock(this.ownerId, lockTtlMs)) {
      try {
        // Another process may have published between the read and the lock.
        const published = await this.readShared();
        this.store = published ?? (await this.buildAndPublish());
        return this.store;
      } finally {
        await this.repository.releaseLock(this.ownerId);
      }
    }

    this.logger.log("Waiting for another process to publish the snapshot");
    const deadline = Date.now() + waitTimeoutMs;
    while (Date.now() < deadline) {
      await sleep(pollIntervalMs);
      const published = await this.readShared();
      if (published) return (this.store = published);
    }
    throw new SnapshotUnavailableError(
      `Reference snapshot not published within ${waitTimeoutMs}ms`,
    );
  }

  private async readShared(): Promise<ReferenceDataStore | undefined> {
    const snapshot = await this.repository.read();
    if (!snapshot) return undefined;
    this.logger.log(`Loaded shared snapshot built at ${snapshot.builtAt}`);
    return ReferenceDataStore.fromSnapshot(snapshot);
  }

  private async buildAndPublish(): Promise<ReferenceDataStore> {
    const [tokens, pools] = await Promise.all([
      this.indexer.fetchTokens(),
      this.indexer.fetchPools(),
    ]);
    const store = this.builder.build(tokens, pools);
    await this.repository.write(store.toSnapshot(), this.settings.ttlMs);
    this.logger.log(`Published reference snapshot built at ${store.builtAt.toISOString()}`);
    return store;
  }
}
