import { Module } from "@nestjs/common";
import { redisClientProvider } from "src/config/redis";
import { PoolClassifier } from "src/verification/pool-classifier.service";
import { verificationSettingsProvider } from "src/config/verification.config";
import { IndexerClient, indexerHttpProvider } from "./providers/indexer.client";
import { ReferenceDataBuilder } from "./reference-data.builder";
import { ReferenceRefreshCron } from "./reference-refresh.cron";
import {
  REFERENCE_SNAPSHOT_REPOSITORY,
  RedisReferenceSnapshotRepository,
} from "./reference-snapshot.repository";
import { ReferenceSnapshotService } from "./reference-snapshot.service";

@Module({
  providers: [
    verificationSettingsProvider,
    redisClientProvider,
    indexerHttpProvider,
    {
      provide: REFERENCE_SNAPSHOT_REPOSITORY,
      useClass: RedisReferenceSnapshotRepository,
    },
    PoolClassifier,
    IndexerClient,
    ReferenceDataBuilder,
    ReferenceSnapshotService,
    ReferenceRefreshCron,
  ],
  exports: [ReferenceSnapshotService, ReferenceDataBuilder],
})
export class ReferenceDataModule {}
