import { Injectable, Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { Cron, CronExpression } from "@nestjs/schedule";
import { ServicesSettings } from "src/config/services.config";
import { ReferenceSnapshotService } from "./reference-snapshot.service";

/**
 * Rebuilds the reference snapshot every ten minutes when
 * REFERENCE_REFRESH_ENABLED is set.
 */
@Injectable()
export class ReferenceRefreshCron {
  private readonly logger = new Logger(ReferenceRefreshCron.name);

  constructor(
    private readonly snapshots: ReferenceSnapshotService,
    private readonly config: ConfigService,
  ) {}

  @Cron(CronExpression.EVERY_10_MINUTES)
  async refreshReferenceData(): Promise<void> {
    const { refreshEnabled } =
      this.config.getOrThrow<ServicesSettings>("services").snapshot;
    if (!refreshEnabled) return;

    try {
      this.logger.log("Refreshing reference data...");
      const store = await this.snapshots.refresh();
      this.logger.log(
        `Reference data refreshed: ${store.summary().poolCount} pools`,
      );
    } catch (error) {
      this.logger.error(
        `Failed to refresh reference data: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
