import { Inject, Injectable, Logger } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { ReferenceDataStore } from "src/reference-data/reference-data.store";
import { PoolInfo } from "src/types/verification/pool";
import { CheckFailure, FailureKind } from "src/types/verification/verdict";
import { Decimal, relativeError } from "./math";

export interface LiquidityCapReport {
  passed: boolean;
  checkedPoolIds: string[];
  /** Below the liquidity minimum or blacklisted */
  skippedPoolIds: string[];
  failures: CheckFailure[];
}

@Injectable()
export class LiquidityCapValidator {
  private readonly logger = new Logger(LiquidityCapValidator.name);

  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  /** Reference pools liquid enough for their cap to be compared */
  eligiblePools(store: ReferenceDataStore): PoolInfo[] {
    return store.listPools().filter((pool) => this.isEligible(pool));
  }

  validate(
    store: ReferenceDataStore,
    routerCaps: ReadonlyMap<string, Decimal>,
  ): LiquidityCapReport {
    const { tolerance } = this.settings.liquidityCap;
    const checkedPoolIds: string[] = [];
    const skippedPoolIds: string[] = [];
    const failures: CheckFailure[] = [];

    for (const pool of store.listPools()) {
      if (!this.isEligible(pool)) {
        skippedPoolIds.push(pool.id);
        continue;
      }
      checkedPoolIds.push(pool.id);

      const cap = routerCaps.get(pool.id);
      if (cap === undefined) {
        failures.push({
          check: "liquidityCap",
          kind: FailureKind.ToleranceExceeded,
          message: `Router reported no liquidity cap for pool ${pool.id}`,
          details: { poolId: pool.id },
        });
        continue;
      }

      const error = relativeError(cap, pool.liquidityUsd);
      if (error.gte(tolerance)) {
        failures.push({
          check: "liquidityCap",
          kind: FailureKind.ToleranceExceeded,
          message: `Pool ${pool.id} liquidity cap ${cap.toString()} deviates from ${pool.liquidityUsd} by ${error.toString()}`,
          details: {
            poolId: pool.id,
            actual: cap.toString(),
            expected: String(pool.liquidityUsd),
            relativeError: error.toString(),
          },
        });
      }
    }

    this.logger.log(
      `Liquidity caps: ${checkedPoolIds.length} checked, ${skippedPoolIds.length} skipped, ${failures.length} failed`,
    );
    return {
      passed: failures.length === 0,
      checkedPoolIds,
      skippedPoolIds,
      failures,
    };
  }

  private isEligible(pool: PoolInfo): boolean {
    return (
      pool.liquidityUsd > this.settings.liquidityCap.minLiquidityUsd &&
      !this.settings.poolBlacklist.includes(pool.id)
    );
  }
}
