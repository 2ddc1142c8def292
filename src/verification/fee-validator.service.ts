import { Injectable, Logger } from "@nestjs/common";
import { Route } from "src/types/verification/route";
import { CheckFailure, FailureKind } from "src/types/verification/verdict";
import { MissingReferenceDataError } from "./errors";
import { FeeSource } from "./fee-source";
import { Decimal } from "./math";

@Injectable()
export class FeeValidator {
  private readonly logger = new Logger(FeeValidator.name);

  /**
   * A positive effective fee passes as is. A zero fee is only believed when
   * every pool and denom pair on every route is independently fee-free.
   */
  validate(
    routes: Route[],
    effectiveFee: Decimal,
    feeSource: FeeSource,
  ): CheckFailure[] {
    if (effectiveFee.gt(0)) return [];
    if (effectiveFee.lt(0)) {
      return [
        {
          check: "fee",
          kind: FailureKind.UnexpectedZeroFee,
          message: `Effective fee ${effectiveFee.toString()} is negative`,
          details: { effectiveFee: effectiveFee.toString() },
        },
      ];
    }

    const failures: CheckFailure[] = [];
    for (const route of routes) {
      for (const hop of route.hops) {
        const poolFee = feeSource.getPoolFee(hop.poolId);
        if (poolFee === undefined) {
          throw new MissingReferenceDataError(
            `No swap fee known for pool ${hop.poolId}`,
            { poolId: hop.poolId },
          );
        }
        const pairFee = feeSource.getPairFee(
          hop.tokenInDenom,
          hop.tokenOutDenom,
          hop.poolId,
        );

        if (poolFee.gt(0) || pairFee.gt(0)) {
          failures.push({
            check: "fee",
            kind: FailureKind.UnexpectedZeroFee,
            message: `Quote reports zero fee but pool ${hop.poolId} charges fees`,
            details: {
              poolId: hop.poolId,
              swapFee: poolFee.toString(),
              takerFee: pairFee.toString(),
            },
          });
        }
      }
    }

    if (failures.length === 0) {
      this.logger.debug("Zero fee corroborated by reference fees");
    }
    return failures;
  }
}
