import { Inject, Injectable } from "@nestjs/common";
import {
  VERIFICATION_SETTINGS,
  VerificationSettings,
} from "src/config/verification.config";
import { PoolType, RawPoolKind } from "src/types/verification/pool";
import { UnknownPoolTypeError } from "./errors";

export const RAW_POOL_TYPES = {
  balancer: "osmosis.gamm.v1beta1.Pool",
  stableswap: "osmosis.gamm.poolmodels.stableswap.v1beta1.Pool",
  concentrated: "osmosis.concentratedliquidity.v1beta1.Pool",
  cosmWasm: "osmosis.cosmwasmpool.v1beta1.CosmWasmPool",
} as const;

const DIRECT_MAPPING: ReadonlyMap<string, PoolType> = new Map<string, PoolType>([
  [RAW_POOL_TYPES.balancer, PoolType.Balancer],
  [RAW_POOL_TYPES.stableswap, PoolType.Stableswap],
  [RAW_POOL_TYPES.concentrated, PoolType.Concentrated],
]);

@Injectable()
export class PoolClassifier {
  constructor(
    @Inject(VERIFICATION_SETTINGS)
    private readonly settings: VerificationSettings,
  ) {}

  classify(record: RawPoolKind): PoolType {
    const direct = DIRECT_MAPPING.get(record.type);
    if (direct !== undefined) return direct;

    if (record.type === RAW_POOL_TYPES.cosmWasm) {
      const { codeIds } = this.settings;
      switch (record.codeId) {
        case codeIds.transmuterV1:
          return PoolType.CosmWasmTransmuterV1;
        case codeIds.astroportPcl:
          return PoolType.CosmWasmAstroportPCL;
        case codeIds.orderbook:
          return PoolType.CosmWasmOrderbook;
        default:
          return PoolType.CosmWasmMisc;
      }
    }

    // Liquidity of an unrecognised pool cannot be reasoned about.
    throw new UnknownPoolTypeError(`Unknown pool type: ${record.type}`, {
      type: record.type,
    });
  }

  /** Exchange rate fixed regardless of trade size */
  isZeroSlippage(type: PoolType): boolean {
    return type === PoolType.CosmWasmTransmuterV1;
  }
}
