import { DynamicModule, Module, Provider } from "@nestjs/common";
import { verificationSettingsProvider } from "src/config/verification.config";
import { ReferenceDataModule } from "src/reference-data/reference-data.module";
import { RoutingModule } from "src/routing/routing.module";
import { ExpectedValueCalculator } from "./expected-value.service";
import { FEE_SOURCE, FeeSource } from "./fee-source";
import { FeeValidator } from "./fee-validator.service";
import { LiquidityCapValidator } from "./liquidity-cap.service";
import { PoolClassifier } from "./pool-classifier.service";
import { QuoteVerifier } from "./quote-verifier.service";
import { RouteValidator } from "./route-validator.service";
import { ToleranceModel } from "./tolerance-model.service";
import { TokenPriceValidator } from "./token-price.service";
import { VerificationController } from "./verification.controller";
import { VerificationRunService } from "./verification-run.service";

export interface VerificationModuleOptions {
  /** Replaces the fee lookup backed by the reference snapshot */
  feeSource?: FeeSource;
}

const VERIFICATION_PROVIDERS: Provider[] = [
  verificationSettingsProvider,
  ToleranceModel,
  ExpectedValueCalculator,
  PoolClassifier,
  RouteValidator,
  FeeValidator,
  QuoteVerifier,
  LiquidityCapValidator,
  TokenPriceValidator,
  VerificationRunService,
];

@Module({})
export class VerificationModule {
  static register(options: VerificationModuleOptions = {}): DynamicModule {
    const providers = [...VERIFICATION_PROVIDERS];
    if (options.feeSource) {
      providers.push({ provide: FEE_SOURCE, useValue: options.feeSource });
    }

    return {
      module: VerificationModule,
      imports: [ReferenceDataModule, RoutingModule],
      providers,
      controllers: [VerificationController],
      exports: [
        QuoteVerifier,
        RouteValidator,
        LiquidityCapValidator,
        TokenPriceValidator,
      ],
    };
  }
}
