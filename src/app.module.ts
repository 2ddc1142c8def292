import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { ScheduleModule } from "@nestjs/schedule";
import servicesConfig from "./config/services.config";
import verificationConfig from "./config/verification.config";
import { AppController } from "./app.controller";
import { ReferenceDataModule } from "./reference-data/reference-data.module";
import { VerificationModule } from "./verification/verification.module";

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [verificationConfig, servicesConfig],
    }),
    ScheduleModule.forRoot(),
    ReferenceDataModule,
    VerificationModule.register(),
  ],
  controllers: [AppController],
})
export class AppModule {}
