import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";

async function bootstrap(): Promise<void> {
  const app = configureApp(await NestFactory.create(AppModule));
  const port = Number(process.env.PORT) || 3000;
  await app.listen(port);
  new Logger("Bootstrap").log(`Quote verifier listening on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    `Failed to start: ${error instanceof Error ? error.message : String(error)}`,
  );
  process.exit(1);
});
