import { INestApplication, ValidationPipe } from "@nestjs/common";

/** Shared by main and the e2e specs */
export function configureApp(app: INestApplication): INestApplication {
  app.useGlobalPipes(
    new ValidationPipe({ whitelist: true, transform: true }),
  );
  app.enableShutdownHooks();
  return app;
}
