import "reflect-metadata";
import { Logger, ValidationPipe } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import type { ConfigType } from "@nestjs/config";
import cookieParser from "cookie-parser";
import * as bodyParser from "body-parser";
import { AppModule } from "./app.module";
import { appConfig, resolveLogLevels } from "./config/configuration";
import { validateEnvironmentVariables } from "./config/env.validation";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { StorageExceptionFilter } from "./common/filters/storage-exception.filter";

async function bootstrap() {
  validateEnvironmentVariables();

  // ❗ ปิด body parser ของ Nest เพื่อคุมลำดับ middleware เอง
  const app = await NestFactory.create(AppModule, {
    bodyParser: false,
    logger: resolveLogLevels(process.env.LOG_LEVEL),
  });
  const cfg = app.get<ConfigType<typeof appConfig>>(appConfig.KEY);

  app.use(cookieParser());
  app.enableCors({
    origin: cfg.corsOrigin,
    credentials: true,
  });

  app.use(bodyParser.json({ limit: "1mb" }));
  app.use(bodyParser.urlencoded({ extended: true }));

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );
  app.useGlobalFilters(new StorageExceptionFilter(), new HttpExceptionFilter());

  await app.listen(cfg.port);
  new Logger("Bootstrap").log(`Reviews API listening on :${cfg.port}`);
}

bootstrap().catch((err: unknown) => {
  new Logger("Bootstrap").error(
    "Failed to start",
    err instanceof Error ? err.stack : String(err),
  );
  process.exit(1);
});
