import "reflect-metadata";
import { NestFactory } from "@nestjs/core";
import { NestExpressApplication } from "@nestjs/platform-express";
import { Logger, ValidationPipe } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { LoggingInterceptor } from "./common/interceptors/logging.interceptor";
import { ExcludeNullInterceptor } from "./common/interceptors/exclude-null.interceptor";
import * as packageJson from "../package.json";

async function bootstrap(): Promise<void> {
  const app = await NestFactory.create<NestExpressApplication>(AppModule, {
    logger: ["log", "error", "warn"],
  });

  app.disable("x-powered-by");

  // Global validation pipe for DTOs
  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true, // Strip unknown properties
      forbidNonWhitelisted: true, // Throw error on unknown properties
      transform: true, // Auto-transform payloads to DTO instances
      transformOptions: {
        enableImplicitConversion: true,
      },
    }),
  );

  // Global exception filter
  app.useGlobalFilters(new HttpExceptionFilter());

  // Global interceptors
  app.useGlobalInterceptors(
    new LoggingInterceptor(),
    new ExcludeNullInterceptor(), // Remove null values (disable with ?debug=true)
  );

  // The chart front end is served from elsewhere
  app.enableCors({
    origin: process.env.CORS_ORIGIN || "*",
  });

  // API versioning prefix (the README landing page stays at /)
  app.setGlobalPrefix("v1", {
    exclude: ["/"],
  });

  // SIGTERM/SIGINT stop the ingestion timer before the pool closes
  app.enableShutdownHooks();

  const config = new DocumentBuilder()
    .setTitle("Pool Occupancy API")
    .setDescription(
      "Swimming-pool occupancy sampled from the operator's public page. " +
        "History and latest reading for the occupancy chart.",
    )
    .setVersion(packageJson.version)
    .addTag("occupancy", "Occupancy history and latest reading")
    .addTag("health", "Database connectivity, scheduler state and data freshness")
    .build();

  const document = SwaggerModule.createDocument(app, config);
  SwaggerModule.setup("api", app, document, {
    customSiteTitle: "Pool Occupancy API Documentation",
  });

  const port = process.env.PORT || 3000;
  await app.listen(port);

  const logger = new Logger("Bootstrap");
  logger.log(`🏊 Pool occupancy API running on: http://localhost:${port}/v1`);
  logger.log(`📚 API Documentation: http://localhost:${port}/api`);
}

bootstrap().catch((error: unknown) => {
  new Logger("Bootstrap").error(
    "❌ Failed to start",
    error instanceof Error ? error.stack : String(error),
  );
  process.exit(1);
});
