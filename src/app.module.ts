import { Module } from "@nestjs/common";
import { ConfigModule } from "@nestjs/config";
import { TypeOrmModule } from "@nestjs/typeorm";
import { ScheduleModule } from "@nestjs/schedule";
import { typeOrmConfig } from "./config/typeorm.config";
import { ClockModule } from "./common/clock/clock.module";
import { DatabaseModule } from "./database/database.module";
import { SamplesModule } from "./samples/samples.module";
import { IngestionModule } from "./ingestion/ingestion.module";
import { HealthModule } from "./health/health.module";
import { ReadmeModule } from "./readme/readme.module";

@Module({
  imports: [
    // Global config module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: ".env",
      cache: true,
    }),

    // SchedulerRegistry for the ingestion timer
    ScheduleModule.forRoot(),

    ClockModule,

    // TypeORM with async config
    TypeOrmModule.forRootAsync(typeOrmConfig),

    // Database utilities
    DatabaseModule,

    // Core modules
    SamplesModule,
    IngestionModule,
    HealthModule,
    ReadmeModule,
  ],
})
export class AppModule {}
