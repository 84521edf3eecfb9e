import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";
import { SamplesModule } from "../samples/samples.module";
import { IngestionModule } from "../ingestion/ingestion.module";

/**
 * Health Module
 *
 * Health endpoint with data freshness and scheduler state.
 */
@Module({
  imports: [SamplesModule, IngestionModule],
  controllers: [HealthController],
})
export class HealthModule {}
