import { Module } from "@nestjs/common";
import { IngestionService } from "./ingestion.service";
import { IngestionSchedulerService } from "./ingestion-scheduler.service";
import { PoolPageModule } from "../external-apis/pool-page/pool-page.module";
import { ExtractionModule } from "../extraction/extraction.module";
import { SamplesModule } from "../samples/samples.module";
import { POLLING_CONFIG, getPollingConfig } from "../config/polling.config";

/**
 * Ingestion Module
 *
 * Scheduled pipeline: PoolPageClient → OccupancyExtractor → SampleStoreService.
 * Requires ScheduleModule.forRoot() in the root module for SchedulerRegistry.
 */
@Module({
  imports: [PoolPageModule, ExtractionModule, SamplesModule],
  providers: [
    { provide: POLLING_CONFIG, useFactory: () => getPollingConfig() },
    IngestionService,
    IngestionSchedulerService,
  ],
  exports: [IngestionSchedulerService, POLLING_CONFIG],
})
export class IngestionModule {}
