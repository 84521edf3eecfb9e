import { Module } from "@nestjs/common";
import { OccupancyExtractor } from "./occupancy-extractor";
import {
  EXTRACTION_CONFIG,
  getExtractionConfig,
} from "../config/polling.config";

@Module({
  providers: [
    { provide: EXTRACTION_CONFIG, useFactory: () => getExtractionConfig() },
    OccupancyExtractor,
  ],
  exports: [OccupancyExtractor],
})
export class ExtractionModule {}
