import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { OccupancySample } from "./entities/occupancy-sample.entity";
import { SampleStoreService } from "./sample-store.service";
import { OccupancyQueryService } from "./occupancy-query.service";
import { OccupancyController } from "./occupancy.controller";

/**
 * Samples Module
 *
 * Owns the occupancy time series:
 * - SampleStoreService: append-only writes plus latest/range reads
 * - OccupancyQueryService + controller: the read API for the chart
 */
@Module({
  imports: [TypeOrmModule.forFeature([OccupancySample])],
  controllers: [OccupancyController],
  providers: [SampleStoreService, OccupancyQueryService],
  exports: [SampleStoreService],
})
export class SamplesModule {}
