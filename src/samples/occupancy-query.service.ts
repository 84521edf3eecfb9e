import { Inject, Injectable } from "@nestjs/common";
import { SampleStoreService } from "./sample-store.service";
import { SampleDto } from "./dto/sample.dto";
import { HistoryResponseDto } from "./dto/history-response.dto";
import { LatestResponseDto } from "./dto/latest-response.dto";
import { DEFAULT_HISTORY_HOURS } from "./dto/history-query.dto";
import { CLOCK, Clock } from "../common/clock/clock";

/**
 * Occupancy Query Service
 *
 * Read side of the sample store, shaped for the chart front end.
 */
@Injectable()
export class OccupancyQueryService {
  constructor(
    private readonly sampleStore: SampleStoreService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async getHistory(
    hours: number = DEFAULT_HISTORY_HOURS,
  ): Promise<HistoryResponseDto> {
    const now = this.clock.now();
    const samples = await this.sampleStore.range(hours, now);

    return {
      hours,
      from: new Date(now.getTime() - hours * 3_600_000).toISOString(),
      to: now.toISOString(),
      samples: samples.map((sample) => SampleDto.fromSample(sample)),
    };
  }

  async getLatest(): Promise<LatestResponseDto> {
    const sample = await this.sampleStore.latest();
    if (!sample) {
      return { status: "no-data", sample: null };
    }
    return { status: "ok", sample: SampleDto.fromSample(sample) };
  }
}
