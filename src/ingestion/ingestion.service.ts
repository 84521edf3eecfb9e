import { Inject, Injectable } from "@nestjs/common";
import { PoolPageClient } from "../external-apis/pool-page/pool-page.client";
import { OccupancyExtractor } from "../extraction/occupancy-extractor";
import { SampleStoreService } from "../samples/sample-store.service";
import { isSameReading } from "../samples/sample.types";
import { POLLING_CONFIG, PollingConfig } from "../config/polling.config";
import { CLOCK, Clock } from "../common/clock/clock";
import { formatInTimeZone } from "date-fns-tz";
import {
  formatPollingWindow,
  isWithinPollingWindow,
} from "../common/utils/date.util";
import { CycleOutcome, CycleStage } from "./ingestion.types";

/**
 * Ingestion Service
 *
 * One cycle of the pipeline: fetch the page, extract the reading, persist it.
 * Each stage reports failures as values, so a cycle always resolves to a
 * CycleOutcome and nothing partial is ever written.
 */
@Injectable()
export class IngestionService {
  constructor(
    private readonly poolPageClient: PoolPageClient,
    private readonly extractor: OccupancyExtractor,
    private readonly sampleStore: SampleStoreService,
    @Inject(POLLING_CONFIG) private readonly config: PollingConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  async runCycle(
    signal: AbortSignal,
    onStage: (stage: CycleStage) => void = () => undefined,
  ): Promise<CycleOutcome> {
    const { window } = this.config;
    const now = this.clock.now();
    if (window && !isWithinPollingWindow(now, window)) {
      const localTime = formatInTimeZone(now, window.timezone, "HH:mm");
      return {
        status: "skipped",
        reason:
          `outside polling window ${formatPollingWindow(window)} ` +
          `(local time ${localTime})`,
      };
    }

    onStage("Fetching");
    const page = await this.poolPageClient.fetch(this.config.sourceUrl, {
      timeoutMs: this.config.fetchTimeoutMs,
      signal,
    });
    if (signal.aborted) {
      return { status: "abandoned", stage: "Fetching" };
    }
    if (!page.ok) {
      return { status: "failed", error: page.error };
    }

    onStage("Extracting");
    const reading = this.extractor.extract(page.value);
    if (!reading.ok) {
      return { status: "failed", error: reading.error };
    }
    if (signal.aborted) {
      return { status: "abandoned", stage: "Extracting" };
    }

    onStage("Persisting");
    if (this.config.dedupWindowMs > 0) {
      const latest = await this.sampleStore.latest();
      if (
        latest &&
        reading.value.timestamp.getTime() - latest.timestamp.getTime() <
          this.config.dedupWindowMs &&
        isSameReading(latest, reading.value)
      ) {
        return { status: "unchanged", sample: latest };
      }
    }

    const stored = await this.sampleStore.insert(reading.value);
    if (!stored.ok) {
      return { status: "failed", error: stored.error };
    }
    return { status: "stored", sample: stored.value };
  }
}
