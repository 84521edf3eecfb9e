import { Inject, Injectable, Logger } from "@nestjs/common";
import { InjectRepository } from "@nestjs/typeorm";
import { MoreThanOrEqual, QueryFailedError, Repository } from "typeorm";
import { OccupancySample } from "./entities/occupancy-sample.entity";
import { Sample, toSecondPrecision } from "./sample.types";
import { Result, ok, err } from "../common/types/result.type";
import { StoreError } from "../common/types/ingestion-error.type";
import { CLOCK, Clock } from "../common/clock/clock";

// PostgreSQL unique_violation
const UNIQUE_VIOLATION = "23505";

/**
 * Sample Store
 *
 * Append-only time series of occupancy readings.
 * - insert: one single-row INSERT, so a row is either fully written or absent
 * - latest / range: read-only, safe to call concurrently with the writer
 */
@Injectable()
export class SampleStoreService {
  private readonly logger = new Logger(SampleStoreService.name);

  constructor(
    @InjectRepository(OccupancySample)
    private readonly sampleRepository: Repository<OccupancySample>,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Persists a sample. A second insert for the same second is rejected with
   * DuplicateTimestamp and leaves the stored row untouched.
   */
  async insert(sample: Sample): Promise<Result<Sample, StoreError>> {
    const row: Sample = {
      timestamp: toSecondPrecision(sample.timestamp),
      occupancy: sample.occupancy,
      capacity: sample.capacity,
      rawStatus: sample.rawStatus,
    };

    try {
      await this.sampleRepository.insert(row);
      return ok(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        return err({
          family: "StoreError",
          kind: "DuplicateTimestamp",
          timestamp: row.timestamp,
        });
      }

      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `❌ Failed to insert sample at ${row.timestamp.toISOString()}: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      return err({ family: "StoreError", kind: "WriteFailure", message });
    }
  }

  /**
   * Most recent sample, or null when nothing has been stored yet.
   */
  async latest(): Promise<Sample | null> {
    const [row] = await this.sampleRepository.find({
      order: { timestamp: "DESC" },
      take: 1,
    });
    return row ? toSample(row) : null;
  }

  /**
   * Samples with `timestamp >= now - sinceHours`, oldest first.
   */
  async range(
    sinceHours: number,
    now: Date = this.clock.now(),
  ): Promise<Sample[]> {
    const since = new Date(now.getTime() - sinceHours * 3_600_000);

    const rows = await this.sampleRepository.find({
      where: { timestamp: MoreThanOrEqual(since) },
      order: { timestamp: "ASC" },
    });
    return rows.map(toSample);
  }

  async count(): Promise<number> {
    return this.sampleRepository.count();
  }
}

function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof QueryFailedError)) {
    return false;
  }
  const driverError: unknown = error.driverError;
  return (
    typeof driverError === "object" &&
    driverError !== null &&
    "code" in driverError &&
    driverError.code === UNIQUE_VIOLATION
  );
}

function toSample(row: OccupancySample): Sample {
  return {
    timestamp: row.timestamp,
    occupancy: row.occupancy,
    capacity: row.capacity,
    rawStatus: row.rawStatus,
  };
}
