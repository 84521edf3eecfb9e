import { Controller, Get, Inject, Logger } from "@nestjs/common";
import { ApiTags, ApiOperation, ApiResponse } from "@nestjs/swagger";
import { InjectDataSource } from "@nestjs/typeorm";
import { DataSource } from "typeorm";
import { SampleStoreService } from "../samples/sample-store.service";
import { IngestionSchedulerService } from "../ingestion/ingestion-scheduler.service";
import { SchedulerStatus } from "../ingestion/ingestion.types";
import { POLLING_CONFIG, PollingConfig } from "../config/polling.config";
import { CLOCK, Clock } from "../common/clock/clock";
import * as packageJson from "../../package.json";

// Data older than this many polling intervals counts as stale
const STALE_AFTER_INTERVALS = 3;

export interface HealthStatus {
  status: "ok" | "degraded" | "error";
  timestamp: string;
  uptime: number;
  version: string;
  services: {
    database: {
      status: "connected" | "disconnected";
      type: string;
    };
  };
  ingestion: SchedulerStatus;
  data: {
    samples: number;
    latestSampleAt?: string;
    dataAgeMinutes?: number;
    stale: boolean;
  };
}

@ApiTags("health")
@Controller("health")
export class HealthController {
  private readonly logger = new Logger(HealthController.name);

  constructor(
    @InjectDataSource() private readonly dataSource: DataSource,
    private readonly sampleStore: SampleStoreService,
    private readonly scheduler: IngestionSchedulerService,
    @Inject(POLLING_CONFIG) private readonly config: PollingConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  @Get()
  @ApiOperation({
    summary: "System health check",
    description:
      "Database connectivity, scheduler state and age of the newest sample. " +
      "A source page that changed shape shows up here as stale data.",
  })
  @ApiResponse({ status: 200, description: "Health status" })
  async getHealth(): Promise<HealthStatus> {
    const dbStatus = this.dataSource.isInitialized
      ? "connected"
      : "disconnected";

    const [samples, latestSampleAt] = await Promise.all([
      this.countSamples(),
      this.getLatestSampleTime(),
    ]);

    const now = this.clock.now();
    let dataAgeMinutes: number | undefined;
    if (latestSampleAt) {
      dataAgeMinutes = Math.round(
        (now.getTime() - latestSampleAt.getTime()) / 60000,
      );
    }

    const staleAfterMs = this.config.intervalMs * STALE_AFTER_INTERVALS;
    const stale =
      !latestSampleAt || now.getTime() - latestSampleAt.getTime() > staleAfterMs;

    let status: HealthStatus["status"] = "ok";
    if (dbStatus === "disconnected") {
      status = "error";
    } else if (stale) {
      status = "degraded";
    }

    return {
      status,
      timestamp: now.toISOString(),
      uptime: Math.floor(process.uptime()),
      version: packageJson.version,
      services: {
        database: {
          status: dbStatus,
          type: "PostgreSQL",
        },
      },
      ingestion: this.scheduler.getStatus(),
      data: {
        samples,
        ...(latestSampleAt && {
          latestSampleAt: latestSampleAt.toISOString(),
        }),
        ...(dataAgeMinutes !== undefined && { dataAgeMinutes }),
        stale,
      },
    };
  }

  @Get("ping")
  ping(): { message: string; timestamp: string } {
    return {
      message: "pong",
      timestamp: this.clock.now().toISOString(),
    };
  }

  private async countSamples(): Promise<number> {
    try {
      return await this.sampleStore.count();
    } catch (error) {
      this.logger.warn(`Could not count samples: ${errorMessage(error)}`);
      return 0;
    }
  }

  private async getLatestSampleTime(): Promise<Date | null> {
    try {
      const latest = await this.sampleStore.latest();
      return latest?.timestamp ?? null;
    } catch (error) {
      this.logger.warn(`Could not read latest sample: ${errorMessage(error)}`);
      return null;
    }
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
