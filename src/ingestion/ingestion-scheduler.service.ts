import {
  BeforeApplicationShutdown,
  Inject,
  Injectable,
  Logger,
  OnApplicationBootstrap,
} from "@nestjs/common";
import { SchedulerRegistry } from "@nestjs/schedule";
import { IngestionService } from "./ingestion.service";
import {
  CycleOutcome,
  CycleReport,
  SchedulerState,
  SchedulerStatus,
} from "./ingestion.types";
import { POLLING_CONFIG, PollingConfig } from "../config/polling.config";
import { CLOCK, Clock } from "../common/clock/clock";
import { describeIngestionError } from "../common/types/ingestion-error.type";
import { occupancyPercentage } from "../samples/sample.types";

export const INGESTION_TIMER = "occupancy-ingestion";

/**
 * Ingestion Scheduler
 *
 * Owns the single recurring timer that drives the pipeline.
 *
 * - The first cycle fires as soon as start() is called
 * - The next timer is armed only after the current cycle settles, at
 *   lastCycleStart + interval (immediately when a cycle overran), so cycles
 *   never overlap
 * - Failed cycles are logged and dropped; the interval is the retry policy
 * - stop() clears the timer, aborts an in-flight fetch and waits for the
 *   cycle to settle; start() during that wait leaves re-arming to the cycle
 */
@Injectable()
export class IngestionSchedulerService
  implements OnApplicationBootstrap, BeforeApplicationShutdown
{
  private readonly logger = new Logger(IngestionSchedulerService.name);

  private state: SchedulerState = "Stopped";
  private running = false;
  private inFlight: Promise<void> | null = null;
  private abortController: AbortController | null = null;
  private nextRunAt: Date | null = null;
  private lastCycle: CycleReport | null = null;
  private cyclesRun = 0;
  private samplesStored = 0;
  private failedCycles = 0;

  constructor(
    private readonly ingestionService: IngestionService,
    private readonly schedulerRegistry: SchedulerRegistry,
    @Inject(POLLING_CONFIG) private readonly config: PollingConfig,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  onApplicationBootstrap(): void {
    if (!this.config.enabled) {
      this.logger.warn("⏸️  Ingestion disabled (INGESTION_ENABLED=false)");
      return;
    }
    this.start();
  }

  async beforeApplicationShutdown(): Promise<void> {
    await this.stop();
  }

  start(): void {
    if (this.running) {
      return;
    }
    this.running = true;
    const minutes = this.config.intervalMs / 60_000;
    this.logger.log(
      `📅 Polling ${this.config.sourceUrl} every ${minutes} minute(s)`,
    );

    // Restarted while stop() still waits on a cycle: that cycle re-arms the
    // timer once it settles
    if (this.inFlight) {
      return;
    }
    this.state = "Idle";
    this.scheduleNext(0);
  }

  async stop(): Promise<void> {
    this.running = false;
    this.clearTimer();
    this.nextRunAt = null;
    this.abortController?.abort();

    if (this.inFlight) {
      this.logger.log("⏳ Waiting for the in-flight cycle to settle...");
      await this.inFlight;
    }
    if (!this.running) {
      this.state = "Stopped";
    }
  }

  /**
   * Resolves once the cycle currently running (if any) has settled.
   */
  async whenIdle(): Promise<void> {
    if (this.inFlight) {
      await this.inFlight;
    }
  }

  getStatus(): SchedulerStatus {
    return {
      state: this.state,
      intervalMinutes: this.config.intervalMs / 60_000,
      nextRunAt: this.nextRunAt ? this.nextRunAt.toISOString() : null,
      lastCycle: this.lastCycle,
      cyclesRun: this.cyclesRun,
      samplesStored: this.samplesStored,
      failedCycles: this.failedCycles,
    };
  }

  private scheduleNext(delayMs: number): void {
    const delay = Math.max(0, delayMs);
    this.nextRunAt = new Date(this.clock.now().getTime() + delay);

    this.clearTimer();
    const timeout = setTimeout(() => this.tick(), delay);
    this.schedulerRegistry.addTimeout(INGESTION_TIMER, timeout);
  }

  private clearTimer(): void {
    if (this.schedulerRegistry.doesExist("timeout", INGESTION_TIMER)) {
      this.schedulerRegistry.deleteTimeout(INGESTION_TIMER);
    }
  }

  private tick(): void {
    this.clearTimer();
    if (!this.running) {
      return;
    }
    this.inFlight = this.runCycle();
  }

  private async runCycle(): Promise<void> {
    const startedAt = this.clock.now();
    this.nextRunAt = null;
    const controller = new AbortController();
    this.abortController = controller;

    let outcome: CycleOutcome;
    try {
      outcome = await this.ingestionService.runCycle(
        controller.signal,
        (stage) => {
          this.state = stage;
        },
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(
        `❌ Unexpected error in ingestion cycle: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
      outcome = { status: "crashed", message };
    }

    this.abortController = null;
    this.record(startedAt, outcome);
    this.state = this.running ? "Idle" : "Stopped";
    this.inFlight = null;

    if (this.running) {
      const elapsed = this.clock.now().getTime() - startedAt.getTime();
      this.scheduleNext(this.config.intervalMs - elapsed);
    }
  }

  private record(startedAt: Date, outcome: CycleOutcome): void {
    this.cyclesRun++;
    let detail: string | undefined;

    switch (outcome.status) {
      case "stored": {
        this.samplesStored++;
        const { sample } = outcome;
        const percentage = occupancyPercentage(sample);
        detail =
          `${sample.occupancy}` +
          (sample.capacity !== null ? `/${sample.capacity}` : "") +
          (percentage !== null ? ` (${percentage.toFixed(1)}%)` : "");
        this.logger.log(
          `✅ Stored occupancy ${detail} at ${sample.timestamp.toISOString()}`,
        );
        break;
      }
      case "unchanged":
        detail = `same as ${outcome.sample.timestamp.toISOString()}`;
        this.logger.log(`↩️  Skipping unchanged reading (${detail})`);
        break;
      case "skipped":
        detail = outcome.reason;
        this.logger.debug(`Skipping fetch ${outcome.reason}`);
        break;
      case "abandoned":
        detail = `aborted while ${outcome.stage.toLowerCase()}`;
        this.logger.warn(`🛑 Cycle abandoned on shutdown (${detail})`);
        break;
      case "failed":
        this.state = "ErrorBackoff";
        this.failedCycles++;
        detail = describeIngestionError(outcome.error);
        this.logger.warn(`⚠️  Ingestion cycle failed: ${detail}`);
        break;
      case "crashed":
        this.state = "ErrorBackoff";
        this.failedCycles++;
        detail = outcome.message;
        break;
    }

    this.lastCycle = {
      startedAt: startedAt.toISOString(),
      finishedAt: this.clock.now().toISOString(),
      status: outcome.status,
      ...(detail !== undefined && { detail }),
    };
  }
}
