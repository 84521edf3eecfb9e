import { Sample } from "../samples/sample.types";
import { IngestionError } from "../common/types/ingestion-error.type";

/**
 * Scheduler states. One cycle walks Idle → Fetching → Extracting → Persisting → Idle;
 * ErrorBackoff is passed through on any failure on the way back to Idle.
 */
export type SchedulerState =
  | "Stopped"
  | "Idle"
  | "Fetching"
  | "Extracting"
  | "Persisting"
  | "ErrorBackoff";

export type CycleStage = "Fetching" | "Extracting" | "Persisting";

export type CycleOutcome =
  | { status: "stored"; sample: Sample }
  | { status: "unchanged"; sample: Sample }
  | { status: "skipped"; reason: string }
  | { status: "failed"; error: IngestionError }
  | { status: "abandoned"; stage: CycleStage }
  | { status: "crashed"; message: string };

export interface CycleReport {
  startedAt: string;
  finishedAt: string;
  status: CycleOutcome["status"];
  detail?: string;
}

export interface SchedulerStatus {
  state: SchedulerState;
  intervalMinutes: number;
  nextRunAt: string | null;
  lastCycle: CycleReport | null;
  cyclesRun: number;
  samplesStored: number;
  failedCycles: number;
}
