import { Logger } from "@nestjs/common";

const logger = new Logger("PollingConfig");

export const DEFAULT_SOURCE_URL =
  "http://www.mosir-lancut.pl/asp/pl_start.asp?typ=14&menu=135&strona=1";
export const DEFAULT_OCCUPANCY_LABEL = "AKTUALNA LICZBA OSÓB NA BASENIE";

export interface PollingWindow {
  /** Minutes after local midnight, inclusive */
  startMinute: number;
  /** Minutes after local midnight, inclusive */
  endMinute: number;
  timezone: string;
}

export interface PollingConfig {
  enabled: boolean;
  intervalMs: number;
  sourceUrl: string;
  fetchTimeoutMs: number;
  /** null = poll around the clock */
  window: PollingWindow | null;
  /** 0 disables unchanged-reading suppression */
  dedupWindowMs: number;
}

export interface ExtractionConfig {
  occupancyLabel: string;
  statusLabel: string | null;
  maxOccupancy: number;
}

type Env = Record<string, string | undefined>;

/**
 * Reads a positive number from the environment.
 * Invalid values fall back to the default with a warning instead of aborting startup.
 */
function positiveNumber(
  env: Env,
  name: string,
  fallback: number,
  integer: boolean,
): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }

  const value = Number(raw);
  const valid =
    Number.isFinite(value) && value > 0 && (!integer || Number.isInteger(value));
  if (!valid) {
    logger.warn(`⚠️  Invalid ${name}="${raw}", using default of ${fallback}`);
    return fallback;
  }
  return value;
}

function nonNegativeNumber(env: Env, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    logger.warn(`⚠️  Invalid ${name}="${raw}", using default of ${fallback}`);
    return fallback;
  }
  return value;
}

/**
 * Parses "HH:mm-HH:mm" into minute offsets. Returns null for malformed input.
 */
export function parsePollingWindow(
  raw: string,
  timezone: string,
): PollingWindow | null {
  const match = /^\s*(\d{1,2}):(\d{2})\s*-\s*(\d{1,2}):(\d{2})\s*$/.exec(raw);
  if (!match) {
    return null;
  }

  const [startHour, startMin, endHour, endMin] = match
    .slice(1, 5)
    .map((part) => parseInt(part, 10));
  if (startHour > 23 || endHour > 23 || startMin > 59 || endMin > 59) {
    return null;
  }

  return {
    startMinute: startHour * 60 + startMin,
    endMinute: endHour * 60 + endMin,
    timezone,
  };
}

export const getPollingConfig = (env: Env = process.env): PollingConfig => {
  const intervalMinutes = positiveNumber(
    env,
    "POLLING_INTERVAL_MINUTES",
    5,
    true,
  );
  const timeoutSeconds = positiveNumber(env, "FETCH_TIMEOUT_SECONDS", 10, false);
  const dedupMinutes = nonNegativeNumber(env, "DEDUP_WINDOW_MINUTES", 4);

  const sourceUrl = env.POOL_SOURCE_URL?.trim() || DEFAULT_SOURCE_URL;
  const timezone = env.POLLING_TIMEZONE?.trim() || "Europe/Warsaw";
  const rawWindow = env.POLLING_WINDOW ?? "06:00-22:00";

  let window: PollingWindow | null = null;
  if (rawWindow.trim() !== "") {
    window = parsePollingWindow(rawWindow, timezone);
    if (!window) {
      logger.warn(
        `⚠️  Invalid POLLING_WINDOW="${rawWindow}", polling around the clock`,
      );
    }
  }

  return {
    enabled: env.INGESTION_ENABLED !== "false",
    intervalMs: intervalMinutes * 60_000,
    sourceUrl,
    fetchTimeoutMs: Math.round(timeoutSeconds * 1000),
    window,
    dedupWindowMs: Math.round(dedupMinutes * 60_000),
  };
};

export const getExtractionConfig = (
  env: Env = process.env,
): ExtractionConfig => ({
  occupancyLabel: env.OCCUPANCY_LABEL?.trim() || DEFAULT_OCCUPANCY_LABEL,
  statusLabel: env.STATUS_LABEL?.trim() || null,
  maxOccupancy: positiveNumber(env, "MAX_OCCUPANCY", 1000, true),
});

export const POLLING_CONFIG = "POLLING_CONFIG";
export const EXTRACTION_CONFIG = "EXTRACTION_CONFIG";
