/**
 * A single persisted occupancy reading.
 */
export interface Sample {
  timestamp: Date;
  occupancy: number;
  capacity: number | null;
  rawStatus: string | null;
}

/**
 * Truncates a date to whole seconds (samples are stored at second precision).
 */
export function toSecondPrecision(date: Date): Date {
  return new Date(Math.floor(date.getTime() / 1000) * 1000);
}

/**
 * Occupancy as a share of capacity, rounded to one decimal.
 * Null when the page did not expose a usable capacity.
 */
export function occupancyPercentage(sample: Sample): number | null {
  if (sample.capacity === null || sample.capacity <= 0) {
    return null;
  }
  return Math.round((sample.occupancy / sample.capacity) * 1000) / 10;
}

export function isSameReading(a: Sample, b: Sample): boolean {
  return (
    a.occupancy === b.occupancy &&
    a.capacity === b.capacity &&
    a.rawStatus === b.rawStatus
  );
}
