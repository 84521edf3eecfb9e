/**
 * Reading pulled out of the source page, ready to be stored as a sample.
 */
export interface ExtractedReading {
  timestamp: Date;
  occupancy: number;
  capacity: number | null;
  rawStatus: string | null;
}
