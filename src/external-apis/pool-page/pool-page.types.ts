/**
 * Raw response of the pool occupancy page, before any parsing.
 */
export interface RawPage {
  url: string;
  status: number;
  body: Buffer;
  contentType: string | null;
  /** When the response arrived; becomes the sample timestamp */
  fetchedAt: Date;
}

export interface FetchOptions {
  timeoutMs: number;
  /** Aborts the request when the scheduler shuts down */
  signal?: AbortSignal;
}
