/**
 * Failure taxonomy of the ingestion pipeline.
 *
 * Every stage reports one of these as a value; the scheduler logs and absorbs
 * them, so none of them ever reaches the HTTP layer.
 */

export type FetchError =
  | { family: "FetchError"; kind: "Timeout"; url: string; timeoutMs: number }
  | { family: "FetchError"; kind: "ConnectionRefused"; url: string }
  | {
      family: "FetchError";
      kind: "NonSuccessStatus";
      url: string;
      status: number;
    }
  | { family: "FetchError"; kind: "TransportError"; url: string; message: string };

export type ExtractError =
  | { family: "ExtractError"; kind: "StructureNotFound"; locator: string }
  | { family: "ExtractError"; kind: "NonNumericValue"; text: string }
  | {
      family: "ExtractError";
      kind: "OutOfRange";
      value: number;
      min: number;
      max: number;
    };

export type StoreError =
  | { family: "StoreError"; kind: "DuplicateTimestamp"; timestamp: Date }
  | { family: "StoreError"; kind: "WriteFailure"; message: string };

export type IngestionError = FetchError | ExtractError | StoreError;

/**
 * Renders an error as `Family.Kind(detail)`, e.g. `FetchError.NonSuccessStatus(503)`.
 */
export function describeIngestionError(error: IngestionError): string {
  return `${error.family}.${error.kind}(${errorDetail(error)})`;
}

function errorDetail(error: IngestionError): string {
  switch (error.kind) {
    case "Timeout":
      return `${error.timeoutMs}ms`;
    case "ConnectionRefused":
      return error.url;
    case "NonSuccessStatus":
      return String(error.status);
    case "TransportError":
      return error.message;
    case "StructureNotFound":
      return error.locator;
    case "NonNumericValue":
      return JSON.stringify(error.text);
    case "OutOfRange":
      return `${error.value} not in [${error.min}, ${error.max}]`;
    case "DuplicateTimestamp":
      return error.timestamp.toISOString();
    case "WriteFailure":
      return error.message;
  }
}
