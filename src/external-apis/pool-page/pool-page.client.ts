import { Inject, Injectable, Logger } from "@nestjs/common";
import axios, { AxiosInstance } from "axios";
import { RawPage, FetchOptions } from "./pool-page.types";
import { Result, ok, err } from "../../common/types/result.type";
import { FetchError } from "../../common/types/ingestion-error.type";
import { CLOCK, Clock } from "../../common/clock/clock";

const TIMEOUT_CODES = new Set(["ECONNABORTED", "ETIMEDOUT"]);
// The occupancy page is a few kilobytes
const MAX_BODY_BYTES = 5 * 1024 * 1024;

/**
 * Pool Page Client
 *
 * Fetches the third-party occupancy page. One GET per call, no retries
 * (the scheduler interval is the retry policy). Every failure comes back as a
 * FetchError value; nothing is thrown past this class.
 *
 * axios only applies `timeout` to an idle socket, so a server trickling bytes
 * could hold the request open indefinitely. A deadline timer aborts the whole
 * request after `timeoutMs` instead.
 */
@Injectable()
export class PoolPageClient {
  private readonly logger = new Logger(PoolPageClient.name);
  private readonly client: AxiosInstance;

  constructor(@Inject(CLOCK) private readonly clock: Clock) {
    this.client = axios.create({
      responseType: "arraybuffer",
      // Status codes are mapped below instead of thrown
      validateStatus: () => true,
      maxRedirects: 5,
      maxContentLength: MAX_BODY_BYTES,
      headers: {
        "User-Agent":
          "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0 Safari/537.36",
        Accept: "text/html,application/xhtml+xml",
      },
    });
  }

  async fetch(
    url: string,
    options: FetchOptions,
  ): Promise<Result<RawPage, FetchError>> {
    if (!isAbsoluteHttpUrl(url)) {
      return err({
        family: "FetchError",
        kind: "TransportError",
        url,
        message: "URL must be an absolute http(s) URL",
      });
    }

    const controller = new AbortController();
    const cancel = () => controller.abort();
    options.signal?.addEventListener("abort", cancel, { once: true });
    if (options.signal?.aborted) {
      controller.abort();
    }

    let timedOut = false;
    const deadline = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, options.timeoutMs);

    try {
      const response = await this.client.get<ArrayBuffer>(url, {
        timeout: options.timeoutMs,
        signal: controller.signal,
      });

      if (response.status < 200 || response.status >= 300) {
        return err({
          family: "FetchError",
          kind: "NonSuccessStatus",
          url,
          status: response.status,
        });
      }

      const contentType = response.headers["content-type"];
      const body = Buffer.from(response.data);
      this.logger.debug(`Fetched ${body.length} bytes from ${url}`);

      return ok({
        url,
        status: response.status,
        body,
        contentType: typeof contentType === "string" ? contentType : null,
        fetchedAt: this.clock.now(),
      });
    } catch (error) {
      if (timedOut) {
        return err({
          family: "FetchError",
          kind: "Timeout",
          url,
          timeoutMs: options.timeoutMs,
        });
      }
      return err(toFetchError(url, options.timeoutMs, error));
    } finally {
      clearTimeout(deadline);
      options.signal?.removeEventListener("abort", cancel);
    }
  }
}

function isAbsoluteHttpUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return parsed.protocol === "http:" || parsed.protocol === "https:";
  } catch {
    return false;
  }
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error) {
    return typeof error.code === "string" ? error.code : undefined;
  }
  return undefined;
}

function toFetchError(
  url: string,
  timeoutMs: number,
  error: unknown,
): FetchError {
  const code = errorCode(error);

  if (code !== undefined && TIMEOUT_CODES.has(code)) {
    return { family: "FetchError", kind: "Timeout", url, timeoutMs };
  }
  if (code === "ECONNREFUSED") {
    return { family: "FetchError", kind: "ConnectionRefused", url };
  }

  const message = error instanceof Error ? error.message : String(error);
  return {
    family: "FetchError",
    kind: "TransportError",
    url,
    message: code ? `${code}: ${message}` : message,
  };
}
