import {
  CallHandler,
  ExecutionContext,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
  NestInterceptor,
} from "@nestjs/common";
import { Observable } from "rxjs";
import { tap } from "rxjs/operators";
import { Request, Response } from "express";

export const SLOW_REQUEST_MS = 1000;

/**
 * Access log for requests worth a look: failures and slow responses.
 *
 * The chart polls the read endpoints every few minutes, so successful fast
 * requests are not logged. Failures are timed here; their message is logged by
 * HttpExceptionFilter.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger("HTTP");

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const http = context.switchToHttp();
    const { method, originalUrl } = http.getRequest<Request>();
    const response = http.getResponse<Response>();
    const startedAt = Date.now();

    return next.handle().pipe(
      tap({
        next: () =>
          this.logRequest(method, originalUrl, response.statusCode, startedAt),
        error: (error: unknown) =>
          this.logRequest(method, originalUrl, statusOf(error), startedAt),
      }),
    );
  }

  private logRequest(
    method: string,
    url: string,
    status: number,
    startedAt: number,
  ): void {
    const durationMs = Date.now() - startedAt;
    const line = `${method} ${url} ${status} - ${durationMs}ms`;

    if (status >= 500) {
      this.logger.error(`❌ ${line}`);
    } else if (status >= 400) {
      this.logger.warn(`⚠️  ${line}`);
    } else if (durationMs > SLOW_REQUEST_MS) {
      this.logger.warn(`🐌 ${line}`);
    }
  }
}

function statusOf(error: unknown): number {
  return error instanceof HttpException
    ? error.getStatus()
    : HttpStatus.INTERNAL_SERVER_ERROR;
}
