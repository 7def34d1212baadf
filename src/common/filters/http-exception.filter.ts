import { ArgumentsHost, Catch, ExceptionFilter, Injectable, Logger } from "@nestjs/common";
import type { Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { ErrorNormalizer } from "@/common/errors";
import type { NormalizedError } from "@/common/types/error-handling";

export const REQUEST_ID_HEADER = "X-Request-ID";

/**
 * Global exception filter. Every error leaving the API goes through the
 * ErrorNormalizer, so clients only ever see the NormalizedError shape.
 */
@Catch()
@Injectable()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  constructor(private readonly normalizer: ErrorNormalizer) {}

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const normalized = this.normalizer.normalizeException(exception);
    const requestId = request.get(REQUEST_ID_HEADER) || uuidv4();

    this.logError(exception, normalized, request, requestId);

    // Client went away mid-request (e.g. a cancelled bulk upload)
    if (response.headersSent || response.destroyed) {
      return;
    }

    response.setHeader(REQUEST_ID_HEADER, requestId);
    if (normalized.details?.retry_after !== undefined) {
      response.setHeader("Retry-After", String(normalized.details.retry_after));
    }

    response.status(normalized.status).json(normalized);
  }

  private logError(exception: unknown, normalized: NormalizedError, request: Request, requestId: string): void {
    const message = `${request.method} ${request.path} - ${normalized.status} ${normalized.error_code} [${requestId}]`;

    if (normalized.status >= 500) {
      const detail = exception instanceof Error ? `${exception.message}\n${exception.stack ?? ""}` : String(exception);
      this.logger.error(message, this.normalizer.redact(detail));
      return;
    }
    this.logger.warn(message);
  }
}
