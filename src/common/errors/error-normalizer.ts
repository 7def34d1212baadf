import { HttpException } from "@nestjs/common";
import { GENERIC_ERROR_MESSAGES } from "@/common/types/error-handling";
import type { ErrorCause, NormalizedError, NormalizedErrorDetails } from "@/common/types/error-handling";
import { ApiException } from "./api-exception";
import { assertNever, classifyErrorCause } from "./error-classification";

export const REDACTED = "[REDACTED]";

export interface ErrorNormalizerOptions {
  /** Expose cause messages and diagnostic details */
  debug: boolean;
  /** Values scrubbed from every debug string; read on each call so rotated tokens are covered */
  secrets?: () => Iterable<string | undefined>;
  clock?: () => Date;
}

/**
 * Collapses every failure path into the stable external error shape
 */
export class ErrorNormalizer {
  private readonly debug: boolean;
  private readonly secrets: () => Iterable<string | undefined>;
  private readonly clock: () => Date;

  constructor(options: ErrorNormalizerOptions) {
    this.debug = options.debug;
    this.secrets = options.secrets ?? (() => []);
    this.clock = options.clock ?? (() => new Date());
  }

  normalize(cause: ErrorCause): NormalizedError {
    const { code, status } = classifyErrorCause(cause);
    const details = this.buildDetails(cause);
    const message = this.debug && cause.message ? this.redact(cause.message) : GENERIC_ERROR_MESSAGES[code];

    return {
      status,
      error_code: code,
      message,
      timestamp: this.clock().toISOString(),
      ...(details ? { details } : {}),
    };
  }

  /**
   * Turn anything thrown by a handler, guard or pipe into an ErrorCause
   */
  causeFromException(exception: unknown): ErrorCause {
    if (exception instanceof ApiException) {
      return exception.errorCause;
    }

    if (exception instanceof HttpException) {
      return { kind: "http", status: exception.getStatus(), message: this.httpExceptionMessage(exception) };
    }

    if (exception instanceof Error) {
      const status = this.exposedHttpStatus(exception);
      if (status !== undefined) {
        return { kind: "http", status, message: exception.message };
      }
      return { kind: "internal", message: exception.message, error: exception };
    }

    return { kind: "internal", message: "Unknown error", error: exception };
  }

  normalizeException(exception: unknown): NormalizedError {
    return this.normalize(this.causeFromException(exception));
  }

  redact(value: string): string {
    const secrets = [...this.secrets()]
      .filter((secret): secret is string => typeof secret === "string" && secret.length > 0)
      .sort((a, b) => b.length - a.length);

    return secrets.reduce((text, secret) => text.split(secret).join(REDACTED), value);
  }

  private buildDetails(cause: ErrorCause): NormalizedErrorDetails | undefined {
    const details: NormalizedErrorDetails = {};

    switch (cause.kind) {
      case "rate_limit":
        details.limit = cause.limit;
        details.window_seconds = cause.windowSeconds;
        details.retry_after = cause.retryAfterSeconds;
        details.reset_at = cause.resetAt;
        break;
      case "upstream":
        if (cause.statusCode !== undefined) {
          details.upstream_status = cause.statusCode;
        }
        if (cause.timedOut) {
          details.timed_out = true;
        }
        if (this.debug && cause.upstreamMessage) {
          details.upstream_message = this.redact(cause.upstreamMessage);
        }
        break;
      case "validation":
        if (cause.fieldErrors && cause.fieldErrors.length > 0) {
          details.field_errors = cause.fieldErrors.map(fieldError =>
            this.debug && fieldError.constraints
              ? { field: fieldError.field, constraints: fieldError.constraints.map(c => this.redact(c)) }
              : { field: fieldError.field }
          );
        }
        break;
      case "internal":
        if (this.debug && cause.error !== undefined) {
          details.internal_error = this.redact(this.describe(cause.error));
        }
        break;
      case "authentication":
      case "not_found":
      case "http":
        break;
      default:
        return assertNever(cause);
    }

    return Object.keys(details).length > 0 ? details : undefined;
  }

  /**
   * Status of a client error raised by Express middleware such as the body parser
   * (http-errors sets `expose` only on 4xx errors safe to show the caller)
   */
  private exposedHttpStatus(error: Error): number | undefined {
    if (!("expose" in error) || error.expose !== true) {
      return undefined;
    }
    const status = "status" in error ? error.status : "statusCode" in error ? error.statusCode : undefined;
    return typeof status === "number" && status >= 400 && status < 600 ? status : undefined;
  }

  private httpExceptionMessage(exception: HttpException): string {
    const response = exception.getResponse();
    if (typeof response === "string") {
      return response;
    }
    if ("message" in response) {
      const { message } = response;
      if (Array.isArray(message)) {
        return message.map(String).join("; ");
      }
      if (typeof message === "string") {
        return message;
      }
    }
    return exception.message;
  }

  private describe(error: unknown): string {
    if (error instanceof Error) {
      return `${error.name}: ${error.message}`;
    }
    return String(error);
  }
}
