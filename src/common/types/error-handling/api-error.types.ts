/**
 * API error types
 *
 * Every failure leaving the service is reported with one of the codes below,
 * in the {@link NormalizedError} shape.
 */

export enum ErrorCode {
  VALIDATION_ERROR = "VALIDATION_ERROR",
  AUTHENTICATION_FAILED = "AUTHENTICATION_FAILED",
  RATE_LIMIT_EXCEEDED = "RATE_LIMIT_EXCEEDED",
  RESOURCE_NOT_FOUND = "RESOURCE_NOT_FOUND",
  UPSTREAM_ERROR = "UPSTREAM_ERROR",
  INTERNAL_ERROR = "INTERNAL_ERROR",
}

export const GENERIC_ERROR_MESSAGES: Readonly<Record<ErrorCode, string>> = {
  [ErrorCode.VALIDATION_ERROR]: "The request contains invalid data. Please check your input and try again.",
  [ErrorCode.AUTHENTICATION_FAILED]: "Authentication is required to access this resource.",
  [ErrorCode.RATE_LIMIT_EXCEEDED]: "Too many requests. Please slow down and try again later.",
  [ErrorCode.RESOURCE_NOT_FOUND]: "The requested resource was not found.",
  [ErrorCode.UPSTREAM_ERROR]: "The backend service is temporarily unavailable.",
  [ErrorCode.INTERNAL_ERROR]: "An internal server error occurred. Please try again later.",
};

export interface FieldError {
  field: string;
  constraints?: string[];
}

export interface ValidationErrorCause {
  kind: "validation";
  message: string;
  fieldErrors?: FieldError[];
}

export interface AuthenticationErrorCause {
  kind: "authentication";
  message: string;
}

export interface RateLimitErrorCause {
  kind: "rate_limit";
  message: string;
  limit: number;
  windowSeconds: number;
  retryAfterSeconds: number;
  /** Epoch seconds at which the oldest admission leaves the window */
  resetAt: number;
}

export interface NotFoundErrorCause {
  kind: "not_found";
  message: string;
}

export interface UpstreamErrorCause {
  kind: "upstream";
  message: string;
  statusCode?: number;
  timedOut?: boolean;
  /** Raw upstream response text; only surfaced in debug mode */
  upstreamMessage?: string;
}

export interface InternalErrorCause {
  kind: "internal";
  message: string;
  error?: unknown;
}

/** A framework-raised HttpException that did not originate from ApiException */
export interface HttpErrorCause {
  kind: "http";
  status: number;
  message: string;
}

export type ErrorCause =
  | ValidationErrorCause
  | AuthenticationErrorCause
  | RateLimitErrorCause
  | NotFoundErrorCause
  | UpstreamErrorCause
  | InternalErrorCause
  | HttpErrorCause;

export interface NormalizedErrorDetails {
  limit?: number;
  window_seconds?: number;
  retry_after?: number;
  reset_at?: number;
  upstream_status?: number;
  timed_out?: boolean;
  field_errors?: FieldError[];
  // debug mode only
  upstream_message?: string;
  internal_error?: string;
}

export interface NormalizedError {
  status: number;
  error_code: ErrorCode;
  message: string;
  timestamp: string;
  details?: NormalizedErrorDetails;
}
