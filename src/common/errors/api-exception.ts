import { HttpException } from "@nestjs/common";
import type {
  AuthenticationErrorCause,
  ErrorCause,
  FieldError,
  NotFoundErrorCause,
  RateLimitErrorCause,
  UpstreamErrorCause,
  ValidationErrorCause,
} from "@/common/types/error-handling";
import { classifyErrorCause } from "./error-classification";

export type ApiErrorCause = Exclude<ErrorCause, { kind: "http" }>;

/**
 * HttpException carrying a typed cause for the ErrorNormalizer.
 * The cause lives on `errorCause`; `cause` belongs to the Error base class.
 */
export class ApiException extends HttpException {
  constructor(public readonly errorCause: ApiErrorCause) {
    super(errorCause.message, classifyErrorCause(errorCause).status);
    this.name = "ApiException";
  }

  static validation(message: string, fieldErrors?: FieldError[]): ApiException {
    const cause: ValidationErrorCause = { kind: "validation", message, fieldErrors };
    return new ApiException(cause);
  }

  static authentication(message: string): ApiException {
    const cause: AuthenticationErrorCause = { kind: "authentication", message };
    return new ApiException(cause);
  }

  static rateLimit(details: Omit<RateLimitErrorCause, "kind">): ApiException {
    return new ApiException({ kind: "rate_limit", ...details });
  }

  static notFound(message: string): ApiException {
    const cause: NotFoundErrorCause = { kind: "not_found", message };
    return new ApiException(cause);
  }

  static upstream(details: Omit<UpstreamErrorCause, "kind">): ApiException {
    return new ApiException({ kind: "upstream", ...details });
  }
}
