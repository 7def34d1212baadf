import { HttpStatus } from "@nestjs/common";
import { ErrorCode } from "@/common/types/error-handling";
import type { ErrorCause } from "@/common/types/error-handling";

export interface ErrorClassification {
  code: ErrorCode;
  status: number;
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled error cause: ${JSON.stringify(value)}`);
}

/**
 * Map an arbitrary HTTP status raised by the framework onto the closed taxonomy
 */
export function errorCodeForStatus(status: number): ErrorCode {
  switch (status) {
    case HttpStatus.BAD_REQUEST:
    case HttpStatus.PAYLOAD_TOO_LARGE:
    case HttpStatus.UNSUPPORTED_MEDIA_TYPE:
    case HttpStatus.UNPROCESSABLE_ENTITY:
      return ErrorCode.VALIDATION_ERROR;
    case HttpStatus.UNAUTHORIZED:
    case HttpStatus.FORBIDDEN:
      return ErrorCode.AUTHENTICATION_FAILED;
    case HttpStatus.NOT_FOUND:
      return ErrorCode.RESOURCE_NOT_FOUND;
    case HttpStatus.TOO_MANY_REQUESTS:
      return ErrorCode.RATE_LIMIT_EXCEEDED;
    case HttpStatus.BAD_GATEWAY:
    case HttpStatus.SERVICE_UNAVAILABLE:
    case HttpStatus.GATEWAY_TIMEOUT:
      return ErrorCode.UPSTREAM_ERROR;
    default:
      return ErrorCode.INTERNAL_ERROR;
  }
}

export function classifyErrorCause(cause: ErrorCause): ErrorClassification {
  switch (cause.kind) {
    case "validation":
      return { code: ErrorCode.VALIDATION_ERROR, status: HttpStatus.UNPROCESSABLE_ENTITY };
    case "authentication":
      return { code: ErrorCode.AUTHENTICATION_FAILED, status: HttpStatus.UNAUTHORIZED };
    case "rate_limit":
      return { code: ErrorCode.RATE_LIMIT_EXCEEDED, status: HttpStatus.TOO_MANY_REQUESTS };
    case "not_found":
      return { code: ErrorCode.RESOURCE_NOT_FOUND, status: HttpStatus.NOT_FOUND };
    case "upstream":
      return { code: ErrorCode.UPSTREAM_ERROR, status: HttpStatus.BAD_GATEWAY };
    case "internal":
      return { code: ErrorCode.INTERNAL_ERROR, status: HttpStatus.INTERNAL_SERVER_ERROR };
    case "http":
      return { code: errorCodeForStatus(cause.status), status: cause.status };
    default:
      return assertNever(cause);
  }
}
