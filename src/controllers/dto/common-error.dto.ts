import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { ErrorCode } from "@/common/types/error-handling";
import type { NormalizedError, NormalizedErrorDetails } from "@/common/types/error-handling";

export class FieldErrorDto {
  @ApiProperty({ description: "Offending field", example: "temperature[0].ts" })
  field!: string;

  @ApiPropertyOptional({
    description: "Constraint messages (debug mode only)",
    type: [String],
    example: ["ts must be an integer epoch timestamp in milliseconds"],
  })
  constraints?: string[];
}

export class ErrorDetailsDto implements NormalizedErrorDetails {
  @ApiPropertyOptional({ description: "Requests allowed per window", example: 100 })
  limit?: number;

  @ApiPropertyOptional({ description: "Window length in seconds", example: 60 })
  window_seconds?: number;

  @ApiPropertyOptional({ description: "Seconds until a request will be admitted again", example: 42 })
  retry_after?: number;

  @ApiPropertyOptional({ description: "Epoch seconds at which the window frees up", example: 1767225660 })
  reset_at?: number;

  @ApiPropertyOptional({ description: "Status returned by the telemetry platform", example: 503 })
  upstream_status?: number;

  @ApiPropertyOptional({ description: "The upstream call exceeded its deadline", example: true })
  timed_out?: boolean;

  @ApiPropertyOptional({ type: [FieldErrorDto] })
  field_errors?: FieldErrorDto[];

  @ApiPropertyOptional({ description: "Upstream response text (debug mode only)" })
  upstream_message?: string;

  @ApiPropertyOptional({ description: "Internal error description (debug mode only)" })
  internal_error?: string;
}

export class HttpErrorResponseDto implements NormalizedError {
  @ApiProperty({ description: "HTTP status code", example: 429 })
  status!: number;

  @ApiProperty({ enum: ErrorCode, example: ErrorCode.RATE_LIMIT_EXCEEDED })
  error_code!: ErrorCode;

  @ApiProperty({
    description: "Generic message, or the underlying message in debug mode",
    example: "Too many requests. Please slow down and try again later.",
  })
  message!: string;

  @ApiProperty({ description: "ISO-8601 time the error was produced", example: "2026-01-01T00:00:00.000Z" })
  timestamp!: string;

  @ApiPropertyOptional({ type: ErrorDetailsDto })
  details?: ErrorDetailsDto;
}
