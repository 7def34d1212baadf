import { plainToInstance } from "class-transformer";
import { validateSync } from "class-validator";
import type { FieldError } from "@/common/types/error-handling";
import { isPlainObject } from "@/common/utils/common.utils";
import { TelemetrySampleDto } from "../dto/telemetry-sample.dto";
import type { TelemetryPayload, TelemetrySample } from "../telemetry.types";

export type PayloadValidationResult =
  | { valid: true; payload: TelemetryPayload; keys: string[]; dataPoints: number }
  | { valid: false; message: string; fieldErrors: FieldError[] };

/**
 * Structural check of one device's telemetry payload.
 * Returns the cleaned payload (samples reduced to ts/value) or every field error found.
 */
export function validateTelemetryPayload(payload: unknown): PayloadValidationResult {
  if (!isPlainObject(payload)) {
    return invalid([{ field: "payload", constraints: ["payload must be an object of telemetry series"] }]);
  }

  const keys = Object.keys(payload);
  if (keys.length === 0) {
    return invalid([{ field: "payload", constraints: ["payload must contain at least one telemetry key"] }]);
  }

  const fieldErrors: FieldError[] = [];
  // Entries rather than assignment so a "__proto__" key stays an own property
  const cleaned: [string, TelemetrySample[]][] = [];
  let dataPoints = 0;

  for (const key of keys) {
    const series = payload[key];
    if (!Array.isArray(series)) {
      fieldErrors.push({ field: key, constraints: [`${key} must be an array of samples`] });
      continue;
    }
    if (series.length === 0) {
      fieldErrors.push({ field: key, constraints: [`${key} must contain at least one sample`] });
      continue;
    }

    const samples: TelemetrySample[] = [];
    series.forEach((raw: unknown, index) => {
      const field = `${key}[${index}]`;
      if (!isPlainObject(raw)) {
        fieldErrors.push({ field, constraints: ["sample must be an object with ts and value"] });
        return;
      }

      const sample = plainToInstance(TelemetrySampleDto, raw);
      const errors = validateSync(sample);
      if (errors.length > 0) {
        for (const error of errors) {
          fieldErrors.push({
            field: `${field}.${error.property}`,
            constraints: Object.values(error.constraints ?? {}),
          });
        }
        return;
      }

      samples.push({ ts: sample.ts, value: sample.value });
    });

    cleaned.push([key, samples]);
    dataPoints += samples.length;
  }

  if (fieldErrors.length > 0) {
    return invalid(fieldErrors);
  }

  return { valid: true, payload: Object.fromEntries(cleaned), keys, dataPoints };
}

function invalid(fieldErrors: FieldError[]): PayloadValidationResult {
  const fields = fieldErrors.map(error => error.field).join(", ");
  return { valid: false, message: `Invalid telemetry payload: ${fields}`, fieldErrors };
}
