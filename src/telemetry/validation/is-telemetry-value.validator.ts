import { Validate, ValidatorConstraint } from "class-validator";
import type { ValidationArguments, ValidationOptions, ValidatorConstraintInterface } from "class-validator";
import type { TelemetryValue } from "../telemetry.types";

export function isTelemetryValue(value: unknown): value is TelemetryValue {
  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      return value !== null;
    default:
      return false;
  }
}

@ValidatorConstraint({ name: "isTelemetryValue", async: false })
export class IsTelemetryValueConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return isTelemetryValue(value);
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must be a string, a finite number, a boolean, an object or an array`;
  }
}

/**
 * Accepts the value types the telemetry platform stores: string, finite number,
 * boolean, or a JSON object/array
 */
export function IsTelemetryValue(options?: ValidationOptions): PropertyDecorator {
  return Validate(IsTelemetryValueConstraint, options);
}
