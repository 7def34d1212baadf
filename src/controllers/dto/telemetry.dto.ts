import { ApiProperty, ApiPropertyOptional, getSchemaPath } from "@nestjs/swagger";
import { TelemetrySampleDto } from "@/telemetry/dto/telemetry-sample.dto";
import type { BulkSummary, TargetOutcome } from "@/telemetry/telemetry.types";
import type { AttributeScope } from "@/upstream/upstream.types";
import { HttpErrorResponseDto } from "./common-error.dto";

export const TELEMETRY_PAYLOAD_SCHEMA = {
  type: "object",
  description: "Telemetry key mapped to its samples",
  additionalProperties: { type: "array", items: { $ref: getSchemaPath(TelemetrySampleDto) } },
  example: {
    temperature: [{ ts: 1767225600000, value: 21.5 }],
    humidity: [{ ts: 1767225600000, value: 48 }],
  },
};

export const BULK_UPLOAD_BODY_SCHEMA = {
  type: "object",
  description: "Device id mapped to that device's telemetry payload",
  additionalProperties: TELEMETRY_PAYLOAD_SCHEMA,
  example: {
    "0f2f6b30-1c4e-4e2a-9d52-6d1f3f6c1a01": { temperature: [{ ts: 1767225600000, value: 21.5 }] },
    "7a8e5b11-52c0-4a07-b4de-0e5f0e0f4c22": { pressure: [{ ts: 1767225600000, value: 1013.25 }] },
  },
};

export const ATTRIBUTES_PAYLOAD_SCHEMA = {
  type: "object",
  description: "Attribute name mapped to its value",
  additionalProperties: true,
  minProperties: 1,
  example: {
    targetTemperature: 22.0,
    operationMode: "AUTO",
    alertThresholds: { temperature: { min: 10, max: 35 } },
  },
};

export class DeviceUploadResponseDto {
  @ApiProperty({ example: "success" })
  status!: "success";

  @ApiProperty({ example: "2026-01-01T00:00:00.000Z" })
  timestamp!: string;

  @ApiProperty({ example: "0f2f6b30-1c4e-4e2a-9d52-6d1f3f6c1a01" })
  device_id!: string;

  @ApiProperty({ type: [String], example: ["temperature", "humidity"] })
  keys_uploaded!: string[];

  @ApiProperty({ example: 2 })
  total_data_points!: number;

  @ApiProperty({ example: "Successfully uploaded 2 data points for 2 telemetry keys" })
  message!: string;
}

export class BulkSummaryDto implements BulkSummary {
  @ApiProperty({ example: 2 })
  total_devices!: number;

  @ApiProperty({ example: 1 })
  successful_devices!: number;

  @ApiProperty({ example: 1 })
  failed_devices!: number;

  @ApiProperty({ example: 3 })
  total_data_points!: number;
}

export class BulkDeviceResultDto {
  @ApiProperty({ enum: ["success", "failed"] })
  status!: TargetOutcome["status"];

  @ApiPropertyOptional({ type: [String], example: ["temperature"] })
  keys_uploaded?: string[];

  @ApiProperty({ example: 1 })
  data_points!: number;

  @ApiPropertyOptional({ type: HttpErrorResponseDto })
  error?: HttpErrorResponseDto;
}

export class BulkUploadResponseDto {
  @ApiProperty({ example: "completed" })
  status!: "completed";

  @ApiProperty({ type: BulkSummaryDto })
  summary!: BulkSummaryDto;

  @ApiProperty({
    description: "Outcome per device id, in submission order",
    type: "object",
    additionalProperties: { $ref: getSchemaPath(BulkDeviceResultDto) },
  })
  results!: Record<string, TargetOutcome>;

  @ApiProperty({ example: "Bulk upload completed: 1/2 devices successful" })
  message!: string;
}

export class AttributesUploadResponseDto {
  @ApiProperty({ example: "success" })
  status!: "success";

  @ApiProperty({ example: "2026-01-01T00:00:00.000Z" })
  timestamp!: string;

  @ApiProperty({ example: "0f2f6b30-1c4e-4e2a-9d52-6d1f3f6c1a01" })
  device_id!: string;

  @ApiProperty({ enum: ["SERVER_SCOPE", "SHARED_SCOPE"] })
  scope!: AttributeScope;

  @ApiProperty({ type: [String], example: ["serialNumber", "firmwareVersion"] })
  attributes_uploaded!: string[];

  @ApiProperty({ example: 2 })
  count!: number;

  @ApiProperty({ example: "Successfully uploaded 2 server-side attributes" })
  message!: string;
}
