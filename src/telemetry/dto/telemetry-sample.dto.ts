import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsPositive } from "class-validator";
import { IsTelemetryValue } from "../validation/is-telemetry-value.validator";
import type { TelemetryValue } from "../telemetry.types";

export class TelemetrySampleDto {
  @ApiProperty({
    description: "Sample time in epoch milliseconds",
    example: 1767225600000,
  })
  @IsInt({ message: "ts must be an integer epoch timestamp in milliseconds" })
  @IsPositive({ message: "ts must be a positive timestamp" })
  ts!: number;

  @ApiProperty({
    description: "Sample value: string, number, boolean or JSON object/array",
    example: 21.5,
  })
  @IsTelemetryValue()
  value!: TelemetryValue;
}
