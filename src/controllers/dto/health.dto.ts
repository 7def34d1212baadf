import { ApiProperty } from "@nestjs/swagger";

export class ServiceInfoDto {
  @ApiProperty({ example: "telemetry-proxy-api" })
  service!: string;

  @ApiProperty({ example: "0.1.0" })
  version!: string;
}

export class HealthResponseDto extends ServiceInfoDto {
  @ApiProperty({ example: "success" })
  status!: "success";

  @ApiProperty({ description: "ISO-8601 time of the check", example: "2026-01-01T00:00:00.000Z" })
  timestamp!: string;

  @ApiProperty({ description: "Seconds since the process started serving", example: 3600 })
  uptime!: number;
}
