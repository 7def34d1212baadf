import { Body, Controller, HttpCode, HttpStatus, Param, Post, Res, UseGuards } from "@nestjs/common";
import {
  ApiBody,
  ApiExtraModels,
  ApiOperation,
  ApiParam,
  ApiResponse,
  ApiSecurity,
  ApiTags,
} from "@nestjs/swagger";
import type { Response } from "express";

import { BaseController } from "@/common/base";
import { API_KEY_HEADER, ApiKeyGuard } from "@/guards/api-key.guard";
import { BulkUploadOrchestrator } from "@/telemetry/bulk-upload.orchestrator";
import { TelemetrySampleDto } from "@/telemetry/dto/telemetry-sample.dto";
import { BulkUploadBodyPipe } from "@/telemetry/pipes/bulk-upload-body.pipe";
import { TelemetryService } from "@/telemetry/telemetry.service";
import type { UploadTarget } from "@/telemetry/telemetry.types";
import type { AttributeScope } from "@/upstream/upstream.types";
import { HttpErrorResponseDto } from "./dto/common-error.dto";
import {
  ATTRIBUTES_PAYLOAD_SCHEMA,
  AttributesUploadResponseDto,
  BULK_UPLOAD_BODY_SCHEMA,
  BulkDeviceResultDto,
  BulkUploadResponseDto,
  DeviceUploadResponseDto,
  TELEMETRY_PAYLOAD_SCHEMA,
} from "./dto/telemetry.dto";

const SCOPE_LABELS: Record<AttributeScope, string> = {
  SERVER_SCOPE: "server-side",
  SHARED_SCOPE: "shared",
};

@ApiTags("Telemetry")
@ApiSecurity(API_KEY_HEADER)
@ApiExtraModels(TelemetrySampleDto, BulkDeviceResultDto, HttpErrorResponseDto)
@Controller("tb")
@UseGuards(ApiKeyGuard)
export class TelemetryController extends BaseController {
  constructor(
    private readonly telemetryService: TelemetryService,
    private readonly orchestrator: BulkUploadOrchestrator
  ) {
    super();
  }

  @Post("devices/:deviceId/telemetry")
  @HttpCode(HttpStatus.CREATED)
  @ApiOperation({ summary: "Upload telemetry for one device" })
  @ApiParam({ name: "deviceId", description: "Device id on the telemetry platform" })
  @ApiBody({ schema: TELEMETRY_PAYLOAD_SCHEMA })
  @ApiResponse({ status: 201, type: DeviceUploadResponseDto })
  @ApiResponse({ status: 401, description: "Missing or invalid API key", type: HttpErrorResponseDto })
  @ApiResponse({ status: 404, description: "Device not found upstream", type: HttpErrorResponseDto })
  @ApiResponse({ status: 422, description: "Invalid telemetry payload", type: HttpErrorResponseDto })
  @ApiResponse({ status: 429, description: "Rate limit exceeded", type: HttpErrorResponseDto })
  @ApiResponse({ status: 502, description: "Telemetry platform error", type: HttpErrorResponseDto })
  async uploadDeviceTelemetry(
    @Param("deviceId") deviceId: string,
    @Body() payload: unknown,
    @Res({ passthrough: true }) response: Response
  ): Promise<DeviceUploadResponseDto> {
    return this.executeOperation<DeviceUploadResponseDto>(`uploadDeviceTelemetry ${deviceId}`, async () => {
      const result = await this.telemetryService.uploadDeviceTelemetry(deviceId, payload, {
        signal: this.createDisconnectSignal(response),
      });

      return {
        status: "success",
        timestamp: new Date().toISOString(),
        device_id: result.deviceId,
        keys_uploaded: result.keys,
        total_data_points: result.dataPoints,
        message: `Successfully uploaded ${result.dataPoints} data points for ${result.keys.length} telemetry keys`,
      };
    });
  }

  @Post("devices/:deviceId/attributes/server")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Upload server-side attributes for one device",
    description: "Server-side attributes hold configuration and metadata managed by the server application.",
  })
  @ApiParam({ name: "deviceId", description: "Device id on the telemetry platform" })
  @ApiBody({ schema: ATTRIBUTES_PAYLOAD_SCHEMA })
  @ApiResponse({ status: 200, type: AttributesUploadResponseDto })
  @ApiResponse({ status: 401, description: "Missing or invalid API key", type: HttpErrorResponseDto })
  @ApiResponse({ status: 404, description: "Device not found upstream", type: HttpErrorResponseDto })
  @ApiResponse({ status: 422, description: "No attributes provided", type: HttpErrorResponseDto })
  @ApiResponse({ status: 429, description: "Rate limit exceeded", type: HttpErrorResponseDto })
  @ApiResponse({ status: 502, description: "Telemetry platform error", type: HttpErrorResponseDto })
  async uploadServerAttributes(
    @Param("deviceId") deviceId: string,
    @Body() attributes: unknown,
    @Res({ passthrough: true }) response: Response
  ): Promise<AttributesUploadResponseDto> {
    return this.uploadAttributes(deviceId, "SERVER_SCOPE", attributes, response);
  }

  @Post("devices/:deviceId/attributes/shared")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Upload shared attributes for one device",
    description: "Shared attributes are visible to the device, which reads them as setpoints and thresholds.",
  })
  @ApiParam({ name: "deviceId", description: "Device id on the telemetry platform" })
  @ApiBody({ schema: ATTRIBUTES_PAYLOAD_SCHEMA })
  @ApiResponse({ status: 200, type: AttributesUploadResponseDto })
  @ApiResponse({ status: 401, description: "Missing or invalid API key", type: HttpErrorResponseDto })
  @ApiResponse({ status: 404, description: "Device not found upstream", type: HttpErrorResponseDto })
  @ApiResponse({ status: 422, description: "No attributes provided", type: HttpErrorResponseDto })
  @ApiResponse({ status: 429, description: "Rate limit exceeded", type: HttpErrorResponseDto })
  @ApiResponse({ status: 502, description: "Telemetry platform error", type: HttpErrorResponseDto })
  async uploadSharedAttributes(
    @Param("deviceId") deviceId: string,
    @Body() attributes: unknown,
    @Res({ passthrough: true }) response: Response
  ): Promise<AttributesUploadResponseDto> {
    return this.uploadAttributes(deviceId, "SHARED_SCOPE", attributes, response);
  }

  @Post("telemetry/bulk")
  @HttpCode(HttpStatus.OK)
  @ApiOperation({
    summary: "Upload telemetry for many devices",
    description:
      "Devices are uploaded concurrently. A device that fails is reported in `results` and does not affect the others.",
  })
  @ApiBody({ schema: BULK_UPLOAD_BODY_SCHEMA })
  @ApiResponse({ status: 200, type: BulkUploadResponseDto })
  @ApiResponse({ status: 401, description: "Missing or invalid API key", type: HttpErrorResponseDto })
  @ApiResponse({ status: 422, description: "Malformed bulk body", type: HttpErrorResponseDto })
  @ApiResponse({ status: 429, description: "Rate limit exceeded", type: HttpErrorResponseDto })
  async uploadBulkTelemetry(
    @Body(BulkUploadBodyPipe) targets: UploadTarget[],
    @Res({ passthrough: true }) response: Response
  ): Promise<BulkUploadResponseDto> {
    return this.executeOperation<BulkUploadResponseDto>(`uploadBulkTelemetry (${targets.length} devices)`, async () => {
      const report = await this.orchestrator.run(targets, { signal: this.createDisconnectSignal(response) });
      const { summary } = report;

      this.logger.log(
        `Bulk upload completed: ${summary.successful_devices}/${summary.total_devices} devices, ` +
          `${summary.total_data_points} data points`
      );

      return {
        status: "completed",
        summary,
        results: Object.fromEntries(report.results),
        message: `Bulk upload completed: ${summary.successful_devices}/${summary.total_devices} devices successful`,
      };
    });
  }

  private uploadAttributes(
    deviceId: string,
    scope: AttributeScope,
    attributes: unknown,
    response: Response
  ): Promise<AttributesUploadResponseDto> {
    return this.executeOperation<AttributesUploadResponseDto>(`uploadAttributes ${scope} ${deviceId}`, async () => {
      const result = await this.telemetryService.uploadDeviceAttributes(deviceId, scope, attributes, {
        signal: this.createDisconnectSignal(response),
      });

      return {
        status: "success",
        timestamp: new Date().toISOString(),
        device_id: result.deviceId,
        scope: result.scope,
        attributes_uploaded: result.keys,
        count: result.keys.length,
        message: `Successfully uploaded ${result.keys.length} ${SCOPE_LABELS[scope]} attributes`,
      };
    });
  }
}
