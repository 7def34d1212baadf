import { HttpStatus, Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import { ApiException } from "@/common/errors/api-exception";
import { OperationTimeoutError, withTimeout } from "@/common/utils/async.utils";
import { errorMessage, isPlainObject } from "@/common/utils/common.utils";
import type { AttributePayload, AttributeScope, UploadResult, UpstreamTelemetryClient } from "@/upstream/upstream.types";
import type { BulkUploadConfig } from "./telemetry.types";
import { validateTelemetryPayload } from "./validation/telemetry-payload.validation";

export interface DeviceUploadResult {
  deviceId: string;
  keys: string[];
  dataPoints: number;
}

export interface DeviceAttributesResult {
  deviceId: string;
  scope: AttributeScope;
  keys: string[];
}

/**
 * Single-device telemetry and attribute uploads. Unlike the bulk path every
 * failure here rejects the whole request.
 */
@Injectable()
export class TelemetryService extends BaseService {
  constructor(
    private readonly upstream: UpstreamTelemetryClient,
    private readonly config: BulkUploadConfig
  ) {
    super();
  }

  async uploadDeviceTelemetry(
    deviceId: string,
    payload: unknown,
    options: { signal?: AbortSignal } = {}
  ): Promise<DeviceUploadResult> {
    const validation = validateTelemetryPayload(payload);
    if (!validation.valid) {
      throw ApiException.validation(validation.message, validation.fieldErrors);
    }

    const { payload: cleaned } = validation;
    await this.forward(deviceId, signal => this.upstream.upload(deviceId, cleaned, { signal }), options);

    this.logger.log(`Uploaded ${validation.dataPoints} data points for device ${deviceId}`);
    return { deviceId, keys: validation.keys, dataPoints: validation.dataPoints };
  }

  async uploadDeviceAttributes(
    deviceId: string,
    scope: AttributeScope,
    attributes: unknown,
    options: { signal?: AbortSignal } = {}
  ): Promise<DeviceAttributesResult> {
    if (!isPlainObject(attributes) || Object.keys(attributes).length === 0) {
      throw ApiException.validation("No attributes provided", [
        { field: "attributes", constraints: ["attributes must be a non-empty object"] },
      ]);
    }

    const body: AttributePayload = attributes;
    await this.forward(deviceId, signal => this.upstream.uploadAttributes(deviceId, scope, body, { signal }), options);

    const keys = Object.keys(body);
    this.logger.log(`Uploaded ${keys.length} ${scope} attributes for device ${deviceId}`);
    return { deviceId, scope, keys };
  }

  /**
   * Run one upstream write under the per-device deadline, turning every failure into an ApiException
   */
  private async forward(
    deviceId: string,
    send: (signal: AbortSignal) => Promise<UploadResult>,
    options: { signal?: AbortSignal }
  ): Promise<void> {
    const timeoutMs = this.config.perTargetTimeoutMs;
    let result: UploadResult;
    try {
      result = await withTimeout(send, timeoutMs, options.signal);
    } catch (error) {
      if (error instanceof OperationTimeoutError) {
        throw ApiException.upstream({ message: `Upload timed out after ${timeoutMs}ms`, timedOut: true });
      }
      if (options.signal?.aborted) {
        throw error;
      }
      this.logError(error, `Upload ${deviceId}`);
      throw ApiException.upstream({ message: errorMessage(error) });
    }

    if (!result.ok) {
      const { failure } = result;
      if (failure.statusCode === HttpStatus.NOT_FOUND) {
        throw ApiException.notFound(`Device ${deviceId} not found`);
      }
      throw ApiException.upstream({
        message: failure.message,
        statusCode: failure.statusCode,
        timedOut: failure.timedOut,
        upstreamMessage: failure.body,
      });
    }
  }
}
