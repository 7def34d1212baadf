import { Injectable, PipeTransform } from "@nestjs/common";
import { ApiException } from "@/common/errors/api-exception";
import type { FieldError } from "@/common/types/error-handling";
import { isPlainObject } from "@/common/utils/common.utils";
import { AppConfigService } from "@/config/config.service";
import type { UploadTarget } from "../telemetry.types";

/**
 * Checks the outer shape of a bulk body (`{ <deviceId>: { <key>: samples } }`)
 * and turns it into upload targets. Sample-level problems are left to the
 * orchestrator, which fails only the affected device.
 */
@Injectable()
export class BulkUploadBodyPipe implements PipeTransform<unknown, UploadTarget[]> {
  constructor(private readonly config: AppConfigService) {}

  transform(body: unknown): UploadTarget[] {
    if (!isPlainObject(body)) {
      throw ApiException.validation("Request body must map device ids to telemetry payloads", [
        { field: "body", constraints: ["body must be an object keyed by device id"] },
      ]);
    }

    const entries = Object.entries(body);
    if (entries.length === 0) {
      throw ApiException.validation("No device data provided", [
        { field: "body", constraints: ["body must contain at least one device"] },
      ]);
    }

    const { maxTargets } = this.config.bulkUpload;
    if (entries.length > maxTargets) {
      throw ApiException.validation(`Too many devices in one request: ${entries.length} (maximum ${maxTargets})`, [
        { field: "body", constraints: [`body must contain at most ${maxTargets} devices`] },
      ]);
    }

    const targets: UploadTarget[] = [];
    const fieldErrors: FieldError[] = [];
    for (const [targetId, payload] of entries) {
      if (isPlainObject(payload)) {
        targets.push({ targetId, payload });
      } else {
        fieldErrors.push({ field: targetId, constraints: [`${targetId} must be an object of telemetry series`] });
      }
    }

    if (fieldErrors.length > 0) {
      const fields = fieldErrors.map(error => error.field).join(", ");
      throw ApiException.validation(`Invalid device payloads: ${fields}`, fieldErrors);
    }

    return targets;
  }
}
