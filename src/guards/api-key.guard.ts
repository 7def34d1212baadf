import { Injectable, CanActivate, ExecutionContext, Logger } from "@nestjs/common";
import { timingSafeEqual } from "crypto";
import type { Request } from "express";

import { ApiException } from "@/common/errors/api-exception";
import { AppConfigService } from "@/config/config.service";

export const API_KEY_HEADER = "x-api-key";

/**
 * Rejects requests without a matching X-API-Key header.
 * Disabled when no API key is configured. Applied per controller, so it runs
 * after the global rate-limit guard.
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(private readonly config: AppConfigService) {}

  canActivate(context: ExecutionContext): boolean {
    const expected = this.config.security.apiKey;
    if (!expected) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const header = request.headers[API_KEY_HEADER];
    const provided = Array.isArray(header) ? header[0] : header;

    if (!provided) {
      this.logger.warn(`Missing API key for ${request.method} ${request.url}`);
      throw ApiException.authentication("API key required");
    }

    if (!this.matches(provided, expected)) {
      this.logger.warn(`Invalid API key for ${request.method} ${request.url}`);
      throw ApiException.authentication("Invalid API key");
    }

    return true;
  }

  private matches(provided: string, expected: string): boolean {
    const providedBuffer = Buffer.from(provided, "utf8");
    const expectedBuffer = Buffer.from(expected, "utf8");

    // timingSafeEqual requires same length
    if (providedBuffer.length !== expectedBuffer.length) {
      return false;
    }
    return timingSafeEqual(providedBuffer, expectedBuffer);
  }
}
