import { Injectable, CanActivate, ExecutionContext, Logger } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import type { Request, Response } from "express";

import { AppConfigService } from "@/config/config.service";
import { ApiException } from "../errors/api-exception";
import { ClientIdentificationUtils } from "../utils/client-identification.utils";
import { monotonicNow } from "../utils/clock.utils";
import { RateLimiterService } from "./rate-limiter.service";
import { SKIP_RATE_LIMIT_KEY } from "./skip-rate-limit.decorator";

@Injectable()
export class RateLimitGuard implements CanActivate {
  private readonly logger = new Logger(RateLimitGuard.name);

  constructor(
    private readonly rateLimiter: RateLimiterService,
    private readonly reflector: Reflector,
    private readonly config: AppConfigService
  ) {}

  canActivate(context: ExecutionContext): boolean {
    const skip = this.reflector.getAllAndOverride<boolean | undefined>(SKIP_RATE_LIMIT_KEY, [
      context.getHandler(),
      context.getClass(),
    ]);
    if (skip) {
      return true;
    }

    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();

    const clientInfo = ClientIdentificationUtils.getClientInfo(request, {
      trustProxyHeaders: this.config.security.trustProxyHeaders,
    });
    const now = monotonicNow();
    const decision = this.rateLimiter.admit(clientInfo.id, now);

    response.setHeader("X-RateLimit-Limit", decision.limit);
    response.setHeader("X-RateLimit-Remaining", decision.remaining);
    response.setHeader("X-RateLimit-Reset", Math.ceil(decision.resetAt / 1000));

    if (decision.allowed) {
      return true;
    }

    const retryAfterSeconds = this.rateLimiter.retryAfterSeconds(decision, now);
    response.setHeader("Retry-After", retryAfterSeconds);

    this.logger.warn(`Rate limit exceeded for client ${clientInfo.id}`, {
      method: request.method,
      url: request.url,
      userAgent: ClientIdentificationUtils.sanitizeUserAgent(request.headers["user-agent"]),
      limit: decision.limit,
      windowMs: decision.windowMs,
      retryAfterSeconds,
    });

    throw ApiException.rateLimit({
      message: `Rate limit exceeded: ${decision.limit} requests per ${decision.windowMs / 1000} seconds`,
      limit: decision.limit,
      windowSeconds: decision.windowMs / 1000,
      retryAfterSeconds,
      resetAt: Math.ceil(decision.resetAt / 1000),
    });
  }
}
