/**
 * Config Service
 * Typed view over the environment constants for the providers that need it
 */

import { Injectable } from "@nestjs/common";
import type { RateLimitConfig } from "@/common/rate-limiting/rate-limit.types";
import type { BulkUploadConfig } from "@/telemetry/telemetry.types";
import type { UpstreamClientConfig } from "@/upstream/upstream.types";
import type { Environment } from "./environment.constants";

export interface ApplicationConfig {
  nodeEnv: string;
  serviceName: string;
  version: string;
  port: number;
  apiPrefix: string;
  corsOrigins: string[];
  corsMaxAge: number;
  bodyLimitBytes: number;
  debug: boolean;
  gracefulShutdownMs: number;
}

export interface SecurityConfig {
  apiKey: string;
  trustProxyHeaders: boolean;
}

@Injectable()
export class AppConfigService {
  constructor(private readonly env: Environment) {}

  get application(): ApplicationConfig {
    const { APPLICATION, TIMEOUTS } = this.env;
    return {
      nodeEnv: APPLICATION.NODE_ENV,
      serviceName: APPLICATION.SERVICE_NAME,
      version: APPLICATION.VERSION,
      port: APPLICATION.PORT,
      apiPrefix: APPLICATION.API_PREFIX,
      corsOrigins: [...APPLICATION.CORS_ORIGINS],
      corsMaxAge: APPLICATION.CORS_MAX_AGE,
      bodyLimitBytes: APPLICATION.BODY_LIMIT_BYTES,
      debug: APPLICATION.DEBUG,
      gracefulShutdownMs: TIMEOUTS.GRACEFUL_SHUTDOWN_MS,
    };
  }

  get security(): SecurityConfig {
    return {
      apiKey: this.env.SECURITY.API_KEY,
      trustProxyHeaders: this.env.SECURITY.TRUST_PROXY_HEADERS,
    };
  }

  get rateLimit(): RateLimitConfig {
    const { RATE_LIMITING } = this.env;
    return {
      maxRequests: RATE_LIMITING.MAX_REQUESTS,
      windowMs: RATE_LIMITING.WINDOW_SECONDS * 1000,
      maxTrackedClients: RATE_LIMITING.MAX_TRACKED_CLIENTS,
    };
  }

  get upstream(): UpstreamClientConfig {
    const { UPSTREAM } = this.env;
    return {
      baseUrl: UPSTREAM.HOST.replace(/\/+$/, ""),
      username: UPSTREAM.USERNAME,
      password: UPSTREAM.PASSWORD,
      timeoutMs: UPSTREAM.TIMEOUT_MS,
    };
  }

  get bulkUpload(): BulkUploadConfig {
    const { BULK_UPLOAD } = this.env;
    return {
      perTargetTimeoutMs: BULK_UPLOAD.PER_TARGET_TIMEOUT_MS,
      maxConcurrency: BULK_UPLOAD.MAX_CONCURRENCY,
      maxTargets: BULK_UPLOAD.MAX_TARGETS,
    };
  }

  /**
   * Static credentials that must never appear in an error body
   */
  configuredSecrets(): string[] {
    return [this.env.SECURITY.API_KEY, this.env.UPSTREAM.PASSWORD].filter(secret => secret.length > 0);
  }
}
