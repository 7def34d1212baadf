/**
 * Environment Constants - Centralized Environment Variable Management
 */

import { EnvironmentUtils } from "@/common/utils/environment.utils";
import { isLogLevel, type LogLevel } from "@/common/types/logging";

function parseLogLevel(): LogLevel {
  const level = EnvironmentUtils.parseString("LOG_LEVEL", "log", {
    pattern: /^(fatal|error|warn|log|debug|verbose)$/,
  });
  return isLogLevel(level) ? level : "log";
}

export function loadEnvironment() {
  return {
    APPLICATION: {
      NODE_ENV: EnvironmentUtils.parseString("NODE_ENV", "production"),
      SERVICE_NAME: EnvironmentUtils.parseString("SERVICE_NAME", "telemetry-proxy-api"),
      VERSION: EnvironmentUtils.parseString("SERVICE_VERSION", "0.1.0"),
      PORT: EnvironmentUtils.parseInt("APP_PORT", 8000, { min: 1, max: 65535, fieldName: "APP_PORT" }),
      API_PREFIX: EnvironmentUtils.parseString("APP_API_PREFIX", "api/v1"),
      CORS_ORIGINS: EnvironmentUtils.parseList("CORS_ORIGINS"),
      CORS_MAX_AGE: EnvironmentUtils.parseInt("APP_CORS_MAX_AGE", 600, { min: 0, max: 86400 }),
      // Room for BULK_MAX_TARGETS devices at roughly 100 kB of telemetry each
      BODY_LIMIT_BYTES: EnvironmentUtils.parseInt("APP_BODY_LIMIT_BYTES", 10 * 1024 * 1024, {
        min: 1024,
        max: 100 * 1024 * 1024,
      }),
      // Never enable in production: widens error messages and exposes the API docs
      DEBUG: EnvironmentUtils.parseBoolean("DEBUG", false),
    },

    LOGGING: {
      LOG_LEVEL: parseLogLevel(),
    },

    SECURITY: {
      API_KEY: EnvironmentUtils.parseString("API_KEY", ""),
      TRUST_PROXY_HEADERS: EnvironmentUtils.parseBoolean("TRUST_PROXY_HEADERS", true),
    },

    RATE_LIMITING: {
      MAX_REQUESTS: EnvironmentUtils.parseInt("RATE_LIMIT_REQUESTS", 100, { min: 1, max: 100000 }),
      WINDOW_SECONDS: EnvironmentUtils.parseInt("RATE_LIMIT_WINDOW", 60, { min: 1, max: 86400 }),
      MAX_TRACKED_CLIENTS: EnvironmentUtils.parseInt("RATE_LIMIT_MAX_TRACKED_CLIENTS", 10000, {
        min: 100,
        max: 1000000,
      }),
    },

    UPSTREAM: {
      HOST: EnvironmentUtils.parseString("TB_HOST", "http://localhost:8080", { pattern: /^https?:\/\// }),
      USERNAME: EnvironmentUtils.parseString("TB_USERNAME", ""),
      PASSWORD: EnvironmentUtils.parseString("TB_PASSWORD", ""),
      TIMEOUT_MS: EnvironmentUtils.parseInt("UPSTREAM_TIMEOUT_MS", 10000, { min: 100, max: 120000 }),
    },

    BULK_UPLOAD: {
      PER_TARGET_TIMEOUT_MS: EnvironmentUtils.parseInt("BULK_PER_TARGET_TIMEOUT_MS", 10000, {
        min: 100,
        max: 300000,
      }),
      MAX_CONCURRENCY: EnvironmentUtils.parseInt("BULK_MAX_CONCURRENCY", 10, { min: 1, max: 200 }),
      MAX_TARGETS: EnvironmentUtils.parseInt("BULK_MAX_TARGETS", 100, { min: 1, max: 10000 }),
    },

    TIMEOUTS: {
      GRACEFUL_SHUTDOWN_MS: EnvironmentUtils.parseInt("GRACEFUL_SHUTDOWN_TIMEOUT_MS", 30000, {
        min: 1000,
        max: 300000,
      }),
    },
  };
}

export type Environment = ReturnType<typeof loadEnvironment>;

export const ENV: Environment = loadEnvironment();
