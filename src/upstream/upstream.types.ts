import type { TelemetryPayload } from "@/telemetry/telemetry.types";

export const UPSTREAM_TELEMETRY_CLIENT = "UPSTREAM_TELEMETRY_CLIENT";

/** Attribute scopes the platform accepts writes for */
export type AttributeScope = "SERVER_SCOPE" | "SHARED_SCOPE";

/** Attribute name → value; attributes carry no timestamps */
export type AttributePayload = Record<string, unknown>;

export interface UploadAck {
  acceptedKeys: string[];
  acceptedCount: number;
}

export interface UpstreamFailure {
  statusCode?: number;
  message: string;
  timedOut?: boolean;
  /** Response body text, when the platform sent one */
  body?: string;
}

export type UploadResult = { ok: true; ack: UploadAck } | { ok: false; failure: UpstreamFailure };

export interface UploadOptions {
  signal?: AbortSignal;
}

/**
 * Port to the remote telemetry platform
 */
export interface UpstreamTelemetryClient {
  upload(targetId: string, payload: TelemetryPayload, options?: UploadOptions): Promise<UploadResult>;
  uploadAttributes(
    targetId: string,
    scope: AttributeScope,
    attributes: AttributePayload,
    options?: UploadOptions
  ): Promise<UploadResult>;
  /** Credentials currently held in memory, for error redaction */
  activeSecrets(): string[];
}

export interface UpstreamClientConfig {
  baseUrl: string;
  username: string;
  password: string;
  timeoutMs: number;
}

export interface TokenPair {
  token: string;
  refreshToken: string;
}
