import type { NormalizedError } from "@/common/types/error-handling";

/**
 * A single telemetry value as accepted by the upstream platform
 */
export type TelemetryValue = string | number | boolean | Record<string, unknown> | unknown[];

export interface TelemetrySample {
  ts: number; // epoch milliseconds
  value: TelemetryValue;
}

/** Metric key → ordered samples */
export type TelemetryPayload = Record<string, TelemetrySample[]>;

/**
 * One device's share of a bulk request. The payload is structurally unchecked
 * until the orchestrator validates it, so a bad target fails alone.
 */
export interface UploadTarget {
  targetId: string;
  payload: Record<string, unknown>;
}

export interface TargetSuccess {
  status: "success";
  keys_uploaded: string[];
  data_points: number;
}

export interface TargetFailure {
  status: "failed";
  error: NormalizedError;
  data_points: 0;
}

export type TargetOutcome = TargetSuccess | TargetFailure;

export interface BulkSummary {
  total_devices: number;
  successful_devices: number;
  failed_devices: number;
  total_data_points: number;
}

export interface BulkReport {
  summary: BulkSummary;
  /** Every submitted target exactly once, in submission order */
  results: ReadonlyMap<string, TargetOutcome>;
}

export interface BulkRunOptions {
  signal?: AbortSignal;
}

export interface BulkUploadConfig {
  perTargetTimeoutMs: number;
  maxConcurrency: number;
  maxTargets: number;
}
