import type { BulkSummary, TargetOutcome } from "./telemetry.types";

/**
 * Derive the batch summary from the per-target outcomes.
 * Pure: the same results always produce the same summary.
 */
export function summarizeResults(results: ReadonlyMap<string, TargetOutcome>): BulkSummary {
  let successful = 0;
  let totalDataPoints = 0;

  for (const outcome of results.values()) {
    if (outcome.status === "success") {
      successful++;
    }
    totalDataPoints += outcome.data_points;
  }

  return {
    total_devices: results.size,
    successful_devices: successful,
    failed_devices: results.size - successful,
    total_data_points: totalDataPoints,
  };
}
