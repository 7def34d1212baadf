import { Injectable } from "@nestjs/common";
import { BaseService } from "@/common/base";
import { ApiException } from "@/common/errors/api-exception";
import { ErrorNormalizer } from "@/common/errors/error-normalizer";
import type { ErrorCause, FieldError } from "@/common/types/error-handling";
import { mapWithConcurrency, OperationTimeoutError, withTimeout } from "@/common/utils/async.utils";
import { errorMessage } from "@/common/utils/common.utils";
import type { UpstreamTelemetryClient } from "@/upstream/upstream.types";
import { summarizeResults } from "./bulk-summary";
import { BulkUploadCancelledError } from "./bulk-upload.errors";
import type {
  BulkReport,
  BulkRunOptions,
  BulkUploadConfig,
  TargetFailure,
  TargetOutcome,
  TargetSuccess,
  TelemetryPayload,
  UploadTarget,
} from "./telemetry.types";
import { validateTelemetryPayload } from "./validation/telemetry-payload.validation";

interface UploadJob {
  targetId: string;
  payload: TelemetryPayload;
  keys: string[];
  dataPoints: number;
}

/**
 * Fans one bulk request out to the upstream platform and folds every
 * target's outcome into a single report.
 *
 * A target's failure (invalid payload, upstream error, timeout, thrown error)
 * is recorded against that target only. The only way `run` rejects after
 * validation is cancellation through `options.signal`.
 */
@Injectable()
export class BulkUploadOrchestrator extends BaseService {
  constructor(
    private readonly upstream: UpstreamTelemetryClient,
    private readonly normalizer: ErrorNormalizer,
    private readonly config: BulkUploadConfig
  ) {
    super();
  }

  async run(targets: readonly UploadTarget[], options: BulkRunOptions = {}): Promise<BulkReport> {
    this.assertRunnable(targets);

    const { signal } = options;
    if (signal?.aborted) {
      throw new BulkUploadCancelledError(signal.reason);
    }

    const outcomes = new Map<string, TargetOutcome>();
    const jobs: UploadJob[] = [];

    for (const target of targets) {
      const validation = validateTelemetryPayload(target.payload);
      if (validation.valid) {
        jobs.push({
          targetId: target.targetId,
          payload: validation.payload,
          keys: validation.keys,
          dataPoints: validation.dataPoints,
        });
      } else {
        outcomes.set(
          target.targetId,
          this.failure({ kind: "validation", message: validation.message, fieldErrors: validation.fieldErrors })
        );
      }
    }

    await mapWithConcurrency(
      jobs,
      async job => {
        outcomes.set(job.targetId, await this.uploadOne(job, signal));
      },
      { concurrency: this.config.maxConcurrency }
    );

    if (signal?.aborted) {
      throw new BulkUploadCancelledError(signal.reason);
    }

    // Submission order, independent of completion order
    const results = new Map<string, TargetOutcome>();
    for (const target of targets) {
      results.set(
        target.targetId,
        outcomes.get(target.targetId) ?? this.failure({ kind: "internal", message: "Target produced no outcome" })
      );
    }

    const summary = Object.freeze(summarizeResults(results));
    this.logger.log(
      `Bulk upload completed: ${summary.successful_devices}/${summary.total_devices} devices successful, ` +
        `${summary.total_data_points} data points`
    );

    return Object.freeze({ summary, results });
  }

  private assertRunnable(targets: readonly UploadTarget[]): void {
    if (targets.length === 0) {
      throw ApiException.validation("Bulk upload requires at least one target", [
        { field: "targets", constraints: ["at least one target is required"] },
      ]);
    }

    const seen = new Set<string>();
    const duplicates: FieldError[] = [];
    for (const { targetId } of targets) {
      if (seen.has(targetId)) {
        duplicates.push({ field: targetId, constraints: [`duplicate target id ${targetId}`] });
      }
      seen.add(targetId);
    }

    if (duplicates.length > 0) {
      throw ApiException.validation("Bulk upload contains duplicate target ids", duplicates);
    }
  }

  private async uploadOne(job: UploadJob, signal: AbortSignal | undefined): Promise<TargetOutcome> {
    const { perTargetTimeoutMs } = this.config;

    try {
      const result = await withTimeout(
        timeoutSignal => this.upstream.upload(job.targetId, job.payload, { signal: timeoutSignal }),
        perTargetTimeoutMs,
        signal
      );

      if (result.ok) {
        return this.success(job);
      }

      this.logWarning(`Upstream rejected telemetry for ${job.targetId}: ${result.failure.message}`, "BulkUpload", {
        statusCode: result.failure.statusCode,
      });
      return this.failure({
        kind: "upstream",
        message: result.failure.message,
        statusCode: result.failure.statusCode,
        timedOut: result.failure.timedOut,
        upstreamMessage: result.failure.body,
      });
    } catch (error) {
      if (signal?.aborted) {
        throw new BulkUploadCancelledError(signal.reason);
      }

      if (error instanceof OperationTimeoutError) {
        this.logWarning(`Upload for ${job.targetId} timed out after ${perTargetTimeoutMs}ms`, "BulkUpload");
        return this.failure({
          kind: "upstream",
          message: `Upload timed out after ${perTargetTimeoutMs}ms`,
          timedOut: true,
        });
      }

      this.logError(error, `BulkUpload ${job.targetId}`);
      return this.failure({ kind: "upstream", message: errorMessage(error) });
    }
  }

  private success(job: UploadJob): TargetSuccess {
    const outcome: TargetSuccess = { status: "success", keys_uploaded: [...job.keys], data_points: job.dataPoints };
    return Object.freeze(outcome);
  }

  private failure(cause: ErrorCause): TargetFailure {
    const outcome: TargetFailure = { status: "failed", error: this.normalizer.normalize(cause), data_points: 0 };
    return Object.freeze(outcome);
  }
}
