/**
 * Async Utilities
 * Bounded concurrency and cancellable timeouts for fan-out work
 */

import type { LoggerService } from "@nestjs/common";

/**
 * Raised by {@link withTimeout} when the deadline passes before the operation settles
 */
export class OperationTimeoutError extends Error {
  constructor(public readonly timeoutMs: number) {
    super(`Operation timed out after ${timeoutMs}ms`);
    this.name = "OperationTimeoutError";
  }
}

/**
 * Map items through an async operation with at most `concurrency` operations in flight.
 * Results keep the input order regardless of completion order. A rejection from
 * `operation` rejects the whole call once the in-flight workers have drained.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  options: {
    concurrency?: number;
    logger?: LoggerService;
  } = {}
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? 5));
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex++;
      results[index] = await operation(items[index], index);
    }
  };

  const workerCount = Math.min(concurrency, items.length);
  const settled = await Promise.allSettled(Array.from({ length: workerCount }, () => worker()));

  for (const outcome of settled) {
    if (outcome.status === "rejected") {
      options.logger?.warn(`Concurrent operation failed: ${String(outcome.reason)}`);
      throw outcome.reason;
    }
  }

  return results;
}

/**
 * Run an abortable operation under a deadline.
 *
 * The operation receives a signal that aborts when the deadline passes or when
 * `parentSignal` aborts. On deadline the returned promise rejects with
 * {@link OperationTimeoutError}; on parent abort it rejects with the parent's reason.
 */
export async function withTimeout<T>(
  operation: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parentSignal?: AbortSignal
): Promise<T> {
  const controller = new AbortController();

  if (parentSignal?.aborted) {
    throw parentSignal.reason;
  }

  const onParentAbort = () => controller.abort(parentSignal?.reason);
  parentSignal?.addEventListener("abort", onParentAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });
  const timer = setTimeout(() => controller.abort(new OperationTimeoutError(timeoutMs)), timeoutMs);

  try {
    return await Promise.race([operation(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parentSignal?.removeEventListener("abort", onParentAbort);
  }
}
