/**
 * Raised by BulkUploadOrchestrator.run when the caller's signal aborts.
 * No partial report is produced.
 */
export class BulkUploadCancelledError extends Error {
  constructor(public readonly reason?: unknown) {
    super("Bulk upload cancelled");
    this.name = "BulkUploadCancelledError";
  }
}
