import { Module } from "@nestjs/common";
import { ErrorNormalizer } from "@/common/errors/error-normalizer";
import { AppConfigService } from "@/config/config.service";
import { UPSTREAM_TELEMETRY_CLIENT, UpstreamModule } from "@/upstream";
import type { UpstreamTelemetryClient } from "@/upstream";
import { BulkUploadOrchestrator } from "./bulk-upload.orchestrator";
import { BulkUploadBodyPipe } from "./pipes/bulk-upload-body.pipe";
import { TelemetryService } from "./telemetry.service";

@Module({
  imports: [UpstreamModule],
  providers: [
    {
      provide: BulkUploadOrchestrator,
      useFactory: (upstream: UpstreamTelemetryClient, normalizer: ErrorNormalizer, config: AppConfigService) =>
        new BulkUploadOrchestrator(upstream, normalizer, config.bulkUpload),
      inject: [UPSTREAM_TELEMETRY_CLIENT, ErrorNormalizer, AppConfigService],
    },
    {
      provide: TelemetryService,
      useFactory: (upstream: UpstreamTelemetryClient, config: AppConfigService) =>
        new TelemetryService(upstream, config.bulkUpload),
      inject: [UPSTREAM_TELEMETRY_CLIENT, AppConfigService],
    },
    BulkUploadBodyPipe,
  ],
  exports: [BulkUploadOrchestrator, TelemetryService, BulkUploadBodyPipe],
})
export class TelemetryModule {}
