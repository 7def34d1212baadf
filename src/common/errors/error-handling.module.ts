import { Global, Module } from "@nestjs/common";
import { AppConfigService } from "@/config/config.service";
import { UpstreamModule } from "@/upstream/upstream.module";
import { UPSTREAM_TELEMETRY_CLIENT } from "@/upstream/upstream.types";
import type { UpstreamTelemetryClient } from "@/upstream/upstream.types";
import { ErrorNormalizer } from "./error-normalizer";

/**
 * Global error normalization. Secrets are read on every call so rotated
 * upstream tokens are redacted too.
 */
@Global()
@Module({
  imports: [UpstreamModule],
  providers: [
    {
      provide: ErrorNormalizer,
      useFactory: (config: AppConfigService, upstream: UpstreamTelemetryClient) =>
        new ErrorNormalizer({
          debug: config.application.debug,
          secrets: () => [...config.configuredSecrets(), ...upstream.activeSecrets()],
        }),
      inject: [AppConfigService, UPSTREAM_TELEMETRY_CLIENT],
    },
  ],
  exports: [ErrorNormalizer],
})
export class ErrorHandlingModule {}
