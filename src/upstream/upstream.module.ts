import { Module } from "@nestjs/common";
import { AppConfigService } from "@/config/config.service";
import { HttpUpstreamTelemetryClient } from "./http-upstream-telemetry.client";
import { UPSTREAM_TELEMETRY_CLIENT } from "./upstream.types";
import type { UpstreamTelemetryClient } from "./upstream.types";

@Module({
  providers: [
    {
      provide: UPSTREAM_TELEMETRY_CLIENT,
      useFactory: (config: AppConfigService): UpstreamTelemetryClient => new HttpUpstreamTelemetryClient(config.upstream),
      inject: [AppConfigService],
    },
  ],
  exports: [UPSTREAM_TELEMETRY_CLIENT],
})
export class UpstreamModule {}
