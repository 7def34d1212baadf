import { Module } from "@nestjs/common";
import { APP_FILTER, APP_GUARD } from "@nestjs/core";

// App controllers
import { HealthController } from "@/controllers/health.controller";
import { TelemetryController } from "@/controllers/telemetry.controller";

// Core modules
import { AppConfigService, ConfigModule } from "@/config";
import { ErrorHandlingModule } from "@/common/errors/error-handling.module";
import { TelemetryModule } from "@/telemetry/telemetry.module";

// Guards and filters
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { RateLimitGuard, RateLimiterService } from "@/common/rate-limiting";
import { ApiKeyGuard } from "@/guards/api-key.guard";

@Module({
  imports: [ConfigModule, ErrorHandlingModule, TelemetryModule],
  controllers: [HealthController, TelemetryController],
  providers: [
    {
      provide: RateLimiterService,
      useFactory: (config: AppConfigService) => new RateLimiterService(config.rateLimit),
      inject: [AppConfigService],
    },
    ApiKeyGuard,
    // Global guard: runs before the controller-level ApiKeyGuard
    {
      provide: APP_GUARD,
      useClass: RateLimitGuard,
    },
    {
      provide: APP_FILTER,
      useClass: HttpExceptionFilter,
    },
  ],
})
export class AppModule {}
