import { Controller, Get } from "@nestjs/common";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";

import { BaseController } from "@/common/base";
import { SkipRateLimit } from "@/common/rate-limiting/skip-rate-limit.decorator";
import { AppConfigService } from "@/config/config.service";
import { HealthResponseDto, ServiceInfoDto } from "./dto/health.dto";

// Probes are used by orchestration systems and are not rate limited
@ApiTags("System Health")
@Controller()
@SkipRateLimit()
export class HealthController extends BaseController {
  constructor(private readonly config: AppConfigService) {
    super();
  }

  @Get()
  @ApiOperation({ summary: "Service name and version" })
  @ApiOkResponse({ type: ServiceInfoDto })
  getServiceInfo(): ServiceInfoDto {
    const { serviceName, version } = this.config.application;
    return { service: serviceName, version };
  }

  @Get("health")
  @ApiOperation({ summary: "Liveness probe" })
  @ApiOkResponse({ type: HealthResponseDto })
  getHealth(): HealthResponseDto {
    const { serviceName, version } = this.config.application;
    return {
      status: "success",
      timestamp: new Date().toISOString(),
      service: serviceName,
      version,
      uptime: Math.floor((Date.now() - this.startupTime) / 1000),
    };
  }
}
