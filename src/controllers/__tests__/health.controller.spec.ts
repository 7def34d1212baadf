import { Reflector } from "@nestjs/core";
import { createTestConfig } from "@/__tests__/utils";
import { SKIP_RATE_LIMIT_KEY } from "@/common/rate-limiting/skip-rate-limit.decorator";
import { HealthController } from "../health.controller";

describe("HealthController", () => {
  const config = createTestConfig({ APPLICATION: { SERVICE_NAME: "test-service", VERSION: "1.2.3" } });
  let controller: HealthController;

  beforeEach(() => {
    jest.useFakeTimers({ now: new Date("2026-01-01T00:00:00.000Z") });
    controller = new HealthController(config);
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it("should return service info", () => {
    expect(controller.getServiceInfo()).toEqual({ service: "test-service", version: "1.2.3" });
  });

  it("should report liveness with uptime", () => {
    jest.setSystemTime(new Date("2026-01-01T00:01:30.500Z"));

    expect(controller.getHealth()).toEqual({
      status: "success",
      timestamp: "2026-01-01T00:01:30.500Z",
      service: "test-service",
      version: "1.2.3",
      uptime: 90,
    });
  });

  it("should be excluded from rate limiting", () => {
    expect(new Reflector().get(SKIP_RATE_LIMIT_KEY, HealthController)).toBe(true);
  });
});
