import { Logger } from "@nestjs/common";
import { Reflector } from "@nestjs/core";
import { TestHelpers } from "@/__tests__/utils";
import { createTestConfig } from "@/__tests__/utils/test-environment";
import { ApiException } from "@/common/errors/api-exception";
import * as clockUtils from "@/common/utils/clock.utils";
import { RateLimitGuard } from "../rate-limit.guard";
import { RateLimiterService } from "../rate-limiter.service";
import { SkipRateLimit } from "../skip-rate-limit.decorator";

@SkipRateLimit()
class PublicController {}

const START = 1767225600000;

describe("RateLimitGuard", () => {
  let rateLimiter: RateLimiterService;
  let guard: RateLimitGuard;
  let now: number;

  beforeEach(() => {
    now = START;
    jest.spyOn(clockUtils, "monotonicNow").mockImplementation(() => now);
    rateLimiter = new RateLimiterService({ maxRequests: 2, windowMs: 60000 });
    guard = new RateLimitGuard(rateLimiter, new Reflector(), createTestConfig());
  });

  afterEach(() => {
    jest.restoreAllMocks();
    jest.useRealTimers();
  });

  const request = (ip: string) => ({
    method: "POST",
    url: "/api/v1/tb/telemetry/bulk",
    headers: { "x-forwarded-for": ip, "user-agent": "sensor-gateway/1.0" },
    socket: { remoteAddress: "10.0.0.1" },
  });

  const rejectionOf = (run: () => unknown): unknown => {
    try {
      run();
    } catch (error) {
      return error;
    }
    return undefined;
  };

  it("should admit requests and set rate-limit headers", () => {
    const response = TestHelpers.createMockResponse();

    expect(guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7"), response))).toBe(true);
    expect(response.headers).toEqual({
      "X-RateLimit-Limit": 2,
      "X-RateLimit-Remaining": 1,
      "X-RateLimit-Reset": Math.ceil((START + 60000) / 1000),
    });
  });

  it("should reject with a rate-limit ApiException once the window is full", () => {
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    now += 10000;
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    now += 5000;

    const response = TestHelpers.createMockResponse();
    const thrown = rejectionOf(() =>
      guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7"), response))
    );

    expect(thrown).toBeInstanceOf(ApiException);
    if (!(thrown instanceof ApiException)) return;
    expect(thrown.getStatus()).toBe(429);
    expect(thrown.errorCause).toEqual({
      kind: "rate_limit",
      message: "Rate limit exceeded: 2 requests per 60 seconds",
      limit: 2,
      windowSeconds: 60,
      retryAfterSeconds: 45,
      resetAt: Math.ceil((START + 60000) / 1000),
    });
    expect(response.headers["X-RateLimit-Remaining"]).toBe(0);
    expect(response.headers["Retry-After"]).toBe(45);
  });

  it("should log the rejected client with its user agent", () => {
    const warn = jest.spyOn(Logger.prototype, "warn").mockImplementation(() => undefined);
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));

    rejectionOf(() => guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7"))));

    expect(warn).toHaveBeenCalledWith("Rate limit exceeded for client ip:203.0.113.7", {
      method: "POST",
      url: "/api/v1/tb/telemetry/bulk",
      userAgent: "sensor-gateway/1.0",
      limit: 2,
      windowMs: 60000,
      retryAfterSeconds: 60,
    });
  });

  it("should keep the window when the wall clock steps backwards", () => {
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));

    jest.useFakeTimers({ now: new Date(START - 60 * 60 * 1000) });
    now += 1000;

    expect(() => guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")))).toThrow(ApiException);
    expect(rateLimiter.getStats()).toMatchObject({ admittedRequests: 2, rejectedRequests: 1 });
  });

  it("should track clients by forwarded address", () => {
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));

    expect(guard.canActivate(TestHelpers.createHttpContext(request("203.0.113.8")))).toBe(true);
  });

  it("should share one identity when proxy headers are not trusted", () => {
    const untrusting = new RateLimitGuard(
      rateLimiter,
      new Reflector(),
      createTestConfig({ SECURITY: { TRUST_PROXY_HEADERS: false } })
    );

    untrusting.canActivate(TestHelpers.createHttpContext(request("203.0.113.7")));
    untrusting.canActivate(TestHelpers.createHttpContext(request("203.0.113.8")));

    expect(() => untrusting.canActivate(TestHelpers.createHttpContext(request("203.0.113.9")))).toThrow(
      ApiException
    );
  });

  it("should skip routes marked with @SkipRateLimit()", () => {
    const response = TestHelpers.createMockResponse();

    for (let i = 0; i < 5; i++) {
      const context = TestHelpers.createHttpContext(request("203.0.113.7"), response, {
        controller: PublicController,
      });
      expect(guard.canActivate(context)).toBe(true);
    }

    expect(response.setHeader).not.toHaveBeenCalled();
    expect(rateLimiter.getStats().admittedRequests).toBe(0);
  });
});
