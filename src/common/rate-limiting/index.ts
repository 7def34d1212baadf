export * from "./rate-limit.guard";
export * from "./rate-limit.types";
export * from "./rate-limiter.service";
export * from "./skip-rate-limit.decorator";
