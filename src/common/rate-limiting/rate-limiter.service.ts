import { Injectable } from "@nestjs/common";
import { LRUCache } from "lru-cache";
import { ConfigurableService } from "../base";
import { monotonicNow } from "../utils/clock.utils";
import { DEFAULT_RATE_LIMIT_CONFIG } from "./rate-limit.types";
import type { RateLimitConfig, RateLimitDecision, RateLimitStats } from "./rate-limit.types";

/**
 * Per-identity sliding-window rate limiter.
 *
 * Each identity owns the ordered list of its admission instants inside the
 * trailing window. Expired instants are evicted lazily when the identity is
 * next evaluated. `admit` never awaits, so an evaluation and its append run
 * without interleaving on the event loop.
 */
@Injectable()
export class RateLimiterService extends ConfigurableService<RateLimitConfig>(DEFAULT_RATE_LIMIT_CONFIG) {
  private windows: LRUCache<string, number[]>;
  private admittedRequests = 0;
  private rejectedRequests = 0;

  constructor(config?: Partial<RateLimitConfig>) {
    super();
    if (config) {
      this.updateConfig(config);
    }
    this.windows = this.createStore();

    this.logInitialization(
      `Rate limiter initialized: ${this.config.maxRequests} requests per ${this.config.windowMs}ms, ` +
        `tracking up to ${this.config.maxTrackedClients} clients`
    );
  }

  /**
   * Evaluate one request from `identity` at `now` and record it when admitted.
   * Rejected requests are not recorded, so retries do not extend the penalty.
   */
  admit(identity: string, now: number = monotonicNow()): RateLimitDecision {
    const { maxRequests, windowMs } = this.config;
    const cutoff = now - windowMs;
    const timestamps = this.windows.get(identity) ?? [];

    let expired = 0;
    while (expired < timestamps.length && timestamps[expired] <= cutoff) {
      expired++;
    }
    if (expired > 0) {
      timestamps.splice(0, expired);
    }

    if (timestamps.length < maxRequests) {
      timestamps.push(now);
      // set() refreshes the entry's TTL and LRU position
      this.windows.set(identity, timestamps);
      this.admittedRequests++;

      return {
        allowed: true,
        remaining: maxRequests - timestamps.length,
        resetAt: timestamps[0] + windowMs,
        limit: maxRequests,
        windowMs,
      };
    }

    this.rejectedRequests++;
    return {
      allowed: false,
      remaining: 0,
      resetAt: timestamps[0] + windowMs,
      limit: maxRequests,
      windowMs,
    };
  }

  /**
   * Whole seconds a rejected client should wait, never less than one
   */
  retryAfterSeconds(decision: RateLimitDecision, now: number = monotonicNow()): number {
    return Math.max(1, Math.ceil((decision.resetAt - now) / 1000));
  }

  getStats(): RateLimitStats {
    return {
      trackedClients: this.windows.size,
      admittedRequests: this.admittedRequests,
      rejectedRequests: this.rejectedRequests,
    };
  }

  resetClient(identity: string): void {
    this.windows.delete(identity);
    this.logDebug(`Reset rate limit for client: ${identity}`, "RateLimiter");
  }

  reset(): void {
    this.windows.clear();
    this.admittedRequests = 0;
    this.rejectedRequests = 0;
    this.logger.log("Rate limiter reset - all client data cleared");
  }

  override validateConfig(config: RateLimitConfig): void {
    if (!Number.isInteger(config.maxRequests) || config.maxRequests < 1) {
      throw new Error(`maxRequests must be a positive integer, got ${config.maxRequests}`);
    }
    if (!Number.isFinite(config.windowMs) || config.windowMs <= 0) {
      throw new Error(`windowMs must be positive, got ${config.windowMs}`);
    }
    if (!Number.isInteger(config.maxTrackedClients) || config.maxTrackedClients < 1) {
      throw new Error(`maxTrackedClients must be a positive integer, got ${config.maxTrackedClients}`);
    }
  }

  override onConfigUpdated(oldConfig: RateLimitConfig, newConfig: RateLimitConfig): void {
    // Windows measured against the old length are meaningless under the new one
    if (
      this.windows &&
      (oldConfig.windowMs !== newConfig.windowMs || oldConfig.maxTrackedClients !== newConfig.maxTrackedClients)
    ) {
      this.windows = this.createStore();
    }
  }

  private createStore(): LRUCache<string, number[]> {
    return new LRUCache<string, number[]>({
      max: this.config.maxTrackedClients,
      ttl: this.config.windowMs,
      updateAgeOnGet: false,
    });
  }
}
