/**
 * Rate Limiting Types and Interfaces
 */

export interface RateLimitConfig {
  windowMs: number; // Sliding window length in milliseconds
  maxRequests: number; // Admissions allowed per window
  maxTrackedClients: number; // Upper bound on identities held in memory
}

export interface RateLimitDecision {
  allowed: boolean;
  remaining: number;
  /** Epoch milliseconds at which the oldest admission in the window expires */
  resetAt: number;
  limit: number;
  windowMs: number;
}

export interface RateLimitStats {
  trackedClients: number;
  admittedRequests: number;
  rejectedRequests: number;
}

export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  windowMs: 60000,
  maxRequests: 100,
  maxTrackedClients: 10000,
};
