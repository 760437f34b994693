/**
 * Rate Limit Types
 * Type definitions for per-domain request spacing
 */

/**
 * Rate limit configuration
 */
export interface RateLimitConfig {
  intervalMs: number;                   // Minimum gap between requests to one domain
}

/**
 * Result of a slot reservation
 */
export interface RateLimitReservation {
  domain: string;                       // Domain key the slot was reserved on
  scheduledAt: number;                  // Timestamp the request may start
  waitMs: number;                       // How long the caller had to wait
}

/**
 * Rate limit statistics
 */
export interface RateLimitStats {
  totalRequests: number;
  delayedRequests: number;
  totalWaitMs: number;
  activeKeys: number;
}
