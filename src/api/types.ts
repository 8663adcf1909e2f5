/**
 * Request, response and retry types shared by the registry client
 */

// =============================================================================
// Request/Response Types
// =============================================================================

/**
 * HTTP methods used against the distribution API
 */
export type HttpMethod = 'GET' | 'PUT';

/**
 * Registry response after a successful request
 */
export interface RegistryResponse {
  status: number;
  headers: Headers;
  /** Raw response body */
  body: Buffer;
}

// =============================================================================
// Retry Types
// =============================================================================

/**
 * Retry configuration
 */
export interface RetryConfig {
  /** Total attempts including the first one (default: 4) */
  maxAttempts?: number;
  /** Delay before the first retry in milliseconds (default: 500) */
  baseDelayMs?: number;
  /** Maximum delay in milliseconds (default: 8000) */
  maxDelayMs?: number;
  /** Jitter factor; clamped to [0, 1/3] so delays never decrease (default: 0) */
  jitterFactor?: number;
}

/**
 * Result of a retry operation
 */
export type RetryResult<T> =
  | {
      success: true;
      data: T;
      attempts: number;
      /** Delays waited between attempts, in order */
      delaysMs: number[];
    }
  | {
      success: false;
      /** The final error, unchanged */
      error: unknown;
      attempts: number;
      delaysMs: number[];
    };
