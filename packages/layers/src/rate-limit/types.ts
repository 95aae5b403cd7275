import type { Service, ServiceError } from '@tessera/service';
import { z } from 'zod';

export const rateLimitConfigSchema = z.object({
  /** Tokens added per second */
  tokensPerSecond: z.number().finite().positive().default(5),
  /**
   * Bucket capacity, also the burst size. A positive capacity below 1 is
   * rejected too: every call consumes a whole token, so a waiting call
   * would never be granted one.
   */
  maxTokens: z.number().finite().min(1).default(10),
  /** Wait for a token instead of failing with NoTokenAvailable */
  waitForToken: z.boolean().default(true),
  /** Upper bound on the wait per call; 0 waits as long as needed */
  maxWaitMs: z.number().finite().min(0).default(0),
});

export type RateLimitConfig = z.input<typeof rateLimitConfigSchema>;
export type ResolvedRateLimitConfig = z.output<typeof rateLimitConfigSchema>;

/**
 * Token bucket state (immutable)
 */
export interface TokenBucketState {
  readonly tokens: number;
  readonly lastRefill: number;
  readonly maxTokens: number;
  readonly tokensPerSecond: number;
}

export interface TokenBucketStatus {
  tokens: number;
  maxTokens: number;
  tokensPerSecond: number;
  /** 0 when a token is available now */
  msUntilNextToken: number;
}

export interface RateLimitedService<Req, Res, E = ServiceError> extends Service<Req, Res, E> {
  getStatus(): TokenBucketStatus;
}
