export { LayerErrors, NoTokenAvailable, RateLimitTimeout } from './errors.js';
export { contentAs, ExtractLayer } from './extract/extract-layer.js';
export type { Extractable, ExtractedResponse, Extractor } from './extract/types.js';
export { RateLimitLayer } from './rate-limit/rate-limit-layer.js';
export {
  calculateWaitMs,
  createTokenBucket,
  getTokenBucketStatus,
  refillTokens,
  tryConsumeToken,
} from './rate-limit/token-bucket.js';
export {
  rateLimitConfigSchema,
  type RateLimitConfig,
  type RateLimitedService,
  type ResolvedRateLimitConfig,
  type TokenBucketState,
  type TokenBucketStatus,
} from './rate-limit/types.js';
export { RetryLayer } from './retry/retry-layer.js';
export {
  retryConfigSchema,
  type ResolvedRetryConfig,
  type RetryCallbacks,
  type RetryConfig,
  type RetryEvent,
  type RetryReason,
} from './retry/types.js';
