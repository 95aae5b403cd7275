import { getLogger, type Logger } from '@tessera/logger';
import {
  AsyncLock,
  resolveEffects,
  type Layer,
  type Service,
  type ServiceEffects,
  type ServiceError,
} from '@tessera/service';
import { err, ok, type Result } from 'neverthrow';

import { NoTokenAvailable, RateLimitTimeout } from '../errors.js';

import * as TokenBucket from './token-bucket.js';
import {
  rateLimitConfigSchema,
  type RateLimitConfig,
  type RateLimitedService,
  type ResolvedRateLimitConfig,
  type TokenBucketState,
  type TokenBucketStatus,
} from './types.js';

/**
 * Token bucket rate limiting.
 *
 * The layer only holds configuration. Each `wrap` creates a service with its
 * own full bucket, so pipelines built from one layer are limited separately.
 */
export class RateLimitLayer<Req, Res, E = ServiceError>
  implements Layer<Service<Req, Res, E>, RateLimitedService<Req, Res, E | ServiceError>>
{
  private readonly config: ResolvedRateLimitConfig;
  private readonly effects: ServiceEffects;

  constructor(config: RateLimitConfig = {}, effects?: Partial<ServiceEffects>) {
    this.config = rateLimitConfigSchema.parse(config);
    this.effects = resolveEffects(effects);
  }

  wrap(inner: Service<Req, Res, E>): RateLimitedService<Req, Res, E | ServiceError> {
    return new RateLimitService(inner, this.config, this.effects);
  }
}

class RateLimitService<Req, Res, E> implements RateLimitedService<Req, Res, E | ServiceError> {
  private readonly logger: Logger;

  // Replaced only inside bucketLock
  private bucket: TokenBucketState;
  private readonly bucketLock = new AsyncLock();

  constructor(
    private readonly inner: Service<Req, Res, E>,
    private readonly config: ResolvedRateLimitConfig,
    private readonly effects: ServiceEffects
  ) {
    this.logger = getLogger('RateLimitLayer');
    this.bucket = TokenBucket.createTokenBucket(config, effects.now());
  }

  async call(request: Req): Promise<Result<Res, E | ServiceError>> {
    const acquired = await this.acquireToken();
    if (acquired.isErr()) {
      return err(acquired.error);
    }
    return this.inner.call(request);
  }

  getStatus(): TokenBucketStatus {
    return TokenBucket.getTokenBucketStatus(this.bucket, this.effects.now());
  }

  /**
   * Refill and consume under the lock; wait without holding it so other
   * callers can queue up.
   */
  private async acquireToken(): Promise<Result<void, ServiceError>> {
    const { maxWaitMs, waitForToken } = this.config;
    const startedAt = this.effects.now();

    while (true) {
      const attempt = await this.bucketLock.runExclusive(() => {
        const refilled = TokenBucket.refillTokens(this.bucket, this.effects.now());
        const { consumed, state } = TokenBucket.tryConsumeToken(refilled);
        this.bucket = state;
        return { consumed, tokens: state.tokens, waitMs: TokenBucket.calculateWaitMs(state) };
      });

      if (attempt.consumed) {
        return ok();
      }

      if (!waitForToken) {
        this.logger.warn({ tokens: attempt.tokens }, 'No rate limit token available, rejecting call');
        return err(NoTokenAvailable.create({ context: { tokens: attempt.tokens } }));
      }

      let delayMs = attempt.waitMs;
      if (maxWaitMs > 0) {
        const waitedMs = this.effects.now() - startedAt;
        const remainingMs = maxWaitMs - waitedMs;
        if (remainingMs <= 0) {
          this.logger.warn({ maxWaitMs, waitedMs }, 'Rate limit wait budget exhausted');
          return err(
            RateLimitTimeout.create({
              context: { maxWaitMs, waitedMs },
              message: `No rate limit token within ${maxWaitMs}ms`,
            })
          );
        }
        delayMs = Math.min(delayMs, remainingMs);
      }

      this.logger.debug({ delayMs, tokens: attempt.tokens }, 'Rate limit enforced, waiting for a token');
      await this.effects.delay(delayMs);
    }
  }
}
