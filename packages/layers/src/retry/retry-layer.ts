import { getLogger, type Logger } from '@tessera/logger';
import {
  describeError,
  resolveEffects,
  type Layer,
  type Service,
  type ServiceEffects,
  type ServiceError,
} from '@tessera/service';
import type { Result } from 'neverthrow';

import { retryConfigSchema, type ResolvedRetryConfig, type RetryConfig, type RetryReason } from './types.js';

/**
 * Retries the inner service with a fixed delay between attempts.
 *
 * Errors are retried until the last attempt, whose error is returned.
 * Successful responses are retried only when `challenge` rejects them; the
 * last attempt's response is returned even if rejected.
 */
export class RetryLayer<Req, Res, E = ServiceError> implements Layer<Service<Req, Res, E>, Service<Req, Res, E>> {
  private readonly config: ResolvedRetryConfig<Res, E>;
  private readonly effects: ServiceEffects;

  constructor(config: RetryConfig<Res, E> = {}, effects?: Partial<ServiceEffects>) {
    const { challenge, onRetry, retryOn, ...numbers } = config;
    this.config = { ...retryConfigSchema.parse(numbers), challenge, onRetry, retryOn };
    this.effects = resolveEffects(effects);
  }

  wrap(inner: Service<Req, Res, E>): Service<Req, Res, E> {
    return new RetryService(inner, this.config, this.effects);
  }
}

class RetryService<Req, Res, E> implements Service<Req, Res, E> {
  private readonly logger: Logger;

  constructor(
    private readonly inner: Service<Req, Res, E>,
    private readonly config: ResolvedRetryConfig<Res, E>,
    private readonly effects: ServiceEffects
  ) {
    this.logger = getLogger('RetryLayer');
  }

  async call(request: Req): Promise<Result<Res, E>> {
    const { challenge, delayBetweenRetriesMs, maxAttempts, onRetry, retryOn } = this.config;

    for (let attempt = 1; ; attempt++) {
      const result = await this.inner.call(request);
      const isLastAttempt = attempt >= maxAttempts;
      let reason: RetryReason;

      if (result.isErr()) {
        if (isLastAttempt) {
          if (maxAttempts > 1) {
            this.logger.warn({ attempts: attempt, error: describeError(result.error) }, 'Retries exhausted');
          }
          return result;
        }
        if (retryOn && !retryOn(result.error, attempt)) {
          this.logger.debug({ attempt, error: describeError(result.error) }, 'Error is not retryable');
          return result;
        }
        reason = 'error';
      } else {
        if (!challenge || challenge(result.value)) {
          return result;
        }
        if (isLastAttempt) {
          this.logger.debug({ attempts: attempt }, 'Challenge rejected the final response, returning it as-is');
          return result;
        }
        reason = 'challenge';
      }

      onRetry?.({ attempt, delayMs: delayBetweenRetriesMs, nextAttempt: attempt + 1, reason });
      this.logger.warn(
        { attempt, delayMs: delayBetweenRetriesMs, maxAttempts, reason },
        `Attempt ${attempt}/${maxAttempts} failed, retrying`
      );

      if (delayBetweenRetriesMs > 0) {
        await this.effects.delay(delayBetweenRetriesMs);
      }
    }
  }
}
