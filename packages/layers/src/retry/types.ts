import { z } from 'zod';

export const retryConfigSchema = z.object({
  maxAttempts: z.number().int().min(1).default(3),
  delayBetweenRetriesMs: z.number().finite().min(0).default(100),
});

export type RetryReason = 'error' | 'challenge';

export interface RetryEvent {
  /** Attempt that just finished, starting at 1 */
  attempt: number;
  nextAttempt: number;
  delayMs: number;
  reason: RetryReason;
}

export interface RetryCallbacks<Res, E> {
  /**
   * Gate for successful responses. Returning false retries the call; on the
   * last attempt the response is returned as-is.
   */
  challenge?: ((response: Res) => boolean) | undefined;

  /** Return false to give up on an error immediately. Default: every error is retried. */
  retryOn?: ((error: E, attempt: number) => boolean) | undefined;

  /** Called before each wait between attempts */
  onRetry?: ((event: RetryEvent) => void) | undefined;
}

export type RetryConfig<Res, E> = z.input<typeof retryConfigSchema> & RetryCallbacks<Res, E>;

export type ResolvedRetryConfig<Res, E> = z.output<typeof retryConfigSchema> & RetryCallbacks<Res, E>;
