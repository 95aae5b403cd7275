// Pure token bucket functions
// Each takes state and returns new state; the clock is passed in

import type { TokenBucketState, TokenBucketStatus } from './types.js';

/**
 * A full bucket, last refilled at `now`
 */
export const createTokenBucket = (
  config: { maxTokens: number; tokensPerSecond: number },
  now: number
): TokenBucketState => ({
  lastRefill: now,
  maxTokens: config.maxTokens,
  tokens: config.maxTokens,
  tokensPerSecond: config.tokensPerSecond,
});

/**
 * Add tokens for the time elapsed since the last refill, capped at capacity
 */
export const refillTokens = (state: TokenBucketState, now: number): TokenBucketState => {
  const elapsedMs = now - state.lastRefill;

  if (elapsedMs <= 0) {
    return state;
  }

  const tokensToAdd = (elapsedMs / 1000) * state.tokensPerSecond;

  return {
    ...state,
    lastRefill: now,
    tokens: Math.min(state.maxTokens, state.tokens + tokensToAdd),
  };
};

export const tryConsumeToken = (state: TokenBucketState): { consumed: boolean; state: TokenBucketState } => {
  if (state.tokens < 1) {
    return { consumed: false, state };
  }
  return { consumed: true, state: { ...state, tokens: state.tokens - 1 } };
};

/**
 * Milliseconds until one whole token is available, rounded up
 */
export const calculateWaitMs = (state: TokenBucketState): number => {
  if (state.tokens >= 1) {
    return 0;
  }
  return Math.ceil(((1 - state.tokens) / state.tokensPerSecond) * 1000);
};

export const getTokenBucketStatus = (state: TokenBucketState, now: number): TokenBucketStatus => {
  const refilled = refillTokens(state, now);
  return {
    maxTokens: refilled.maxTokens,
    msUntilNextToken: calculateWaitMs(refilled),
    tokens: refilled.tokens,
    tokensPerSecond: refilled.tokensPerSecond,
  };
};
