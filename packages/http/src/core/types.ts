import type { RequestInit, Response } from 'undici';

/**
 * Side effects interface for dependency injection
 */
export interface HttpEffects {
  fetch: (url: string, init: RequestInit) => Promise<Response>;
  now: () => number;
}
