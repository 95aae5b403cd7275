import { getLogger, type Logger } from '@tessera/logger';
import { AsyncLock, describeError, type Layer, type ServiceError } from '@tessera/service';
import { err, ok, type Result } from 'neverthrow';

import { combineUrl, isAbsoluteUrl } from '../core/http-utils.js';
import { InvalidUrl } from '../errors.js';
import type { HttpRequest, HttpResponse, HttpService } from '../types.js';

/** Resolves the origin on first use, e.g. from a config service */
export type OriginProvider = () => string | Promise<string>;

/**
 * Prefixes relative request URLs with an origin.
 *
 * ```ts
 * new OriginLayer('https://api.example.com');
 * new OriginLayer(async () => (await config.load()).apiOrigin);
 * ```
 *
 * Absolute URLs pass through. A provider's first non-empty result is cached
 * per wrapped service; empty results are not cached, so the next call asks
 * again. Without an origin, relative requests fail with InvalidUrl and never
 * reach the inner service.
 */
export class OriginLayer implements Layer<HttpService, HttpService> {
  constructor(private readonly origin: string | OriginProvider = '') {}

  wrap(inner: HttpService): HttpService {
    return new OriginService(inner, this.origin);
  }
}

class OriginService implements HttpService {
  private readonly logger: Logger;
  private readonly cacheLock = new AsyncLock();
  private cachedOrigin: string | undefined;

  constructor(
    private readonly inner: HttpService,
    private readonly origin: string | OriginProvider
  ) {
    this.logger = getLogger('OriginLayer');
  }

  async call(request: HttpRequest): Promise<Result<HttpResponse, ServiceError>> {
    if (isAbsoluteUrl(request.url)) {
      return this.inner.call(request);
    }

    const origin = await this.resolveOrigin();
    if (origin.isErr()) {
      return err(origin.error);
    }

    if (origin.value === '') {
      this.logger.warn({ url: request.url }, 'No origin for relative URL');
      return err(
        InvalidUrl.create({
          context: { url: request.url },
          message: `Cannot resolve relative URL "${request.url}" without an origin`,
        })
      );
    }

    return this.inner.call({ ...request, url: combineUrl(origin.value, request.url) });
  }

  private async resolveOrigin(): Promise<Result<string, ServiceError>> {
    const provider = this.origin;
    if (typeof provider === 'string') {
      return ok(provider);
    }

    const cached = await this.cacheLock.runExclusive(() => this.cachedOrigin);
    if (cached !== undefined) {
      return ok(cached);
    }

    // The provider runs outside the lock; concurrent first calls may each invoke it
    let resolved: string;
    try {
      resolved = await provider();
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Origin provider failed');
      return err(InvalidUrl.create({ cause: error, message: `Origin provider failed: ${describeError(error)}` }));
    }

    if (resolved === '') {
      return ok('');
    }

    return ok(
      await this.cacheLock.runExclusive(() => {
        if (this.cachedOrigin === undefined) {
          this.cachedOrigin = resolved;
          this.logger.debug({ origin: resolved }, 'Origin resolved');
        }
        return this.cachedOrigin;
      })
    );
  }
}
