import { getLogger, type Logger } from '@tessera/logger';
import { describeError, type Layer, type ServiceError } from '@tessera/service';
import { err, type Result } from 'neverthrow';

import { findHeaderKey } from '../core/http-utils.js';
import { HeaderProviderFailed } from '../errors.js';
import type { HttpHeaders, HttpRequest, HttpResponse, HttpService } from '../types.js';

/** Returning undefined leaves the header out */
export type LazyHeaderProvider = () => string | undefined;
export type AsyncHeaderProvider = () => Promise<string | undefined>;

export interface InjectHeaderOptions {
  /** Replace headers already on the request (any casing). Default: keep them. */
  overrideExisting?: boolean | undefined;
}

type HeaderSource =
  | { kind: 'static'; name: string; value: string }
  | { kind: 'lazy'; name: string; provider: LazyHeaderProvider }
  | { kind: 'async'; name: string; provider: AsyncHeaderProvider };

/**
 * Adds headers to every request.
 *
 * Headers come from a static map, sync providers and async providers. For
 * the same name (compared case-insensitively) an async provider beats a
 * sync one, which beats a static value. Providers only run when their
 * header will be written.
 */
export class InjectHeaderLayer implements Layer<HttpService, HttpService> {
  private readonly staticHeaders = new Map<string, HeaderSource>();
  private readonly lazyHeaders = new Map<string, HeaderSource>();
  private readonly asyncHeaders = new Map<string, HeaderSource>();
  private readonly overrideExisting: boolean;

  constructor(headers: HttpHeaders = {}, options: InjectHeaderOptions = {}) {
    this.overrideExisting = options.overrideExisting ?? false;
    for (const [name, value] of Object.entries(headers)) {
      this.addHeader(name, value);
    }
  }

  addHeader(name: string, value: string): this {
    this.staticHeaders.set(name.toLowerCase(), { kind: 'static', name, value });
    return this;
  }

  addLazyHeader(name: string, provider: LazyHeaderProvider): this {
    this.lazyHeaders.set(name.toLowerCase(), { kind: 'lazy', name, provider });
    return this;
  }

  addAsyncHeader(name: string, provider: AsyncHeaderProvider): this {
    this.asyncHeaders.set(name.toLowerCase(), { kind: 'async', name, provider });
    return this;
  }

  /** Services keep the headers configured at wrap time. */
  wrap(inner: HttpService): HttpService {
    const merged = new Map([...this.staticHeaders, ...this.lazyHeaders, ...this.asyncHeaders]);
    return new InjectHeaderService(inner, [...merged.values()], this.overrideExisting);
  }
}

class InjectHeaderService implements HttpService {
  private readonly logger: Logger;

  constructor(
    private readonly inner: HttpService,
    private readonly sources: readonly HeaderSource[],
    private readonly overrideExisting: boolean
  ) {
    this.logger = getLogger('InjectHeaderLayer');
  }

  async call(request: HttpRequest): Promise<Result<HttpResponse, ServiceError>> {
    const headers = { ...request.headers };

    for (const source of this.sources) {
      const existingKey = findHeaderKey(headers, source.name);
      if (existingKey !== undefined && !this.overrideExisting) {
        continue;
      }

      let value: string | undefined;
      try {
        value = await readSource(source);
      } catch (error) {
        this.logger.warn({ error: describeError(error), header: source.name }, 'Header provider failed');
        return err(
          HeaderProviderFailed.create({
            cause: error,
            context: { header: source.name },
            message: `Header provider for ${source.name} failed: ${describeError(error)}`,
          })
        );
      }

      if (value === undefined) {
        continue;
      }
      if (existingKey !== undefined) {
        delete headers[existingKey];
      }
      headers[source.name] = value;
    }

    return this.inner.call({ ...request, headers });
  }
}

async function readSource(source: HeaderSource): Promise<string | undefined> {
  switch (source.kind) {
    case 'static':
      return source.value;
    case 'lazy':
      return source.provider();
    case 'async':
      return source.provider();
  }
}
