import { getLogger, type Logger } from '@tessera/logger';
import { describeError, type ErrorDefinition, type ServiceError } from '@tessera/service';
import { err, ok, type Result } from 'neverthrow';
import { Agent, fetch as undiciFetch, Headers, type RequestInit, type Response } from 'undici';

import * as HttpUtils from './core/http-utils.js';
import type { HttpEffects } from './core/types.js';
import {
  ConnectionFailed,
  InvalidUrl,
  NoResponse,
  RequestAborted,
  RequestCreationFailed,
  RequestTimeout,
} from './errors.js';
import {
  DEFAULT_CONTENT_TYPE,
  type HttpHeaders,
  type HttpRequest,
  type HttpResponse,
  type HttpService,
  type HttpTransportConfig,
} from './types.js';

const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_USER_AGENT = 'tessera/0.1.0';

interface ResolvedTransportConfig {
  defaultHeaders: HttpHeaders;
  defaultTimeoutMs: number;
  userAgent: string;
}

/**
 * The base HTTP service, on undici fetch with a keep-alive agent.
 *
 * Every failure to get a response is an error result. Any response that
 * arrives, 4xx and 5xx included, is a successful result; check `succeeded`.
 */
export class HttpTransport implements HttpService {
  private readonly config: ResolvedTransportConfig;
  private readonly logger: Logger;
  private readonly effects: HttpEffects;
  private readonly agent: Agent;

  // Set by the first close(); later calls share it
  private closePromise?: Promise<void> | undefined;

  constructor(config: HttpTransportConfig = {}, effects?: Partial<HttpEffects>) {
    this.config = {
      defaultHeaders: config.defaultHeaders ?? {},
      defaultTimeoutMs: config.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      userAgent: config.userAgent ?? DEFAULT_USER_AGENT,
    };

    this.logger = getLogger('HttpTransport');

    this.agent = new Agent({
      keepAliveTimeout: 10_000,
      keepAliveMaxTimeout: 60_000,
      pipelining: 1,
    });

    this.effects = {
      fetch: (url, init) => undiciFetch(url, { ...init, dispatcher: this.agent }),
      now: () => Date.now(),
      ...effects,
    };

    this.logger.debug(
      `HTTP transport initialized - Timeout: ${this.config.defaultTimeoutMs}ms, UserAgent: ${this.config.userAgent}`
    );
  }

  async call(request: HttpRequest): Promise<Result<HttpResponse, ServiceError>> {
    const url = request.url.trim();
    if (!HttpUtils.parseHttpUrl(url)) {
      this.logger.warn({ url: HttpUtils.sanitizeUrl(url) }, 'Rejected request with an invalid URL');
      return err(
        InvalidUrl.create({
          context: { url: HttpUtils.sanitizeUrl(url) },
          message: url === '' ? 'Request URL is empty' : `Invalid request URL: ${HttpUtils.sanitizeUrl(url)}`,
        })
      );
    }

    const timeoutMs =
      request.timeoutMs !== undefined && request.timeoutMs > 0 ? request.timeoutMs : this.config.defaultTimeoutMs;
    const timeoutSignal = timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;

    const init = this.buildInit(request, timeoutSignal);
    if (init.isErr()) {
      return err(init.error);
    }

    const method = request.method;
    const sanitizedUrl = HttpUtils.sanitizeUrl(url);
    const startTime = this.effects.now();
    this.logger.debug(`Making HTTP request - URL: ${sanitizedUrl}, Method: ${method}`);

    let response: Response;
    let body: Uint8Array;
    try {
      response = await this.effects.fetch(url, init.value);
    } catch (error) {
      return err(this.classifyFailure(error, request, timeoutSignal, timeoutMs, ConnectionFailed, sanitizedUrl));
    }

    try {
      body = new Uint8Array(await response.arrayBuffer());
    } catch (error) {
      return err(this.classifyFailure(error, request, timeoutSignal, timeoutMs, NoResponse, sanitizedUrl));
    }

    this.logger.debug(
      `HTTP response received - URL: ${sanitizedUrl}, Status: ${response.status}, Duration: ${this.effects.now() - startTime}ms`
    );

    return ok({
      body,
      contentType: response.headers.get('content-type') ?? '',
      headers: Object.fromEntries(response.headers.entries()),
      statusCode: response.status,
      succeeded: HttpUtils.isSuccessStatus(response.status),
      url: response.url || url,
    });
  }

  /**
   * Cleanup resources.
   * Closes the undici agent to terminate all keep-alive connections.
   *
   * Idempotent: subsequent calls return the same promise.
   */
  async close(): Promise<void> {
    if (this.closePromise) {
      return this.closePromise;
    }

    this.closePromise = (async () => {
      this.logger.debug('Closing HTTP agent connections');
      try {
        await this.agent.close();
        this.logger.debug('HTTP agent closed successfully');
      } catch (error) {
        const errorMessage = describeError(error);
        this.logger.error(`Failed to close HTTP agent: ${errorMessage}`);
        throw new Error(`HTTP agent cleanup failed: ${errorMessage}`);
      }
    })();

    return this.closePromise;
  }

  private buildInit(request: HttpRequest, timeoutSignal: AbortSignal | undefined): Result<RequestInit, ServiceError> {
    const hasBody = request.body !== undefined;
    if (hasBody && (request.method === 'GET' || request.method === 'HEAD')) {
      return err(
        RequestCreationFailed.create({
          context: { method: request.method },
          message: `A ${request.method} request cannot have a body`,
        })
      );
    }

    let headers: Headers;
    try {
      headers = new Headers();
      headers.set('User-Agent', this.config.userAgent);
      for (const [name, value] of Object.entries(this.config.defaultHeaders)) {
        headers.set(name, value);
      }
      for (const [name, value] of Object.entries(request.headers)) {
        headers.set(name, value);
      }
      if (hasBody && !headers.has('content-type')) {
        headers.set('Content-Type', request.contentType ?? DEFAULT_CONTENT_TYPE);
      }
    } catch (error) {
      this.logger.warn({ error: describeError(error) }, 'Failed to build request headers');
      return err(
        RequestCreationFailed.create({ cause: error, message: `Invalid request headers: ${describeError(error)}` })
      );
    }

    const signals = [timeoutSignal, request.signal].filter((signal): signal is AbortSignal => signal !== undefined);

    return ok({
      // eslint-disable-next-line unicorn/no-null -- 'fetch' requires null for empty body, not undefined
      body: request.body ?? null,
      headers,
      method: request.method,
      signal: signals.length > 1 ? AbortSignal.any(signals) : (signals[0] ?? null),
    });
  }

  private classifyFailure(
    error: unknown,
    request: HttpRequest,
    timeoutSignal: AbortSignal | undefined,
    timeoutMs: number,
    fallback: ErrorDefinition,
    sanitizedUrl: string
  ): ServiceError {
    const context = { method: request.method, url: sanitizedUrl };

    if (request.signal?.aborted) {
      this.logger.debug(context, 'HTTP request aborted by caller');
      return RequestAborted.create({ cause: error, context });
    }

    if (timeoutSignal?.aborted) {
      this.logger.warn({ ...context, timeoutMs }, 'HTTP request timed out');
      return RequestTimeout.create({ cause: error, context, message: `Request timeout after ${timeoutMs}ms` });
    }

    this.logger.warn({ ...context, error: describeError(error) }, 'HTTP request failed');
    return fallback.create({ cause: error, context, message: `${sanitizedUrl}: ${describeError(error)}` });
  }
}
