import type { Service } from '@tessera/service';

export const HTTP_METHODS = ['GET', 'POST', 'PUT', 'DELETE', 'PATCH', 'HEAD'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HttpHeaders = Record<string, string>;

export interface HttpRequest {
  /** Absolute, or relative when an OriginLayer sits above the transport */
  url: string;
  method: HttpMethod;
  headers: HttpHeaders;
  body?: string | Uint8Array | undefined;
  /** Sent as Content-Type when there is a body and no Content-Type header */
  contentType?: string | undefined;
  /** Overrides the transport's default timeout when greater than 0 */
  timeoutMs?: number | undefined;
  signal?: AbortSignal | undefined;
}

export interface HttpResponse {
  /** Final URL after redirects */
  url: string;
  statusCode: number;
  /** Lower-cased header names */
  headers: HttpHeaders;
  body: Uint8Array;
  contentType: string;
  /** True for 2xx. Other statuses are still successful results. */
  succeeded: boolean;
}

export type HttpService = Service<HttpRequest, HttpResponse>;

export interface HttpJsonBody<T = unknown> {
  rawBytes: Uint8Array;
  /** Null when the body is empty, not JSON, or rejected by the schema */
  json: T | null;
}

export interface HttpJsonResponse<T = unknown> extends Omit<HttpResponse, 'body'> {
  body: HttpJsonBody<T>;
}

export type HttpJsonService<T = unknown> = Service<HttpRequest, HttpJsonResponse<T>>;

export interface HttpTransportConfig {
  defaultHeaders?: HttpHeaders | undefined;
  /** 0 disables the timeout. Default: 30 seconds */
  defaultTimeoutMs?: number | undefined;
  userAgent?: string | undefined;
}

export const DEFAULT_CONTENT_TYPE = 'application/json';

/**
 * A request with defaults: GET, no headers, JSON content type, no timeout.
 */
export function createHttpRequest(url: string, init: Partial<Omit<HttpRequest, 'url'>> = {}): HttpRequest {
  return {
    contentType: DEFAULT_CONTENT_TYPE,
    method: 'GET',
    ...init,
    headers: { ...init.headers },
    url,
  };
}
