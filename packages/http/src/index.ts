export * from './core/index.js';
export {
  ConnectionFailed,
  HeaderProviderFailed,
  HttpErrors,
  InvalidUrl,
  NoResponse,
  RequestAborted,
  RequestCreationFailed,
  RequestTimeout,
} from './errors.js';
export { httpExtractable, jsonExtractor, textExtractor } from './extractable.js';
export {
  InjectHeaderLayer,
  type AsyncHeaderProvider,
  type InjectHeaderOptions,
  type LazyHeaderProvider,
} from './layers/inject-header-layer.js';
export { JsonLayer } from './layers/json-layer.js';
export { OriginLayer, type OriginProvider } from './layers/origin-layer.js';
export { HttpTransport } from './transport.js';
export {
  createHttpRequest,
  DEFAULT_CONTENT_TYPE,
  HTTP_METHODS,
  type HttpHeaders,
  type HttpJsonBody,
  type HttpJsonResponse,
  type HttpJsonService,
  type HttpMethod,
  type HttpRequest,
  type HttpResponse,
  type HttpService,
  type HttpTransportConfig,
} from './types.js';
