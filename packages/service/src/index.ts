export { AsyncLock } from './async-lock.js';
export { EmptyServiceBuilder, ServiceBuilder } from './builder.js';
export { defaultEffects, resolveEffects, type ServiceEffects } from './effects.js';
export {
  CoreErrors,
  defineErrorModule,
  describeError,
  ServiceBuildFailed,
  ServiceError,
  ServiceNotRegistered,
  type ErrorDefinition,
  type ErrorIdentity,
  type ErrorModule,
  type ServiceErrorOptions,
} from './errors.js';
export { applyLayers, layerFn, type Layer } from './layer.js';
export {
  createServiceKey,
  createServiceProvider,
  DEFAULT_TAG,
  ServiceKey,
  ServiceProvider,
  type RegisterOptions,
  type ServiceFactory,
} from './provider.js';
export { err, getError, getValue, ok, ResultAccessError, type Result, type ServiceResult } from './result.js';
export {
  serviceFn,
  type AnyService,
  type ErrorOf,
  type RequestOf,
  type ResponseOf,
  type Service,
} from './service.js';
