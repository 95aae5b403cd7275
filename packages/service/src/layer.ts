import type { AnyService } from './service.js';

/**
 * Wraps a service to add behavior, producing another service.
 *
 * `wrap` may be called many times to build independent pipelines from the
 * same configuration. Layers whose services hold mutable state (a token
 * bucket, a resolved origin) return a fresh service per call.
 *
 * `wrap` is a function property so layer inputs are checked contravariantly.
 */
export interface Layer<In extends AnyService, Out extends AnyService> {
  wrap: (inner: In) => Out;
}

/**
 * Adapt a plain function into a layer.
 */
export function layerFn<In extends AnyService, Out extends AnyService>(wrap: (inner: In) => Out): Layer<In, Out> {
  return { wrap };
}

/**
 * Apply layers innermost first: `applyLayers(s, a, b)` is `b.wrap(a.wrap(s))`.
 * All layers must share one service type; use ServiceBuilder when the type changes.
 */
export function applyLayers<S extends AnyService>(service: S, ...layers: Layer<S, S>[]): S {
  return layers.reduce<S>((current, layer) => layer.wrap(current), service);
}
