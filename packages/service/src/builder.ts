import type { Layer } from './layer.js';
import type { AnyService } from './service.js';

/**
 * Fluent pipeline composition.
 *
 * ```ts
 * const service = ServiceBuilder.new(transport)
 *   .layer(new OriginLayer('https://api.example.com'))
 *   .layer(new RetryLayer<HttpRequest, HttpResponse>({ maxAttempts: 3 }))
 *   .build();
 * ```
 *
 * Each `layer` call wraps the current service, so the last layer added is
 * the outermost: requests pass through it first. `layer` only accepts a
 * layer whose input type the current service satisfies.
 */
export class ServiceBuilder<S extends AnyService> {
  private constructor(private readonly service: S) {}

  static empty(): EmptyServiceBuilder {
    return new EmptyServiceBuilder();
  }

  static new<S extends AnyService>(service: S): ServiceBuilder<S> {
    return new ServiceBuilder(service);
  }

  layer<Out extends AnyService>(layer: Layer<S, Out>): ServiceBuilder<Out> {
    return new ServiceBuilder(layer.wrap(this.service));
  }

  build(): S {
    return this.service;
  }
}

/**
 * A builder with no base service yet. It can only receive one.
 */
export class EmptyServiceBuilder {
  new<S extends AnyService>(service: S): ServiceBuilder<S> {
    return ServiceBuilder.new(service);
  }
}
