import type { Result } from 'neverthrow';

import type { ServiceError } from './errors.js';

/**
 * An async capability from a request to a success-or-error result.
 *
 * Any object with a matching `call` qualifies; there is no base class.
 * A service may be shared by several pipelines and invoked concurrently,
 * so implementations guard their own mutable state.
 */
export interface Service<Req, Res, E = ServiceError> {
  call(request: Req): Promise<Result<Res, E>>;
}

/** Constraint satisfied by every service, whatever its request/response types. */
export type AnyService = Service<never, unknown, unknown>;

export type RequestOf<S> = S extends Service<infer Req, unknown, unknown> ? Req : never;
export type ResponseOf<S> = S extends Service<never, infer Res, unknown> ? Res : never;
export type ErrorOf<S> = S extends Service<never, unknown, infer E> ? E : never;

/**
 * Adapt an async function into a service.
 */
export function serviceFn<Req, Res, E = ServiceError>(
  call: (request: Req) => Promise<Result<Res, E>>
): Service<Req, Res, E> {
  return { call };
}
