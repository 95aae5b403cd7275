import { getLogger, type Logger } from '@tessera/logger';
import { err, ok } from 'neverthrow';

import { describeError, ServiceBuildFailed, ServiceNotRegistered } from './errors.js';
import type { ServiceResult } from './result.js';

export const DEFAULT_TAG = 'default';

export type ServiceFactory<S> = (provider: ServiceProvider) => ServiceResult<S> | Promise<ServiceResult<S>>;

export interface RegisterOptions {
  tag?: string | undefined;
}

interface Registration<S> {
  factory: ServiceFactory<S>;
  instance?: { value: S } | undefined;
  building?: Promise<ServiceResult<S>> | undefined;
  // Bumped by reset so a build that finishes afterwards is not memoized.
  generation: number;
}

type RegistrationTables<S> = WeakMap<ServiceProvider, Map<string, Registration<S>>>;

// Assigned by ServiceKey's static block; the tables are reachable only from this module.
let registrationsOf: <S>(key: ServiceKey<S>) => RegistrationTables<S>;

/**
 * Typed handle for a service in a ServiceProvider. Keys compare by
 * identity: two keys created with the same id are different keys.
 *
 * The key owns the typed registration table for each provider it is
 * registered with, so lookups keep the service type without casts.
 */
export class ServiceKey<S> {
  readonly #registrations: RegistrationTables<S> = new WeakMap();

  static {
    registrationsOf = (key) => key.#registrations;
  }

  constructor(readonly id: string) {}

  toString(): string {
    return `ServiceKey(${this.id})`;
  }
}

export function createServiceKey<S>(id: string): ServiceKey<S> {
  return new ServiceKey<S>(id);
}

/**
 * Lazily builds and memoizes shared service instances.
 *
 * The first `get` for a key and tag runs the factory; later calls return
 * the same instance. Concurrent first calls share one build. A failed build
 * is not memoized, so the next `get` runs the factory again.
 */
export class ServiceProvider {
  private readonly logger: Logger;
  private readonly resets = new Map<object, (tag?: string) => void>();

  constructor() {
    this.logger = getLogger('ServiceProvider');
  }

  register<S>(key: ServiceKey<S>, factory: ServiceFactory<S>, options: RegisterOptions = {}): this {
    const tag = options.tag ?? DEFAULT_TAG;
    const table = this.tableFor(key);
    const previous = table.get(tag);

    table.set(tag, { factory, generation: (previous?.generation ?? 0) + 1 });
    this.logger.debug({ key: key.id, replaced: previous !== undefined, tag }, 'Service registered');
    return this;
  }

  async get<S>(key: ServiceKey<S>, tag: string = DEFAULT_TAG): Promise<ServiceResult<S>> {
    const registration = registrationsOf(key).get(this)?.get(tag);
    if (!registration) {
      this.logger.warn({ key: key.id, tag }, 'No service registered');
      return err(
        ServiceNotRegistered.create({
          context: { key: key.id, tag },
          message: `No service registered for ${key.id} (tag: ${tag})`,
        })
      );
    }

    if (registration.instance) {
      return ok(registration.instance.value);
    }

    if (!registration.building) {
      const building = this.build(key, tag, registration);
      registration.building = building;
      void building.finally(() => {
        if (registration.building === building) {
          registration.building = undefined;
        }
      });
    }

    return registration.building;
  }

  /** The memoized instance, without building. */
  peek<S>(key: ServiceKey<S>, tag: string = DEFAULT_TAG): S | undefined {
    return registrationsOf(key).get(this)?.get(tag)?.instance?.value;
  }

  has<S>(key: ServiceKey<S>, tag: string = DEFAULT_TAG): boolean {
    return registrationsOf(key).get(this)?.has(tag) ?? false;
  }

  /**
   * Drop memoized instances; registrations stay. With no key, resets every
   * key; with a key and no tag, every tag of that key.
   */
  reset<S>(key?: ServiceKey<S>, tag?: string): void {
    if (key === undefined) {
      for (const resetKey of this.resets.values()) {
        resetKey();
      }
      return;
    }
    this.resets.get(key)?.(tag);
  }

  private tableFor<S>(key: ServiceKey<S>): Map<string, Registration<S>> {
    const existing = registrationsOf(key).get(this);
    if (existing) {
      return existing;
    }

    const table = new Map<string, Registration<S>>();
    registrationsOf(key).set(this, table);
    this.resets.set(key, (tag?: string) => {
      const targets = tag === undefined ? [...table.values()] : [table.get(tag)];
      for (const registration of targets) {
        if (registration) {
          registration.instance = undefined;
          registration.building = undefined;
          registration.generation += 1;
        }
      }
    });
    return table;
  }

  private async build<S>(key: ServiceKey<S>, tag: string, registration: Registration<S>): Promise<ServiceResult<S>> {
    const generation = registration.generation;
    this.logger.debug({ key: key.id, tag }, 'Building service');

    let result: ServiceResult<S>;
    try {
      result = await registration.factory(this);
    } catch (error) {
      this.logger.warn({ error, key: key.id, tag }, 'Service factory threw');
      return err(
        ServiceBuildFailed.create({
          cause: error,
          context: { key: key.id, tag },
          message: `Failed to build ${key.id} (tag: ${tag}): ${describeError(error)}`,
        })
      );
    }

    if (result.isErr()) {
      this.logger.warn({ error: result.error.message, key: key.id, tag }, 'Service factory returned an error');
      return err(result.error);
    }

    if (registration.generation === generation) {
      registration.instance = { value: result.value };
    }
    return ok(result.value);
  }
}

export function createServiceProvider(): ServiceProvider {
  return new ServiceProvider();
}
