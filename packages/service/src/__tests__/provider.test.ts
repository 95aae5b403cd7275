import { err, ok } from 'neverthrow';
import { describe, expect, expectTypeOf, it, vi } from 'vitest';

import { defineErrorModule, ServiceBuildFailed, ServiceNotRegistered } from '../errors.js';
import { createServiceKey, createServiceProvider, type ServiceFactory } from '../provider.js';

interface Database {
  name: string;
}

interface Repository {
  database: Database;
}

const TestErrors = defineErrorModule('test.provider');
const ConnectionRefused = TestErrors.define(1, 'ConnectionRefused', 'Connection refused.');

describe('ServiceProvider', () => {
  it('builds on first access and memoizes the instance', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    const factory = vi.fn(() => ok<Database>({ name: 'primary' }));
    provider.register(key, factory);

    expect(provider.peek(key)).toBeUndefined();

    const first = await provider.get(key);
    const second = await provider.get(key);

    expect(first._unsafeUnwrap()).toEqual({ name: 'primary' });
    expect(second._unsafeUnwrap()).toBe(first._unsafeUnwrap());
    expect(provider.peek(key)).toBe(first._unsafeUnwrap());
    expect(factory).toHaveBeenCalledOnce();
  });

  it('shares one in-flight build between concurrent first accesses', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    let finish: (value: Database) => void = () => undefined;
    const factory = vi.fn(
      () =>
        new Promise<Database>((resolve) => {
          finish = resolve;
        }).then((database) => ok(database))
    );
    provider.register(key, factory);

    const pending = [provider.get(key), provider.get(key), provider.get(key)];
    await Promise.resolve();
    finish({ name: 'shared' });
    const results = await Promise.all(pending);

    expect(factory).toHaveBeenCalledOnce();
    const [a, b, c] = results.map((result) => result._unsafeUnwrap());
    expect(a).toBe(b);
    expect(b).toBe(c);
  });

  it('does not memoize an error result and retries on the next access', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    const factory = vi
      .fn<ServiceFactory<Database>>()
      .mockReturnValueOnce(err(ConnectionRefused.create()))
      .mockReturnValueOnce(ok({ name: 'recovered' }));
    provider.register(key, factory);

    const first = await provider.get(key);
    expect(first.isErr()).toBe(true);
    expect(first._unsafeUnwrapErr().is(ConnectionRefused)).toBe(true);
    expect(provider.peek(key)).toBeUndefined();

    const second = await provider.get(key);
    expect(second._unsafeUnwrap()).toEqual({ name: 'recovered' });
    expect(factory).toHaveBeenCalledTimes(2);
  });

  it('turns a thrown factory error into ServiceBuildFailed', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    const cause = new Error('boom');
    provider.register(key, () => {
      throw cause;
    });

    const error = (await provider.get(key))._unsafeUnwrapErr();

    expect(ServiceBuildFailed.matches(error)).toBe(true);
    expect(error.message).toBe('Failed to build database (tag: default): boom');
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ key: 'database', tag: 'default' });
  });

  it('turns a rejected factory promise into ServiceBuildFailed and retries later', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    const factory = vi
      .fn<ServiceFactory<Database>>()
      .mockRejectedValueOnce(new Error('timeout'))
      .mockResolvedValueOnce(ok({ name: 'late' }));
    provider.register(key, factory);

    const first = await provider.get(key);
    expect(first._unsafeUnwrapErr().is(ServiceBuildFailed)).toBe(true);

    const second = await provider.get(key);
    expect(second._unsafeUnwrap()).toEqual({ name: 'late' });
  });

  it('reports unknown keys and tags as ServiceNotRegistered', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    provider.register(key, () => ok({ name: 'primary' }));

    const unknownKey = await provider.get(createServiceKey<Database>('database'));
    const unknownTag = await provider.get(key, 'replica');

    expect(unknownKey._unsafeUnwrapErr().is(ServiceNotRegistered)).toBe(true);
    expect(unknownTag._unsafeUnwrapErr().message).toBe('No service registered for database (tag: replica)');
    expect(provider.has(key)).toBe(true);
    expect(provider.has(key, 'replica')).toBe(false);
  });

  it('keeps tagged instances independent', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    provider
      .register(key, () => ok({ name: 'primary' }))
      .register(key, () => ok({ name: 'replica' }), { tag: 'replica' });

    expect((await provider.get(key))._unsafeUnwrap()).toEqual({ name: 'primary' });
    expect((await provider.get(key, 'replica'))._unsafeUnwrap()).toEqual({ name: 'replica' });
  });

  it('lets factories resolve other registered services', async () => {
    const provider = createServiceProvider();
    const databaseKey = createServiceKey<Database>('database');
    const repositoryKey = createServiceKey<Repository>('repository');
    provider.register(databaseKey, () => ok({ name: 'primary' }));
    provider.register(repositoryKey, async (services) =>
      (await services.get(databaseKey)).map((database) => ({ database }))
    );

    const repository = (await provider.get(repositoryKey))._unsafeUnwrap();

    expect(repository.database).toBe(provider.peek(databaseKey));
  });

  it('rebuilds after reset while keeping registrations', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    let builds = 0;
    provider.register(key, () => {
      builds += 1;
      return ok({ name: `build-${builds}` });
    });

    const first = (await provider.get(key))._unsafeUnwrap();
    provider.reset(key);
    expect(provider.peek(key)).toBeUndefined();
    expect(provider.has(key)).toBe(true);

    const second = (await provider.get(key))._unsafeUnwrap();
    expect(first.name).toBe('build-1');
    expect(second.name).toBe('build-2');

    provider.reset();
    expect(provider.peek(key)).toBeUndefined();
  });

  it('does not share instances between providers', async () => {
    const key = createServiceKey<Database>('database');
    const first = createServiceProvider().register(key, () => ok({ name: 'a' }));
    const second = createServiceProvider();

    expect((await first.get(key)).isOk()).toBe(true);
    expect((await second.get(key)).isErr()).toBe(true);
  });

  it('keeps registration tables out of reach of key holders', async () => {
    const provider = createServiceProvider();
    const key = createServiceKey<Database>('database');
    provider.register(key, () => ok<Database>({ name: 'primary' }));
    const instance = (await provider.get(key))._unsafeUnwrap();

    expect(Object.keys(key)).toEqual(['id']);
    expect('registrations' in key).toBe(false);
    expectTypeOf(key).not.toHaveProperty('registrations');
    expect(provider.peek(key)).toBe(instance);
  });
});
