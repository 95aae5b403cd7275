/**
 * Unified service errors.
 *
 * Every failure a service reports carries a stable identity, the pair
 * (module, code), plus display text. Callers branch on identity with
 * `error.is(Definition)` or `Definition.matches(value)`, never on message text.
 */

export interface ErrorIdentity {
  readonly module: string;
  readonly code: number;
}

export interface ServiceErrorOptions {
  message?: string | undefined;
  cause?: unknown;
  context?: Record<string, unknown> | undefined;
}

export class ServiceError extends Error implements ErrorIdentity {
  readonly module: string;
  readonly code: number;
  readonly timestamp: string;
  readonly context?: Record<string, unknown> | undefined;

  constructor(definition: ErrorDefinition, options: ServiceErrorOptions = {}) {
    super(
      options.message ?? definition.defaultMessage,
      options.cause === undefined ? undefined : { cause: options.cause }
    );
    this.name = definition.name;
    this.module = definition.module;
    this.code = definition.code;
    this.timestamp = new Date().toISOString();
    this.context = options.context;
  }

  /** Identity check against a definition or another error. */
  is(identity: ErrorIdentity): boolean {
    return this.module === identity.module && this.code === identity.code;
  }

  /** `module#code`, e.g. `tessera.http#1`. */
  get id(): string {
    return `${this.module}#${String(this.code)}`;
  }

  toJSON() {
    return {
      code: this.code,
      context: this.context,
      message: this.message,
      module: this.module,
      name: this.name,
      timestamp: this.timestamp,
    };
  }
}

export interface ErrorDefinition extends ErrorIdentity {
  readonly name: string;
  readonly defaultMessage: string;
  create(options?: ServiceErrorOptions): ServiceError;
  matches(value: unknown): value is ServiceError;
}

export interface ErrorModule {
  readonly module: string;
  define(code: number, name: string, defaultMessage: string): ErrorDefinition;
  definitions(): readonly ErrorDefinition[];
}

/**
 * Declare an error module. Codes are unique within a module; redefining a
 * code throws at module load.
 */
export function defineErrorModule(module: string): ErrorModule {
  const byCode = new Map<number, ErrorDefinition>();

  return {
    module,
    define(code: number, name: string, defaultMessage: string): ErrorDefinition {
      if (!Number.isInteger(code) || code < 0) {
        throw new Error(`Invalid error code ${String(code)} for ${module}.${name}`);
      }
      const existing = byCode.get(code);
      if (existing) {
        throw new Error(`Error code ${String(code)} in ${module} is already used by ${existing.name}`);
      }

      const definition: ErrorDefinition = {
        module,
        code,
        name,
        defaultMessage,
        create: (options) => new ServiceError(definition, options),
        matches: (value): value is ServiceError => value instanceof ServiceError && value.is(definition),
      };
      byCode.set(code, definition);
      return definition;
    },
    definitions: () => [...byCode.values()],
  };
}

export const CoreErrors = defineErrorModule('tessera.core');

export const ServiceNotRegistered = CoreErrors.define(
  1,
  'ServiceNotRegistered',
  'No service is registered for this key.'
);
export const ServiceBuildFailed = CoreErrors.define(2, 'ServiceBuildFailed', 'Failed to build the service.');

/**
 * Normalize anything thrown into a message, for logs and error context.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
