import { err, ok, type Result } from 'neverthrow';

import type { ServiceError } from './errors.js';

export { err, ok, type Result };

export type ServiceResult<T, E = ServiceError> = Result<T, E>;

/**
 * Thrown when a Result is read as the variant it does not hold.
 * This is a programming error, so it is thrown rather than returned.
 */
export class ResultAccessError extends Error {
  constructor(
    message: string,
    public readonly held: 'value' | 'error'
  ) {
    super(message);
    this.name = 'ResultAccessError';
  }
}

/**
 * Value of a successful result.
 * @throws ResultAccessError when the result holds an error
 */
export function getValue<T, E>(result: Result<T, E>): T {
  if (result.isErr()) {
    throw new ResultAccessError('Cannot read the value of an error result', 'error');
  }
  return result.value;
}

/**
 * Error of a failed result.
 * @throws ResultAccessError when the result holds a value
 */
export function getError<T, E>(result: Result<T, E>): E {
  if (result.isOk()) {
    throw new ResultAccessError('Cannot read the error of a successful result', 'value');
  }
  return result.error;
}
