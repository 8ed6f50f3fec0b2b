import { ContractViolationError } from '../../error/faults';
import { inspect } from '../../jsutils/inspect';
import { isPromise } from '../../jsutils/isPromise';
import type { PromiseOrValue } from '../../jsutils/PromiseOrValue';

import type { FieldResolver, Recovery, Runtime } from './runtime';

function deferredValueError(value: unknown): ContractViolationError {
  return new ContractViolationError(
    `Blocking runtime received a deferred value: ${inspect(value)}. Use PooledRuntime or AsyncRuntime for resolvers returning promises.`,
  );
}

function assertSync<T>(value: PromiseOrValue<T>): T {
  if (isPromise(value)) {
    throw deferredValueError(value);
  }
  return value;
}

/**
 * Runs everything in the calling turn. Resolvers must return plain values;
 * a promise anywhere is a programming error, not a field error.
 */
export class BlockingRuntime implements Runtime {
  readonly supportsSubscriptions = false;

  submit<T>(fn: () => PromiseOrValue<T>, signal?: AbortSignal): T {
    signal?.throwIfAborted();
    return assertSync(fn());
  }

  wrapFieldResolver(
    resolver: FieldResolver,
    signal?: AbortSignal,
  ): FieldResolver {
    return (source, args, context, info) =>
      this.submit(() => resolver(source, args, context, info), signal);
  }

  gatherValues<T>(values: ReadonlyArray<PromiseOrValue<T>>): Array<T> {
    return values.map(assertSync);
  }

  mapValue<T, R, E = never>(
    value: PromiseOrValue<T>,
    then: (value: T) => PromiseOrValue<R>,
    recovery?: Recovery<E, R>,
  ): R {
    const resolved = assertSync(value);

    let result: PromiseOrValue<R>;
    try {
      result = then(resolved);
    } catch (error) {
      if (recovery !== undefined && recovery.matches(error)) {
        return recovery.recover(error);
      }
      throw error;
    }
    return assertSync(result);
  }

  unwrapValue<T>(value: PromiseOrValue<T>): T {
    return assertSync(value);
  }
}
