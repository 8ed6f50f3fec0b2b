import { isPromise } from '../../jsutils/isPromise';
import type { PromiseOrValue } from '../../jsutils/PromiseOrValue';
import { resolveAfterAll } from '../../jsutils/resolveAfterAll';

import type { FieldResolver, Recovery, Runtime } from './runtime';

/**
 * Promise plumbing shared by the runtimes that defer work. Values that are
 * already available stay synchronous, so a field tree without pending work
 * completes in the same turn.
 */
export abstract class PromiseRuntime implements Runtime {
  abstract readonly supportsSubscriptions: boolean;

  abstract submit<T>(
    fn: () => PromiseOrValue<T>,
    signal?: AbortSignal,
  ): Promise<T>;

  abstract wrapFieldResolver(
    resolver: FieldResolver,
    signal?: AbortSignal,
  ): FieldResolver;

  gatherValues<T>(
    values: ReadonlyArray<PromiseOrValue<T>>,
  ): PromiseOrValue<Array<T>> {
    const results: Array<T> = [];
    const promises: Array<Promise<void>> = [];

    values.forEach((value, index) => {
      if (isPromise(value)) {
        promises.push(
          value.then((resolved) => {
            results[index] = resolved;
          }),
        );
      } else {
        results[index] = value;
      }
    });

    if (promises.length === 0) {
      return results;
    }

    return resolveAfterAll(results, promises);
  }

  mapValue<T, R, E = never>(
    value: PromiseOrValue<T>,
    then: (value: T) => PromiseOrValue<R>,
    recovery?: Recovery<E, R>,
  ): PromiseOrValue<R> {
    if (recovery === undefined) {
      return isPromise(value) ? value.then(then) : then(value);
    }

    const onError = (error: unknown): R => {
      if (recovery.matches(error)) {
        return recovery.recover(error);
      }
      throw error;
    };

    if (isPromise(value)) {
      return value.then(then).then(undefined, onError);
    }

    let result: PromiseOrValue<R>;
    try {
      result = then(value);
    } catch (error) {
      return onError(error);
    }

    if (isPromise(result)) {
      return result.then(undefined, onError);
    }
    return result;
  }

  unwrapValue<T>(value: PromiseOrValue<T>): PromiseOrValue<T> {
    // Promise resolution adopts the state of nested thenables.
    return isPromise(value) ? Promise.resolve(value) : value;
  }
}
