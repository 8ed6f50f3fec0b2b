import type { PromiseOrValue } from '../jsutils/PromiseOrValue';

/**
 * Given an AsyncIterable and a callback function, return an AsyncGenerator
 * which produces values mapped via calling the callback function.
 *
 * Returning early, or a callback failure, closes the source iterator.
 */
export async function* mapAsyncIterable<T, U>(
  iterable: AsyncIterable<T>,
  fn: (value: T) => PromiseOrValue<U>,
): AsyncGenerator<U, void, void> {
  for await (const value of iterable) {
    yield await fn(value);
  }
}
