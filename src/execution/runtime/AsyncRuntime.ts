import { isAsyncFunction } from '../../jsutils/isAsyncFunction';
import type { PromiseOrValue } from '../../jsutils/PromiseOrValue';

import { mapAsyncIterable } from '../mapAsyncIterable';

import { PromiseRuntime } from './PromiseRuntime';
import type { FieldResolver, SubscriptionRuntime } from './runtime';

export interface AsyncRuntimeOptions {
  /**
   * Run resolvers that are not `async` functions on a later macrotask, so a
   * slow synchronous resolver does not hold up the rest of the current turn.
   * Defaults to `true`.
   */
  offloadBlockingResolvers?: boolean;
}

/**
 * Promise based runtime. The only one that can serve subscriptions.
 */
export class AsyncRuntime
  extends PromiseRuntime
  implements SubscriptionRuntime
{
  readonly supportsSubscriptions = true;
  readonly offloadBlockingResolvers: boolean;

  constructor(options: AsyncRuntimeOptions = {}) {
    super();
    this.offloadBlockingResolvers = options.offloadBlockingResolvers ?? true;
  }

  submit<T>(fn: () => PromiseOrValue<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      setImmediate(() => {
        try {
          signal?.throwIfAborted();
          resolve(fn());
        } catch (error) {
          reject(error);
        }
      });
    });
  }

  wrapFieldResolver(
    resolver: FieldResolver,
    signal?: AbortSignal,
  ): FieldResolver {
    if (!this.offloadBlockingResolvers || isAsyncFunction(resolver)) {
      return resolver;
    }
    return (source, args, context, info) =>
      this.submit(() => resolver(source, args, context, info), signal);
  }

  mapStream<T, R>(
    source: AsyncIterable<T>,
    fn: (value: T) => PromiseOrValue<R>,
  ): AsyncGenerator<R, void, void> {
    return mapAsyncIterable(source, fn);
  }
}
