import type { GraphQLFieldResolver } from 'graphql';

import type { PromiseOrValue } from '../../jsutils/PromiseOrValue';

export type FieldResolver = GraphQLFieldResolver<unknown, unknown>;

/**
 * Describes which failures `mapValue` may turn back into a value. Anything
 * `matches` rejects keeps propagating.
 */
export interface Recovery<E, R> {
  matches: (error: unknown) => error is E;
  recover: (error: E) => R;
}

/**
 * The concurrency strategy the executor runs on.
 *
 * The execution algorithm never awaits, spawns or schedules anything by
 * itself: every value that may be deferred goes through a runtime method.
 * A runtime decides whether values are plain (`BlockingRuntime`) or
 * promises (`PooledRuntime`, `AsyncRuntime`) and where resolvers run.
 */
export interface Runtime {
  readonly supportsSubscriptions: boolean;

  /**
   * Runs `fn` as one unit of work. Aborted signals keep work from starting.
   */
  submit: <T>(
    fn: () => PromiseOrValue<T>,
    signal?: AbortSignal,
  ) => PromiseOrValue<T>;

  /**
   * Adapts a resolver to the runtime, e.g. scheduling it as a unit of work.
   * Called once per resolver and execution, not once per field.
   */
  wrapFieldResolver: (
    resolver: FieldResolver,
    signal?: AbortSignal,
  ) => FieldResolver;

  /**
   * Combines values into one list value, preserving order. Settles once
   * every input has settled; fails with the first failure observed.
   */
  gatherValues: <T>(
    values: ReadonlyArray<PromiseOrValue<T>>,
  ) => PromiseOrValue<Array<T>>;

  /**
   * Applies `then` to the eventual value. Failures of the input, of `then`
   * or of the value `then` returns are handed to `recovery` when it matches
   * them.
   */
  mapValue: <T, R, E = never>(
    value: PromiseOrValue<T>,
    then: (value: T) => PromiseOrValue<R>,
    recovery?: Recovery<E, R>,
  ) => PromiseOrValue<R>;

  /**
   * Flattens nested deferred values.
   */
  unwrapValue: <T>(value: PromiseOrValue<T>) => PromiseOrValue<T>;
}

export interface SubscriptionRuntime extends Runtime {
  readonly supportsSubscriptions: true;

  mapStream: <T, R>(
    source: AsyncIterable<T>,
    fn: (value: T) => PromiseOrValue<R>,
  ) => AsyncGenerator<R, void, void>;
}

export function isSubscriptionRuntime(
  runtime: Runtime,
): runtime is SubscriptionRuntime {
  return runtime.supportsSubscriptions && 'mapStream' in runtime;
}
