import { availableParallelism } from 'node:os';

import { ConfigurationError } from '../../error/faults';
import type { PromiseOrValue } from '../../jsutils/PromiseOrValue';

import { PromiseRuntime } from './PromiseRuntime';
import type { FieldResolver } from './runtime';

export interface PooledRuntimeOptions {
  /**
   * Upper bound on units of work in flight. Defaults to
   * `min(32, availableParallelism() + 4)`.
   */
  maxWorkers?: number;
}

export function defaultMaxWorkers(): number {
  return Math.min(32, availableParallelism() + 4);
}

/**
 * Runs every resolver call as a unit of work on a bounded pool.
 *
 * A unit of work starts on a later macrotask once a slot is free and holds
 * its slot until the value it returned settles. Continuations are promise
 * callbacks, so completing a parent never waits on a slot held by one of
 * its children.
 */
export class PooledRuntime extends PromiseRuntime {
  readonly supportsSubscriptions = false;
  readonly maxWorkers: number;

  private _active = 0;
  private readonly _queue: Array<() => void> = [];

  constructor(options: PooledRuntimeOptions = {}) {
    super();
    const maxWorkers = options.maxWorkers ?? defaultMaxWorkers();
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new ConfigurationError(
        `maxWorkers must be a positive integer, got ${maxWorkers}.`,
      );
    }
    this.maxWorkers = maxWorkers;
  }

  /**
   * Units of work currently holding a slot.
   */
  get activeCount(): number {
    return this._active;
  }

  /**
   * Units of work waiting for a slot.
   */
  get pendingCount(): number {
    return this._queue.length;
  }

  submit<T>(fn: () => PromiseOrValue<T>, signal?: AbortSignal): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this._queue.push(() => {
        let result: PromiseOrValue<T>;
        try {
          signal?.throwIfAborted();
          result = fn();
        } catch (error) {
          this._release();
          reject(error);
          return;
        }

        Promise.resolve(result).then(
          (value) => {
            this._release();
            resolve(value);
          },
          (error: unknown) => {
            this._release();
            reject(error);
          },
        );
      });
      this._drain();
    });
  }

  wrapFieldResolver(
    resolver: FieldResolver,
    signal?: AbortSignal,
  ): FieldResolver {
    return (source, args, context, info) =>
      this.submit(() => resolver(source, args, context, info), signal);
  }

  private _release(): void {
    this._active--;
    this._drain();
  }

  private _drain(): void {
    while (this._active < this.maxWorkers) {
      const task = this._queue.shift();
      if (task === undefined) {
        return;
      }
      this._active++;
      setImmediate(task);
    }
  }
}
