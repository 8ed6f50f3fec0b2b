export type {
  FieldResolver,
  Recovery,
  Runtime,
  SubscriptionRuntime,
} from './runtime';
export { isSubscriptionRuntime } from './runtime';
export { PromiseRuntime } from './PromiseRuntime';
export { BlockingRuntime } from './BlockingRuntime';
export type { PooledRuntimeOptions } from './PooledRuntime';
export { PooledRuntime, defaultMaxWorkers } from './PooledRuntime';
export type { AsyncRuntimeOptions } from './AsyncRuntime';
export { AsyncRuntime } from './AsyncRuntime';
