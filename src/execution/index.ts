export { pathToArray as responsePathAsArray } from '../jsutils/Path';

export type {
  ExecutionContext,
  ExecutorArgs,
  ExecutorExecutionArgs,
  FieldContext,
} from './executor';
export { Executor } from './executor';

export { defaultFieldResolver, defaultTypeResolver } from './defaultResolvers';

export type { ExecutionArgs } from './execute';
export { execute, executeSync } from './execute';

export { subscribe, createSourceEventStream } from './subscribe';

export {
  coerceVariableValues,
  coerceArgumentValues,
  getDirectiveValues,
} from './values';
export type { CoerceVariableValuesOptions } from './values';

export { formatResult, addExtension } from './result';

export type { Instrumentation } from './instrumentation';
export { MultiInstrumentation } from './instrumentation';

export type { FieldMiddleware } from './middleware';
export { applyMiddlewares } from './middleware';

export type { Logger } from './logger';
export { noopLogger } from './logger';

export type {
  FieldResolver,
  Recovery,
  Runtime,
  SubscriptionRuntime,
  PooledRuntimeOptions,
  AsyncRuntimeOptions,
} from './runtime/index';
export {
  isSubscriptionRuntime,
  PromiseRuntime,
  BlockingRuntime,
  PooledRuntime,
  AsyncRuntime,
  defaultMaxWorkers,
} from './runtime/index';

export { mapAsyncIterable } from './mapAsyncIterable';
