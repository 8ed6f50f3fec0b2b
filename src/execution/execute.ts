import type { ExecutionResult, GraphQLSchema } from 'graphql';

import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import { isPromise } from '../jsutils/isPromise';

import type { ExecutorArgs, ExecutorExecutionArgs } from './executor';
import { Executor } from './executor';
import { BlockingRuntime } from './runtime/BlockingRuntime';

export interface ExecutionArgs
  extends ExecutorExecutionArgs,
    Omit<ExecutorArgs, 'schema'> {
  schema: GraphQLSchema;
}

/**
 * Implements the "Executing requests" section of the GraphQL specification.
 *
 * Returns either a synchronous ExecutionResult (if all encountered resolvers
 * are synchronous), or a Promise of an ExecutionResult that will eventually be
 * resolved and never rejected.
 *
 * If the arguments to this function do not result in a legal execution context,
 * a GraphQLError will be thrown immediately explaining the invalid input.
 *
 * Runs on an `AsyncRuntime` unless `runtime` says otherwise.
 */
export function execute(args: ExecutionArgs): PromiseOrValue<ExecutionResult> {
  return buildExecutor(args).execute(args);
}

/**
 * Also implements the "Executing requests" section of the GraphQL
 * specification. However, it guarantees to complete synchronously (or throw
 * an error) assuming that all field resolvers are also synchronous.
 *
 * Runs on a `BlockingRuntime` unless `runtime` says otherwise.
 */
export function executeSync(args: ExecutionArgs): ExecutionResult {
  const result = buildExecutor({
    ...args,
    runtime: args.runtime ?? new BlockingRuntime(),
  }).execute(args);

  // Assert that the execution was synchronous.
  if (isPromise(result)) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}

export function buildExecutor(args: ExecutionArgs): Executor {
  const {
    schema,
    executorSchema,
    runtime,
    logger,
    instrumentation,
    middlewares,
  } = args;
  return new Executor({
    schema,
    executorSchema,
    runtime,
    logger,
    instrumentation,
    middlewares,
  });
}
