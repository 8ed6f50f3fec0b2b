import type { GraphQLResolveInfo } from 'graphql';

import type { FieldResolver } from './runtime/runtime';

/**
 * Wraps a field resolver. `next` is the rest of the chain; a middleware may
 * call it with different arguments, call it more than once, or not at all.
 */
export type FieldMiddleware = (
  next: FieldResolver,
  source: unknown,
  args: { [argument: string]: unknown },
  contextValue: unknown,
  info: GraphQLResolveInfo,
) => unknown;

/**
 * Builds the resolver that runs `middlewares` around `resolver`. The first
 * middleware is the outermost one.
 */
export function applyMiddlewares(
  resolver: FieldResolver,
  middlewares: ReadonlyArray<FieldMiddleware>,
): FieldResolver {
  return middlewares.reduceRight<FieldResolver>(
    (next, middleware) => (source, args, contextValue, info) =>
      middleware(next, source, args, contextValue, info),
    resolver,
  );
}
