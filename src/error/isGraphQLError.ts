import type { GraphQLError } from 'graphql';

/**
 * Matches errors from any copy of the `graphql` package, including every
 * subclass defined here.
 */
export function isGraphQLError(error: unknown): error is GraphQLError {
  return (
    error instanceof Error &&
    Object.prototype.toString.call(error) === '[object GraphQLError]'
  );
}

/**
 * Field errors are recovered by nulling the nearest nullable position. Every
 * other thrown value aborts the execution.
 */
export const isFieldError = isGraphQLError;
