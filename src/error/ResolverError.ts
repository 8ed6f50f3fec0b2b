import type { GraphQLErrorExtensions } from 'graphql';
import { GraphQLError } from 'graphql';

export interface ResolverErrorOptions {
  extensions?: GraphQLErrorExtensions;
  originalError?: Error;
}

/**
 * The error resolvers throw to report an expected failure. The field becomes
 * `null` and the error, with its `extensions`, is added to the response.
 */
export class ResolverError extends GraphQLError {
  constructor(message: string, options: ResolverErrorOptions = {}) {
    super(message, {
      extensions: options.extensions,
      originalError: options.originalError,
    });
    this.name = 'ResolverError';
  }
}
