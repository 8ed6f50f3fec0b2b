import type { ASTNode } from 'graphql';
import { GraphQLError } from 'graphql';

import type { Maybe } from '../jsutils/Maybe';

/**
 * Raised when an argument or a variable cannot be coerced to its declared
 * input type.
 */
export class CoercionError extends GraphQLError {
  constructor(
    message: string,
    nodes?: Maybe<ReadonlyArray<ASTNode> | ASTNode>,
    originalError?: Maybe<Error>,
  ) {
    super(message, { nodes, originalError });
    this.name = 'CoercionError';
  }
}

/**
 * Wraps every variable that failed coercion. Execution does not start.
 */
export class VariablesCoercionError extends GraphQLError {
  readonly errors: ReadonlyArray<GraphQLError>;

  constructor(errors: ReadonlyArray<GraphQLError>) {
    super(errors.map((error) => error.message).join('\n'));
    this.name = 'VariablesCoercionError';
    this.errors = errors;
  }
}
