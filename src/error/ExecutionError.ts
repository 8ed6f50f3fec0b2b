import type { ASTNode } from 'graphql';
import { GraphQLError } from 'graphql';

import type { Maybe } from '../jsutils/Maybe';

/**
 * A document-level failure: the operation cannot run at all, so the response
 * carries `data: null`.
 */
export class ExecutionError extends GraphQLError {
  constructor(message: string, nodes?: Maybe<ReadonlyArray<ASTNode> | ASTNode>) {
    super(message, { nodes });
    this.name = 'ExecutionError';
  }
}
