import type { DocumentNode, ExecutionResult, Source } from 'graphql';
import { validate, validateSchema } from 'graphql';

import type { PromiseOrValue } from './jsutils/PromiseOrValue';
import { isPromise } from './jsutils/isPromise';

import { GraphQLSyntaxError } from './error/syntaxError';

import type { ParseOptions } from './language/parser';
import { parse } from './language/parser';

import type { ExecutionArgs } from './execution/execute';
import { buildExecutor } from './execution/execute';
import type { Instrumentation } from './execution/instrumentation';
import { BlockingRuntime } from './execution/runtime/BlockingRuntime';

/**
 * This is the primary entry point function for fulfilling GraphQL operations
 * by parsing, validating, and executing a GraphQL document along side a
 * GraphQL schema.
 *
 * More sophisticated GraphQL servers, such as those which persist queries,
 * may wish to separate the validation and execution phases to a static time
 * tooling step, and a server runtime step.
 *
 * Accepts the execution arguments, with `source` in place of `document`:
 *
 * source:
 *    A GraphQL language formatted string representing the requested
 *    operation.
 * validate:
 *    Pass `false` to skip the validation rules of the `graphql` package.
 * parseOptions:
 *    Options for the parser. Type system definitions are always rejected.
 *
 * Syntax and validation errors produce a result with `errors` and no `data`.
 */
export interface GraphQLArgs extends Omit<ExecutionArgs, 'document'> {
  source: string | Source;
  validate?: boolean;
  parseOptions?: Omit<ParseOptions, 'allowTypeSystem'>;
}

export function graphql(args: GraphQLArgs): Promise<ExecutionResult> {
  // Always return a Promise for a consistent API.
  return new Promise((resolve) => resolve(graphqlImpl(args)));
}

/**
 * The graphqlSync function also fulfills GraphQL operations by parsing,
 * validating, and executing a GraphQL document along side a GraphQL schema.
 * However, it guarantees to complete synchronously (or throw an error) assuming
 * that all field resolvers are also synchronous.
 *
 * Runs on a `BlockingRuntime` unless `runtime` says otherwise.
 */
export function graphqlSync(args: GraphQLArgs): ExecutionResult {
  const result = graphqlImpl({
    ...args,
    runtime: args.runtime ?? new BlockingRuntime(),
  });

  // Assert that the execution was synchronous.
  if (isPromise(result)) {
    throw new Error('GraphQL execution failed to complete synchronously.');
  }

  return result;
}

function graphqlImpl(args: GraphQLArgs): PromiseOrValue<ExecutionResult> {
  const instrumentation = args.instrumentation ?? {};
  instrumentation.onQueryStart?.();

  const onFailure = (error: unknown): never => {
    instrumentation.onQueryEnd?.();
    throw error;
  };

  let result: PromiseOrValue<ExecutionResult>;
  try {
    result = runRequest(args, instrumentation);
  } catch (error) {
    return onFailure(error);
  }

  if (isPromise(result)) {
    return result.then(
      (resolved) => completeRequest(instrumentation, resolved),
      onFailure,
    );
  }
  return completeRequest(instrumentation, result);
}

function completeRequest(
  instrumentation: Instrumentation,
  result: ExecutionResult,
): ExecutionResult {
  const transformed = instrumentation.transformResult?.(result) ?? result;
  instrumentation.onQueryEnd?.();
  return transformed;
}

function runRequest(
  args: GraphQLArgs,
  instrumentation: Instrumentation,
): PromiseOrValue<ExecutionResult> {
  const { schema, source, parseOptions } = args;

  // Validate Schema
  const schemaValidationErrors = validateSchema(schema);
  if (schemaValidationErrors.length > 0) {
    return { errors: schemaValidationErrors };
  }

  // Parse
  instrumentation.onParsingStart?.();
  let parsed: DocumentNode;
  try {
    parsed = parse(source, { ...parseOptions, allowTypeSystem: false });
  } catch (syntaxError) {
    instrumentation.onParsingEnd?.();
    if (syntaxError instanceof GraphQLSyntaxError) {
      return { errors: [syntaxError] };
    }
    throw syntaxError;
  }
  instrumentation.onParsingEnd?.();

  const document = instrumentation.transformDocument?.(parsed) ?? parsed;

  // Validate
  if (args.validate !== false) {
    instrumentation.onValidationStart?.();
    const validationErrors = validate(schema, document);
    instrumentation.onValidationEnd?.();
    if (validationErrors.length > 0) {
      return { errors: validationErrors };
    }
  }

  // Execute
  return buildExecutor({ ...args, document }).execute({ ...args, document });
}
