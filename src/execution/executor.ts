import type {
  DocumentNode,
  ExecutionResult,
  FieldNode,
  FragmentDefinitionNode,
  FragmentSpreadNode,
  GraphQLAbstractType,
  GraphQLField,
  GraphQLFieldResolver,
  GraphQLLeafType,
  GraphQLList,
  GraphQLObjectType,
  GraphQLOutputType,
  GraphQLResolveInfo,
  GraphQLSchema,
  GraphQLTypeResolver,
  InlineFragmentNode,
  OperationDefinitionNode,
  SelectionSetNode,
} from 'graphql';
import {
  GraphQLError,
  GraphQLIncludeDirective,
  GraphQLSkipDirective,
  Kind,
  OperationTypeNode,
  isAbstractType,
  isLeafType,
  isListType,
  isNonNullType,
  isObjectType,
  locatedError,
} from 'graphql';

import type { Path } from '../jsutils/Path';
import type { ObjMap } from '../jsutils/ObjMap';
import type { PromiseOrValue } from '../jsutils/PromiseOrValue';
import type { Maybe } from '../jsutils/Maybe';
import { inspect } from '../jsutils/inspect';
import { memoize1 } from '../jsutils/memoize1';
import { memoize2 } from '../jsutils/memoize2';
import { devAssert } from '../jsutils/devAssert';
import { isPromise } from '../jsutils/isPromise';
import { isObjectLike } from '../jsutils/isObjectLike';
import { addPath, pathToArray, printPath } from '../jsutils/Path';
import { isAsyncIterable } from '../jsutils/isAsyncIterable';
import { isIterableObject } from '../jsutils/isIterableObject';

import { isFieldError, isGraphQLError } from '../error/isGraphQLError';
import { ExecutionError } from '../error/ExecutionError';
import { VariablesCoercionError } from '../error/CoercionError';
import {
  ConfigurationError,
  ContractViolationError,
  ExecutionAbortedError,
  ExecutionTimeoutError,
} from '../error/faults';

import type { ExecutorSchema } from '../executorSchema/executorSchema';
import { toExecutorSchema } from '../executorSchema/toExecutorSchema';

import type { FieldResolver, Recovery, Runtime } from './runtime/runtime';
import { isSubscriptionRuntime } from './runtime/runtime';
import { AsyncRuntime } from './runtime/AsyncRuntime';
import type { Instrumentation } from './instrumentation';
import type { FieldMiddleware } from './middleware';
import { applyMiddlewares } from './middleware';
import type { Logger } from './logger';
import { noopLogger } from './logger';
import {
  coerceArgumentValues,
  coerceVariableValues,
  getDirectiveValues,
} from './values';
import { defaultFieldResolver, defaultTypeResolver } from './defaultResolvers';

/**
 * Terminology
 *
 * "Definitions" are the generic name for top-level statements in the document.
 * Examples of this include:
 * 1) Operations (such as a query)
 * 2) Fragments
 *
 * "Operations" are a generic name for requests in the document.
 * Examples of this include:
 * 1) query,
 * 2) mutation
 *
 * "Selections" are the definitions that can appear legally and at
 * single level of the query. These include:
 * 1) field references e.g `a`
 * 2) fragment "spreads" e.g. `...c`
 * 3) inline fragment "spreads" e.g. `...on Type { a }`
 */

/**
 * Data that must be available at all points during query execution.
 */
export interface ExecutionContext {
  fragments: ObjMap<FragmentDefinitionNode>;
  rootValue: unknown;
  contextValue: unknown;
  operation: OperationDefinitionNode;
  rootType: GraphQLObjectType;
  variableValues: { [variable: string]: unknown };
  fieldResolver: GraphQLFieldResolver<unknown, unknown>;
  typeResolver: GraphQLTypeResolver<unknown, unknown>;
  subscribeFieldResolver: GraphQLFieldResolver<unknown, unknown>;
  signal: AbortSignal;
  errors: Array<GraphQLError>;
  getArgumentValues: ArgumentValuesGetter;
  getResolver: (resolver: FieldResolver) => FieldResolver;
  subFieldCollector: SubFieldCollector;
  resolveField: FieldValueResolver;
}

export interface FieldContext {
  fieldDef: GraphQLField<unknown, unknown>;
  initialFieldNode: FieldNode;
  fieldName: string;
  fieldNodes: ReadonlyArray<FieldNode>;
  returnType: GraphQLOutputType;
  parentType: GraphQLObjectType;
}

interface AbortScope {
  readonly signal: AbortSignal;
  reason: () => ExecutionAbortedError | undefined;
  dispose: () => void;
}

async function* onStreamEnd<T>(
  stream: AsyncGenerator<T, void, void>,
  onEnd: () => void,
): AsyncGenerator<T, void, void> {
  try {
    yield* stream;
  } finally {
    onEnd();
  }
}

function isAnyError(_error: unknown): _error is unknown {
  return true;
}

export interface ExecutorArgs {
  schema: GraphQLSchema;
  executorSchema?: ExecutorSchema;
  /**
   * Where resolvers run. Defaults to a new `AsyncRuntime`.
   */
  runtime?: Runtime;
  logger?: Logger;
  instrumentation?: Instrumentation;
  /**
   * Wrapped around every resolver, the first one outermost.
   */
  middlewares?: ReadonlyArray<FieldMiddleware>;
}

export interface ExecutorExecutionArgs {
  document: DocumentNode;
  rootValue?: unknown;
  contextValue?: unknown;
  variableValues?: Maybe<{ readonly [variable: string]: unknown }>;
  operationName?: Maybe<string>;
  fieldResolver?: Maybe<GraphQLFieldResolver<unknown, unknown>>;
  typeResolver?: Maybe<GraphQLTypeResolver<unknown, unknown>>;
  subscribeFieldResolver?: Maybe<GraphQLFieldResolver<unknown, unknown>>;
  /**
   * Aborting it stops the execution. Ignored by subscriptions.
   */
  signal?: AbortSignal;
  /**
   * Deadline in milliseconds. Ignored by subscriptions.
   */
  timeout?: number;
}

export type FieldsExecutor = (
  exeContext: ExecutionContext,
  parentType: GraphQLObjectType,
  sourceValue: unknown,
  path: Path | undefined,
  fields: Map<string, ReadonlyArray<FieldNode>>,
) => PromiseOrValue<ObjMap<unknown>>;

export type FieldValueResolver = (
  exeContext: ExecutionContext,
  fieldContext: FieldContext,
  source: unknown,
  info: GraphQLResolveInfo,
) => unknown;

export type ValueCompleter = (
  exeContext: ExecutionContext,
  fieldContext: FieldContext,
  info: GraphQLResolveInfo,
  path: Path,
  result: unknown,
) => PromiseOrValue<unknown>;

export type ArgumentValuesGetter = (
  def: GraphQLField<unknown, unknown>,
  node: FieldNode,
) => { [argument: string]: unknown };

export type SubFieldCollector = (
  returnType: GraphQLObjectType,
  fieldNodes: ReadonlyArray<FieldNode>,
) => Map<string, ReadonlyArray<FieldNode>>;

/**
 * Executor class responsible for implementing the Execution section of the
 * GraphQL spec on top of a `Runtime`.
 *
 * The executor holds what is fixed for a schema: the schema view, the runtime
 * and the memoized lookups that only depend on types and document nodes.
 * Everything that depends on a request lives in an `ExecutionContext`.
 *
 * Every deferred value goes through the runtime, so the same algorithm runs
 * synchronously on a `BlockingRuntime` and on promises elsewhere.
 */
export class Executor {
  splitDefinitions = memoize1((document: DocumentNode) =>
    this._splitDefinitions(document),
  );

  /**
   * A memoized method that looks up the field context given a parent type
   * and an array of field nodes.
   */
  getFieldContext = memoize2(
    (parentType: GraphQLObjectType, fieldNodes: ReadonlyArray<FieldNode>) =>
      this._getFieldContext(parentType, fieldNodes),
  );

  /**
   * A memoized method that retrieves a value completer given a return type.
   */
  getValueCompleter = memoize1((returnType: GraphQLOutputType) =>
    this._getValueCompleter(returnType),
  );

  /**
   * Creates a field list, memoizing so that functions operating on the
   * field list can be memoized.
   */
  createFieldList = memoize1((node: FieldNode): Array<FieldNode> => [node]);

  /**
   * Appends to a field list, memoizing so that functions operating on the
   * field list can be memoized.
   */
  updateFieldList = memoize2(
    (fieldList: Array<FieldNode>, node: FieldNode): Array<FieldNode> => [
      ...fieldList,
      node,
    ],
  );

  private readonly _schema: GraphQLSchema;
  private readonly _executorSchema: ExecutorSchema;
  private readonly _runtime: Runtime;
  private readonly _logger: Logger;
  private readonly _instrumentation: Instrumentation;
  private readonly _middlewares: ReadonlyArray<FieldMiddleware>;

  constructor(executorArgs: ExecutorArgs) {
    const {
      schema,
      executorSchema,
      runtime,
      logger,
      instrumentation,
      middlewares,
    } = executorArgs;

    // Schema must be provided.
    devAssert(schema, 'Must provide schema.');

    this._schema = schema;
    this._executorSchema = executorSchema ?? toExecutorSchema(schema);
    this._runtime = runtime ?? new AsyncRuntime();
    this._logger = logger ?? noopLogger;
    this._instrumentation = instrumentation ?? {};
    this._middlewares = middlewares ?? [];
  }

  get runtime(): Runtime {
    return this._runtime;
  }

  /**
   * Implements the "Executing requests" section of the spec for queries and
   * mutations.
   *
   * Field errors end up in the `errors` of the result. Document-level
   * failures, such as a missing operation or invalid variables, produce
   * `{ data: null, errors }`. Anything else is a fault of the schema or of
   * the resolvers and is thrown (or rejected).
   *
   * When the execution is aborted, through `signal` or once `timeout` has
   * elapsed, the result is `{ data: null, errors }` with a single error and
   * whatever was already completed is discarded.
   */
  execute(args: ExecutorExecutionArgs): PromiseOrValue<ExecutionResult> {
    const scope = this.buildAbortScope(args.signal, args.timeout);

    let finished = false;
    const finish = (): void => {
      if (!finished) {
        finished = true;
        scope.dispose();
        this._instrumentation.onExecutionEnd?.();
      }
    };

    const onFailure = (error: unknown): ExecutionResult => {
      finish();
      const aborted = scope.reason();
      if (aborted !== undefined) {
        return this.buildAbortedResponse(aborted);
      }
      this._logger.error('Execution failed', error);
      throw error;
    };

    this._instrumentation.onExecutionStart?.();

    const abortedBeforeStart = scope.reason();
    if (abortedBeforeStart !== undefined) {
      finish();
      return this.buildAbortedResponse(abortedBeforeStart);
    }

    let result: PromiseOrValue<ExecutionResult>;
    try {
      result = this.executeWithSignal(args, scope.signal);
    } catch (error) {
      return onFailure(error);
    }

    if (!isPromise(result)) {
      finish();
      return result;
    }

    const abortedResult = new Promise<ExecutionResult>((resolve) => {
      scope.signal.addEventListener(
        'abort',
        () => {
          const reason = scope.reason();
          if (reason !== undefined) {
            resolve(this.buildAbortedResponse(reason));
          }
        },
        { once: true },
      );
    });

    return Promise.race([result, abortedResult]).then((resolved) => {
      finish();
      return resolved;
    }, onFailure);
  }

  /**
   * Implements the "CreateSourceEventStream" algorithm described in the
   * GraphQL specification, resolving the subscription source event stream.
   *
   * Resolves to the AsyncIterable returned by the subscription root field's
   * `subscribe` resolver, or to an ExecutionResult with `data: null` when the
   * request cannot be subscribed to.
   */
  async createSourceEventStream(
    args: ExecutorExecutionArgs,
  ): Promise<AsyncIterable<unknown> | ExecutionResult> {
    const exeContext = this.buildExecutionContextOrErrors(
      args,
      new AbortController().signal,
    );

    if (!('fragments' in exeContext)) {
      return { data: null, errors: exeContext };
    }

    this.assertSubscriptionOperation(exeContext.operation);

    return this.createSourceEventStreamImpl(exeContext);
  }

  /**
   * Implements the "Subscribe" algorithm described in the GraphQL
   * specification.
   *
   * Every event of the source stream is executed as a query with the event
   * as root value. Requires a runtime that supports subscriptions.
   */
  async subscribe(
    args: ExecutorExecutionArgs,
  ): Promise<AsyncGenerator<ExecutionResult, void, void> | ExecutionResult> {
    const runtime = this._runtime;
    if (!isSubscriptionRuntime(runtime)) {
      throw new ConfigurationError(
        `${runtime.constructor.name} does not support subscriptions.`,
      );
    }

    const instrumentation = this._instrumentation;
    instrumentation.onExecutionStart?.();
    let streaming = false;
    try {
      const exeContext = this.buildExecutionContextOrErrors(
        args,
        new AbortController().signal,
      );

      if (!('fragments' in exeContext)) {
        return { data: null, errors: exeContext };
      }

      this.assertSubscriptionOperation(exeContext.operation);

      const resultOrStream = await this.createSourceEventStreamImpl(
        exeContext,
      );

      if (!isAsyncIterable(resultOrStream)) {
        return resultOrStream;
      }

      // For each payload yielded from a subscription, map it over the normal
      // GraphQL `execute` function, with `payload` as the rootValue.
      // This implements the "MapSourceToResponseEvent" algorithm described in
      // the GraphQL specification.
      const responseStream = runtime.mapStream(
        resultOrStream,
        (payload: unknown) =>
          this.executeSubscriptionEvent(
            this.buildPerEventExecutionContext(exeContext, payload),
          ),
      );
      streaming = true;
      return onStreamEnd(responseStream, () =>
        instrumentation.onExecutionEnd?.(),
      );
    } finally {
      if (!streaming) {
        instrumentation.onExecutionEnd?.();
      }
    }
  }

  /**
   * Runs a query or mutation under an already linked signal. Document-level
   * errors become a response, anything else is thrown.
   */
  executeWithSignal(
    args: ExecutorExecutionArgs,
    signal: AbortSignal,
  ): PromiseOrValue<ExecutionResult> {
    const exeContext = this.buildExecutionContextOrErrors(args, signal);

    // If a valid execution context cannot be created due to incorrect arguments,
    // a "Response" with only errors is returned.
    if (!('fragments' in exeContext)) {
      return { data: null, errors: exeContext };
    }

    const { operation } = exeContext;
    this._logger.debug(
      `Executing ${operation.operation} operation` +
        (operation.name ? ` "${operation.name.value}"` : ''),
    );

    switch (operation.operation) {
      case OperationTypeNode.QUERY:
        return this.executeQueryImpl(exeContext);
      case OperationTypeNode.MUTATION:
        return this.executeMutationImpl(exeContext);
      default:
        throw new ConfigurationError(
          'Subscription operations cannot be executed, use `subscribe` instead.',
        );
    }
  }

  /**
   * Implements the ExecuteQuery algorithm described in the GraphQL
   * specification. This algorithm is used to execute query operations
   * and to implement the ExecuteSubscriptionEvent algorithm.
   *
   * If errors are encountered while executing a GraphQL field, only that
   * field and its descendants will be omitted, and sibling fields will still
   * be executed.
   *
   * Errors from sub-fields of a NonNull type may propagate to the top level,
   * at which point we still log the error and null the parent field, which
   * in this case is the entire response.
   */
  executeQueryImpl(
    exeContext: ExecutionContext,
  ): PromiseOrValue<ExecutionResult> {
    return this.executeQueryOrMutationImpl(
      exeContext,
      this.executeFields.bind(this),
    );
  }

  /**
   * Implements the ExecuteMutation algorithm described in the Graphql
   * specification.
   */
  executeMutationImpl(
    exeContext: ExecutionContext,
  ): PromiseOrValue<ExecutionResult> {
    return this.executeQueryOrMutationImpl(
      exeContext,
      this.executeFieldsSerially.bind(this),
    );
  }

  executeQueryOrMutationImpl(
    exeContext: ExecutionContext,
    rootFieldsExecutor: FieldsExecutor,
  ): PromiseOrValue<ExecutionResult> {
    const runtime = this._runtime;
    return this.attempt(
      () =>
        runtime.mapValue(
          this.executeRootFields(exeContext, rootFieldsExecutor),
          (data) => this.buildResponse(exeContext, data),
        ),
      {
        matches: isFieldError,
        recover: (error) => {
          exeContext.errors.push(error);
          return this.buildResponse(exeContext, null);
        },
      },
    );
  }

  /**
   * Given a completed execution context and data, build the `{ errors, data }`
   * response defined by the "Response" section of the GraphQL specification.
   */
  buildResponse(
    exeContext: ExecutionContext,
    data: ObjMap<unknown> | null,
  ): ExecutionResult {
    const errors = exeContext.errors;
    this._logger.debug('Execution finished', { errors: errors.length });
    return errors.length === 0 ? { data } : { errors, data };
  }

  buildAbortedResponse(reason: ExecutionAbortedError): ExecutionResult {
    this._logger.warn(`Execution aborted: ${reason.message}`);
    return {
      data: null,
      errors: [new GraphQLError(reason.message, { originalError: reason })],
    };
  }

  /**
   * Links the caller's signal and the deadline into the one signal a single
   * execution observes. `dispose` must be called once the execution settles.
   */
  buildAbortScope(signal?: AbortSignal, timeout?: number): AbortScope {
    const controller = new AbortController();
    let reason: ExecutionAbortedError | undefined;

    const abort = (error: ExecutionAbortedError) => {
      if (reason === undefined) {
        reason = error;
        controller.abort(error);
      }
    };

    const onCallerAbort = () => abort(new ExecutionAbortedError());
    if (signal?.aborted) {
      onCallerAbort();
    } else {
      signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let timer: ReturnType<typeof setTimeout> | undefined;
    if (timeout !== undefined && reason === undefined) {
      devAssert(
        Number.isFinite(timeout) && timeout >= 0,
        'Timeout must be a non-negative number of milliseconds.',
      );
      const deadline = timeout;
      timer = setTimeout(
        () => abort(new ExecutionTimeoutError(deadline)),
        deadline,
      );
    }

    return {
      signal: controller.signal,
      reason: () => reason,
      dispose: () => {
        if (timer !== undefined) {
          clearTimeout(timer);
        }
        signal?.removeEventListener('abort', onCallerAbort);
      },
    };
  }

  /**
   * Essential assertions before executing to provide developer feedback for
   * improper use of the GraphQL library.
   */
  assertValidExecutionArguments(
    document: DocumentNode,
    rawVariableValues: Maybe<{ readonly [variable: string]: unknown }>,
  ): void {
    devAssert(document, 'Must provide document.');

    // Variables, if provided, must be an object.
    devAssert(
      rawVariableValues == null || isObjectLike(rawVariableValues),
      'Variables must be provided as an Object where each property is a variable value. Perhaps look to see if an unparsed JSON string was provided.',
    );
  }

  assertSubscriptionOperation(operation: OperationDefinitionNode): void {
    if (operation.operation !== OperationTypeNode.SUBSCRIPTION) {
      throw new ConfigurationError(
        `Cannot subscribe to a ${operation.operation} operation, use \`execute\` instead.`,
      );
    }
  }

  buildFieldResolver =
    (
      resolverKey: 'resolve' | 'subscribe',
      defaultResolver: GraphQLFieldResolver<unknown, unknown>,
    ): FieldValueResolver =>
    (exeContext, fieldContext, source, info) => {
      const { fieldDef, initialFieldNode } = fieldContext;

      const resolveFn = exeContext.getResolver(
        fieldDef[resolverKey] ?? defaultResolver,
      );

      // Build a JS object of arguments from the field.arguments AST, using the
      // variables scope to fulfill any variable references.
      const args = exeContext.getArgumentValues(fieldDef, initialFieldNode);

      return resolveFn(source, args, exeContext.contextValue, info);
    };

  _splitDefinitions(document: DocumentNode): {
    operations: ReadonlyArray<OperationDefinitionNode>;
    fragments: ObjMap<FragmentDefinitionNode>;
  } {
    const operations: Array<OperationDefinitionNode> = [];
    const fragments: ObjMap<FragmentDefinitionNode> = Object.create(null);
    for (const definition of document.definitions) {
      switch (definition.kind) {
        case Kind.OPERATION_DEFINITION:
          operations.push(definition);
          break;
        case Kind.FRAGMENT_DEFINITION:
          fragments[definition.name.value] = definition;
          break;
        default:
        // ignore non-executable definitions
      }
    }
    return {
      operations,
      fragments,
    };
  }

  selectOperation(
    operations: ReadonlyArray<OperationDefinitionNode>,
    operationName: Maybe<string>,
  ): OperationDefinitionNode {
    if (operations.length === 0) {
      throw new ExecutionError('Expected at least one operation definition');
    }

    if (operationName == null) {
      if (operations.length > 1) {
        throw new ExecutionError(
          'Operation name is required when document contains multiple operation definitions',
        );
      }
      return operations[0];
    }

    const operation = operations.find(
      (possibleOperation) => possibleOperation.name?.value === operationName,
    );
    if (operation === undefined) {
      throw new ExecutionError(`No operation "${operationName}" in document`);
    }
    return operation;
  }

  /**
   * Returns the errors to report instead of an execution context when the
   * request cannot be executed at all.
   */
  buildExecutionContextOrErrors(
    args: ExecutorExecutionArgs,
    signal: AbortSignal,
  ): ReadonlyArray<GraphQLError> | ExecutionContext {
    try {
      return this.buildExecutionContext(args, signal);
    } catch (error) {
      if (error instanceof VariablesCoercionError) {
        return error.errors;
      }
      if (isGraphQLError(error)) {
        return [error];
      }
      throw error;
    }
  }

  /**
   * Constructs a ExecutionContext object from the arguments passed to
   * execute, which we will pass throughout the other execution methods.
   *
   * Throws an `ExecutionError` or a `VariablesCoercionError` if a valid
   * execution context cannot be created.
   */
  buildExecutionContext(
    args: ExecutorExecutionArgs,
    signal: AbortSignal,
  ): ExecutionContext {
    const {
      document,
      rootValue,
      contextValue,
      variableValues: rawVariableValues,
      operationName,
      fieldResolver,
      typeResolver,
      subscribeFieldResolver,
    } = args;

    // If arguments are missing or incorrectly typed, this is an internal
    // developer mistake which should throw an error.
    this.assertValidExecutionArguments(document, rawVariableValues);

    const { operations, fragments } = this.splitDefinitions(document);
    const operation = this.selectOperation(operations, operationName);

    const rootType = this._executorSchema.getRootType(operation.operation);
    if (rootType === undefined) {
      throw new ExecutionError(
        `Schema doesn't support ${operation.operation} operation`,
        operation,
      );
    }

    const variableValues = coerceVariableValues(
      this._executorSchema,
      operation.variableDefinitions ?? [],
      rawVariableValues ?? {},
    );

    const resolveFieldFn = fieldResolver ?? defaultFieldResolver;
    const subscribeFieldFn = subscribeFieldResolver ?? defaultFieldResolver;
    const middlewares = this._middlewares;
    const runtime = this._runtime;

    return {
      fragments,
      rootValue,
      contextValue,
      operation,
      rootType,
      variableValues,
      fieldResolver: resolveFieldFn,
      typeResolver: typeResolver ?? defaultTypeResolver,
      subscribeFieldResolver: subscribeFieldFn,
      signal,
      errors: [],
      getArgumentValues: memoize2(
        (def: GraphQLField<unknown, unknown>, node: FieldNode) =>
          coerceArgumentValues(def, node, variableValues),
      ),
      getResolver: memoize1((resolver: FieldResolver) =>
        runtime.wrapFieldResolver(
          applyMiddlewares(resolver, middlewares),
          signal,
        ),
      ),
      subFieldCollector: this.buildSubFieldCollector(fragments, variableValues),
      resolveField:
        operation.operation === OperationTypeNode.SUBSCRIPTION
          ? this.buildFieldResolver('subscribe', subscribeFieldFn)
          : this.buildFieldResolver('resolve', resolveFieldFn),
    };
  }

  /**
   * Constructs the ExecutionContext of a single subscription event: the
   * event is the root value and errors are collected per event.
   */
  buildPerEventExecutionContext(
    exeContext: ExecutionContext,
    payload: unknown,
  ): ExecutionContext {
    return {
      ...exeContext,
      rootValue: payload,
      errors: [],
      resolveField: this.buildFieldResolver(
        'resolve',
        exeContext.fieldResolver,
      ),
    };
  }

  /**
   * Executes the root fields specified by the operation.
   */
  executeRootFields(
    exeContext: ExecutionContext,
    rootFieldsExecutor: FieldsExecutor,
  ): PromiseOrValue<ObjMap<unknown>> {
    const { rootType, rootValue } = exeContext;
    const fields = this.collectRootFields(exeContext);
    return rootFieldsExecutor(
      exeContext,
      rootType,
      rootValue,
      undefined,
      fields,
    );
  }

  collectRootFields(
    exeContext: ExecutionContext,
  ): Map<string, ReadonlyArray<FieldNode>> {
    const { fragments, variableValues, rootType, operation } = exeContext;
    const fields = new Map<string, Array<FieldNode>>();
    this.collectFieldsImpl(
      fragments,
      variableValues,
      rootType,
      operation.selectionSet,
      fields,
      new Set(),
    );
    return fields;
  }

  /**
   * Implements the "Executing selection sets" section of the spec
   * for fields that must be executed serially.
   *
   * Each field starts once the previous one is completed, whatever the
   * runtime.
   */
  executeFieldsSerially(
    exeContext: ExecutionContext,
    parentType: GraphQLObjectType,
    sourceValue: unknown,
    path: Path | undefined,
    fields: Map<string, ReadonlyArray<FieldNode>>,
  ): PromiseOrValue<ObjMap<unknown>> {
    const runtime = this._runtime;
    const initialResults: ObjMap<unknown> = Object.create(null);
    return Array.from(fields.entries()).reduce<
      PromiseOrValue<ObjMap<unknown>>
    >(
      (previous, [responseName, fieldNodes]) =>
        runtime.mapValue(previous, (results) => {
          const fieldPath = addPath(path, responseName, parentType.name);
          const result = this.executeField(
            exeContext,
            parentType,
            sourceValue,
            fieldNodes,
            fieldPath,
          );
          if (result === undefined) {
            return results;
          }
          return runtime.mapValue(result, (resolvedResult) => {
            results[responseName] = resolvedResult;
            return results;
          });
        }),
      initialResults,
    );
  }

  /**
   * Implements the "Executing selection sets" section of the spec
   * for fields that may be executed in parallel.
   */
  executeFields(
    exeContext: ExecutionContext,
    parentType: GraphQLObjectType,
    sourceValue: unknown,
    path: Path | undefined,
    fields: Map<string, ReadonlyArray<FieldNode>>,
  ): PromiseOrValue<ObjMap<unknown>> {
    const responseNames: Array<string> = [];
    const values: Array<PromiseOrValue<unknown>> = [];

    for (const [responseName, fieldNodes] of fields.entries()) {
      const fieldPath = addPath(path, responseName, parentType.name);
      let result: PromiseOrValue<unknown>;
      try {
        result = this.executeField(
          exeContext,
          parentType,
          sourceValue,
          fieldNodes,
          fieldPath,
        );
      } catch (error) {
        return this.settleThenThrow(values, error);
      }

      if (result !== undefined) {
        responseNames.push(responseName);
        values.push(result);
      }
    }

    return this._runtime.mapValue(
      this._runtime.gatherValues(values),
      (resolvedValues) => {
        const results: ObjMap<unknown> = Object.create(null);
        responseNames.forEach((responseName, index) => {
          results[responseName] = resolvedValues[index];
        });
        return results;
      },
    );
  }

  /**
   * Implements the "Executing field" section of the spec
   * In particular, this function figures out the value that the field returns by
   * calling its resolve function, then calls completeValue to complete promises,
   * serialize scalars, or execute the sub-selection-set for objects.
   *
   * Returns `undefined` for fields the parent type does not define.
   */
  executeField(
    exeContext: ExecutionContext,
    parentType: GraphQLObjectType,
    source: unknown,
    fieldNodes: ReadonlyArray<FieldNode>,
    path: Path,
  ): PromiseOrValue<unknown> {
    const fieldContext = this.getFieldContext(parentType, fieldNodes);
    if (!fieldContext) {
      return;
    }

    exeContext.signal.throwIfAborted();

    const { returnType } = fieldContext;
    const { contextValue } = exeContext;
    const info = this.buildResolveInfo(exeContext, fieldContext, path);
    const runtime = this._runtime;
    const instrumentation = this._instrumentation;

    let fieldEnded = false;
    const endField = (): void => {
      if (!fieldEnded) {
        fieldEnded = true;
        instrumentation.onFieldEnd?.(source, contextValue, info);
      }
    };

    instrumentation.onFieldStart?.(source, contextValue, info);

    // Get the resolved field value, regardless of if its result is normal or abrupt (error).
    // Then, complete the field
    return this.attempt(
      () =>
        runtime.mapValue(
          runtime.unwrapValue(
            exeContext.resolveField(exeContext, fieldContext, source, info),
          ),
          (resolved) => {
            endField();
            return this.getValueCompleter(returnType)(
              exeContext,
              fieldContext,
              info,
              path,
              resolved,
            );
          },
        ),
      {
        matches: isAnyError,
        recover: (rawError) => {
          endField();
          if (!isFieldError(rawError)) {
            throw rawError;
          }
          const error = locatedError(rawError, fieldNodes, pathToArray(path));
          return this.handleFieldError(error, returnType, exeContext.errors);
        },
      },
    );
  }

  /**
   * Runs `fn` through the runtime so that `recovery` applies to synchronous
   * throws as well as to deferred failures.
   */
  attempt<R, E>(
    fn: () => PromiseOrValue<R>,
    recovery: Recovery<E, R>,
  ): PromiseOrValue<R> {
    return this._runtime.mapValue(undefined, fn, recovery);
  }

  buildResolveInfo(
    exeContext: ExecutionContext,
    fieldContext: FieldContext,
    path: Path,
  ): GraphQLResolveInfo {
    const { fieldName, fieldNodes, returnType, parentType } = fieldContext;
    const { _schema: schema } = this;
    const { fragments, rootValue, operation, variableValues } = exeContext;
    // The resolve function's optional fourth argument is a collection of
    // information about the current execution state.
    return {
      fieldName,
      fieldNodes,
      returnType,
      parentType,
      path,
      schema,
      fragments,
      rootValue,
      operation,
      variableValues,
    };
  }

  handleFieldError(
    error: GraphQLError,
    returnType: GraphQLOutputType,
    errors: Array<GraphQLError>,
  ): null {
    // If the field type is non-nullable, then it is resolved without any
    // protection from errors, however it still properly locates the error.
    if (isNonNullType(returnType)) {
      throw error;
    }

    // Otherwise, error protection is applied, logging the error and resolving
    // a null value for this field if one is encountered.
    errors.push(error);
    return null;
  }

  buildNullableValueCompleter(valueCompleter: ValueCompleter): ValueCompleter {
    return (exeContext, fieldContext, info, path, result) => {
      // If result value is null or undefined then return null.
      if (result == null) {
        return null;
      }

      return valueCompleter(exeContext, fieldContext, info, path, result);
    };
  }

  /**
   * Implements the instructions for completeValue as defined in the
   * "Field entries" section of the spec.
   *
   * If the field type is Non-Null, then this recursively completes the value
   * for the inner type. It throws a field error if that completion returns null,
   * as per the "Nullability" section of the spec.
   *
   * If the field type is a List, then this recursively completes the value
   * for the inner type on each item in the list.
   *
   * If the field type is a Scalar or Enum, ensures the completed value is a legal
   * value of the type by calling the `serialize` method of GraphQL type
   * definition.
   *
   * If the field is an abstract type, determine the runtime type of the value
   * and then complete based on that type
   *
   * Otherwise, the field type expects a sub-selection set, and will complete the
   * value by executing all sub-selections.
   */
  _getValueCompleter(returnType: GraphQLOutputType): ValueCompleter {
    if (isNonNullType(returnType)) {
      const innerValueCompleter = this.getValueCompleter(returnType.ofType);
      const runtime = this._runtime;
      return (exeContext, fieldContext, info, path, result) =>
        // If field type is NonNull, complete for inner type, and throw field error
        // if result is null.
        runtime.mapValue(
          innerValueCompleter(exeContext, fieldContext, info, path, result),
          (completed) => {
            if (completed === null) {
              throw new GraphQLError(
                `Field "${printPath(path)}" is not nullable`,
                { nodes: fieldContext.fieldNodes, path: pathToArray(path) },
              );
            }
            return completed;
          },
        );
    }

    if (isListType(returnType)) {
      const listType = returnType;
      return this.buildNullableValueCompleter(
        (exeContext, fieldContext, info, path, result) =>
          // If field type is List, complete each item in the list with the inner type
          this.completeListValue(
            exeContext,
            listType,
            fieldContext,
            info,
            path,
            result,
          ),
      );
    }

    if (isLeafType(returnType)) {
      const leafType = returnType;
      return this.buildNullableValueCompleter(
        (_exeContext, _fieldContext, _info, path, result) =>
          // If field type is a leaf type, Scalar or Enum, serialize to a valid value.
          this.completeLeafValue(leafType, path, result),
      );
    }

    if (isAbstractType(returnType)) {
      const abstractType = returnType;
      return this.buildNullableValueCompleter(
        (exeContext, fieldContext, info, path, result) =>
          // If field type is an abstract type, Interface or Union, determine the
          // runtime Object type and complete for that type.
          this.completeAbstractValue(
            exeContext,
            abstractType,
            fieldContext,
            info,
            path,
            result,
          ),
      );
    }

    if (isObjectType(returnType)) {
      const objectType = returnType;
      return this.buildNullableValueCompleter(
        (exeContext, fieldContext, info, path, result) =>
          // If field type is Object, execute and complete all sub-selections.
          this.completeObjectValue(
            exeContext,
            objectType,
            fieldContext,
            info,
            path,
            result,
          ),
      );
    }

    // Not reachable. All possible output types have been considered
    throw new ContractViolationError(
      'Cannot complete value of unexpected output type: ' + inspect(returnType),
    );
  }

  /**
   * Complete a list value by completing each item in the list with the
   * inner type
   */
  completeListValue(
    exeContext: ExecutionContext,
    returnType: GraphQLList<GraphQLOutputType>,
    fieldContext: FieldContext,
    info: GraphQLResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<Array<unknown>> {
    if (!isIterableObject(result)) {
      throw new ContractViolationError(
        `Field "${printPath(path)}" is a list type and resolved value should be iterable, got ${inspect(result)}`,
      );
    }

    const itemType = returnType.ofType;
    const valueCompleter = this.getValueCompleter(itemType);

    const completedItems: Array<PromiseOrValue<unknown>> = [];
    let index = 0;
    for (const item of result) {
      try {
        completedItems.push(
          this.completeListItemValue(
            exeContext,
            itemType,
            valueCompleter,
            fieldContext,
            info,
            addPath(path, index, undefined),
            item,
          ),
        );
      } catch (error) {
        return this.settleThenThrow(completedItems, error);
      }
      index++;
    }

    return this._runtime.gatherValues(completedItems);
  }

  /**
   * Throws `error` once every value in `started` has settled, so that no
   * sibling records an error after the response is built.
   */
  settleThenThrow(
    started: ReadonlyArray<PromiseOrValue<unknown>>,
    error: unknown,
  ): PromiseOrValue<never> {
    const rethrow = (): never => {
      throw error;
    };
    if (!started.some((value) => isPromise(value))) {
      return rethrow();
    }
    return this._runtime.mapValue(
      this._runtime.gatherValues(started),
      rethrow,
      { matches: isAnyError, recover: rethrow },
    );
  }

  completeListItemValue(
    exeContext: ExecutionContext,
    itemType: GraphQLOutputType,
    valueCompleter: ValueCompleter,
    fieldContext: FieldContext,
    info: GraphQLResolveInfo,
    itemPath: Path,
    item: unknown,
  ): PromiseOrValue<unknown> {
    const runtime = this._runtime;
    return this.attempt(
      () =>
        runtime.mapValue(runtime.unwrapValue(item), (resolved) =>
          valueCompleter(exeContext, fieldContext, info, itemPath, resolved),
        ),
      {
        matches: isFieldError,
        recover: (rawError) => {
          const error = locatedError(
            rawError,
            fieldContext.fieldNodes,
            pathToArray(itemPath),
          );
          return this.handleFieldError(error, itemType, exeContext.errors);
        },
      },
    );
  }

  /**
   * Complete a Scalar or Enum by serializing to a valid value. A value the
   * type cannot serialize breaks the schema's contract.
   */
  completeLeafValue(
    returnType: GraphQLLeafType,
    path: Path,
    result: unknown,
  ): unknown {
    let serializedResult: unknown;
    try {
      serializedResult = returnType.serialize(result);
    } catch (error) {
      const reason = error instanceof Error ? error.message : inspect(error);
      throw new ContractViolationError(
        `Field "${printPath(path)}" cannot be serialized as "${returnType.name}": ${reason}`,
        { cause: error },
      );
    }

    if (serializedResult == null) {
      throw new ContractViolationError(
        `Field "${printPath(path)}" cannot be serialized as "${returnType.name}": ` +
          `serialize(${inspect(result)}) returned ${inspect(serializedResult)}`,
      );
    }
    return serializedResult;
  }

  /**
   * Complete a value of an abstract type by determining the runtime object type
   * of that value, then complete the value for that type.
   */
  completeAbstractValue(
    exeContext: ExecutionContext,
    returnType: GraphQLAbstractType,
    fieldContext: FieldContext,
    info: GraphQLResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    const resolveTypeFn = returnType.resolveType ?? exeContext.typeResolver;
    const contextValue = exeContext.contextValue;
    const runtimeType = resolveTypeFn(result, contextValue, info, returnType);

    return this._runtime.mapValue(
      this._runtime.unwrapValue(runtimeType),
      (resolvedRuntimeType) =>
        this.completeObjectValue(
          exeContext,
          this.ensureValidRuntimeType(
            resolvedRuntimeType,
            returnType,
            path,
            result,
          ),
          fieldContext,
          info,
          path,
          result,
        ),
    );
  }

  ensureValidRuntimeType(
    runtimeTypeName: unknown,
    returnType: GraphQLAbstractType,
    path: Path,
    result: unknown,
  ): GraphQLObjectType {
    if (typeof runtimeTypeName !== 'string') {
      throw new ContractViolationError(
        `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${printPath(path)}" with value ${inspect(result)}, received ${inspect(runtimeTypeName)}`,
      );
    }

    const runtimeType = this._executorSchema.getNamedType(runtimeTypeName);
    if (runtimeType === undefined || !isObjectType(runtimeType)) {
      throw new ContractViolationError(
        `Abstract type "${returnType.name}" must resolve to an Object type at runtime for field "${printPath(path)}", received "${runtimeTypeName}"`,
      );
    }

    if (!this._executorSchema.isSubType(returnType, runtimeType)) {
      throw new ContractViolationError(
        `Runtime Object type "${runtimeType.name}" is not a possible type for field "${printPath(path)}" of type "${returnType.name}"`,
      );
    }

    return runtimeType;
  }

  /**
   * Complete an Object value by executing all sub-selections.
   */
  completeObjectValue(
    exeContext: ExecutionContext,
    returnType: GraphQLObjectType,
    fieldContext: FieldContext,
    info: GraphQLResolveInfo,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    // If there is an isTypeOf predicate function, call it with the
    // current result. If isTypeOf returns false, then raise an error rather
    // than continuing execution.
    if (returnType.isTypeOf) {
      const isTypeOf = returnType.isTypeOf(
        result,
        exeContext.contextValue,
        info,
      );

      return this._runtime.mapValue(
        this._runtime.unwrapValue(isTypeOf),
        (resolvedIsTypeOf) => {
          if (!resolvedIsTypeOf) {
            throw this.invalidReturnTypeError(
              returnType,
              result,
              fieldContext.fieldNodes,
            );
          }
          return this.collectAndExecuteSubfields(
            exeContext,
            returnType,
            fieldContext,
            path,
            result,
          );
        },
      );
    }

    return this.collectAndExecuteSubfields(
      exeContext,
      returnType,
      fieldContext,
      path,
      result,
    );
  }

  invalidReturnTypeError(
    returnType: GraphQLObjectType,
    result: unknown,
    fieldNodes: ReadonlyArray<FieldNode>,
  ): GraphQLError {
    return new GraphQLError(
      `Expected value of type "${returnType.name}" but got: ${inspect(
        result,
      )}.`,
      { nodes: fieldNodes },
    );
  }

  collectAndExecuteSubfields(
    exeContext: ExecutionContext,
    returnType: GraphQLObjectType,
    fieldContext: FieldContext,
    path: Path,
    result: unknown,
  ): PromiseOrValue<ObjMap<unknown>> {
    // Collect sub-fields to execute to complete this value.
    const subFieldNodes = exeContext.subFieldCollector(
      returnType,
      fieldContext.fieldNodes,
    );

    return this.executeFields(
      exeContext,
      returnType,
      result,
      path,
      subFieldNodes,
    );
  }

  /**
   * Looks up the field on the given type definition, including the
   * introspection meta fields. Fields the type does not define yield no
   * context and are skipped.
   */
  _getFieldContext(
    parentType: GraphQLObjectType,
    fieldNodes: ReadonlyArray<FieldNode>,
  ): Maybe<FieldContext> {
    const initialFieldNode = fieldNodes[0];
    const fieldName = initialFieldNode.name.value;

    const fieldDef = this._executorSchema.getFieldDef(parentType, fieldName);
    if (!fieldDef) {
      return;
    }

    return {
      fieldDef,
      initialFieldNode,
      fieldName: fieldDef.name,
      fieldNodes,
      returnType: fieldDef.type,
      parentType,
    };
  }

  async createSourceEventStreamImpl(
    exeContext: ExecutionContext,
  ): Promise<AsyncIterable<unknown> | ExecutionResult> {
    try {
      const eventStream = await this.executeSubscriptionRootField(exeContext);

      // Assert field returned an event stream, otherwise yield an error.
      if (!isAsyncIterable(eventStream)) {
        throw new ContractViolationError(
          'Subscription field must return Async Iterable. ' +
            `Received: ${inspect(eventStream)}.`,
        );
      }

      return eventStream;
    } catch (error) {
      // If it GraphQLError, report it as an ExecutionResult, containing only errors and no data.
      // Otherwise treat the error as a system-class error and re-throw it.
      if (isGraphQLError(error)) {
        return { data: null, errors: [error] };
      }
      throw error;
    }
  }

  async executeSubscriptionRootField(
    exeContext: ExecutionContext,
  ): Promise<unknown> {
    const { rootType, rootValue } = exeContext;

    const fields = this.collectRootFields(exeContext);
    if (fields.size !== 1) {
      throw new ExecutionError(
        'Subscription operations must select exactly one root field',
        exeContext.operation,
      );
    }

    const [responseName, fieldNodes] = Array.from(fields.entries())[0];
    const fieldContext = this.getFieldContext(rootType, fieldNodes);

    if (!fieldContext) {
      const fieldName = fieldNodes[0].name.value;
      throw new ExecutionError(
        `The subscription field "${fieldName}" is not defined.`,
        fieldNodes,
      );
    }

    const path = addPath(undefined, responseName, rootType.name);
    const info = this.buildResolveInfo(exeContext, fieldContext, path);

    try {
      return await exeContext.resolveField(
        exeContext,
        fieldContext,
        rootValue,
        info,
      );
    } catch (error) {
      if (isGraphQLError(error)) {
        throw locatedError(error, fieldNodes, pathToArray(path));
      }
      throw error;
    }
  }

  executeSubscriptionEvent(
    exeContext: ExecutionContext,
  ): PromiseOrValue<ExecutionResult> {
    return this.executeQueryImpl(exeContext);
  }

  /**
   * Given a selectionSet, collects all of the fields of the sub-selections and
   * returns them as a map of response name to field nodes.
   *
   * When a field returns an Interface or Union type, the "return type" is the
   * actual object type returned by that field.
   *
   * Memoizing ensures the subfields are not repeatedly calculated, which
   * saves overhead when resolving lists of values.
   */
  buildSubFieldCollector = (
    fragments: ObjMap<FragmentDefinitionNode>,
    variableValues: { [variable: string]: unknown },
  ): SubFieldCollector =>
    memoize2(
      (
        returnType: GraphQLObjectType,
        fieldNodes: ReadonlyArray<FieldNode>,
      ): Map<string, ReadonlyArray<FieldNode>> => {
        const subFieldNodes = new Map<string, Array<FieldNode>>();
        const visitedFragmentNames = new Set<string>();

        for (const node of fieldNodes) {
          if (node.selectionSet) {
            this.collectFieldsImpl(
              fragments,
              variableValues,
              returnType,
              node.selectionSet,
              subFieldNodes,
              visitedFragmentNames,
            );
          }
        }
        return subFieldNodes;
      },
    );

  collectFieldsImpl(
    fragments: ObjMap<FragmentDefinitionNode>,
    variableValues: { [variable: string]: unknown },
    runtimeType: GraphQLObjectType,
    selectionSet: SelectionSetNode,
    fields: Map<string, Array<FieldNode>>,
    visitedFragmentNames: Set<string>,
  ): void {
    for (const selection of selectionSet.selections) {
      switch (selection.kind) {
        case Kind.FIELD: {
          if (!this.shouldIncludeNode(variableValues, selection)) {
            continue;
          }
          const name = this.getFieldEntryKey(selection);
          const fieldList = fields.get(name);
          if (fieldList !== undefined) {
            fields.set(name, this.updateFieldList(fieldList, selection));
          } else {
            fields.set(name, this.createFieldList(selection));
          }
          break;
        }
        case Kind.INLINE_FRAGMENT: {
          if (
            !this.shouldIncludeNode(variableValues, selection) ||
            !this.doesFragmentConditionMatch(selection, runtimeType)
          ) {
            continue;
          }

          this.collectFieldsImpl(
            fragments,
            variableValues,
            runtimeType,
            selection.selectionSet,
            fields,
            visitedFragmentNames,
          );
          break;
        }
        case Kind.FRAGMENT_SPREAD: {
          const fragName = selection.name.value;

          if (
            visitedFragmentNames.has(fragName) ||
            !this.shouldIncludeNode(variableValues, selection)
          ) {
            continue;
          }

          const fragment = fragments[fragName];
          if (
            !fragment ||
            !this.doesFragmentConditionMatch(fragment, runtimeType)
          ) {
            continue;
          }
          visitedFragmentNames.add(fragName);

          this.collectFieldsImpl(
            fragments,
            variableValues,
            runtimeType,
            fragment.selectionSet,
            fields,
            visitedFragmentNames,
          );
          break;
        }
      }
    }
  }

  /**
   * Determines if a field should be included based on the `@include` and `@skip`
   * directives, where `@skip` has higher precedence than `@include`.
   */
  shouldIncludeNode(
    variableValues: { [variable: string]: unknown },
    node: FragmentSpreadNode | FieldNode | InlineFragmentNode,
  ): boolean {
    const skip = getDirectiveValues(GraphQLSkipDirective, node, variableValues);
    if (skip?.if === true) {
      return false;
    }

    const include = getDirectiveValues(
      GraphQLIncludeDirective,
      node,
      variableValues,
    );
    if (include?.if === false) {
      return false;
    }
    return true;
  }

  /**
   * Determines if a fragment is applicable to the given type.
   */
  doesFragmentConditionMatch(
    fragment: FragmentDefinitionNode | InlineFragmentNode,
    type: GraphQLObjectType,
  ): boolean {
    const typeConditionNode = fragment.typeCondition;
    if (!typeConditionNode) {
      return true;
    }
    const conditionalType = this._executorSchema.getType(typeConditionNode);
    if (conditionalType === type) {
      return true;
    }
    if (conditionalType && isAbstractType(conditionalType)) {
      return this._executorSchema.isSubType(conditionalType, type);
    }
    return false;
  }

  /**
   * Implements the logic to compute the key of a given field's entry
   */
  getFieldEntryKey(node: FieldNode): string {
    return node.alias ? node.alias.value : node.name.value;
  }
}
