/** Parse GraphQL documents. */
export type { ParseOptions } from './language/index';
export {
  toSource,
  Lexer,
  lex,
  dedentBlockString,
  Parser,
  parse,
  parseValue,
  parseConstValue,
  parseType,
  getTokenText,
  getTokenKindDesc,
} from './language/index';

/** Schema view used by the executor. */
export type { ExecutorSchema } from './executorSchema/index';
export { toExecutorSchema } from './executorSchema/index';

/** Execute GraphQL operations. */
export type {
  ExecutionArgs,
  ExecutionContext,
  ExecutorArgs,
  ExecutorExecutionArgs,
  FieldContext,
  CoerceVariableValuesOptions,
  Instrumentation,
  FieldMiddleware,
  Logger,
  FieldResolver,
  Recovery,
  Runtime,
  SubscriptionRuntime,
  PooledRuntimeOptions,
  AsyncRuntimeOptions,
} from './execution/index';
export {
  responsePathAsArray,
  Executor,
  defaultFieldResolver,
  defaultTypeResolver,
  execute,
  executeSync,
  subscribe,
  createSourceEventStream,
  coerceVariableValues,
  coerceArgumentValues,
  getDirectiveValues,
  formatResult,
  addExtension,
  MultiInstrumentation,
  applyMiddlewares,
  noopLogger,
  isSubscriptionRuntime,
  PromiseRuntime,
  BlockingRuntime,
  PooledRuntime,
  AsyncRuntime,
  defaultMaxWorkers,
  mapAsyncIterable,
} from './execution/index';

/** Parse, validate and execute in one call. */
export type { GraphQLArgs } from './graphql';
export { graphql, graphqlSync } from './graphql';

/** Errors. */
export type { ResolverErrorOptions } from './error/index';
export {
  GraphQLSyntaxError,
  InvalidCharacter,
  UnexpectedCharacter,
  UnexpectedEOF,
  NonTerminatedString,
  InvalidEscapeSequence,
  UnexpectedToken,
  ResolverError,
  CoercionError,
  VariablesCoercionError,
  ExecutionError,
  ContractViolationError,
  ConfigurationError,
  ExecutionAbortedError,
  ExecutionTimeoutError,
  isGraphQLError,
  isFieldError,
} from './error/index';
