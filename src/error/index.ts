export {
  GraphQLSyntaxError,
  InvalidCharacter,
  UnexpectedCharacter,
  UnexpectedEOF,
  NonTerminatedString,
  InvalidEscapeSequence,
  UnexpectedToken,
} from './syntaxError';

export type { ResolverErrorOptions } from './ResolverError';
export { ResolverError } from './ResolverError';
export { CoercionError, VariablesCoercionError } from './CoercionError';
export { ExecutionError } from './ExecutionError';
export {
  ContractViolationError,
  ConfigurationError,
  ExecutionAbortedError,
  ExecutionTimeoutError,
} from './faults';
export { isGraphQLError, isFieldError } from './isGraphQLError';
