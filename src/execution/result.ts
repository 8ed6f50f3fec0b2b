import type {
  ExecutionResult,
  FormattedExecutionResult,
  GraphQLFormattedError,
} from 'graphql';

import type { ObjMap } from '../jsutils/ObjMap';

/**
 * Serializes a result to its response shape: `errors` first when there are
 * any, then `data`, then `extensions` when present. Each error is written
 * through its `toJSON`, so `extensions` of an error appear only when it has
 * any.
 */
export function formatResult(
  result: ExecutionResult,
): FormattedExecutionResult {
  const formatted: {
    errors?: ReadonlyArray<GraphQLFormattedError>;
    data?: ObjMap<unknown> | null;
    extensions?: ObjMap<unknown>;
  } = {};

  if (result.errors !== undefined && result.errors.length > 0) {
    formatted.errors = result.errors.map((error) => error.toJSON());
  }
  if ('data' in result) {
    formatted.data = result.data;
  }
  if (result.extensions !== undefined) {
    formatted.extensions = result.extensions;
  }
  return formatted;
}

/**
 * Returns a copy of `result` with `payload` stored under `extensions[name]`.
 */
export function addExtension(
  result: ExecutionResult,
  name: string,
  payload: unknown,
): ExecutionResult {
  const extensions: ObjMap<unknown> = { ...result.extensions };
  if (Object.prototype.hasOwnProperty.call(extensions, name)) {
    throw new Error(`Duplicate extension "${name}".`);
  }
  extensions[name] = payload;
  return { ...result, extensions };
}
