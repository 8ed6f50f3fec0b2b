import type { GraphQLFieldResolver, GraphQLTypeResolver } from 'graphql';

import { isObjectLike } from '../jsutils/isObjectLike';
import { isPromise } from '../jsutils/isPromise';

/**
 * If a resolve function is not given, then a default resolve behavior is used
 * which looks the field name up on the source: a `Map` entry first, then a
 * property. A function found that way is called with the field arguments,
 * the context and the resolve info; a property is called as a method.
 */
export const defaultFieldResolver: GraphQLFieldResolver<unknown, unknown> =
  function (source, args, contextValue, info) {
    if (source instanceof Map) {
      const entry: unknown = source.get(info.fieldName);
      if (typeof entry === 'function') {
        return entry(args, contextValue, info);
      }
      return entry;
    }

    // ensure source is a value for which property access is acceptable.
    if (isObjectLike(source)) {
      const property = source[info.fieldName];
      if (typeof property === 'function') {
        const result: unknown = property.call(source, args, contextValue, info);
        return result;
      }
      return property;
    }
  };

/**
 * If a resolveType function is not given, then a default resolve behavior is
 * used which attempts two strategies:
 *
 * First, See if the provided value has a `__typename` field defined, if so, use
 * that value as name of the resolved type.
 *
 * Otherwise, test each possible type for the abstract type by calling
 * isTypeOf for the object being coerced, returning the first type that matches.
 */
export const defaultTypeResolver: GraphQLTypeResolver<unknown, unknown> =
  function (value, contextValue, info, abstractType) {
    // First, look for `__typename`.
    if (isObjectLike(value) && typeof value.__typename === 'string') {
      return value.__typename;
    }

    // Otherwise, test each possible type.
    const possibleTypes = info.schema.getPossibleTypes(abstractType);

    const promisedIsTypeOfResults: Array<Promise<boolean>> = [];

    for (let i = 0; i < possibleTypes.length; i++) {
      const type = possibleTypes[i];

      if (type.isTypeOf) {
        const isTypeOfResult = type.isTypeOf(value, contextValue, info);

        if (isPromise(isTypeOfResult)) {
          promisedIsTypeOfResults[i] = isTypeOfResult;
        } else if (isTypeOfResult) {
          return type.name;
        }
      }
    }

    if (promisedIsTypeOfResults.length) {
      return Promise.all(promisedIsTypeOfResults).then((isTypeOfResults) => {
        for (let i = 0; i < isTypeOfResults.length; i++) {
          if (isTypeOfResults[i]) {
            return possibleTypes[i].name;
          }
        }
        return undefined;
      });
    }
  };
