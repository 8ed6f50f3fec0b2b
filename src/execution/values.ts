import type {
  DirectiveNode,
  FieldNode,
  GraphQLArgument,
  GraphQLDirective,
  VariableDefinitionNode,
} from 'graphql';
import {
  GraphQLError,
  Kind,
  coerceInputValue,
  isInputType,
  isNonNullType,
  print,
  valueFromAST,
} from 'graphql';

import { CoercionError, VariablesCoercionError } from '../error/CoercionError';
import { inspect } from '../jsutils/inspect';
import { keyMap } from '../jsutils/keyMap';
import type { Maybe } from '../jsutils/Maybe';
import type { ObjMap } from '../jsutils/ObjMap';
import { printPathArray } from '../jsutils/printPathArray';

import type { ExecutorSchema } from '../executorSchema/executorSchema';

export interface CoerceVariableValuesOptions {
  /**
   * Coercion stops once this many errors have been collected. Defaults to 50.
   */
  maxErrors?: number;
}

const DEFAULT_MAX_ERRORS = 50;

class ErrorLimitReached extends Error {}

/**
 * Prepares an object map of variable values of the correct type based on the
 * provided variable definitions and arbitrary input. Every variable that
 * cannot be coerced is reported, up to `maxErrors`, through a single
 * `VariablesCoercionError`.
 *
 * Note: The returned value is a plain Object with a prototype, since it is
 * exposed to user code. Care should be taken to not pull values from the
 * Object prototype.
 */
export function coerceVariableValues(
  executorSchema: ExecutorSchema,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: { readonly [variable: string]: unknown },
  options: CoerceVariableValuesOptions = {},
): { [variable: string]: unknown } {
  const maxErrors = options.maxErrors ?? DEFAULT_MAX_ERRORS;
  const errors: Array<GraphQLError> = [];

  const onError = (error: GraphQLError) => {
    if (errors.length >= maxErrors) {
      errors.push(
        new GraphQLError(
          'Too many errors processing variables, error limit reached. Execution aborted.',
        ),
      );
      throw new ErrorLimitReached();
    }
    errors.push(error);
  };

  let coerced: { [variable: string]: unknown } = {};
  try {
    coerced = coerceVariableValuesImpl(
      executorSchema,
      varDefNodes,
      inputs,
      onError,
    );
  } catch (error) {
    if (!(error instanceof ErrorLimitReached)) {
      throw error;
    }
  }

  if (errors.length > 0) {
    throw new VariablesCoercionError(errors);
  }
  return coerced;
}

function coerceVariableValuesImpl(
  executorSchema: ExecutorSchema,
  varDefNodes: ReadonlyArray<VariableDefinitionNode>,
  inputs: { readonly [variable: string]: unknown },
  onError: (error: GraphQLError) => void,
): { [variable: string]: unknown } {
  const coercedValues: { [variable: string]: unknown } = {};
  for (const varDefNode of varDefNodes) {
    const varName = varDefNode.variable.name.value;
    const varType = executorSchema.getType(varDefNode.type);
    if (varType === undefined || !isInputType(varType)) {
      // Validation catches this too; documents executed without validation
      // still get here.
      const varTypeStr = print(varDefNode.type);
      onError(
        new CoercionError(
          `Variable "$${varName}" expected value of type "${varTypeStr}" which cannot be used as an input type.`,
          varDefNode.type,
        ),
      );
      continue;
    }

    if (!hasOwnProperty(inputs, varName)) {
      if (varDefNode.defaultValue) {
        coercedValues[varName] = valueFromAST(varDefNode.defaultValue, varType);
      } else if (isNonNullType(varType)) {
        onError(
          new CoercionError(
            `Variable "$${varName}" of required type "${String(varType)}" was not provided.`,
            varDefNode,
          ),
        );
      }
      continue;
    }

    const value = inputs[varName];
    if (value === null && isNonNullType(varType)) {
      onError(
        new CoercionError(
          `Variable "$${varName}" of non-null type "${String(varType)}" must not be null.`,
          varDefNode,
        ),
      );
      continue;
    }

    coercedValues[varName] = coerceInputValue(
      value,
      varType,
      (path, invalidValue, error) => {
        let prefix =
          `Variable "$${varName}" got invalid value ` + inspect(invalidValue);
        if (path.length > 0) {
          prefix += ` at "${varName}${printPathArray(path)}"`;
        }
        onError(
          new CoercionError(
            prefix + '; ' + error.message,
            varDefNode,
            error.originalError,
          ),
        );
      },
    );
  }

  return coercedValues;
}

/**
 * Prepares an object map of argument values given a list of argument
 * definitions and list of argument AST nodes.
 *
 * Throws a `CoercionError` for the first argument that cannot be coerced.
 */
export function coerceArgumentValues(
  def: { readonly args: ReadonlyArray<GraphQLArgument> },
  node: FieldNode | DirectiveNode,
  variableValues?: Maybe<ObjMap<unknown>>,
): { [argument: string]: unknown } {
  const coercedValues: { [argument: string]: unknown } = {};

  const argumentNodes = node.arguments ?? [];
  const argNodeMap = keyMap(argumentNodes, (arg) => arg.name.value);

  for (const argDef of def.args) {
    const name = argDef.name;
    const argType = argDef.type;
    const argumentNode = argNodeMap[name];

    if (argumentNode === undefined) {
      if (argDef.defaultValue !== undefined) {
        coercedValues[name] = argDef.defaultValue;
      } else if (isNonNullType(argType)) {
        throw new CoercionError(
          `Argument "${name}" of required type "${String(argType)}" was not provided`,
          node,
        );
      }
      continue;
    }

    const valueNode = argumentNode.value;
    let isNull = valueNode.kind === Kind.NULL;

    if (valueNode.kind === Kind.VARIABLE) {
      const variableName = valueNode.name.value;
      if (
        variableValues == null ||
        !hasOwnProperty(variableValues, variableName)
      ) {
        if (argDef.defaultValue !== undefined) {
          coercedValues[name] = argDef.defaultValue;
        } else if (isNonNullType(argType)) {
          throw new CoercionError(
            `Argument "${name}" of required type "${String(argType)}" was provided the missing variable "$${variableName}"`,
            valueNode,
          );
        }
        continue;
      }
      isNull = variableValues[variableName] == null;
    }

    if (isNull && isNonNullType(argType)) {
      throw new CoercionError(
        `Argument "${name}" of non-null type "${String(argType)}" must not be null`,
        valueNode,
      );
    }

    const coercedValue = valueFromAST(valueNode, argType, variableValues);
    if (coercedValue === undefined) {
      throw new CoercionError(
        `Argument "${name}" of type "${String(argType)}" was provided invalid value ${print(valueNode)}`,
        valueNode,
      );
    }
    coercedValues[name] = coercedValue;
  }
  return coercedValues;
}

/**
 * Prepares an object map of argument values given a directive definition
 * and a AST node which may contain directives. Optionally also accepts a map
 * of variable values.
 *
 * If the directive does not exist on the node, returns undefined.
 */
export function getDirectiveValues(
  directiveDef: GraphQLDirective,
  node: { readonly directives?: ReadonlyArray<DirectiveNode> },
  variableValues?: Maybe<ObjMap<unknown>>,
): undefined | { [argument: string]: unknown } {
  const directiveNode = node.directives?.find(
    (directive) => directive.name.value === directiveDef.name,
  );

  if (directiveNode) {
    return coerceArgumentValues(directiveDef, directiveNode, variableValues);
  }
}

function hasOwnProperty(obj: unknown, prop: string): boolean {
  return Object.prototype.hasOwnProperty.call(obj, prop);
}
