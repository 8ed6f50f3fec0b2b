import type {
  GraphQLAbstractType,
  GraphQLField,
  GraphQLInterfaceType,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLType,
  OperationTypeNode,
  TypeNode,
} from 'graphql';
import {
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
  print,
  typeFromAST,
} from 'graphql';

import { memoize1 } from '../jsutils/memoize1';

import type { ExecutorSchema } from './executorSchema';

function _toExecutorSchema(schema: GraphQLSchema): ExecutorSchema {
  const typesByTypeNode = new Map<string, GraphQLType | undefined>();

  function getRootType(
    operation: OperationTypeNode,
  ): GraphQLObjectType | undefined {
    return schema.getRootType(operation) ?? undefined;
  }

  function getType(typeNode: TypeNode): GraphQLType | undefined {
    const key = print(typeNode);
    if (typesByTypeNode.has(key)) {
      return typesByTypeNode.get(key);
    }
    const type = typeFromAST(schema, typeNode);
    typesByTypeNode.set(key, type);
    return type;
  }

  function getFieldDef(
    parentType: GraphQLObjectType,
    fieldName: string,
  ): GraphQLField<unknown, unknown> | undefined {
    if (
      fieldName === SchemaMetaFieldDef.name &&
      schema.getQueryType() === parentType
    ) {
      return SchemaMetaFieldDef;
    } else if (
      fieldName === TypeMetaFieldDef.name &&
      schema.getQueryType() === parentType
    ) {
      return TypeMetaFieldDef;
    } else if (fieldName === TypeNameMetaFieldDef.name) {
      return TypeNameMetaFieldDef;
    }
    return parentType.getFields()[fieldName];
  }

  return {
    schema,
    getRootType,
    getNamedType: (typeName) => schema.getType(typeName) ?? undefined,
    getType,
    getFieldDef,
    isSubType: (
      abstractType: GraphQLAbstractType,
      maybeSubType: GraphQLObjectType | GraphQLInterfaceType,
    ) => schema.isSubType(abstractType, maybeSubType),
  };
}

/**
 * Returns the executor view of `schema`, built once per schema instance.
 */
export const toExecutorSchema = memoize1(_toExecutorSchema);
