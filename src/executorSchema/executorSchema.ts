import type {
  GraphQLAbstractType,
  GraphQLField,
  GraphQLInterfaceType,
  GraphQLNamedType,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLType,
  OperationTypeNode,
  TypeNode,
} from 'graphql';

/**
 * The read-only view of a schema the executor works against. Lookups that
 * the executor repeats for every request, such as resolving the types named
 * in variable definitions, are cached per schema.
 */
export interface ExecutorSchema {
  readonly schema: GraphQLSchema;
  getRootType: (operation: OperationTypeNode) => GraphQLObjectType | undefined;
  getNamedType: (typeName: string) => GraphQLNamedType | undefined;
  getType: (typeNode: TypeNode) => GraphQLType | undefined;
  /**
   * Includes the introspection meta fields: `__typename` on every object
   * type, `__schema` and `__type` on the query root.
   */
  getFieldDef: (
    parentType: GraphQLObjectType,
    fieldName: string,
  ) => GraphQLField<unknown, unknown> | undefined;
  isSubType: (
    abstractType: GraphQLAbstractType,
    maybeSubType: GraphQLObjectType | GraphQLInterfaceType,
  ) => boolean;
}
