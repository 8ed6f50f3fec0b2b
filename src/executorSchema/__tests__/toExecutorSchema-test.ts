import { expect } from 'chai';
import { describe, it } from 'mocha';

import {
  GraphQLInputObjectType,
  GraphQLInterfaceType,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLString,
  GraphQLUnionType,
  OperationTypeNode,
  SchemaMetaFieldDef,
  TypeMetaFieldDef,
  TypeNameMetaFieldDef,
} from 'graphql';

import { parseType } from '../../language/parser';

import { toExecutorSchema } from '../toExecutorSchema';

describe('ExecutorSchema:', () => {
  const input = new GraphQLInputObjectType({
    name: 'Input',
    fields: { inputField: { type: GraphQLString } },
  });
  const node = new GraphQLInterfaceType({
    name: 'Node',
    fields: { id: { type: GraphQLString } },
  });
  const user = new GraphQLObjectType({
    name: 'User',
    interfaces: [node],
    fields: { id: { type: GraphQLString } },
  });
  const post = new GraphQLObjectType({
    name: 'Post',
    fields: { title: { type: GraphQLString } },
  });
  const searchResult = new GraphQLUnionType({
    name: 'SearchResult',
    types: [user, post],
  });
  const query = new GraphQLObjectType({
    name: 'Query',
    fields: {
      node: { type: node },
      search: {
        type: new GraphQLList(searchResult),
        args: { filter: { type: input } },
      },
    },
  });
  const schema = new GraphQLSchema({ query, types: [user, post] });

  it('is built once per schema', () => {
    expect(toExecutorSchema(schema)).to.equal(toExecutorSchema(schema));
    expect(toExecutorSchema(schema).schema).to.equal(schema);
  });

  it('looks up root types', () => {
    const executorSchema = toExecutorSchema(schema);
    expect(executorSchema.getRootType(OperationTypeNode.QUERY)).to.equal(query);
    expect(executorSchema.getRootType(OperationTypeNode.MUTATION)).to.equal(
      undefined,
    );
  });

  it('looks up named types', () => {
    const executorSchema = toExecutorSchema(schema);
    expect(executorSchema.getNamedType('Input')).to.equal(input);
    expect(executorSchema.getNamedType('Unknown')).to.equal(undefined);
  });

  it('resolves type references', () => {
    const executorSchema = toExecutorSchema(schema);

    const nonNullList = executorSchema.getType(parseType('[Input!]!'));
    expect(String(nonNullList)).to.equal('[Input!]!');
    expect(nonNullList).to.be.an.instanceOf(GraphQLNonNull);

    expect(executorSchema.getType(parseType('Input'))).to.equal(input);
    expect(executorSchema.getType(parseType('[Unknown]'))).to.equal(undefined);
  });

  it('caches type references by their printed form', () => {
    const executorSchema = toExecutorSchema(schema);
    expect(executorSchema.getType(parseType('[Input]'))).to.equal(
      executorSchema.getType(parseType('[ Input ]')),
    );
  });

  it('includes meta fields', () => {
    const executorSchema = toExecutorSchema(schema);
    expect(executorSchema.getFieldDef(query, '__schema')).to.equal(
      SchemaMetaFieldDef,
    );
    expect(executorSchema.getFieldDef(query, '__type')).to.equal(
      TypeMetaFieldDef,
    );
    expect(executorSchema.getFieldDef(user, '__typename')).to.equal(
      TypeNameMetaFieldDef,
    );
    expect(executorSchema.getFieldDef(user, '__schema')).to.equal(undefined);
    expect(executorSchema.getFieldDef(user, 'id')?.name).to.equal('id');
    expect(executorSchema.getFieldDef(user, 'unknown')).to.equal(undefined);
  });

  it('answers subtype questions', () => {
    const executorSchema = toExecutorSchema(schema);
    expect(executorSchema.isSubType(node, user)).to.equal(true);
    expect(executorSchema.isSubType(node, post)).to.equal(false);
    expect(executorSchema.isSubType(searchResult, post)).to.equal(true);
  });
});
