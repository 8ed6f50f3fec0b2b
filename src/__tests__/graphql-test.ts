import { expect } from 'chai';
import { describe, it } from 'mocha';

import { buildSchema, GraphQLSchema } from 'graphql';

import { expectJSON } from '../__testUtils__/expectJSON';

import { ContractViolationError } from '../error/faults';

import { addExtension } from '../execution/result';
import type { Instrumentation } from '../execution/instrumentation';
import { AsyncRuntime } from '../execution/runtime/AsyncRuntime';

import { graphql, graphqlSync } from '../graphql';

const schema = buildSchema(`
  type Query {
    hello: String
    greet(name: String!): String
  }
`);

const rootValue = {
  hello: 'world',
  greet: ({ name }: { name: string }) => `hi ${name}`,
};

describe('graphql', () => {
  it('parses, validates and executes a request', async () => {
    const result = await graphql({
      schema,
      source: 'query ($name: String!) { hello greet(name: $name) }',
      rootValue,
      variableValues: { name: 'there' },
    });

    expect(result).to.deep.equal({
      data: { hello: 'world', greet: 'hi there' },
    });
  });

  it('reports syntax errors without data', async () => {
    const result = await graphql({ schema, source: '{' });

    expectJSON(result).toDeepEqual({
      errors: [
        {
          message: 'Expected Name but found <EOF>',
          locations: [{ line: 1, column: 2 }],
        },
      ],
    });
  });

  it('rejects type system definitions', async () => {
    const result = await graphql({ schema, source: 'type Foo { a: Int }' });

    expectJSON(result).toDeepEqual({
      errors: [
        {
          message: 'Unexpected type',
          locations: [{ line: 1, column: 1 }],
        },
      ],
    });
  });

  it('reports validation errors without data', async () => {
    const result = await graphql({ schema, source: '{ unknown }', rootValue });

    expectJSON(result).toDeepEqual({
      errors: [
        {
          message: 'Cannot query field "unknown" on type "Query".',
          locations: [{ line: 1, column: 3 }],
        },
      ],
    });
  });

  it('skips validation on request', async () => {
    const result = await graphql({
      schema,
      source: '{ unknown }',
      rootValue,
      validate: false,
    });

    expect(result).to.deep.equal({ data: {} });
  });

  it('reports an invalid schema', async () => {
    const result = await graphql({
      schema: new GraphQLSchema({}),
      source: '{ hello }',
    });

    expectJSON(result).toDeepEqual({
      errors: [{ message: 'Query root type must be provided.' }],
    });
  });

  it('runs every lifecycle hook in order', async () => {
    const log: Array<string> = [];
    const instrumentation: Instrumentation = {
      onQueryStart: () => log.push('queryStart'),
      onQueryEnd: () => log.push('queryEnd'),
      onParsingStart: () => log.push('parsingStart'),
      onParsingEnd: () => log.push('parsingEnd'),
      onValidationStart: () => log.push('validationStart'),
      onValidationEnd: () => log.push('validationEnd'),
      onExecutionStart: () => log.push('executionStart'),
      onExecutionEnd: () => log.push('executionEnd'),
      onFieldStart: (_source, _context, info) =>
        log.push(`fieldStart ${info.fieldName}`),
      onFieldEnd: (_source, _context, info) =>
        log.push(`fieldEnd ${info.fieldName}`),
      transformResult: (result) => {
        log.push('transformResult');
        return addExtension(result, 'hooks', log.length);
      },
    };

    const result = await graphql({
      schema,
      source: '{ hello }',
      rootValue,
      instrumentation,
    });

    expect(log).to.deep.equal([
      'queryStart',
      'parsingStart',
      'parsingEnd',
      'validationStart',
      'validationEnd',
      'executionStart',
      'fieldStart hello',
      'fieldEnd hello',
      'executionEnd',
      'transformResult',
      'queryEnd',
    ]);
    expect(result).to.deep.equal({
      data: { hello: 'world' },
      extensions: { hooks: 10 },
    });
  });

  it('executes the transformed document', async () => {
    const result = await graphql({
      schema,
      source: '{ hello }',
      rootValue,
      instrumentation: {
        transformDocument: (document) => ({
          ...document,
          definitions: [],
        }),
      },
      validate: false,
    });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [{ message: 'Expected at least one operation definition' }],
    });
  });
});

describe('graphqlSync', () => {
  it('returns the result synchronously', () => {
    const result = graphqlSync({ schema, source: '{ hello }', rootValue });

    expect(result).to.deep.equal({ data: { hello: 'world' } });
  });

  it('reports syntax errors', () => {
    const result = graphqlSync({ schema, source: '{ hello' });

    expectJSON(result).toDeepEqual({
      errors: [
        {
          message: 'Expected Name but found <EOF>',
          locations: [{ line: 1, column: 8 }],
        },
      ],
    });
  });

  it('throws for a resolver returning a promise', () => {
    let ended = false;
    expect(() =>
      graphqlSync({
        schema,
        source: '{ hello }',
        rootValue: { hello: () => Promise.resolve('world') },
        instrumentation: { onQueryEnd: () => (ended = true) },
      }),
    ).to.throw(ContractViolationError);
    expect(ended).to.equal(true);
  });

  it('throws when the runtime defers the result', () => {
    expect(() =>
      graphqlSync({
        schema,
        source: '{ hello }',
        rootValue,
        runtime: new AsyncRuntime(),
      }),
    ).to.throw('GraphQL execution failed to complete synchronously.');
  });
});
