import { expect } from 'chai';
import { describe, it } from 'mocha';

import { buildSchema } from 'graphql';

import { expectJSON } from '../../__testUtils__/expectJSON';

import { ResolverError } from '../../error/ResolverError';

import { parse } from '../../language/parser';

import { execute } from '../execute';
import { AsyncRuntime } from '../runtime/AsyncRuntime';
import { BlockingRuntime } from '../runtime/BlockingRuntime';
import { PooledRuntime } from '../runtime/PooledRuntime';
import type { Runtime } from '../runtime/runtime';

const schema = buildSchema(`
  type Query {
    nullableA: A
    nonNullA: A!
    nonNullString: String!
    other: String
    nonNullItems: [String!]
    nullableItems: [String]
    nonNullList: [String]!
    nonNullObjects: [A!]
  }

  type A {
    nonNullLeaf: String!
    nullableLeaf: String
    nonNullB: B!
    nullableB: B
  }

  type B {
    nonNullLeaf: String!
    nullableLeaf: String
  }
`);

const runtimes: ReadonlyArray<[string, () => Runtime]> = [
  ['BlockingRuntime', () => new BlockingRuntime()],
  ['PooledRuntime', () => new PooledRuntime({ maxWorkers: 2 })],
  ['AsyncRuntime', () => new AsyncRuntime()],
];

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function failingLater(message: string) {
  return async () => {
    await delay(10);
    throw new ResolverError(message);
  };
}

function failing(message: string) {
  return () => {
    throw new ResolverError(message);
  };
}

describe('Execute: handles non-nullable types', () => {
  for (const [name, createRuntime] of runtimes) {
    describe(`on ${name}`, () => {
      async function executeQuery(source: string, rootValue: unknown) {
        return execute({
          schema,
          document: parse(source),
          rootValue,
          runtime: createRuntime(),
        });
      }

      it('nulls the nearest nullable ancestor', async () => {
        const result = await executeQuery(
          '{ nullableA { nonNullB { nonNullLeaf } } other }',
          { nullableA: { nonNullB: { nonNullLeaf: null } }, other: 'x' },
        );

        expectJSON(result).toDeepEqual({
          data: { nullableA: null, other: 'x' },
          errors: [
            {
              message: 'Field "nullableA.nonNullB.nonNullLeaf" is not nullable',
              locations: [{ line: 1, column: 26 }],
              path: ['nullableA', 'nonNullB', 'nonNullLeaf'],
            },
          ],
        });
      });

      it('stops at a nullable parent', async () => {
        const result = await executeQuery(
          '{ nullableA { nullableB { nonNullLeaf nullableLeaf } nullableLeaf } }',
          {
            nullableA: {
              nullableB: { nonNullLeaf: null, nullableLeaf: 'b' },
              nullableLeaf: 'a',
            },
          },
        );

        expectJSON(result).toDeepEqual({
          data: { nullableA: { nullableB: null, nullableLeaf: 'a' } },
          errors: [
            {
              message: 'Field "nullableA.nullableB.nonNullLeaf" is not nullable',
              locations: [{ line: 1, column: 27 }],
              path: ['nullableA', 'nullableB', 'nonNullLeaf'],
            },
          ],
        });
      });

      it('nulls the data when a root field is non-null', async () => {
        const result = await executeQuery('{ nonNullA { nonNullLeaf } }', {
          nonNullA: { nonNullLeaf: null },
        });

        expectJSON(result).toDeepEqual({
          data: null,
          errors: [
            {
              message: 'Field "nonNullA.nonNullLeaf" is not nullable',
              locations: [{ line: 1, column: 14 }],
              path: ['nonNullA', 'nonNullLeaf'],
            },
          ],
        });
      });

      it('propagates resolver errors of non-null fields', async () => {
        const result = await executeQuery(
          '{ nullableA { nonNullLeaf } other }',
          { nullableA: { nonNullLeaf: failing('leaf failed') }, other: 'x' },
        );

        expectJSON(result).toDeepEqual({
          data: { nullableA: null, other: 'x' },
          errors: [
            {
              message: 'leaf failed',
              locations: [{ line: 1, column: 15 }],
              path: ['nullableA', 'nonNullLeaf'],
            },
          ],
        });
      });

      it('records a single error for a null non-null root field', async () => {
        const result = await executeQuery('{ other nonNullString }', {
          other: 'x',
          nonNullString: null,
        });

        expectJSON(result).toDeepEqual({
          data: null,
          errors: [
            {
              message: 'Field "nonNullString" is not nullable',
              locations: [{ line: 1, column: 9 }],
              path: ['nonNullString'],
            },
          ],
        });
      });

      it('nulls a list holding a null non-null item', async () => {
        const result = await executeQuery('{ nonNullItems nullableItems }', {
          nonNullItems: ['a', null, 'c'],
          nullableItems: ['a', null, 'c'],
        });

        expectJSON(result).toDeepEqual({
          data: { nonNullItems: null, nullableItems: ['a', null, 'c'] },
          errors: [
            {
              message: 'Field "nonNullItems[1]" is not nullable',
              locations: [{ line: 1, column: 3 }],
              path: ['nonNullItems', 1],
            },
          ],
        });
      });

      it('nulls the data for a null non-null list', async () => {
        const result = await executeQuery('{ nonNullList }', {
          nonNullList: null,
        });

        expectJSON(result).toDeepEqual({
          data: null,
          errors: [
            {
              message: 'Field "nonNullList" is not nullable',
              locations: [{ line: 1, column: 3 }],
              path: ['nonNullList'],
            },
          ],
        });
      });
    });
  }

  it('nulls failed items of a nullable list', async () => {
    const result = await execute({
      schema,
      document: parse('{ nullableItems }'),
      rootValue: {
        nullableItems: () => [
          Promise.resolve('a'),
          Promise.reject(new ResolverError('item failed')),
        ],
      },
    });

    expectJSON(result).toDeepEqual({
      data: { nullableItems: ['a', null] },
      errors: [
        {
          message: 'item failed',
          locations: [{ line: 1, column: 3 }],
          path: ['nullableItems', 1],
        },
      ],
    });
  });

  it('nulls the list for failed non-null items', async () => {
    const result = await execute({
      schema,
      document: parse('{ nonNullItems }'),
      rootValue: {
        nonNullItems: () => [
          Promise.reject(new ResolverError('item failed')),
          Promise.resolve('b'),
        ],
      },
    });

    expectJSON(result).toDeepEqual({
      data: { nonNullItems: null },
      errors: [
        {
          message: 'item failed',
          locations: [{ line: 1, column: 3 }],
          path: ['nonNullItems', 0],
        },
      ],
    });
  });

  it('discards completed siblings inside a nulled parent', async () => {
    const result = await execute({
      schema,
      document: parse('{ nullableA { nullableLeaf nonNullB { nonNullLeaf } } }'),
      rootValue: {
        nullableA: {
          nullableLeaf: () => Promise.resolve('kept'),
          nonNullB: () => Promise.resolve({ nonNullLeaf: null }),
        },
      },
    });

    expectJSON(result).toDeepEqual({
      data: { nullableA: null },
      errors: [
        {
          message: 'Field "nullableA.nonNullB.nonNullLeaf" is not nullable',
          locations: [{ line: 1, column: 39 }],
          path: ['nullableA', 'nonNullB', 'nonNullLeaf'],
        },
      ],
    });
  });

  describe('when a sibling fails synchronously', () => {
    const runtime = new AsyncRuntime({ offloadBlockingResolvers: false });

    it('waits for started root fields before nulling the data', async () => {
      const result = await execute({
        schema,
        document: parse('{ other nonNullString }'),
        rootValue: { other: failingLater('late'), nonNullString: null },
        runtime,
      });

      const expected = {
        data: null,
        errors: [
          {
            message: 'late',
            locations: [{ line: 1, column: 3 }],
            path: ['other'],
          },
          {
            message: 'Field "nonNullString" is not nullable',
            locations: [{ line: 1, column: 9 }],
            path: ['nonNullString'],
          },
        ],
      };
      expectJSON(result).toDeepEqual(expected);

      await delay(50);
      expectJSON(result).toDeepEqual(expected);
      expect(result.errors).to.have.lengthOf(2);
    });

    it('waits for started list items before nulling the list', async () => {
      const result = await execute({
        schema,
        document: parse('{ nonNullObjects { nullableLeaf } }'),
        rootValue: {
          nonNullObjects: () => [{ nullableLeaf: failingLater('late') }, null],
        },
        runtime,
      });

      const expected = {
        data: { nonNullObjects: null },
        errors: [
          {
            message: 'late',
            locations: [{ line: 1, column: 20 }],
            path: ['nonNullObjects', 0, 'nullableLeaf'],
          },
          {
            message: 'Field "nonNullObjects[1]" is not nullable',
            locations: [{ line: 1, column: 3 }],
            path: ['nonNullObjects', 1],
          },
        ],
      };
      expectJSON(result).toDeepEqual(expected);

      await delay(50);
      expectJSON(result).toDeepEqual(expected);
    });
  });
});
