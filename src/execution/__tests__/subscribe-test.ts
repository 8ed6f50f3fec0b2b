import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { ExecutionResult } from 'graphql';
import { buildSchema } from 'graphql';

import { expectJSON } from '../../__testUtils__/expectJSON';
import { expectPromise } from '../../__testUtils__/expectPromise';

import { ResolverError } from '../../error/ResolverError';

import { isAsyncIterable } from '../../jsutils/isAsyncIterable';

import { parse } from '../../language/parser';

import { AsyncRuntime } from '../runtime/AsyncRuntime';
import { BlockingRuntime } from '../runtime/BlockingRuntime';
import { PooledRuntime } from '../runtime/PooledRuntime';
import { createSourceEventStream, subscribe } from '../subscribe';

const schema = buildSchema(`
  type Query {
    dummy: Int
  }

  type Subscription {
    countdown(from: Int = 3): Int
  }
`);

async function* countdownFrom(from: number): AsyncGenerator<unknown> {
  for (let i = from; i > 0; i--) {
    yield { countdown: i };
  }
}

async function* events(
  payloads: ReadonlyArray<unknown>,
): AsyncGenerator<unknown> {
  for (const payload of payloads) {
    yield payload;
  }
}

async function collect(
  resultOrStream: AsyncGenerator<ExecutionResult> | ExecutionResult,
): Promise<Array<ExecutionResult>> {
  expect(isAsyncIterable(resultOrStream)).to.equal(true);
  const results: Array<ExecutionResult> = [];
  if (isAsyncIterable(resultOrStream)) {
    for await (const result of resultOrStream) {
      results.push(result);
    }
  }
  return results;
}

describe('Subscription Initialization Phase', () => {
  it('resolves to the source event stream', async () => {
    const stream = countdownFrom(1);
    const result = await createSourceEventStream({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: { countdown: () => stream },
    });
    expect(result).to.equal(stream);
  });

  it('passes arguments to the subscribe resolver', async () => {
    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown(from: 2) }'),
      rootValue: {
        countdown: ({ from }: { from: number }) => countdownFrom(from),
      },
    });

    expect(await collect(subscription)).to.deep.equal([
      { data: { countdown: 2 } },
      { data: { countdown: 1 } },
    ]);
  });

  it('uses a custom subscribe field resolver', async () => {
    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      subscribeFieldResolver: () => countdownFrom(1),
    });

    expect(await collect(subscription)).to.deep.equal([
      { data: { countdown: 1 } },
    ]);
  });

  it('requires a runtime that supports subscriptions', async () => {
    await expectPromise(
      subscribe({
        schema,
        document: parse('subscription { countdown }'),
        runtime: new BlockingRuntime(),
      }),
    ).toRejectWithMessage('BlockingRuntime does not support subscriptions.');

    await expectPromise(
      subscribe({
        schema,
        document: parse('subscription { countdown }'),
        runtime: new PooledRuntime({ maxWorkers: 1 }),
      }),
    ).toRejectWithMessage('PooledRuntime does not support subscriptions.');
  });

  it('rejects an operation that is not a subscription', async () => {
    await expectPromise(
      subscribe({ schema, document: parse('{ dummy }') }),
    ).toRejectWithMessage(
      'Cannot subscribe to a query operation, use `execute` instead.',
    );
  });

  it('rejects a subscribe resolver that returns no event stream', async () => {
    await expectPromise(
      subscribe({
        schema,
        document: parse('subscription { countdown }'),
        rootValue: { countdown: 'nope' },
      }),
    ).toRejectWithMessage(
      'Subscription field must return Async Iterable. Received: "nope".',
    );
  });

  it('reports a resolver error from the subscribe resolver', async () => {
    const result = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: {
        countdown: () => {
          throw new ResolverError('Countdown unavailable');
        },
      },
    });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [
        {
          message: 'Countdown unavailable',
          locations: [{ line: 1, column: 16 }],
          path: ['countdown'],
        },
      ],
    });
  });

  it('reports an unknown subscription field', async () => {
    const result = await subscribe({
      schema,
      document: parse('subscription { unknown }'),
    });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [
        {
          message: 'The subscription field "unknown" is not defined.',
          locations: [{ line: 1, column: 16 }],
        },
      ],
    });
  });

  it('requires exactly one root field', async () => {
    const result = await subscribe({
      schema,
      document: parse('subscription { a: countdown b: countdown }'),
      rootValue: { countdown: () => countdownFrom(1) },
    });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [
        {
          message: 'Subscription operations must select exactly one root field',
          locations: [{ line: 1, column: 1 }],
        },
      ],
    });
  });

  it('reports invalid variables', async () => {
    const result = await subscribe({
      schema,
      document: parse('subscription ($from: Int) { countdown(from: $from) }'),
      variableValues: { from: 'three' },
    });

    expectJSON(result).toDeepEqual({
      data: null,
      errors: [
        {
          message:
            'Variable "$from" got invalid value "three"; Int cannot represent non-integer value: "three"',
          locations: [{ line: 1, column: 15 }],
        },
      ],
    });
  });
});

describe('Subscription Publish Phase', () => {
  it('executes each event with the event as root value', async () => {
    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: { countdown: () => countdownFrom(3) },
      runtime: new AsyncRuntime(),
    });

    expect(await collect(subscription)).to.deep.equal([
      { data: { countdown: 3 } },
      { data: { countdown: 2 } },
      { data: { countdown: 1 } },
    ]);
  });

  it('keeps the errors of an event to that event', async () => {
    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: {
        countdown: () =>
          events([
            { countdown: 2 },
            {
              countdown: () => {
                throw new ResolverError('Bad event');
              },
            },
            { countdown: 1 },
          ]),
      },
    });

    const results = await collect(subscription);
    expect(results).to.have.lengthOf(3);
    expect(results[0]).to.deep.equal({ data: { countdown: 2 } });
    expectJSON(results[1]).toDeepEqual({
      data: { countdown: null },
      errors: [
        {
          message: 'Bad event',
          locations: [{ line: 1, column: 16 }],
          path: ['countdown'],
        },
      ],
    });
    expect(results[2]).to.deep.equal({ data: { countdown: 1 } });
  });

  it('ends the execution when the response stream finishes', async () => {
    const log: Array<string> = [];
    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: { countdown: () => countdownFrom(2) },
      instrumentation: {
        onExecutionStart: () => log.push('executionStart'),
        onExecutionEnd: () => log.push('executionEnd'),
      },
    });

    expect(log).to.deep.equal(['executionStart']);
    expect(await collect(subscription)).to.deep.equal([
      { data: { countdown: 2 } },
      { data: { countdown: 1 } },
    ]);
    expect(log).to.deep.equal(['executionStart', 'executionEnd']);
  });

  it('ends the execution when subscribing fails', async () => {
    const log: Array<string> = [];
    const result = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: {
        countdown: () => {
          throw new ResolverError('Unavailable');
        },
      },
      instrumentation: {
        onExecutionStart: () => log.push('executionStart'),
        onExecutionEnd: () => log.push('executionEnd'),
      },
    });

    expect(isAsyncIterable(result)).to.equal(false);
    expect(log).to.deep.equal(['executionStart', 'executionEnd']);
  });

  it('closes the source stream when the response stream returns', async () => {
    let closed = false;
    async function* endless(): AsyncGenerator<unknown> {
      try {
        for (let i = 0; ; i++) {
          yield { countdown: i };
        }
      } finally {
        closed = true;
      }
    }

    const subscription = await subscribe({
      schema,
      document: parse('subscription { countdown }'),
      rootValue: { countdown: () => endless() },
    });

    expect(isAsyncIterable(subscription)).to.equal(true);
    if (isAsyncIterable(subscription)) {
      expect(await subscription.next()).to.deep.equal({
        done: false,
        value: { data: { countdown: 0 } },
      });
      expect(await subscription.return()).to.deep.equal({
        done: true,
        value: undefined,
      });
    }
    expect(closed).to.equal(true);
  });
});
