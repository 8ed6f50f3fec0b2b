import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { FieldNode, OperationDefinitionNode } from 'graphql';
import {
  GraphQLError,
  GraphQLInputObjectType,
  GraphQLInt,
  GraphQLList,
  GraphQLNonNull,
  GraphQLObjectType,
  GraphQLSchema,
  GraphQLSkipDirective,
  GraphQLString,
  Kind,
} from 'graphql';

import { CoercionError, VariablesCoercionError } from '../../error/CoercionError';

import { parse } from '../../language/parser';

import { toExecutorSchema } from '../../executorSchema/toExecutorSchema';

import {
  coerceArgumentValues,
  coerceVariableValues,
  getDirectiveValues,
} from '../values';

const inputType = new GraphQLInputObjectType({
  name: 'Input',
  fields: { x: { type: new GraphQLNonNull(GraphQLString) } },
});

const queryType = new GraphQLObjectType({
  name: 'Query',
  fields: {
    field: {
      type: GraphQLString,
      args: {
        req: { type: new GraphQLNonNull(GraphQLInt) },
        opt: { type: GraphQLString, defaultValue: 'dflt' },
        list: { type: new GraphQLList(GraphQLInt) },
      },
    },
    withInput: { type: GraphQLString, args: { input: { type: inputType } } },
  },
});

const schema = new GraphQLSchema({ query: queryType });
const executorSchema = toExecutorSchema(schema);

function getOperation(source: string): OperationDefinitionNode {
  const [definition] = parse(source).definitions;
  if (definition.kind !== Kind.OPERATION_DEFINITION) {
    throw new Error('Expected an operation.');
  }
  return definition;
}

function getField(source: string): FieldNode {
  const [selection] = getOperation(source).selectionSet.selections;
  if (selection.kind !== Kind.FIELD) {
    throw new Error('Expected a field.');
  }
  return selection;
}

function coerceVariables(
  source: string,
  inputs: { [variable: string]: unknown },
  maxErrors?: number,
) {
  return coerceVariableValues(
    executorSchema,
    getOperation(source).variableDefinitions ?? [],
    inputs,
    { maxErrors },
  );
}

function coercionMessages(
  source: string,
  inputs: { [variable: string]: unknown },
  maxErrors?: number,
): Array<string> {
  try {
    coerceVariables(source, inputs, maxErrors);
  } catch (error) {
    if (error instanceof VariablesCoercionError) {
      return error.errors.map((each) => each.message);
    }
    throw error;
  }
  expect.fail('Expected variable coercion to fail.');
}

function coerceArguments(
  source: string,
  variableValues?: { [variable: string]: unknown },
) {
  const fieldNode = getField(source);
  const def = queryType.getFields()[fieldNode.name.value];
  return coerceArgumentValues(def, fieldNode, variableValues);
}

describe('Execute: coerceVariableValues', () => {
  const operation =
    'query ($a: Int, $b: String!, $c: [Int], $d: Input = {x: "def"}) { field(req: 1) }';

  it('coerces provided values and applies defaults', () => {
    expect(
      coerceVariables(operation, { a: 1, b: 'x', c: [1, 2] }),
    ).to.deep.equal({ a: 1, b: 'x', c: [1, 2], d: { x: 'def' } });
  });

  it('wraps a single list item', () => {
    expect(coerceVariables(operation, { b: 'x', c: 3 })).to.deep.equal({
      b: 'x',
      c: [3],
      d: { x: 'def' },
    });
  });

  it('reports a missing required variable', () => {
    expect(coercionMessages(operation, {})).to.deep.equal([
      'Variable "$b" of required type "String!" was not provided.',
    ]);
  });

  it('reports null for a non-null variable', () => {
    expect(coercionMessages(operation, { b: null })).to.deep.equal([
      'Variable "$b" of non-null type "String!" must not be null.',
    ]);
  });

  it('reports invalid values with their path', () => {
    expect(coercionMessages(operation, { a: 'abc', b: 'x' })).to.deep.equal([
      'Variable "$a" got invalid value "abc"; Int cannot represent non-integer value: "abc"',
    ]);
    expect(
      coercionMessages(operation, { b: 'x', c: [1, 'two'] }),
    ).to.deep.equal([
      'Variable "$c" got invalid value "two" at "c[1]"; Int cannot represent non-integer value: "two"',
    ]);
    expect(coercionMessages(operation, { b: 'x', d: {} })).to.deep.equal([
      'Variable "$d" got invalid value {}; Field "x" of required type "String!" was not provided.',
    ]);
  });

  it('reports every failing variable in one error', () => {
    let caught: unknown;
    try {
      coerceVariables(operation, { a: 'abc', b: null });
    } catch (error) {
      caught = error;
    }

    expect(caught).to.be.an.instanceOf(VariablesCoercionError);
    expect(caught).to.have.property(
      'message',
      'Variable "$a" got invalid value "abc"; Int cannot represent non-integer value: "abc"\n' +
        'Variable "$b" of non-null type "String!" must not be null.',
    );
  });

  it('stops at the error limit', () => {
    expect(coercionMessages(operation, { a: 'abc', b: null }, 1)).to.deep.equal(
      [
        'Variable "$a" got invalid value "abc"; Int cannot represent non-integer value: "abc"',
        'Too many errors processing variables, error limit reached. Execution aborted.',
      ],
    );
  });

  it('rejects variables of non-input types', () => {
    expect(coercionMessages('query ($q: Query) { field }', {})).to.deep.equal([
      'Variable "$q" expected value of type "Query" which cannot be used as an input type.',
    ]);
    expect(
      coercionMessages('query ($u: [Unknown]) { field }', {}),
    ).to.deep.equal([
      'Variable "$u" expected value of type "[Unknown]" which cannot be used as an input type.',
    ]);
  });

  it('returns an object with a prototype', () => {
    const values = coerceVariables(operation, { b: 'x' });
    expect(Object.getPrototypeOf(values)).to.equal(Object.prototype);
  });
});

describe('Execute: coerceArgumentValues', () => {
  function argumentError(
    source: string,
    variableValues?: { [variable: string]: unknown },
  ): CoercionError {
    try {
      coerceArguments(source, variableValues);
    } catch (error) {
      if (error instanceof CoercionError) {
        return error;
      }
      throw error;
    }
    expect.fail('Expected argument coercion to fail.');
  }

  it('coerces literals and applies defaults', () => {
    expect(coerceArguments('{ field(req: 1, list: [1, 2]) }')).to.deep.equal({
      req: 1,
      opt: 'dflt',
      list: [1, 2],
    });
  });

  it('reads variables and falls back to defaults for missing ones', () => {
    expect(
      coerceArguments('{ field(req: $v, opt: $w) }', { v: 3 }),
    ).to.deep.equal({ req: 3, opt: 'dflt' });
  });

  it('reports a missing required argument', () => {
    const error = argumentError('{ field }');
    expect(error.message).to.equal(
      'Argument "req" of required type "Int!" was not provided',
    );
    expect(error.locations).to.deep.equal([{ line: 1, column: 3 }]);
  });

  it('reports null for a non-null argument', () => {
    expect(argumentError('{ field(req: null) }').message).to.equal(
      'Argument "req" of non-null type "Int!" must not be null',
    );
    expect(argumentError('{ field(req: $v) }', { v: null }).message).to.equal(
      'Argument "req" of non-null type "Int!" must not be null',
    );
  });

  it('reports a missing variable for a required argument', () => {
    const error = argumentError('{ field(req: $v) }', {});
    expect(error.message).to.equal(
      'Argument "req" of required type "Int!" was provided the missing variable "$v"',
    );
    expect(error.locations).to.deep.equal([{ line: 1, column: 14 }]);
  });

  it('reports an invalid literal', () => {
    expect(argumentError('{ field(req: "x") }').message).to.equal(
      'Argument "req" of type "Int!" was provided invalid value "x"',
    );
    expect(argumentError('{ withInput(input: {y: "a"}) }').message).to.equal(
      'Argument "input" of type "Input" was provided invalid value {y: "a"}',
    );
  });

  it('reports errors as GraphQL errors', () => {
    expect(argumentError('{ field }')).to.be.an.instanceOf(GraphQLError);
  });
});

describe('Execute: getDirectiveValues', () => {
  it('coerces the arguments of a present directive', () => {
    const fieldNode = getField('{ field @skip(if: true) }');
    expect(
      getDirectiveValues(GraphQLSkipDirective, fieldNode, {}),
    ).to.deep.equal({ if: true });
  });

  it('reads variables', () => {
    const fieldNode = getField('query ($s: Boolean!) { field @skip(if: $s) }');
    expect(
      getDirectiveValues(GraphQLSkipDirective, fieldNode, { s: false }),
    ).to.deep.equal({ if: false });
  });

  it('returns undefined when the directive is absent', () => {
    const fieldNode = getField('{ field }');
    expect(getDirectiveValues(GraphQLSkipDirective, fieldNode, {})).to.equal(
      undefined,
    );
  });
});
