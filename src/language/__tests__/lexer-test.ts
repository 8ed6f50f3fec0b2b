import { expect } from 'chai';
import { describe, it } from 'mocha';

import type { Token } from 'graphql';
import { TokenKind } from 'graphql';

import {
  GraphQLSyntaxError,
  InvalidCharacter,
  InvalidEscapeSequence,
  NonTerminatedString,
  UnexpectedCharacter,
  UnexpectedEOF,
} from '../../error/syntaxError';

import { Lexer, lex } from '../lexer';

function lexOne(body: string): Token {
  const lexer = new Lexer(body);
  lexer.next();
  const token = lexer.next();
  if (token.done === true) {
    throw new Error('Expected a token.');
  }
  return token.value;
}

function summarize(token: Token) {
  return {
    kind: token.kind,
    start: token.start,
    end: token.end,
    line: token.line,
    column: token.column,
    value: token.value,
  };
}

function lexError(body: string): GraphQLSyntaxError {
  try {
    lex(body);
  } catch (error) {
    if (error instanceof GraphQLSyntaxError) {
      return error;
    }
    throw error;
  }
  expect.fail('Expected a syntax error.');
}

describe('Lexer', () => {
  it('starts with <SOF> and ends with <EOF>', () => {
    expect(lex('{ a }').map(summarize)).to.deep.equal([
      {
        kind: TokenKind.SOF,
        start: 0,
        end: 0,
        line: 1,
        column: 1,
        value: undefined,
      },
      {
        kind: TokenKind.BRACE_L,
        start: 0,
        end: 1,
        line: 1,
        column: 1,
        value: undefined,
      },
      { kind: TokenKind.NAME, start: 2, end: 3, line: 1, column: 3, value: 'a' },
      {
        kind: TokenKind.BRACE_R,
        start: 4,
        end: 5,
        line: 1,
        column: 5,
        value: undefined,
      },
      {
        kind: TokenKind.EOF,
        start: 5,
        end: 5,
        line: 1,
        column: 6,
        value: undefined,
      },
    ]);
  });

  it('is exhausted after <EOF>', () => {
    const lexer = new Lexer('');
    expect(lexer.next().value?.kind).to.equal(TokenKind.SOF);
    expect(lexer.next().value?.kind).to.equal(TokenKind.EOF);
    expect(lexer.next()).to.deep.equal({ done: true, value: undefined });
  });

  it('skips whitespace, commas and comments', () => {
    expect(summarize(lexOne('  ,# comment\n  foo'))).to.deep.equal({
      kind: TokenKind.NAME,
      start: 15,
      end: 18,
      line: 2,
      column: 3,
      value: 'foo',
    });
  });

  it('skips a byte order mark', () => {
    expect(summarize(lexOne('\uFEFF foo'))).to.deep.equal({
      kind: TokenKind.NAME,
      start: 2,
      end: 5,
      line: 1,
      column: 3,
      value: 'foo',
    });
  });

  it('counts \\r\\n as a single line terminator', () => {
    const tokens = lex('a\r\nb\rc\nd');
    expect(
      tokens
        .filter((token) => token.kind === TokenKind.NAME)
        .map((token) => [token.value, token.line, token.column]),
    ).to.deep.equal([
      ['a', 1, 1],
      ['b', 2, 1],
      ['c', 3, 1],
      ['d', 4, 1],
    ]);
  });

  it('lexes punctuators and spreads', () => {
    expect(lex('!$&():=@[]{|}...').map((token) => token.kind)).to.deep.equal([
      TokenKind.SOF,
      TokenKind.BANG,
      TokenKind.DOLLAR,
      TokenKind.AMP,
      TokenKind.PAREN_L,
      TokenKind.PAREN_R,
      TokenKind.COLON,
      TokenKind.EQUALS,
      TokenKind.AT,
      TokenKind.BRACKET_L,
      TokenKind.BRACKET_R,
      TokenKind.BRACE_L,
      TokenKind.PIPE,
      TokenKind.BRACE_R,
      TokenKind.SPREAD,
      TokenKind.EOF,
    ]);
  });

  it('lexes strings', () => {
    expect(summarize(lexOne('"simple"'))).to.deep.equal({
      kind: TokenKind.STRING,
      start: 0,
      end: 8,
      line: 1,
      column: 1,
      value: 'simple',
    });
    expect(lexOne('" white space "').value).to.equal(' white space ');
    expect(lexOne('"quote \\""').value).to.equal('quote "');
    expect(lexOne('"escaped \\n\\r\\b\\t\\f \\/ \\\\"').value).to.equal(
      'escaped \n\r\b\t\f / \\',
    );
    expect(lexOne('"unicode \\u0041\\u00e9"').value).to.equal('unicode Aé');
  });

  it('lexes block strings', () => {
    const token = lexOne('"""\n    Hello,\n      World!\n\n    Yours,\n      GraphQL.\n"""');
    expect(token.kind).to.equal(TokenKind.BLOCK_STRING);
    expect(token.value).to.equal(
      'Hello,\n  World!\n\nYours,\n  GraphQL.',
    );
    expect(lexOne('"""contains \\""" triple quote"""').value).to.equal(
      'contains """ triple quote',
    );
  });

  it('tracks lines inside block strings', () => {
    const tokens = lex('"""\nline\n"""\nnext');
    const name = tokens[2];
    expect([name.value, name.line, name.column]).to.deep.equal([
      'next',
      4,
      1,
    ]);
  });

  it('lexes numbers', () => {
    expect(
      ['4', '-4', '0', '9.5', '-0.25', '1e10', '1.5E-3', '2e+4'].map(
        (body) => {
          const token = lexOne(body);
          return [token.kind, token.value];
        },
      ),
    ).to.deep.equal([
      [TokenKind.INT, '4'],
      [TokenKind.INT, '-4'],
      [TokenKind.INT, '0'],
      [TokenKind.FLOAT, '9.5'],
      [TokenKind.FLOAT, '-0.25'],
      [TokenKind.FLOAT, '1e10'],
      [TokenKind.FLOAT, '1.5E-3'],
      [TokenKind.FLOAT, '2e+4'],
    ]);
  });

  it('reports the offset of an invalid escape sequence', () => {
    const error = lexError('"bad \\uXXXX esc"');
    expect(error).to.be.an.instanceOf(InvalidEscapeSequence);
    expect(error.message).to.equal('Invalid escape sequence "\\uXXXX"');
    expect(error.position).to.equal(6);
    expect(error.locations).to.deep.equal([{ line: 1, column: 7 }]);
  });

  it('reports unknown escape sequences', () => {
    const error = lexError('"no \\x here"');
    expect(error).to.be.an.instanceOf(InvalidEscapeSequence);
    expect(error.message).to.equal('Invalid escape sequence "\\x"');
    expect(error.position).to.equal(5);
  });

  it('reports unterminated strings', () => {
    const atEnd = lexError('"abc');
    expect(atEnd).to.be.an.instanceOf(NonTerminatedString);
    expect(atEnd.message).to.equal('Unterminated string');
    expect(atEnd.position).to.equal(4);

    const atNewline = lexError('"abc\ndef"');
    expect(atNewline).to.be.an.instanceOf(NonTerminatedString);
    expect(atNewline.position).to.equal(4);

    const block = lexError('"""abc');
    expect(block).to.be.an.instanceOf(NonTerminatedString);
    expect(block.position).to.equal(6);
  });

  it('reports invalid characters', () => {
    const error = lexError('\u0007');
    expect(error).to.be.an.instanceOf(InvalidCharacter);
    expect(error.message).to.equal('Invalid character "\\u0007"');
    expect(error.position).to.equal(1);

    const inString = lexError('"a\u0001"');
    expect(inString).to.be.an.instanceOf(InvalidCharacter);
    expect(inString.position).to.equal(2);
  });

  it('reports unexpected characters', () => {
    const error = lexError('?');
    expect(error).to.be.an.instanceOf(UnexpectedCharacter);
    expect(error.message).to.equal('Unexpected character "?"');
    expect(error.position).to.equal(0);
  });

  it('rejects a digit after a leading zero', () => {
    const error = lexError('01');
    expect(error).to.be.an.instanceOf(UnexpectedCharacter);
    expect(error.message).to.equal('Unexpected character "1"');
    expect(error.position).to.equal(1);
  });

  it('rejects incomplete numbers', () => {
    const missingFraction = lexError('1.');
    expect(missingFraction).to.be.an.instanceOf(UnexpectedEOF);
    expect(missingFraction.message).to.equal('Unexpected <EOF>');
    expect(missingFraction.position).to.equal(2);

    const missingExponent = lexError('1eA');
    expect(missingExponent).to.be.an.instanceOf(UnexpectedCharacter);
    expect(missingExponent.message).to.equal('Unexpected character "A"');
    expect(missingExponent.position).to.equal(2);
  });

  it('rejects incomplete spreads', () => {
    const error = lexError('..a');
    expect(error).to.be.an.instanceOf(UnexpectedCharacter);
    expect(error.message).to.equal('Expected "." but found "a"');
    expect(error.position).to.equal(3);

    const atEnd = lexError('..');
    expect(atEnd).to.be.an.instanceOf(UnexpectedEOF);
    expect(atEnd.position).to.equal(2);
  });

  it('decodes byte sources as UTF-8', () => {
    const bytes = new TextEncoder().encode('"é"');
    expect(lex(bytes)[1].value).to.equal('é');
    expect(() => lex(new Uint8Array([0x22, 0xff, 0x22]))).to.throw(
      TypeError,
      'GraphQL source must be valid UTF-8.',
    );
  });
});
