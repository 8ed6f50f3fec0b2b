import type { Source } from 'graphql';
import { GraphQLError } from 'graphql';

/**
 * Base class of every lexing and parsing failure. `position` is the 0-indexed
 * offset into `source.body`; `locations` holds the matching 1-indexed line
 * and column.
 */
export class GraphQLSyntaxError extends GraphQLError {
  readonly position: number;

  constructor(message: string, position: number, source: Source) {
    super(message, { source, positions: [position] });
    this.name = 'GraphQLSyntaxError';
    this.position = position;
  }
}

export class InvalidCharacter extends GraphQLSyntaxError {
  constructor(char: string, position: number, source: Source) {
    super(`Invalid character ${printCharCode(char)}`, position, source);
    this.name = 'InvalidCharacter';
  }
}

export class UnexpectedCharacter extends GraphQLSyntaxError {
  constructor(message: string, position: number, source: Source) {
    super(message, position, source);
    this.name = 'UnexpectedCharacter';
  }
}

export class UnexpectedEOF extends GraphQLSyntaxError {
  constructor(position: number, source: Source) {
    super('Unexpected <EOF>', position, source);
    this.name = 'UnexpectedEOF';
  }
}

export class NonTerminatedString extends GraphQLSyntaxError {
  constructor(position: number, source: Source) {
    super('Unterminated string', position, source);
    this.name = 'NonTerminatedString';
  }
}

export class InvalidEscapeSequence extends GraphQLSyntaxError {
  constructor(sequence: string, position: number, source: Source) {
    super(`Invalid escape sequence "${sequence}"`, position, source);
    this.name = 'InvalidEscapeSequence';
  }
}

export class UnexpectedToken extends GraphQLSyntaxError {
  constructor(message: string, position: number, source: Source) {
    super(message, position, source);
    this.name = 'UnexpectedToken';
  }
}

function printCharCode(char: string): string {
  const code = char.charCodeAt(0);
  return code < 0x0020 || code === 0x007f
    ? `"\\u${code.toString(16).toUpperCase().padStart(4, '0')}"`
    : `"${char}"`;
}
