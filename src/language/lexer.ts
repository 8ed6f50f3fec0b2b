import type { Source } from 'graphql';
import { Token, TokenKind } from 'graphql';

import {
  InvalidCharacter,
  InvalidEscapeSequence,
  NonTerminatedString,
  UnexpectedCharacter,
  UnexpectedEOF,
} from '../error/syntaxError';

import { dedentBlockString } from './blockString';
import { toSource } from './source';

const PUNCTUATORS: ReadonlyMap<string, TokenKind> = new Map([
  ['!', TokenKind.BANG],
  ['$', TokenKind.DOLLAR],
  ['&', TokenKind.AMP],
  ['(', TokenKind.PAREN_L],
  [')', TokenKind.PAREN_R],
  [':', TokenKind.COLON],
  ['=', TokenKind.EQUALS],
  ['@', TokenKind.AT],
  ['[', TokenKind.BRACKET_L],
  [']', TokenKind.BRACKET_R],
  ['{', TokenKind.BRACE_L],
  ['|', TokenKind.PIPE],
  ['}', TokenKind.BRACE_R],
]);

const ESCAPED_CHARACTERS: ReadonlyMap<string, string> = new Map([
  ['"', '"'],
  ['\\', '\\'],
  ['/', '/'],
  ['b', '\b'],
  ['f', '\f'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

/**
 * Pull-based GraphQL tokenizer.
 *
 * The first token is always `<SOF>` and the last one `<EOF>`; after that the
 * iterator is exhausted. Whitespace, commas and comments are skipped and
 * never produce tokens. The lexer does not buffer or rewind: lookahead is the
 * parser's job.
 */
export class Lexer implements IterableIterator<Token> {
  readonly source: Source;

  private readonly _body: string;
  private _position = 0;
  private _line = 1;
  private _lineStart = 0;
  private _tokenLine = 1;
  private _tokenColumn = 1;
  private _started = false;
  private _done = false;

  constructor(source: string | Uint8Array | Source) {
    this.source = toSource(source);
    this._body = this.source.body;
  }

  get [Symbol.toStringTag]() {
    return 'Lexer';
  }

  [Symbol.iterator](): IterableIterator<Token> {
    return this;
  }

  next(): IteratorResult<Token, undefined> {
    if (this._done) {
      return { done: true, value: undefined };
    }
    return { done: false, value: this._readToken() };
  }

  private _readToken(): Token {
    if (!this._started) {
      this._started = true;
      return this._createToken(TokenKind.SOF, 0, 0);
    }

    this._skipIgnored();

    const position = this._position;
    this._tokenLine = this._line;
    this._tokenColumn = 1 + position - this._lineStart;

    const char = this._peek();
    if (char === undefined) {
      this._done = true;
      return this._createToken(TokenKind.EOF, position, position);
    }

    const code = char.charCodeAt(0);
    if (code < 0x0020 && code !== 0x0009) {
      this._position++;
      throw new InvalidCharacter(char, this._position, this.source);
    }

    const punctuator = PUNCTUATORS.get(char);
    if (punctuator !== undefined) {
      this._position++;
      return this._createToken(punctuator, position, this._position);
    }

    if (char === '.') {
      return this._readSpread();
    }

    if (char === '"') {
      return this._body.startsWith('"""', position)
        ? this._readBlockString()
        : this._readString();
    }

    if (char === '-' || isDigit(char)) {
      return this._readNumber();
    }

    if (isNameStart(char)) {
      return this._readName();
    }

    throw new UnexpectedCharacter(
      `Unexpected character "${char}"`,
      position,
      this.source,
    );
  }

  private _createToken(
    kind: TokenKind,
    start: number,
    end: number,
    value?: string,
  ): Token {
    return new Token(
      kind,
      start,
      end,
      this._tokenLine,
      this._tokenColumn,
      value,
    );
  }

  private _peek(offset = 0): string | undefined {
    const position = this._position + offset;
    return position < this._body.length ? this._body[position] : undefined;
  }

  /**
   * Records a line terminator ending right before the current position.
   * `\r\n` counts once: the `\r` is ignored when followed by `\n`.
   */
  private _newLine(char: string): void {
    if (char === '\r' && this._peek() === '\n') {
      return;
    }
    this._line++;
    this._lineStart = this._position;
  }

  private _skipIgnored(): void {
    for (;;) {
      const char = this._peek();
      if (char === undefined) {
        return;
      }

      switch (char) {
        case '\uFEFF':
        case '\t':
        case ' ':
        case ',':
          this._position++;
          break;
        case '\n':
        case '\r':
          this._position++;
          this._newLine(char);
          break;
        case '#':
          this._position++;
          this._skipComment();
          break;
        default:
          return;
      }
    }
  }

  private _skipComment(): void {
    for (;;) {
      const char = this._peek();
      if (char === undefined) {
        return;
      }
      const code = char.charCodeAt(0);
      if (
        (code >= 0x0020 || code === 0x0009) &&
        code !== 0x000a &&
        code !== 0x000d
      ) {
        this._position++;
      } else {
        return;
      }
    }
  }

  private _readSpread(): Token {
    const start = this._position;
    for (let i = 0; i < 3; i++) {
      const char = this._peek();
      this._position++;
      if (char !== '.') {
        if (char === undefined) {
          throw new UnexpectedEOF(this._position - 1, this.source);
        }
        throw new UnexpectedCharacter(
          `Expected "." but found "${char}"`,
          this._position,
          this.source,
        );
      }
    }
    return this._createToken(TokenKind.SPREAD, start, this._position);
  }

  private _readString(): Token {
    const start = this._position;
    this._position++;
    let value = '';

    for (;;) {
      const char = this._peek();
      if (char === undefined) {
        throw new NonTerminatedString(this._position, this.source);
      }

      const code = char.charCodeAt(0);
      this._position++;

      if (char === '"') {
        return this._createToken(
          TokenKind.STRING,
          start,
          this._position,
          value,
        );
      } else if (char === '\\') {
        value += this._readEscapeSequence();
      } else if (code === 0x000a || code === 0x000d) {
        throw new NonTerminatedString(this._position - 1, this.source);
      } else if (code < 0x0020 && code !== 0x0009) {
        throw new InvalidCharacter(char, this._position - 1, this.source);
      } else {
        value += char;
      }
    }
  }

  private _readEscapeSequence(): string {
    const char = this._peek();
    this._position++;
    if (char === undefined) {
      throw new NonTerminatedString(this._position, this.source);
    }

    const escaped = ESCAPED_CHARACTERS.get(char);
    if (escaped !== undefined) {
      return escaped;
    }

    if (char === 'u') {
      return this._readEscapedUnicode();
    }

    throw new InvalidEscapeSequence(
      `\\${char}`,
      this._position - 1,
      this.source,
    );
  }

  private _readEscapedUnicode(): string {
    const start = this._position;
    for (let i = 0; i < 4; i++) {
      const char = this._peek();
      this._position++;
      if (char === undefined) {
        throw new NonTerminatedString(this._position, this.source);
      }
      if (!isAlphanumeric(char)) {
        break;
      }
    }

    const escape = this._body.slice(start, this._position);
    if (!/^[0-9A-Fa-f]{4}$/.test(escape)) {
      throw new InvalidEscapeSequence(`\\u${escape}`, start - 1, this.source);
    }

    return String.fromCharCode(parseInt(escape, 16));
  }

  private _readBlockString(): Token {
    const start = this._position;
    this._position += 3;
    let raw = '';

    for (;;) {
      const char = this._peek();
      if (char === undefined) {
        throw new NonTerminatedString(this._position, this.source);
      }

      if (this._body.startsWith('"""', this._position)) {
        this._position += 3;
        return this._createToken(
          TokenKind.BLOCK_STRING,
          start,
          this._position,
          dedentBlockString(raw),
        );
      }

      const code = char.charCodeAt(0);
      this._position++;

      if (char === '\\' && this._body.startsWith('"""', this._position)) {
        raw += '"""';
        this._position += 3;
      } else if (code === 0x000a || code === 0x000d) {
        raw += char;
        this._newLine(char);
      } else if (code < 0x0020 && code !== 0x0009) {
        throw new InvalidCharacter(char, this._position - 1, this.source);
      } else {
        raw += char;
      }
    }
  }

  private _readNumber(): Token {
    const start = this._position;
    let isFloat = false;

    if (this._peek() === '-') {
      this._position++;
    }

    this._readInteger();

    if (this._peek() === '.') {
      this._position++;
      isFloat = true;
      this._readDigits();
    }

    const exponent = this._peek();
    if (exponent === 'e' || exponent === 'E') {
      this._position++;
      isFloat = true;
      const sign = this._peek();
      if (sign === '-' || sign === '+') {
        this._position++;
      }
      this._readInteger();
    }

    return this._createToken(
      isFloat ? TokenKind.FLOAT : TokenKind.INT,
      start,
      this._position,
      this._body.slice(start, this._position),
    );
  }

  private _readInteger(): void {
    const char = this._peek();
    if (char === undefined) {
      throw new UnexpectedEOF(this._position, this.source);
    }

    if (char === '0') {
      this._position++;
      const next = this._peek();
      if (next !== undefined && isDigit(next)) {
        throw new UnexpectedCharacter(
          `Unexpected character "${next}"`,
          this._position,
          this.source,
        );
      }
      return;
    }

    this._readDigits();
  }

  private _readDigits(): void {
    let char = this._peek();
    if (char === undefined) {
      throw new UnexpectedEOF(this._position, this.source);
    }

    if (!isDigit(char)) {
      throw new UnexpectedCharacter(
        `Unexpected character "${char}"`,
        this._position,
        this.source,
      );
    }

    while (char !== undefined && isDigit(char)) {
      this._position++;
      char = this._peek();
    }
  }

  private _readName(): Token {
    const start = this._position;
    let char = this._peek();
    while (char !== undefined && isNameContinue(char)) {
      this._position++;
      char = this._peek();
    }
    return this._createToken(
      TokenKind.NAME,
      start,
      this._position,
      this._body.slice(start, this._position),
    );
  }
}

function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

function isLetter(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
}

function isAlphanumeric(char: string): boolean {
  return isLetter(char) || isDigit(char);
}

function isNameStart(char: string): boolean {
  return isLetter(char) || char === '_';
}

function isNameContinue(char: string): boolean {
  return isAlphanumeric(char) || char === '_';
}

/**
 * Tokenizes a whole source. Mostly useful for tooling and tests.
 */
export function lex(source: string | Uint8Array | Source): Array<Token> {
  return Array.from(new Lexer(source));
}
