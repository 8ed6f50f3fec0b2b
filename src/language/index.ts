export { toSource } from './source';
export { Lexer, lex } from './lexer';
export { dedentBlockString } from './blockString';
export type { ParseOptions } from './parser';
export {
  Parser,
  parse,
  parseValue,
  parseConstValue,
  parseType,
  getTokenText,
  getTokenKindDesc,
} from './parser';
