import type { Value } from '@crisp/core';
import { Parser } from './parser.js';

export { Parser, RECOGNIZERS, type Recognizer, type ParseFn } from './parser.js';
export { ParseError, type ParseErrorKind } from './error.js';
export { checkBalance, splitTopLevel, type Piece } from './lexer.js';

const defaultParser = new Parser();

export function parse(source: string): Value {
  return defaultParser.parse(source);
}
