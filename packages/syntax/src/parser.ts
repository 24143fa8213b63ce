import { INTEGER_MAX, INTEGER_MIN, Value, printValue, sym } from '@crisp/core';
import { ESCAPES, isSymbolChar, quotePrefix, restSuffix } from './chars.js';
import { ParseError } from './error.js';
import { checkBalance, splitTopLevel, type Piece } from './lexer.js';

export type ParseFn = (text: string) => Value;

/** A literal or structural form the parser knows how to read. */
export interface Recognizer {
  name: string;
  accepts(text: string): boolean;
  read(text: string, parse: ParseFn): Value;
}

const SPECIALS: Record<string, () => Value> = {
  t: () => Value.T(),
  nil: () => Value.Nil(),
};

export const integerRecognizer: Recognizer = {
  name: 'integer',
  accepts: (text) => /^[+-]?[0-9]+$/.test(text),
  read(text) {
    const negative = text.startsWith('-');
    const digits = /^[+-]/.test(text) ? text.slice(1) : text;
    // Accumulate the magnitude; INTEGER_MIN has one more unit than INTEGER_MAX.
    const limit = negative ? -INTEGER_MIN : INTEGER_MAX;
    let magnitude = 0;
    for (const digit of digits) {
      magnitude = magnitude * 10 + (digit.charCodeAt(0) - 48);
      if (magnitude > limit) {
        throw new ParseError('IntegerOverflow', `integer literal out of range: ${text}`);
      }
    }
    return Value.Integer(negative && magnitude !== 0 ? -magnitude : magnitude);
  },
};

export const specialRecognizer: Recognizer = {
  name: 'special',
  accepts: (text) => Object.hasOwn(SPECIALS, text),
  read(text) {
    const make = SPECIALS[text];
    if (make === undefined) {
      throw new ParseError('Malformed', `unknown special literal: ${text}`);
    }
    return make();
  },
};

export const stringRecognizer: Recognizer = {
  name: 'string',
  accepts: (text) => text.startsWith('"'),
  read(text) {
    let out = '';
    let i = 1;
    while (i < text.length) {
      const ch = text.charAt(i);
      if (ch === '"') {
        if (i !== text.length - 1) {
          throw new ParseError('Malformed', `unexpected text after string literal: ${text}`);
        }
        return Value.String(out);
      }
      if (ch === '\\') {
        const next = text.charAt(i + 1);
        const escaped = ESCAPES[next];
        if (escaped === undefined) {
          throw new ParseError('InvalidEscape', `invalid escape sequence: \\${next}`);
        }
        out += escaped;
        i += 2;
        continue;
      }
      out += ch;
      i++;
    }
    throw new ParseError('Malformed', `unterminated string literal: ${text}`);
  },
};

export const symbolRecognizer: Recognizer = {
  name: 'symbol',
  accepts(text) {
    const first = quotePrefix(text).body.charAt(0);
    return first !== '' && isSymbolChar(first);
  },
  read(text) {
    const { quote, body } = quotePrefix(text);
    const { name, rest } = restSuffix(body);
    for (const ch of name) {
      if (!isSymbolChar(ch)) {
        throw new ParseError('Malformed', `illegal character (${ch}) in symbol: ${text}`);
      }
    }
    return Value.Symbol(sym(name, quote, rest));
  },
};

export const bracketRecognizer: Recognizer = {
  name: 'bracketed',
  accepts: (text) => text.startsWith('(') || text.startsWith('['),
  read(text, parse) {
    const closer = checkBalance(text);
    const interior = text.slice(1, -1);
    const elements = readElements(interior, splitTopLevel(interior), parse);

    if (closer === ']') {
      return Value.List(elements);
    }

    const [head, ...args] = elements;
    if (head === undefined) {
      throw new ParseError('EmptyCall', 'empty function call: ()');
    }
    if (head.tag !== 'Symbol' || head.symbol.quote !== 'none') {
      throw new ParseError('InvalidCall', `invalid function call head: ${printValue(head)}`);
    }
    return Value.Funcall(head.symbol, args);
  },
};

/**
 * Parses every piece; a piece that does not parse on its own is extended with
 * the following pieces (whitespace included) until the accumulated text does.
 */
function readElements(interior: string, pieces: Piece[], parse: ParseFn): Value[] {
  const elements: Value[] = [];
  let pending: { start: number; failure: ParseError } | null = null;

  for (const piece of pieces) {
    const start: number = pending?.start ?? piece.start;
    try {
      elements.push(parse(interior.slice(start, piece.end)));
      pending = null;
    } catch (e) {
      if (!(e instanceof ParseError)) throw e;
      pending ??= { start, failure: e };
    }
  }

  if (pending !== null) throw pending.failure;
  return elements;
}

export const RECOGNIZERS: readonly Recognizer[] = [
  integerRecognizer,
  specialRecognizer,
  stringRecognizer,
  symbolRecognizer,
  bracketRecognizer,
];

export class Parser {
  constructor(private recognizers: readonly Recognizer[] = RECOGNIZERS) {}

  parse(source: string): Value {
    const text = source.trim();
    for (const recognizer of this.recognizers) {
      if (recognizer.accepts(text)) {
        return recognizer.read(text, (piece) => this.parse(piece));
      }
    }
    throw new ParseError('NoParser', `no parser accepts: ${text}`);
  }
}
