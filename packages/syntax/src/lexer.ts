import { ParseError } from './error.js';

const CLOSERS: Record<string, string> = {
  '(': ')',
  '[': ']',
};

export interface Piece {
  start: number;
  end: number;
}

export function isWhitespace(ch: string): boolean {
  return ch === ' ' || ch === '\t' || ch === '\n' || ch === '\r';
}

function isCloser(ch: string): boolean {
  return ch === ')' || ch === ']';
}

/**
 * Walks `source` character by character, keeping track of whether the cursor is
 * inside a string literal so brackets and escapes there are not mistaken for
 * structure.
 */
class Scanner {
  private inString = false;
  private escaped = false;

  /** Returns true when `ch` is structural (outside any string literal). */
  feed(ch: string): boolean {
    if (this.inString) {
      if (this.escaped) {
        this.escaped = false;
      } else if (ch === '\\') {
        this.escaped = true;
      } else if (ch === '"') {
        this.inString = false;
      }
      return false;
    }
    if (ch === '"') {
      this.inString = true;
      return false;
    }
    return true;
  }
}

/**
 * Checks that `source` is exactly one balanced bracketed form and returns the
 * closer that ends it.
 */
export function checkBalance(source: string): ')' | ']' {
  const expected: string[] = [];
  const scanner = new Scanner();

  for (let i = 0; i < source.length; i++) {
    const ch = source.charAt(i);
    if (!scanner.feed(ch)) continue;

    const closer = CLOSERS[ch];
    if (closer !== undefined) {
      expected.push(closer);
      continue;
    }
    if (!isCloser(ch)) continue;

    if (expected.pop() !== ch) {
      throw new ParseError('UnmatchedBrackets', `unexpected '${ch}' at offset ${i} in ${source}`);
    }
    if (expected.length === 0) {
      if (i !== source.length - 1) {
        throw new ParseError(
          'Malformed',
          `form closes at offset ${i} before the end of ${source}`,
        );
      }
      return ch === ')' ? ')' : ']';
    }
  }

  throw new ParseError('UnmatchedBrackets', `missing '${expected.reverse().join('')}' in ${source}`);
}

/**
 * Splits the interior of a bracketed form on whitespace at nesting depth zero.
 * Whitespace inside a string literal still splits; the parser glues such
 * pieces back together.
 */
export function splitTopLevel(interior: string): Piece[] {
  const pieces: Piece[] = [];
  const scanner = new Scanner();
  let depth = 0;
  let start: number | null = null;

  for (let i = 0; i < interior.length; i++) {
    const ch = interior.charAt(i);
    const structural = scanner.feed(ch);

    if (depth === 0 && isWhitespace(ch)) {
      if (start !== null) {
        pieces.push({ start, end: i });
        start = null;
      }
      continue;
    }

    start ??= i;
    if (!structural) continue;
    if (CLOSERS[ch] !== undefined) depth++;
    else if (isCloser(ch)) depth--;
  }

  if (start !== null) {
    pieces.push({ start, end: interior.length });
  }
  return pieces;
}
