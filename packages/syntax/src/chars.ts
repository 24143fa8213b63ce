import { QUOTE_MARKERS, REST_MARKER, type Quote } from '@crisp/core';

const SYMBOL_PUNCTUATION = '!#$%&*+-./:<=>?@^_|~';

export function isSymbolChar(ch: string): boolean {
  return /^[A-Za-z0-9]$/.test(ch) || (ch.length === 1 && SYMBOL_PUNCTUATION.includes(ch));
}

export function quotePrefix(text: string): { quote: Quote; body: string } {
  if (text.startsWith(QUOTE_MARKERS.single)) {
    return { quote: 'single', body: text.slice(QUOTE_MARKERS.single.length) };
  }
  if (text.startsWith(QUOTE_MARKERS.eval)) {
    return { quote: 'eval', body: text.slice(QUOTE_MARKERS.eval.length) };
  }
  return { quote: 'none', body: text };
}

export function restSuffix(body: string): { name: string; rest: boolean } {
  if (body.length > REST_MARKER.length && body.endsWith(REST_MARKER)) {
    return { name: body.slice(0, -REST_MARKER.length), rest: true };
  }
  return { name: body, rest: false };
}

export const ESCAPES: Record<string, string> = {
  '"': '"',
  n: '\n',
  t: '\t',
  '\\': '\\',
};
