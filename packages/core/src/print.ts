import type { Sym, Value } from './value.js';

export const QUOTE_MARKERS = { single: "'", eval: ',' } as const;
export const REST_MARKER = '...';

export function printSymbol(symbol: Sym): string {
  const prefix = symbol.quote === 'none' ? '' : QUOTE_MARKERS[symbol.quote];
  return `${prefix}${symbol.name}${symbol.rest ? REST_MARKER : ''}`;
}

export function printValue(value: Value): string {
  switch (value.tag) {
    case 'Nil':
      return 'nil';
    case 'T':
      return 't';
    case 'Integer':
      return String(value.value);
    case 'String':
      return `"${escapeString(value.value)}"`;
    case 'Symbol':
      return printSymbol(value.symbol);
    case 'Funcall':
      return `(${[printSymbol(value.name), ...value.args.map(printValue)].join(' ')})`;
    case 'List':
      return `[${value.elements.map(printValue).join(' ')}]`;
  }
}

function escapeString(s: string): string {
  let out = '';
  for (const ch of s) {
    switch (ch) {
      case '\\':
        out += '\\\\';
        break;
      case '"':
        out += '\\"';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\t':
        out += '\\t';
        break;
      default:
        out += ch;
    }
  }
  return out;
}
