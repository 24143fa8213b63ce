import type { Sym, Value } from './value.js';

/** Parameter-descriptor equality: name, quote mode and rest marker all count. */
export function symbolEquals(a: Sym, b: Sym): boolean {
  return a.name === b.name && a.quote === b.quote && a.rest === b.rest;
}

export function valueEquals(a: Value, b: Value): boolean {
  switch (a.tag) {
    case 'Nil':
    case 'T':
      return b.tag === a.tag;
    case 'Integer':
      return b.tag === 'Integer' && a.value === b.value;
    case 'String':
      return b.tag === 'String' && a.value === b.value;
    case 'Symbol':
      return b.tag === 'Symbol' && symbolEquals(a.symbol, b.symbol);
    case 'Funcall':
      return b.tag === 'Funcall' && symbolEquals(a.name, b.name) && listEquals(a.args, b.args);
    case 'List':
      return b.tag === 'List' && listEquals(a.elements, b.elements);
  }
}

function listEquals(xs: readonly Value[], ys: readonly Value[]): boolean {
  if (xs.length !== ys.length) return false;
  return xs.every((x, i) => {
    const y = ys[i];
    return y !== undefined && valueEquals(x, y);
  });
}
