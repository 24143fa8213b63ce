export type Quote = 'none' | 'single' | 'eval';

export interface Sym {
  readonly name: string;
  readonly quote: Quote;
  readonly rest: boolean;
}

export function sym(name: string, quote: Quote = 'none', rest = false): Sym {
  return { name, quote, rest };
}

export const INTEGER_MIN = -2147483648;
export const INTEGER_MAX = 2147483647;

export function inIntegerRange(n: number): boolean {
  return Number.isInteger(n) && n >= INTEGER_MIN && n <= INTEGER_MAX;
}

export type Value =
  | { readonly tag: 'Nil' }
  | { readonly tag: 'T' }
  | { readonly tag: 'Integer'; readonly value: number }
  | { readonly tag: 'String'; readonly value: string }
  | { readonly tag: 'Symbol'; readonly symbol: Sym }
  | { readonly tag: 'Funcall'; readonly name: Sym; readonly args: readonly Value[] }
  | { readonly tag: 'List'; readonly elements: readonly Value[] };

export const Value = {
  Nil: (): Value => ({ tag: 'Nil' }),
  T: (): Value => ({ tag: 'T' }),
  Integer: (value: number): Value => ({ tag: 'Integer', value }),
  String: (value: string): Value => ({ tag: 'String', value }),
  Symbol: (symbol: Sym): Value => ({ tag: 'Symbol', symbol }),
  Funcall: (name: Sym, args: readonly Value[]): Value => ({ tag: 'Funcall', name, args }),
  List: (elements: readonly Value[]): Value => ({ tag: 'List', elements }),
  bool: (b: boolean): Value => (b ? { tag: 'T' } : { tag: 'Nil' }),
} as const;
