import { describe, expect, it } from 'vitest';
import { INTEGER_MAX, INTEGER_MIN, Value, inIntegerRange, printValue, sym, symbolEquals, valueEquals } from '../src/index.js';

describe('valueEquals', () => {
  it('compares atoms by tag and payload', () => {
    expect(valueEquals(Value.Integer(3), Value.Integer(3))).toBe(true);
    expect(valueEquals(Value.Integer(3), Value.Integer(4))).toBe(false);
    expect(valueEquals(Value.String('3'), Value.Integer(3))).toBe(false);
    expect(valueEquals(Value.Nil(), Value.Nil())).toBe(true);
    expect(valueEquals(Value.Nil(), Value.T())).toBe(false);
  });

  it('compares nested lists structurally', () => {
    const a = Value.List([Value.Integer(1), Value.List([Value.String('x')])]);
    const b = Value.List([Value.Integer(1), Value.List([Value.String('x')])]);
    const c = Value.List([Value.Integer(1), Value.List([])]);
    expect(valueEquals(a, b)).toBe(true);
    expect(valueEquals(a, c)).toBe(false);
  });

  it('keeps calls and lists apart', () => {
    const call = Value.Funcall(sym('f'), [Value.Integer(1)]);
    const list = Value.List([Value.Symbol(sym('f')), Value.Integer(1)]);
    expect(valueEquals(call, list)).toBe(false);
  });

  it('treats quote mode and rest as part of symbol identity', () => {
    expect(symbolEquals(sym('x'), sym('x'))).toBe(true);
    expect(symbolEquals(sym('x'), sym('x', 'single'))).toBe(false);
    expect(symbolEquals(sym('x', 'single'), sym('x', 'single', true))).toBe(false);
    expect(valueEquals(Value.Symbol(sym('x', 'eval')), Value.Symbol(sym('x', 'eval')))).toBe(true);
  });
});

describe('printValue', () => {
  it('prints atoms', () => {
    expect(printValue(Value.Nil())).toBe('nil');
    expect(printValue(Value.T())).toBe('t');
    expect(printValue(Value.Integer(-42))).toBe('-42');
  });

  it('re-escapes strings', () => {
    expect(printValue(Value.String('say "hi"\n\tback\\slash'))).toBe('"say \\"hi\\"\\n\\tback\\\\slash"');
  });

  it('prints quote prefixes and rest markers', () => {
    expect(printValue(Value.Symbol(sym('a', 'single')))).toBe("'a");
    expect(printValue(Value.Symbol(sym('a', 'eval')))).toBe(',a');
    expect(printValue(Value.Symbol(sym('args', 'single', true)))).toBe("'args...");
  });

  it('prints calls with parentheses and lists with brackets', () => {
    const value = Value.Funcall(sym('+'), [Value.Integer(1), Value.List([Value.T(), Value.List([])])]);
    expect(printValue(value)).toBe('(+ 1 [t []])');
  });
});

describe('inIntegerRange', () => {
  it('accepts the 32-bit signed bounds and nothing past them', () => {
    expect(inIntegerRange(INTEGER_MAX)).toBe(true);
    expect(inIntegerRange(INTEGER_MIN)).toBe(true);
    expect(inIntegerRange(INTEGER_MAX + 1)).toBe(false);
    expect(inIntegerRange(INTEGER_MIN - 1)).toBe(false);
    expect(inIntegerRange(1.5)).toBe(false);
  });
});
