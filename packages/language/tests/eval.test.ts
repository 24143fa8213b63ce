import { Value, sym } from '@crisp/core';
import { parse } from '@crisp/syntax';
import { describe, expect, it } from 'vitest';
import { Environment, VoidVariableError, createEnvironment, evaluate, isNil } from '../src/index.js';

describe('evaluate', () => {
  it.each([Value.Nil(), Value.T(), Value.Integer(-7), Value.String('text')])(
    'returns self-evaluating atoms unchanged (%o)',
    (atom) => {
      const env = new Environment();
      const once = evaluate(atom, env);
      expect(once).toEqual(atom);
      expect(evaluate(once, env)).toEqual(atom);
    },
  );

  describe('quoting', () => {
    const env = new Environment();
    const bound = Value.Funcall(sym('+'), [Value.Integer(1), Value.Integer(2)]);
    env.topLevel().put('x', bound);
    const withAdd = createEnvironment();
    withAdd.topLevel().put('x', bound);

    it('leaves a single-quoted reference alone', () => {
      expect(evaluate(parse("'x"), env)).toEqual(Value.Symbol(sym('x', 'single')));
    });

    it('resolves an unquoted reference to its value', () => {
      expect(evaluate(parse('x'), env)).toEqual(bound);
    });

    it('evaluates the value of an eval-quoted reference', () => {
      expect(evaluate(parse(',x'), withAdd)).toEqual(Value.Integer(3));
    });

    it('reports unbound names', () => {
      expect(() => evaluate(parse('nope'), env)).toThrow(VoidVariableError);
    });
  });

  it('evaluates list elements into a new list', () => {
    const env = new Environment();
    env.topLevel().put('y', Value.String('why'));
    const list = parse("[y 'y 1]");
    expect(evaluate(list, env)).toEqual(
      Value.List([Value.String('why'), Value.Symbol(sym('y', 'single')), Value.Integer(1)]),
    );
  });

  it('aborts a list on the first failing element', () => {
    const env = createEnvironment();
    expect(() => evaluate(parse("[(set 'seen 1) missing (set 'seen 2)]"), env)).toThrow(
      VoidVariableError,
    );
    expect(env.lookup('seen')).toEqual(Value.Integer(1));
  });
});

describe('isNil', () => {
  it('treats nil, empty lists and empty strings as false', () => {
    expect(isNil(Value.Nil())).toBe(true);
    expect(isNil(Value.List([]))).toBe(true);
    expect(isNil(Value.String(''))).toBe(true);
  });

  it('treats everything else as true, including zero', () => {
    expect(isNil(Value.Integer(0))).toBe(false);
    expect(isNil(Value.T())).toBe(false);
    expect(isNil(Value.String(' '))).toBe(false);
    expect(isNil(Value.List([Value.Nil()]))).toBe(false);
    expect(isNil(Value.Symbol(sym('nil', 'single')))).toBe(false);
  });
});
