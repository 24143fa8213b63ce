import { Value } from '@crisp/core';
import type { Environment } from './env.js';
import { VoidVariableError } from './error.js';
import { callFunction } from './function.js';

export function evaluate(value: Value, env: Environment): Value {
  switch (value.tag) {
    case 'Nil':
    case 'T':
    case 'Integer':
    case 'String':
      return value;

    case 'Symbol': {
      const { symbol } = value;
      if (symbol.quote === 'single') return value;
      const found = env.lookup(symbol.name);
      if (found === undefined) {
        throw new VoidVariableError(symbol.name);
      }
      return symbol.quote === 'eval' ? evaluate(found, env) : found;
    }

    case 'List':
      return Value.List(value.elements.map((element) => evaluate(element, env)));

    case 'Funcall':
      return callFunction(env, value.name, value.args);
  }
}

/** Evaluates forms in order and returns the last result, or Nil for none. */
export function evaluateSequence(forms: readonly Value[], env: Environment): Value {
  let result = Value.Nil();
  for (const form of forms) {
    result = evaluate(form, env);
  }
  return result;
}

/** Nil, the empty list and the empty string are false; everything else is true. */
export function isNil(value: Value): boolean {
  switch (value.tag) {
    case 'Nil':
      return true;
    case 'List':
      return value.elements.length === 0;
    case 'String':
      return value.value.length === 0;
    default:
      return false;
  }
}
