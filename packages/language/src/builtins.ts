import { Value, inIntegerRange, printValue, valueEquals, type Sym } from '@crisp/core';
import type { Environment } from './env.js';
import { ArgsMismatchError } from './error.js';
import { evaluate, evaluateSequence, isNil } from './eval.js';
import { LispFunction, validateParams, type NativeFn } from './function.js';

function arityError(operation: string, args: readonly Value[], min: number, max: number): ArgsMismatchError {
  const expected = max === min ? `${min}` : max === Infinity ? `at least ${min}` : `${min} to ${max}`;
  return new ArgsMismatchError(operation, `expected ${expected} arguments, got ${args.length}`);
}

function arity(operation: string, args: readonly Value[], min: number, max = Infinity): void {
  if (args.length < min || args.length > max) {
    throw arityError(operation, args, min, max);
  }
}

function integerOf(operation: string, value: Value): number {
  if (value.tag !== 'Integer') {
    throw new ArgsMismatchError(operation, `expected an integer, got ${printValue(value)}`);
  }
  return value.value;
}

function checked(operation: string, n: number): number {
  if (!inIntegerRange(n)) {
    throw new ArgsMismatchError(operation, 'integer overflow');
  }
  return Object.is(n, -0) ? 0 : n;
}

function symbolOf(operation: string, value: Value): Sym {
  if (value.tag !== 'Symbol') {
    throw new ArgsMismatchError(operation, `expected a symbol, got ${printValue(value)}`);
  }
  return value.symbol;
}

function listOf(operation: string, value: Value): readonly Value[] {
  if (value.tag !== 'List') {
    throw new ArgsMismatchError(operation, `expected a list, got ${printValue(value)}`);
  }
  return value.elements;
}

/** Evaluates a `(symbol-expr value-expr)` pair into a name and a value. */
function binding(operation: string, env: Environment, args: readonly Value[]): [string, Value] {
  const [target, expr] = args;
  if (args.length !== 2 || target === undefined || expr === undefined) {
    throw arityError(operation, args, 2, 2);
  }
  const name = symbolOf(operation, evaluate(target, env)).name;
  return [name, evaluate(expr, env)];
}

function integers(operation: string, env: Environment, args: readonly Value[]): number[] {
  return args.map((arg) => integerOf(operation, evaluate(arg, env)));
}

function integerFold(operation: string, step: (acc: number, n: number) => number): NativeFn {
  return (env, args) => {
    arity(operation, args, 1);
    const result = integers(operation, env, args).reduce((acc, n) => checked(operation, step(acc, n)));
    return Value.Integer(result);
  };
}

function comparison(operation: string, holds: (a: number, b: number) => boolean): NativeFn {
  return (env, args) => {
    arity(operation, args, 2);
    let previous: number | null = null;
    for (const n of integers(operation, env, args)) {
      if (previous !== null && !holds(previous, n)) return Value.Nil();
      previous = n;
    }
    return Value.T();
  };
}

const evalProgn: NativeFn = (env, args) => evaluateSequence(args, env);

const evalIf: NativeFn = (env, args) => {
  const [condition, then, ...otherwise] = args;
  if (condition === undefined || then === undefined) {
    throw arityError('if', args, 2, Infinity);
  }
  if (!isNil(evaluate(condition, env))) {
    return evaluate(then, env);
  }
  return evalProgn(env, otherwise);
};

const evalWhen: NativeFn = (env, args) => {
  const [condition, ...body] = args;
  if (condition === undefined || body.length === 0) {
    throw arityError('when', args, 2, Infinity);
  }
  return isNil(evaluate(condition, env)) ? Value.Nil() : evalProgn(env, body);
};

const evalWhile: NativeFn = (env, args) => {
  const [condition, ...body] = args;
  if (condition === undefined || body.length === 0) {
    throw arityError('while', args, 2, Infinity);
  }
  while (!isNil(evaluate(condition, env))) {
    evalProgn(env, body);
  }
  return Value.Nil();
};

const evalLet: NativeFn = (env, args) => {
  const [name, value] = binding('let', env, args);
  env.caller().put(name, value);
  return value;
};

const evalSet: NativeFn = (env, args) => {
  const [name, value] = binding('set', env, args);
  (env.findClosure(name) ?? env.topLevel()).put(name, value);
  return value;
};

const evalDefun: NativeFn = (env, args) => {
  const [nameExpr, paramsExpr, ...body] = args;
  if (nameExpr === undefined || paramsExpr === undefined) {
    throw arityError('defun', args, 2, Infinity);
  }
  const name = symbolOf('defun', nameExpr).name;
  const params = listOf('defun', paramsExpr).map((param) => symbolOf('defun', param));
  validateParams('defun', params);
  env.defineFunction(name, LispFunction.Defun(body, params));
  return Value.Nil();
};

const evalDebug: NativeFn = (env, args) => {
  let last = Value.Nil();
  for (const arg of args) {
    last = evaluate(arg, env);
    env.print(printValue(last));
  }
  return last;
};

const evalEq: NativeFn = (env, args) => {
  const [first, ...rest] = args.map((arg) => evaluate(arg, env));
  if (first === undefined) {
    throw arityError('=', args, 1, Infinity);
  }
  return Value.bool(rest.every((value) => valueEquals(first, value)));
};

const evalNeq: NativeFn = (env, args) => Value.bool(isNil(evalEq(env, args)));

const subtract = integerFold('-', (a, b) => a - b);

const evalSubtract: NativeFn = (env, args) => {
  const [only] = args;
  if (args.length === 1 && only !== undefined) {
    return Value.Integer(checked('-', -integerOf('-', evaluate(only, env))));
  }
  return subtract(env, args);
};

function listArg(operation: string, env: Environment, args: readonly Value[]): readonly Value[] {
  const [list] = args;
  if (args.length !== 1 || list === undefined) {
    throw arityError(operation, args, 1, 1);
  }
  return listOf(operation, evaluate(list, env));
}

const evalCar: NativeFn = (env, args) => listArg('car', env, args)[0] ?? Value.Nil();

const evalCdr: NativeFn = (env, args) => Value.List(listArg('cdr', env, args).slice(1));

export const BUILTINS: Readonly<Record<string, NativeFn>> = {
  progn: evalProgn,
  debug: evalDebug,
  if: evalIf,
  when: evalWhen,
  while: evalWhile,
  let: evalLet,
  set: evalSet,
  defun: evalDefun,
  '=': evalEq,
  '/=': evalNeq,
  '<': comparison('<', (a, b) => a < b),
  '>': comparison('>', (a, b) => a > b),
  '+': integerFold('+', (a, b) => a + b),
  '-': evalSubtract,
  '*': integerFold('*', (a, b) => a * b),
  '/': integerFold('/', (a, b) => {
    if (b === 0) throw new ArgsMismatchError('/', 'division by zero');
    return Math.trunc(a / b);
  }),
  car: evalCar,
  cdr: evalCdr,
};

export function registerBuiltins(env: Environment): void {
  for (const [name, callback] of Object.entries(BUILTINS)) {
    env.defineFunction(name, LispFunction.Native(callback));
  }
}
