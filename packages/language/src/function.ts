import { Value, type Sym } from '@crisp/core';
import type { Closure, Environment } from './env.js';
import { ArgsMismatchError, VoidFunctionError } from './error.js';
import { evaluate, evaluateSequence } from './eval.js';

/** Receives the live environment and the unevaluated argument expressions. */
export type NativeFn = (env: Environment, args: readonly Value[]) => Value;

export type LispFunction =
  | { tag: 'Native'; callback: NativeFn }
  | { tag: 'Defun'; body: readonly Value[]; params: readonly Sym[] };

export const LispFunction = {
  Native: (callback: NativeFn): LispFunction => ({ tag: 'Native', callback }),
  Defun: (body: readonly Value[], params: readonly Sym[]): LispFunction => ({
    tag: 'Defun',
    body,
    params,
  }),
};

/** At most one rest parameter, and only in last position. */
export function validateParams(operation: string, params: readonly Sym[]): void {
  params.forEach((param, i) => {
    if (!param.rest || i === params.length - 1) return;
    const reason = params.slice(i + 1).some((later) => later.rest)
      ? 'more than one rest parameter'
      : `rest parameter ${param.name} must be last`;
    throw new ArgsMismatchError(operation, reason);
  });
}

export function callFunction(env: Environment, name: Sym, args: readonly Value[]): Value {
  const fn = env.getFunction(name.name);
  if (fn === undefined) {
    throw new VoidFunctionError(name.name);
  }

  const frame = env.pushFrame(name.name);
  try {
    switch (fn.tag) {
      case 'Native':
        return fn.callback(env, args);
      case 'Defun': {
        bindArguments(env, frame, name.name, fn.params, args);
        // The body runs directly in the call's own frame.
        return evaluateSequence(fn.body, env);
      }
    }
  } finally {
    env.popFrame();
  }
}

function bindArguments(
  env: Environment,
  frame: Closure,
  operation: string,
  params: readonly Sym[],
  args: readonly Value[],
): void {
  let next = 0;

  // Each parameter is stored before the next argument is evaluated, so later
  // arguments see the parameters bound so far.
  for (const param of params) {
    if (param.rest) {
      const rest = Value.List(args.slice(next));
      frame.put(param.name, param.quote === 'single' ? rest : evaluate(rest, env));
      next = args.length;
      break;
    }

    const arg = args[next];
    if (arg === undefined) {
      throw new ArgsMismatchError(operation, `missing argument for ${param.name}`);
    }
    frame.put(param.name, param.quote === 'single' ? arg : evaluate(arg, env));
    next++;
  }

  if (next < args.length) {
    throw new ArgsMismatchError(
      operation,
      `expected ${params.length} arguments, got ${args.length}`,
    );
  }
}
