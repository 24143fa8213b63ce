import { readFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import type { Value } from '@crisp/core';
import { ParseError, parse } from '@crisp/syntax';
import { registerBuiltins } from './builtins.js';
import { Environment, type EnvironmentOptions } from './env.js';
import { FileReadError, ReadError } from './error.js';
import { evaluate } from './eval.js';

export function createEnvironment(options: EnvironmentOptions = {}): Environment {
  const env = new Environment(options);
  registerBuiltins(env);
  return env;
}

export function read(source: string): Value {
  try {
    return parse(source);
  } catch (e) {
    if (e instanceof ParseError) throw new ReadError(e);
    throw e;
  }
}

/** Evaluates exactly one form. */
export function evalSource(env: Environment, source: string): Value {
  return evaluate(read(source), env);
}

/** Evaluates any number of top-level forms, in order, as one implicit progn. */
export function evalProgram(env: Environment, source: string): Value {
  return evalSource(env, `(progn\n${source}\n)`);
}

export async function evalFile(env: Environment, path: string): Promise<Value> {
  let source: string;
  try {
    source = await readFile(path, 'utf-8');
  } catch (e) {
    throw new FileReadError(path, e);
  }
  return evalProgram(env, source);
}

export async function evalStream(env: Environment, stream: NodeJS.ReadableStream): Promise<Value> {
  return evalProgram(env, await text(stream));
}
