import { Readable, Writable } from 'node:stream';
import { createEnvironment } from '@crisp/language';
import { describe, expect, it } from 'vitest';
import { evalLine, runRepl } from '../src/repl.js';

async function session(lines: string[]): Promise<string> {
  const env = createEnvironment({ print: () => {} });
  const chunks: string[] = [];
  const output = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString('utf-8'));
      callback();
    },
  });
  await runRepl(env, Readable.from([lines.join('\n') + '\n']), output);
  return chunks.join('');
}

describe('evalLine', () => {
  it('prints values in source form', () => {
    const env = createEnvironment();
    expect(evalLine(env, '(cdr [1 "two" \'three])')).toBe('["two" \'three]');
  });

  it('renders errors by name and message', () => {
    const env = createEnvironment();
    expect(evalLine(env, 'ghost')).toBe("VoidVariableError: Symbol's value as variable is void: ghost");
    expect(evalLine(env, '(ghost)')).toBe(
      "VoidFunctionError: Symbol's function definition is void: ghost",
    );
    expect(evalLine(env, '(car 1)')).toBe('ArgsMismatchError: car: expected a list, got 1');
  });

  it('reports parse failures as read errors', () => {
    const env = createEnvironment();
    expect(evalLine(env, '()')).toBe('ReadError: empty function call: ()');
  });
});

describe('runRepl', () => {
  it('evaluates lines until an exit keyword', async () => {
    const transcript = await session(['(+ 1 2)', '', '(car [])', 'quit', '(+ 3 4)']);
    expect(transcript).toBe('> 3\n> > nil\n> Goodbye!\n');
  });

  it('keeps state between lines and continues after errors', async () => {
    const transcript = await session(["(let 'x 5)", 'missing', '(+ x 1)', 'exit']);
    expect(transcript).toBe(
      "> 5\n> VoidVariableError: Symbol's value as variable is void: missing\n> 6\n> Goodbye!\n",
    );
  });

  it('stops quietly at end of input', async () => {
    expect(await session(['t'])).toBe('> t\n> ');
  });
});
