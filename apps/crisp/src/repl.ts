import { createInterface } from 'node:readline';
import { printValue } from '@crisp/core';
import { type Environment, evalSource } from '@crisp/language';

export const PROMPT = '> ';
const EXIT_KEYWORDS = new Set(['exit', 'quit']);

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}

/** Evaluates one line, rendering either its value or the error it raised. */
export function evalLine(env: Environment, line: string): string {
  try {
    return printValue(evalSource(env, line));
  } catch (error) {
    return describeError(error);
  }
}

export async function runRepl(
  env: Environment,
  input: NodeJS.ReadableStream,
  output: NodeJS.WritableStream,
): Promise<void> {
  const rl = createInterface({ input, terminal: false });
  output.write(PROMPT);

  for await (const line of rl) {
    const command = line.trim();
    if (EXIT_KEYWORDS.has(command)) {
      output.write('Goodbye!\n');
      break;
    }
    if (command !== '') {
      output.write(`${evalLine(env, line)}\n`);
    }
    output.write(PROMPT);
  }
}
