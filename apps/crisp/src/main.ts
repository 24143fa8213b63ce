#!/usr/bin/env tsx
import { createEnvironment, evalFile, evalStream } from '@crisp/language';
import { loadConfig } from './config.js';
import { describeError, runRepl } from './repl.js';

async function main(args: string[]): Promise<void> {
  const config = loadConfig();
  const env = createEnvironment({ maxDepth: config.maxDepth });

  if (args.length === 0) {
    await runRepl(env, process.stdin, process.stdout);
    return;
  }

  for (const file of args) {
    if (file === '-') {
      await evalStream(env, process.stdin);
    } else {
      await evalFile(env, file);
    }
  }
}

main(process.argv.slice(2)).catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});
