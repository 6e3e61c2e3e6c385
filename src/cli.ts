#!/usr/bin/env node
import 'dotenv/config';
import * as readline from 'readline/promises';
import { InputClosedError, runMenu, type MenuIO } from './cli/menu.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { createServices } from './services.js';

function createTerminalIO(rl: readline.Interface): MenuIO {
  const closed = new AbortController();
  rl.once('close', () => closed.abort());

  return {
    async ask(question) {
      if (closed.signal.aborted) throw new InputClosedError();
      try {
        const answer = await rl.question(question, { signal: closed.signal });
        return answer.trim();
      } catch (err) {
        if (closed.signal.aborted) throw new InputClosedError();
        throw err;
      }
    },
    print(line) {
      console.log(line);
    },
  };
}

async function main(): Promise<void> {
  const content = createServices(loadConfig());
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

  try {
    await runMenu(content, createTerminalIO(rl));
  } finally {
    rl.close();
  }
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error(`❌ Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  },
);
