/**
 * Ask a question from the terminal
 * Usage: npm run ask -- "customer cannot reset their password"
 *        npm run ask            (interactive, empty line to quit)
 */

import { createInterface } from 'readline/promises';

import { formatComparison } from '../src/lib/index.js';
import { AI_ACTOR } from '../src/types/index.js';

import { bootstrapEngine } from './engine.js';

const engine = bootstrapEngine();

async function answer(question: string): Promise<void> {
  const result = await engine.learningLoopService.answerQuestion(
    { ...AI_ACTOR, requestId: 'ask-cli' },
    question
  );

  if (!result.success) {
    console.error(`Error: ${result.error.code} ${result.error.message}`);
    return;
  }
  console.log(formatComparison(result.data));
}

async function main(): Promise<void> {
  const question = process.argv.slice(2).join(' ').trim();
  if (question) {
    await answer(question);
    return;
  }

  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    for (;;) {
      const line = (await rl.question('\nQuestion> ')).trim();
      if (!line) {
        break;
      }
      await answer(line);
    }
  } finally {
    rl.close();
  }
}

main().catch((err: unknown) => {
  console.error('ask crashed:', err);
  process.exit(1);
});
