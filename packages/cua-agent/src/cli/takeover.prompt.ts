import chalk from 'chalk';
import { createInterface } from 'readline/promises';
import { TakeoverEvent, TakeoverHandler, TakeoverResponse } from '../safety';

const RESPONSES: readonly TakeoverResponse[] = ['abort', 'resume', 'retry'];

const SHORTCUTS = new Map<string, TakeoverResponse>([
  ['a', 'abort'],
  ['r', 'resume'],
  ['t', 'retry'],
]);

export function parseTakeoverResponse(answer: string): TakeoverResponse | null {
  const normalized = answer.trim().toLowerCase();
  return (
    RESPONSES.find((response) => response === normalized) ??
    SHORTCUTS.get(normalized) ??
    null
  );
}

/** Asks on the terminal how to continue after a takeover. */
export function createTerminalTakeoverHandler(): TakeoverHandler {
  return async (event: TakeoverEvent) => {
    const rl = createInterface({ input: process.stdin, output: process.stdout });
    try {
      console.log(chalk.yellow(`\n⚠ Takeover (${event.reason}): ${event.message}`));
      for (;;) {
        const answer = await rl.question('Continue? [a]bort / [r]esume / re[t]ry: ');
        const response = parseTakeoverResponse(answer);
        if (response) {
          return response;
        }
      }
    } finally {
      rl.close();
    }
  };
}
