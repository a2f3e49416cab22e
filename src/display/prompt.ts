import { createInterface } from 'node:readline/promises';
import type { ContinuationPredicate } from '../core/simulation.js';

export const CONTINUE_PROMPT = 'Continue to next round? (y/N) ';

export function isAffirmative(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

export interface StdinContinuation {
  shouldContinue: ContinuationPredicate;
  close(): void;
}

/**
 * Stepped-mode predicate that asks on the terminal after each round.
 * Once the input ends (EOF, Ctrl-D) every question answers no.
 */
export function createStdinContinuation(
  input: NodeJS.ReadableStream = process.stdin,
  output: NodeJS.WritableStream = process.stdout
): StdinContinuation {
  const rl = createInterface({ input, output });
  const closed = new AbortController();
  rl.once('close', () => closed.abort());

  return {
    shouldContinue: async ({ round, maxRounds }) => {
      if (closed.signal.aborted) return false;
      try {
        const answer = await rl.question(`[round ${round}/${maxRounds}] ${CONTINUE_PROMPT}`, {
          signal: closed.signal,
        });
        return isAffirmative(answer);
      } catch (error) {
        // A question pending when the input closed is a decline
        if (closed.signal.aborted) return false;
        throw error;
      }
    },
    close: () => rl.close(),
  };
}
