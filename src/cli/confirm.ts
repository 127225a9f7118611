import type { Interface } from "node:readline/promises";

import type { ExecutionConfirmation } from "../agent/loop";

const AFFIRMATIVE_ANSWERS = new Set(["y", "yes"]);

export const CONFIRMATION_QUESTION = "Execute this script? [y/N] ";

export function isAffirmativeAnswer(answer: string): boolean {
  return AFFIRMATIVE_ANSWERS.has(answer.trim().toLowerCase());
}

/**
 * Asks the operator before each execution. A closed interface (stdin at EOF,
 * Ctrl+D) counts as a decline.
 */
export function createReadlineConfirmation(rl: Interface): ExecutionConfirmation {
  let closed = false;
  const closedAnswer = new Promise<string>((resolveAnswer) => {
    rl.once("close", () => {
      closed = true;
      resolveAnswer("");
    });
  });

  return async () => {
    if (closed) {
      return false;
    }

    const answer = await Promise.race([
      rl.question(CONFIRMATION_QUESTION).catch((error: unknown) => {
        if (closed) {
          return "";
        }
        throw error;
      }),
      closedAnswer,
    ]);
    return isAffirmativeAnswer(answer);
  };
}
