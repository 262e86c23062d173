import { createInterface } from "node:readline";

export interface Prompter {
  ask(question: string, allowed: ReadonlyArray<string>): Promise<string>;
}

/**
 * Prompt the operator on stdin, writing the question to stderr.
 * Resolves with an empty string when stdin closes before an answer arrives.
 */
export async function prompt(message: string): Promise<string> {
  const rl = createInterface({
    input: process.stdin,
    output: process.stderr,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on("close", () => {
      if (!answered) resolve("");
    });
    rl.question(message, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

export const readlinePrompter: Prompter = {
  ask: (question, allowed) => prompt(`${question} [${allowed.join("/")}]: `),
};

/** Answers every question with the same preset reply (`--answer`). */
export function presetPrompter(answer: string): Prompter {
  return {
    async ask() {
      return answer;
    },
  };
}
