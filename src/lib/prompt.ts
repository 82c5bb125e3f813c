import { createInterface, type Interface } from "node:readline";
import { UserAbort } from "./errors";

export const ABORT_TOKEN = "exit";

export interface Prompter {
  /** Resolves with the line typed, or null once input is closed. */
  ask(question: string): Promise<string | null>;
  close(): void;
}

/**
 * Line-queued prompter: lines that arrive before a question is asked (piped
 * input, typing ahead during a long command) wait for the next `ask`.
 */
export class ReadlinePrompter implements Prompter {
  private readonly rl: Interface;
  private readonly lines: string[] = [];
  private closed = false;
  private waiting: ((answer: string | null) => void) | undefined;

  constructor(input: NodeJS.ReadableStream = process.stdin, private readonly output: NodeJS.WritableStream = process.stdout) {
    this.rl = createInterface({ input, output });
    this.rl.on("line", (line) => {
      const waiting = this.waiting;
      this.waiting = undefined;
      if (waiting) waiting(line);
      else this.lines.push(line);
    });
    this.rl.on("close", () => {
      this.closed = true;
      const waiting = this.waiting;
      this.waiting = undefined;
      if (waiting) waiting(null);
    });
  }

  ask(question: string): Promise<string | null> {
    if (this.closed) {
      this.output.write(question);
    } else {
      this.rl.setPrompt(question);
      this.rl.prompt();
    }

    const queued = this.lines.shift();
    if (queued !== undefined) return Promise.resolve(queued);
    if (this.closed) return Promise.resolve(null);
    return new Promise((resolve) => {
      this.waiting = resolve;
    });
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }
}

export class ScriptedPrompter implements Prompter {
  public questions: string[] = [];
  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  close(): void {}
}

export type PromptSpec<T> = {
  question: string;
  /** Returns the accepted value, or undefined to reject the answer and ask again. */
  accept: (answer: string, normalized: string) => T | undefined | Promise<T | undefined>;
  invalidMessage: string;
};

/**
 * Asks until the answer is accepted. The abort token, in any case, throws
 * {@link UserAbort}; so does closed input.
 */
export async function askUntil<T>(prompter: Prompter, spec: PromptSpec<T>): Promise<T> {
  for (;;) {
    const raw = await prompter.ask(spec.question);
    if (raw === null) throw new UserAbort();
    const answer = raw.trim();
    const normalized = answer.toLowerCase();
    if (normalized === ABORT_TOKEN) throw new UserAbort();
    const value = await spec.accept(answer, normalized);
    if (value !== undefined) return value;
    console.log(spec.invalidMessage);
  }
}

export function waitForEnter(prompter: Prompter): Promise<true> {
  return askUntil(prompter, {
    question: "Press Enter to continue, or type 'exit' to quit: ",
    accept: (_answer, normalized) => (normalized === "" ? true : undefined),
    invalidMessage: "Invalid input. Please press Enter or type 'exit'.",
  });
}

export function confirm(prompter: Prompter, question: string): Promise<boolean> {
  return askUntil(prompter, {
    question: `${question} (y/n/exit): `,
    accept: (_answer, normalized) => {
      if (normalized === "y") return true;
      if (normalized === "n") return false;
      return undefined;
    },
    invalidMessage: "Please answer 'y', 'n', or 'exit'.",
  });
}

/** Free text; anything but the abort token is returned as typed (trimmed). */
export async function askInput(prompter: Prompter, question: string): Promise<string> {
  const raw = await prompter.ask(`${question} (or type 'exit'): `);
  if (raw === null) throw new UserAbort();
  const answer = raw.trim();
  if (answer.toLowerCase() === ABORT_TOKEN) throw new UserAbort();
  return answer;
}
