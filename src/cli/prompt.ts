import { createInterface, type Interface } from "node:readline/promises";
import chalk from "chalk";

export interface Choice<T> {
  label: string;
  value: T;
}

/** Everything the session asks the operator. */
export interface OperatorPrompt {
  select<T>(message: string, choices: readonly Choice<T>[]): Promise<T>;
  input(message: string, defaultValue?: string): Promise<string>;
  confirm(message: string, defaultValue?: boolean): Promise<boolean>;
  waitForEnter(message: string): Promise<void>;
  close(): void;
}

/** The operator closed the input (Ctrl+D / Ctrl+C). */
export class PromptClosedError extends Error {
  readonly name = "PromptClosedError" as const;
  constructor() {
    super("Input closed");
  }
}

/** 1-based menu answer to a 0-based index, or null. */
export function parseSelection(answer: string, count: number): number | null {
  const trimmed = answer.trim();
  if (!/^\d+$/.test(trimmed)) return null;
  const n = Number.parseInt(trimmed, 10);
  return n >= 1 && n <= count ? n - 1 : null;
}

export function parseConfirmation(answer: string, defaultValue: boolean): boolean | null {
  const trimmed = answer.trim().toLowerCase();
  if (trimmed === "") return defaultValue;
  if (trimmed === "y" || trimmed === "yes") return true;
  if (trimmed === "n" || trimmed === "no") return false;
  return null;
}

export class ReadlinePrompt implements OperatorPrompt {
  private readonly rl: Interface;
  private closed = false;

  constructor(
    input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout,
  ) {
    this.rl = createInterface({ input, output });
    this.rl.on("close", () => {
      this.closed = true;
    });
  }

  async select<T>(message: string, choices: readonly Choice<T>[]): Promise<T> {
    if (choices.length === 0) throw new Error(`Nothing to choose for "${message}"`);
    this.output.write(`\n${chalk.bold(message)}\n`);
    choices.forEach((choice, i) => {
      this.output.write(`  ${chalk.cyan(String(i + 1).padStart(2))}) ${choice.label}\n`);
    });
    for (;;) {
      const index = parseSelection(await this.ask(`Choose 1-${choices.length}: `), choices.length);
      if (index !== null) return choices[index].value;
      this.output.write(chalk.yellow("Enter one of the numbers above.\n"));
    }
  }

  async input(message: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? chalk.dim(` [${defaultValue}]`) : "";
    const answer = (await this.ask(`${message}${suffix}: `)).trim();
    return answer === "" && defaultValue !== undefined ? defaultValue : answer;
  }

  async confirm(message: string, defaultValue = false): Promise<boolean> {
    const hint = defaultValue ? "Y/n" : "y/N";
    for (;;) {
      const answer = parseConfirmation(await this.ask(`${message} (${hint}) `), defaultValue);
      if (answer !== null) return answer;
      this.output.write(chalk.yellow("Answer y or n.\n"));
    }
  }

  async waitForEnter(message: string): Promise<void> {
    await this.ask(`${chalk.dim(message)}\n`);
  }

  close(): void {
    this.rl.close();
  }

  private ask(query: string): Promise<string> {
    if (this.closed) return Promise.reject(new PromptClosedError());
    return new Promise((resolve, reject) => {
      const onClose = () => reject(new PromptClosedError());
      this.rl.once("close", onClose);
      this.rl.question(query).then(
        (answer) => {
          this.rl.off("close", onClose);
          resolve(answer);
        },
        (err: unknown) => {
          this.rl.off("close", onClose);
          reject(err);
        },
      );
    });
  }
}
