import { createInterface } from "node:readline/promises";

export interface Prompter {
  /** Free text answer; an empty answer falls back to `defaultValue`. */
  ask(question: string, defaultValue?: string): Promise<string>;
  /** `[yes/no]` question defaulting to no. */
  confirm(question: string): Promise<boolean>;
}

export class TerminalPrompter implements Prompter {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stdout
  ) {}

  async ask(question: string, defaultValue?: string): Promise<string> {
    const suffix = defaultValue ? ` (${defaultValue})` : "";
    const answer = await this.question(`${question}${suffix}: `);
    return answer.trim() || defaultValue || "";
  }

  async confirm(question: string): Promise<boolean> {
    for (;;) {
      const answer = (await this.question(`${question} [yes/no] (no): `)).trim().toLowerCase();
      if (answer === "" || answer === "no") {
        return false;
      }
      if (answer === "yes") {
        return true;
      }
      this.output.write("Please select one of the available options\n");
    }
  }

  private async question(text: string): Promise<string> {
    const rl = createInterface({ input: this.input, output: this.output });
    try {
      return await rl.question(text);
    } finally {
      rl.close();
    }
  }
}
