import inquirer from "inquirer";
import { ValidationError } from "@etlctl/adapters-common";

/** Interactive and piped input used by commands. */
export interface IPromptService {
  /** Whether stdin is a terminal the user can answer prompts on */
  isInteractive(): boolean;
  /** Piped stdin, or undefined when stdin is a terminal */
  readPipedInput(): Promise<string | undefined>;
  /** Masked password entry with confirmation */
  promptNewPassword(): Promise<string>;
  confirm(message: string): Promise<boolean>;
}

/** Drop one trailing newline added by `echo` or a here-string. */
export function stripTrailingNewline(value: string): string {
  return value.replace(/\r?\n$/, "");
}

export class TerminalPromptService implements IPromptService {
  constructor(private readonly stdin: NodeJS.ReadStream = process.stdin) {}

  isInteractive(): boolean {
    return this.stdin.isTTY === true;
  }

  async readPipedInput(): Promise<string | undefined> {
    if (this.isInteractive()) {
      return undefined;
    }

    const chunks: Buffer[] = [];
    for await (const chunk of this.stdin) {
      chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
    }
    return stripTrailingNewline(Buffer.concat(chunks).toString("utf8"));
  }

  async promptNewPassword(): Promise<string> {
    const { password } = await inquirer.prompt<{ password: string }>([
      {
        type: "password",
        name: "password",
        message: "New password:",
        mask: "*",
        validate: (input: string) => (input.length > 0 ? true : "Password must not be empty"),
      },
    ]);
    const { confirmation } = await inquirer.prompt<{ confirmation: string }>([
      {
        type: "password",
        name: "confirmation",
        message: "Confirm password:",
        mask: "*",
      },
    ]);

    if (password !== confirmation) {
      throw new ValidationError("Passwords do not match");
    }
    return password;
  }

  async confirm(message: string): Promise<boolean> {
    const { confirmed } = await inquirer.prompt<{ confirmed: boolean }>([
      { type: "confirm", name: "confirmed", message, default: false },
    ]);
    return confirmed;
  }
}
