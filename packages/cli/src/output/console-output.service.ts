import chalk from "chalk";
import ora from "ora";
import type { Ora } from "ora";
import type { LogCallback } from "@etlctl/adapters-common";
import type { IOutputService } from "./output.interface";

export interface ConsoleOutputOptions {
  verbose?: boolean;
  stdout?: NodeJS.WriteStream;
  stderr?: NodeJS.WriteStream;
}

export class ConsoleOutputService implements IOutputService {
  private readonly stdout: NodeJS.WriteStream;
  private readonly stderr: NodeJS.WriteStream;
  private readonly verbose: boolean;
  private spinner: Ora | undefined;

  constructor(options: ConsoleOutputOptions = {}) {
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.verbose = options.verbose === true;
  }

  readonly log: LogCallback = (message, stream) => {
    if (stream === "stderr") {
      this.warn(message);
    } else if (this.verbose) {
      this.status(chalk.gray(message));
    }
  };

  header(title: string, icon?: string): void {
    this.status(chalk.blue.bold(icon ? `${icon} ${title}` : title));
  }

  newline(): void {
    this.status("");
  }

  dim(text: string): void {
    this.status(chalk.gray(text));
  }

  success(text: string): void {
    this.status(chalk.green(`✓ ${text}`));
  }

  warn(text: string): void {
    this.status(chalk.yellow(`⚠ ${text}`));
  }

  error(text: string): void {
    this.status(chalk.red(text));
  }

  result(text: string): void {
    this.stdout.write(`${text}\n`);
  }

  json(value: unknown): void {
    this.stdout.write(`${JSON.stringify(value, null, 2)}\n`);
  }

  startSpinner(text: string): void {
    this.stopSpinner();
    this.spinner = ora({ text, stream: this.stderr, isEnabled: this.stderr.isTTY === true }).start();
  }

  stopSpinner(): void {
    this.spinner?.stop();
    this.spinner = undefined;
  }

  private status(line: string): void {
    // Keep the spinner frame off the line being printed
    if (this.spinner?.isSpinning) {
      this.spinner.clear();
      this.stderr.write(`${line}\n`);
      this.spinner.render();
      return;
    }
    this.stderr.write(`${line}\n`);
  }
}
