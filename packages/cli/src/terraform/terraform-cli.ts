import { execFile } from "child_process";
import { promisify } from "util";
import { NotFoundError, noopLog, ValidationError } from "@etlctl/adapters-common";
import type { LogCallback } from "@etlctl/adapters-common";

const execFileAsync = promisify(execFile);

/** Terraform state and plan output can be large. */
const MAX_BUFFER = 64 * 1024 * 1024;

export interface CommandResult {
  stdout: string;
  stderr: string;
}

/** Runs an executable with arguments in a working directory. */
export type CommandRunner = (
  command: string,
  args: string[],
  options: { cwd: string }
) => Promise<CommandResult>;

export const execFileRunner: CommandRunner = async (command, args, options) => {
  const { stdout, stderr } = await execFileAsync(command, args, {
    cwd: options.cwd,
    maxBuffer: MAX_BUFFER,
    encoding: "utf8",
  });
  return { stdout, stderr };
};

/** The Terraform operations etlctl needs. */
export interface ITerraformCli {
  /** Parsed `terraform output -json` */
  outputJson(): Promise<unknown>;
  /** Resource addresses from `terraform state list` */
  stateList(): Promise<string[]>;
  stateRm(addresses: string[]): Promise<void>;
  /** Destroy the given addresses, or everything when none are given */
  destroy(targets?: string[]): Promise<void>;
}

export interface TerraformCliOptions {
  workingDir: string;
  runner?: CommandRunner;
  binary?: string;
  log?: LogCallback;
}

function stderrOf(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "stderr" in error) {
    const stderr = error.stderr;
    if (typeof stderr === "string" && stderr.trim()) {
      return stderr.trim();
    }
  }
  return undefined;
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

export class TerraformCli implements ITerraformCli {
  private readonly workingDir: string;
  private readonly runner: CommandRunner;
  private readonly binary: string;
  private readonly log: LogCallback;

  constructor(options: TerraformCliOptions) {
    this.workingDir = options.workingDir;
    this.runner = options.runner ?? execFileRunner;
    this.binary = options.binary ?? "terraform";
    this.log = options.log ?? noopLog;
  }

  async outputJson(): Promise<unknown> {
    const { stdout } = await this.run(["output", "-json"]);
    try {
      return JSON.parse(stdout);
    } catch (error) {
      throw new ValidationError("terraform output -json did not return JSON", { cause: error });
    }
  }

  async stateList(): Promise<string[]> {
    const { stdout } = await this.run(["state", "list"]);
    return stdout
      .split("\n")
      .map((line) => line.trim())
      .filter((line) => line.length > 0);
  }

  async stateRm(addresses: string[]): Promise<void> {
    await this.run(["state", "rm", ...addresses]);
  }

  async destroy(targets: string[] = []): Promise<void> {
    await this.run([
      "destroy",
      "-auto-approve",
      ...targets.map((target) => `-target=${target}`),
    ]);
  }

  private async run(args: string[]): Promise<CommandResult> {
    const command = `${this.binary} ${args.join(" ")}`;
    this.log(`[Terraform] ${command} (in ${this.workingDir})`, "stdout");

    try {
      return await this.runner(this.binary, args, { cwd: this.workingDir });
    } catch (error) {
      if (hasCode(error, "ENOENT")) {
        throw new NotFoundError(`${this.binary} not found on PATH`, { cause: error });
      }
      const detail = stderrOf(error) ?? (error instanceof Error ? error.message : String(error));
      throw new Error(`${command} failed: ${detail}`, { cause: error });
    }
  }
}
