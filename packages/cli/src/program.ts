import { Command, CommanderError } from "commander";
import chalk from "chalk";
import { registerDestroyCommand } from "./commands/destroy";
import { registerOutputsCommand } from "./commands/outputs";
import { registerSecretCommands } from "./commands/secrets";
import type { CommandDeps } from "./commands/shared";
import { registerUploadCommand } from "./commands/upload";
import { registerValidateCommand } from "./commands/validate";
import { ExitCode, exitCodeFor } from "./exit-codes";
import { ConsoleOutputService } from "./output/console-output.service";
import { TerminalPromptService } from "./prompts";
import { gcpServiceFactory } from "./services";
import type { CheckRegistry } from "./validate/check-registry";
import { ETLCTL_VERSION } from "./version";

export interface ProgramOptions extends Partial<CommandDeps> {
  /** Registry override for validate (tests) */
  registry?: () => CheckRegistry;
}

export function createProgram(deps: CommandDeps, registry?: () => CheckRegistry): Command {
  const program = new Command();

  // Settings below are inherited by subcommands created afterwards
  program
    .name("etlctl")
    .description("Operate the GCP sales ETL stack: SQL password, validation, assets, teardown")
    .version(ETLCTL_VERSION)
    .exitOverride()
    .showHelpAfterError()
    .option("-p, --project <id>", "GCP project ID")
    .option("-e, --environment <name>", "Environment name (dev, staging, prod)")
    .option("-r, --region <region>", "Region for Dataproc and Composer")
    .option("--key-file <path>", "Service account key file (defaults to ADC)")
    .option("--terraform-dir <dir>", "Terraform working directory")
    .option("--outputs-file <path>", "Saved `terraform output -json` file")
    .option("--verbose", "Print progress logs to stderr");

  registerSecretCommands(program, deps);
  registerValidateCommand(program, deps, registry);
  registerOutputsCommand(program, deps);
  registerUploadCommand(program, deps);
  registerDestroyCommand(program, deps);

  return program;
}

/**
 * Parse argv, run the selected command and return the process exit code.
 */
export async function run(argv: string[], options: ProgramOptions = {}): Promise<ExitCode> {
  let exitCode: ExitCode = ExitCode.SUCCESS;

  const deps: CommandDeps = {
    factory: options.factory ?? gcpServiceFactory,
    createOutput: options.createOutput ?? ((verbose) => new ConsoleOutputService({ verbose })),
    prompts: options.prompts ?? new TerminalPromptService(),
    env: options.env ?? process.env,
    setExitCode: (code) => {
      exitCode = code;
      options.setExitCode?.(code);
    },
  };

  try {
    await createProgram(deps, options.registry).parseAsync(argv);
  } catch (error) {
    // Commander has already printed its own usage message
    if (error instanceof CommanderError) {
      return exitCodeFor(error);
    }
    process.stderr.write(`${chalk.red(error instanceof Error ? error.message : String(error))}\n`);
    return ExitCode.FAILURE;
  }
  return exitCode;
}
