import { InvalidArgumentError } from "commander";
import type { Command } from "commander";
import { errorMessage } from "@etlctl/adapters-common";
import { resolveConfig } from "../config/env-config";
import type { EtlctlConfig, GlobalFlags } from "../config/env-config";
import { exitCodeFor } from "../exit-codes";
import type { ExitCode } from "../exit-codes";
import type { IOutputService } from "../output/output.interface";
import type { IPromptService } from "../prompts";
import type { ServiceFactory } from "../services";

export interface CommandDeps {
  factory: ServiceFactory;
  createOutput: (verbose: boolean) => IOutputService;
  prompts: IPromptService;
  env: NodeJS.ProcessEnv;
  setExitCode: (code: ExitCode) => void;
}

export interface ActionContext {
  config: EtlctlConfig;
  output: IOutputService;
  deps: CommandDeps;
}

export type ActionHandler<O> = (context: ActionContext, options: O) => Promise<ExitCode>;

function errorName(error: unknown): string {
  return error instanceof Error ? error.name : "Error";
}

/**
 * Wrap a handler as a commander action: resolve configuration from the
 * global flags, run, and turn any error into a red `<Name>: message` line
 * plus the matching exit code.
 */
export function action<O>(deps: CommandDeps, handler: ActionHandler<O>) {
  return async (options: O, command: Command): Promise<void> => {
    const flags = command.optsWithGlobals<GlobalFlags>();
    const output = deps.createOutput(flags.verbose === true);

    try {
      const config = resolveConfig(flags, deps.env);
      deps.setExitCode(await handler({ config, output, deps }, options));
    } catch (error) {
      output.stopSpinner();
      output.error(`${errorName(error)}: ${errorMessage(error)}`);
      deps.setExitCode(exitCodeFor(error));
    }
  };
}

/** Commander argument parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}
