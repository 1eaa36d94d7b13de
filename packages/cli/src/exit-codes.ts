import { CommanderError } from "commander";
import { ValidationError } from "@etlctl/adapters-common";

export const ExitCode = {
  SUCCESS: 0,
  FAILURE: 1,
  USAGE: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof CommanderError) {
    return error.code === "commander.helpDisplayed" || error.code === "commander.version"
      ? ExitCode.SUCCESS
      : ExitCode.USAGE;
  }
  return error instanceof ValidationError ? ExitCode.USAGE : ExitCode.FAILURE;
}
