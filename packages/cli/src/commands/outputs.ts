import type { Command } from "commander";
import { ExitCode } from "../exit-codes";
import { action } from "./shared";
import type { CommandDeps } from "./shared";

interface OutputsOptions {
  json?: boolean;
}

export function registerOutputsCommand(program: Command, deps: CommandDeps): void {
  program
    .command("outputs")
    .description("Print the resolved infrastructure outputs")
    .option("--json", "Print JSON")
    .action(
      action<OutputsOptions>(deps, async ({ config, output }, options) => {
        const outputs = await deps.factory.outputs(config, output.log).resolve();

        if (options.json) {
          output.json(outputs);
          return ExitCode.SUCCESS;
        }

        const keys = Object.keys(outputs).sort();
        if (keys.length === 0) {
          output.warn("No string outputs found; has terraform apply run?");
          return ExitCode.SUCCESS;
        }
        for (const key of keys) {
          output.result(`${key} = ${outputs[key]}`);
        }
        return ExitCode.SUCCESS;
      })
    );
}
