import chalk from "chalk";
import type { Command } from "commander";
import { ValidationError } from "@etlctl/adapters-common";
import { ExitCode } from "../exit-codes";
import { TeardownRunner } from "../destroy/teardown-runner";
import type { TeardownStepStatus } from "../destroy/teardown-runner";
import { action } from "./shared";
import type { CommandDeps } from "./shared";

interface DestroyOptions {
  yes?: boolean;
}

const ICONS: Record<TeardownStepStatus, string> = {
  destroyed: chalk.green("✓"),
  removed: chalk.green("✓"),
  skipped: chalk.gray("○"),
  failed: chalk.red("✗"),
};

export function registerDestroyCommand(program: Command, deps: CommandDeps): void {
  program
    .command("destroy")
    .description("Tear the environment down in dependency order")
    .option("-y, --yes", "Skip the confirmation prompt")
    .action(
      action<DestroyOptions>(deps, async ({ config, output }, options) => {
        if (!options.yes) {
          if (!deps.prompts.isInteractive()) {
            throw new ValidationError("Refusing to destroy without --yes in a non-interactive session");
          }
          const confirmed = await deps.prompts.confirm(
            `Destroy every resource of ${config.projectId}/${config.environment} managed in ${config.terraformDir}? This cannot be undone.`
          );
          if (!confirmed) {
            output.warn("Teardown cancelled");
            return ExitCode.FAILURE;
          }
        }

        output.header(`Tearing down ${config.projectId}/${config.environment}`, "🧹");
        output.newline();

        const runner = new TeardownRunner({
          terraform: deps.factory.terraform(config, output.log),
          onStep: (phase, description) => output.startSpinner(`${phase}: ${description}`),
          log: output.log,
        });
        const report = await runner.run();
        output.stopSpinner();

        for (const step of report.steps) {
          const count = step.addresses.length > 0 ? ` (${step.addresses.length})` : "";
          output.result(`${ICONS[step.status]} ${step.phase}: ${step.description}${count}`);
          if (step.error) {
            output.error(`  ${step.error}`);
          }
        }
        output.newline();

        if (!report.ok) {
          output.error("Teardown stopped; fix the error above and re-run destroy");
          return ExitCode.FAILURE;
        }
        output.success("Environment destroyed");
        return ExitCode.SUCCESS;
      })
    );
}
