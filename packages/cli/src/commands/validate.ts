import chalk from "chalk";
import type { Command } from "commander";
import { ExitCode } from "../exit-codes";
import type { IOutputService } from "../output/output.interface";
import type { CheckStatus } from "../validate/check.interface";
import type { CheckRegistry } from "../validate/check-registry";
import { DeploymentValidator } from "../validate/deployment-validator";
import type { DeploymentSnapshot } from "../validate/deployment-validator";
import { action } from "./shared";
import type { CommandDeps } from "./shared";

interface ValidateOptions {
  parallel?: boolean;
  json?: boolean;
  check?: string[];
}

const ICONS: Record<CheckStatus, string> = {
  pass: chalk.green("✓"),
  fail: chalk.red("✗"),
  skipped: chalk.gray("○"),
};

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

export function displaySnapshot(output: IOutputService, snapshot: DeploymentSnapshot): void {
  for (const check of snapshot.checks) {
    output.result(
      `${ICONS[check.status]} ${check.name.padEnd(22)} ${check.message} ${chalk.gray(`(${check.durationMs}ms)`)}`
    );
  }
  output.newline();

  const { pass, fail, skipped } = snapshot.summary;
  const line = `${pass} passed, ${fail} failed, ${skipped} skipped`;
  if (snapshot.overall === "pass") {
    output.success(`Deployment ${snapshot.project}/${snapshot.environment} is ready (${line})`);
  } else {
    output.error(`Deployment ${snapshot.project}/${snapshot.environment} is not ready (${line})`);
  }
}

/**
 * @param registry - Optional check registry (for testing with custom checks)
 */
export function registerValidateCommand(
  program: Command,
  deps: CommandDeps,
  registry?: () => CheckRegistry
): void {
  program
    .command("validate")
    .description("Check the deployed environment against live GCP state")
    .option("--parallel", "Run checks concurrently")
    .option("--json", "Print the snapshot as JSON")
    .option("--check <id>", "Only run the given check (repeatable)", collect)
    .action(
      action<ValidateOptions>(deps, async ({ config, output }, options) => {
        const validator = new DeploymentValidator({
          projectId: config.projectId,
          environment: config.environment,
          secretName: config.secretName,
          outputs: deps.factory.outputs(config, output.log),
          services: deps.factory.validation(config, output.log),
          registry: registry?.(),
          parallel: options.parallel,
          timeoutMs: config.checkTimeoutMs,
        });

        if (!options.json) {
          output.header(`Validating ${config.projectId}/${config.environment}`, "🔍");
          output.newline();
        }

        output.startSpinner("Running checks...");
        const snapshot = await validator.validate({ ids: options.check });
        output.stopSpinner();

        if (options.json) {
          output.json(snapshot);
        } else {
          displaySnapshot(output, snapshot);
        }
        return snapshot.overall === "pass" ? ExitCode.SUCCESS : ExitCode.FAILURE;
      })
    );
}
