import type { Command } from "commander";
import { describeAge, parseCharacterClasses } from "@etlctl/adapters-common";
import type { PasswordPolicy, SecretVersionInfo } from "@etlctl/adapters-common";
import { ExitCode } from "../exit-codes";
import { SecretLifecycleManager } from "../secrets/secret-lifecycle-manager";
import { action, parsePositiveInt } from "./shared";
import type { ActionContext, CommandDeps } from "./shared";

interface UpdateOptions {
  value?: string;
}

interface RotateOptions {
  length?: number;
  classes?: string;
}

interface ListOptions {
  json?: boolean;
}

function createManager({ config, output, deps }: ActionContext): SecretLifecycleManager {
  const store = deps.factory.secrets(config, output.log);
  return new SecretLifecycleManager({
    secrets: store,
    rotation: store,
    policy: config.passwordPolicy,
    secretNameFor: () => config.secretName,
    log: output.log,
  });
}

export function registerSecretCommands(program: Command, deps: CommandDeps): void {
  program
    .command("get-password")
    .description("Print the latest SQL password")
    .action(
      action(deps, async (context) => {
        const value = await createManager(context).getPassword(context.config.environment);
        context.output.result(value);
        return ExitCode.SUCCESS;
      })
    );

  program
    .command("update-password")
    .description("Store a new SQL password version (from --value, piped stdin, or a prompt)")
    .option("--value <value>", "New password value")
    .action(
      action<UpdateOptions>(deps, async (context, options) => {
        const { prompts } = context.deps;
        const value =
          options.value ?? (await prompts.readPipedInput()) ?? (await prompts.promptNewPassword());

        const { secretName, versionId } = await createManager(context).updatePassword(
          context.config.environment,
          value
        );
        context.output.success(`Added version ${versionId} to ${secretName}`);
        return ExitCode.SUCCESS;
      })
    );

  program
    .command("rotate-password")
    .description("Generate, store and print a new SQL password")
    .option("--length <n>", "Password length", parsePositiveInt)
    .option("--classes <list>", "Required character classes (lower,upper,digit,symbol)")
    .action(
      action<RotateOptions>(deps, async (context, options) => {
        const base = context.config.passwordPolicy;
        const policy: PasswordPolicy = {
          ...base,
          length: options.length ?? base.length,
          classes: options.classes ? parseCharacterClasses(options.classes) : base.classes,
        };

        const { secretName, versionId, value } = await createManager(context).rotatePassword(
          context.config.environment,
          policy
        );
        context.output.result(value);
        context.output.success(`Rotated ${secretName} to version ${versionId}`);
        return ExitCode.SUCCESS;
      })
    );

  program
    .command("list-versions")
    .description("List password versions, oldest first")
    .option("--json", "Print JSON")
    .action(
      action<ListOptions>(deps, async (context, options) => {
        const manager = createManager(context);
        const versions: SecretVersionInfo[] = [];
        for await (const version of manager.listVersions(context.config.environment)) {
          versions.push(version);
        }

        if (options.json) {
          context.output.json(versions);
          return ExitCode.SUCCESS;
        }
        if (versions.length === 0) {
          context.output.warn(`${context.config.secretName} has no versions`);
          return ExitCode.SUCCESS;
        }
        for (const version of versions) {
          context.output.result(
            `${version.id.padStart(4)}  ${version.createdAt.toISOString()}  ${version.state.padEnd(9)}  ${describeAge(version.createdAt)}`
          );
        }

        const rotatedAt = await manager.lastRotated(context.config.environment);
        if (rotatedAt) {
          context.output.dim(`Last rotated ${rotatedAt.toISOString()}`);
        }
        return ExitCode.SUCCESS;
      })
    );
}
