import chalk from "chalk";
import type { Command } from "commander";
import { ExitCode } from "../exit-codes";
import { AssetUploader } from "../upload/asset-uploader";
import type { UploadStatus } from "../upload/asset-uploader";
import { action } from "./shared";
import type { CommandDeps } from "./shared";

interface UploadOptions {
  source: string;
}

const ICONS: Record<UploadStatus, string> = {
  uploaded: chalk.green("✓"),
  skipped: chalk.gray("○"),
  missing: chalk.yellow("⚠"),
  failed: chalk.red("✗"),
};

export function registerUploadCommand(program: Command, deps: CommandDeps): void {
  program
    .command("upload")
    .description("Upload ETL assets (data, jars, jobs, DAG, docs) to the stack's buckets")
    .option("--source <dir>", "Directory holding the assets", ".")
    .action(
      action<UploadOptions>(deps, async ({ config, output }, options) => {
        const uploader = new AssetUploader({
          storage: deps.factory.objectStorage(config, output.log),
          outputs: deps.factory.outputs(config, output.log),
          sourceDir: options.source,
          log: output.log,
        });

        output.header(`Uploading assets for ${config.projectId}/${config.environment}`, "📦");
        output.newline();
        output.startSpinner("Uploading...");
        const report = await uploader.run();
        output.stopSpinner();

        for (const result of report.results) {
          output.result(`${ICONS[result.status]} ${result.label.padEnd(20)} ${result.detail}`);
        }

        output.newline();
        output.dim("Bucket contents:");
        for (const listing of report.listings) {
          if (listing.error) {
            output.warn(`${listing.location}: ${listing.error}`);
            continue;
          }
          output.dim(`  ${listing.location} (${listing.objects.length} objects)`);
          for (const object of listing.objects) {
            output.dim(`    ${object}`);
          }
        }
        output.newline();

        if (!report.ok) {
          output.error("Upload incomplete: required assets are missing or failed");
          return ExitCode.FAILURE;
        }
        output.success(`Assets uploaded to gs://${report.dataBucket} and ${report.composerLocation}`);
        return ExitCode.SUCCESS;
      })
    );
}
