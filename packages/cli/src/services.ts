import {
  createBigQueryService,
  createCloudSqlService,
  createComposerService,
  createDataprocService,
  createSecretManagerService,
  createStorageService,
} from "@etlctl/adapters-gcp";
import type { GcpConfig } from "@etlctl/adapters-gcp";
import type {
  IObjectStorageService,
  ISecretRotationService,
  ISecretsService,
  LogCallback,
} from "@etlctl/adapters-common";
import type { EtlctlConfig } from "./config/env-config";
import { FileOutputResolver, TerraformOutputResolver } from "./outputs/output-resolvers";
import type { IOutputResolver } from "./outputs/infrastructure-outputs";
import { TerraformCli } from "./terraform/terraform-cli";
import type { ITerraformCli } from "./terraform/terraform-cli";
import type { ValidationServices } from "./validate/check.interface";

/**
 * Builds the collaborators a command needs. Commands only ask for what
 * they use, so get-password never constructs a Dataproc client.
 */
export interface ServiceFactory {
  secrets(config: EtlctlConfig, log: LogCallback): ISecretsService & ISecretRotationService;
  validation(config: EtlctlConfig, log: LogCallback): ValidationServices;
  objectStorage(config: EtlctlConfig, log: LogCallback): IObjectStorageService;
  terraform(config: EtlctlConfig, log: LogCallback): ITerraformCli;
  outputs(config: EtlctlConfig, log: LogCallback): IOutputResolver;
}

function gcpConfig(config: EtlctlConfig, log: LogCallback): GcpConfig {
  return {
    projectId: config.projectId,
    region: config.region,
    keyFilename: config.keyFilename,
    timeoutMs: config.timeoutMs,
    log,
  };
}

export const gcpServiceFactory: ServiceFactory = {
  secrets: (config, log) => createSecretManagerService(gcpConfig(config, log)),

  validation: (config, log) => {
    const gcp = gcpConfig(config, log);
    return {
      secrets: createSecretManagerService(gcp),
      storage: createStorageService(gcp),
      database: createCloudSqlService(gcp),
      cluster: createDataprocService(gcp),
      warehouse: createBigQueryService(gcp),
      orchestration: createComposerService(gcp),
    };
  },

  objectStorage: (config, log) => createStorageService(gcpConfig(config, log)),

  terraform: (config, log) => new TerraformCli({ workingDir: config.terraformDir, log }),

  outputs: (config, log) =>
    config.outputsFile
      ? new FileOutputResolver(config.outputsFile)
      : new TerraformOutputResolver(gcpServiceFactory.terraform(config, log)),
};
