/**
 * Deployment Validator
 *
 * Resolves infrastructure outputs once, runs every registered check against
 * them and folds the results into a snapshot.
 */

import { errorMessage } from "@etlctl/adapters-common";
import type { IOutputResolver, InfrastructureOutputs } from "../outputs/infrastructure-outputs";
import type { ValidationCheckResult, ValidationServices } from "./check.interface";
import { CheckRegistry } from "./check-registry";
import type { CheckFilter } from "./check-registry";
import { CheckRunner } from "./check-runner";
import type { CheckRunnerOptions, CheckSummary } from "./check-runner";

export interface DeploymentSnapshot {
  project: string;
  environment: string;
  takenAt: Date;
  overall: "pass" | "fail";
  summary: CheckSummary;
  checks: ValidationCheckResult[];
}

export interface DeploymentValidatorOptions extends CheckRunnerOptions {
  projectId: string;
  environment: string;
  secretName: string;
  outputs: IOutputResolver;
  services: ValidationServices;
  registry?: CheckRegistry;
  now?: () => Date;
}

export class DeploymentValidator {
  private readonly runner: CheckRunner;
  private readonly now: () => Date;

  constructor(private readonly options: DeploymentValidatorOptions) {
    this.runner = new CheckRunner(options.registry ?? new CheckRegistry(), options);
    this.now = options.now ?? (() => new Date());
  }

  async validate(filter?: CheckFilter): Promise<DeploymentSnapshot> {
    const takenAt = this.now();

    let outputs: InfrastructureOutputs = {};
    let outputsError: string | undefined;
    try {
      outputs = await this.options.outputs.resolve();
    } catch (error) {
      outputsError = errorMessage(error);
    }

    const checks = await this.runner.runAll(
      {
        projectId: this.options.projectId,
        environment: this.options.environment,
        secretName: this.options.secretName,
        outputs,
        outputsError,
        services: this.options.services,
      },
      filter
    );

    return {
      project: this.options.projectId,
      environment: this.options.environment,
      takenAt,
      overall: checks.some((check) => check.status === "fail") ? "fail" : "pass",
      summary: this.runner.getSummary(checks),
      checks,
    };
  }
}
