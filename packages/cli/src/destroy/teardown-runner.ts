/**
 * Ordered Teardown
 *
 * Destroys Terraform-managed resources phase by phase, re-reading state
 * before each step and stopping at the first failure.
 */

import { errorMessage, noopLog } from "@etlctl/adapters-common";
import type { LogCallback } from "@etlctl/adapters-common";
import type { ITerraformCli } from "../terraform/terraform-cli";
import { resourceTypeOf, TEARDOWN_PHASES } from "./teardown-plan";
import type { TeardownPhase, TeardownStep } from "./teardown-plan";

export type TeardownStepStatus = "destroyed" | "removed" | "skipped" | "failed";

export interface TeardownStepResult {
  phase: string;
  description: string;
  status: TeardownStepStatus;
  addresses: string[];
  error?: string;
}

export interface TeardownReport {
  steps: TeardownStepResult[];
  ok: boolean;
}

export const FINAL_PHASE = "Final cleanup";

export interface TeardownRunnerOptions {
  terraform: ITerraformCli;
  phases?: readonly TeardownPhase[];
  /** Called before each step so callers can show progress */
  onStep?: (phase: string, description: string) => void;
  log?: LogCallback;
}

export class TeardownRunner {
  private readonly terraform: ITerraformCli;
  private readonly phases: readonly TeardownPhase[];
  private readonly onStep: (phase: string, description: string) => void;
  private readonly log: LogCallback;

  constructor(options: TeardownRunnerOptions) {
    this.terraform = options.terraform;
    this.phases = options.phases ?? TEARDOWN_PHASES;
    this.onStep = options.onStep ?? (() => undefined);
    this.log = options.log ?? noopLog;
  }

  async run(): Promise<TeardownReport> {
    const steps: TeardownStepResult[] = [];

    for (const phase of this.phases) {
      for (const step of phase.steps) {
        const result = await this.runStep(phase.name, step);
        steps.push(result);
        if (result.status === "failed") {
          return { steps, ok: false };
        }
      }
    }

    const final = await this.runFinal();
    steps.push(final);
    return { steps, ok: final.status !== "failed" };
  }

  private async runStep(phase: string, step: TeardownStep): Promise<TeardownStepResult> {
    this.onStep(phase, step.description);
    let addresses: string[] = [];

    try {
      addresses = (await this.terraform.stateList()).filter(
        (address) => resourceTypeOf(address) === step.resourceType
      );
      if (addresses.length === 0) {
        this.log(`[Teardown] ${step.description}: nothing in state`, "stdout");
        return { phase, description: step.description, status: "skipped", addresses };
      }

      if (step.action === "state-rm") {
        await this.terraform.stateRm(addresses);
        return { phase, description: step.description, status: "removed", addresses };
      }
      await this.terraform.destroy(addresses);
      return { phase, description: step.description, status: "destroyed", addresses };
    } catch (error) {
      return {
        phase,
        description: step.description,
        status: "failed",
        addresses,
        error: errorMessage(error),
      };
    }
  }

  private async runFinal(): Promise<TeardownStepResult> {
    const description = "Remaining resources";
    this.onStep(FINAL_PHASE, description);

    try {
      const remaining = await this.terraform.stateList();
      if (remaining.length === 0) {
        return { phase: FINAL_PHASE, description, status: "skipped", addresses: [] };
      }
      await this.terraform.destroy();
      return { phase: FINAL_PHASE, description, status: "destroyed", addresses: remaining };
    } catch (error) {
      return { phase: FINAL_PHASE, description, status: "failed", addresses: [], error: errorMessage(error) };
    }
  }
}
