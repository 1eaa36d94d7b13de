import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass, skipped } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class ComposerEnvironmentCheck implements IValidationCheck {
  readonly id = "orchestration";
  readonly name = "Composer environment";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const environment = context.outputs[OUTPUT_KEYS.composerEnvironment];
    if (!environment) {
      return skipped("No Composer environment configured");
    }

    const status = await context.services.orchestration.getEnvironmentStatus(environment);
    if (status.state !== "RUNNING") {
      return fail(`${environment} is ${status.state}, expected RUNNING`);
    }
    return pass(status.airflowUri ? `${environment} is RUNNING (${status.airflowUri})` : `${environment} is RUNNING`);
  }
}
