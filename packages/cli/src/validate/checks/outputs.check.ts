import { missingOutputs, REQUIRED_OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class InfrastructureOutputsCheck implements IValidationCheck {
  readonly id = "outputs";
  readonly name = "Infrastructure outputs";

  async run(context: CheckContext): Promise<CheckOutcome> {
    if (context.outputsError) {
      return fail(`Could not resolve infrastructure outputs: ${context.outputsError}`);
    }

    const missing = missingOutputs(context.outputs, REQUIRED_OUTPUT_KEYS);
    if (missing.length > 0) {
      return fail(`Missing outputs: ${missing.join(", ")}`);
    }
    return pass(`${REQUIRED_OUTPUT_KEYS.length} required outputs present`);
  }
}
