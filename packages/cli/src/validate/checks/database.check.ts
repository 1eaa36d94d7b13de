import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass, unresolved } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class DatabaseInstanceCheck implements IValidationCheck {
  readonly id = "database";
  readonly name = "Cloud SQL instance";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const instance = context.outputs[OUTPUT_KEYS.sqlInstance];
    if (!instance) {
      return unresolved(OUTPUT_KEYS.sqlInstance, context);
    }

    const status = await context.services.database.getInstanceStatus(instance);
    if (status.state !== "RUNNABLE") {
      return fail(`${instance} is ${status.state}, expected RUNNABLE`);
    }
    return pass(
      status.databaseVersion ? `${instance} is RUNNABLE (${status.databaseVersion})` : `${instance} is RUNNABLE`
    );
  }
}
