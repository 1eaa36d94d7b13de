import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass, unresolved } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class StorageBucketCheck implements IValidationCheck {
  readonly id = "storage";
  readonly name = "Data bucket";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const bucket = context.outputs[OUTPUT_KEYS.dataBucket];
    if (!bucket) {
      return unresolved(OUTPUT_KEYS.dataBucket, context);
    }

    const status = await context.services.storage.getBucketStatus(bucket);
    if (!status.exists) {
      return fail(`Bucket gs://${bucket} does not exist`);
    }

    const details = [status.location, status.storageClass].filter(Boolean).join(", ");
    return pass(details ? `gs://${bucket} (${details})` : `gs://${bucket}`);
  }
}
