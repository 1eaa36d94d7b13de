import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass, unresolved } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class BigQueryDatasetCheck implements IValidationCheck {
  readonly id = "warehouse";
  readonly name = "BigQuery dataset";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const dataset = context.outputs[OUTPUT_KEYS.bigqueryDataset];
    if (!dataset) {
      return unresolved(OUTPUT_KEYS.bigqueryDataset, context);
    }

    const status = await context.services.warehouse.getDatasetStatus(dataset);
    if (!status.exists) {
      return fail(`Dataset ${dataset} does not exist`);
    }
    return pass(
      status.tableCount === undefined ? dataset : `${dataset} (${status.tableCount} tables)`
    );
  }
}
