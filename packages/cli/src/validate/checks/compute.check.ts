import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass, skipped } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

/** Clusters may be ephemeral, so an unconfigured one is skipped. */
export class DataprocClusterCheck implements IValidationCheck {
  readonly id = "compute";
  readonly name = "Dataproc cluster";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const cluster = context.outputs[OUTPUT_KEYS.dataprocCluster];
    if (!cluster) {
      return skipped("No Dataproc cluster configured");
    }

    const status = await context.services.cluster.getClusterStatus(cluster);
    if (status.state !== "RUNNING") {
      const detail = status.detail ? `: ${status.detail}` : "";
      return fail(`${cluster} is ${status.state}, expected RUNNING${detail}`);
    }
    return pass(`${cluster} is RUNNING`);
  }
}
