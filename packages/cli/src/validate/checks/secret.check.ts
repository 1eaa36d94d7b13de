import { OUTPUT_KEYS } from "../../outputs/infrastructure-outputs";
import { fail, pass } from "../check.interface";
import type { CheckContext, CheckOutcome, IValidationCheck } from "../check.interface";

export class SecretCheck implements IValidationCheck {
  readonly id = "secret";
  readonly name = "SQL password secret";

  async run(context: CheckContext): Promise<CheckOutcome> {
    const secretName = context.outputs[OUTPUT_KEYS.sqlPasswordSecret] ?? context.secretName;
    const secrets = context.services.secrets;

    if (!(await secrets.secretExists(secretName))) {
      return fail(`Secret ${secretName} does not exist`);
    }

    let total = 0;
    let enabled = 0;
    for await (const version of secrets.listVersions(secretName)) {
      total++;
      if (version.state === "enabled") enabled++;
    }

    if (total === 0) {
      return fail(`Secret ${secretName} has no versions`);
    }
    if (enabled === 0) {
      return fail(`Secret ${secretName} has ${total} version(s) but none is enabled`);
    }
    return pass(`${secretName} has ${total} version(s), ${enabled} enabled`);
  }
}
