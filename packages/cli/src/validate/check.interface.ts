import type {
  IClusterStatusService,
  IDatabaseStatusService,
  IOrchestrationStatusService,
  ISecretsService,
  IStorageStatusService,
  IWarehouseStatusService,
} from "@etlctl/adapters-common";
import type { InfrastructureOutputs } from "../outputs/infrastructure-outputs";

export type CheckStatus = "pass" | "fail" | "skipped";

export interface CheckOutcome {
  status: CheckStatus;
  message: string;
}

export interface ValidationCheckResult extends CheckOutcome {
  id: string;
  name: string;
  durationMs: number;
}

/** Read-only status services the checks query. */
export interface ValidationServices {
  secrets: ISecretsService;
  storage: IStorageStatusService;
  database: IDatabaseStatusService;
  cluster: IClusterStatusService;
  warehouse: IWarehouseStatusService;
  orchestration: IOrchestrationStatusService;
}

export interface CheckContext {
  projectId: string;
  environment: string;
  /** Default secret name when outputs don't name one */
  secretName: string;
  /** Resolved once per validation run */
  outputs: InfrastructureOutputs;
  /** Why outputs could not be resolved, if they could not */
  outputsError?: string;
  services: ValidationServices;
}

/**
 * A read-only check against one resource. Returning `fail` and throwing
 * `CheckFailure` are equivalent; any other error is reported with its name.
 */
export interface IValidationCheck {
  readonly id: string;
  readonly name: string;
  run(context: CheckContext): Promise<CheckOutcome>;
}

export const pass = (message: string): CheckOutcome => ({ status: "pass", message });
export const fail = (message: string): CheckOutcome => ({ status: "fail", message });
export const skipped = (message: string): CheckOutcome => ({ status: "skipped", message });

/** Fail message for a required identifier that was not resolved. */
export function unresolved(key: string, context: CheckContext): CheckOutcome {
  const reason = context.outputsError ? ` (${context.outputsError})` : "";
  return fail(`${key} is not set in infrastructure outputs${reason}`);
}
