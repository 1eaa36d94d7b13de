export { InfrastructureOutputsCheck } from "./outputs.check";
export { StorageBucketCheck } from "./storage.check";
export { SecretCheck } from "./secret.check";
export { DatabaseInstanceCheck } from "./database.check";
export { DataprocClusterCheck } from "./compute.check";
export { BigQueryDatasetCheck } from "./warehouse.check";
export { ComposerEnvironmentCheck } from "./orchestration.check";
