export type {
  SecretVersionState,
  SecretVersionInfo,
  CreateSecretOptions,
} from "./secret";
export type { LogCallback } from "./logging";
export { noopLog } from "./logging";
export type {
  BucketStatus,
  DatabaseInstanceState,
  DatabaseInstanceStatus,
  ClusterState,
  ClusterStatus,
  DatasetStatus,
  EnvironmentState,
  OrchestrationEnvironmentStatus,
} from "./resource-status";
