/**
 * Status snapshots returned by the read-only resource status services.
 * Each carries the provider's raw state string so messages can quote it.
 */

export interface BucketStatus {
  name: string;
  exists: boolean;
  location?: string;
  storageClass?: string;
}

/** Cloud SQL states (sqladmin v1 `DatabaseInstance.state`). */
export type DatabaseInstanceState =
  | "RUNNABLE"
  | "SUSPENDED"
  | "PENDING_DELETE"
  | "PENDING_CREATE"
  | "MAINTENANCE"
  | "FAILED"
  | "UNKNOWN";

export interface DatabaseInstanceStatus {
  name: string;
  state: DatabaseInstanceState;
  databaseVersion?: string;
  privateIp?: string;
}

/** Dataproc cluster states (`ClusterStatus.State`). */
export type ClusterState =
  | "CREATING"
  | "RUNNING"
  | "ERROR"
  | "ERROR_DUE_TO_UPDATE"
  | "DELETING"
  | "UPDATING"
  | "STOPPING"
  | "STOPPED"
  | "STARTING"
  | "REPAIRING"
  | "UNKNOWN";

export interface ClusterStatus {
  name: string;
  state: ClusterState;
  detail?: string;
}

export interface DatasetStatus {
  id: string;
  exists: boolean;
  tableCount?: number;
}

/** Composer environment states (`Environment.State`). */
export type EnvironmentState =
  | "CREATING"
  | "RUNNING"
  | "UPDATING"
  | "DELETING"
  | "ERROR"
  | "UNKNOWN";

export interface OrchestrationEnvironmentStatus {
  name: string;
  state: EnvironmentState;
  airflowUri?: string;
  dagGcsPrefix?: string;
}
