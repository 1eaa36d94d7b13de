import type {
  BucketStatus,
  ClusterStatus,
  DatabaseInstanceStatus,
  DatasetStatus,
  OrchestrationEnvironmentStatus,
} from "../types/resource-status";

/**
 * Read-only status lookups, one per infrastructure category.
 * Missing resources are reported through the returned status where the
 * provider has an existence check (buckets, datasets) and as NotFoundError
 * otherwise.
 */

export interface IStorageStatusService {
  getBucketStatus(bucketName: string): Promise<BucketStatus>;
}

export interface IDatabaseStatusService {
  getInstanceStatus(instanceName: string): Promise<DatabaseInstanceStatus>;
}

export interface IClusterStatusService {
  getClusterStatus(clusterName: string): Promise<ClusterStatus>;
}

export interface IWarehouseStatusService {
  getDatasetStatus(datasetId: string): Promise<DatasetStatus>;
}

export interface IOrchestrationStatusService {
  getEnvironmentStatus(environmentName: string): Promise<OrchestrationEnvironmentStatus>;
}
