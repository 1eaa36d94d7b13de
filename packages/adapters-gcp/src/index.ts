import type { LogCallback } from "@etlctl/adapters-common";
import { BigQueryService } from "./bigquery/bigquery-service";
import { ComposerService } from "./composer/composer-service";
import type { GcpClientConfig } from "./config";
import { DataprocService } from "./dataproc/dataproc-service";
import { SecretManagerService } from "./secrets/secret-manager-service";
import { CloudSqlService } from "./sql/cloud-sql-service";
import { StorageService } from "./storage/storage-service";

// Re-export classes
export { SecretManagerService } from "./secrets/secret-manager-service";
export { StorageService } from "./storage/storage-service";
export { CloudSqlService } from "./sql/cloud-sql-service";
export { DataprocService } from "./dataproc/dataproc-service";
export { BigQueryService } from "./bigquery/bigquery-service";
export { ComposerService } from "./composer/composer-service";
export { buildClientOptions, DEFAULT_CALL_TIMEOUT_MS } from "./config";
export { toKnownState } from "./state";

// Re-export types
export type { SecretManagerServiceConfig } from "./secrets/secret-manager-service";
export type { StorageServiceConfig } from "./storage/storage-service";
export type { CloudSqlServiceConfig } from "./sql/cloud-sql-service";
export type { DataprocServiceConfig } from "./dataproc/dataproc-service";
export type { BigQueryServiceConfig } from "./bigquery/bigquery-service";
export type { ComposerServiceConfig } from "./composer/composer-service";
export type { GcpClientConfig, GcpClientOptions, ServiceAccountCredentials } from "./config";

/**
 * Configuration for GCP adapters.
 * Provides common configuration options used across all GCP services.
 */
export interface GcpConfig extends GcpClientConfig {
  /** Region for regional services (Dataproc, Composer), e.g. "us-central1" */
  region: string;

  /** Receives adapter progress lines */
  log?: LogCallback;
}

/**
 * Create a secret manager service with the given configuration.
 */
export function createSecretManagerService(config: GcpConfig): SecretManagerService {
  return new SecretManagerService({
    projectId: config.projectId,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
    log: config.log,
  });
}

/**
 * Create a Cloud Storage service with the given configuration.
 */
export function createStorageService(config: GcpConfig): StorageService {
  return new StorageService({
    projectId: config.projectId,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
    log: config.log,
  });
}

/**
 * Create a Cloud SQL status service with the given configuration.
 */
export function createCloudSqlService(config: GcpConfig): CloudSqlService {
  return new CloudSqlService({
    projectId: config.projectId,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Create a Dataproc status service with the given configuration.
 */
export function createDataprocService(config: GcpConfig): DataprocService {
  if (!config.region) {
    throw new Error("region is required for DataprocService");
  }

  return new DataprocService({
    projectId: config.projectId,
    region: config.region,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Create a BigQuery status service with the given configuration.
 */
export function createBigQueryService(config: GcpConfig): BigQueryService {
  return new BigQueryService({
    projectId: config.projectId,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  });
}

/**
 * Create a Composer status service with the given configuration.
 */
export function createComposerService(config: GcpConfig): ComposerService {
  if (!config.region) {
    throw new Error("region is required for ComposerService");
  }

  return new ComposerService({
    projectId: config.projectId,
    region: config.region,
    keyFilename: config.keyFilename,
    credentials: config.credentials,
    timeoutMs: config.timeoutMs,
  });
}
