import { Storage } from "@google-cloud/storage";
import type {
  BucketStatus,
  IObjectStorageService,
  IStorageStatusService,
  LogCallback,
} from "@etlctl/adapters-common";
import { classifyProviderError, noopLog } from "@etlctl/adapters-common";
import type { GcpClientConfig } from "../config";
import { buildClientOptions, DEFAULT_CALL_TIMEOUT_MS } from "../config";

export interface StorageServiceConfig extends GcpClientConfig {
  /** Injected client (tests); created from the config when omitted */
  storage?: Storage;
  log?: LogCallback;
}

/**
 * Service for Cloud Storage buckets: existence checks for validation and
 * object writes for asset uploads.
 */
export class StorageService implements IStorageStatusService, IObjectStorageService {
  private readonly storage: Storage;
  private readonly log: LogCallback;

  constructor(config: StorageServiceConfig) {
    this.storage =
      config.storage ??
      new Storage({
        ...buildClientOptions(config),
        timeout: config.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS,
        retryOptions: { autoRetry: false },
      });
    this.log = config.log ?? noopLog;
  }

  async getBucketStatus(bucketName: string): Promise<BucketStatus> {
    const bucket = this.storage.bucket(bucketName);

    try {
      const [exists] = await bucket.exists();
      if (!exists) {
        return { name: bucketName, exists: false };
      }

      const [metadata] = await bucket.getMetadata();
      return {
        name: bucketName,
        exists: true,
        location: metadata.location,
        storageClass: metadata.storageClass,
      };
    } catch (error) {
      throw classifyProviderError(error, `Failed to read bucket ${bucketName}`);
    }
  }

  async uploadFile(bucketName: string, localPath: string, destination: string): Promise<void> {
    try {
      await this.storage.bucket(bucketName).upload(localPath, { destination });
      this.log(`[Storage] Uploaded ${localPath} to gs://${bucketName}/${destination}`, "stdout");
    } catch (error) {
      throw classifyProviderError(error, `Failed to upload ${localPath} to gs://${bucketName}/${destination}`);
    }
  }

  async writeObject(bucketName: string, objectName: string, contents: string): Promise<void> {
    try {
      await this.storage.bucket(bucketName).file(objectName).save(contents);
      this.log(`[Storage] Wrote gs://${bucketName}/${objectName}`, "stdout");
    } catch (error) {
      throw classifyProviderError(error, `Failed to write gs://${bucketName}/${objectName}`);
    }
  }

  async listObjects(bucketName: string, prefix: string): Promise<string[]> {
    try {
      const [files] = await this.storage.bucket(bucketName).getFiles({ prefix });
      return files.map((file) => file.name);
    } catch (error) {
      throw classifyProviderError(error, `Failed to list gs://${bucketName}/${prefix}`);
    }
  }
}
