import { BigQuery } from "@google-cloud/bigquery";
import type { DatasetStatus, IWarehouseStatusService } from "@etlctl/adapters-common";
import { classifyProviderError, withDeadline } from "@etlctl/adapters-common";
import type { GcpClientConfig } from "../config";
import { buildClientOptions, DEFAULT_CALL_TIMEOUT_MS } from "../config";

export interface BigQueryServiceConfig extends GcpClientConfig {
  /** Injected client (tests); created from the config when omitted */
  bigquery?: BigQuery;
}

/**
 * Read-only BigQuery dataset lookups.
 */
export class BigQueryService implements IWarehouseStatusService {
  private readonly bigquery: BigQuery;
  private readonly timeout: number;

  constructor(config: BigQueryServiceConfig) {
    this.bigquery =
      config.bigquery ?? new BigQuery({ ...buildClientOptions(config), autoRetry: false });
    this.timeout = config.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;
  }

  async getDatasetStatus(datasetId: string): Promise<DatasetStatus> {
    const dataset = this.bigquery.dataset(datasetId);

    try {
      // Dataset calls take no timeout option
      const [exists] = await withDeadline(
        dataset.exists(),
        this.timeout,
        `BigQuery lookup of ${datasetId}`
      );
      if (!exists) {
        return { id: datasetId, exists: false };
      }

      const [tables] = await withDeadline(
        dataset.getTables(),
        this.timeout,
        `BigQuery table listing of ${datasetId}`
      );
      return { id: datasetId, exists: true, tableCount: tables.length };
    } catch (error) {
      throw classifyProviderError(error, `Failed to read BigQuery dataset ${datasetId}`);
    }
  }
}
