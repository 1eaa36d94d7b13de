import { ClusterControllerClient } from "@google-cloud/dataproc";
import type { ClusterState, ClusterStatus, IClusterStatusService } from "@etlctl/adapters-common";
import { classifyProviderError } from "@etlctl/adapters-common";
import type { GaxCallOptions, GcpClientConfig } from "../config";
import { buildCallOptions, buildClientOptions } from "../config";
import { toKnownState } from "../state";

const CLUSTER_STATES: readonly ClusterState[] = [
  "CREATING",
  "RUNNING",
  "ERROR",
  "ERROR_DUE_TO_UPDATE",
  "DELETING",
  "UPDATING",
  "STOPPING",
  "STOPPED",
  "STARTING",
  "REPAIRING",
];

export interface DataprocServiceConfig extends GcpClientConfig {
  /** Dataproc region (clusters are regional resources) */
  region: string;
  /** Injected client (tests); created from the config when omitted */
  client?: ClusterControllerClient;
}

/**
 * Read-only Dataproc cluster lookups.
 */
export class DataprocService implements IClusterStatusService {
  private readonly client: ClusterControllerClient;
  private readonly projectId: string;
  private readonly region: string;
  private readonly callOptions: GaxCallOptions;

  constructor(config: DataprocServiceConfig) {
    // Dataproc only serves regional clusters from the regional endpoint
    this.client =
      config.client ??
      new ClusterControllerClient(
        buildClientOptions(config, `${config.region}-dataproc.googleapis.com`)
      );
    this.projectId = config.projectId;
    this.region = config.region;
    this.callOptions = buildCallOptions(config);
  }

  async getClusterStatus(clusterName: string): Promise<ClusterStatus> {
    try {
      const [cluster] = await this.client.getCluster(
        { projectId: this.projectId, region: this.region, clusterName },
        this.callOptions
      );

      return {
        name: clusterName,
        state: toKnownState(cluster.status?.state, CLUSTER_STATES, "UNKNOWN"),
        detail: cluster.status?.detail ?? undefined,
      };
    } catch (error) {
      throw classifyProviderError(
        error,
        `Failed to read Dataproc cluster ${clusterName} in ${this.region}`
      );
    }
  }
}
