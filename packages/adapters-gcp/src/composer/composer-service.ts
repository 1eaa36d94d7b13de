import { EnvironmentsClient } from "@google-cloud/orchestration-airflow";
import type {
  EnvironmentState,
  IOrchestrationStatusService,
  OrchestrationEnvironmentStatus,
} from "@etlctl/adapters-common";
import { classifyProviderError } from "@etlctl/adapters-common";
import type { GaxCallOptions, GcpClientConfig } from "../config";
import { buildCallOptions, buildClientOptions } from "../config";
import { toKnownState } from "../state";

const ENVIRONMENT_STATES: readonly EnvironmentState[] = [
  "CREATING",
  "RUNNING",
  "UPDATING",
  "DELETING",
  "ERROR",
];

export interface ComposerServiceConfig extends GcpClientConfig {
  /** Region (location) of the Composer environment */
  region: string;
  /** Injected client (tests); created from the config when omitted */
  client?: EnvironmentsClient;
}

/**
 * Read-only Cloud Composer environment lookups.
 */
export class ComposerService implements IOrchestrationStatusService {
  private readonly client: EnvironmentsClient;
  private readonly projectId: string;
  private readonly region: string;
  private readonly callOptions: GaxCallOptions;

  constructor(config: ComposerServiceConfig) {
    this.client = config.client ?? new EnvironmentsClient(buildClientOptions(config));
    this.projectId = config.projectId;
    this.region = config.region;
    this.callOptions = buildCallOptions(config);
  }

  async getEnvironmentStatus(environmentName: string): Promise<OrchestrationEnvironmentStatus> {
    const name = `projects/${this.projectId}/locations/${this.region}/environments/${environmentName}`;

    try {
      const [environment] = await this.client.getEnvironment({ name }, this.callOptions);

      return {
        name: environmentName,
        state: toKnownState(environment.state, ENVIRONMENT_STATES, "UNKNOWN"),
        airflowUri: environment.config?.airflowUri ?? undefined,
        dagGcsPrefix: environment.config?.dagGcsPrefix ?? undefined,
      };
    } catch (error) {
      throw classifyProviderError(error, `Failed to read Composer environment ${environmentName}`);
    }
  }
}
