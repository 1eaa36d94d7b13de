import { google, sqladmin_v1 } from "googleapis";
import type {
  DatabaseInstanceState,
  DatabaseInstanceStatus,
  IDatabaseStatusService,
} from "@etlctl/adapters-common";
import { classifyProviderError } from "@etlctl/adapters-common";
import type { GcpClientConfig } from "../config";
import { DEFAULT_CALL_TIMEOUT_MS } from "../config";
import { toKnownState } from "../state";

const SQL_ADMIN_SCOPE = "https://www.googleapis.com/auth/sqlservice.admin";

const INSTANCE_STATES: readonly DatabaseInstanceState[] = [
  "RUNNABLE",
  "SUSPENDED",
  "PENDING_DELETE",
  "PENDING_CREATE",
  "MAINTENANCE",
  "FAILED",
];

export interface CloudSqlServiceConfig extends GcpClientConfig {
  /** Injected client (tests); created from the config when omitted */
  sqladmin?: sqladmin_v1.Sqladmin;
}

/**
 * Read-only Cloud SQL instance lookups through the SQL Admin API.
 */
export class CloudSqlService implements IDatabaseStatusService {
  private readonly sqladmin: sqladmin_v1.Sqladmin;
  private readonly projectId: string;
  private readonly timeout: number;

  constructor(config: CloudSqlServiceConfig) {
    this.projectId = config.projectId;
    this.timeout = config.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS;

    if (config.sqladmin) {
      this.sqladmin = config.sqladmin;
    } else {
      const auth = new google.auth.GoogleAuth({
        projectId: config.projectId,
        keyFile: config.keyFilename,
        credentials: config.credentials,
        scopes: [SQL_ADMIN_SCOPE],
      });
      this.sqladmin = google.sqladmin({ version: "v1", auth });
    }
  }

  async getInstanceStatus(instanceName: string): Promise<DatabaseInstanceStatus> {
    try {
      const response = await this.sqladmin.instances.get(
        { project: this.projectId, instance: instanceName },
        { timeout: this.timeout, retry: false }
      );
      const instance = response.data;
      const privateIp = instance.ipAddresses?.find((ip) => ip.type === "PRIVATE")?.ipAddress;

      return {
        name: instanceName,
        state: toKnownState(instance.state, INSTANCE_STATES, "UNKNOWN"),
        databaseVersion: instance.databaseVersion ?? undefined,
        privateIp: privateIp ?? undefined,
      };
    } catch (error) {
      throw classifyProviderError(error, `Failed to read Cloud SQL instance ${instanceName}`);
    }
  }
}
