import { NotFoundError } from "@etlctl/adapters-common";
import type {
  BucketStatus,
  ClusterStatus,
  CreateSecretOptions,
  DatabaseInstanceStatus,
  DatasetStatus,
  IObjectStorageService,
  ISecretRotationService,
  ISecretsService,
  LogCallback,
  OrchestrationEnvironmentStatus,
  SecretVersionInfo,
} from "@etlctl/adapters-common";
import type { IOutputService } from "../../output/output.interface";
import type { InfrastructureOutputs, IOutputResolver } from "../../outputs/infrastructure-outputs";
import type { ValidationServices } from "../../validate/check.interface";

// ── Secret store ────────────────────────────────────────────────────────

interface StoredVersion extends SecretVersionInfo {
  value: string;
}

interface StoredSecret {
  versions: StoredVersion[];
  labels: Record<string, string>;
}

/** Secret Manager stand-in; lists newest first like the real API. */
export class InMemorySecretsService implements ISecretsService, ISecretRotationService {
  readonly secrets = new Map<string, StoredSecret>();
  listCalls = 0;
  private clock = Date.UTC(2024, 0, 1);

  async accessLatest(name: string): Promise<string> {
    const secret = this.secrets.get(name);
    const latest = secret?.versions.filter((v) => v.state === "enabled").pop();
    if (!latest) {
      throw new NotFoundError(`Secret ${name} or its latest version does not exist`);
    }
    return latest.value;
  }

  async addVersion(name: string, value: string, options?: CreateSecretOptions): Promise<string> {
    let secret = this.secrets.get(name);
    if (!secret) {
      secret = { versions: [], labels: { ...(options?.labels ?? {}) } };
      this.secrets.set(name, secret);
    }
    const id = String(secret.versions.length + 1);
    this.clock += 60_000;
    secret.versions.push({ id, value, createdAt: new Date(this.clock), state: "enabled" });
    return id;
  }

  listVersions(name: string): AsyncIterable<SecretVersionInfo> {
    const secrets = this.secrets;
    const countCall = () => {
      this.listCalls++;
    };
    return {
      async *[Symbol.asyncIterator]() {
        countCall();
        const secret = secrets.get(name);
        if (!secret) {
          throw new NotFoundError(`Secret ${name} does not exist`);
        }
        for (const { id, createdAt, state } of [...secret.versions].reverse()) {
          yield { id, createdAt, state };
        }
      },
    };
  }

  async secretExists(name: string): Promise<boolean> {
    return this.secrets.has(name);
  }

  async markRotated(secretName: string, rotatedAt: Date): Promise<void> {
    const secret = this.secrets.get(secretName);
    if (!secret) {
      throw new NotFoundError(`Secret ${secretName} does not exist`);
    }
    secret.labels["last-rotated"] = rotatedAt.toISOString();
  }

  async getLastRotated(secretName: string): Promise<Date | undefined> {
    const label = this.secrets.get(secretName)?.labels["last-rotated"];
    return label ? new Date(label) : undefined;
  }
}

// ── Status services ─────────────────────────────────────────────────────

export interface StubState {
  buckets?: string[];
  instances?: Record<string, DatabaseInstanceStatus["state"]>;
  clusters?: Record<string, ClusterStatus["state"]>;
  datasets?: Record<string, number>;
  environments?: Record<string, OrchestrationEnvironmentStatus["state"]>;
}

export function createStubServices(
  state: StubState,
  secrets: InMemorySecretsService = new InMemorySecretsService()
): ValidationServices {
  return {
    secrets,
    storage: {
      getBucketStatus: async (name): Promise<BucketStatus> =>
        state.buckets?.includes(name)
          ? { name, exists: true, location: "US-CENTRAL1", storageClass: "STANDARD" }
          : { name, exists: false },
    },
    database: {
      getInstanceStatus: async (name): Promise<DatabaseInstanceStatus> => {
        const instanceState = state.instances?.[name];
        if (!instanceState) throw new NotFoundError(`Cloud SQL instance ${name} does not exist`);
        return { name, state: instanceState, databaseVersion: "POSTGRES_15" };
      },
    },
    cluster: {
      getClusterStatus: async (name): Promise<ClusterStatus> => {
        const clusterState = state.clusters?.[name];
        if (!clusterState) throw new NotFoundError(`Dataproc cluster ${name} does not exist`);
        return { name, state: clusterState };
      },
    },
    warehouse: {
      getDatasetStatus: async (id): Promise<DatasetStatus> => {
        const tables = state.datasets?.[id];
        return tables === undefined ? { id, exists: false } : { id, exists: true, tableCount: tables };
      },
    },
    orchestration: {
      getEnvironmentStatus: async (name): Promise<OrchestrationEnvironmentStatus> => {
        const environmentState = state.environments?.[name];
        if (!environmentState) throw new NotFoundError(`Composer environment ${name} does not exist`);
        return { name, state: environmentState };
      },
    },
  };
}

export function staticOutputs(outputs: InfrastructureOutputs): IOutputResolver {
  return { resolve: async () => outputs };
}

// ── Object storage ──────────────────────────────────────────────────────

export class RecordingObjectStorage implements IObjectStorageService {
  readonly objects = new Map<string, string>();
  /** Destinations whose upload should fail */
  readonly failOn = new Set<string>();

  async uploadFile(bucket: string, localPath: string, destination: string): Promise<void> {
    if (this.failOn.has(destination)) {
      throw new Error(`upload of ${destination} refused`);
    }
    this.objects.set(`${bucket}/${destination}`, localPath);
  }

  async writeObject(bucket: string, objectName: string, contents: string): Promise<void> {
    this.objects.set(`${bucket}/${objectName}`, contents);
  }

  async listObjects(bucket: string, prefix: string): Promise<string[]> {
    return [...this.objects.keys()]
      .filter((key) => key.startsWith(`${bucket}/${prefix}`))
      .map((key) => key.slice(bucket.length + 1))
      .sort();
  }
}

// ── Output ──────────────────────────────────────────────────────────────

/** Captures what a command printed, without colour or spinners. */
export class RecordingOutput implements IOutputService {
  readonly results: string[] = [];
  readonly status: string[] = [];
  readonly logs: string[] = [];
  readonly jsonValues: unknown[] = [];

  readonly log: LogCallback = (message) => {
    this.logs.push(message);
  };

  header(title: string): void {
    this.status.push(title);
  }
  newline(): void {}
  dim(text: string): void {
    this.status.push(text);
  }
  success(text: string): void {
    this.status.push(`success: ${text}`);
  }
  warn(text: string): void {
    this.status.push(`warn: ${text}`);
  }
  error(text: string): void {
    this.status.push(`error: ${text}`);
  }
  result(text: string): void {
    this.results.push(text);
  }
  json(value: unknown): void {
    this.jsonValues.push(JSON.parse(JSON.stringify(value)));
  }
  startSpinner(): void {}
  stopSpinner(): void {}
}
