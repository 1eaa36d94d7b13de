import { SecretManagerServiceClient } from "@google-cloud/secret-manager";
import type {
  CreateSecretOptions,
  ISecretRotationService,
  ISecretsService,
  LogCallback,
  SecretVersionInfo,
  SecretVersionState,
} from "@etlctl/adapters-common";
import {
  NotFoundError,
  classifyProviderError,
  formatDateLabel,
  isNotFoundError,
  noopLog,
  parseDateLabel,
  protoTimestampToDate,
  sanitizeSecretName,
} from "@etlctl/adapters-common";
import type { GaxCallOptions, GcpClientConfig } from "../config";
import { buildCallOptions, buildClientOptions } from "../config";

/** gRPC ALREADY_EXISTS: another writer created the secret first */
const GRPC_ALREADY_EXISTS = 6;
/** gRPC FAILED_PRECONDITION: returned when the latest version is disabled or destroyed */
const GRPC_FAILED_PRECONDITION = 9;

const LAST_ROTATED_LABEL = "last-rotated";

export interface SecretManagerServiceConfig extends GcpClientConfig {
  /** Injected client (tests); created from the config when omitted */
  client?: SecretManagerServiceClient;
  log?: LogCallback;
}

function toVersionState(state: unknown): SecretVersionState {
  switch (state) {
    case "DISABLED":
    case 2:
      return "disabled";
    case "DESTROYED":
    case 3:
      return "destroyed";
    default:
      return "enabled";
  }
}

function decodePayload(data: Uint8Array | string | null | undefined): string | undefined {
  if (data === null || data === undefined) {
    return undefined;
  }
  return typeof data === "string" ? data : Buffer.from(data).toString("utf8");
}

function hasGrpcCode(error: unknown, code: number): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === code;
}

/**
 * Service for managing GCP Secret Manager secrets.
 * Every call is a live round trip; nothing is cached between calls.
 */
export class SecretManagerService implements ISecretsService, ISecretRotationService {
  private readonly client: SecretManagerServiceClient;
  private readonly projectId: string;
  private readonly callOptions: GaxCallOptions;
  private readonly log: LogCallback;

  constructor(config: SecretManagerServiceConfig) {
    this.client = config.client ?? new SecretManagerServiceClient(buildClientOptions(config));
    this.projectId = config.projectId;
    this.callOptions = buildCallOptions(config);
    this.log = config.log ?? noopLog;
  }

  /**
   * Read the latest enabled version of a secret.
   *
   * @param name - Secret name (will be sanitized)
   */
  async accessLatest(name: string): Promise<string> {
    const secretPath = `${this.secretPath(name)}/versions/latest`;

    let payload: Uint8Array | string | null | undefined;
    try {
      const [version] = await this.client.accessSecretVersion({ name: secretPath }, this.callOptions);
      payload = version.payload?.data;
    } catch (error) {
      if (isNotFoundError(error)) {
        throw new NotFoundError(`Secret ${name} or its latest version does not exist`, {
          cause: error,
        });
      }
      if (hasGrpcCode(error, GRPC_FAILED_PRECONDITION)) {
        throw new NotFoundError(`Secret ${name} has no enabled version`, { cause: error });
      }
      throw classifyProviderError(error, `Failed to read secret ${name}`);
    }

    const value = decodePayload(payload);
    if (value === undefined) {
      throw new NotFoundError(`Secret ${name} has no payload in its latest version`);
    }
    return value;
  }

  /**
   * Add a new version, creating the secret with automatic replication first
   * if it does not exist yet.
   *
   * @returns Version ID of the new version
   */
  async addVersion(name: string, value: string, options?: CreateSecretOptions): Promise<string> {
    const secretPath = this.secretPath(name);

    try {
      if (!(await this.secretExists(name))) {
        await this.createSecret(name, options);
      }

      const [version] = await this.client.addSecretVersion(
        {
          parent: secretPath,
          payload: { data: Buffer.from(value, "utf8") },
        },
        this.callOptions
      );

      const versionId = version.name?.split("/").pop() ?? "";
      this.log(`[SecretManager] Added version ${versionId} to ${sanitizeSecretName(name)}`, "stdout");
      return versionId;
    } catch (error) {
      throw classifyProviderError(error, `Failed to add a version to secret ${name}`);
    }
  }

  /**
   * List version metadata, newest first (provider order). Pages are fetched
   * lazily as the iterator advances, and every iteration starts over.
   */
  listVersions(name: string): AsyncIterable<SecretVersionInfo> {
    const parent = this.secretPath(name);
    const client = this.client;
    const callOptions = this.callOptions;

    return {
      async *[Symbol.asyncIterator]() {
        try {
          for await (const version of client.listSecretVersionsAsync({ parent }, callOptions)) {
            yield {
              id: version.name?.split("/").pop() ?? "",
              createdAt: protoTimestampToDate(version.createTime),
              state: toVersionState(version.state),
            };
          }
        } catch (error) {
          if (isNotFoundError(error)) {
            throw new NotFoundError(`Secret ${name} does not exist`, { cause: error });
          }
          throw classifyProviderError(error, `Failed to list versions of secret ${name}`);
        }
      },
    };
  }

  /**
   * Check if a secret exists.
   */
  async secretExists(name: string): Promise<boolean> {
    try {
      await this.client.getSecret({ name: this.secretPath(name) }, this.callOptions);
      return true;
    } catch (error) {
      if (isNotFoundError(error)) {
        return false;
      }
      throw classifyProviderError(error, `Failed to look up secret ${name}`);
    }
  }

  /**
   * Update the last-rotated label, preserving the other labels.
   */
  async markRotated(secretName: string, rotatedAt: Date): Promise<void> {
    const secretPath = this.secretPath(secretName);

    try {
      const [secret] = await this.client.getSecret({ name: secretPath }, this.callOptions);
      await this.client.updateSecret(
        {
          secret: {
            name: secretPath,
            labels: {
              ...(secret.labels ?? {}),
              [LAST_ROTATED_LABEL]: formatDateLabel(rotatedAt),
            },
          },
          updateMask: { paths: ["labels"] },
        },
        this.callOptions
      );
    } catch (error) {
      throw classifyProviderError(error, `Failed to label secret ${secretName}`);
    }
  }

  async getLastRotated(secretName: string): Promise<Date | undefined> {
    try {
      const [secret] = await this.client.getSecret(
        { name: this.secretPath(secretName) },
        this.callOptions
      );
      const label = secret.labels?.[LAST_ROTATED_LABEL];
      return label ? parseDateLabel(label) : undefined;
    } catch (error) {
      throw classifyProviderError(error, `Failed to read secret ${secretName}`);
    }
  }

  private async createSecret(name: string, options?: CreateSecretOptions): Promise<void> {
    try {
      await this.client.createSecret(
        {
          parent: `projects/${this.projectId}`,
          secretId: sanitizeSecretName(name),
          secret: {
            replication: { automatic: {} },
            labels: options?.labels,
          },
        },
        this.callOptions
      );
      this.log(`[SecretManager] Created secret ${sanitizeSecretName(name)}`, "stdout");
    } catch (error) {
      // Lost a race with a concurrent first write; the secret is there now
      if (!hasGrpcCode(error, GRPC_ALREADY_EXISTS)) {
        throw error;
      }
    }
  }

  private secretPath(name: string): string {
    return `projects/${this.projectId}/secrets/${sanitizeSecretName(name)}`;
  }
}
