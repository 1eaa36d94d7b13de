/**
 * Secret Lifecycle Manager
 *
 * Reads, updates, rotates and lists the Cloud SQL password for an
 * environment. Every call is a live round trip; retries are left to the caller.
 */

import {
  DEFAULT_PASSWORD_POLICY,
  ValidationError,
  errorMessage,
  generatePassword,
  missingCharacterClasses,
  noopLog,
  sanitizeLabel,
  secretNameForEnvironment,
  validatePasswordPolicy,
} from "@etlctl/adapters-common";
import type {
  ISecretRotationService,
  ISecretsService,
  LogCallback,
  PasswordPolicy,
  SecretVersionInfo,
} from "@etlctl/adapters-common";

export interface SecretLifecycleManagerOptions {
  secrets: ISecretsService;
  /** Records rotation time on the secret; rotation still succeeds without it */
  rotation?: ISecretRotationService;
  policy?: PasswordPolicy;
  /** Maps an environment to its secret name (defaults to `<env>-sql-password`) */
  secretNameFor?: (environment: string) => string;
  generate?: (policy: PasswordPolicy) => string;
  now?: () => Date;
  log?: LogCallback;
}

export interface UpdateResult {
  secretName: string;
  versionId: string;
}

export interface RotationResult extends UpdateResult {
  value: string;
}

export const MANAGED_BY_LABEL = "etlctl";

function versionNumber(version: SecretVersionInfo): number {
  const parsed = Number.parseInt(version.id, 10);
  return Number.isNaN(parsed) ? Number.MAX_SAFE_INTEGER : parsed;
}

function byCreationOrder(a: SecretVersionInfo, b: SecretVersionInfo): number {
  return versionNumber(a) - versionNumber(b) || a.createdAt.getTime() - b.createdAt.getTime();
}

export class SecretLifecycleManager {
  private readonly secrets: ISecretsService;
  private readonly rotation: ISecretRotationService | undefined;
  private readonly policy: PasswordPolicy;
  private readonly secretNameFor: (environment: string) => string;
  private readonly generate: (policy: PasswordPolicy) => string;
  private readonly now: () => Date;
  private readonly log: LogCallback;

  constructor(options: SecretLifecycleManagerOptions) {
    this.secrets = options.secrets;
    this.rotation = options.rotation;
    this.policy = options.policy ?? DEFAULT_PASSWORD_POLICY;
    this.secretNameFor = options.secretNameFor ?? secretNameForEnvironment;
    this.generate = options.generate ?? ((policy) => generatePassword(policy));
    this.now = options.now ?? (() => new Date());
    this.log = options.log ?? noopLog;
  }

  /**
   * Latest password for the environment.
   *
   * @throws NotFoundError when the secret or an enabled version is missing
   */
  async getPassword(environment: string): Promise<string> {
    return this.secrets.accessLatest(this.secretNameFor(environment));
  }

  /**
   * Append a new version. The secret is created on first write.
   * Identical values still produce a new version.
   */
  async updatePassword(environment: string, newValue: string): Promise<UpdateResult> {
    if (newValue.length === 0) {
      throw new ValidationError("New password must not be empty");
    }

    const secretName = this.secretNameFor(environment);
    const versionId = await this.secrets.addVersion(secretName, newValue, {
      labels: { "managed-by": MANAGED_BY_LABEL, environment: sanitizeLabel(environment) },
    });
    return { secretName, versionId };
  }

  /**
   * Generate a password under the policy and store it as a new version.
   * The value is returned to the caller and never logged.
   */
  async rotatePassword(environment: string, policy: PasswordPolicy = this.policy): Promise<RotationResult> {
    validatePasswordPolicy(policy);

    const value = this.generate(policy);
    const missing = missingCharacterClasses(value, policy);
    if (value.length < policy.length || missing.length > 0) {
      throw new ValidationError(
        `Generated password does not satisfy the policy (missing: ${missing.join(", ") || "length"})`
      );
    }

    const { secretName, versionId } = await this.updatePassword(environment, value);

    if (this.rotation) {
      // The new version is already live; losing the label must not lose the value
      try {
        await this.rotation.markRotated(secretName, this.now());
      } catch (error) {
        this.log(
          `[Rotation] Stored version ${versionId} but could not record rotation time: ${errorMessage(error)}`,
          "stderr"
        );
      }
    }

    this.log(`[Rotation] Rotated ${secretName} to version ${versionId}`, "stdout");
    return { secretName, versionId, value };
  }

  /**
   * When the password was last rotated, if a rotation service is configured
   * and has recorded one.
   */
  async lastRotated(environment: string): Promise<Date | undefined> {
    return this.rotation?.getLastRotated(this.secretNameFor(environment));
  }

  /**
   * Versions in creation order, oldest first. Nothing is fetched until the
   * sequence is iterated, and each iteration queries the store again.
   */
  listVersions(environment: string): AsyncIterable<SecretVersionInfo> {
    const secretName = this.secretNameFor(environment);
    const secrets = this.secrets;

    return {
      async *[Symbol.asyncIterator]() {
        const versions: SecretVersionInfo[] = [];
        for await (const version of secrets.listVersions(secretName)) {
          versions.push(version);
        }
        versions.sort(byCreationOrder);
        yield* versions;
      },
    };
  }
}
