import type { CreateSecretOptions, SecretVersionInfo } from "../types/secret";

/**
 * Interface for versioned secret stores.
 * Implemented by the GCP SecretManagerService and by in-memory test stores.
 *
 * Every method is a live round trip; implementations must not cache.
 * Failures are thrown as NotFoundError, PermissionError or TransientError.
 */
export interface ISecretsService {
  /**
   * Read the payload of the latest enabled version.
   * @throws NotFoundError when the secret or an enabled version does not exist
   */
  accessLatest(name: string): Promise<string>;

  /**
   * Append a new version. Creates the secret first when it does not exist.
   * @returns The new version ID
   */
  addVersion(name: string, value: string, options?: CreateSecretOptions): Promise<string>;

  /**
   * Iterate version metadata in provider order.
   * Each call to `[Symbol.asyncIterator]()` starts a fresh listing.
   * @throws NotFoundError when the secret does not exist
   */
  listVersions(name: string): AsyncIterable<SecretVersionInfo>;

  /**
   * Check if a secret exists (regardless of whether it has versions).
   */
  secretExists(name: string): Promise<boolean>;
}
