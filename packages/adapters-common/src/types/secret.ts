/**
 * Lifecycle state of a single secret version.
 */
export type SecretVersionState = "enabled" | "disabled" | "destroyed";

/**
 * Metadata for one immutable version of a secret. Never carries the payload.
 */
export interface SecretVersionInfo {
  /** Provider version number, monotonically increasing per secret ("1", "2", ...) */
  id: string;
  createdAt: Date;
  state: SecretVersionState;
}

/**
 * Options applied when a secret is created on first write.
 */
export interface CreateSecretOptions {
  labels?: Record<string, string>;
}
