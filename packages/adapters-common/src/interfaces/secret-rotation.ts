/**
 * Interface for recording rotation metadata on a secret.
 */
export interface ISecretRotationService {
  /**
   * Stamp the secret with the time of its latest rotation.
   */
  markRotated(secretName: string, rotatedAt: Date): Promise<void>;

  /**
   * Read the last rotation time, or undefined if the secret was never rotated.
   */
  getLastRotated(secretName: string): Promise<Date | undefined>;
}
