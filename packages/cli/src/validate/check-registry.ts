/**
 * Check Registry
 *
 * Holds the validation checks in registration order, which is also the
 * order results appear in a snapshot.
 */

import type { IValidationCheck } from "./check.interface";
import {
  BigQueryDatasetCheck,
  ComposerEnvironmentCheck,
  DatabaseInstanceCheck,
  DataprocClusterCheck,
  InfrastructureOutputsCheck,
  SecretCheck,
  StorageBucketCheck,
} from "./checks";

export interface CheckFilter {
  /** Only run checks with these IDs */
  ids?: string[];
}

export class CheckRegistry {
  private checks: Map<string, IValidationCheck> = new Map();

  /**
   * Create a registry.
   * @param registerDefaults - If true, registers built-in checks. Set to false for testing.
   */
  constructor(registerDefaults: boolean = true) {
    if (registerDefaults) {
      this.registerDefaultChecks();
    }
  }

  /**
   * Create a registry with custom checks only (for testing).
   */
  static createEmpty(): CheckRegistry {
    return new CheckRegistry(false);
  }

  /**
   * Create a registry with specific checks (for testing).
   */
  static withChecks(checks: IValidationCheck[]): CheckRegistry {
    const registry = new CheckRegistry(false);
    for (const check of checks) {
      registry.register(check);
    }
    return registry;
  }

  /**
   * Register a check. Re-registering an ID replaces the check in place.
   */
  register(check: IValidationCheck): void {
    this.checks.set(check.id, check);
  }

  unregister(checkId: string): void {
    this.checks.delete(checkId);
  }

  getCheck(id: string): IValidationCheck | undefined {
    return this.checks.get(id);
  }

  /**
   * Get all checks matching the filter, in registration order.
   */
  getChecks(filter?: CheckFilter): IValidationCheck[] {
    const result = Array.from(this.checks.values());
    const ids = filter?.ids;
    if (!ids || ids.length === 0) {
      return result;
    }
    return result.filter((check) => ids.includes(check.id));
  }

  private registerDefaultChecks(): void {
    this.register(new InfrastructureOutputsCheck());
    this.register(new StorageBucketCheck());
    this.register(new SecretCheck());
    this.register(new DatabaseInstanceCheck());
    this.register(new DataprocClusterCheck());
    this.register(new BigQueryDatasetCheck());
    this.register(new ComposerEnvironmentCheck());
  }
}
