import { CheckFailure, withDeadline } from "@etlctl/adapters-common";
import type { CheckContext, IValidationCheck, ValidationCheckResult } from "./check.interface";
import type { CheckFilter, CheckRegistry } from "./check-registry";

export const DEFAULT_CHECK_TIMEOUT_MS = 60_000;

export interface CheckRunnerOptions {
  /** Run checks concurrently; results keep registration order */
  parallel?: boolean;
  timeoutMs?: number;
  /** Monotonic clock in milliseconds */
  clock?: () => number;
}

export interface CheckSummary {
  pass: number;
  fail: number;
  skipped: number;
}

function describeError(error: unknown): string {
  if (error instanceof CheckFailure) {
    return error.message;
  }
  if (error instanceof Error) {
    return error.name && error.name !== "Error" ? `${error.name}: ${error.message}` : error.message;
  }
  return String(error);
}

/**
 * Runs registered checks. A check that throws or times out becomes a
 * `fail` result; nothing escapes to the caller.
 */
export class CheckRunner {
  private readonly parallel: boolean;
  private readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(
    private readonly registry: CheckRegistry,
    options: CheckRunnerOptions = {}
  ) {
    this.parallel = options.parallel === true;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CHECK_TIMEOUT_MS;
    this.clock = options.clock ?? (() => performance.now());
  }

  async runAll(context: CheckContext, filter?: CheckFilter): Promise<ValidationCheckResult[]> {
    const checks = this.registry.getChecks(filter);

    if (this.parallel) {
      return Promise.all(checks.map((check) => this.runOne(check, context)));
    }

    const results: ValidationCheckResult[] = [];
    for (const check of checks) {
      results.push(await this.runOne(check, context));
    }
    return results;
  }

  async runOne(check: IValidationCheck, context: CheckContext): Promise<ValidationCheckResult> {
    const started = this.clock();
    const elapsed = () => Math.max(0, Math.round(this.clock() - started));

    try {
      // A synchronous throw inside run() is treated like a rejection
      const outcome = await withDeadline(
        Promise.resolve().then(() => check.run(context)),
        this.timeoutMs,
        `Check "${check.name}"`
      );
      return { id: check.id, name: check.name, ...outcome, durationMs: elapsed() };
    } catch (error) {
      return {
        id: check.id,
        name: check.name,
        status: "fail",
        message: describeError(error),
        durationMs: elapsed(),
      };
    }
  }

  getSummary(results: ValidationCheckResult[]): CheckSummary {
    return {
      pass: results.filter((r) => r.status === "pass").length,
      fail: results.filter((r) => r.status === "fail").length,
      skipped: results.filter((r) => r.status === "skipped").length,
    };
  }
}
