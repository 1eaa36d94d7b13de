/**
 * Error taxonomy shared by every etlctl adapter and command.
 *
 * The CLI maps these to exit codes and the validator folds them into
 * check results, so adapters must throw one of these rather than raw SDK
 * errors once a failure has been classified.
 */

export enum EtlctlErrorCode {
  VALIDATION = "VALIDATION",
  NOT_FOUND = "NOT_FOUND",
  PERMISSION_DENIED = "PERMISSION_DENIED",
  TRANSIENT = "TRANSIENT",
  CHECK_FAILED = "CHECK_FAILED",
}

export interface EtlctlErrorOptions {
  /** The underlying SDK or system error */
  cause?: unknown;
}

export class EtlctlError extends Error {
  readonly code: EtlctlErrorCode;
  readonly retryable: boolean;

  constructor(
    message: string,
    code: EtlctlErrorCode,
    retryable = false,
    options?: EtlctlErrorOptions
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = "EtlctlError";
    this.code = code;
    this.retryable = retryable;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Bad input that the caller can fix. */
export class ValidationError extends EtlctlError {
  constructor(message: string, options?: EtlctlErrorOptions) {
    super(message, EtlctlErrorCode.VALIDATION, false, options);
    this.name = "ValidationError";
  }
}

export class NotFoundError extends EtlctlError {
  constructor(message: string, options?: EtlctlErrorOptions) {
    super(message, EtlctlErrorCode.NOT_FOUND, false, options);
    this.name = "NotFoundError";
  }
}

/** Missing credentials or insufficient IAM permissions. */
export class PermissionError extends EtlctlError {
  constructor(message: string, options?: EtlctlErrorOptions) {
    super(message, EtlctlErrorCode.PERMISSION_DENIED, false, options);
    this.name = "PermissionError";
  }
}

/** Network failures, timeouts and throttling. Safe for the caller to retry. */
export class TransientError extends EtlctlError {
  constructor(message: string, options?: EtlctlErrorOptions) {
    super(message, EtlctlErrorCode.TRANSIENT, true, options);
    this.name = "TransientError";
  }
}

/**
 * A validation check that ran to completion and found the resource unhealthy.
 * Always captured by the check runner, never surfaced to the CLI.
 */
export class CheckFailure extends EtlctlError {
  constructor(message: string, options?: EtlctlErrorOptions) {
    super(message, EtlctlErrorCode.CHECK_FAILED, false, options);
    this.name = "CheckFailure";
  }
}

export function isRetryable(error: unknown): boolean {
  return error instanceof EtlctlError && error.retryable;
}

/**
 * Extract a printable message from anything thrown.
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
