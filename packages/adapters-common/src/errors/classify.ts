import {
  EtlctlError,
  NotFoundError,
  PermissionError,
  TransientError,
  ValidationError,
  errorMessage,
} from "./errors";

/** gRPC status codes returned by the google-gax based clients. */
const GRPC_INVALID_ARGUMENT = 3;
const GRPC_DEADLINE_EXCEEDED = 4;
const GRPC_NOT_FOUND = 5;
const GRPC_PERMISSION_DENIED = 7;
const GRPC_RESOURCE_EXHAUSTED = 8;
const GRPC_UNAVAILABLE = 14;
const GRPC_UNAUTHENTICATED = 16;

const TRANSIENT_SOCKET_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EPIPE",
]);

/**
 * Pull the numeric gRPC code, HTTP status or socket code off an SDK error.
 * gax errors carry `code: number`, gaxios errors carry `status` and
 * `response.status`, Node socket errors carry `code: string`.
 */
export function extractErrorCodes(error: unknown): {
  grpc?: number;
  http?: number;
  socket?: string;
} {
  if (typeof error !== "object" || error === null) {
    return {};
  }

  const result: { grpc?: number; http?: number; socket?: string } = {};

  if ("code" in error) {
    if (typeof error.code === "number") {
      // gax uses small gRPC codes; gaxios sometimes puts the HTTP status in `code`
      if (error.code >= 100) {
        result.http = error.code;
      } else {
        result.grpc = error.code;
      }
    } else if (typeof error.code === "string") {
      if (/^\d{3}$/.test(error.code)) {
        result.http = parseInt(error.code, 10);
      } else {
        result.socket = error.code;
      }
    }
  }

  if ("status" in error && typeof error.status === "number") {
    result.http = error.status;
  }

  if (
    "response" in error &&
    typeof error.response === "object" &&
    error.response !== null &&
    "status" in error.response &&
    typeof error.response.status === "number"
  ) {
    result.http = error.response.status;
  }

  return result;
}

/**
 * Map a raw provider error onto the etlctl taxonomy.
 *
 * @param error - Error thrown by an SDK call
 * @param context - Short description of the operation, prefixed to the message
 * @returns The classified error, or the original error when it matches no category
 */
export function classifyProviderError(error: unknown, context: string): unknown {
  if (error instanceof EtlctlError) {
    return error;
  }

  const { grpc, http, socket } = extractErrorCodes(error);
  const message = `${context}: ${errorMessage(error)}`;
  const options = { cause: error };

  if (grpc === GRPC_NOT_FOUND || http === 404) {
    return new NotFoundError(message, options);
  }

  if (
    grpc === GRPC_PERMISSION_DENIED ||
    grpc === GRPC_UNAUTHENTICATED ||
    http === 401 ||
    http === 403
  ) {
    return new PermissionError(message, options);
  }

  if (
    grpc === GRPC_DEADLINE_EXCEEDED ||
    grpc === GRPC_RESOURCE_EXHAUSTED ||
    grpc === GRPC_UNAVAILABLE ||
    http === 408 ||
    http === 429 ||
    (http !== undefined && http >= 500) ||
    (socket !== undefined && TRANSIENT_SOCKET_CODES.has(socket))
  ) {
    return new TransientError(message, options);
  }

  if (grpc === GRPC_INVALID_ARGUMENT || http === 400) {
    return new ValidationError(message, options);
  }

  return error;
}

/**
 * Whether a raw SDK error means "resource does not exist".
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof NotFoundError) {
    return true;
  }
  const { grpc, http } = extractErrorCodes(error);
  return grpc === GRPC_NOT_FOUND || http === 404;
}
