export {
  EtlctlError,
  EtlctlErrorCode,
  ValidationError,
  NotFoundError,
  PermissionError,
  TransientError,
  CheckFailure,
  isRetryable,
  errorMessage,
} from "./errors";
export type { EtlctlErrorOptions } from "./errors";

export { classifyProviderError, extractErrorCodes, isNotFoundError } from "./classify";
