// Interfaces
export type {
  ISecretsService,
  ISecretRotationService,
  IStorageStatusService,
  IDatabaseStatusService,
  IClusterStatusService,
  IWarehouseStatusService,
  IOrchestrationStatusService,
  IObjectStorageService,
} from "./interfaces";

// Types
export type {
  SecretVersionState,
  SecretVersionInfo,
  CreateSecretOptions,
  LogCallback,
  BucketStatus,
  DatabaseInstanceState,
  DatabaseInstanceStatus,
  ClusterState,
  ClusterStatus,
  DatasetStatus,
  EnvironmentState,
  OrchestrationEnvironmentStatus,
} from "./types";
export { noopLog } from "./types";

// Errors
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
  classifyProviderError,
  extractErrorCodes,
  isNotFoundError,
} from "./errors";
export type { EtlctlErrorOptions } from "./errors";

// Utilities
export {
  sanitizeSecretName,
  sanitizeLabel,
  secretNameForEnvironment,
  calculateAgeDays,
  describeAge,
  formatDateLabel,
  parseDateLabel,
  protoTimestampToDate,
  withDeadline,
  CHARACTER_CLASSES,
  MIN_PASSWORD_LENGTH,
  DEFAULT_PASSWORD_LENGTH,
  DEFAULT_SYMBOLS,
  DEFAULT_PASSWORD_POLICY,
  parseCharacterClasses,
  validatePasswordPolicy,
  missingCharacterClasses,
  generatePassword,
} from "./utils";
export type { ProtoTimestamp, CharacterClass, PasswordPolicy, RandomIndex } from "./utils";
