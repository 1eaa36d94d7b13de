export { sanitizeSecretName, sanitizeLabel, secretNameForEnvironment } from "./sanitize";
export {
  calculateAgeDays,
  describeAge,
  formatDateLabel,
  parseDateLabel,
} from "./age-calculator";
export { protoTimestampToDate } from "./timestamp";
export { withDeadline } from "./deadline";
export type { ProtoTimestamp } from "./timestamp";
export {
  CHARACTER_CLASSES,
  MIN_PASSWORD_LENGTH,
  DEFAULT_PASSWORD_LENGTH,
  DEFAULT_SYMBOLS,
  DEFAULT_PASSWORD_POLICY,
  parseCharacterClasses,
  validatePasswordPolicy,
  missingCharacterClasses,
  generatePassword,
} from "./password";
export type { CharacterClass, PasswordPolicy, RandomIndex } from "./password";
