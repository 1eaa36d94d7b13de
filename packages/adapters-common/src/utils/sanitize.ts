import { ValidationError } from "../errors/errors";

/**
 * Sanitize a secret ID to comply with Secret Manager naming requirements.
 * Secret IDs can contain letters, numbers, hyphens, and underscores, max 255 chars.
 *
 * @param name - Raw secret name
 * @returns Sanitized secret ID
 */
export function sanitizeSecretName(name: string): string {
  const sanitized = name
    .replace(/[^a-zA-Z0-9_-]/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 255);

  if (!sanitized) {
    throw new ValidationError(`Invalid secret name: "${name}" produces empty sanitized value`);
  }

  return sanitized;
}

/**
 * Sanitize a label value to comply with GCP label requirements.
 * Labels can contain lowercase letters, numbers, hyphens, and underscores, max 63 chars.
 */
export function sanitizeLabel(value: string): string {
  return value
    .toLowerCase()
    .replace(/[^a-z0-9_-]/g, "-")
    .replace(/^-+|-+$/g, "")
    .substring(0, 63);
}

/**
 * Derive the Cloud SQL password secret ID for an environment.
 *
 * @example secretNameForEnvironment("dev") // "dev-sql-password"
 */
export function secretNameForEnvironment(environment: string): string {
  return sanitizeSecretName(`${environment}-sql-password`);
}
