import { ValidationError } from "@etlctl/adapters-common";

export interface GcsLocation {
  bucket: string;
  /** Object prefix, empty or ending in "/" */
  prefix: string;
}

/**
 * Parse `gs://bucket/path` (or a bare bucket name) into bucket and prefix.
 */
export function parseGcsUrl(value: string): GcsLocation {
  const trimmed = value.trim().replace(/^gs:\/\//, "");
  const [bucket, ...rest] = trimmed.split("/");
  if (!bucket) {
    throw new ValidationError(`Invalid Cloud Storage location "${value}"`);
  }

  const path = rest.filter((segment) => segment.length > 0).join("/");
  return { bucket, prefix: path ? `${path}/` : "" };
}
