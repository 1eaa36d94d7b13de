/** Default per-call deadline for GCP API requests. */
export const DEFAULT_CALL_TIMEOUT_MS = 30_000;

export interface ServiceAccountCredentials {
  client_email: string;
  private_key: string;
}

/**
 * Options shared by every GCP adapter.
 * When neither keyFilename nor credentials is given, Application Default
 * Credentials are used.
 */
export interface GcpClientConfig {
  /** GCP project ID */
  projectId: string;
  /** Path to a service account key file (JSON) */
  keyFilename?: string;
  /** Inline service account credentials (alternative to keyFilename) */
  credentials?: ServiceAccountCredentials;
  /** Per-call timeout in milliseconds */
  timeoutMs?: number;
}

// Type alias so it satisfies the index signature on gax ClientOptions
export type GcpClientOptions = {
  projectId: string;
  keyFilename?: string;
  credentials?: ServiceAccountCredentials;
  apiEndpoint?: string;
};

/** Per-call options for gax clients. `retry: null` turns off the library's own retries. */
export type GaxCallOptions = {
  timeout: number;
  retry: null;
};

export function buildCallOptions(config: GcpClientConfig): GaxCallOptions {
  return { timeout: config.timeoutMs ?? DEFAULT_CALL_TIMEOUT_MS, retry: null };
}

/**
 * Build constructor options for a google-cloud client.
 */
export function buildClientOptions(config: GcpClientConfig, apiEndpoint?: string): GcpClientOptions {
  const clientOptions: GcpClientOptions = {
    projectId: config.projectId,
  };

  if (config.keyFilename) {
    clientOptions.keyFilename = config.keyFilename;
  } else if (config.credentials) {
    clientOptions.credentials = config.credentials;
  }

  if (apiEndpoint) {
    clientOptions.apiEndpoint = apiEndpoint;
  }

  return clientOptions;
}
