import { z } from "zod";
import {
  DEFAULT_PASSWORD_LENGTH,
  DEFAULT_SYMBOLS,
  MIN_PASSWORD_LENGTH,
  ValidationError,
  parseCharacterClasses,
  secretNameForEnvironment,
  validatePasswordPolicy,
} from "@etlctl/adapters-common";
import type { PasswordPolicy } from "@etlctl/adapters-common";

const ENVIRONMENT_NAME = /^[a-z][a-z0-9-]*$/;

const EnvSchema = z.object({
  ETLCTL_PROJECT_ID: z.string().optional(),
  GOOGLE_CLOUD_PROJECT: z.string().optional(),
  ETLCTL_ENVIRONMENT: z.string().default("dev"),
  ETLCTL_REGION: z.string().default("us-central1"),
  ETLCTL_KEY_FILE: z.string().optional(),
  GOOGLE_APPLICATION_CREDENTIALS: z.string().optional(),
  ETLCTL_SECRET_ID: z.string().optional(),
  ETLCTL_PASSWORD_LENGTH: z.coerce.number().int().default(DEFAULT_PASSWORD_LENGTH),
  ETLCTL_PASSWORD_CLASSES: z.string().default("lower,upper,digit,symbol"),
  ETLCTL_PASSWORD_SYMBOLS: z.string().default(DEFAULT_SYMBOLS),
  ETLCTL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ETLCTL_CHECK_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  ETLCTL_TERRAFORM_DIR: z.string().default("."),
  ETLCTL_OUTPUTS_FILE: z.string().optional(),
});

/** Global flags shared by every subcommand. */
export interface GlobalFlags {
  project?: string;
  environment?: string;
  region?: string;
  keyFile?: string;
  terraformDir?: string;
  outputsFile?: string;
  verbose?: boolean;
}

export interface EtlctlConfig {
  projectId: string;
  environment: string;
  region: string;
  keyFilename?: string;
  secretName: string;
  passwordPolicy: PasswordPolicy;
  timeoutMs: number;
  checkTimeoutMs: number;
  terraformDir: string;
  outputsFile?: string;
  verbose: boolean;
}

/** Empty variables count as unset. */
function presentOnly(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") {
      result[key] = value.trim();
    }
  }
  return result;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join(".") || "environment"}: ${issue.message}`)
    .join("; ");
}

/**
 * Merge environment variables with CLI flags (flags win) and validate the result.
 *
 * @throws ValidationError when a value is malformed or the project is missing
 */
export function resolveConfig(flags: GlobalFlags, env: NodeJS.ProcessEnv = process.env): EtlctlConfig {
  const parsed = EnvSchema.safeParse(presentOnly(env));
  if (!parsed.success) {
    throw new ValidationError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }
  const vars = parsed.data;

  const projectId = flags.project ?? vars.ETLCTL_PROJECT_ID ?? vars.GOOGLE_CLOUD_PROJECT;
  if (!projectId) {
    throw new ValidationError(
      "GCP project is required: pass -p/--project or set ETLCTL_PROJECT_ID"
    );
  }

  const environment = flags.environment ?? vars.ETLCTL_ENVIRONMENT;
  if (!ENVIRONMENT_NAME.test(environment)) {
    throw new ValidationError(
      `Invalid environment "${environment}": use lowercase letters, digits and hyphens`
    );
  }

  const passwordPolicy: PasswordPolicy = {
    length: vars.ETLCTL_PASSWORD_LENGTH,
    classes: parseCharacterClasses(vars.ETLCTL_PASSWORD_CLASSES),
    symbols: vars.ETLCTL_PASSWORD_SYMBOLS,
  };
  if (passwordPolicy.length < MIN_PASSWORD_LENGTH) {
    throw new ValidationError(
      `ETLCTL_PASSWORD_LENGTH must be at least ${MIN_PASSWORD_LENGTH} (got ${passwordPolicy.length})`
    );
  }
  validatePasswordPolicy(passwordPolicy);

  return {
    projectId,
    environment,
    region: flags.region ?? vars.ETLCTL_REGION,
    keyFilename: flags.keyFile ?? vars.ETLCTL_KEY_FILE ?? vars.GOOGLE_APPLICATION_CREDENTIALS,
    secretName: vars.ETLCTL_SECRET_ID ?? secretNameForEnvironment(environment),
    passwordPolicy,
    timeoutMs: vars.ETLCTL_TIMEOUT_MS,
    checkTimeoutMs: vars.ETLCTL_CHECK_TIMEOUT_MS,
    terraformDir: flags.terraformDir ?? vars.ETLCTL_TERRAFORM_DIR,
    outputsFile: flags.outputsFile ?? vars.ETLCTL_OUTPUTS_FILE,
    verbose: flags.verbose === true,
  };
}
