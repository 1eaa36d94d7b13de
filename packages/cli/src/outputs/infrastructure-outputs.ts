import { z } from "zod";
import { ValidationError } from "@etlctl/adapters-common";

/** Named identifiers read from Terraform outputs. */
export const OUTPUT_KEYS = {
  dataBucket: "data_bucket_name",
  composerBucket: "composer_gcs_bucket",
  sqlInstance: "cloudsql_instance_name",
  dataprocCluster: "dataproc_cluster_name",
  bigqueryDataset: "bigquery_dataset_id",
  composerEnvironment: "composer_environment_name",
  sqlPasswordSecret: "sql_password_secret_id",
  region: "region",
} as const;

export const REQUIRED_OUTPUT_KEYS: readonly string[] = [
  OUTPUT_KEYS.dataBucket,
  OUTPUT_KEYS.sqlInstance,
  OUTPUT_KEYS.bigqueryDataset,
];

/** Resolved outputs; only non-empty string values are kept. */
export type InfrastructureOutputs = Readonly<Record<string, string>>;

const TerraformOutputSchema = z.record(
  z.object({
    value: z.unknown(),
    type: z.unknown().optional(),
    sensitive: z.boolean().optional(),
  })
);

/**
 * Flatten `terraform output -json` into name/value pairs.
 */
export function parseTerraformOutputs(json: unknown): InfrastructureOutputs {
  const parsed = TerraformOutputSchema.safeParse(json);
  if (!parsed.success) {
    throw new ValidationError(
      `Unexpected terraform output format: ${parsed.error.issues[0]?.message ?? "invalid"}`
    );
  }

  const outputs: Record<string, string> = {};
  for (const [name, output] of Object.entries(parsed.data)) {
    if (typeof output.value === "string" && output.value.trim() !== "") {
      outputs[name] = output.value.trim();
    }
  }
  return outputs;
}

export function missingOutputs(outputs: InfrastructureOutputs, keys: readonly string[]): string[] {
  return keys.filter((key) => !outputs[key]);
}

/** Source of infrastructure outputs. */
export interface IOutputResolver {
  resolve(): Promise<InfrastructureOutputs>;
}
