export type TeardownAction = "destroy" | "state-rm";

export interface TeardownStep {
  /** Terraform resource type, e.g. google_dataproc_cluster */
  resourceType: string;
  description: string;
  action: TeardownAction;
}

export interface TeardownPhase {
  name: string;
  steps: TeardownStep[];
}

const destroy = (resourceType: string, description: string): TeardownStep => ({
  resourceType,
  description,
  action: "destroy",
});

/**
 * Dependency order for tearing the stack down. Anything still in state
 * afterwards is removed by a final untargeted destroy.
 */
export const TEARDOWN_PHASES: readonly TeardownPhase[] = [
  {
    name: "Orchestration",
    steps: [destroy("google_composer_environment", "Composer environment")],
  },
  {
    name: "Compute",
    steps: [destroy("google_dataproc_cluster", "Dataproc cluster")],
  },
  {
    name: "Data",
    steps: [
      destroy("google_sql_user", "Cloud SQL users"),
      destroy("google_sql_database", "Cloud SQL databases"),
      destroy("google_sql_database_instance", "Cloud SQL instance"),
      destroy("google_bigquery_dataset", "BigQuery datasets"),
    ],
  },
  {
    name: "Storage",
    steps: [destroy("google_storage_bucket", "Cloud Storage buckets")],
  },
  {
    name: "Security",
    steps: [
      destroy("google_secret_manager_secret_iam_member", "Secret IAM bindings"),
      destroy("google_secret_manager_secret_version", "Secret versions"),
      destroy("google_secret_manager_secret", "Secrets"),
      destroy("google_project_iam_member", "Project IAM bindings"),
      destroy("google_service_account", "Service accounts"),
    ],
  },
  {
    name: "Network",
    steps: [
      destroy("google_compute_firewall", "Firewall rules"),
      destroy("google_compute_router_nat", "Cloud NAT"),
      destroy("google_compute_router", "Cloud Router"),
      destroy("google_compute_subnetwork", "Subnets"),
      {
        resourceType: "google_service_networking_connection",
        description: "Service networking connection",
        action: "state-rm",
      },
      destroy("google_compute_global_address", "Private IP ranges"),
      destroy("google_compute_network", "VPC network"),
    ],
  },
  {
    name: "Foundation",
    steps: [destroy("google_project_service", "Project APIs")],
  },
];

/**
 * Resource type of a state address, or undefined for data sources.
 * Module paths and instance keys are ignored:
 * `module.net.google_compute_subnetwork.private["a"]` gives `google_compute_subnetwork`.
 */
export function resourceTypeOf(address: string): string | undefined {
  const parts = address.replace(/\[[^\]]*\]/g, "").split(".");
  let index = 0;
  while (parts[index] === "module") {
    index += 2;
  }
  if (parts[index] === "data") {
    return undefined;
  }
  return parts[index] || undefined;
}
