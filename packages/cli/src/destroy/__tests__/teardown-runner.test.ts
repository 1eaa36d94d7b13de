import type { ITerraformCli } from "../../terraform/terraform-cli";
import { resourceTypeOf } from "../teardown-plan";
import { TeardownRunner } from "../teardown-runner";

// ── Test helpers ────────────────────────────────────────────────────────

/** Terraform stand-in whose state shrinks as resources are destroyed. */
class FakeTerraform implements ITerraformCli {
  readonly calls: string[] = [];
  failOn: string | undefined;

  constructor(private state: string[]) {}

  async outputJson(): Promise<unknown> {
    return {};
  }

  async stateList(): Promise<string[]> {
    return [...this.state];
  }

  async stateRm(addresses: string[]): Promise<void> {
    this.calls.push(`state rm ${addresses.join(" ")}`);
    this.state = this.state.filter((address) => !addresses.includes(address));
  }

  async destroy(targets: string[] = []): Promise<void> {
    this.calls.push(targets.length > 0 ? `destroy ${targets.join(" ")}` : "destroy");
    if (targets.some((target) => target === this.failOn)) {
      throw new Error(`Error: deleting ${this.failOn}: resource in use`);
    }
    this.state = targets.length > 0 ? this.state.filter((address) => !targets.includes(address)) : [];
  }
}

const STATE = [
  "google_project_service.apis[\"sqladmin.googleapis.com\"]",
  "google_compute_network.vpc",
  "google_compute_global_address.private_ip",
  "google_service_networking_connection.private",
  "google_sql_database_instance.main",
  "google_sql_database.sales",
  "google_storage_bucket.data",
  "module.composer.google_composer_environment.main",
  "data.google_project.current",
];

// ── Tests ───────────────────────────────────────────────────────────────

describe("TeardownRunner", () => {
  it("should destroy in dependency order and skip empty steps", async () => {
    const terraform = new FakeTerraform(STATE);

    const report = await new TeardownRunner({ terraform }).run();

    expect(report.ok).toBe(true);
    expect(terraform.calls).toEqual([
      "destroy module.composer.google_composer_environment.main",
      "destroy google_sql_database.sales",
      "destroy google_sql_database_instance.main",
      "destroy google_storage_bucket.data",
      "state rm google_service_networking_connection.private",
      "destroy google_compute_global_address.private_ip",
      "destroy google_compute_network.vpc",
      'destroy google_project_service.apis["sqladmin.googleapis.com"]',
      "destroy",
    ]);
    expect(report.steps.find((s) => s.description === "Dataproc cluster")?.status).toBe("skipped");
    expect(report.steps.find((s) => s.description === "Service networking connection")?.status).toBe(
      "removed"
    );
  });

  it("should skip the final destroy when state is empty", async () => {
    const terraform = new FakeTerraform(["google_storage_bucket.data"]);

    const report = await new TeardownRunner({ terraform }).run();

    expect(terraform.calls).toEqual(["destroy google_storage_bucket.data"]);
    expect(report.steps[report.steps.length - 1]).toEqual({
      phase: "Final cleanup",
      description: "Remaining resources",
      status: "skipped",
      addresses: [],
    });
  });

  it("should stop at the first failed step", async () => {
    const terraform = new FakeTerraform(STATE);
    terraform.failOn = "google_sql_database_instance.main";

    const report = await new TeardownRunner({ terraform }).run();

    expect(report.ok).toBe(false);
    expect(report.steps[report.steps.length - 1]).toEqual({
      phase: "Data",
      description: "Cloud SQL instance",
      status: "failed",
      addresses: ["google_sql_database_instance.main"],
      error: "Error: deleting google_sql_database_instance.main: resource in use",
    });
    expect(terraform.calls).not.toContain("destroy google_storage_bucket.data");
  });

  it("should announce each step", async () => {
    const onStep = jest.fn();

    await new TeardownRunner({ terraform: new FakeTerraform([]), onStep }).run();

    expect(onStep).toHaveBeenNthCalledWith(1, "Orchestration", "Composer environment");
    expect(onStep).toHaveBeenLastCalledWith("Final cleanup", "Remaining resources");
  });
});

describe("resourceTypeOf", () => {
  it("should ignore module paths and instance keys", () => {
    expect(resourceTypeOf('module.net.google_compute_subnetwork.private["a.b"]')).toBe(
      "google_compute_subnetwork"
    );
    expect(resourceTypeOf("google_sql_database.sales")).toBe("google_sql_database");
  });

  it("should not confuse prefixes of other types", () => {
    expect(resourceTypeOf("google_sql_database_instance.main")).not.toBe("google_sql_database");
  });

  it("should return undefined for data sources", () => {
    expect(resourceTypeOf("data.google_project.current")).toBeUndefined();
  });
});
