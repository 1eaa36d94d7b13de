import { ValidationError } from "@etlctl/adapters-common";
import { resolveConfig } from "../env-config";

describe("resolveConfig", () => {
  it("should apply defaults", () => {
    const config = resolveConfig({}, { ETLCTL_PROJECT_ID: "test-project" });

    expect(config).toEqual({
      projectId: "test-project",
      environment: "dev",
      region: "us-central1",
      keyFilename: undefined,
      secretName: "dev-sql-password",
      passwordPolicy: {
        length: 24,
        classes: ["lower", "upper", "digit", "symbol"],
        symbols: "!#%+-=?@^_",
      },
      timeoutMs: 30_000,
      checkTimeoutMs: 60_000,
      terraformDir: ".",
      outputsFile: undefined,
      verbose: false,
    });
  });

  it("should let flags override environment variables", () => {
    const config = resolveConfig(
      { project: "flag-project", environment: "staging", region: "europe-west1", verbose: true },
      { ETLCTL_PROJECT_ID: "env-project", ETLCTL_ENVIRONMENT: "prod", ETLCTL_REGION: "us-east1" }
    );

    expect(config.projectId).toBe("flag-project");
    expect(config.environment).toBe("staging");
    expect(config.region).toBe("europe-west1");
    expect(config.secretName).toBe("staging-sql-password");
    expect(config.verbose).toBe(true);
  });

  it("should fall back to GOOGLE_CLOUD_PROJECT and GOOGLE_APPLICATION_CREDENTIALS", () => {
    const config = resolveConfig(
      {},
      { GOOGLE_CLOUD_PROJECT: "adc-project", GOOGLE_APPLICATION_CREDENTIALS: "/keys/test.json" }
    );

    expect(config.projectId).toBe("adc-project");
    expect(config.keyFilename).toBe("/keys/test.json");
  });

  it("should read the secret name and password policy overrides", () => {
    const config = resolveConfig(
      {},
      {
        ETLCTL_PROJECT_ID: "test-project",
        ETLCTL_SECRET_ID: "shared-db-password",
        ETLCTL_PASSWORD_LENGTH: "32",
        ETLCTL_PASSWORD_CLASSES: "lower, digit",
      }
    );

    expect(config.secretName).toBe("shared-db-password");
    expect(config.passwordPolicy).toEqual({
      length: 32,
      classes: ["lower", "digit"],
      symbols: "!#%+-=?@^_",
    });
  });

  it("should treat empty variables as unset", () => {
    const config = resolveConfig({}, { ETLCTL_PROJECT_ID: "test-project", ETLCTL_ENVIRONMENT: "" });

    expect(config.environment).toBe("dev");
  });

  it("should require a project", () => {
    expect(() => resolveConfig({}, {})).toThrow(ValidationError);
  });

  it("should reject malformed numbers", () => {
    expect(() =>
      resolveConfig({}, { ETLCTL_PROJECT_ID: "test-project", ETLCTL_TIMEOUT_MS: "soon" })
    ).toThrow(ValidationError);
  });

  it("should reject a password length under the minimum", () => {
    expect(() =>
      resolveConfig({}, { ETLCTL_PROJECT_ID: "test-project", ETLCTL_PASSWORD_LENGTH: "12" })
    ).toThrow("ETLCTL_PASSWORD_LENGTH must be at least 16 (got 12)");
  });

  it("should reject unknown character classes", () => {
    expect(() =>
      resolveConfig({}, { ETLCTL_PROJECT_ID: "test-project", ETLCTL_PASSWORD_CLASSES: "lower,emoji" })
    ).toThrow(ValidationError);
  });

  it("should reject environment names that cannot form a secret name", () => {
    expect(() => resolveConfig({ project: "test-project", environment: "Dev Env" }, {})).toThrow(
      ValidationError
    );
  });
});
