import {
  NotFoundError,
  ValidationError,
  missingCharacterClasses,
} from "@etlctl/adapters-common";
import type { PasswordPolicy, SecretVersionInfo } from "@etlctl/adapters-common";
import { InMemorySecretsService } from "../../__tests__/helpers/fakes";
import { SecretLifecycleManager } from "../secret-lifecycle-manager";

// ── Test helpers ────────────────────────────────────────────────────────

const ROTATED_AT = new Date("2024-03-01T00:00:00Z");

function createManager(overrides: Partial<ConstructorParameters<typeof SecretLifecycleManager>[0]> = {}) {
  const store = new InMemorySecretsService();
  const log = jest.fn();
  const manager = new SecretLifecycleManager({
    secrets: store,
    rotation: store,
    now: () => ROTATED_AT,
    log,
    ...overrides,
  });
  return { manager, store, log };
}

async function collect(iterable: AsyncIterable<SecretVersionInfo>): Promise<SecretVersionInfo[]> {
  const items: SecretVersionInfo[] = [];
  for await (const item of iterable) {
    items.push(item);
  }
  return items;
}

// ── Tests ───────────────────────────────────────────────────────────────

describe("SecretLifecycleManager", () => {
  it("should walk a fresh environment from missing to rotated", async () => {
    const { manager, store } = createManager();

    await expect(manager.getPassword("dev")).rejects.toBeInstanceOf(NotFoundError);

    await expect(manager.updatePassword("dev", "Abc12345!")).resolves.toEqual({
      secretName: "dev-sql-password",
      versionId: "1",
    });
    expect(await collect(manager.listVersions("dev"))).toHaveLength(1);

    const rotated = await manager.rotatePassword("dev");
    expect(rotated.versionId).toBe("2");
    expect(await collect(manager.listVersions("dev"))).toHaveLength(2);
    await expect(manager.getPassword("dev")).resolves.toBe(rotated.value);

    expect(store.secrets.get("dev-sql-password")?.labels).toEqual({
      "managed-by": "etlctl",
      environment: "dev",
      "last-rotated": "2024-03-01T00:00:00.000Z",
    });
  });

  it("should list versions oldest first", async () => {
    const { manager } = createManager();
    await manager.updatePassword("dev", "first-value");
    await manager.updatePassword("dev", "second-value");
    await manager.updatePassword("dev", "third-value");

    const versions = await collect(manager.listVersions("dev"));

    expect(versions.map((v) => v.id)).toEqual(["1", "2", "3"]);
    expect(versions[0].createdAt.getTime()).toBeLessThan(versions[2].createdAt.getTime());
  });

  it("should create a new version for a repeated value", async () => {
    const { manager } = createManager();
    await manager.updatePassword("dev", "same-value");
    await manager.updatePassword("dev", "same-value");

    expect(await collect(manager.listVersions("dev"))).toHaveLength(2);
  });

  it("should not fetch versions until iterated, and refetch on each iteration", async () => {
    const { manager, store } = createManager();
    await manager.updatePassword("dev", "some-value");

    const versions = manager.listVersions("dev");
    expect(store.listCalls).toBe(0);

    await collect(versions);
    await collect(versions);
    expect(store.listCalls).toBe(2);
  });

  it("should reject an empty password without touching the store", async () => {
    const { manager, store } = createManager();

    await expect(manager.updatePassword("dev", "")).rejects.toBeInstanceOf(ValidationError);
    expect(store.secrets.size).toBe(0);
  });

  it("should use the configured secret name", async () => {
    const { manager, store } = createManager({ secretNameFor: () => "custom-db-password" });

    await manager.updatePassword("staging", "some-value");

    expect([...store.secrets.keys()]).toEqual(["custom-db-password"]);
  });

  it("should generate passwords that satisfy the policy", async () => {
    const policy: PasswordPolicy = { length: 16, classes: ["lower", "digit"], symbols: "" };
    const { manager } = createManager();

    for (let i = 0; i < 20; i++) {
      const { value } = await manager.rotatePassword("dev", policy);
      expect(value).toHaveLength(16);
      expect(value).toMatch(/^[a-z0-9]+$/);
      expect(missingCharacterClasses(value, policy)).toEqual([]);
    }
  });

  it("should refuse a generated value that breaks the policy", async () => {
    const { manager, store } = createManager({ generate: () => "tooshort" });

    await expect(manager.rotatePassword("dev")).rejects.toBeInstanceOf(ValidationError);
    expect(store.secrets.size).toBe(0);
  });

  it("should reject a policy shorter than the minimum length", async () => {
    const { manager } = createManager();

    await expect(
      manager.rotatePassword("dev", { length: 8, classes: ["lower"], symbols: "" })
    ).rejects.toThrow("Password length must be an integer of at least 16 (got 8)");
  });

  it("should still return the value when the rotation label cannot be written", async () => {
    const store = new InMemorySecretsService();
    const rotation = {
      markRotated: jest.fn().mockRejectedValue(new Error("label quota exceeded")),
      getLastRotated: jest.fn(),
    };
    const log = jest.fn();
    const manager = new SecretLifecycleManager({ secrets: store, rotation, log });

    const result = await manager.rotatePassword("dev");

    await expect(manager.getPassword("dev")).resolves.toBe(result.value);
    expect(log).toHaveBeenCalledWith(
      "[Rotation] Stored version 1 but could not record rotation time: label quota exceeded",
      "stderr"
    );
  });

  it("should report the rotation time recorded by the last rotation", async () => {
    const { manager } = createManager();
    await manager.updatePassword("dev", "test-secret");
    await expect(manager.lastRotated("dev")).resolves.toBeUndefined();

    await manager.rotatePassword("dev");

    await expect(manager.lastRotated("dev")).resolves.toEqual(ROTATED_AT);
  });

  it("should have no rotation time without a rotation service", async () => {
    const { manager } = createManager({ rotation: undefined });

    await expect(manager.lastRotated("dev")).resolves.toBeUndefined();
  });

  it("should never log the rotated value", async () => {
    const { manager, log } = createManager();

    const { value } = await manager.rotatePassword("dev");

    expect(log).toHaveBeenCalledWith("[Rotation] Rotated dev-sql-password to version 1", "stdout");
    for (const [line] of log.mock.calls) {
      expect(line).not.toContain(value);
    }
  });
});
