// cli/src/commands/keyvault.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";

vi.mock("../lib/azd.js", () => ({
  setEnvValue: vi.fn(),
}));

vi.mock("../lib/keyvault.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../lib/keyvault.js")>();
  return {
    ...actual,
    vaultExists: vi.fn(),
    deletedVaultStatus: vi.fn(),
    recoverVault: vi.fn(),
    createVault: vi.fn(),
    signedInObjectId: vi.fn(),
    grantSecretPolicy: vi.fn(),
    setSecret: vi.fn(),
  };
});

vi.mock("../lib/rbac.js", () => ({
  currentSubscriptionId: vi.fn(),
}));

import { setEnvValue } from "../lib/azd.js";
import {
  KeyVaultError,
  vaultExists,
  deletedVaultStatus,
  recoverVault,
  createVault,
  signedInObjectId,
  grantSecretPolicy,
  setSecret,
} from "../lib/keyvault.js";
import { currentSubscriptionId } from "../lib/rbac.js";
import { ensureKeyVault, recoverKeyVault } from "./keyvault.js";

const mockSetEnvValue = vi.mocked(setEnvValue);
const mockVaultExists = vi.mocked(vaultExists);
const mockDeletedVaultStatus = vi.mocked(deletedVaultStatus);
const mockRecoverVault = vi.mocked(recoverVault);
const mockCreateVault = vi.mocked(createVault);
const mockSignedInObjectId = vi.mocked(signedInObjectId);
const mockGrantSecretPolicy = vi.mocked(grantSecretPolicy);
const mockSetSecret = vi.mocked(setSecret);
const mockCurrentSubscriptionId = vi.mocked(currentSubscriptionId);

const SUBSCRIPTION = "00000000-0000-0000-0000-000000000000";
const VAULT = "kv-dev-c98b90b39ffdb-v10";

describe("Key Vault commands", () => {
  const originalEnv = process.env;
  vi.spyOn(console, "log").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv, AZURE_ENV_NAME: "dev", AZURE_LOCATION: "eastus2" };
    for (const key of ["AZURE_RESOURCE_GROUP", "AZURE_SUBSCRIPTION_ID", "KEY_VAULT_NAME", "OIDC_CLIENT_SECRET", "JWT_SECRET", "AZURE_AD_CLIENT_SECRET"]) {
      delete process.env[key];
    }
    mockCurrentSubscriptionId.mockResolvedValue(SUBSCRIPTION);
    mockVaultExists.mockResolvedValue(false);
    mockDeletedVaultStatus.mockResolvedValue({ state: "not-found" });
    mockSignedInObjectId.mockResolvedValue("object-1");
    mockGrantSecretPolicy.mockResolvedValue(true);
    mockSetSecret.mockResolvedValue(true);
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("ensureKeyVault", () => {
    it("derives the vault name and stores it in azd", async () => {
      mockVaultExists.mockResolvedValue(true);

      expect(await ensureKeyVault()).toBe("exists");
      expect(mockSetEnvValue).toHaveBeenCalledWith("KEY_VAULT_NAME", VAULT);
      expect(mockVaultExists).toHaveBeenCalledWith(VAULT, "rg-raptor-dev");
      expect(mockCreateVault).not.toHaveBeenCalled();
    });

    it("uses a provided name and subscription", async () => {
      process.env.KEY_VAULT_NAME = "kv-custom";
      mockVaultExists.mockResolvedValue(true);

      await ensureKeyVault();

      expect(mockCurrentSubscriptionId).not.toHaveBeenCalled();
      expect(mockVaultExists).toHaveBeenCalledWith("kv-custom", "rg-raptor-dev");
    });

    it("recovers a soft-deleted vault", async () => {
      mockDeletedVaultStatus.mockResolvedValue({ state: "deleted" });
      mockRecoverVault.mockResolvedValue(true);

      expect(await ensureKeyVault()).toBe("recovered");
      expect(mockRecoverVault).toHaveBeenCalledWith(VAULT, "eastus2");
      expect(mockCreateVault).not.toHaveBeenCalled();
    });

    it("fails with purge guidance when recovery is refused", async () => {
      mockDeletedVaultStatus.mockResolvedValue({ state: "deleted" });
      mockRecoverVault.mockResolvedValue(false);

      await expect(ensureKeyVault()).rejects.toBeInstanceOf(KeyVaultError);
    });

    it("creates the vault with environment retention and grants the caller access", async () => {
      process.env.AZURE_RESOURCE_GROUP = "rg-custom";

      expect(await ensureKeyVault()).toBe("created");
      expect(mockCreateVault).toHaveBeenCalledWith({
        name: VAULT,
        resourceGroup: "rg-custom",
        location: "eastus2",
        retentionDays: 7,
      });
      expect(mockGrantSecretPolicy).toHaveBeenCalledWith(VAULT, "object-1");
    });

    it("seeds only the bootstrap secrets that are set", async () => {
      process.env.JWT_SECRET = "test-secret";
      process.env.AZURE_AD_CLIENT_SECRET = "test-aad-secret";

      await ensureKeyVault();

      expect(mockSetSecret).toHaveBeenCalledTimes(2);
      expect(mockSetSecret).toHaveBeenCalledWith(VAULT, "jwt-secret", "test-secret");
      expect(mockSetSecret).toHaveBeenCalledWith(VAULT, "aad-client-secret", "test-aad-secret");
    });

    it("continues without a resolvable identity", async () => {
      mockSignedInObjectId.mockResolvedValue(undefined);

      expect(await ensureKeyVault()).toBe("created");
      expect(mockGrantSecretPolicy).not.toHaveBeenCalled();
    });
  });

  describe("recoverKeyVault", () => {
    it("recovers a vault scheduled for purge", async () => {
      mockDeletedVaultStatus.mockResolvedValue({ state: "deleted", scheduledPurgeDate: "2026-02-01T00:00:00Z" });
      mockRecoverVault.mockResolvedValue(true);

      expect(await recoverKeyVault()).toBe("deleted");
      expect(mockDeletedVaultStatus).toHaveBeenCalledWith(VAULT, "eastus2");
      expect(mockRecoverVault).toHaveBeenCalledWith(VAULT, "eastus2");
    });

    it("does not fail when recovery does", async () => {
      mockDeletedVaultStatus.mockResolvedValue({ state: "deleted" });
      mockRecoverVault.mockResolvedValue(false);

      expect(await recoverKeyVault()).toBe("deleted");
    });

    it("reports forbidden and unknown states without recovering", async () => {
      mockDeletedVaultStatus.mockResolvedValueOnce({ state: "forbidden" });
      expect(await recoverKeyVault()).toBe("forbidden");

      mockDeletedVaultStatus.mockResolvedValueOnce({ state: "unknown" });
      expect(await recoverKeyVault()).toBe("unknown");

      expect(mockRecoverVault).not.toHaveBeenCalled();
    });
  });
});
