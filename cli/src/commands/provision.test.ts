// cli/src/commands/provision.test.ts
import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import path from "path";

vi.mock("../lib/azd.js", () => ({
  getEnvValue: vi.fn(),
  getEnvFlag: vi.fn(),
  setEnvValue: vi.fn(),
}));
vi.mock("../lib/pulumi.js", () => ({
  provisionStack: vi.fn(),
  destroyStack: vi.fn(),
}));
vi.mock("./hooks.js", () => ({
  preprovision: vi.fn(),
  postprovision: vi.fn(),
}));

import { getEnvValue, getEnvFlag, setEnvValue } from "../lib/azd.js";
import { provisionStack, destroyStack } from "../lib/pulumi.js";
import { DeployEnvError } from "../lib/validation.js";
import { preprovision, postprovision } from "./hooks.js";
import { provision, destroy, readStackConfig, stackNameFor, findPackageRoot, INFRA_DIR } from "./provision.js";

const mockGetEnvValue = vi.mocked(getEnvValue);
const mockGetEnvFlag = vi.mocked(getEnvFlag);
const mockSetEnvValue = vi.mocked(setEnvValue);
const mockProvisionStack = vi.mocked(provisionStack);
const mockDestroyStack = vi.mocked(destroyStack);
const mockPreprovision = vi.mocked(preprovision);
const mockPostprovision = vi.mocked(postprovision);

const FALLBACK = "mcr.microsoft.com/azuredocs/containerapps-helloworld:latest";
const BACKEND_IMAGE = "devrapacr.azurecr.io/raptor/backend-dev@sha256:6666666666666666666666666666666666666666666666666666666666666666";

let azdValues: Record<string, string> = {};

const baseEnv = {
  AZURE_ENV_NAME: "dev",
  AZURE_LOCATION: "eastus2",
  AZURE_SUBSCRIPTION_ID: "00000000-0000-0000-0000-000000000000",
  STATE_STORAGE_ACCOUNT: "stpulumistate",
  PULUMI_CONFIG_PASSPHRASE: "test-passphrase",
};

describe("provision and destroy", () => {
  const originalEnv = process.env;
  vi.spyOn(console, "log").mockImplementation(() => {});

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...originalEnv, ...baseEnv };
    for (const key of ["AZURE_RESOURCE_GROUP", "GITHUB_SHA", "APP_PREFIX", "ACR_NAMESPACE", "FALLBACK_IMAGE"]) {
      delete process.env[key];
    }
    azdValues = {
      AZURE_RESOURCE_GROUP: "rg-raptor-dev",
      AZURE_ACR_NAME: "devrapacr",
      KEY_VAULT_NAME: "kv-dev-abc-v10",
      SQL_ADMIN_PASSWORD: "test-password",
      SERVICE_BACKEND_IMAGE_NAME: BACKEND_IMAGE,
      SKIP_BACKEND_ACR_PULL_ROLE_ASSIGNMENT: "false",
    };
    mockGetEnvValue.mockImplementation(async (key: string) => azdValues[key]);
    mockGetEnvFlag.mockImplementation(async (key: string, fallback: boolean) =>
      azdValues[key] === undefined ? fallback : azdValues[key] === "true"
    );
    mockProvisionStack.mockResolvedValue({});
  });

  afterEach(() => {
    process.env = originalEnv;
  });

  describe("readStackConfig", () => {
    it("maps the azd environment onto stack config", async () => {
      const { config, secrets } = await readStackConfig({
        ...baseEnv,
        APP_PREFIX: "rap",
        ACR_NAMESPACE: "raptor",
        FALLBACK_IMAGE: FALLBACK,
      });

      expect(config).toEqual({
        environmentName: "dev",
        location: "eastus2",
        resourceGroupName: "rg-raptor-dev",
        acrName: "devrapacr",
        acrResourceGroupName: "rg-raptor-dev",
        keyVaultName: "kv-dev-abc-v10",
        appPrefix: "rap",
        acrNamespace: "raptor",
        enableSqlDatabase: "true",
        enableProcesses: "false",
        frontendImage: FALLBACK,
        skipFrontendAcrPull: "true",
        backendImage: BACKEND_IMAGE,
        skipBackendAcrPull: "false",
        processesImage: FALLBACK,
        skipProcessesAcrPull: "true",
        sqlAdminLogin: "sqladmin",
      });
      expect(secrets).toEqual({ sqlAdminPassword: "test-password" });
    });

    it("leaves SQL settings out when SQL is disabled", async () => {
      azdValues.ENABLE_SQL_DATABASE = "false";
      delete azdValues.SQL_ADMIN_PASSWORD;

      const { config, secrets } = await readStackConfig({
        ...baseEnv,
        APP_PREFIX: "rap",
        ACR_NAMESPACE: "raptor",
        FALLBACK_IMAGE: FALLBACK,
      });

      expect(config.enableSqlDatabase).toBe("false");
      expect(config.sqlAdminLogin).toBeUndefined();
      expect(secrets).toEqual({});
    });

    it("requires the registry and vault names written by the hooks", async () => {
      delete azdValues.KEY_VAULT_NAME;

      const error = await readStackConfig({ ...baseEnv, APP_PREFIX: "rap", ACR_NAMESPACE: "raptor", FALLBACK_IMAGE: FALLBACK })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DeployEnvError);
      expect(error).toMatchObject({ missingVars: ["KEY_VAULT_NAME"] });
    });

    it("records the commit being deployed", async () => {
      process.env.GITHUB_SHA = "abc123";

      const { config } = await readStackConfig({ ...baseEnv, APP_PREFIX: "rap", ACR_NAMESPACE: "raptor", FALLBACK_IMAGE: FALLBACK });

      expect(config.commitSha).toBe("abc123");
    });
  });

  describe("provision", () => {
    it("runs hooks around the stack update and stores outputs in azd", async () => {
      mockProvisionStack.mockResolvedValue({
        frontendAppName: "dev-rap-fe",
        backendUrl: "https://dev-rap-be.example.azurecontainerapps.io",
        sqlServerName: "sql-raptor-dev",
        containerRegistryEndpoint: "devrapacr.azurecr.io",
        unrelated: "ignored",
      });

      const outputs = await provision();

      expect(outputs.frontendAppName).toBe("dev-rap-fe");
      expect(mockPreprovision).toHaveBeenCalledTimes(1);
      expect(mockPostprovision).toHaveBeenCalledTimes(1);
      expect(mockProvisionStack).toHaveBeenCalledWith(
        expect.objectContaining({
          stateStorageAccount: "stpulumistate",
          stackName: "organization/aca-infra/dev",
          workDir: INFRA_DIR,
          secrets: { sqlAdminPassword: "test-password" },
        })
      );
      expect(mockSetEnvValue).toHaveBeenCalledWith("FRONTEND_APP_NAME", "dev-rap-fe");
      expect(mockSetEnvValue).toHaveBeenCalledWith("BACKEND_URL", "https://dev-rap-be.example.azurecontainerapps.io");
      expect(mockSetEnvValue).toHaveBeenCalledWith("sqlServerName", "sql-raptor-dev");
      expect(mockSetEnvValue).toHaveBeenCalledWith("AZURE_CONTAINER_REGISTRY_ENDPOINT", "devrapacr.azurecr.io");
      expect(mockSetEnvValue).toHaveBeenCalledTimes(4);
    });

    it("skips both hooks on request", async () => {
      await provision({ skipHooks: true, workDir: "/tmp/infra" });

      expect(mockPreprovision).not.toHaveBeenCalled();
      expect(mockPostprovision).not.toHaveBeenCalled();
      expect(mockProvisionStack.mock.calls[0][0].workDir).toBe("/tmp/infra");
    });

    it("validates the environment before running hooks", async () => {
      delete process.env.STATE_STORAGE_ACCOUNT;

      await expect(provision()).rejects.toBeInstanceOf(DeployEnvError);
      expect(mockPreprovision).not.toHaveBeenCalled();
    });

    it("does not apply the stack when a hook fails", async () => {
      mockPreprovision.mockRejectedValue(new Error("ACR setup failed"));

      await expect(provision()).rejects.toThrow("ACR setup failed");
      expect(mockProvisionStack).not.toHaveBeenCalled();
    });
  });

  describe("destroy", () => {
    it("destroys the environment's stack", async () => {
      mockDestroyStack.mockResolvedValue(true);

      expect(await destroy()).toBe(true);
      expect(mockDestroyStack).toHaveBeenCalledWith({
        stateStorageAccount: "stpulumistate",
        stackName: stackNameFor("dev"),
        workDir: INFRA_DIR,
      });
    });

    it("reports a missing stack", async () => {
      mockDestroyStack.mockResolvedValue(false);

      expect(await destroy()).toBe(false);
    });
  });
});

describe("findPackageRoot", () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(path.join(tmpdir(), "pkg-root-"));
    writeFileSync(path.join(root, "package.json"), "{}\n");
    mkdirSync(path.join(root, "dist", "cli", "src", "commands"), { recursive: true });
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it("walks up from the build output to the package", () => {
    expect(findPackageRoot(path.join(root, "dist", "cli", "src", "commands"))).toBe(root);
  });

  it("points the stack at the Pulumi project", () => {
    expect(existsSync(path.join(INFRA_DIR, "Pulumi.yaml"))).toBe(true);
  });
});
