import { describe, it, expect, afterEach } from "vitest";
import {
  validateEnv,
  formatMissingVarsError,
  imageDeployEnvSchema,
  releaseNotesEnvSchema,
  mailEnvSchema,
  DeployEnvError,
  readConventions,
} from "./validation.js";

describe("validateEnv", () => {
  it("returns validated env when all required vars present", () => {
    const env = {
      AZURE_ENV_NAME: "dev",
      AZURE_RESOURCE_GROUP: "rg-raptor-dev",
      AZURE_ACR_NAME: "devrapacr",
    };
    const result = validateEnv(imageDeployEnvSchema, env, "deploy-image");
    expect(result.AZURE_ENV_NAME).toBe("dev");
    expect(result.AZURE_ACR_NAME).toBe("devrapacr");
  });

  it("applies naming convention defaults", () => {
    const env = {
      AZURE_ENV_NAME: "dev",
      AZURE_RESOURCE_GROUP: "rg-raptor-dev",
      AZURE_ACR_NAME: "devrapacr",
    };
    const result = validateEnv(imageDeployEnvSchema, env, "deploy-image");
    expect(result.APP_PREFIX).toBe("rap");
    expect(result.ACR_NAMESPACE).toBe("raptor");
    expect(result.FALLBACK_IMAGE).toBe("mcr.microsoft.com/azuredocs/containerapps-helloworld:latest");
  });

  it("throws DeployEnvError with missing vars listed", () => {
    const env = { AZURE_ENV_NAME: "dev" };
    try {
      validateEnv(imageDeployEnvSchema, env, "deploy-image");
      expect.fail("Should have thrown");
    } catch (e) {
      expect(e).toBeInstanceOf(DeployEnvError);
      const error = e as DeployEnvError;
      expect(error.missingVars).toEqual(["AZURE_RESOURCE_GROUP", "AZURE_ACR_NAME"]);
      expect(error.scope).toBe("deploy-image");
    }
  });

  it("treats empty strings as missing", () => {
    const env = {
      AZURE_ENV_NAME: "dev",
      AZURE_RESOURCE_GROUP: "",
      AZURE_ACR_NAME: "devrapacr",
    };
    try {
      validateEnv(imageDeployEnvSchema, env, "deploy-image");
      expect.fail("Should have thrown");
    } catch (e) {
      expect((e as DeployEnvError).missingVars).toEqual(["AZURE_RESOURCE_GROUP"]);
    }
  });

  it("coerces numeric settings", () => {
    const env = {
      SRC_IMAGE: "devrapacr.azurecr.io/raptor/frontend-dev@sha256:abc",
      SRC_REPO: "example/frontend",
      TARGET_ENV: "test",
      COMMITS_TABLE_LIMIT: "10",
    };
    const result = validateEnv(releaseNotesEnvSchema, env, "release-notes");
    expect(result.COMMITS_TABLE_LIMIT).toBe(10);
    expect(result.SERVICE_KEY).toBe("frontend");
  });

  it("rejects invalid values with a plain Error", () => {
    const env = {
      SRC_IMAGE: "devrapacr.azurecr.io/raptor/frontend-dev@sha256:abc",
      SRC_REPO: "example/frontend",
      TARGET_ENV: "test",
      COMMITS_TABLE_LIMIT: "-3",
    };
    expect(() => validateEnv(releaseNotesEnvSchema, env, "release-notes")).toThrow(
      /Environment validation failed/
    );
  });

  it("defaults release body paths for mail", () => {
    const env = {
      MAIL_SERVER: "smtp.example.com",
      MAIL_USERNAME: "mailer",
      MAIL_PASSWORD: "test-secret",
      MAIL_TO: "team@example.com",
    };
    const result = validateEnv(mailEnvSchema, env, "notify");
    expect(result.RELEASE_HTML).toBe("release-notes.html");
    expect(result.RELEASE_BODY).toBe("release-notes.md");
  });
});

describe("readConventions", () => {
  it("defaults every convention", () => {
    expect(readConventions({})).toEqual({
      APP_PREFIX: "rap",
      ACR_NAMESPACE: "raptor",
      FALLBACK_IMAGE: "mcr.microsoft.com/azuredocs/containerapps-helloworld:latest",
    });
  });

  it("treats empty strings as unset", () => {
    expect(readConventions({ APP_PREFIX: "", ACR_NAMESPACE: "shop" })).toMatchObject({
      APP_PREFIX: "rap",
      ACR_NAMESPACE: "shop",
    });
  });
});

describe("formatMissingVarsError", () => {
  const originalActions = process.env.GITHUB_ACTIONS;

  afterEach(() => {
    if (originalActions === undefined) {
      delete process.env.GITHUB_ACTIONS;
    } else {
      process.env.GITHUB_ACTIONS = originalActions;
    }
  });

  it("lists each missing variable with the azd hint locally", () => {
    delete process.env.GITHUB_ACTIONS;
    const message = formatMissingVarsError(new DeployEnvError(["AZURE_ACR_NAME", "AZURE_ENV_NAME"], "promote"));
    expect(message).toContain("ERROR: Missing required environment variables for promote:");
    expect(message).toContain("  - AZURE_ACR_NAME\n  - AZURE_ENV_NAME");
    expect(message.split("\n").at(-1)).toBe("Set these with: azd env set <NAME> <value>");
  });

  it("points at repository secrets under GitHub Actions", () => {
    process.env.GITHUB_ACTIONS = "true";
    const message = formatMissingVarsError(new DeployEnvError(["MAIL_SERVER"], "notify"));
    expect(message.split("\n").at(-1)).toBe(
      "Set these in: Repository Settings > Secrets and variables > Actions"
    );
  });
});
