// cli/src/commands/provision.ts
import { existsSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { validateEnv, provisionEnvSchema, DeployEnvError, type ProvisionEnv } from "../lib/validation.js";
import { getEnvValue, getEnvFlag, setEnvValue } from "../lib/azd.js";
import { provisionStack, destroyStack, type StackOutputs } from "../lib/pulumi.js";
import { KNOWN_SERVICES, defaultResourceGroup, imageEnvVar, skipAcrPullVar } from "../lib/naming.js";
import { preprovision, postprovision } from "./hooks.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Nearest directory at or above `start` holding a package.json. The CLI runs
 * both from source and from dist/, so a fixed relative path will not do.
 */
export function findPackageRoot(start: string): string {
  let dir = path.resolve(start);
  while (!existsSync(path.join(dir, "package.json"))) {
    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new Error(`No package.json found above ${start}`);
    }
    dir = parent;
  }
  return dir;
}

export const INFRA_DIR = path.join(findPackageRoot(__dirname), "azure", "infrastructure");
export const PULUMI_PROJECT = "aca-infra";

/** Stack output name → azd key */
export const OUTPUT_KEYS = {
  frontendAppName: "FRONTEND_APP_NAME",
  backendAppName: "BACKEND_APP_NAME",
  processesAppName: "PROCESSES_APP_NAME",
  frontendUrl: "FRONTEND_URL",
  backendUrl: "BACKEND_URL",
  sqlServerName: "sqlServerName",
  sqlDatabaseName: "SQL_DATABASE_NAME",
  containerAppsEnvironmentId: "AZURE_CONTAINER_APPS_ENVIRONMENT_ID",
  // azd pushes service images here on `azd deploy`
  containerRegistryEndpoint: "AZURE_CONTAINER_REGISTRY_ENDPOINT",
} as const;

export interface ProvisionOptions {
  skipHooks?: boolean;
  workDir?: string;
}

export function stackNameFor(envName: string): string {
  return `organization/${PULUMI_PROJECT}/${envName}`;
}

async function requireAzdValue(key: string): Promise<string> {
  const value = (await getEnvValue(key)) ?? process.env[key];
  if (!value) {
    throw new DeployEnvError([key], "provision");
  }
  return value;
}

export interface StackConfig {
  config: Record<string, string>;
  secrets: Record<string, string>;
}

/**
 * Translate the azd environment, as left by the pre-provision hooks, into stack config.
 */
export async function readStackConfig(env: ProvisionEnv): Promise<StackConfig> {
  const resourceGroup =
    (await getEnvValue("AZURE_RESOURCE_GROUP")) ??
    env.AZURE_RESOURCE_GROUP ??
    defaultResourceGroup(env.AZURE_ENV_NAME, env.ACR_NAMESPACE);
  const acrName = await requireAzdValue("AZURE_ACR_NAME");
  const enableSql = await getEnvFlag("ENABLE_SQL_DATABASE", true);

  const config: Record<string, string> = {
    environmentName: env.AZURE_ENV_NAME,
    location: env.AZURE_LOCATION,
    resourceGroupName: resourceGroup,
    acrName,
    acrResourceGroupName: (await getEnvValue("AZURE_ACR_RESOURCE_GROUP")) ?? resourceGroup,
    keyVaultName: await requireAzdValue("KEY_VAULT_NAME"),
    appPrefix: env.APP_PREFIX,
    acrNamespace: env.ACR_NAMESPACE,
    enableSqlDatabase: String(enableSql),
    enableProcesses: String(await getEnvFlag("ENABLE_PROCESSES", false)),
  };

  for (const service of KNOWN_SERVICES) {
    config[`${service}Image`] = (await getEnvValue(imageEnvVar(service))) ?? env.FALLBACK_IMAGE;
    config[`skip${service.charAt(0).toUpperCase()}${service.slice(1)}AcrPull`] = String(
      await getEnvFlag(skipAcrPullVar(service), true)
    );
  }

  const commitSha = process.env.GITHUB_SHA ?? (await getEnvValue("COMMIT_SHA"));
  if (commitSha) {
    config.commitSha = commitSha;
  }

  const secrets: Record<string, string> = {};
  if (enableSql) {
    config.sqlAdminLogin = (await getEnvValue("SQL_ADMIN_LOGIN")) ?? "sqladmin";
    secrets.sqlAdminPassword = await requireAzdValue("SQL_ADMIN_PASSWORD");
  }

  return { config, secrets };
}

async function storeOutputs(outputs: StackOutputs): Promise<void> {
  for (const [output, key] of Object.entries(OUTPUT_KEYS)) {
    const value = outputs[output];
    if (value) {
      await setEnvValue(key, value);
      console.log(`  ${key}=${value}`);
    }
  }
}

/**
 * Full provision: pre-provision hooks, `pulumi up`, outputs back into azd,
 * then the post-provision hook.
 */
export async function provision(options: ProvisionOptions = {}): Promise<StackOutputs> {
  const { skipHooks = false, workDir = INFRA_DIR } = options;

  console.log("\n=== Provisioning environment ===\n");
  console.log("Validating environment...");
  const env = validateEnv(provisionEnvSchema, process.env, "provision");
  console.log("Environment validated\n");

  if (skipHooks) {
    console.log("Skipping pre-provision hooks (--skip-hooks)");
  } else {
    await preprovision();
  }

  const { config, secrets } = await readStackConfig(env);
  const stackName = stackNameFor(env.AZURE_ENV_NAME);
  console.log(`Applying stack '${stackName}'...\n`);

  const outputs = await provisionStack({
    stateStorageAccount: env.STATE_STORAGE_ACCOUNT,
    stackName,
    workDir,
    config,
    secrets,
  });

  console.log("\nStoring stack outputs in azd environment:");
  await storeOutputs(outputs);

  if (skipHooks) {
    console.log("Skipping post-provision hook (--skip-hooks)");
  } else {
    await postprovision();
  }

  console.log(`\n=== Provision complete for '${env.AZURE_ENV_NAME}' ===\n`);
  return outputs;
}

export interface DestroyOptions {
  workDir?: string;
}

/**
 * Tear down the environment's stack. The Key Vault lives outside the stack and survives.
 */
export async function destroy(options: DestroyOptions = {}): Promise<boolean> {
  const { workDir = INFRA_DIR } = options;
  const env = validateEnv(provisionEnvSchema, process.env, "destroy");
  const stackName = stackNameFor(env.AZURE_ENV_NAME);

  console.log(`\n=== Destroying stack '${stackName}' ===\n`);
  const destroyed = await destroyStack({
    stateStorageAccount: env.STATE_STORAGE_ACCOUNT,
    stackName,
    workDir,
  });

  if (destroyed) {
    console.log(`\n=== Destroy complete for '${env.AZURE_ENV_NAME}' ===\n`);
  } else {
    console.log(`\n=== No resources found for '${env.AZURE_ENV_NAME}' ===\n`);
  }
  return destroyed;
}
