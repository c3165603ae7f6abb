// cli/src/commands/keyvault.ts
import { validateEnv, keyVaultEnvSchema, type KeyVaultEnv } from "../lib/validation.js";
import { setEnvValue } from "../lib/azd.js";
import {
  BOOTSTRAP_SECRETS,
  KeyVaultError,
  vaultExists,
  deletedVaultStatus,
  recoverVault,
  createVault,
  signedInObjectId,
  grantSecretPolicy,
  setSecret,
  type BootstrapSecretVar,
  type DeletedVaultState,
} from "../lib/keyvault.js";
import { currentSubscriptionId } from "../lib/rbac.js";
import { defaultResourceGroup, keyVaultName, keyVaultRetentionDays } from "../lib/naming.js";

export type EnsureKeyVaultResult = "exists" | "recovered" | "created";

async function subscriptionFor(env: KeyVaultEnv): Promise<string> {
  const subscriptionId = env.AZURE_SUBSCRIPTION_ID ?? (await currentSubscriptionId());
  if (!subscriptionId) {
    throw new Error("Could not determine the Azure subscription; run 'az login' or set AZURE_SUBSCRIPTION_ID");
  }
  return subscriptionId;
}

async function vaultNameFor(env: KeyVaultEnv): Promise<string> {
  if (env.KEY_VAULT_NAME) {
    console.log(`Using provided Key Vault name: ${env.KEY_VAULT_NAME}`);
    return env.KEY_VAULT_NAME;
  }
  const name = keyVaultName(await subscriptionFor(env), env.AZURE_ENV_NAME);
  console.log(`Calculated Key Vault name: ${name}`);
  return name;
}

async function seedSecrets(vault: string, env: KeyVaultEnv): Promise<void> {
  const vars = Object.keys(BOOTSTRAP_SECRETS).filter((v): v is BootstrapSecretVar => v in BOOTSTRAP_SECRETS);
  for (const envVar of vars) {
    const value = env[envVar];
    if (!value) {
      continue;
    }
    const secretName = BOOTSTRAP_SECRETS[envVar];
    if (await setSecret(vault, secretName, value)) {
      console.log(`Secret '${secretName}' created`);
    } else {
      console.warn(`Failed to create ${secretName}`);
    }
  }
}

/**
 * Pre-provision: the vault lives outside the stack so that it survives
 * teardown. Create it, or recover it from soft delete.
 */
export async function ensureKeyVault(): Promise<EnsureKeyVaultResult> {
  console.log("\n=== Key Vault Setup Check ===\n");
  const env = validateEnv(keyVaultEnvSchema, process.env, "ensure-keyvault");

  let resourceGroup = env.AZURE_RESOURCE_GROUP;
  if (!resourceGroup) {
    resourceGroup = defaultResourceGroup(env.AZURE_ENV_NAME, env.ACR_NAMESPACE);
    console.log(`AZURE_RESOURCE_GROUP not set, using default: ${resourceGroup}`);
  }

  const vault = await vaultNameFor(env);
  await setEnvValue("KEY_VAULT_NAME", vault);

  if (await vaultExists(vault, resourceGroup)) {
    console.log(`Key Vault '${vault}' already exists`);
    return "exists";
  }

  const deleted = await deletedVaultStatus(vault);
  if (deleted.state === "deleted") {
    console.warn(`Key Vault '${vault}' exists in soft-deleted state, attempting to recover...`);
    if (await recoverVault(vault, env.AZURE_LOCATION)) {
      console.log("Key Vault recovered successfully");
      return "recovered";
    }
    throw new KeyVaultError(
      vault,
      `Could not recover soft-deleted Key Vault '${vault}' (may lack permissions). ` +
        "Wait for auto-purge (7-90 days), ask an admin to purge it, or set KEY_VAULT_NAME to a different name."
    );
  }

  const retentionDays = keyVaultRetentionDays(env.AZURE_ENV_NAME);
  console.log(`Creating Key Vault '${vault}' (retention: ${retentionDays} days)...`);
  await createVault({ name: vault, resourceGroup, location: env.AZURE_LOCATION, retentionDays });
  console.log(`Key Vault created successfully: ${vault}`);

  const objectId = await signedInObjectId();
  if (!objectId) {
    console.warn("Could not determine current identity, skipping access policy assignment");
  } else if (await grantSecretPolicy(vault, objectId)) {
    console.log("Access policies granted");
  } else {
    console.warn("Failed to set access policies, but continuing...");
  }

  await seedSecrets(vault, env);
  return "created";
}

/**
 * Recover the environment's vault from soft delete when it sits there.
 * Never fails; an unreadable state only produces guidance.
 */
export async function recoverKeyVault(): Promise<DeletedVaultState> {
  console.log("\n=== Checking for soft-deleted Key Vaults ===\n");
  const env = validateEnv(keyVaultEnvSchema, process.env, "recover-keyvault");

  const vault = await vaultNameFor(env);
  const status = await deletedVaultStatus(vault, env.AZURE_LOCATION);

  switch (status.state) {
    case "deleted":
      console.log(`Found soft-deleted Key Vault: ${vault}`);
      console.log(`  Scheduled purge date: ${status.scheduledPurgeDate ?? "Unknown"}`);
      if (await recoverVault(vault, env.AZURE_LOCATION)) {
        console.log(`Successfully recovered Key Vault: ${vault}`);
      } else {
        console.warn("Recovery initiated but may take a few moments to complete. If deployment fails, wait 1-2 minutes and retry.");
      }
      break;
    case "forbidden":
      console.warn("Cannot check soft-deleted vaults due to permissions.");
      console.warn("If deployment fails with 'vault already exists in deleted state':");
      console.warn(`  1. Ask an admin to recover: az keyvault recover --name ${vault}`);
      console.warn(`  2. Or wait for auto-purge (${keyVaultRetentionDays(env.AZURE_ENV_NAME)} days for this environment)`);
      break;
    case "not-found":
      console.log("No soft-deleted Key Vault found. Deployment will create a new vault.");
      break;
    default:
      console.log("Could not determine vault status, continuing with deployment...");
  }

  console.log("\nKey Vault recovery check complete.\n");
  return status.state;
}
