// cli/src/lib/keyvault.ts
import { az, azOutput, azSucceeds, azTry } from "./az.js";

export class KeyVaultError extends Error {
  constructor(public vaultName: string, message: string) {
    super(message);
    this.name = "KeyVaultError";
  }
}

/**
 * Secrets seeded into a freshly created vault: environment variable -> secret name.
 */
export const BOOTSTRAP_SECRETS = {
  OIDC_CLIENT_SECRET: "oidc-client-secret",
  JWT_SECRET: "jwt-secret",
  AZURE_AD_CLIENT_SECRET: "aad-client-secret",
} as const;

export type BootstrapSecretVar = keyof typeof BOOTSTRAP_SECRETS;

export type DeletedVaultState = "deleted" | "not-found" | "forbidden" | "unknown";

export interface DeletedVaultStatus {
  state: DeletedVaultState;
  scheduledPurgeDate?: string;
}

export async function vaultExists(name: string, resourceGroup: string): Promise<boolean> {
  return azSucceeds(["keyvault", "show", "--name", name, "--resource-group", resourceGroup]);
}

function purgeDateFrom(output: string): string | undefined {
  try {
    const parsed: unknown = JSON.parse(output);
    if (typeof parsed === "object" && parsed !== null && "properties" in parsed) {
      const properties: unknown = parsed.properties;
      if (typeof properties === "object" && properties !== null && "scheduledPurgeDate" in properties) {
        const date: unknown = properties.scheduledPurgeDate;
        return typeof date === "string" ? date : undefined;
      }
    }
  } catch {
    return undefined;
  }
  return undefined;
}

/**
 * Classify `az keyvault show-deleted`. The CLI only tells us about
 * missing permissions or a missing vault through its error text.
 */
export async function deletedVaultStatus(name: string, location?: string): Promise<DeletedVaultStatus> {
  const args = ["keyvault", "show-deleted", "--name", name];
  if (location) {
    args.push("--location", location);
  }
  const { ok, output } = await azOutput(args);

  if (output.includes("scheduledPurgeDate")) {
    return { state: "deleted", scheduledPurgeDate: purgeDateFrom(output) };
  }
  if (output.includes("AuthorizationFailed")) {
    return { state: "forbidden" };
  }
  if (/not found|ResourceNotFound/i.test(output)) {
    return { state: "not-found" };
  }
  // Some CLI versions print a bare object for a deleted vault
  if (ok && output.length > 0) {
    return { state: "deleted" };
  }
  return { state: "unknown" };
}

export async function recoverVault(name: string, location: string): Promise<boolean> {
  return azSucceeds(["keyvault", "recover", "--name", name, "--location", location]);
}

export interface CreateVaultParams {
  name: string;
  resourceGroup: string;
  location: string;
  retentionDays: number;
}

/**
 * Access-policy vault with purge protection on.
 */
export async function createVault(params: CreateVaultParams): Promise<void> {
  await az([
    "keyvault", "create",
    "--name", params.name,
    "--resource-group", params.resourceGroup,
    "--location", params.location,
    "--retention-days", String(params.retentionDays),
    "--enable-purge-protection", "true",
    "--enable-rbac-authorization", "false",
  ]);
}

/**
 * Object id of the signed-in user, or of the service principal the CLI is logged in as.
 */
export async function signedInObjectId(): Promise<string | undefined> {
  const userId = await azTry(["ad", "signed-in-user", "show", "--query", "id", "-o", "tsv"]);
  if (userId) {
    return userId;
  }

  const accountType = await azTry(["account", "show", "--query", "user.type", "-o", "tsv"]);
  if (accountType !== "servicePrincipal") {
    return undefined;
  }
  const appId = await azTry(["account", "show", "--query", "user.name", "-o", "tsv"]);
  if (!appId) {
    return undefined;
  }
  return azTry(["ad", "sp", "show", "--id", appId, "--query", "id", "-o", "tsv"]);
}

export async function grantSecretPolicy(vaultName: string, objectId: string): Promise<boolean> {
  return azSucceeds([
    "keyvault", "set-policy",
    "--name", vaultName,
    "--object-id", objectId,
    "--secret-permissions", "get", "list", "set", "delete",
  ]);
}

export async function setSecret(vaultName: string, name: string, value: string): Promise<boolean> {
  return azSucceeds(["keyvault", "secret", "set", "--vault-name", vaultName, "--name", name, "--value", value]);
}
