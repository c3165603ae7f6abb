// cli/src/commands/acr.ts
import { validateEnv, registryEnvSchema, DeployEnvError } from "../lib/validation.js";
import { getEnvValue, setEnvValue } from "../lib/azd.js";
import { AcrAccessError, showRegistry, checkName, createRegistry, latestDigest } from "../lib/acr.js";
import {
  currentPrincipal,
  roleNamesAt,
  resourceGroupScope,
  canManageResources,
  canAssignRoles,
  groupExists,
  groupLocation,
  type Principal,
} from "../lib/rbac.js";
import { acrDomain, digestImage, imageDomain } from "../lib/image.js";
import { defaultAcrName, defaultResourceGroup, imageEnvVar, repositoryName, skipAcrPullVar } from "../lib/naming.js";
import { resolveServiceImage } from "./images.js";

export interface EnsureAcrResult {
  resourceGroup: string;
  acrName: string;
  acrResourceGroup?: string;
  created: boolean;
}

interface PreflightCheck {
  principal: Principal | undefined;
  acrName: string;
  resourceGroup: string;
  /** Also require Contributor or Owner, needed to create the registry */
  manage: boolean;
}

async function preflight(check: PreflightCheck): Promise<void> {
  const { principal, acrName, resourceGroup, manage } = check;
  if (!principal) {
    console.warn("[preflight] Unable to resolve subscription or principal for role checks; skipping permission preflight.");
    return;
  }

  const scope = resourceGroupScope(principal.subscriptionId, resourceGroup);
  const roles = await roleNamesAt(principal.assignee, scope);
  if (roles.length === 0) {
    console.warn(
      `[preflight] Could not read role assignments at scope '${scope}'. ` +
        "Continuing, but operations may fail due to insufficient permissions."
    );
    return;
  }
  console.log(`[preflight] Roles for principal '${principal.assignee}' at RG '${resourceGroup}': ${roles.join(", ")}`);

  if (manage && !canManageResources(roles)) {
    throw new AcrAccessError(
      acrName,
      `Missing Contributor or Owner on resource group '${resourceGroup}', required to create or update ACR. ` +
        `Grant 'Contributor' (minimum) or 'Owner' at scope: ${scope}`
    );
  }
  if (!canAssignRoles(roles)) {
    throw new AcrAccessError(
      acrName,
      `Missing permission to create role assignments in RG '${resourceGroup}'. ` +
        "The deployment assigns AcrPull to each app's managed identity. " +
        `Grant 'Owner' or 'User Access Administrator' at: ${scope}`
    );
  }
}

/**
 * Prefer the newest ACR image for the frontend when it is unset or still public.
 */
async function adoptFrontendImage(envName: string, acrName: string, namespace: string, fallbackImage: string): Promise<void> {
  const imageVar = imageEnvVar("frontend");
  const current = await getEnvValue(imageVar);
  const registry = acrDomain(acrName);

  if (!current) {
    await resolveServiceImage("frontend", { envName, acrName, namespace, fallbackImage });
    return;
  }
  if (imageDomain(current) === registry) {
    console.log(`${imageVar} already set to ACR image; leaving as-is.`);
    return;
  }

  const repo = repositoryName("frontend", envName, namespace);
  console.log(`Current image domain '${imageDomain(current)}' differs from ACR '${registry}'. Checking ${registry}/${repo}`);
  const digest = await latestDigest(acrName, repo);
  if (!digest) {
    console.log(`No ACR image found; keeping existing image: ${current}`);
    return;
  }
  const image = digestImage(registry, repo, digest);
  console.log(`Switching to ACR image: ${image}`);
  await setEnvValue(imageVar, image);
  await setEnvValue(skipAcrPullVar("frontend"), "false");
}

/**
 * Pre-provision: make sure the environment's container registry exists and the
 * caller may create it and grant AcrPull on it.
 */
export async function ensureAcr(): Promise<EnsureAcrResult> {
  console.log("\n=== Ensuring container registry ===\n");
  const env = validateEnv(registryEnvSchema, process.env, "ensure-acr");
  const envName = env.AZURE_ENV_NAME;

  let resourceGroup = env.AZURE_RESOURCE_GROUP;
  if (!resourceGroup) {
    if (!envName) {
      throw new DeployEnvError(["AZURE_RESOURCE_GROUP"], "ensure-acr");
    }
    resourceGroup = defaultResourceGroup(envName, env.ACR_NAMESPACE);
    await setEnvValue("AZURE_RESOURCE_GROUP", resourceGroup);
  }

  let acrName = env.AZURE_ACR_NAME;
  if (!acrName) {
    if (!envName) {
      throw new DeployEnvError(["AZURE_ACR_NAME"], "ensure-acr");
    }
    acrName = defaultAcrName(envName, env.APP_PREFIX);
    await setEnvValue("AZURE_ACR_NAME", acrName);
  }
  console.log(`Resource group: ${resourceGroup}`);
  console.log(`Registry:       ${acrName}\n`);

  if (!(await groupExists(resourceGroup))) {
    throw new Error(
      `Resource group '${resourceGroup}' not found. Set AZURE_RESOURCE_GROUP to an existing RG ` +
        "(azd env set AZURE_RESOURCE_GROUP <name>) or pre-create it."
    );
  }
  const targetGroup = env.AZURE_ACR_RESOURCE_GROUP ?? resourceGroup;
  if (targetGroup !== resourceGroup && !(await groupExists(targetGroup))) {
    throw new Error(
      `Target ACR resource group '${targetGroup}' not found. Set AZURE_ACR_RESOURCE_GROUP to an existing RG or create it.`
    );
  }

  const principal = await currentPrincipal();
  await preflight({ principal, acrName, resourceGroup: targetGroup, manage: true });

  const result: EnsureAcrResult = { resourceGroup, acrName, created: false };
  const existing = await showRegistry(acrName);
  if (existing) {
    console.log(`ACR '${acrName}' already exists in RG '${existing.resourceGroup ?? "unknown"}'. Using existing registry.`);
    if (existing.resourceGroup) {
      result.acrResourceGroup = existing.resourceGroup;
      await setEnvValue("AZURE_ACR_RESOURCE_GROUP", existing.resourceGroup);
      await preflight({ principal, acrName, resourceGroup: existing.resourceGroup, manage: false });
    }
  } else {
    const check = await checkName(acrName);
    if (check?.nameAvailable) {
      const location = await groupLocation(targetGroup);
      if (!location) {
        throw new Error(`Could not resolve location for resource group '${targetGroup}'.`);
      }
      console.log(`Creating ACR '${acrName}' in RG '${targetGroup}'...`);
      await createRegistry(acrName, targetGroup, location);
      await setEnvValue("AZURE_ACR_RESOURCE_GROUP", targetGroup);
      result.acrResourceGroup = targetGroup;
      result.created = true;
    } else if (check?.reason === "AlreadyExists") {
      throw new AcrAccessError(
        acrName,
        `ACR name '${acrName}' exists, but is not accessible in this subscription or with current credentials. ` +
          "Ensure your principal has Microsoft.ContainerRegistry/registries/read on the registry, " +
          "or switch to the subscription where it exists."
      );
    } else {
      throw new AcrAccessError(acrName, `ACR name '${acrName}' is not valid/available: ${check?.message ?? "no response"}`);
    }
  }

  if (envName) {
    await adoptFrontendImage(envName, acrName, env.ACR_NAMESPACE, env.FALLBACK_IMAGE);
  } else {
    console.log("AZURE_ENV_NAME not set; skipping frontend image resolution.");
  }

  console.log("\n=== Container registry ready ===\n");
  return result;
}
