// cli/src/commands/bind.ts
import { requireContainerApp, setRegistry, identityPrincipalId } from "../lib/containerapp.js";
import { registryId, acrPullRoleId, assignRole } from "../lib/acr.js";

/** Time for a fresh AcrPull assignment to reach the registry */
export const RBAC_PROPAGATION_MS = 15000;

export class AcrBindingError extends Error {
  constructor(public app: string, message: string) {
    super(message);
    this.name = "AcrBindingError";
  }
}

export interface AcrBindingOptions {
  app: string;
  resourceGroup: string;
  acrName: string;
  acrDomain: string;
  propagationMs?: number;
}

export type AcrBindingResult = "already-bound" | "system" | "user-assigned";

interface BindingIdentity {
  kind: "system" | "user-assigned";
  principalId: string;
  /** Value for `az containerapp registry set --identity` */
  identity: string;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Make sure the app pulls from `acrDomain` with a managed identity that holds AcrPull.
 * Apps that already list the registry are left alone.
 */
export async function ensureAcrBinding(options: AcrBindingOptions): Promise<AcrBindingResult> {
  const { app, resourceGroup, acrName, acrDomain, propagationMs = RBAC_PROPAGATION_MS } = options;

  const containerApp = await requireContainerApp(app, resourceGroup);
  if (containerApp.registryServers.includes(acrDomain)) {
    console.log(`ACR already configured for Container App: ${acrDomain}`);
    return "already-bound";
  }

  console.log("ACR not configured for Container App, setting up registry binding...");

  // The registry usually sits next to the app; shared registries live elsewhere
  const acrId = (await registryId(acrName, resourceGroup)) ?? (await registryId(acrName));
  if (!acrId) {
    throw new AcrBindingError(app, `Could not resolve ACR resource ID for '${acrName}'`);
  }
  const roleId = await acrPullRoleId();

  let binding: BindingIdentity | undefined;
  if (containerApp.identityTypes.includes("SystemAssigned") && containerApp.systemPrincipalId) {
    binding = { kind: "system", principalId: containerApp.systemPrincipalId, identity: "system" };
  } else {
    const firstIdentity = containerApp.userAssignedIdentityIds[0];
    if (firstIdentity) {
      const principalId = await identityPrincipalId(firstIdentity);
      if (principalId) {
        binding = { kind: "user-assigned", principalId, identity: firstIdentity };
      }
    }
  }

  if (!binding) {
    throw new AcrBindingError(app, "No managed identity found to bind ACR");
  }

  console.log(`Ensuring AcrPull role for ${binding.kind} identity: ${binding.principalId}`);
  const assigned = await assignRole(binding.principalId, roleId, acrId);
  if (!assigned) {
    console.log("AcrPull assignment not created (it may already exist)");
  }

  console.log(`Binding registry to Container App using ${binding.kind} identity`);
  await setRegistry(app, resourceGroup, acrDomain, binding.identity);

  console.log("Registry binding configured successfully");
  console.log(`Waiting ${propagationMs / 1000} seconds for RBAC propagation...`);
  await sleep(propagationMs);

  return binding.kind;
}
