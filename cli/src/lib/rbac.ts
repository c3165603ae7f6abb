// cli/src/lib/rbac.ts
import { azTry } from "./az.js";

export interface Principal {
  subscriptionId: string;
  /** Sign-in name of the user or the client id of a service principal */
  assignee: string;
}

/**
 * The identity the Azure CLI is logged in as, or undefined when it cannot be read.
 */
export async function currentPrincipal(): Promise<Principal | undefined> {
  const subscriptionId = await currentSubscriptionId();
  const assignee = await azTry(["account", "show", "--query", "user.name", "-o", "tsv"]);
  if (!subscriptionId || !assignee) {
    return undefined;
  }
  return { subscriptionId, assignee };
}

export async function currentSubscriptionId(): Promise<string | undefined> {
  return azTry(["account", "show", "--query", "id", "-o", "tsv"]);
}

export function resourceGroupScope(subscriptionId: string, resourceGroup: string): string {
  return `/subscriptions/${subscriptionId}/resourceGroups/${resourceGroup}`;
}

/**
 * Role names held at `scope`, inherited ones included.
 * An empty list means the assignments could not be read.
 */
export async function roleNamesAt(assignee: string, scope: string): Promise<string[]> {
  const output = await azTry([
    "role", "assignment", "list",
    "--assignee", assignee,
    "--scope", scope,
    "--include-inherited",
    "--query", "[].roleDefinitionName",
    "-o", "tsv",
  ]);
  if (!output) {
    return [];
  }
  return output.split("\n").map(line => line.trim()).filter(Boolean);
}

export function canManageResources(roles: string[]): boolean {
  return roles.some(role => /^(owner|contributor)$/i.test(role));
}

export function canAssignRoles(roles: string[]): boolean {
  return roles.some(role => /owner|user access administrator/i.test(role));
}

export async function groupExists(resourceGroup: string): Promise<boolean> {
  return (await groupLocation(resourceGroup)) !== undefined;
}

export async function groupLocation(resourceGroup: string): Promise<string | undefined> {
  return azTry(["group", "show", "-n", resourceGroup, "--query", "location", "-o", "tsv"]);
}
