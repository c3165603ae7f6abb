// cli/src/lib/containerapp.ts
import { z } from "zod";
import { az, azStream, azTry, azTryJson } from "./az.js";

export class ContainerAppNotFoundError extends Error {
  constructor(public app: string, public resourceGroup: string) {
    super(`Container App '${app}' not found in resource group '${resourceGroup}'`);
    this.name = "ContainerAppNotFoundError";
  }
}

const containerAppSchema = z.object({
  name: z.string(),
  identity: z
    .object({
      type: z.string().default("None"),
      principalId: z.string().nullish(),
      userAssignedIdentities: z.record(z.unknown()).nullish(),
    })
    .nullish(),
  properties: z.object({
    configuration: z
      .object({
        registries: z.array(z.object({ server: z.string() })).nullish(),
      })
      .nullish(),
    template: z
      .object({
        containers: z.array(z.object({ image: z.string() })).nullish(),
      })
      .nullish(),
  }),
  tags: z.record(z.string()).nullish(),
});

export interface ContainerApp {
  name: string;
  /** Image of the first container, if any */
  image?: string;
  registryServers: string[];
  identityTypes: string[];
  systemPrincipalId?: string;
  /** Resource ids of user-assigned identities, in the order Azure lists them */
  userAssignedIdentityIds: string[];
  tags: Record<string, string>;
}

/**
 * Read the parts of `az containerapp show` the deployment tooling relies on.
 * Resolves to undefined when the app does not exist.
 */
export async function showContainerApp(name: string, resourceGroup: string): Promise<ContainerApp | undefined> {
  const raw = await azTryJson(["containerapp", "show", "-n", name, "-g", resourceGroup], containerAppSchema);
  if (!raw) {
    return undefined;
  }

  const identityType = raw.identity?.type ?? "None";
  return {
    name: raw.name,
    image: raw.properties.template?.containers?.[0]?.image,
    registryServers: (raw.properties.configuration?.registries ?? []).map(r => r.server),
    identityTypes: identityType.split(",").map(t => t.trim()).filter(t => t && t !== "None"),
    systemPrincipalId: raw.identity?.principalId ?? undefined,
    userAssignedIdentityIds: Object.keys(raw.identity?.userAssignedIdentities ?? {}),
    tags: raw.tags ?? {},
  };
}

/**
 * Like showContainerApp, but a missing app is an error.
 */
export async function requireContainerApp(name: string, resourceGroup: string): Promise<ContainerApp> {
  const app = await showContainerApp(name, resourceGroup);
  if (!app) {
    throw new ContainerAppNotFoundError(name, resourceGroup);
  }
  return app;
}

export async function updateImage(name: string, resourceGroup: string, image: string): Promise<void> {
  await azStream(["containerapp", "update", "-n", name, "-g", resourceGroup, "--image", image]);
}

/**
 * Create a new revision from an existing one with a different image.
 * Azure does not re-validate the old revision's image on this path.
 */
export async function copyRevision(
  name: string,
  resourceGroup: string,
  fromRevision: string,
  image: string
): Promise<void> {
  await azStream([
    "containerapp", "revision", "copy",
    "-n", name,
    "-g", resourceGroup,
    "--from-revision", fromRevision,
    "--image", image,
  ]);
}

export async function latestRevisionName(name: string, resourceGroup: string): Promise<string | undefined> {
  return azTry([
    "containerapp", "revision", "list",
    "-n", name,
    "-g", resourceGroup,
    "--query", "[0].name",
    "-o", "tsv",
  ]);
}

/**
 * Bind a registry to the app. `identity` is "system" or a user-assigned identity resource id.
 */
export async function setRegistry(name: string, resourceGroup: string, server: string, identity: string): Promise<void> {
  await az([
    "containerapp", "registry", "set",
    "-n", name,
    "-g", resourceGroup,
    "--server", server,
    "--identity", identity,
  ]);
}

export async function identityPrincipalId(identityResourceId: string): Promise<string | undefined> {
  return azTry(["identity", "show", "--ids", identityResourceId, "--query", "principalId", "-o", "tsv"]);
}
