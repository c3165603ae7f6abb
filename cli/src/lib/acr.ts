// cli/src/lib/acr.ts
import { z } from "zod";
import { az, azOutput, azSucceeds, azTry, azTryJson } from "./az.js";

export class AcrAccessError extends Error {
  constructor(public registry: string, message: string) {
    super(message);
    this.name = "AcrAccessError";
  }
}

export type RepositoryStatus = "exists" | "missing" | "unknown";

export async function findTag(registry: string, repository: string, tag: string): Promise<string | undefined> {
  return azTry([
    "acr", "repository", "show-tags",
    "-n", registry,
    "--repository", repository,
    "--query", `[?@=='${tag}'] | [0]`,
    "-o", "tsv",
  ]);
}

/**
 * First tag starting with `prefix`. Images are often tagged with a short
 * commit hash while the app carries the full one.
 */
export async function findTagWithPrefix(registry: string, repository: string, prefix: string): Promise<string | undefined> {
  return azTry([
    "acr", "repository", "show-tags",
    "-n", registry,
    "--repository", repository,
    "--query", `[?starts_with(@, '${prefix}')] | [0]`,
    "-o", "tsv",
  ]);
}

/**
 * `unknown` means the CLI reported an error, typically missing data-plane rights,
 * so the repository may or may not be there.
 */
export async function repositoryStatus(registry: string, repository: string): Promise<RepositoryStatus> {
  const { output } = await azOutput([
    "acr", "repository", "show",
    "-n", registry,
    "--repository", repository,
    "--query", "name",
    "-o", "tsv",
  ]);
  if (/error/i.test(output)) {
    return "unknown";
  }
  const firstLine = output.split("\n")[0]?.trim() ?? "";
  return firstLine ? "exists" : "missing";
}

export async function digestExists(registry: string, repository: string, digest: string): Promise<boolean> {
  const found = await azTry([
    "acr", "repository", "show-manifests",
    "-n", registry,
    "--repository", repository,
    "--query", `[?digest=='${digest}'].digest | [0]`,
    "-o", "tsv",
  ]);
  return found !== undefined;
}

export async function latestDigest(registry: string, repository: string): Promise<string | undefined> {
  return azTry([
    "acr", "repository", "show-manifests",
    "-n", registry,
    "--repository", repository,
    "--orderby", "time_desc",
    "--top", "1",
    "--query", "[0].digest",
    "-o", "tsv",
  ]);
}

export async function digestForTag(registry: string, repository: string, tag: string): Promise<string | undefined> {
  return azTry([
    "acr", "repository", "show",
    "-n", registry,
    "--image", `${repository}:${tag}`,
    "--query", "digest",
    "-o", "tsv",
  ]);
}

const registrySchema = z.object({
  id: z.string(),
  name: z.string(),
  resourceGroup: z.string().nullish(),
  loginServer: z.string().nullish(),
});

export interface Registry {
  id: string;
  name: string;
  resourceGroup?: string;
}

function resourceGroupFromId(id: string): string | undefined {
  const match = /\/resourceGroups\/([^/]+)\/providers\//i.exec(id);
  return match?.[1];
}

/**
 * Look a registry up by name anywhere in the subscription.
 */
export async function showRegistry(name: string): Promise<Registry | undefined> {
  const raw = await azTryJson(["acr", "show", "-n", name], registrySchema);
  if (!raw) {
    return undefined;
  }
  return {
    id: raw.id,
    name: raw.name,
    resourceGroup: raw.resourceGroup ?? resourceGroupFromId(raw.id),
  };
}

export async function registryId(name: string, resourceGroup?: string): Promise<string | undefined> {
  const args = ["acr", "show", "-n", name];
  if (resourceGroup) {
    args.push("-g", resourceGroup);
  }
  return azTry([...args, "--query", "id", "-o", "tsv"]);
}

const nameCheckSchema = z.object({
  nameAvailable: z.boolean(),
  reason: z.string().nullish(),
  message: z.string().nullish(),
});

export type NameCheck = z.infer<typeof nameCheckSchema>;

export async function checkName(name: string): Promise<NameCheck | undefined> {
  return azTryJson(["acr", "check-name", "-n", name], nameCheckSchema);
}

export async function createRegistry(name: string, resourceGroup: string, location: string): Promise<void> {
  await az([
    "acr", "create",
    "-n", name,
    "-g", resourceGroup,
    "-l", location,
    "--sku", "Standard",
    "--admin-enabled", "false",
    "--only-show-errors",
  ]);
}

export interface ImportParams {
  registry: string;
  source: string;
  /** Target `repository@digest` or `repository:tag` */
  image: string;
  force?: boolean;
  noWait?: boolean;
}

export async function importImage(params: ImportParams): Promise<boolean> {
  const args = ["acr", "import", "--name", params.registry, "--source", params.source, "--image", params.image];
  if (params.force) {
    args.push("--force");
  }
  if (params.noWait) {
    args.push("--no-wait");
  }
  return azSucceeds(args);
}

export async function untag(registry: string, image: string): Promise<boolean> {
  return azSucceeds(["acr", "repository", "untag", "--name", registry, "--image", image]);
}

export async function acrPullRoleId(): Promise<string> {
  return az(["role", "definition", "list", "--name", "AcrPull", "--query", "[0].name", "-o", "tsv"]);
}

/**
 * Assign a role to a service principal. Failures (including an existing
 * assignment) are reported, not thrown.
 */
export async function assignRole(principalId: string, roleId: string, scope: string): Promise<boolean> {
  return azSucceeds([
    "role", "assignment", "create",
    "--assignee-object-id", principalId,
    "--assignee-principal-type", "ServicePrincipal",
    "--role", roleId,
    "--scope", scope,
  ]);
}
