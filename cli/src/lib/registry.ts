// cli/src/lib/registry.ts
import { z } from "zod";
import { azTry } from "./az.js";
import { acrDomain } from "./image.js";

export class RegistryTokenError extends Error {
  constructor(
    public step: "access" | "manifest" | "config",
    public statusCode: number,
    public details: string
  ) {
    super(`Registry request failed at ${step} step: ${details}`);
    this.name = "RegistryTokenError";
  }
}

export const REVISION_LABEL = "org.opencontainers.image.revision";
export const VCS_REF_LABEL = "org.opencontainers.image.vcs-ref";

const IMAGE_MANIFEST_TYPES = [
  "application/vnd.oci.image.manifest.v1+json",
  "application/vnd.docker.distribution.manifest.v2+json",
];
const INDEX_TYPES = [
  "application/vnd.oci.image.index.v1+json",
  "application/vnd.docker.distribution.manifest.list.v2+json",
];

const tokenSchema = z.object({ access_token: z.string().min(1) });

const manifestSchema = z.object({
  mediaType: z.string().optional(),
  config: z.object({ digest: z.string() }).optional(),
  manifests: z.array(z.object({ digest: z.string() })).optional(),
});

type Manifest = z.infer<typeof manifestSchema>;

const labelsSchema = z.record(z.string()).nullish();

const imageConfigSchema = z.object({
  config: z.object({ Labels: labelsSchema }).nullish(),
  container_config: z.object({ Labels: labelsSchema }).nullish(),
});

export type ImageConfig = z.infer<typeof imageConfigSchema>;

export interface ImageLocation {
  /** Registry name without the .azurecr.io suffix */
  registry: string;
  repository: string;
  digest: string;
}

/**
 * Exchange an ACR refresh token for a pull token scoped to one repository.
 */
export async function exchangeAcrToken(registry: string, repository: string, refreshToken: string): Promise<string> {
  const service = acrDomain(registry);
  const response = await fetch(`https://${service}/oauth2/token`, {
    method: "POST",
    headers: { "Content-Type": "application/x-www-form-urlencoded" },
    body: new URLSearchParams({
      grant_type: "refresh_token",
      service,
      scope: `repository:${repository}:pull`,
      refresh_token: refreshToken,
    }).toString(),
  });

  if (!response.ok) {
    throw new RegistryTokenError("access", response.status, await response.text());
  }

  const parsed = tokenSchema.safeParse(await response.json());
  if (!parsed.success) {
    throw new RegistryTokenError("access", response.status, "No access_token in response");
  }
  return parsed.data.access_token;
}

async function fetchJson(url: string, token: string, step: "manifest" | "config", accept?: string[]): Promise<unknown> {
  const headers: Record<string, string> = { Authorization: `Bearer ${token}` };
  if (accept) {
    headers.Accept = accept.join(", ");
  }
  const response = await fetch(url, { headers });
  if (!response.ok) {
    throw new RegistryTokenError(step, response.status, await response.text());
  }
  return response.json();
}

/**
 * Read the commit from image labels: the OCI revision label, then the
 * vcs-ref label, then the same under container_config, then any
 * label whose key matches the revision label case-insensitively.
 */
export function revisionFromConfig(config: ImageConfig): string | undefined {
  const labels = config.config?.Labels ?? {};
  const legacy = config.container_config?.Labels ?? {};

  const direct = labels[REVISION_LABEL] || labels[VCS_REF_LABEL] || legacy[REVISION_LABEL] || legacy[VCS_REF_LABEL];
  if (direct) {
    return direct;
  }

  for (const source of [labels, legacy]) {
    for (const [key, value] of Object.entries(source)) {
      if (key.toLowerCase() === REVISION_LABEL && value) {
        return value;
      }
    }
  }
  return undefined;
}

class RegistryClient {
  private readonly base: string;

  constructor(private readonly location: ImageLocation, private readonly token: string) {
    this.base = `https://${acrDomain(location.registry)}/v2/${location.repository}`;
  }

  async manifest(reference: string, accept: string[]): Promise<Manifest> {
    const raw = await fetchJson(`${this.base}/manifests/${reference}`, this.token, "manifest", accept);
    return manifestSchema.parse(raw);
  }

  async revisionOf(manifest: Manifest): Promise<string | undefined> {
    const configDigest = manifest.config?.digest;
    if (!configDigest) {
      return undefined;
    }
    const raw = await fetchJson(`${this.base}/blobs/${configDigest}`, this.token, "config");
    return revisionFromConfig(imageConfigSchema.parse(raw));
  }

  async revision(): Promise<string | undefined> {
    const top = await this.manifest(this.location.digest, [...IMAGE_MANIFEST_TYPES, ...INDEX_TYPES]);

    if (top.mediaType && INDEX_TYPES.includes(top.mediaType)) {
      // Multi-arch images: the first platform manifest with a label wins
      for (const child of top.manifests ?? []) {
        const manifest = await this.manifest(child.digest, IMAGE_MANIFEST_TYPES);
        const revision = await this.revisionOf(manifest);
        if (revision) {
          return revision;
        }
      }
      return undefined;
    }

    return this.revisionOf(top);
  }
}

/**
 * Commit SHA baked into an ACR image's labels, or undefined when it
 * cannot be read. Failures are logged, never thrown.
 */
export async function getCommitFromImage(location: ImageLocation): Promise<string | undefined> {
  if (!location.digest) {
    return undefined;
  }

  const refreshToken = await azTry([
    "acr", "login",
    "-n", location.registry,
    "--expose-token",
    "--query", "accessToken",
    "-o", "tsv",
  ]);
  if (!refreshToken) {
    console.warn(`Warning: Failed to get ACR refresh token for registry: ${location.registry}`);
    return undefined;
  }

  try {
    const token = await exchangeAcrToken(location.registry, location.repository, refreshToken);
    const revision = await new RegistryClient(location, token).revision();
    if (!revision) {
      console.warn(`Warning: No revision label found for ${location.repository}@${location.digest}`);
    }
    return revision;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Warning: ${message}`);
    return undefined;
  }
}
