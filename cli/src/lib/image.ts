// cli/src/lib/image.ts

export const ACR_SUFFIX = ".azurecr.io";

export class ImageReferenceError extends Error {
  constructor(public image: string, reason: string) {
    super(`Invalid image reference '${image}': ${reason}`);
    this.name = "ImageReferenceError";
  }
}

export interface ImageRef {
  image: string;
  /** Registry host, e.g. myacr.azurecr.io */
  domain: string;
  /** ACR name when the domain is an Azure Container Registry */
  registryName?: string;
  /** Everything after the domain, including tag or digest */
  path: string;
  repository: string;
  digest?: string;
  tag?: string;
}

/**
 * Split an image reference into registry, repository and tag/digest.
 * Both `host/repo@sha256:...` and `host/repo:tag` forms are accepted.
 */
export function parseImageRef(image: string): ImageRef {
  const slash = image.indexOf("/");
  if (slash <= 0) {
    throw new ImageReferenceError(image, "expected <registry>/<repository>");
  }

  const domain = image.substring(0, slash);
  const path = image.substring(slash + 1);
  const registryName = domain.endsWith(ACR_SUFFIX)
    ? domain.substring(0, domain.length - ACR_SUFFIX.length)
    : undefined;

  const at = path.indexOf("@");
  if (at >= 0) {
    return {
      image,
      domain,
      registryName,
      path,
      repository: path.substring(0, at),
      digest: path.substring(at + 1),
    };
  }

  const colon = path.lastIndexOf(":");
  if (colon >= 0) {
    return {
      image,
      domain,
      registryName,
      path,
      repository: path.substring(0, colon),
      tag: path.substring(colon + 1),
    };
  }

  return { image, domain, registryName, path, repository: path };
}

export function isDigestRef(image: string): boolean {
  return image.includes("@");
}

export function hasSha256Digest(image: string): boolean {
  return image.includes("@sha256:");
}

export function imageDomain(image: string): string {
  const slash = image.indexOf("/");
  return slash < 0 ? image : image.substring(0, slash);
}

export function acrDomain(acrName: string): string {
  return `${acrName}${ACR_SUFFIX}`;
}

export function isAcrDomain(domain: string): boolean {
  return domain.endsWith(ACR_SUFFIX);
}

export function shortDigest(digest: string): string {
  return `${digest.substring(0, 19)}...`;
}

export function digestImage(domain: string, repository: string, digest: string): string {
  return `${domain}/${repository}@${digest}`;
}
