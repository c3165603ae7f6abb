// cli/src/commands/images.ts
import { getEnvValue, setEnvValue, getEnvFlag } from "../lib/azd.js";
import { digestExists, latestDigest } from "../lib/acr.js";
import { acrDomain, digestImage, hasSha256Digest, imageDomain, parseImageRef } from "../lib/image.js";
import { imageEnvVar, repositoryName, skipAcrPullVar } from "../lib/naming.js";
import { readConventions } from "../lib/validation.js";

/** Services whose images are resolved before every provision */
export const PROVISIONED_SERVICES = ["frontend", "backend"] as const;

export interface ImageTarget {
  envName: string;
  acrName: string;
  namespace: string;
  fallbackImage: string;
}

export type ImageResolution =
  | { kind: "kept"; image: string }
  | { kind: "latest"; image: string }
  | { kind: "fallback"; image: string };

/**
 * Keep the configured image when it is still usable, otherwise point the service
 * at the newest digest in its repository or at the public fallback image.
 * The service's skip flag follows the image source.
 */
export async function resolveServiceImage(service: string, target: ImageTarget): Promise<ImageResolution> {
  const imageVar = imageEnvVar(service);
  const registry = acrDomain(target.acrName);
  const repo = repositoryName(service, target.envName, target.namespace);

  console.log(`\nResolving ${service} image...`);
  const current = await getEnvValue(imageVar);

  if (!current) {
    console.log(`  No current image configured for ${service}`);
  } else if (!hasSha256Digest(current)) {
    console.log(`  Current image is not a digest reference: ${current}`);
    return { kind: "kept", image: current };
  } else if (imageDomain(current) !== registry) {
    console.log(`  Current image is from a different registry or public: ${current}`);
    return { kind: "kept", image: current };
  } else {
    console.log(`  Current image: ${current}`);
    const digest = parseImageRef(current).digest ?? "";
    if (await digestExists(target.acrName, repo, digest)) {
      console.log("  Current image digest is valid in ACR");
      return { kind: "kept", image: current };
    }
    console.log("  Current image digest not found in ACR, resolving latest...");
  }

  console.log(`  Querying ACR for latest image in ${registry}/${repo}...`);
  const latest = await latestDigest(target.acrName, repo);
  if (latest) {
    const image = digestImage(registry, repo, latest);
    console.log(`  Found latest image in ACR: ${image}`);
    await setEnvValue(imageVar, image);
    await setEnvValue(skipAcrPullVar(service), "false");
    return { kind: "latest", image };
  }

  console.log(`  No images found in ACR repository '${repo}'`);
  console.log(`  Using fallback public image: ${target.fallbackImage}`);
  await setEnvValue(imageVar, target.fallbackImage);
  await setEnvValue(skipAcrPullVar(service), "true");
  return { kind: "fallback", image: target.fallbackImage };
}

/**
 * Pre-provision: make every provisioned service's image resolvable.
 */
export async function resolveImages(): Promise<void> {
  console.log("\n=== Resolving container images from ACR ===");

  const envName = await getEnvValue("AZURE_ENV_NAME");
  const acrName = await getEnvValue("AZURE_ACR_NAME");
  if (!envName || !acrName) {
    console.warn("AZURE_ENV_NAME or AZURE_ACR_NAME not set. Skipping image resolution.");
    return;
  }

  const conventions = readConventions(process.env);
  const target: ImageTarget = {
    envName,
    acrName,
    namespace: conventions.ACR_NAMESPACE,
    fallbackImage: conventions.FALLBACK_IMAGE,
  };
  for (const service of PROVISIONED_SERVICES) {
    await resolveServiceImage(service, target);
  }

  console.log("\nImage resolution complete\n");
}

export interface BindingValidation {
  errors: string[];
  warnings: string[];
}

/**
 * Pre-provision: an ACR image needs its AcrPull assignment, so its skip flag must be false.
 * A public image with the flag off only costs an unused assignment.
 */
export async function validateAcrBinding(): Promise<BindingValidation> {
  console.log("\n=== Validating image vs ACR binding consistency ===");
  const result: BindingValidation = { errors: [], warnings: [] };

  const acrName = await getEnvValue("AZURE_ACR_NAME");
  if (!acrName) {
    console.warn("AZURE_ACR_NAME not set. Skipping validation.");
    return result;
  }
  const registry = acrDomain(acrName);

  for (const service of PROVISIONED_SERVICES) {
    const image = (await getEnvValue(imageEnvVar(service))) ?? "";
    const flag = skipAcrPullVar(service);
    const skip = await getEnvFlag(flag, true);

    console.log(`\nValidating ${service}...`);
    if (image.includes(registry)) {
      console.log(`  Image: ${image} (ACR)`);
      if (skip) {
        result.errors.push(`${service} uses ACR but ${flag}=true; the Container App will not be able to pull its image`);
      } else {
        console.log(`  ${flag}=false (correct)`);
      }
    } else {
      console.log(`  Image: ${image} (public/external)`);
      if (!skip) {
        result.warnings.push(`${service} uses a public image but ${flag}=false; the role assignment is unnecessary`);
      } else {
        console.log(`  ${flag}=true (correct)`);
      }
    }
  }

  for (const warning of result.warnings) {
    console.warn(`WARNING: ${warning}`);
  }
  for (const error of result.errors) {
    console.error(`ERROR: ${error}`);
  }
  if (result.errors.length > 0) {
    console.error("\nValidation failed. Fix: run 'aca-ops resolve-images' to recalculate skip flags.");
  } else {
    console.log("\nImage vs ACR binding validation passed.\n");
  }
  return result;
}
