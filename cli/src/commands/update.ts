// cli/src/commands/update.ts
import {
  requireContainerApp,
  updateImage,
  copyRevision,
  latestRevisionName,
  type ContainerApp,
} from "../lib/containerapp.js";
import { findTag, findTagWithPrefix, repositoryStatus, digestExists } from "../lib/acr.js";
import {
  ImageReferenceError,
  isDigestRef,
  hasSha256Digest,
  imageDomain,
  isAcrDomain,
  parseImageRef,
  shortDigest,
} from "../lib/image.js";
import { commitTagKey } from "../lib/naming.js";
import { ensureAcrBinding } from "./bind.js";

export type UpdateStrategy = "direct" | "revision-copy";

export interface UpdateImageOptions {
  app: string;
  resourceGroup: string;
  image: string;
  acrName: string;
  acrDomain: string;
  /** ACR namespace; the app's `{namespace}.lastCommit` tag is checked first */
  namespace: string;
  propagationMs?: number;
}

export interface UpdateImageResult {
  strategy: UpdateStrategy;
}

/**
 * Whether the running image is gone from its registry. Updating an app in place
 * makes Azure re-validate the old revision's image, which fails once it is deleted.
 */
async function currentImageDeleted(app: ContainerApp, namespace: string): Promise<boolean> {
  const current = app.image;
  if (!current) {
    console.log("No current image found (new deployment)");
    return false;
  }
  if (!hasSha256Digest(current)) {
    console.log("Current image is tag-based (not digest), skipping check");
    return false;
  }
  if (!isAcrDomain(imageDomain(current))) {
    console.log("Current image is not from ACR, skipping check");
    return false;
  }

  const ref = parseImageRef(current);
  const registry = ref.registryName ?? "";
  const digest = ref.digest ?? "";
  console.log("Currently deployed image:");
  console.log(`  Full:       ${current}`);
  console.log(`  Registry:   ${registry}`);
  console.log(`  Repository: ${ref.repository}`);
  console.log(`  Digest:     ${shortDigest(digest)}\n`);

  const commitTag = app.tags[commitTagKey(namespace)];
  if (commitTag && commitTag !== "null") {
    console.log(`Checking by commit tag: ${commitTag}`);
    if (await findTag(registry, ref.repository, commitTag)) {
      console.log("Found image by full commit tag");
      return false;
    }

    const shortCommit = commitTag.substring(0, 12);
    console.log(`Full commit tag not found, trying short form: ${shortCommit}`);
    const found = await findTagWithPrefix(registry, ref.repository, shortCommit);
    if (found) {
      console.log(`Found image by short commit tag: ${found}`);
      return false;
    }
    console.log("Commit tag not found in ACR (tried both full and short forms)");
  }

  console.log("Checking by digest...");
  const status = await repositoryStatus(registry, ref.repository);
  if (status === "unknown") {
    console.warn("Cannot verify repository (may lack ACR data-plane permissions), using revision copy");
    return true;
  }
  if (status === "missing") {
    console.log("Repository deleted from ACR, using revision copy");
    return true;
  }
  if (!(await digestExists(registry, ref.repository, digest))) {
    console.log("Digest not found in ACR (image deleted), using revision copy");
    return true;
  }
  console.log("Digest exists in ACR");
  return false;
}

/**
 * Point a container app at a new digest image, binding the registry first
 * when the image comes from it.
 */
export async function updateContainerAppImage(options: UpdateImageOptions): Promise<UpdateImageResult> {
  const { app, resourceGroup, image, acrName, acrDomain, namespace, propagationMs } = options;

  if (!isDigestRef(image)) {
    throw new ImageReferenceError(image, "must be in digest format (image@sha256:...)");
  }
  const containerApp = await requireContainerApp(app, resourceGroup);

  console.log(`\n=== Updating ${app} ===\n`);
  console.log(`Resource group: ${resourceGroup}`);
  console.log(`Image: ${image}\n`);

  console.log("Step 1: Ensure ACR registry binding");
  if (imageDomain(image) === acrDomain) {
    await ensureAcrBinding({ app, resourceGroup, acrName, acrDomain, propagationMs });
  } else {
    console.log("Image not from specified ACR, skipping registry binding");
  }
  console.log();

  console.log("Step 2: Check if currently deployed image exists in ACR");
  const useRevisionCopy = await currentImageDeleted(containerApp, namespace);
  console.log();

  console.log("Step 3: Update Container App image");
  if (useRevisionCopy) {
    const revision = await latestRevisionName(app, resourceGroup);
    if (revision) {
      console.log(`Strategy: revision copy from ${revision}`);
      await copyRevision(app, resourceGroup, revision, image);
      console.log("\nRevision copy completed successfully\n");
      return { strategy: "revision-copy" };
    }
    console.warn("Could not determine current revision, falling back to direct update");
  } else {
    console.log("Strategy: direct update");
  }

  await updateImage(app, resourceGroup, image);
  console.log("\nDirect update completed successfully\n");
  return { strategy: "direct" };
}
