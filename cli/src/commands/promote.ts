// cli/src/commands/promote.ts
import { validateEnv, promoteEnvSchema, DeployEnvError, type PromoteEnv } from "../lib/validation.js";
import { importImage, untag, repositoryStatus } from "../lib/acr.js";
import { acrDomain, digestImage, parseImageRef, shortDigest, ImageReferenceError } from "../lib/image.js";
import { containerAppName, promotionTag, repositoryName } from "../lib/naming.js";
import { setOutput } from "../lib/github.js";
import { updateContainerAppImage } from "./update.js";

export interface PromoteOptions {
  service: string;
  sourceImage: string;
  targetEnv: string;
  propagationMs?: number;
}

function promotionFailed(message: string): false {
  console.error(message);
  console.log("Caller should fall back to full provision.");
  setOutput("didFastPath", "false");
  return false;
}

/**
 * Copy a digest image into the target environment's registry and roll the
 * target container app onto it.
 */
export async function promote(options: PromoteOptions): Promise<boolean> {
  const { service, sourceImage, targetEnv, propagationMs } = options;

  console.log(`\n=== Promoting ${service} to ${targetEnv} ===\n`);
  console.log(`Source image: ${sourceImage}\n`);

  let env: PromoteEnv;
  try {
    env = validateEnv(promoteEnvSchema, process.env, "promote");
  } catch (error) {
    if (error instanceof DeployEnvError) {
      setOutput("didFastPath", "false");
    }
    throw error;
  }

  const source = parseImageRef(sourceImage);
  if (!source.digest) {
    setOutput("didFastPath", "false");
    throw new ImageReferenceError(sourceImage, "must be in digest format (image@sha256:...)");
  }
  const sourceAcr = env.AZURE_ACR_NAME_SRC ?? source.registryName ?? source.domain;

  const targetAcr = env.AZURE_ACR_NAME;
  const targetDomain = acrDomain(targetAcr);
  const targetRepo = repositoryName(service, targetEnv, env.ACR_NAMESPACE);
  const tag = promotionTag();
  const newImage = digestImage(targetDomain, targetRepo, source.digest);
  const app = containerAppName(targetEnv, service, env.APP_PREFIX);

  console.log(`Source ACR:    ${sourceAcr}`);
  console.log(`Source repo:   ${source.repository}`);
  console.log(`Source digest: ${shortDigest(source.digest)}`);
  console.log(`Target repo:   ${targetAcr}/${targetRepo}`);
  console.log(`Promotion tag: ${tag}`);
  console.log(`New image:     ${newImage}`);
  console.log(`Container App: ${app}\n`);

  if ((await repositoryStatus(targetAcr, targetRepo)) === "missing") {
    console.log("Target repository doesn't exist yet (will be created during import)");
  }

  console.log("Importing image to target ACR...");
  const imported = await importImage({
    registry: targetAcr,
    source: digestImage(acrDomain(sourceAcr), source.repository, source.digest),
    image: `${targetRepo}@${source.digest}`,
    force: true,
  });
  if (!imported) {
    return promotionFailed("Failed to import image");
  }
  console.log("Image imported successfully\n");

  // Tracking tag only; a failure here does not block the rollout
  console.log(`Tagging with: ${tag}`);
  await untag(targetAcr, `${targetRepo}:${tag}`);
  const tagged = await importImage({
    registry: targetAcr,
    source: newImage,
    image: `${targetRepo}:${tag}`,
    noWait: true,
  });
  console.log(tagged ? "Promotion tag applied\n" : "Promotion tag not applied\n");

  try {
    await updateContainerAppImage({
      app,
      resourceGroup: env.AZURE_RESOURCE_GROUP,
      image: newImage,
      acrName: targetAcr,
      acrDomain: targetDomain,
      namespace: env.ACR_NAMESPACE,
      propagationMs,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return promotionFailed(`Promotion failed: ${message}`);
  }

  console.log(`\n=== Promoted ${service} to ${targetEnv} ===\n`);
  console.log(`Image: ${newImage}`);
  console.log(`App:   ${app}\n`);
  setOutput("didFastPath", "true");
  return true;
}
