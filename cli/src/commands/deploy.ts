// cli/src/commands/deploy.ts
import { validateEnv, imageDeployEnvSchema, DeployEnvError, type ImageDeployEnv } from "../lib/validation.js";
import { getEnvValue } from "../lib/azd.js";
import { showContainerApp } from "../lib/containerapp.js";
import { acrDomain, isDigestRef } from "../lib/image.js";
import { containerAppName, imageEnvVar } from "../lib/naming.js";
import { setOutput } from "../lib/github.js";
import { updateContainerAppImage } from "./update.js";

export interface DeployImageOptions {
  service: string;
  environment: string;
  propagationMs?: number;
}

function cannotFastPath(reason: string): false {
  console.log(reason);
  console.log("Cannot fast-path; full provision required.");
  setOutput("didFastPath", "false");
  return false;
}

/**
 * Fast-path deployment of the image azd recorded for `service`.
 * Resolves to false when the caller should run a full provision instead.
 */
export async function deployImage(options: DeployImageOptions): Promise<boolean> {
  const { service, environment, propagationMs } = options;

  console.log(`\n=== Deploying ${service} image (environment: ${environment}) ===\n`);

  let env: ImageDeployEnv;
  try {
    env = validateEnv(imageDeployEnvSchema, process.env, "deploy-image");
  } catch (error) {
    if (error instanceof DeployEnvError) {
      setOutput("didFastPath", "false");
    }
    throw error;
  }

  const app = containerAppName(env.AZURE_ENV_NAME, service, env.APP_PREFIX);
  const domain = acrDomain(env.AZURE_ACR_NAME);
  const imageVar = imageEnvVar(service);
  console.log(`App name:       ${app}`);
  console.log(`Resource group: ${env.AZURE_RESOURCE_GROUP}`);
  console.log(`ACR:            ${env.AZURE_ACR_NAME} (${domain})`);
  console.log(`Image variable: ${imageVar}\n`);

  const image = await getEnvValue(imageVar);
  if (!image) {
    return cannotFastPath(`No image configured in ${imageVar}`);
  }
  console.log(`Image: ${image}\n`);

  if (!isDigestRef(image)) {
    return cannotFastPath("Image is not in digest form (no @sha256:...)");
  }
  if (!(await showContainerApp(app, env.AZURE_RESOURCE_GROUP))) {
    return cannotFastPath(`Container App '${app}' does not exist`);
  }

  try {
    await updateContainerAppImage({
      app,
      resourceGroup: env.AZURE_RESOURCE_GROUP,
      image,
      acrName: env.AZURE_ACR_NAME,
      acrDomain: domain,
      namespace: env.ACR_NAMESPACE,
      propagationMs,
    });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`Fast-path update failed: ${message}`);
    console.log("Caller should fall back to full provision.");
    setOutput("didFastPath", "false");
    return false;
  }

  console.log(`\n=== ${service} image deployed ===\n`);
  setOutput("didFastPath", "true");
  return true;
}
