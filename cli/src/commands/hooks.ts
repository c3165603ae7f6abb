// cli/src/commands/hooks.ts
import { getEnvFlag } from "../lib/azd.js";
import { ensureKeyVault } from "./keyvault.js";
import { resolveImages, validateAcrBinding } from "./images.js";
import { ensureAcr } from "./acr.js";
import { ensureSqlPermissions } from "./sql.js";

interface HookStep {
  title: string;
  failure: string;
  run: () => Promise<void>;
}

const PREPROVISION_STEPS: HookStep[] = [
  {
    title: "Setting up Key Vault",
    failure: "Key Vault setup failed!",
    run: async () => {
      await ensureKeyVault();
    },
  },
  {
    title: "Resolving container images",
    failure: "Image resolution failed!",
    run: resolveImages,
  },
  {
    title: "Validating ACR binding",
    failure: "ACR validation failed!",
    run: async () => {
      const { errors } = await validateAcrBinding();
      if (errors.length > 0) {
        throw new Error(`${errors.length} image/ACR binding error(s)`);
      }
    },
  },
  {
    title: "Ensuring ACR exists",
    failure: "ACR setup failed!",
    run: async () => {
      await ensureAcr();
    },
  },
];

/**
 * Everything that must exist or be decided before the stack is applied.
 * Stops at the first failing step.
 */
export async function preprovision(): Promise<void> {
  console.log("\n=== Running Pre-Provision Hooks ===");

  for (const [index, step] of PREPROVISION_STEPS.entries()) {
    console.log(`\n[${index + 1}/${PREPROVISION_STEPS.length}] ${step.title}...`);
    try {
      await step.run();
    } catch (error) {
      console.error(step.failure);
      throw error;
    }
    console.log(`${step.title}: done`);
  }

  console.log("\n=== Pre-Provision Hooks Completed Successfully ===\n");
}

export type PostprovisionResult = "skipped" | "done";

/**
 * Local runs only: CI grants SQL permissions in its own workflow job.
 */
export async function postprovision(): Promise<PostprovisionResult> {
  console.log("\n=== Running post-provision tasks ===\n");

  if (process.env.GITHUB_ACTIONS === "true") {
    console.log("Detected GitHub Actions environment.");
    console.log("SQL permissions are granted by the workflow; skipping postprovision hook.");
    return "skipped";
  }

  if (!(await getEnvFlag("ENABLE_SQL_DATABASE", true))) {
    console.log("SQL Database is disabled. Skipping post-provision SQL tasks.");
    return "skipped";
  }

  await ensureSqlPermissions();

  console.log("\n=== Post-provision tasks complete ===\n");
  console.log("Database schema is initialized by Flyway migrations when the backend container app first starts.");
  console.log("Check backend logs with:");
  console.log(
    "  az containerapp logs show -n $(azd env get-value BACKEND_APP_NAME) -g $(azd env get-value AZURE_RESOURCE_GROUP) --tail 100"
  );
  return "done";
}
