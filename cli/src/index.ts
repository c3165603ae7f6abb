#!/usr/bin/env node
import { Command } from "commander";
import { DeployEnvError, formatMissingVarsError, readConventions } from "./lib/validation.js";
import { updateContainerAppImage } from "./commands/update.js";
import { ensureAcrBinding } from "./commands/bind.js";
import { deployImage } from "./commands/deploy.js";
import { promote } from "./commands/promote.js";
import { resolveImages, validateAcrBinding } from "./commands/images.js";
import { ensureAcr } from "./commands/acr.js";
import { ensureKeyVault, recoverKeyVault } from "./commands/keyvault.js";
import { ensureSqlPermissions, grantDirectoryReaders } from "./commands/sql.js";
import { preprovision, postprovision } from "./commands/hooks.js";
import { provision, destroy } from "./commands/provision.js";
import { commitFromImage } from "./commands/commit.js";
import { releaseNotes } from "./commands/relnotes.js";
import { notify } from "./commands/notify.js";

/**
 * Run a command, exiting 1 when it throws or reports failure with `false`.
 */
async function run(label: string, action: () => Promise<unknown>): Promise<void> {
  try {
    const result = await action();
    if (result === false) {
      process.exit(1);
    }
  } catch (error) {
    if (error instanceof DeployEnvError) {
      console.error(formatMissingVarsError(error));
    } else {
      console.error(`${label} failed:`, error instanceof Error ? error.message : error);
    }
    process.exit(1);
  }
}

const program = new Command();

program
  .name("aca-ops")
  .description("Provisioning and release tooling for a multi-service app on Azure Container Apps")
  .version("1.0.0");

program
  .command("update-image")
  .description("Update a container app to a digest-pinned image, binding ACR first when needed")
  .argument("<app>", "Container app name")
  .argument("<resource-group>", "Resource group of the container app")
  .argument("<image>", "Image reference (registry/repo@sha256:...)")
  .argument("<acr-name>", "Registry name")
  .argument("<acr-domain>", "Registry login server, e.g. myacr.azurecr.io")
  .action((app: string, resourceGroup: string, image: string, acrName: string, acrDomain: string) =>
    run("Update", () =>
      updateContainerAppImage({
        app,
        resourceGroup,
        image,
        acrName,
        acrDomain,
        namespace: readConventions(process.env).ACR_NAMESPACE,
      })
    )
  );

program
  .command("ensure-acr-binding")
  .description("Give a container app's managed identity AcrPull and register the registry on the app")
  .argument("<app>", "Container app name")
  .argument("<resource-group>", "Resource group of the container app")
  .argument("<acr-name>", "Registry name")
  .argument("<acr-domain>", "Registry login server")
  .action((app: string, resourceGroup: string, acrName: string, acrDomain: string) =>
    run("ACR binding", () => ensureAcrBinding({ app, resourceGroup, acrName, acrDomain }))
  );

program
  .command("deploy-image")
  .description("Fast path: update a running service to the image azd built, or report that a full provision is needed")
  .argument("<service>", "Service name (frontend, backend, processes)")
  .argument("<environment>", "Environment name")
  .action((service: string, environment: string) => run("Deploy", () => deployImage({ service, environment })));

program
  .command("promote")
  .description("Import an image into the target environment's registry and roll its container app onto it")
  .argument("<service>", "Service name")
  .argument("<source-image>", "Source image (registry/repo@sha256:...)")
  .argument("<target-env>", "Target environment name")
  .action((service: string, sourceImage: string, targetEnv: string) =>
    run("Promote", () => promote({ service, sourceImage, targetEnv }))
  );

program
  .command("resolve-images")
  .description("Point each service at a usable image before provisioning")
  .action(() => run("Image resolution", resolveImages));

program
  .command("validate-acr-binding")
  .description("Check that each service's AcrPull skip flag matches its image source")
  .action(() =>
    run("ACR validation", async () => {
      const { errors } = await validateAcrBinding();
      return errors.length === 0;
    })
  );

program
  .command("ensure-acr")
  .description("Create the environment's container registry when missing")
  .action(() => run("ACR setup", ensureAcr));

program
  .command("ensure-keyvault")
  .description("Create the environment's Key Vault, or recover it from soft delete")
  .action(() => run("Key Vault setup", ensureKeyVault));

program
  .command("recover-keyvault")
  .description("Recover a soft-deleted Key Vault before provisioning")
  .action(() => run("Key Vault recovery", recoverKeyVault));

program
  .command("ensure-sql-permissions")
  .description("Create database users for the backend and processes identities")
  .action(() => run("SQL permissions", () => ensureSqlPermissions()));

program
  .command("grant-directory-readers")
  .description("Add the SQL server's identity to the Directory Readers role")
  .action(() => run("Directory Readers grant", grantDirectoryReaders));

program
  .command("preprovision")
  .description("Run every pre-provision hook in order")
  .action(() => run("Pre-provision", preprovision));

program
  .command("postprovision")
  .description("Run the post-provision hook")
  .action(() => run("Post-provision", postprovision));

program
  .command("provision")
  .description("Provision the environment: hooks, pulumi up, outputs into azd")
  .option("--skip-hooks", "Do not run the pre- and post-provision hooks")
  .action((options: { skipHooks?: boolean }) => run("Provision", () => provision({ skipHooks: options.skipHooks })));

program
  .command("destroy")
  .description("Destroy the environment's stack (the Key Vault survives)")
  .action(() => run("Destroy", () => destroy()));

program
  .command("commit-from-image")
  .description("Print the commit SHA from an ACR image's labels")
  .argument("<registry>", "Registry name without .azurecr.io")
  .argument("<repository>", "Repository, e.g. raptor/frontend-dev")
  .argument("<digest>", "Manifest digest (sha256:...)")
  .action((registry: string, repository: string, digest: string) =>
    run("Commit lookup", () => commitFromImage({ registry, repository, digest }))
  );

program
  .command("release-notes")
  .description("Write release notes for a promotion and emit them as step outputs")
  .option("--out-dir <path>", "Directory for release-notes.md and release-notes.html")
  .action((options: { outDir?: string }) => run("Release notes", () => releaseNotes({ outDir: options.outDir })));

program
  .command("notify")
  .description("Mail the release notes")
  .action(() => run("Notify", notify));

await program.parseAsync();
