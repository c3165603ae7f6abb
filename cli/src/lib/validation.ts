import { z } from "zod";

// Naming conventions shared by every command
const conventionsSchema = z.object({
  APP_PREFIX: z.string().default("rap"),
  ACR_NAMESPACE: z.string().default("raptor"),
  FALLBACK_IMAGE: z.string().default("mcr.microsoft.com/azuredocs/containerapps-helloworld:latest"),
});

// Fast-path image deployment (deploy-image)
export const imageDeployEnvSchema = conventionsSchema.extend({
  AZURE_ENV_NAME: z.string().min(1),
  AZURE_RESOURCE_GROUP: z.string().min(1),
  AZURE_ACR_NAME: z.string().min(1),
});

// Cross-environment promotion (promote)
export const promoteEnvSchema = conventionsSchema.extend({
  AZURE_RESOURCE_GROUP: z.string().min(1),
  AZURE_ACR_NAME: z.string().min(1),
  // Defaults to the registry parsed from the source image
  AZURE_ACR_NAME_SRC: z.string().optional(),
});

// Pre-provision: registry (ensure-acr)
export const registryEnvSchema = conventionsSchema.extend({
  AZURE_ENV_NAME: z.string().optional(),
  AZURE_RESOURCE_GROUP: z.string().optional(),
  AZURE_ACR_NAME: z.string().optional(),
  AZURE_ACR_RESOURCE_GROUP: z.string().optional(),
});

// Pre-provision: Key Vault (ensure-keyvault, recover-keyvault)
export const keyVaultEnvSchema = conventionsSchema.extend({
  AZURE_ENV_NAME: z.string().min(1),
  AZURE_LOCATION: z.string().min(1),
  AZURE_RESOURCE_GROUP: z.string().optional(),
  AZURE_SUBSCRIPTION_ID: z.string().optional(),
  KEY_VAULT_NAME: z.string().optional(),
  // Bootstrap secrets, seeded into a freshly created vault
  OIDC_CLIENT_SECRET: z.string().optional(),
  JWT_SECRET: z.string().optional(),
  AZURE_AD_CLIENT_SECRET: z.string().optional(),
});

// Full provision via Pulumi (provision, destroy)
export const provisionEnvSchema = conventionsSchema.extend({
  AZURE_ENV_NAME: z.string().min(1),
  AZURE_LOCATION: z.string().min(1),
  AZURE_SUBSCRIPTION_ID: z.string().min(1),
  STATE_STORAGE_ACCOUNT: z.string().min(1),
  PULUMI_CONFIG_PASSPHRASE: z.string().min(1),
  AZURE_RESOURCE_GROUP: z.string().optional(),
});

// Release notes for a promotion (release-notes)
export const releaseNotesEnvSchema = conventionsSchema.extend({
  SRC_IMAGE: z.string().min(1),
  SRC_REPO: z.string().min(1),
  TARGET_ENV: z.string().min(1),
  SERVICE_KEY: z.string().default("frontend"),
  SUB: z.string().optional(),
  TGT_ACR: z.string().optional(),
  PREV_IMAGE: z.string().optional(),
  PREV_DIGEST: z.string().optional(),
  COMMITS_TABLE_LIMIT: z.coerce.number().int().positive().default(50),
  BUILD_URL: z.string().optional(),
  FRONTEND_REPO_READ_TOKEN: z.string().optional(),
  GITHUB_REPOSITORY: z.string().optional(),
  GITHUB_TOKEN: z.string().optional(),
});

// Release e-mail (notify)
export const mailEnvSchema = conventionsSchema.extend({
  MAIL_SERVER: z.string().min(1),
  MAIL_USERNAME: z.string().min(1),
  MAIL_PASSWORD: z.string().min(1),
  MAIL_TO: z.string().min(1),
  TARGET_ENV: z.string().default(""),
  SERVICE_KEY: z.string().default("frontend"),
  RELEASE_HTML: z.string().default("release-notes.html"),
  RELEASE_BODY: z.string().default("release-notes.md"),
  SUBJECT_PREFIX: z.string().optional(),
});

export type Conventions = z.infer<typeof conventionsSchema>;
export type ImageDeployEnv = z.infer<typeof imageDeployEnvSchema>;
export type PromoteEnv = z.infer<typeof promoteEnvSchema>;
export type RegistryEnv = z.infer<typeof registryEnvSchema>;
export type KeyVaultEnv = z.infer<typeof keyVaultEnvSchema>;
export type ProvisionEnv = z.infer<typeof provisionEnvSchema>;
export type ReleaseNotesEnv = z.infer<typeof releaseNotesEnvSchema>;
export type MailEnv = z.infer<typeof mailEnvSchema>;

export class DeployEnvError extends Error {
  constructor(public missingVars: string[], public scope: string) {
    super(`Missing required environment variables: ${missingVars.join(", ")}`);
    this.name = "DeployEnvError";
  }
}

/**
 * Shell semantics: a variable set to the empty string counts as unset.
 */
function withoutEmpty(env: Record<string, string | undefined>): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== "") {
      result[key] = value;
    }
  }
  return result;
}

export function validateEnv<T extends z.ZodRawShape>(
  schema: z.ZodObject<T>,
  env: Record<string, string | undefined>,
  scope: string
): z.infer<z.ZodObject<T>> {
  const result = schema.safeParse(withoutEmpty(env));

  if (!result.success) {
    const missingVars = result.error.issues
      .filter(issue => issue.code === "invalid_type" && issue.received === "undefined")
      .map(issue => String(issue.path[0]));

    if (missingVars.length > 0) {
      throw new DeployEnvError(missingVars, scope);
    }

    throw new Error(`Environment validation failed: ${result.error.message}`);
  }

  return result.data;
}

/**
 * Naming conventions alone; every field has a default.
 */
export function readConventions(env: Record<string, string | undefined>): Conventions {
  return conventionsSchema.parse(withoutEmpty(env));
}

export function formatMissingVarsError(error: DeployEnvError): string {
  const ciHint = process.env.GITHUB_ACTIONS === "true"
    ? "Set these in: Repository Settings > Secrets and variables > Actions"
    : "Set these with: azd env set <NAME> <value>";

  const lines = [
    "==============================================",
    `ERROR: Missing required environment variables for ${error.scope}:`,
    "==============================================",
    ...error.missingVars.map(v => `  - ${v}`),
    "",
    ciHint,
  ];
  return lines.join("\n");
}
