import { createHash } from "crypto";
import { abbreviations } from "../../../azure/abbreviations.js";

export const KNOWN_SERVICES = ["frontend", "backend", "processes"] as const;

/**
 * Short form used in container app names. Frontend and backend keep their
 * historical two-letter suffixes so existing apps are still found.
 */
export function serviceSuffix(service: string): string {
  switch (service) {
    case "frontend":
      return "fe";
    case "backend":
      return "be";
    case "processes":
      return "proc";
    default:
      return service.substring(0, 3);
  }
}

/**
 * Container app naming convention: {env}-{prefix}-{suffix}, lower-case.
 * e.g. dev-rap-fe, test-rap-be, prod-rap-proc
 */
export function containerAppName(env: string, service: string, prefix: string): string {
  return `${env}-${prefix}-${serviceSuffix(service)}`.toLowerCase();
}

/**
 * ACR repository per service and environment: {namespace}/{service}-{env}
 */
export function repositoryName(service: string, env: string, namespace: string): string {
  return `${namespace}/${service}-${env}`;
}

export function imageEnvVar(service: string): string {
  return `SERVICE_${service.toUpperCase()}_IMAGE_NAME`;
}

export function skipAcrPullVar(service: string): string {
  return `SKIP_${service.toUpperCase()}_ACR_PULL_ROLE_ASSIGNMENT`;
}

export function commitTagKey(namespace: string): string {
  return `${namespace}.lastCommit`;
}

export function defaultResourceGroup(env: string, namespace: string): string {
  return `${abbreviations.resourcesResourceGroups}${namespace}-${env}`;
}

/**
 * Registry names are 5-50 alphanumeric characters.
 */
export function defaultAcrName(env: string, prefix: string): string {
  return `${env}-${prefix}-acr`
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "")
    .substring(0, 50);
}

/**
 * Deterministic per-subscription token for globally unique resource names.
 */
export function resourceToken(subscriptionId: string, env: string): string {
  const hash = createHash("md5").update(`${subscriptionId}${env}`).digest("hex").substring(0, 13);
  return `${env}-${hash}`.toLowerCase();
}

export function keyVaultName(subscriptionId: string, env: string): string {
  return `${abbreviations.keyVaultVaults}${resourceToken(subscriptionId, env)}-v10`;
}

export function keyVaultRetentionDays(env: string): number {
  return env === "prod" || env === "production" ? 90 : 7;
}

export function promotionTag(now: Date = new Date()): string {
  return `promoted-${now.getTime()}`;
}
