// cli/src/lib/sql.ts
import { execa } from "execa";
import { z } from "zod";
import { az, azTry, azTryJson } from "./az.js";

export const FIREWALL_RULE_NAME = "AllowDeploymentScript";

export const DATABASE_ROLES = ["db_datareader", "db_datawriter", "db_ddladmin"] as const;

export async function findSqlServer(resourceGroup: string): Promise<string | undefined> {
  return azTry(["sql", "server", "list", "-g", resourceGroup, "--query", "[0].name", "-o", "tsv"]);
}

export async function findDatabase(resourceGroup: string, server: string): Promise<string | undefined> {
  return azTry([
    "sql", "db", "list",
    "-g", resourceGroup,
    "-s", server,
    "--query", "[?name != 'master'].name | [0]",
    "-o", "tsv",
  ]);
}

/**
 * First user-assigned identity in the group whose name contains `fragment`.
 */
export async function findIdentityName(resourceGroup: string, fragment: string): Promise<string | undefined> {
  return azTry([
    "identity", "list",
    "-g", resourceGroup,
    "--query", `[?contains(name, '${fragment}')].name | [0]`,
    "-o", "tsv",
  ]);
}

const sqlServerSchema = z.object({
  fullyQualifiedDomainName: z.string(),
  publicNetworkAccess: z.string().nullish(),
  identity: z.object({ principalId: z.string().nullish() }).nullish(),
});

export interface SqlServer {
  fqdn: string;
  publicNetworkAccess?: string;
  principalId?: string;
}

export async function showSqlServer(name: string, resourceGroup: string): Promise<SqlServer | undefined> {
  const raw = await azTryJson(["sql", "server", "show", "-n", name, "-g", resourceGroup], sqlServerSchema);
  if (!raw) {
    return undefined;
  }
  return {
    fqdn: raw.fullyQualifiedDomainName,
    publicNetworkAccess: raw.publicNetworkAccess ?? undefined,
    principalId: raw.identity?.principalId ?? undefined,
  };
}

export async function publicIp(url = "https://api.ipify.org"): Promise<string | undefined> {
  try {
    const response = await fetch(url);
    if (!response.ok) {
      return undefined;
    }
    const ip = (await response.text()).trim();
    return ip || undefined;
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.warn(`Could not determine public IP: ${message}`);
    return undefined;
  }
}

export async function firewallRuleExists(resourceGroup: string, server: string, rule: string): Promise<boolean> {
  const found = await azTry([
    "sql", "server", "firewall-rule", "list",
    "-g", resourceGroup,
    "-s", server,
    "--query", `[?name=='${rule}'].name | [0]`,
    "-o", "tsv",
  ]);
  return found !== undefined;
}

export async function createFirewallRule(resourceGroup: string, server: string, rule: string, ip: string): Promise<void> {
  await az([
    "sql", "server", "firewall-rule", "create",
    "-g", resourceGroup,
    "-s", server,
    "-n", rule,
    "--start-ip-address", ip,
    "--end-ip-address", ip,
    "-o", "none",
  ]);
}

export async function deleteFirewallRule(resourceGroup: string, server: string, rule: string): Promise<void> {
  await az(["sql", "server", "firewall-rule", "delete", "-g", resourceGroup, "-s", server, "-n", rule, "-o", "none"]);
}

export interface SqlIdentity {
  /** Label used in comments and messages, e.g. "backend" */
  label: string;
  /** Managed identity name, which is also the database user name */
  name: string;
}

export interface PermissionScriptParams {
  database: string;
  identities: SqlIdentity[];
  generatedAt: Date;
}

function quoteLiteral(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

function quoteName(value: string): string {
  return `[${value.replace(/]/g, "]]")}]`;
}

function formatUtc(date: Date): string {
  return `${date.toISOString().substring(0, 19).replace("T", " ")} UTC`;
}

function identityBlock(identity: SqlIdentity): string[] {
  const literal = quoteLiteral(identity.name);
  const user = quoteName(identity.name);
  const lines = [
    "-- ============================================",
    `-- ${identity.label} permissions`,
    "-- ============================================",
    `IF NOT EXISTS (SELECT * FROM sys.database_principals WHERE name = ${literal})`,
    "BEGIN",
    `    PRINT 'Creating ${identity.label} user from external provider...'`,
    `    CREATE USER ${user} FROM EXTERNAL PROVIDER`,
    "END",
    "ELSE",
    "BEGIN",
    `    PRINT '${identity.label} user already exists.'`,
    "END",
    "GO",
    "",
  ];

  for (const role of DATABASE_ROLES) {
    lines.push(
      `IF IS_ROLEMEMBER('${role}', ${literal}) = 0`,
      "BEGIN",
      `    PRINT 'Granting ${role} to ${identity.label} identity...'`,
      `    ALTER ROLE ${role} ADD MEMBER ${user}`,
      "END",
      "ELSE",
      "BEGIN",
      `    PRINT '${role} already assigned to ${identity.label} identity.'`,
      "END",
      "GO",
      ""
    );
  }

  lines.push(`PRINT ${quoteLiteral(`Permissions granted to ${user}.`)}`, "GO", "");
  return lines;
}

/**
 * Idempotent T-SQL that creates a contained user for each managed identity
 * and adds it to the reader, writer and DDL roles. Safe to run repeatedly.
 */
export function buildPermissionScript(params: PermissionScriptParams): string {
  const { database, identities, generatedAt } = params;
  const lines = [
    "-- ============================================",
    "-- Managed identity database permissions",
    `-- Database: ${database}`,
    ...identities.map(id => `-- ${id.label} identity: ${id.name}`),
    `-- Generated: ${formatUtc(generatedAt)}`,
    "-- ============================================",
    "",
  ];

  for (const identity of identities) {
    lines.push(...identityBlock(identity));
  }

  lines.push(
    "SELECT",
    "    name AS UserName,",
    "    type_desc AS UserType,",
    "    authentication_type_desc AS AuthType,",
    "    create_date AS CreatedDate",
    "FROM sys.database_principals",
    `WHERE name IN (${identities.map(id => quoteLiteral(id.name)).join(", ")})`,
    "ORDER BY name;",
    "GO"
  );

  return lines.join("\n");
}

/**
 * Whether a sqlcmd binary is on PATH. Only a failed spawn counts as missing;
 * sqlcmd flavours disagree on the exit code of `-?`.
 */
export async function isSqlcmdInstalled(): Promise<boolean> {
  try {
    await execa("sqlcmd", ["-?"]);
    return true;
  } catch (error) {
    return !(error instanceof Error && "code" in error && error.code === "ENOENT");
  }
}

export interface SqlcmdParams {
  server: string;
  database: string;
  login: string;
  password: string;
  script: string;
}

/**
 * Pipe a script to sqlcmd. `-b` makes sqlcmd exit non-zero on the first error.
 * The password goes through SQLCMDPASSWORD so it never appears in the command line.
 */
export async function runSqlcmd(params: SqlcmdParams): Promise<void> {
  await execa("sqlcmd", ["-S", params.server, "-d", params.database, "-U", params.login, "-b"], {
    input: params.script,
    env: { SQLCMDPASSWORD: params.password },
    stdout: "inherit",
    stderr: "inherit",
  });
}
