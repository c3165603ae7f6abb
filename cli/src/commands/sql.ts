// cli/src/commands/sql.ts
import { getEnvValue, getEnvFlag } from "../lib/azd.js";
import { DeployEnvError } from "../lib/validation.js";
import {
  FIREWALL_RULE_NAME,
  findSqlServer,
  findDatabase,
  findIdentityName,
  showSqlServer,
  publicIp,
  firewallRuleExists,
  createFirewallRule,
  deleteFirewallRule,
  buildPermissionScript,
  isSqlcmdInstalled,
  runSqlcmd,
  type SqlIdentity,
} from "../lib/sql.js";
import { DIRECTORY_READERS, directoryRoleId, isRoleMember, addRoleMember } from "../lib/graph.js";

export type SqlPermissionsResult = "disabled" | "skipped" | "granted" | "printed";

const RULE = "------------------------------------------------------------";

async function requireAzdValue(key: string, scope: string): Promise<string> {
  const value = await getEnvValue(key);
  if (!value) {
    throw new DeployEnvError([key], scope);
  }
  return value;
}

function printManualScript(script: string, server: string, database: string): void {
  console.log(RULE);
  console.warn("WARNING: sqlcmd not found - manual execution required");
  console.log(RULE);
  console.log("\nInstall sqlcmd with:");
  console.log("  sudo apt-get update && sudo apt-get install -y mssql-tools18 unixodbc-dev\n");
  console.log("Execute this in Azure Portal > SQL Database > Query Editor:\n");
  console.log(script);
  console.log(`\n${RULE}`);
  console.log("Connection details:");
  console.log(`  Server:         ${server}`);
  console.log(`  Database:       ${database}`);
  console.log("  Authentication: Microsoft Entra (Universal with MFA)");
  console.log(RULE);
}

/**
 * Create contained database users for the backend and processes identities
 * and grant them read, write and DDL roles. Every missing piece is a skip,
 * since the resources may not exist until the first provision completes.
 */
export async function ensureSqlPermissions(now: Date = new Date()): Promise<SqlPermissionsResult> {
  console.log("\n=== Ensuring SQL database permissions ===\n");

  if (!(await getEnvFlag("ENABLE_SQL_DATABASE", true))) {
    console.log("SQL Database is disabled. Skipping SQL setup.");
    return "disabled";
  }

  const resourceGroup = await requireAzdValue("AZURE_RESOURCE_GROUP", "ensure-sql-permissions");
  const login = (await getEnvValue("SQL_ADMIN_LOGIN")) ?? "sqladmin";
  const password = await getEnvValue("SQL_ADMIN_PASSWORD");
  if (!password) {
    console.warn("SQL_ADMIN_PASSWORD is not set. Cannot configure SQL permissions.");
    console.warn("Set it with: azd env set SQL_ADMIN_PASSWORD <password>");
    return "skipped";
  }

  console.log(`Resource group: ${resourceGroup}`);
  console.log(`SQL admin:      ${login}`);

  const server = await findSqlServer(resourceGroup);
  if (!server) {
    console.log("SQL Server not found in resource group; it will be created by the deployment.");
    return "skipped";
  }
  console.log(`Found SQL Server: ${server}`);

  const database = await findDatabase(resourceGroup, server);
  if (!database) {
    console.log("SQL Database not found; it will be created by the deployment.");
    return "skipped";
  }
  console.log(`Found SQL Database: ${database}`);

  const backendIdentity = await findIdentityName(resourceGroup, "backend");
  if (!backendIdentity) {
    console.log("Backend managed identity not found yet; permissions will be granted in postprovision.");
    return "skipped";
  }
  const identities: SqlIdentity[] = [{ label: "backend", name: backendIdentity }];
  console.log(`Found backend identity: ${backendIdentity}`);

  const processesIdentity = await findIdentityName(resourceGroup, "processes");
  if (processesIdentity) {
    identities.push({ label: "processes", name: processesIdentity });
    console.log(`Found processes identity: ${processesIdentity}`);
  } else {
    console.log("Processes managed identity not found; granting backend only.");
  }

  const details = await showSqlServer(server, resourceGroup);
  if (!details) {
    throw new Error(`Could not read SQL Server '${server}' in resource group '${resourceGroup}'`);
  }
  console.log(`SQL Server FQDN: ${details.fqdn}`);

  if (details.publicNetworkAccess === "Disabled") {
    console.warn("SQL Server has public access disabled (private endpoint). Cannot grant permissions from here.");
    console.warn("Temporarily enable public access, rerun, then disable it again:");
    console.warn(`  az sql server update -n ${server} -g ${resourceGroup} --enable-public-network true`);
    console.warn("  aca-ops ensure-sql-permissions");
    console.warn(`  az sql server update -n ${server} -g ${resourceGroup} --enable-public-network false`);
    console.warn("Or run the grant from a machine with VNet access.");
    return "skipped";
  }

  let createdRule = false;
  const ip = await publicIp();
  if (ip) {
    console.log(`Current IP: ${ip}`);
    if (!(await firewallRuleExists(resourceGroup, server, FIREWALL_RULE_NAME))) {
      console.log("Creating temporary firewall rule for deployment script...");
      await createFirewallRule(resourceGroup, server, FIREWALL_RULE_NAME, ip);
      createdRule = true;
    }
  }

  try {
    const script = buildPermissionScript({ database, identities, generatedAt: now });
    if (await isSqlcmdInstalled()) {
      console.log("Using sqlcmd to grant permissions...");
      await runSqlcmd({ server: details.fqdn, database, login, password, script });
      console.log("SQL permissions granted successfully");
      return "granted";
    }
    printManualScript(script, details.fqdn, database);
    return "printed";
  } finally {
    if (createdRule) {
      console.log("Removing temporary firewall rule...");
      await deleteFirewallRule(resourceGroup, server, FIREWALL_RULE_NAME);
    }
  }
}

export type DirectoryReadersResult = "added" | "already-member" | "forbidden";

/**
 * Let the SQL server's system identity expand Entra group membership, so an
 * Entra group can be the server admin.
 */
export async function grantDirectoryReaders(): Promise<DirectoryReadersResult> {
  console.log("\n=== Granting Directory Readers role to SQL Server ===\n");
  const resourceGroup = await requireAzdValue("AZURE_RESOURCE_GROUP", "grant-directory-readers");

  let server = await getEnvValue("sqlServerName");
  if (!server) {
    console.log("SQL Server name not found in azd environment, attempting auto-discovery...");
    server = await findSqlServer(resourceGroup);
    if (!server) {
      throw new Error(`No SQL Server found in resource group ${resourceGroup}`);
    }
    console.log(`Found SQL Server: ${server}`);
  }

  const principalId = (await showSqlServer(server, resourceGroup))?.principalId;
  if (!principalId || principalId === "null") {
    throw new Error(`SQL Server '${server}' does not have a system-assigned managed identity`);
  }
  console.log(`SQL Server managed identity: ${principalId}`);

  const roleId = await directoryRoleId(DIRECTORY_READERS);
  if (!roleId) {
    throw new Error(`${DIRECTORY_READERS} role not found; it may need to be activated first`);
  }
  console.log(`${DIRECTORY_READERS} role ID: ${roleId}`);

  if (await isRoleMember(roleId, principalId)) {
    console.log(`SQL Server identity is already a member of ${DIRECTORY_READERS}. No action needed.`);
    return "already-member";
  }

  console.log(`Adding SQL Server identity to ${DIRECTORY_READERS}...`);
  const result = await addRoleMember(roleId, principalId);
  switch (result) {
    case "forbidden":
      console.warn(`Insufficient permissions to grant ${DIRECTORY_READERS}.`);
      console.warn("Required: RoleManagement.ReadWrite.Directory or Privileged Role Administrator.");
      console.warn("Manual steps:");
      console.warn("  1. Azure Portal > Microsoft Entra ID > Roles and administrators");
      console.warn(`  2. Select '${DIRECTORY_READERS}' and click 'Add assignment'`);
      console.warn(`  3. Select ${server} and click 'Add'`);
      console.warn("Continuing without it; an Entra group admin will not work for service principals.");
      break;
    case "already-member":
      console.log("SQL Server identity is already a member (confirmed)");
      break;
    default:
      console.log(`Granted ${DIRECTORY_READERS} to SQL Server identity`);
  }
  return result;
}
