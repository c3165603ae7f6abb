/**
 * Resource-name prefixes, following the Azure Cloud Adoption Framework
 * abbreviations used by azd templates.
 */
export const abbreviations = {
    appManagedEnvironments: "cae-",
    keyVaultVaults: "kv-",
    managedIdentityUserAssignedIdentities: "id-",
    operationalInsightsWorkspaces: "log-",
    resourcesResourceGroups: "rg-",
    sqlServers: "sql-",
    sqlServersDatabases: "sqldb-",
} as const;
