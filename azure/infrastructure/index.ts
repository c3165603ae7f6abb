import * as pulumi from "@pulumi/pulumi";
import * as azure from "@pulumi/azure-native";
import { abbreviations } from "../abbreviations.js";
import { grantAcrPull, grantSecretRead, registryResourceId } from "./roles.js";
import { appUrl, createServiceApp } from "./services.js";

const config = new pulumi.Config();
const environmentName = config.require("environmentName");
const location = config.require("location");
// The resource group, registry and vault are created by the pre-provision hooks
const resourceGroupName = config.require("resourceGroupName");
const acrName = config.require("acrName");
const acrResourceGroupName = config.get("acrResourceGroupName") || resourceGroupName;
const keyVaultName = config.require("keyVaultName");
const appPrefix = config.get("appPrefix") || "rap";
const acrNamespace = config.get("acrNamespace") || "raptor";
const enableSqlDatabase = config.getBoolean("enableSqlDatabase") ?? true;
const enableProcesses = config.getBoolean("enableProcesses") ?? false;
const commitSha = config.get("commitSha");
const fallbackImage = "mcr.microsoft.com/azuredocs/containerapps-helloworld:latest";

const isProd = environmentName === "prod" || environmentName === "production";
const acrLoginServer = `${acrName}.azurecr.io`;

// Common tags applied to all resources
const commonTags: Record<string, string> = {
    managedBy: "pulumi",
    "azd-env-name": environmentName,
};

function serviceTags(service: string): Record<string, string> {
    return {
        ...commonTags,
        "azd-service-name": service,
        ...(commitSha ? { [`${acrNamespace}.lastCommit`]: commitSha } : {}),
    };
}

interface ServiceSettings {
    image: string;
    skipAcrPull: boolean;
}

function serviceSettings(service: string): ServiceSettings {
    const key = `${service.charAt(0).toUpperCase()}${service.slice(1)}`;
    return {
        image: config.get(`${service}Image`) || fallbackImage,
        skipAcrPull: config.getBoolean(`skip${key}AcrPull`) ?? true,
    };
}

function appName(suffix: string): string {
    return `${environmentName}-${appPrefix}-${suffix}`.toLowerCase();
}

const clientConfig = azure.authorization.getClientConfigOutput();
const registryId = registryResourceId(clientConfig.subscriptionId, acrResourceGroupName, acrName);

// Logging
const workspace = new azure.operationalinsights.Workspace(`${abbreviations.operationalInsightsWorkspaces}${acrNamespace}-${environmentName}`, {
    resourceGroupName,
    location,
    sku: { name: "PerGB2018" },
    retentionInDays: 30,
    tags: commonTags,
});

const workspaceKeys = azure.operationalinsights.getSharedKeysOutput({
    resourceGroupName,
    workspaceName: workspace.name,
});

// Container Apps Environment
const environment = new azure.app.ManagedEnvironment(`${abbreviations.appManagedEnvironments}${acrNamespace}-${environmentName}`, {
    resourceGroupName,
    location,
    appLogsConfiguration: {
        destination: "log-analytics",
        logAnalyticsConfiguration: {
            customerId: workspace.customerId,
            sharedKey: pulumi.secret(workspaceKeys.apply(keys => keys.primarySharedKey ?? "")),
        },
    },
    tags: commonTags,
});

interface ServiceIdentity {
    identity: azure.managedidentity.UserAssignedIdentity;
    acrPull?: azure.authorization.RoleAssignment;
    settings: ServiceSettings;
}

/**
 * One identity per service; its name carries the service so the SQL grant can find it.
 */
function serviceIdentity(service: string): ServiceIdentity {
    const settings = serviceSettings(service);
    const identity = new azure.managedidentity.UserAssignedIdentity(
        `${abbreviations.managedIdentityUserAssignedIdentities}${service}-${environmentName}`,
        {
            resourceGroupName,
            location,
            tags: serviceTags(service),
        },
    );
    const acrPull = settings.skipAcrPull
        ? undefined
        : grantAcrPull(`${service}-acr-pull`, {
            subscriptionId: clientConfig.subscriptionId,
            principalId: identity.principalId,
            registryId,
        });
    return { identity, acrPull, settings };
}

function registryFor(binding: ServiceIdentity): string | undefined {
    return binding.settings.skipAcrPull ? undefined : acrLoginServer;
}

function dependsOn(binding: ServiceIdentity): pulumi.CustomResourceOptions {
    return binding.acrPull ? { dependsOn: [binding.acrPull] } : {};
}

const frontend = serviceIdentity("frontend");
const backend = serviceIdentity("backend");
const processes = enableProcesses ? serviceIdentity("processes") : undefined;

// Key Vault secrets for the services that read them
grantSecretRead("backend-secrets", {
    resourceGroupName,
    vaultName: keyVaultName,
    tenantId: clientConfig.tenantId,
    objectId: backend.identity.principalId,
});
if (processes) {
    grantSecretRead("processes-secrets", {
        resourceGroupName,
        vaultName: keyVaultName,
        tenantId: clientConfig.tenantId,
        objectId: processes.identity.principalId,
    });
}

// SQL Database
let sqlServer: azure.sql.Server | undefined;
let sqlDatabase: azure.sql.Database | undefined;
if (enableSqlDatabase) {
    sqlServer = new azure.sql.Server(`${abbreviations.sqlServers}${acrNamespace}-${environmentName}`, {
        resourceGroupName,
        location,
        administratorLogin: config.get("sqlAdminLogin") || "sqladmin",
        administratorLoginPassword: config.requireSecret("sqlAdminPassword"),
        identity: { type: "SystemAssigned" },
        minimalTlsVersion: "1.2",
        publicNetworkAccess: "Enabled",
        version: "12.0",
        tags: commonTags,
    });

    sqlDatabase = new azure.sql.Database(`${abbreviations.sqlServersDatabases}${acrNamespace}-${environmentName}`, {
        resourceGroupName,
        serverName: sqlServer.name,
        location,
        sku: isProd ? { name: "S1", tier: "Standard" } : { name: "Basic", tier: "Basic" },
        tags: commonTags,
    });

    // 0.0.0.0 - 0.0.0.0 admits Azure services only
    new azure.sql.FirewallRule("allow-azure-services", {
        resourceGroupName,
        serverName: sqlServer.name,
        startIpAddress: "0.0.0.0",
        endIpAddress: "0.0.0.0",
    });
}

function backendSettings(identity: azure.managedidentity.UserAssignedIdentity): pulumi.Input<azure.types.input.app.EnvironmentVarArgs>[] {
    const settings: pulumi.Input<azure.types.input.app.EnvironmentVarArgs>[] = [
        { name: "AZURE_CLIENT_ID", value: identity.clientId },
        { name: "KEY_VAULT_URI", value: `https://${keyVaultName}.vault.azure.net/` },
    ];
    if (sqlServer && sqlDatabase) {
        settings.push(
            {
                name: "SPRING_DATASOURCE_URL",
                value: pulumi.interpolate`jdbc:sqlserver://${sqlServer.fullyQualifiedDomainName}:1433;database=${sqlDatabase.name};encrypt=true;trustServerCertificate=false;hostNameInCertificate=*.database.windows.net;loginTimeout=30;authentication=ActiveDirectoryMSI`,
            },
            { name: "SPRING_DATASOURCE_USERNAME", value: identity.clientId },
        );
    }
    return settings;
}

const minReplicas = isProd ? 1 : 0;

const frontendApp = createServiceApp({
    service: "frontend",
    appName: appName("fe"),
    resourceGroupName,
    location,
    environmentId: environment.id,
    image: frontend.settings.image,
    identity: frontend.identity,
    registryServer: registryFor(frontend),
    ingress: { external: true, targetPort: config.getNumber("frontendPort") ?? 80 },
    minReplicas,
    tags: serviceTags("frontend"),
}, dependsOn(frontend));

const backendApp = createServiceApp({
    service: "backend",
    appName: appName("be"),
    resourceGroupName,
    location,
    environmentId: environment.id,
    image: backend.settings.image,
    identity: backend.identity,
    registryServer: registryFor(backend),
    ingress: { external: true, targetPort: config.getNumber("backendPort") ?? 8080 },
    env: backendSettings(backend.identity),
    minReplicas,
    tags: serviceTags("backend"),
}, dependsOn(backend));

const processesApp = processes
    ? createServiceApp({
        service: "processes",
        appName: appName("proc"),
        resourceGroupName,
        location,
        environmentId: environment.id,
        image: processes.settings.image,
        identity: processes.identity,
        registryServer: registryFor(processes),
        env: backendSettings(processes.identity),
        minReplicas: 1,
        tags: serviceTags("processes"),
    }, dependsOn(processes))
    : undefined;

// Exports, written back into the azd environment by `provision`
export const containerAppsEnvironmentId = environment.id;
export const containerRegistryEndpoint = acrLoginServer;
export const frontendAppName = frontendApp.name;
export const backendAppName = backendApp.name;
export const processesAppName = processesApp?.name;
export const frontendUrl = appUrl(frontendApp);
export const backendUrl = appUrl(backendApp);
export const sqlServerName = sqlServer?.name;
export const sqlDatabaseName = sqlDatabase?.name;
