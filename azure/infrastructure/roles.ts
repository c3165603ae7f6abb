import * as azure from "@pulumi/azure-native";
import * as pulumi from "@pulumi/pulumi";

/** Built-in AcrPull role */
export const ACR_PULL_ROLE_ID = "7f951dda-4ed3-4680-a7ca-43fe172d538d";

export const KEY_VAULT_SECRET_PERMISSIONS = ["get", "list"];

export function registryResourceId(
    subscriptionId: pulumi.Input<string>,
    resourceGroupName: pulumi.Input<string>,
    registryName: pulumi.Input<string>,
): pulumi.Output<string> {
    return pulumi.interpolate`/subscriptions/${subscriptionId}/resourceGroups/${resourceGroupName}/providers/Microsoft.ContainerRegistry/registries/${registryName}`;
}

export interface AcrPullArgs {
    subscriptionId: pulumi.Input<string>;
    principalId: pulumi.Input<string>;
    registryId: pulumi.Input<string>;
}

/**
 * Lets a managed identity pull from the registry. Scoped to the registry, never wider.
 */
export function grantAcrPull(name: string, args: AcrPullArgs, opts?: pulumi.CustomResourceOptions) {
    return new azure.authorization.RoleAssignment(name, {
        principalId: args.principalId,
        principalType: "ServicePrincipal",
        roleDefinitionId: pulumi.interpolate`/subscriptions/${args.subscriptionId}/providers/Microsoft.Authorization/roleDefinitions/${ACR_PULL_ROLE_ID}`,
        scope: args.registryId,
    }, opts);
}

export interface SecretReaderArgs {
    resourceGroupName: pulumi.Input<string>;
    vaultName: pulumi.Input<string>;
    tenantId: pulumi.Input<string>;
    objectId: pulumi.Input<string>;
}

/**
 * Access-policy grant on the pre-existing vault (it uses access policies, not RBAC).
 */
export function grantSecretRead(name: string, args: SecretReaderArgs) {
    return new azure.keyvault.AccessPolicy(name, {
        resourceGroupName: args.resourceGroupName,
        vaultName: args.vaultName,
        policy: {
            tenantId: args.tenantId,
            objectId: args.objectId,
            permissions: {
                secrets: KEY_VAULT_SECRET_PERMISSIONS,
            },
        },
    });
}
