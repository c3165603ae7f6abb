import * as azure from "@pulumi/azure-native";
import * as pulumi from "@pulumi/pulumi";

export interface ServiceIngress {
    external: boolean;
    targetPort: number;
}

export interface ServiceAppArgs {
    service: string;
    /** Container app name, {env}-{prefix}-{suffix} */
    appName: string;
    resourceGroupName: pulumi.Input<string>;
    location: pulumi.Input<string>;
    environmentId: pulumi.Input<string>;
    image: string;
    identity: azure.managedidentity.UserAssignedIdentity;
    /** Registry login server, set when the app pulls from ACR */
    registryServer?: string;
    /** No ingress for background workers */
    ingress?: ServiceIngress;
    env?: pulumi.Input<azure.types.input.app.EnvironmentVarArgs>[];
    minReplicas: number;
    tags: Record<string, string>;
}

/**
 * Container app running one service under its own user-assigned identity.
 */
export function createServiceApp(args: ServiceAppArgs, opts?: pulumi.CustomResourceOptions) {
    return new azure.app.ContainerApp(args.service, {
        containerAppName: args.appName,
        resourceGroupName: args.resourceGroupName,
        location: args.location,
        managedEnvironmentId: args.environmentId,

        configuration: {
            activeRevisionsMode: "Single",
            ingress: args.ingress
                ? {
                    external: args.ingress.external,
                    targetPort: args.ingress.targetPort,
                    transport: "auto",
                    allowInsecure: false,
                }
                : undefined,
            registries: args.registryServer
                ? [{
                    server: args.registryServer,
                    identity: args.identity.id,
                }]
                : [],
        },

        template: {
            containers: [{
                name: args.service,
                image: args.image,
                env: args.env,
                resources: {
                    cpu: 0.5,
                    memory: "1Gi",
                },
            }],
            scale: {
                minReplicas: args.minReplicas,
                maxReplicas: 10,
                rules: args.ingress
                    ? [{
                        name: "http-scaling",
                        http: {
                            metadata: {
                                concurrentRequests: "80",
                            },
                        },
                    }]
                    : [],
            },
        },

        identity: {
            type: "UserAssigned",
            userAssignedIdentities: [args.identity.id],
        },

        tags: args.tags,
    }, opts);
}

export function appUrl(app: azure.app.ContainerApp): pulumi.Output<string> {
    return pulumi.interpolate`https://${app.configuration.apply(c => c?.ingress?.fqdn ?? "")}`;
}
