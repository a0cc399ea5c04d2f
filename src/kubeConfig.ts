import { KubeConfig } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import { GardenerConnectionConfig } from "./config";

/**
 * KubeConfig for the Gardener project, authenticated with a bearer token.
 */
export function createGardenerKubeConfig(
  gardener: GardenerConnectionConfig,
): KubeConfig {
  const kc = new KubeConfig();
  const name = `garden-${gardener.projectName}`;

  kc.loadFromOptions({
    clusters: [
      {
        name,
        server: gardener.url,
        skipTLSVerify: gardener.skipTLSVerify ?? false,
        caData: gardener.caData,
      },
    ],
    users: [
      {
        name: `${name}-user`,
        token: gardener.token,
      },
    ],
    contexts: [
      {
        name: `${name}-context`,
        user: `${name}-user`,
        cluster: name,
      },
    ],
    currentContext: `${name}-context`,
  });

  return kc;
}

/**
 * KubeConfig for the cluster hosting Runtime and GardenerCluster objects;
 * in-cluster service account or the local kubeconfig.
 */
export function createManagementKubeConfig(logger: LoggerService): KubeConfig {
  const kc = new KubeConfig();
  logger.info("Using default kubernetes config for the management cluster");
  kc.loadFromDefault();
  return kc;
}
