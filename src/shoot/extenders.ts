/**
 * Shoot extenders shared by the create and patch pipelines.
 */

import {
  ANNOTATION_LICENCE_TYPE,
  ANNOTATION_RUNTIME_GENERATION,
  ANNOTATION_RUNTIME_ID,
  LABEL_GLOBAL_ACCOUNT_ID,
  LABEL_RUNTIME_ID,
} from "../constants";
import { ConverterConfig } from "../config";
import { ConversionError } from "../errors";
import { MaintenanceTimeWindow, Runtime, Shoot } from "../types";
import { ShootExtender, upsertExtension } from "./pipeline";
import { applyProviderTraits, parseProviderType } from "./providers";

export const NETWORKING_FILTER_EXTENSION_TYPE = "shoot-networking-filter";

export function shootNamespace(projectName: string): string {
  return `garden-${projectName}`;
}

export function metadataExtender(projectName: string): ShootExtender {
  return {
    name: "metadata",
    extend(runtime, shoot) {
      const labels: Record<string, string> = {};
      for (const key of [LABEL_RUNTIME_ID, LABEL_GLOBAL_ACCOUNT_ID]) {
        const value = runtime.metadata.labels?.[key];
        if (value) labels[key] = value;
      }

      const annotations: Record<string, string> = {
        ...shoot.metadata.annotations,
      };
      const runtimeId = runtime.metadata.labels?.[LABEL_RUNTIME_ID];
      if (runtimeId) annotations[ANNOTATION_RUNTIME_ID] = runtimeId;
      if (runtime.spec.shoot.licenceType) {
        annotations[ANNOTATION_LICENCE_TYPE] = runtime.spec.shoot.licenceType;
      }

      shoot.metadata = {
        ...shoot.metadata,
        name: runtime.spec.shoot.name,
        namespace: shootNamespace(projectName),
        labels: { ...shoot.metadata.labels, ...labels },
        annotations,
      };
    },
  };
}

/**
 * Records which Runtime generation the Shoot was written for.
 */
export const generationExtender: ShootExtender = {
  name: "generation",
  extend(runtime, shoot) {
    const generation = runtime.metadata.generation;
    if (generation === undefined) return;
    shoot.metadata.annotations = {
      ...shoot.metadata.annotations,
      [ANNOTATION_RUNTIME_GENERATION]: String(generation),
    };
  },
};

export function compareKubernetesVersions(a: string, b: string): number {
  const left = a.split(".").map((part) => Number.parseInt(part, 10) || 0);
  const right = b.split(".").map((part) => Number.parseInt(part, 10) || 0);
  for (let i = 0; i < Math.max(left.length, right.length); i++) {
    const diff = (left[i] ?? 0) - (right[i] ?? 0);
    if (diff !== 0) return diff;
  }
  return 0;
}

export function kubernetesExtender(
  config: ConverterConfig["kubernetes"],
): ShootExtender {
  return {
    name: "kubernetes",
    extend(runtime, shoot) {
      const { kubernetes } = runtime.spec.shoot;
      const oidc = kubernetes.kubeAPIServer.oidcConfig;
      // CA bundle and additional OIDC providers are not carried over.
      shoot.spec.kubernetes = {
        ...shoot.spec.kubernetes,
        version: kubernetes.version ?? config.defaultVersion,
        enableStaticTokenKubeconfig: config.enableStaticTokenKubeconfig,
        kubeAPIServer: {
          ...shoot.spec.kubernetes.kubeAPIServer,
          oidcConfig: {
            clientID: oidc.clientID,
            issuerURL: oidc.issuerURL,
            groupsClaim: oidc.groupsClaim,
            groupsPrefix: oidc.groupsPrefix,
            usernameClaim: oidc.usernameClaim,
            usernamePrefix: oidc.usernamePrefix,
            signingAlgs: oidc.signingAlgs,
            requiredClaims: oidc.requiredClaims,
          },
        },
      };
    },
  };
}

/**
 * Moves the Shoot forward to the desired version; Gardener rejects
 * downgrades, so an older desired version leaves the Shoot as it is.
 */
export const kubernetesVersionExtender: ShootExtender = {
  name: "kubernetes-version",
  extend(runtime, shoot) {
    const desired = runtime.spec.shoot.kubernetes.version;
    if (!desired) return;
    const current = shoot.spec.kubernetes.version;
    if (!current || compareKubernetesVersions(desired, current) > 0) {
      shoot.spec.kubernetes.version = desired;
    }
  },
};

export const networkingExtender: ShootExtender = {
  name: "networking",
  extend(runtime, shoot) {
    const { networking } = runtime.spec.shoot;
    shoot.spec.networking = {
      type: networking.type ?? "calico",
      pods: networking.pods,
      nodes: networking.nodes,
      services: networking.services,
    };
  },
};

export const providerExtender: ShootExtender = {
  name: "provider",
  extend(runtime, shoot) {
    const { provider, purpose, region, secretBindingName } = runtime.spec.shoot;
    const type = parseProviderType(provider.type);

    if (provider.workers.length === 0) {
      throw new ConversionError(
        `runtime ${runtime.metadata.name} declares no workers`,
      );
    }

    shoot.spec.purpose = purpose;
    shoot.spec.region = region;
    shoot.spec.secretBindingName = secretBindingName;
    shoot.spec.provider = {
      type,
      workers: structuredClone(provider.workers),
      controlPlaneConfig: provider.controlPlaneConfig,
      infrastructureConfig: provider.infrastructureConfig,
    };
    applyProviderTraits(type, shoot);
  },
};

export const highAvailabilityExtender: ShootExtender = {
  name: "high-availability",
  extend(runtime, shoot) {
    const failureTolerance =
      runtime.spec.shoot.controlPlane?.highAvailability?.failureTolerance;
    if (!failureTolerance) return;
    shoot.spec.controlPlane = {
      highAvailability: { failureTolerance: { type: failureTolerance.type } },
    };
  },
};

export function dnsExtender(config: ConverterConfig["dns"]): ShootExtender {
  return {
    name: "dns",
    extend(runtime, shoot) {
      if (!config) return;
      shoot.spec.dns = {
        domain: `${runtime.spec.shoot.name}.${config.domainPrefix}`,
        providers: [
          {
            type: config.providerType,
            secretName: config.secretName,
            primary: true,
          },
        ],
      };
    },
  };
}

export function networkFilterExtender(
  config: ConverterConfig["networking"],
): ShootExtender {
  return {
    name: "network-filter",
    extend(runtime, shoot) {
      const { filter } = runtime.spec.security.networking;
      const egressEnabled = filter.egress?.enabled ?? config.egressFilterEnabled;
      const ingressEnabled = filter.ingress?.enabled ?? false;
      upsertExtension(shoot, {
        type: NETWORKING_FILTER_EXTENSION_TYPE,
        disabled: !egressEnabled,
        providerConfig: {
          apiVersion: "networking-filter.extensions.gardener.cloud/v1alpha1",
          kind: "Configuration",
          egressFilter: { blackholingEnabled: egressEnabled },
          ingressFilter: { enabled: ingressEnabled },
        },
      });
    },
  };
}

/**
 * Production runtimes get the region's maintenance window when one could be
 * resolved; every Shoot gets automatic version updates.
 */
export function maintenanceExtender(
  window?: MaintenanceTimeWindow,
): ShootExtender {
  return {
    name: "maintenance",
    extend(runtime: Runtime, shoot: Shoot) {
      shoot.spec.maintenance = {
        autoUpdate: { kubernetesVersion: true, machineImageVersion: true },
      };
      if (window && runtime.spec.shoot.purpose === "production") {
        shoot.spec.maintenance.timeWindow = {
          begin: window.begin,
          end: window.end,
        };
      }
    },
  };
}
