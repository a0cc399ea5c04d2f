/**
 * Reads the `infrastructureManager` block of app-config.
 *
 * @example
 * ```yaml
 * infrastructureManager:
 *   gardener:
 *     url: https://api.garden.example.com
 *     token: ${GARDENER_TOKEN}
 *     projectName: my-project
 *   runtimeNamespace: kcp-system
 *   concurrency: 5
 *   requeue:
 *     gardener: PT15S
 *   kubeconfig:
 *     rotationPeriod: PT24H
 *   auditLog:
 *     mandatory: true
 *     tenantConfigPath: /config/auditlog/tenants.json
 *     policyConfigMapName: audit-policy
 * ```
 */

import { Config } from "@backstage/config";
import { Duration } from "luxon";
import { LABEL_GLOBAL_ACCOUNT_ID, LABEL_RUNTIME_ID } from "./constants";

export interface GardenerConnectionConfig {
  url: string;
  token?: string;
  caData?: string;
  skipTLSVerify?: boolean;
  projectName: string;
}

export interface ConverterConfig {
  kubernetes: {
    defaultVersion: string;
    enableStaticTokenKubeconfig: boolean;
  };
  dns?: {
    secretName: string;
    domainPrefix: string;
    providerType: string;
  };
  networking: {
    egressFilterEnabled: boolean;
  };
  auditLog: {
    policyConfigMapName: string;
  };
}

export interface ManagerConfig {
  gardener: GardenerConnectionConfig;
  runtimeNamespace: string;
  concurrency: number;
  schedule: {
    frequency: Duration;
    timeout: Duration;
    /** Revisit period for objects whose last invocation stopped. */
    resync: Duration;
  };
  gardenerRequeueDuration: Duration;
  kubeconfig: {
    rotationPeriod: Duration;
    expirationSeconds: number;
  };
  auditLog: {
    mandatory: boolean;
    tenantConfigPath?: string;
  };
  maintenanceWindow: {
    windowMapPath?: string;
  };
  converter: ConverterConfig;
  requiredLabels: string[];
}

const CONFIG_ROOT = "infrastructureManager";

export const DEFAULT_REQUIRED_LABELS = [LABEL_RUNTIME_ID, LABEL_GLOBAL_ACCOUNT_ID];

/**
 * Returns undefined when the plugin is not configured at all.
 */
export function readManagerConfig(config: Config): ManagerConfig | undefined {
  const root = config.getOptionalConfig(CONFIG_ROOT);
  if (!root) {
    return undefined;
  }

  const gardener = root.getConfig("gardener");

  return {
    gardener: {
      url: gardener.getString("url"),
      token: gardener.getOptionalString("token"),
      caData: gardener.getOptionalString("caData"),
      skipTLSVerify: gardener.getOptionalBoolean("skipTLSVerify") ?? false,
      projectName: gardener.getString("projectName"),
    },
    runtimeNamespace: root.getOptionalString("runtimeNamespace") ?? "kcp-system",
    concurrency: root.getOptionalNumber("concurrency") ?? 5,
    schedule: {
      frequency: readDuration(root, "schedule.frequency", { seconds: 15 }),
      timeout: readDuration(root, "schedule.timeout", { minutes: 5 }),
      resync: readDuration(root, "schedule.resync", { hours: 1 }),
    },
    gardenerRequeueDuration: readDuration(root, "requeue.gardener", {
      seconds: 15,
    }),
    kubeconfig: {
      rotationPeriod: readDuration(root, "kubeconfig.rotationPeriod", {
        hours: 24,
      }),
      expirationSeconds:
        root.getOptionalNumber("kubeconfig.expirationSeconds") ?? 86400,
    },
    auditLog: {
      mandatory: root.getOptionalBoolean("auditLog.mandatory") ?? true,
      tenantConfigPath: root.getOptionalString("auditLog.tenantConfigPath"),
    },
    maintenanceWindow: {
      windowMapPath: root.getOptionalString("maintenanceWindow.windowMapPath"),
    },
    converter: readConverterConfig(root),
    requiredLabels:
      root.getOptionalStringArray("requiredLabels") ?? DEFAULT_REQUIRED_LABELS,
  };
}

function readConverterConfig(root: Config): ConverterConfig {
  const dns = root.getOptionalConfig("converter.dns");

  return {
    kubernetes: {
      defaultVersion:
        root.getOptionalString("converter.kubernetes.defaultVersion") ?? "1.29",
      enableStaticTokenKubeconfig:
        root.getOptionalBoolean(
          "converter.kubernetes.enableStaticTokenKubeconfig",
        ) ?? false,
    },
    dns: dns
      ? {
          secretName: dns.getString("secretName"),
          domainPrefix: dns.getString("domainPrefix"),
          providerType: dns.getString("providerType"),
        }
      : undefined,
    networking: {
      // Egress filtering stays off until the product decision is made.
      egressFilterEnabled:
        root.getOptionalBoolean("converter.networking.egressFilterEnabled") ??
        false,
    },
    auditLog: {
      policyConfigMapName:
        root.getOptionalString("auditLog.policyConfigMapName") ??
        "audit-policy",
    },
  };
}

function readDuration(
  config: Config,
  key: string,
  fallback: { hours?: number; minutes?: number; seconds?: number },
): Duration {
  const value = config.getOptionalString(key);
  if (!value) {
    return Duration.fromObject(fallback);
  }

  const duration = Duration.fromISO(value);
  if (!duration.isValid) {
    throw new Error(
      `Invalid duration "${value}" at ${CONFIG_ROOT}.${key}: ${duration.invalidExplanation}`,
    );
  }
  return duration;
}
