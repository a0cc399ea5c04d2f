/**
 * Backstage Backend Plugin for the Infrastructure Manager
 *
 * Registers two scheduled sweeps: one reconciling Runtime objects into
 * Gardener Shoots, one keeping GardenerCluster kubeconfig secrets fresh.
 *
 * @example
 * ```ts
 * // In packages/backend/src/index.ts
 * import { createBackend } from '@backstage/backend-defaults';
 *
 * const backend = createBackend();
 * backend.add(import('infrastructure-manager-backend'));
 * backend.start();
 * ```
 *
 * @packageDocumentation
 */

import {
  coreServices,
  createBackendPlugin,
  LoggerService,
} from "@backstage/backend-plugin-api";
import { AdminKubeconfigProvider } from "./AdminKubeconfigProvider";
import { ManagerConfig, readManagerConfig } from "./config";
import {
  AuditLogDataSource,
  FileAuditLogDataSource,
  UnconfiguredAuditLogDataSource,
} from "./data/auditLogData";
import { FileMaintenanceWindowSource } from "./data/maintenanceWindow";
import { GardenClient } from "./GardenClient";
import { KubeconfigReconciler } from "./kubeconfig/reconciler";
import {
  createGardenerKubeConfig,
  createManagementKubeConfig,
} from "./kubeConfig";
import { ManagementClient } from "./ManagementClient";
import { InMemoryReconcilerMetrics } from "./metrics";
import { ReconcileLoop } from "./ReconcileLoop";
import { RuntimeReconciler } from "./runtime/reconciler";
import { GardenerCluster, Runtime } from "./types";

export interface InfrastructureManager {
  runtimes: ReconcileLoop<Runtime>;
  gardenerClusters: ReconcileLoop<GardenerCluster>;
  metrics: InMemoryReconcilerMetrics;
}

/**
 * Wires clients, data sources and reconcilers from configuration.
 */
export function createInfrastructureManager(
  config: ManagerConfig,
  logger: LoggerService,
): InfrastructureManager {
  const management = new ManagementClient({
    kubeConfig: createManagementKubeConfig(logger),
    namespace: config.runtimeNamespace,
    logger,
  });
  const garden = new GardenClient({
    kubeConfig: createGardenerKubeConfig(config.gardener),
    projectName: config.gardener.projectName,
    logger,
  });
  const metrics = new InMemoryReconcilerMetrics();

  const auditLogData: AuditLogDataSource = config.auditLog.tenantConfigPath
    ? new FileAuditLogDataSource(config.auditLog.tenantConfigPath)
    : new UnconfiguredAuditLogDataSource();
  if (!config.auditLog.tenantConfigPath && config.auditLog.mandatory) {
    logger.warn(
      "Audit logging is mandatory but no tenant configuration path is set; shoot creation will stop with AuditLogError",
    );
  }

  const runtimeReconciler = new RuntimeReconciler({
    runtimes: management,
    shoots: garden,
    seeds: garden,
    auditLogData,
    maintenanceWindows: config.maintenanceWindow.windowMapPath
      ? new FileMaintenanceWindowSource(config.maintenanceWindow.windowMapPath)
      : undefined,
    metrics,
    settings: {
      projectName: config.gardener.projectName,
      converter: config.converter,
      auditLogMandatory: config.auditLog.mandatory,
      requiredLabels: config.requiredLabels,
      requeueAfter: config.gardenerRequeueDuration,
    },
    logger,
  });

  const kubeconfigReconciler = new KubeconfigReconciler({
    clusters: management,
    secrets: management,
    kubeconfigs: new AdminKubeconfigProvider({
      gardener: config.gardener,
      expirationSeconds: config.kubeconfig.expirationSeconds,
      logger,
    }),
    rotationPeriod: config.kubeconfig.rotationPeriod,
    logger,
  });

  return {
    runtimes: new ReconcileLoop<Runtime>({
      target: {
        kind: "Runtime",
        list: () => management.listRuntimes(),
        reconcile: (key, signal) =>
          runtimeReconciler.reconcileCluster(key, signal),
      },
      concurrency: config.concurrency,
      errorBackoff: config.gardenerRequeueDuration,
      resync: config.schedule.resync,
      logger,
    }),
    gardenerClusters: new ReconcileLoop<GardenerCluster>({
      target: {
        kind: "GardenerCluster",
        list: () => management.listGardenerClusters(),
        reconcile: (key, signal) =>
          kubeconfigReconciler.reconcileCredential(key, signal),
      },
      concurrency: config.concurrency,
      errorBackoff: config.gardenerRequeueDuration,
      resync: config.schedule.resync,
      logger,
    }),
    metrics,
  };
}

/**
 * @public
 */
export const infrastructureManagerPlugin = createBackendPlugin({
  pluginId: "infrastructure-manager",
  register(env) {
    env.registerInit({
      deps: {
        config: coreServices.rootConfig,
        logger: coreServices.logger,
        scheduler: coreServices.scheduler,
      },
      async init({ config, logger, scheduler }) {
        const managerConfig = readManagerConfig(config);
        if (!managerConfig) {
          logger.info(
            "No infrastructure manager configured. " +
              "Add infrastructureManager to your app-config.yaml to enable.",
          );
          return;
        }

        const manager = createInfrastructureManager(managerConfig, logger);
        const { frequency, timeout } = managerConfig.schedule;

        await scheduler.scheduleTask({
          id: "infrastructure-manager:runtimes",
          frequency,
          timeout,
          fn: async (abortSignal) => {
            await manager.runtimes.sweep(abortSignal);
          },
        });

        await scheduler.scheduleTask({
          id: "infrastructure-manager:gardener-clusters",
          frequency,
          timeout,
          fn: async (abortSignal) => {
            await manager.gardenerClusters.sweep(abortSignal);
          },
        });

        logger.info(
          `Registered infrastructure manager for Gardener project ${managerConfig.gardener.projectName}`,
        );
      },
    });
  },
});

export default infrastructureManagerPlugin;
