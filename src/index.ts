/**
 * Infrastructure Manager backend plugin
 *
 * Reconciles Runtime objects into Gardener Shoots and keeps the admin
 * kubeconfig secret of every GardenerCluster fresh.
 *
 * ## Configuration
 *
 * ```yaml
 * infrastructureManager:
 *   gardener:
 *     url: https://api.garden.example.com
 *     token: ${GARDENER_TOKEN}
 *     projectName: my-project
 *   auditLog:
 *     tenantConfigPath: /config/auditlog/tenants.json
 * ```
 *
 * @packageDocumentation
 */

export {
  infrastructureManagerPlugin,
  createInfrastructureManager,
  default,
} from "./plugin";
export type { InfrastructureManager } from "./plugin";

export { readManagerConfig } from "./config";
export type { ManagerConfig, ConverterConfig, GardenerConnectionConfig } from "./config";

// Reconcilers
export { RuntimeReconciler, decide, CLUSTER_TRANSITIONS } from "./runtime/reconciler";
export type {
  ShootClient,
  RuntimeStore,
  ClusterSettings,
  ClusterObservation,
  ClusterDecision,
  ClusterTransition,
} from "./runtime/reconciler";
export { KubeconfigReconciler } from "./kubeconfig/reconciler";
export type {
  GardenerClusterStore,
  SecretStore,
  KubeconfigProvider,
  RotationOutcome,
} from "./kubeconfig/reconciler";
export { ReconcileLoop } from "./ReconcileLoop";

// Shoot pipeline
export { buildCreate, buildPatch, validateRuntime } from "./shoot/converter";
export { runPipeline, upsertExtension } from "./shoot/pipeline";
export type { ShootExtender, ShootPipeline } from "./shoot/pipeline";

// Policy
export {
  checkSeedAvailability,
  evaluateSeeds,
  rotationDue,
  specDrift,
  timeUntilRotation,
} from "./policy";

// Clients and data sources
export { GardenClient } from "./GardenClient";
export { ManagementClient } from "./ManagementClient";
export { AdminKubeconfigProvider } from "./AdminKubeconfigProvider";
export { FileAuditLogDataSource } from "./data/auditLogData";
export { FileMaintenanceWindowSource } from "./data/maintenanceWindow";
export { InMemoryReconcilerMetrics } from "./metrics";

export * from "./errors";
export type * from "./types";
