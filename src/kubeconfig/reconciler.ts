/**
 * Kubeconfig Reconciler
 * Keeps one secret per GardenerCluster filled with a fresh admin kubeconfig.
 */

import { Duration } from "luxon";
import { V1Secret } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  Clock,
  ConditionReason,
  ConditionType,
  ConditionUpdate,
  systemClock,
  upsertCondition,
} from "../conditions";
import {
  ANNOTATION_FORCE_ROTATION,
  ANNOTATION_LAST_SYNC,
  LABEL_CLUSTER_NAME,
  LABEL_MANAGED_BY,
  MANAGED_BY_VALUE,
} from "../constants";
import {
  AmbiguousSecretError,
  errorMessage,
  isNotFoundError,
} from "../errors";
import { rotationDue, timeUntilRotation } from "../policy";
import { GardenerCluster, ObjectKey, RequeueDirective } from "../types";

// ============================================================================
// Collaborators
// ============================================================================

export interface GardenerClusterStore {
  listGardenerClusters(): Promise<GardenerCluster[]>;
  getGardenerCluster(key: ObjectKey): Promise<GardenerCluster>;
  updateGardenerCluster(cluster: GardenerCluster): Promise<GardenerCluster>;
  updateGardenerClusterStatus(
    cluster: GardenerCluster,
  ): Promise<GardenerCluster>;
}

export interface SecretStore {
  listSecrets(labels: Record<string, string>): Promise<V1Secret[]>;
  createSecret(secret: V1Secret): Promise<V1Secret>;
  updateSecret(secret: V1Secret): Promise<V1Secret>;
  deleteSecret(secret: V1Secret): Promise<void>;
}

/**
 * Issues a short-lived admin kubeconfig for the named Shoot.
 */
export interface KubeconfigProvider {
  fetch(shootName: string): Promise<string>;
}

export type RotationOutcome = "NONE" | "CREATED" | "MODIFIED" | "ROTATED";

interface KubeconfigResult {
  outcome: RotationOutcome;
  /** Sync time recorded on the secret once this invocation is done. */
  lastSyncTime?: string;
}

export interface KubeconfigReconcilerOptions {
  clusters: GardenerClusterStore;
  secrets: SecretStore;
  kubeconfigs: KubeconfigProvider;
  rotationPeriod: Duration;
  logger: LoggerService;
  clock?: Clock;
}

/**
 * A failed step, already recorded on the GardenerCluster's status.
 */
class StepFailure extends Error {
  constructor(
    readonly reason: ConditionReason,
    readonly error: Error,
  ) {
    super(error.message);
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ============================================================================
// Kubeconfig Reconciler
// ============================================================================

export class KubeconfigReconciler {
  private readonly clusters: GardenerClusterStore;
  private readonly secrets: SecretStore;
  private readonly kubeconfigs: KubeconfigProvider;
  private readonly rotationPeriod: Duration;
  private readonly logger: LoggerService;
  private readonly clock: Clock;

  constructor(options: KubeconfigReconcilerOptions) {
    this.clusters = options.clusters;
    this.secrets = options.secrets;
    this.kubeconfigs = options.kubeconfigs;
    this.rotationPeriod = options.rotationPeriod;
    this.logger = options.logger.child({ component: "kubeconfig-reconciler" });
    this.clock = options.clock ?? systemClock;
  }

  async reconcileCredential(
    key: ObjectKey,
    signal?: AbortSignal,
  ): Promise<RequeueDirective> {
    const log = this.logger.child({
      gardenerCluster: key.name,
      namespace: key.namespace,
    });
    signal?.throwIfAborted();

    let cluster: GardenerCluster;
    try {
      cluster = await this.clusters.getGardenerCluster(key);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
      await this.deleteOrphanedSecret(key.name, log);
      return { type: "stop" };
    }
    signal?.throwIfAborted();

    let result: KubeconfigResult;
    try {
      result = await this.handleKubeconfig(cluster, log, signal);
    } catch (error) {
      if (!(error instanceof StepFailure)) throw error;

      await this.persistStatus(
        cluster,
        "Error",
        {
          type: ConditionType.KubeconfigManagement,
          status: "False",
          reason: error.reason,
          message: error.message,
        },
        log,
        error,
      );
      // The Shoot is gone from Gardener; nothing to retry until it returns.
      if (
        error.reason === ConditionReason.FailedToGetKubeconfig &&
        isNotFoundError(error.error)
      ) {
        log.warn(
          `Shoot ${cluster.spec.shoot.name} not found, kubeconfig not issued`,
        );
        return { type: "stop" };
      }
      throw error.error;
    }
    signal?.throwIfAborted();

    const { outcome } = result;
    switch (outcome) {
      case "ROTATED":
        await this.removeForceRotationAnnotation(cluster);
        return { type: "requeue", after: Duration.fromMillis(0) };
      case "CREATED":
      case "MODIFIED":
        await this.persistStatus(
          cluster,
          "Ready",
          {
            type: ConditionType.KubeconfigManagement,
            status: "True",
            reason:
              outcome === "CREATED"
                ? ConditionReason.KubeconfigSecretCreated
                : ConditionReason.KubeconfigSecretRotated,
            message:
              outcome === "CREATED"
                ? "Secret created successfully"
                : "Secret rotated successfully",
          },
          log,
        );
        return this.requeueAtRotation(result.lastSyncTime);
      case "NONE":
        return this.requeueAtRotation(result.lastSyncTime);
    }
  }

  private requeueAtRotation(lastSyncTime?: string): RequeueDirective {
    return {
      type: "requeue",
      after: timeUntilRotation({
        lastSyncTime,
        rotationPeriod: this.rotationPeriod,
        forced: false,
        now: this.clock(),
      }),
    };
  }

  private async handleKubeconfig(
    cluster: GardenerCluster,
    log: LoggerService,
    signal?: AbortSignal,
  ): Promise<KubeconfigResult> {
    const { secret: target } = cluster.spec.kubeconfig;

    let existing: V1Secret | undefined;
    try {
      existing = await this.findSecret(cluster.metadata.name ?? "");
    } catch (error) {
      throw new StepFailure(ConditionReason.FailedToGetSecret, asError(error));
    }
    signal?.throwIfAborted();

    let kubeconfig: string;
    try {
      kubeconfig = await this.kubeconfigs.fetch(cluster.spec.shoot.name);
    } catch (error) {
      throw new StepFailure(
        ConditionReason.FailedToGetKubeconfig,
        asError(error),
      );
    }
    signal?.throwIfAborted();

    if (forcedRotation(cluster)) {
      log.info(
        `Rotation of secret ${target.name} in namespace ${target.namespace} forced`,
      );
      if (existing) {
        try {
          await this.secrets.updateSecret(stripKubeconfig(existing, target.key));
        } catch (error) {
          throw new StepFailure(
            ConditionReason.FailedToDeleteSecret,
            asError(error),
          );
        }
      }
      return { outcome: "ROTATED" };
    }

    const now = this.clock();
    const lastSyncTime = existing?.metadata?.annotations?.[ANNOTATION_LAST_SYNC];
    if (
      !rotationDue({
        lastSyncTime,
        rotationPeriod: this.rotationPeriod,
        forced: false,
        now,
      })
    ) {
      log.debug(
        `Secret ${target.name} in namespace ${target.namespace} does not need to be rotated yet`,
      );
      return { outcome: "NONE", lastSyncTime };
    }

    const lastSync = now.toUTC().toISO({ suppressMilliseconds: true }) ?? "";

    if (existing) {
      try {
        await this.secrets.updateSecret(
          withKubeconfig(existing, target.key, kubeconfig, lastSync),
        );
      } catch (error) {
        throw new StepFailure(
          ConditionReason.FailedToUpdateSecret,
          asError(error),
        );
      }
      log.info(
        `Secret ${target.name} has been updated in ${target.namespace} namespace`,
      );
      return { outcome: "MODIFIED", lastSyncTime: lastSync };
    }

    try {
      await this.secrets.createSecret(newSecret(cluster, kubeconfig, lastSync));
    } catch (error) {
      throw new StepFailure(
        ConditionReason.FailedToCreateSecret,
        asError(error),
      );
    }
    log.info(
      `Secret ${target.name} has been created in ${target.namespace} namespace`,
    );
    return { outcome: "CREATED", lastSyncTime: lastSync };
  }

  /**
   * Zero or one secret per GardenerCluster; more is never resolved here.
   */
  private async findSecret(clusterName: string): Promise<V1Secret | undefined> {
    const matches = await this.secrets.listSecrets({
      [LABEL_CLUSTER_NAME]: clusterName,
    });
    if (matches.length > 1) {
      throw new AmbiguousSecretError(clusterName, matches.length);
    }
    return matches[0];
  }

  private async deleteOrphanedSecret(
    clusterName: string,
    log: LoggerService,
  ): Promise<void> {
    const secret = await this.findSecret(clusterName);
    if (!secret) {
      log.debug(`No secret left for GardenerCluster ${clusterName}`);
      return;
    }

    try {
      await this.secrets.deleteSecret(secret);
    } catch (error) {
      if (!isNotFoundError(error)) throw error;
    }
    log.info(
      `Secret ${secret.metadata?.namespace}/${secret.metadata?.name} has been deleted`,
    );
  }

  private async removeForceRotationAnnotation(
    cluster: GardenerCluster,
  ): Promise<void> {
    const fresh = await this.clusters.getGardenerCluster({
      namespace: cluster.metadata.namespace ?? "",
      name: cluster.metadata.name ?? "",
    });
    const { [ANNOTATION_FORCE_ROTATION]: _marker, ...annotations } =
      fresh.metadata.annotations ?? {};
    await this.clusters.updateGardenerCluster({
      ...fresh,
      metadata: { ...fresh.metadata, annotations },
    });
  }

  /**
   * Status write failures are logged; they are rethrown only when no step
   * failure is being reported already.
   */
  private async persistStatus(
    cluster: GardenerCluster,
    state: "Ready" | "Error",
    update: ConditionUpdate,
    log: LoggerService,
    earlierFailure?: Error,
  ): Promise<void> {
    const status = {
      ...cluster.status,
      state,
      conditions: upsertCondition(
        cluster.status?.conditions,
        update,
        this.clock(),
      ),
    };
    try {
      await this.clusters.updateGardenerClusterStatus({ ...cluster, status });
    } catch (error) {
      log.error(
        `Failed to persist status of GardenerCluster ${cluster.metadata.name}: ${errorMessage(error)}`,
      );
      if (!earlierFailure) throw error;
    }
  }
}

// ============================================================================
// Secret helpers
// ============================================================================

function forcedRotation(cluster: GardenerCluster): boolean {
  return cluster.metadata.annotations?.[ANNOTATION_FORCE_ROTATION] !== undefined;
}

function encode(value: string): string {
  return Buffer.from(value, "utf8").toString("base64");
}

/**
 * Keeps the secret itself, invalidating only its payload and sync time.
 */
export function stripKubeconfig(secret: V1Secret, key: string): V1Secret {
  const { [key]: _kubeconfig, ...data } = secret.data ?? {};
  const { [ANNOTATION_LAST_SYNC]: _lastSync, ...annotations } =
    secret.metadata?.annotations ?? {};
  return {
    ...secret,
    data,
    metadata: { ...secret.metadata, annotations },
  };
}

export function withKubeconfig(
  secret: V1Secret,
  key: string,
  kubeconfig: string,
  lastSync: string,
): V1Secret {
  return {
    ...secret,
    data: { ...secret.data, [key]: encode(kubeconfig) },
    metadata: {
      ...secret.metadata,
      annotations: {
        ...secret.metadata?.annotations,
        [ANNOTATION_LAST_SYNC]: lastSync,
      },
    },
  };
}

export function newSecret(
  cluster: GardenerCluster,
  kubeconfig: string,
  lastSync: string,
): V1Secret {
  const { secret } = cluster.spec.kubeconfig;
  return {
    apiVersion: "v1",
    kind: "Secret",
    metadata: {
      name: secret.name,
      namespace: secret.namespace,
      labels: {
        ...cluster.metadata.labels,
        [LABEL_MANAGED_BY]: MANAGED_BY_VALUE,
        [LABEL_CLUSTER_NAME]: cluster.metadata.name ?? "",
      },
      annotations: { [ANNOTATION_LAST_SYNC]: lastSync },
    },
    data: { [secret.key]: encode(kubeconfig) },
  };
}
