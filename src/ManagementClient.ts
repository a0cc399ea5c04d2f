/**
 * Management Cluster Client
 * Runtime and GardenerCluster custom resources plus the kubeconfig secrets
 * derived from them.
 */

import {
  CoreV1Api,
  CustomObjectsApi,
  KubeConfig,
  V1Secret,
} from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  GARDENER_CLUSTER_PLURAL,
  RUNTIME_API_GROUP,
  RUNTIME_API_VERSION,
  RUNTIME_PLURAL,
} from "./constants";
import { toGardenerError } from "./errors";
import { GardenerClusterStore, SecretStore } from "./kubeconfig/reconciler";
import { RuntimeStore } from "./runtime/reconciler";
import { GardenerCluster, ObjectKey, Runtime } from "./types";

export interface ManagementClientOptions {
  kubeConfig: KubeConfig;
  namespace: string;
  logger: LoggerService;
}

export class ManagementClient
  implements RuntimeStore, GardenerClusterStore, SecretStore
{
  private readonly customApi: CustomObjectsApi;
  private readonly coreApi: CoreV1Api;
  private readonly logger: LoggerService;
  private readonly namespace: string;

  constructor(options: ManagementClientOptions) {
    this.customApi = options.kubeConfig.makeApiClient(CustomObjectsApi);
    this.coreApi = options.kubeConfig.makeApiClient(CoreV1Api);
    this.logger = options.logger;
    this.namespace = options.namespace;
  }

  // ============================================================================
  // Runtime Operations
  // ============================================================================

  async listRuntimes(): Promise<Runtime[]> {
    return this.listObjects<Runtime>(RUNTIME_PLURAL);
  }

  async getRuntime(key: ObjectKey): Promise<Runtime> {
    return this.getObject<Runtime>(RUNTIME_PLURAL, key);
  }

  async updateRuntime(runtime: Runtime): Promise<Runtime> {
    return this.replaceObject(RUNTIME_PLURAL, runtime);
  }

  async updateRuntimeStatus(runtime: Runtime): Promise<Runtime> {
    return this.replaceObjectStatus(RUNTIME_PLURAL, runtime);
  }

  // ============================================================================
  // GardenerCluster Operations
  // ============================================================================

  async listGardenerClusters(): Promise<GardenerCluster[]> {
    return this.listObjects<GardenerCluster>(GARDENER_CLUSTER_PLURAL);
  }

  async getGardenerCluster(key: ObjectKey): Promise<GardenerCluster> {
    return this.getObject<GardenerCluster>(GARDENER_CLUSTER_PLURAL, key);
  }

  async updateGardenerCluster(
    cluster: GardenerCluster,
  ): Promise<GardenerCluster> {
    return this.replaceObject(GARDENER_CLUSTER_PLURAL, cluster);
  }

  async updateGardenerClusterStatus(
    cluster: GardenerCluster,
  ): Promise<GardenerCluster> {
    return this.replaceObjectStatus(GARDENER_CLUSTER_PLURAL, cluster);
  }

  // ============================================================================
  // Secret Operations
  // ============================================================================

  async listSecrets(labels: Record<string, string>): Promise<V1Secret[]> {
    const labelSelector = Object.entries(labels)
      .map(([key, value]) => `${key}=${value}`)
      .join(",");
    try {
      const res = await this.coreApi.listSecretForAllNamespaces(
        undefined, // allowWatchBookmarks
        undefined, // continue
        undefined, // fieldSelector
        labelSelector,
      );
      return res.body.items;
    } catch (error) {
      throw toGardenerError(error, `list secrets with ${labelSelector}`);
    }
  }

  async createSecret(secret: V1Secret): Promise<V1Secret> {
    const namespace = secret.metadata?.namespace ?? this.namespace;
    try {
      const res = await this.coreApi.createNamespacedSecret(namespace, secret);
      return res.body;
    } catch (error) {
      throw toGardenerError(
        error,
        `create secret ${namespace}/${secret.metadata?.name}`,
      );
    }
  }

  async updateSecret(secret: V1Secret): Promise<V1Secret> {
    const name = secret.metadata?.name ?? "";
    const namespace = secret.metadata?.namespace ?? this.namespace;
    try {
      const res = await this.coreApi.replaceNamespacedSecret(
        name,
        namespace,
        secret,
      );
      return res.body;
    } catch (error) {
      throw toGardenerError(error, `update secret ${namespace}/${name}`);
    }
  }

  async deleteSecret(secret: V1Secret): Promise<void> {
    const name = secret.metadata?.name ?? "";
    const namespace = secret.metadata?.namespace ?? this.namespace;
    try {
      await this.coreApi.deleteNamespacedSecret(name, namespace);
    } catch (error) {
      throw toGardenerError(error, `delete secret ${namespace}/${name}`);
    }
  }

  // ============================================================================
  // Custom Object Helpers
  // ============================================================================

  private async listObjects<T>(plural: string): Promise<T[]> {
    try {
      const res = await this.customApi.listNamespacedCustomObject(
        RUNTIME_API_GROUP,
        RUNTIME_API_VERSION,
        this.namespace,
        plural,
      );
      const body = res.body as { items?: T[] };
      return body.items ?? [];
    } catch (error) {
      const translated = toGardenerError(
        error,
        `list ${plural} in ${this.namespace}`,
      );
      this.logger.warn(`[ManagementClient] ${translated.message}`);
      throw translated;
    }
  }

  private async getObject<T>(plural: string, key: ObjectKey): Promise<T> {
    try {
      const res = await this.customApi.getNamespacedCustomObject(
        RUNTIME_API_GROUP,
        RUNTIME_API_VERSION,
        key.namespace,
        plural,
        key.name,
      );
      return res.body as T;
    } catch (error) {
      throw toGardenerError(error, `get ${plural} ${key.namespace}/${key.name}`);
    }
  }

  private async replaceObject<T extends Runtime | GardenerCluster>(
    plural: string,
    object: T,
  ): Promise<T> {
    const { namespace = this.namespace, name = "" } = object.metadata;
    try {
      const res = await this.customApi.replaceNamespacedCustomObject(
        RUNTIME_API_GROUP,
        RUNTIME_API_VERSION,
        namespace,
        plural,
        name,
        object,
      );
      return res.body as T;
    } catch (error) {
      throw toGardenerError(error, `update ${plural} ${namespace}/${name}`);
    }
  }

  private async replaceObjectStatus<T extends Runtime | GardenerCluster>(
    plural: string,
    object: T,
  ): Promise<T> {
    const { namespace = this.namespace, name = "" } = object.metadata;
    try {
      const res = await this.customApi.replaceNamespacedCustomObjectStatus(
        RUNTIME_API_GROUP,
        RUNTIME_API_VERSION,
        namespace,
        plural,
        name,
        object,
      );
      return res.body as T;
    } catch (error) {
      throw toGardenerError(
        error,
        `update ${plural} status ${namespace}/${name}`,
      );
    }
  }
}
