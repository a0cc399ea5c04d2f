/**
 * Gardener Kubernetes Client
 * Wrapper around @kubernetes/client-node for Shoots and Seeds of one
 * Gardener project.
 */

import { CustomObjectsApi, KubeConfig } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  GARDENER_API_GROUP,
  GARDENER_API_VERSION,
  SEED_PLURAL,
  SHOOT_PLURAL,
} from "./constants";
import { toGardenerError } from "./errors";
import { SeedLister } from "./policy";
import { ShootClient } from "./runtime/reconciler";
import { shootNamespace } from "./shoot/extenders";
import { Seed, Shoot } from "./types";

export interface GardenClientOptions {
  kubeConfig: KubeConfig;
  projectName: string;
  logger: LoggerService;
}

export class GardenClient implements ShootClient, SeedLister {
  private readonly customApi: CustomObjectsApi;
  private readonly logger: LoggerService;
  private readonly namespace: string;

  constructor(options: GardenClientOptions) {
    this.customApi = options.kubeConfig.makeApiClient(CustomObjectsApi);
    this.logger = options.logger;
    this.namespace = shootNamespace(options.projectName);
  }

  // ============================================================================
  // Shoot Operations
  // ============================================================================

  async getShoot(name: string): Promise<Shoot> {
    try {
      const res = await this.customApi.getNamespacedCustomObject(
        GARDENER_API_GROUP,
        GARDENER_API_VERSION,
        this.namespace,
        SHOOT_PLURAL,
        name,
      );
      return res.body as Shoot;
    } catch (error) {
      throw toGardenerError(error, `get shoot ${this.namespace}/${name}`);
    }
  }

  async createShoot(shoot: Shoot): Promise<Shoot> {
    try {
      const res = await this.customApi.createNamespacedCustomObject(
        GARDENER_API_GROUP,
        GARDENER_API_VERSION,
        this.namespace,
        SHOOT_PLURAL,
        shoot,
      );
      return res.body as Shoot;
    } catch (error) {
      const translated = toGardenerError(
        error,
        `create shoot ${this.namespace}/${shoot.metadata.name}`,
      );
      this.logger.warn(`[GardenClient:${this.namespace}] ${translated.message}`);
      throw translated;
    }
  }

  /**
   * Full replacement guarded by the Shoot's resourceVersion.
   */
  async updateShoot(shoot: Shoot): Promise<Shoot> {
    const name = shoot.metadata.name ?? "";
    try {
      const res = await this.customApi.replaceNamespacedCustomObject(
        GARDENER_API_GROUP,
        GARDENER_API_VERSION,
        this.namespace,
        SHOOT_PLURAL,
        name,
        shoot,
      );
      return res.body as Shoot;
    } catch (error) {
      const translated = toGardenerError(
        error,
        `update shoot ${this.namespace}/${name}`,
      );
      this.logger.warn(`[GardenClient:${this.namespace}] ${translated.message}`);
      throw translated;
    }
  }

  async deleteShoot(name: string): Promise<void> {
    try {
      await this.customApi.deleteNamespacedCustomObject(
        GARDENER_API_GROUP,
        GARDENER_API_VERSION,
        this.namespace,
        SHOOT_PLURAL,
        name,
      );
    } catch (error) {
      const translated = toGardenerError(
        error,
        `delete shoot ${this.namespace}/${name}`,
      );
      this.logger.warn(`[GardenClient:${this.namespace}] ${translated.message}`);
      throw translated;
    }
  }

  // ============================================================================
  // Seed Operations
  // ============================================================================

  async listSeeds(providerType: string): Promise<Seed[]> {
    try {
      const res = await this.customApi.listClusterCustomObject(
        GARDENER_API_GROUP,
        GARDENER_API_VERSION,
        SEED_PLURAL,
      );
      const body = res.body as { items?: Seed[] };
      return (body.items ?? []).filter(
        (seed) => seed.spec?.provider?.type === providerType,
      );
    } catch (error) {
      throw toGardenerError(error, "list seeds");
    }
  }
}
