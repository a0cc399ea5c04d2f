import { DateTime } from "luxon";
import { V1Secret } from "@kubernetes/client-node";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  LABEL_GLOBAL_ACCOUNT_ID,
  LABEL_RUNTIME_ID,
  RUNTIME_FINALIZER,
} from "../constants";
import { AuditLogDataSource } from "../data/auditLogData";
import { NotFoundError } from "../errors";
import {
  GardenerClusterStore,
  KubeconfigProvider,
  SecretStore,
} from "../kubeconfig/reconciler";
import { SeedLister } from "../policy";
import { RuntimeStore, ShootClient } from "../runtime/reconciler";
import {
  AuditLogData,
  GardenerCluster,
  ObjectKey,
  Runtime,
  Seed,
  Shoot,
} from "../types";

// ============================================================================
// Mock Logger
// ============================================================================

export function createMockLogger(): jest.Mocked<LoggerService> {
  const logger: jest.Mocked<LoggerService> = {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export const NOW = DateTime.fromISO("2024-05-01T12:00:00Z", { zone: "utc" });

export const fixedClock = () => NOW;

// ============================================================================
// Fixtures
// ============================================================================

export function buildRuntime(): Runtime {
  return {
    apiVersion: "infrastructuremanager.io/v1",
    kind: "Runtime",
    metadata: {
      name: "runtime-1",
      namespace: "kcp-system",
      generation: 1,
      resourceVersion: "1",
      labels: {
        [LABEL_RUNTIME_ID]: "runtime-1",
        [LABEL_GLOBAL_ACCOUNT_ID]: "account-1",
      },
      finalizers: [RUNTIME_FINALIZER],
    },
    spec: {
      shoot: {
        name: "shoot-1",
        purpose: "evaluation",
        region: "eu-west-1",
        licenceType: "trial",
        secretBindingName: "aws-binding",
        kubernetes: {
          version: "1.29.4",
          kubeAPIServer: {
            oidcConfig: {
              clientID: "test-client",
              issuerURL: "https://issuer.example.com",
              groupsClaim: "groups",
              usernameClaim: "sub",
              signingAlgs: ["RS256"],
            },
          },
        },
        provider: {
          type: "aws",
          workers: [
            {
              name: "cpu-worker-0",
              machine: { type: "m6i.large" },
              minimum: 1,
              maximum: 3,
              zones: ["eu-west-1a"],
            },
          ],
        },
        networking: {
          pods: "100.64.0.0/12",
          nodes: "10.250.0.0/16",
          services: "100.104.0.0/13",
        },
      },
      security: {
        administrators: ["admin@example.com"],
        networking: { filter: { egress: { enabled: false } } },
      },
    },
  };
}

export function buildSeed(region: string, ready = true): Seed {
  return {
    metadata: { name: `seed-${region}` },
    spec: { provider: { type: "aws", region } },
    status: {
      conditions: [{ type: "GardenletReady", status: ready ? "True" : "False" }],
    },
  };
}

export const AUDIT_LOG_DATA: AuditLogData = {
  tenantID: "tenant-1",
  serviceURL: "https://auditlog.example.com",
  secretName: "auditlog-secret",
};

export function buildGardenerCluster(): GardenerCluster {
  return {
    apiVersion: "infrastructuremanager.io/v1",
    kind: "GardenerCluster",
    metadata: {
      name: "cluster-1",
      namespace: "kcp-system",
      resourceVersion: "1",
      labels: { [LABEL_RUNTIME_ID]: "runtime-1" },
    },
    spec: {
      shoot: { name: "shoot-1" },
      kubeconfig: {
        secret: {
          name: "kubeconfig-cluster-1",
          namespace: "kcp-system",
          key: "config",
        },
      },
    },
  };
}

// ============================================================================
// In-memory collaborators
// ============================================================================

function keyOf(key: ObjectKey): string {
  return `${key.namespace}/${key.name}`;
}

function bumpVersion(version?: string): string {
  return String(Number(version ?? "0") + 1);
}

export class FakeRuntimeStore implements RuntimeStore {
  readonly objects = new Map<string, Runtime>();
  readonly updates: Runtime[] = [];
  readonly statusUpdates: Runtime[] = [];
  updateError?: Error;
  statusError?: Error;

  constructor(...runtimes: Runtime[]) {
    for (const runtime of runtimes) this.put(runtime);
  }

  put(runtime: Runtime): void {
    this.objects.set(
      keyOf({
        namespace: runtime.metadata.namespace ?? "",
        name: runtime.metadata.name ?? "",
      }),
      structuredClone(runtime),
    );
  }

  get(key: ObjectKey): Runtime | undefined {
    return this.objects.get(keyOf(key));
  }

  async listRuntimes(): Promise<Runtime[]> {
    return [...this.objects.values()].map((r) => structuredClone(r));
  }

  async getRuntime(key: ObjectKey): Promise<Runtime> {
    const runtime = this.objects.get(keyOf(key));
    if (!runtime) throw new NotFoundError(`runtime ${keyOf(key)} not found`);
    return structuredClone(runtime);
  }

  async updateRuntime(runtime: Runtime): Promise<Runtime> {
    if (this.updateError) throw this.updateError;
    this.updates.push(structuredClone(runtime));
    const stored: Runtime = {
      ...structuredClone(runtime),
      metadata: {
        ...runtime.metadata,
        resourceVersion: bumpVersion(runtime.metadata.resourceVersion),
      },
    };
    if (
      stored.metadata.deletionTimestamp &&
      (stored.metadata.finalizers ?? []).length === 0
    ) {
      this.objects.delete(
        keyOf({
          namespace: stored.metadata.namespace ?? "",
          name: stored.metadata.name ?? "",
        }),
      );
    } else {
      this.put(stored);
    }
    return structuredClone(stored);
  }

  async updateRuntimeStatus(runtime: Runtime): Promise<Runtime> {
    if (this.statusError) throw this.statusError;
    this.statusUpdates.push(structuredClone(runtime));
    const stored: Runtime = {
      ...structuredClone(runtime),
      metadata: {
        ...runtime.metadata,
        resourceVersion: bumpVersion(runtime.metadata.resourceVersion),
      },
    };
    this.put(stored);
    return structuredClone(stored);
  }
}

export class FakeShootClient implements ShootClient {
  readonly shoots = new Map<string, Shoot>();
  readonly created: Shoot[] = [];
  readonly updated: Shoot[] = [];
  readonly deleted: string[] = [];
  getError?: Error;
  createError?: Error;
  updateError?: Error;

  constructor(...shoots: Shoot[]) {
    for (const shoot of shoots) {
      this.shoots.set(shoot.metadata.name ?? "", structuredClone(shoot));
    }
  }

  get mutations(): number {
    return this.created.length + this.updated.length + this.deleted.length;
  }

  async getShoot(name: string): Promise<Shoot> {
    if (this.getError) throw this.getError;
    const shoot = this.shoots.get(name);
    if (!shoot) throw new NotFoundError(`shoot ${name} not found`);
    return structuredClone(shoot);
  }

  async createShoot(shoot: Shoot): Promise<Shoot> {
    if (this.createError) throw this.createError;
    this.created.push(structuredClone(shoot));
    this.shoots.set(shoot.metadata.name ?? "", structuredClone(shoot));
    return structuredClone(shoot);
  }

  async updateShoot(shoot: Shoot): Promise<Shoot> {
    if (this.updateError) throw this.updateError;
    this.updated.push(structuredClone(shoot));
    this.shoots.set(shoot.metadata.name ?? "", structuredClone(shoot));
    return structuredClone(shoot);
  }

  async deleteShoot(name: string): Promise<void> {
    const shoot = this.shoots.get(name);
    if (!shoot) throw new NotFoundError(`shoot ${name} not found`);
    this.deleted.push(name);
    shoot.metadata.deletionTimestamp = NOW.toISO() ?? undefined;
  }
}

export class FakeSeedLister implements SeedLister {
  readonly calls: string[] = [];

  constructor(
    private readonly seeds: Seed[],
    private readonly error?: Error,
  ) {}

  async listSeeds(providerType: string): Promise<Seed[]> {
    this.calls.push(providerType);
    if (this.error) throw this.error;
    return this.seeds;
  }
}

export class FakeAuditLogDataSource implements AuditLogDataSource {
  constructor(
    private readonly data?: AuditLogData,
    private readonly error = new Error("no tenant configured"),
  ) {}

  async lookup(): Promise<AuditLogData> {
    if (!this.data) throw this.error;
    return this.data;
  }
}

export class FakeGardenerClusterStore implements GardenerClusterStore {
  readonly objects = new Map<string, GardenerCluster>();
  readonly updates: GardenerCluster[] = [];
  readonly statusUpdates: GardenerCluster[] = [];

  constructor(...clusters: GardenerCluster[]) {
    for (const cluster of clusters) {
      this.objects.set(
        keyOf({
          namespace: cluster.metadata.namespace ?? "",
          name: cluster.metadata.name ?? "",
        }),
        structuredClone(cluster),
      );
    }
  }

  async listGardenerClusters(): Promise<GardenerCluster[]> {
    return [...this.objects.values()].map((c) => structuredClone(c));
  }

  async getGardenerCluster(key: ObjectKey): Promise<GardenerCluster> {
    const cluster = this.objects.get(keyOf(key));
    if (!cluster) throw new NotFoundError(`cluster ${keyOf(key)} not found`);
    return structuredClone(cluster);
  }

  async updateGardenerCluster(
    cluster: GardenerCluster,
  ): Promise<GardenerCluster> {
    this.updates.push(structuredClone(cluster));
    return this.store(cluster);
  }

  async updateGardenerClusterStatus(
    cluster: GardenerCluster,
  ): Promise<GardenerCluster> {
    this.statusUpdates.push(structuredClone(cluster));
    const current = this.objects.get(
      keyOf({
        namespace: cluster.metadata.namespace ?? "",
        name: cluster.metadata.name ?? "",
      }),
    );
    // An identical status write is a no-op on the API server.
    if (
      current &&
      JSON.stringify(current.status) === JSON.stringify(cluster.status)
    ) {
      return structuredClone(current);
    }
    return this.store(cluster);
  }

  private store(cluster: GardenerCluster): GardenerCluster {
    const stored: GardenerCluster = {
      ...structuredClone(cluster),
      metadata: {
        ...cluster.metadata,
        resourceVersion: bumpVersion(cluster.metadata.resourceVersion),
      },
    };
    this.objects.set(
      keyOf({
        namespace: stored.metadata.namespace ?? "",
        name: stored.metadata.name ?? "",
      }),
      stored,
    );
    return structuredClone(stored);
  }
}

export class FakeSecretStore implements SecretStore {
  secrets: V1Secret[];
  readonly created: V1Secret[] = [];
  readonly updated: V1Secret[] = [];
  readonly deleted: V1Secret[] = [];
  listError?: Error;

  constructor(...secrets: V1Secret[]) {
    this.secrets = secrets.map((s) => structuredClone(s));
  }

  get mutations(): number {
    return this.created.length + this.updated.length + this.deleted.length;
  }

  async listSecrets(labels: Record<string, string>): Promise<V1Secret[]> {
    if (this.listError) throw this.listError;
    return this.secrets
      .filter((secret) =>
        Object.entries(labels).every(
          ([key, value]) => secret.metadata?.labels?.[key] === value,
        ),
      )
      .map((s) => structuredClone(s));
  }

  async createSecret(secret: V1Secret): Promise<V1Secret> {
    this.created.push(structuredClone(secret));
    this.secrets.push(structuredClone(secret));
    return structuredClone(secret);
  }

  async updateSecret(secret: V1Secret): Promise<V1Secret> {
    this.updated.push(structuredClone(secret));
    this.secrets = this.secrets.map((s) =>
      s.metadata?.name === secret.metadata?.name &&
      s.metadata?.namespace === secret.metadata?.namespace
        ? structuredClone(secret)
        : s,
    );
    return structuredClone(secret);
  }

  async deleteSecret(secret: V1Secret): Promise<void> {
    this.deleted.push(structuredClone(secret));
    this.secrets = this.secrets.filter(
      (s) =>
        s.metadata?.name !== secret.metadata?.name ||
        s.metadata?.namespace !== secret.metadata?.namespace,
    );
  }
}

export class FakeKubeconfigProvider implements KubeconfigProvider {
  readonly requests: string[] = [];

  constructor(
    private readonly kubeconfig = "apiVersion: v1\nkind: Config\n",
    private readonly error?: Error,
  ) {}

  async fetch(shootName: string): Promise<string> {
    this.requests.push(shootName);
    if (this.error) throw this.error;
    return this.kubeconfig;
  }
}
