import { Duration } from "luxon";
import { V1Secret } from "@kubernetes/client-node";
import {
  ANNOTATION_FORCE_ROTATION,
  ANNOTATION_LAST_SYNC,
  LABEL_CLUSTER_NAME,
  LABEL_MANAGED_BY,
  LABEL_RUNTIME_ID,
} from "../constants";
import { AmbiguousSecretError, NotFoundError } from "../errors";
import { GardenerCluster, RequeueDirective } from "../types";
import {
  buildGardenerCluster,
  createMockLogger,
  FakeGardenerClusterStore,
  FakeKubeconfigProvider,
  FakeSecretStore,
  fixedClock,
  NOW,
} from "../__testUtils__/fakes";
import { KubeconfigReconciler, stripKubeconfig } from "./reconciler";

const KEY = { namespace: "kcp-system", name: "cluster-1" };
const KUBECONFIG = "apiVersion: v1\nkind: Config\n";
const NOW_ISO = "2024-05-01T12:00:00Z";

function base64(value: string): string {
  return Buffer.from(value, "utf8").toString("base64");
}

function buildSecret(lastSync?: string, name = "kubeconfig-cluster-1"): V1Secret {
  return {
    apiVersion: "v1",
    kind: "Secret",
    metadata: {
      name,
      namespace: "kcp-system",
      labels: { [LABEL_CLUSTER_NAME]: "cluster-1" },
      annotations: lastSync ? { [ANNOTATION_LAST_SYNC]: lastSync } : {},
    },
    data: { config: base64("stale"), other: base64("keep") },
  };
}

function hoursAgo(hours: number): string {
  return NOW.minus({ hours }).toISO() ?? "";
}

interface SetupOptions {
  clusters?: GardenerCluster[];
  secrets?: V1Secret[];
  fetchError?: Error;
}

function setup(options: SetupOptions = {}) {
  const clusters = new FakeGardenerClusterStore(
    ...(options.clusters ?? [buildGardenerCluster()]),
  );
  const secrets = new FakeSecretStore(...(options.secrets ?? []));
  const kubeconfigs = new FakeKubeconfigProvider(KUBECONFIG, options.fetchError);
  const logger = createMockLogger();
  const reconciler = new KubeconfigReconciler({
    clusters,
    secrets,
    kubeconfigs,
    rotationPeriod: Duration.fromObject({ hours: 24 }),
    logger,
    clock: fixedClock,
  });
  return { reconciler, clusters, secrets, kubeconfigs, logger };
}

function requeueMinutes(directive: RequeueDirective): number | undefined {
  return directive.type === "requeue" ? directive.after.as("minutes") : undefined;
}

describe("KubeconfigReconciler", () => {
  // ==========================================================================
  // Secret creation and rotation
  // ==========================================================================

  it("should create the secret when none exists", async () => {
    const { reconciler, secrets, clusters, kubeconfigs } = setup();

    const directive = await reconciler.reconcileCredential(KEY);

    // next check at 95% of the rotation period
    expect(requeueMinutes(directive)).toBe(1368);
    expect(kubeconfigs.requests).toEqual(["shoot-1"]);
    expect(secrets.created).toEqual([
      {
        apiVersion: "v1",
        kind: "Secret",
        metadata: {
          name: "kubeconfig-cluster-1",
          namespace: "kcp-system",
          labels: {
            [LABEL_RUNTIME_ID]: "runtime-1",
            [LABEL_MANAGED_BY]: "infrastructure-manager",
            [LABEL_CLUSTER_NAME]: "cluster-1",
          },
          annotations: { [ANNOTATION_LAST_SYNC]: NOW_ISO },
        },
        data: { config: base64(KUBECONFIG) },
      },
    ]);
    expect(clusters.statusUpdates).toHaveLength(1);
    expect(clusters.statusUpdates[0].status).toEqual({
      state: "Ready",
      conditions: [
        {
          type: "KubeconfigManagement",
          status: "True",
          reason: "KubeconfigSecretCreated",
          message: "Secret created successfully",
          lastTransitionTime: NOW_ISO,
        },
      ],
    });
  });

  it("should leave a fresh secret alone until rotation is due", async () => {
    const { reconciler, secrets, clusters } = setup({
      secrets: [buildSecret(hoursAgo(1))],
    });

    const directive = await reconciler.reconcileCredential(KEY);

    // 95% of 24h is 1368 minutes, one hour of which has passed
    expect(requeueMinutes(directive)).toBe(1308);
    expect(secrets.mutations).toBe(0);
    expect(clusters.statusUpdates).toHaveLength(0);
  });

  it("should rotate a secret past the rotation threshold", async () => {
    const { reconciler, secrets, clusters } = setup({
      secrets: [buildSecret(hoursAgo(23))],
    });

    const directive = await reconciler.reconcileCredential(KEY);

    expect(requeueMinutes(directive)).toBe(1368);
    expect(secrets.created).toHaveLength(0);
    expect(secrets.updated).toHaveLength(1);
    expect(secrets.updated[0].data).toEqual({
      config: base64(KUBECONFIG),
      other: base64("keep"),
    });
    expect(
      secrets.updated[0].metadata?.annotations?.[ANNOTATION_LAST_SYNC],
    ).toBe(NOW_ISO);
    expect(clusters.statusUpdates[0].status?.conditions?.[0]).toMatchObject({
      status: "True",
      reason: "KubeconfigSecretRotated",
      message: "Secret rotated successfully",
    });
  });

  it("should rotate a secret that carries no sync time", async () => {
    const { reconciler, secrets } = setup({ secrets: [buildSecret()] });

    await reconciler.reconcileCredential(KEY);

    expect(secrets.updated).toHaveLength(1);
  });

  // ==========================================================================
  // Forced rotation
  // ==========================================================================

  it("should invalidate the secret and clear the marker on forced rotation", async () => {
    const cluster = buildGardenerCluster();
    cluster.metadata.annotations = {
      [ANNOTATION_FORCE_ROTATION]: "true",
      keep: "me",
    };
    const { reconciler, secrets, clusters } = setup({
      clusters: [cluster],
      secrets: [buildSecret(hoursAgo(1))],
    });

    const directive = await reconciler.reconcileCredential(KEY);

    expect(requeueMinutes(directive)).toBe(0);
    expect(secrets.updated).toHaveLength(1);
    expect(secrets.updated[0].data).toEqual({ other: base64("keep") });
    expect(secrets.updated[0].metadata?.annotations).toEqual({});
    expect(clusters.updates).toHaveLength(1);
    expect(clusters.updates[0].metadata.annotations).toEqual({ keep: "me" });
    expect(clusters.statusUpdates).toHaveLength(0);
  });

  it("should refill the secret on the pass after a forced rotation", async () => {
    const cluster = buildGardenerCluster();
    cluster.metadata.annotations = { [ANNOTATION_FORCE_ROTATION]: "true" };
    const { reconciler, secrets } = setup({
      clusters: [cluster],
      secrets: [buildSecret(hoursAgo(1))],
    });

    await reconciler.reconcileCredential(KEY);
    const directive = await reconciler.reconcileCredential(KEY);

    expect(requeueMinutes(directive)).toBe(1368);
    expect(secrets.updated).toHaveLength(2);
    expect(secrets.updated[1].data?.config).toBe(base64(KUBECONFIG));
  });

  // ==========================================================================
  // Failures
  // ==========================================================================

  it("should refuse to pick between several matching secrets", async () => {
    const { reconciler, secrets, clusters, kubeconfigs } = setup({
      secrets: [buildSecret(), buildSecret(undefined, "kubeconfig-copy")],
    });

    await expect(reconciler.reconcileCredential(KEY)).rejects.toThrow(
      AmbiguousSecretError,
    );
    expect(kubeconfigs.requests).toEqual([]);
    expect(secrets.mutations).toBe(0);
    expect(clusters.statusUpdates[0].status).toEqual({
      state: "Error",
      conditions: [
        {
          type: "KubeconfigManagement",
          status: "False",
          reason: "FailedToGetSecret",
          message: "unexpected number of secrets found for cluster cluster-1: 2",
          lastTransitionTime: NOW_ISO,
        },
      ],
    });
  });

  it("should record and rethrow kubeconfig fetch failures", async () => {
    const { reconciler, secrets, clusters } = setup({
      fetchError: new Error("gardener unavailable"),
    });

    await expect(reconciler.reconcileCredential(KEY)).rejects.toThrow(
      "gardener unavailable",
    );
    expect(secrets.mutations).toBe(0);
    expect(clusters.statusUpdates[0].status?.conditions?.[0]).toMatchObject({
      reason: "FailedToGetKubeconfig",
      message: "gardener unavailable",
    });
  });

  it("should stop when the Shoot does not exist", async () => {
    const { reconciler, clusters } = setup({
      fetchError: new NotFoundError("shoot shoot-1 not found"),
    });

    const directive = await reconciler.reconcileCredential(KEY);

    expect(directive).toEqual({ type: "stop" });
    expect(clusters.statusUpdates[0].status?.state).toBe("Error");
  });

  it("should record secret creation failures", async () => {
    const { reconciler, secrets, clusters } = setup();
    jest
      .spyOn(secrets, "createSecret")
      .mockRejectedValue(new Error("forbidden"));

    await expect(reconciler.reconcileCredential(KEY)).rejects.toThrow(
      "forbidden",
    );
    expect(clusters.statusUpdates[0].status?.conditions?.[0]?.reason).toBe(
      "FailedToCreateSecret",
    );
  });

  // ==========================================================================
  // Removed GardenerCluster
  // ==========================================================================

  it("should delete the orphaned secret of a removed GardenerCluster", async () => {
    const { reconciler, secrets, kubeconfigs } = setup({
      clusters: [],
      secrets: [buildSecret(hoursAgo(1))],
    });

    const directive = await reconciler.reconcileCredential(KEY);

    expect(directive).toEqual({ type: "stop" });
    expect(secrets.deleted).toHaveLength(1);
    expect(secrets.secrets).toEqual([]);
    expect(kubeconfigs.requests).toEqual([]);
  });

  it("should do nothing when the removed GardenerCluster left no secret", async () => {
    const { reconciler, secrets } = setup({ clusters: [] });

    const directive = await reconciler.reconcileCredential(KEY);

    expect(directive).toEqual({ type: "stop" });
    expect(secrets.mutations).toBe(0);
  });

  it("should not delete anything when several secrets match", async () => {
    const { reconciler, secrets } = setup({
      clusters: [],
      secrets: [buildSecret(), buildSecret(undefined, "kubeconfig-copy")],
    });

    await expect(reconciler.reconcileCredential(KEY)).rejects.toThrow(
      "unexpected number of secrets found for cluster cluster-1: 2",
    );
    expect(secrets.deleted).toHaveLength(0);
  });
});

describe("stripKubeconfig", () => {
  it("should drop only the kubeconfig key and sync time", () => {
    const secret = buildSecret(NOW_ISO);
    secret.metadata = {
      ...secret.metadata,
      annotations: { ...secret.metadata?.annotations, owner: "team-a" },
    };

    const stripped = stripKubeconfig(secret, "config");

    expect(stripped.data).toEqual({ other: base64("keep") });
    expect(stripped.metadata?.annotations).toEqual({ owner: "team-a" });
    expect(stripped.metadata?.name).toBe("kubeconfig-cluster-1");
    expect(secret.data?.config).toBe(base64("stale"));
  });
});
