import { Duration } from "luxon";
import { ANNOTATION_RUNTIME_GENERATION } from "./constants";
import {
  auditLogReflected,
  checkSeedAvailability,
  evaluateSeeds,
  rotationDue,
  specDrift,
  timeUntilRotation,
} from "./policy";
import { buildCreate } from "./shoot/converter";
import {
  AUDIT_LOG_DATA,
  buildRuntime,
  buildSeed,
  FakeSeedLister,
  NOW,
} from "./__testUtils__/fakes";
import { ConverterConfig } from "./config";

const converter: ConverterConfig = {
  kubernetes: { defaultVersion: "1.29", enableStaticTokenKubeconfig: false },
  networking: { egressFilterEnabled: false },
  auditLog: { policyConfigMapName: "audit-policy" },
};

// ============================================================================
// Seed placement
// ============================================================================

describe("evaluateSeeds", () => {
  it("should report the requested region as available", () => {
    const result = evaluateSeeds(
      [buildSeed("eu-west-1"), buildSeed("eu-central-1")],
      "aws",
      "eu-west-1",
    );

    expect(result).toEqual({
      available: true,
      candidateRegions: ["eu-central-1", "eu-west-1"],
    });
  });

  it("should ignore seeds that are not ready", () => {
    const result = evaluateSeeds(
      [buildSeed("eu-west-1", false), buildSeed("eu-central-1")],
      "aws",
      "eu-west-1",
    );

    expect(result).toEqual({
      available: false,
      candidateRegions: ["eu-central-1"],
    });
  });

  it("should ignore seeds of other providers", () => {
    const seed = buildSeed("eu-west-1");
    seed.spec = { provider: { type: "gcp", region: "eu-west-1" } };

    expect(evaluateSeeds([seed], "aws", "eu-west-1").available).toBe(false);
  });

  it("should ignore seeds being deleted or hidden from scheduling", () => {
    const deleting = buildSeed("eu-west-1");
    deleting.metadata = { deletionTimestamp: "2024-05-01T00:00:00Z" };
    const hidden = buildSeed("eu-west-1");
    hidden.spec = {
      provider: { type: "aws", region: "eu-west-1" },
      settings: { scheduling: { visible: false } },
    };

    expect(evaluateSeeds([deleting, hidden], "aws", "eu-west-1")).toEqual({
      available: false,
      candidateRegions: [],
    });
  });

  it("should require healthy system components when reported", () => {
    const seed = buildSeed("eu-west-1");
    seed.status?.conditions?.push({
      type: "SeedSystemComponentsHealthy",
      status: "False",
    });

    expect(evaluateSeeds([seed], "aws", "eu-west-1").available).toBe(false);
  });

  it("should de-duplicate candidate regions", () => {
    const result = evaluateSeeds(
      [buildSeed("eu-central-1"), buildSeed("eu-central-1")],
      "aws",
      "eu-west-1",
    );

    expect(result.candidateRegions).toEqual(["eu-central-1"]);
  });
});

describe("checkSeedAvailability", () => {
  it("should list seeds for the provider type", async () => {
    const lister = new FakeSeedLister([buildSeed("eu-central-1")]);

    const result = await checkSeedAvailability(lister, "aws", "eu-west-1");

    expect(lister.calls).toEqual(["aws"]);
    expect(result).toEqual({
      available: false,
      candidateRegions: ["eu-central-1"],
    });
  });

  it("should propagate lookup failures", async () => {
    const lister = new FakeSeedLister([], new Error("gardener unavailable"));

    await expect(
      checkSeedAvailability(lister, "aws", "eu-west-1"),
    ).rejects.toThrow("gardener unavailable");
  });
});

// ============================================================================
// Kubeconfig rotation
// ============================================================================

describe("rotationDue", () => {
  const rotationPeriod = Duration.fromObject({ hours: 10 });

  it("should not be due at 90% of the rotation period", () => {
    const lastSyncTime = NOW.minus({ hours: 9 }).toISO() ?? undefined;

    expect(
      rotationDue({ lastSyncTime, rotationPeriod, forced: false, now: NOW }),
    ).toBe(false);
  });

  it("should be due at 96% of the rotation period", () => {
    const lastSyncTime = NOW.minus({ minutes: 576 }).toISO() ?? undefined;

    expect(
      rotationDue({ lastSyncTime, rotationPeriod, forced: false, now: NOW }),
    ).toBe(true);
  });

  it("should be due exactly at 95% of the rotation period", () => {
    const lastSyncTime = NOW.minus({ minutes: 570 }).toISO() ?? undefined;

    expect(
      rotationDue({ lastSyncTime, rotationPeriod, forced: false, now: NOW }),
    ).toBe(true);
  });

  it("should always be due when forced", () => {
    expect(
      rotationDue({
        lastSyncTime: NOW.toISO() ?? undefined,
        rotationPeriod,
        forced: true,
        now: NOW,
      }),
    ).toBe(true);
  });

  it("should be due when the last sync time is missing or unparsable", () => {
    expect(rotationDue({ rotationPeriod, forced: false, now: NOW })).toBe(true);
    expect(
      rotationDue({
        lastSyncTime: "yesterday",
        rotationPeriod,
        forced: false,
        now: NOW,
      }),
    ).toBe(true);
  });

  it("should accept RFC3339 timestamps with offsets", () => {
    expect(
      rotationDue({
        lastSyncTime: "2024-05-01T13:00:00+02:00",
        rotationPeriod,
        forced: false,
        now: NOW,
      }),
    ).toBe(false);
  });
});

describe("timeUntilRotation", () => {
  const rotationPeriod = Duration.fromObject({ hours: 10 });

  it("should return the time left until the 95% threshold", () => {
    const lastSyncTime = NOW.minus({ hours: 1 }).toISO() ?? undefined;

    const remaining = timeUntilRotation({
      lastSyncTime,
      rotationPeriod,
      forced: false,
      now: NOW,
    });

    expect(remaining.as("minutes")).toBe(510);
  });

  it("should never be negative", () => {
    const lastSyncTime = NOW.minus({ days: 2 }).toISO() ?? undefined;

    expect(
      timeUntilRotation({
        lastSyncTime,
        rotationPeriod,
        forced: false,
        now: NOW,
      }).toMillis(),
    ).toBe(0);
  });
});

// ============================================================================
// Shoot drift
// ============================================================================

describe("specDrift", () => {
  it("should not report drift for the generation the Shoot was built from", () => {
    const runtime = buildRuntime();
    const shoot = buildCreate(runtime, { converter, projectName: "dev" });

    expect(specDrift(runtime, shoot)).toBe(false);
  });

  it("should report drift after the Runtime generation moved", () => {
    const runtime = buildRuntime();
    const shoot = buildCreate(runtime, { converter, projectName: "dev" });
    runtime.metadata.generation = 2;

    expect(specDrift(runtime, shoot)).toBe(true);
  });

  it("should report drift when the Shoot carries no generation marker", () => {
    const runtime = buildRuntime();
    const shoot = buildCreate(runtime, { converter, projectName: "dev" });
    delete shoot.metadata.annotations?.[ANNOTATION_RUNTIME_GENERATION];

    expect(specDrift(runtime, shoot)).toBe(true);
  });
});

describe("auditLogReflected", () => {
  it("should be true once extension and policy reference are present", () => {
    const shoot = buildCreate(buildRuntime(), {
      converter,
      projectName: "dev",
      auditLogData: AUDIT_LOG_DATA,
    });

    expect(auditLogReflected(shoot, AUDIT_LOG_DATA, "audit-policy")).toBe(true);
  });

  it("should be false when the tenant changed", () => {
    const shoot = buildCreate(buildRuntime(), {
      converter,
      projectName: "dev",
      auditLogData: AUDIT_LOG_DATA,
    });

    expect(
      auditLogReflected(
        shoot,
        { ...AUDIT_LOG_DATA, tenantID: "tenant-2" },
        "audit-policy",
      ),
    ).toBe(false);
  });

  it("should be false without the extension", () => {
    const shoot = buildCreate(buildRuntime(), { converter, projectName: "dev" });

    expect(auditLogReflected(shoot, AUDIT_LOG_DATA, "audit-policy")).toBe(false);
  });
});
