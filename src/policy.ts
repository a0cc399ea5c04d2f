/**
 * Lifecycle Policy
 * Side-effect free decisions shared by the runtime and kubeconfig reconcilers.
 */

import { DateTime, Duration } from "luxon";
import { ANNOTATION_RUNTIME_GENERATION } from "./constants";
import { AUDITLOG_EXTENSION_TYPE, buildAuditlogExtension } from "./shoot/auditlog";
import { AuditLogData, Runtime, Seed, Shoot } from "./types";

// ============================================================================
// Seed placement
// ============================================================================

export interface SeedLister {
  listSeeds(providerType: string): Promise<Seed[]>;
}

export interface SeedAvailability {
  available: boolean;
  candidateRegions: string[];
}

const REQUIRED_SEED_CONDITIONS = ["GardenletReady"];
const OPTIONAL_SEED_CONDITIONS = ["SeedSystemComponentsHealthy"];

function seedUsable(seed: Seed): boolean {
  if (seed.metadata?.deletionTimestamp) return false;
  if (seed.spec?.settings?.scheduling?.visible === false) return false;

  const conditions = seed.status?.conditions ?? [];
  for (const type of REQUIRED_SEED_CONDITIONS) {
    if (conditions.find((c) => c.type === type)?.status !== "True") {
      return false;
    }
  }
  for (const type of OPTIONAL_SEED_CONDITIONS) {
    const condition = conditions.find((c) => c.type === type);
    if (condition && condition.status !== "True") {
      return false;
    }
  }
  return true;
}

export function evaluateSeeds(
  seeds: Seed[],
  providerType: string,
  region: string,
): SeedAvailability {
  const regions = new Set<string>();
  for (const seed of seeds) {
    if (seed.spec?.provider?.type !== providerType) continue;
    if (!seedUsable(seed)) continue;
    const seedRegion = seed.spec?.provider?.region;
    if (seedRegion) regions.add(seedRegion);
  }

  return {
    available: regions.has(region),
    candidateRegions: [...regions].sort(),
  };
}

/**
 * Lookup failures propagate; "no seed in this region" is a normal negative
 * result with the regions that do have seeds.
 */
export async function checkSeedAvailability(
  lister: SeedLister,
  providerType: string,
  region: string,
): Promise<SeedAvailability> {
  const seeds = await lister.listSeeds(providerType);
  return evaluateSeeds(seeds, providerType, region);
}

// ============================================================================
// Kubeconfig rotation
// ============================================================================

export const ROTATION_PERIOD_RATIO = 0.95;

export interface RotationInput {
  lastSyncTime?: string;
  rotationPeriod: Duration;
  forced: boolean;
  now: DateTime;
}

function parseSyncTime(value?: string): DateTime | undefined {
  if (!value) return undefined;
  const parsed = DateTime.fromISO(value, { setZone: true });
  return parsed.isValid ? parsed : undefined;
}

function rotationThreshold(rotationPeriod: Duration): number {
  return rotationPeriod.toMillis() * ROTATION_PERIOD_RATIO;
}

export function rotationDue({
  lastSyncTime,
  rotationPeriod,
  forced,
  now,
}: RotationInput): boolean {
  if (forced) return true;

  const lastSync = parseSyncTime(lastSyncTime);
  if (!lastSync) return true;

  const validFor = now.toMillis() - lastSync.toMillis();
  return validFor >= rotationThreshold(rotationPeriod);
}

/**
 * Time left until the rotation threshold is reached; zero when already due.
 */
export function timeUntilRotation({
  lastSyncTime,
  rotationPeriod,
  forced,
  now,
}: RotationInput): Duration {
  const lastSync = parseSyncTime(lastSyncTime);
  if (forced || !lastSync) {
    return Duration.fromMillis(0);
  }

  const remaining =
    lastSync.toMillis() + rotationThreshold(rotationPeriod) - now.toMillis();
  return Duration.fromMillis(Math.max(0, Math.ceil(remaining)));
}

// ============================================================================
// Shoot drift
// ============================================================================

/**
 * True when the Shoot was last written for a different Runtime generation.
 */
export function specDrift(runtime: Runtime, shoot: Shoot): boolean {
  const applied = shoot.metadata.annotations?.[ANNOTATION_RUNTIME_GENERATION];
  const desired = runtime.metadata.generation;
  if (desired === undefined) return false;
  return applied !== String(desired);
}

export function auditLogReflected(
  shoot: Shoot,
  data: AuditLogData,
  policyConfigMapName: string,
): boolean {
  const policyRef =
    shoot.spec.kubernetes.kubeAPIServer?.auditConfig?.auditPolicy?.configMapRef
      ?.name;
  if (policyRef !== policyConfigMapName) return false;

  const extension = shoot.spec.extensions?.find(
    (e) => e.type === AUDITLOG_EXTENSION_TYPE,
  );
  if (!extension) return false;

  const expected = buildAuditlogExtension(data);
  return (
    JSON.stringify(extension.providerConfig) ===
    JSON.stringify(expected.providerConfig)
  );
}
