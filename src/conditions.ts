import { DateTime } from "luxon";
import { Condition, ConditionStatus } from "./types";

export type Clock = () => DateTime;

export const systemClock: Clock = () => DateTime.utc();

// ============================================================================
// Condition Types and Reasons
// ============================================================================

export const ConditionType = {
  Provisioned: "Provisioned",
  Deprovisioned: "Deprovisioned",
  AuditLogConfigured: "AuditLogConfigured",
  KubeconfigManagement: "KubeconfigManagement",
} as const;

export type ConditionType = (typeof ConditionType)[keyof typeof ConditionType];

export const ConditionReason = {
  // runtime
  ValidationError: "ValidationError",
  SeedNotFound: "SeedNotFound",
  SeedLookupFailed: "SeedLookupFailed",
  AuditLogError: "AuditLogError",
  AuditLogConfigured: "AuditLogConfigured",
  AuditLogSkipped: "AuditLogSkipped",
  ConversionError: "ConversionError",
  GardenerError: "GardenerError",
  ShootCreationPending: "ShootCreationPending",
  ShootUpdatePending: "ShootUpdatePending",
  Processing: "Processing",
  ProvisioningFailed: "ProvisioningFailed",
  Ready: "Ready",
  DeletionPending: "DeletionPending",
  // kubeconfig
  KubeconfigSecretCreated: "KubeconfigSecretCreated",
  KubeconfigSecretRotated: "KubeconfigSecretRotated",
  FailedToGetSecret: "FailedToGetSecret",
  FailedToGetKubeconfig: "FailedToGetKubeconfig",
  FailedToCreateSecret: "FailedToCreateSecret",
  FailedToUpdateSecret: "FailedToUpdateSecret",
  FailedToDeleteSecret: "FailedToDeleteSecret",
} as const;

export type ConditionReason =
  (typeof ConditionReason)[keyof typeof ConditionReason];

export interface ConditionUpdate {
  type: ConditionType;
  status: ConditionStatus;
  reason: ConditionReason;
  message: string;
}

/**
 * Replaces the condition of the same type, or appends it. The transition time
 * only moves when status, reason or message actually change.
 */
export function upsertCondition(
  conditions: readonly Condition[] | undefined,
  update: ConditionUpdate,
  now: DateTime,
): Condition[] {
  const list = [...(conditions ?? [])];
  const index = list.findIndex((c) => c.type === update.type);
  const existing = index === -1 ? undefined : list[index];

  const unchanged =
    existing !== undefined &&
    existing.status === update.status &&
    existing.reason === update.reason &&
    existing.message === update.message;

  const next: Condition = {
    ...update,
    lastTransitionTime: unchanged
      ? existing.lastTransitionTime
      : now.toUTC().toISO({ suppressMilliseconds: true }) ?? undefined,
  };

  if (index === -1) {
    list.push(next);
  } else {
    list[index] = next;
  }
  return list;
}

export function findCondition(
  conditions: readonly Condition[] | undefined,
  type: ConditionType,
): Condition | undefined {
  return conditions?.find((c) => c.type === type);
}
