/**
 * Shoot Converter
 * Builds the Gardener Shoot for a Runtime (create) and re-asserts the fields
 * this controller owns on an existing Shoot (patch).
 */

import { GARDENER_API_GROUP, GARDENER_API_VERSION } from "../constants";
import { ConverterConfig } from "../config";
import { ValidationError } from "../errors";
import { AuditLogData, MaintenanceTimeWindow, Runtime, Shoot } from "../types";
import { auditlogExtender } from "./auditlog";
import {
  dnsExtender,
  generationExtender,
  highAvailabilityExtender,
  kubernetesExtender,
  kubernetesVersionExtender,
  maintenanceExtender,
  metadataExtender,
  networkFilterExtender,
  networkingExtender,
  providerExtender,
} from "./extenders";
import { runPipeline, ShootPipeline } from "./pipeline";

export interface CreateOptions {
  converter: ConverterConfig;
  projectName: string;
  auditLogData?: AuditLogData;
  maintenanceWindow?: MaintenanceTimeWindow;
}

export interface PatchOptions {
  policyConfigMapName: string;
  auditLogData?: AuditLogData;
}

export function createPipeline(options: CreateOptions): ShootPipeline {
  const { converter } = options;
  return [
    metadataExtender(options.projectName),
    generationExtender,
    kubernetesExtender(converter.kubernetes),
    networkingExtender,
    providerExtender,
    highAvailabilityExtender,
    dnsExtender(converter.dns),
    networkFilterExtender(converter.networking),
    auditlogExtender(converter.auditLog.policyConfigMapName, options.auditLogData),
    maintenanceExtender(options.maintenanceWindow),
  ];
}

/**
 * Only the fields that must stay authoritative on every reconcile; anything
 * else on the Shoot belongs to Gardener or other controllers.
 */
export function patchPipeline(options: PatchOptions): ShootPipeline {
  return [
    generationExtender,
    kubernetesVersionExtender,
    auditlogExtender(options.policyConfigMapName, options.auditLogData),
  ];
}

function emptyShoot(): Shoot {
  return {
    apiVersion: `${GARDENER_API_GROUP}/${GARDENER_API_VERSION}`,
    kind: "Shoot",
    metadata: {},
    spec: {
      region: "",
      kubernetes: { version: "" },
      provider: { type: "", workers: [] },
    },
  };
}

export function buildCreate(runtime: Runtime, options: CreateOptions): Shoot {
  return runPipeline(createPipeline(options), runtime, emptyShoot());
}

export function buildPatch(
  runtime: Runtime,
  observed: Shoot,
  options: PatchOptions,
): Shoot {
  return runPipeline(patchPipeline(options), runtime, observed);
}

/**
 * Checks what the create pipeline cannot do without.
 */
export function validateRuntime(runtime: Runtime, requiredLabels: string[]): void {
  const labels = runtime.metadata.labels ?? {};
  const missing = requiredLabels.filter((label) => !labels[label]);
  if (missing.length > 0) {
    throw new ValidationError(
      `runtime ${runtime.metadata.name} is missing required labels: ${missing.join(", ")}`,
    );
  }

  const { shoot } = runtime.spec;
  const emptyFields = (
    [
      ["spec.shoot.name", shoot.name],
      ["spec.shoot.region", shoot.region],
      ["spec.shoot.provider.type", shoot.provider.type],
      ["spec.shoot.secretBindingName", shoot.secretBindingName],
    ] as const
  )
    .filter(([, value]) => !value)
    .map(([field]) => field);
  if (emptyFields.length > 0) {
    throw new ValidationError(
      `runtime ${runtime.metadata.name} has empty required fields: ${emptyFields.join(", ")}`,
    );
  }
}
