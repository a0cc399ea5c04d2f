import { AuditLogData, Extension } from "../types";
import { ShootExtender, upsertExtension, upsertResource } from "./pipeline";

export const AUDITLOG_EXTENSION_TYPE = "shoot-auditlog-service";
export const AUDITLOG_REFERENCE_NAME = "auditlog-credentials";

export function buildAuditlogExtension(data: AuditLogData): Extension {
  return {
    type: AUDITLOG_EXTENSION_TYPE,
    providerConfig: {
      apiVersion: "service.auditlog.extensions.gardener.cloud/v1alpha1",
      kind: "AuditlogConfig",
      type: "standard",
      tenantID: data.tenantID,
      serviceURL: data.serviceURL,
      secretReferenceName: AUDITLOG_REFERENCE_NAME,
    },
  };
}

/**
 * Points the API server at the audit policy config map and, when tenant data
 * is known, wires the auditlog extension and its credentials secret.
 */
export function auditlogExtender(
  policyConfigMapName: string,
  data?: AuditLogData,
): ShootExtender {
  return {
    name: "auditlog",
    extend(_runtime, shoot) {
      const kubeAPIServer = shoot.spec.kubernetes.kubeAPIServer ?? {};
      kubeAPIServer.auditConfig = {
        ...kubeAPIServer.auditConfig,
        auditPolicy: {
          ...kubeAPIServer.auditConfig?.auditPolicy,
          configMapRef: { name: policyConfigMapName },
        },
      };
      shoot.spec.kubernetes.kubeAPIServer = kubeAPIServer;

      if (!data) {
        return;
      }

      upsertExtension(shoot, buildAuditlogExtension(data));
      upsertResource(shoot, {
        name: AUDITLOG_REFERENCE_NAME,
        resourceRef: {
          apiVersion: "v1",
          kind: "Secret",
          name: data.secretName,
        },
      });
    },
  };
}
