/**
 * Infrastructure Manager Custom Resource Types
 * Runtime and GardenerCluster are served by the management cluster,
 * Shoot and Seed by Gardener (core.gardener.cloud/v1beta1).
 */

import type { Duration } from "luxon";

// ============================================================================
// Kubernetes Common Types
// ============================================================================

export interface KubeMetadata {
  name?: string;
  namespace?: string;
  uid?: string;
  annotations?: Record<string, string>;
  labels?: Record<string, string>;
  creationTimestamp?: string;
  deletionTimestamp?: string;
  generation?: number;
  resourceVersion?: string;
  finalizers?: string[];
}

export type ConditionStatus = "True" | "False" | "Unknown";

export interface Condition {
  type: string;
  status: ConditionStatus;
  lastTransitionTime?: string;
  reason?: string;
  message?: string;
}

// ============================================================================
// Runtime Types
// ============================================================================

export interface OIDCConfig {
  clientID?: string;
  issuerURL?: string;
  groupsClaim?: string;
  groupsPrefix?: string;
  usernameClaim?: string;
  usernamePrefix?: string;
  signingAlgs?: string[];
  requiredClaims?: Record<string, string>;
}

export interface Worker {
  name: string;
  machine: {
    type: string;
    image?: {
      name?: string;
      version?: string;
    };
  };
  minimum: number;
  maximum: number;
  maxSurge?: number | string;
  maxUnavailable?: number | string;
  zones?: string[];
  volume?: {
    type?: string;
    size: string;
  };
}

export type FailureToleranceType = "node" | "zone";

export interface RuntimeShoot {
  name: string;
  purpose: string;
  region: string;
  platformRegion?: string;
  licenceType?: string;
  secretBindingName: string;
  enforceSeedLocation?: boolean;
  kubernetes: {
    version?: string;
    kubeAPIServer: {
      oidcConfig: OIDCConfig;
      additionalOidcConfig?: OIDCConfig[];
    };
  };
  provider: {
    type: string;
    workers: Worker[];
    controlPlaneConfig?: Record<string, unknown>;
    infrastructureConfig?: Record<string, unknown>;
  };
  networking: {
    type?: string;
    pods: string;
    nodes: string;
    services: string;
  };
  controlPlane?: {
    highAvailability?: {
      failureTolerance: {
        type: FailureToleranceType;
      };
    };
  };
}

export interface RuntimeSecurity {
  administrators: string[];
  networking: {
    filter: {
      ingress?: { enabled: boolean };
      egress?: { enabled: boolean };
    };
  };
}

export type RuntimeState = "Pending" | "Ready" | "Terminating" | "Failed";

export interface RuntimeStatus {
  state?: RuntimeState;
  conditions?: Condition[];
}

export interface Runtime {
  apiVersion?: string;
  kind?: string;
  metadata: KubeMetadata;
  spec: {
    shoot: RuntimeShoot;
    security: RuntimeSecurity;
  };
  status?: RuntimeStatus;
}

// ============================================================================
// Shoot Types
// ============================================================================

export interface Extension {
  type: string;
  providerConfig?: Record<string, unknown>;
  disabled?: boolean;
}

export interface NamedResourceReference {
  name: string;
  resourceRef: {
    apiVersion: string;
    kind: string;
    name: string;
  };
}

export interface MaintenanceTimeWindow {
  begin: string;
  end: string;
}

export type LastOperationType = "Create" | "Reconcile" | "Delete" | "Migrate" | "Restore";

export type LastOperationState =
  | "Pending"
  | "Processing"
  | "Succeeded"
  | "Error"
  | "Failed"
  | "Aborted";

export interface LastOperation {
  type: LastOperationType;
  state: LastOperationState;
  description?: string;
  progress?: number;
  lastUpdateTime?: string;
}

export interface ShootSpec {
  purpose?: string;
  region: string;
  secretBindingName?: string;
  cloudProfileName?: string;
  exposureClassName?: string;
  kubernetes: {
    version: string;
    enableStaticTokenKubeconfig?: boolean;
    kubeAPIServer?: {
      oidcConfig?: OIDCConfig;
      auditConfig?: {
        auditPolicy?: {
          configMapRef?: { name: string };
        };
      };
    };
  };
  networking?: {
    type?: string;
    pods?: string;
    nodes?: string;
    services?: string;
  };
  provider: {
    type: string;
    workers: Worker[];
    controlPlaneConfig?: Record<string, unknown>;
    infrastructureConfig?: Record<string, unknown>;
  };
  controlPlane?: {
    highAvailability?: {
      failureTolerance: { type: FailureToleranceType };
    };
  };
  dns?: {
    domain?: string;
    providers?: Array<{
      type: string;
      secretName: string;
      primary?: boolean;
    }>;
  };
  extensions?: Extension[];
  resources?: NamedResourceReference[];
  maintenance?: {
    timeWindow?: MaintenanceTimeWindow;
    autoUpdate?: {
      kubernetesVersion: boolean;
      machineImageVersion?: boolean;
    };
  };
}

export interface Shoot {
  apiVersion: string;
  kind: string;
  metadata: KubeMetadata;
  spec: ShootSpec;
  status?: {
    lastOperation?: LastOperation;
    observedGeneration?: number;
    conditions?: Condition[];
  };
}

// ============================================================================
// Seed Types
// ============================================================================

export interface Seed {
  apiVersion?: string;
  kind?: string;
  metadata?: KubeMetadata;
  spec?: {
    provider?: {
      type?: string;
      region?: string;
    };
    settings?: {
      scheduling?: {
        visible?: boolean;
      };
    };
  };
  status?: {
    conditions?: Condition[];
  };
}

// ============================================================================
// GardenerCluster Types
// ============================================================================

export interface SecretCoordinates {
  name: string;
  namespace: string;
  key: string;
}

export interface GardenerCluster {
  apiVersion?: string;
  kind?: string;
  metadata: KubeMetadata;
  spec: {
    shoot: { name: string };
    kubeconfig: {
      secret: SecretCoordinates;
    };
  };
  status?: {
    state?: "Ready" | "Error";
    conditions?: Condition[];
  };
}

// ============================================================================
// Collaborator Data
// ============================================================================

export interface AuditLogData {
  tenantID: string;
  serviceURL: string;
  secretName: string;
}

export interface ObjectKey {
  namespace: string;
  name: string;
}

/**
 * What a reconcile invocation asks of its dispatcher: stop until the next
 * external trigger, or come back after the given delay.
 */
export type RequeueDirective =
  | { type: "stop" }
  | { type: "requeue"; after: Duration };
