import { ConverterConfig } from "../config";
import {
  ANNOTATION_LICENCE_TYPE,
  ANNOTATION_RUNTIME_GENERATION,
  ANNOTATION_RUNTIME_ID,
  LABEL_GLOBAL_ACCOUNT_ID,
  LABEL_RUNTIME_ID,
} from "../constants";
import { ConversionError, ValidationError } from "../errors";
import { AUDIT_LOG_DATA, buildRuntime } from "../__testUtils__/fakes";
import { AUDITLOG_EXTENSION_TYPE } from "./auditlog";
import { buildCreate, buildPatch, validateRuntime } from "./converter";
import { NETWORKING_FILTER_EXTENSION_TYPE } from "./extenders";

const converter: ConverterConfig = {
  kubernetes: { defaultVersion: "1.29", enableStaticTokenKubeconfig: false },
  networking: { egressFilterEnabled: false },
  auditLog: { policyConfigMapName: "audit-policy" },
};

const WINDOW = { begin: "220000+0000", end: "230000+0000" };

// ============================================================================
// Create mode
// ============================================================================

describe("buildCreate", () => {
  it("should produce byte-identical output for identical input", () => {
    const runtime = buildRuntime();
    const options = {
      converter,
      projectName: "dev",
      auditLogData: AUDIT_LOG_DATA,
      maintenanceWindow: WINDOW,
    };

    expect(JSON.stringify(buildCreate(runtime, options))).toBe(
      JSON.stringify(buildCreate(runtime, options)),
    );
  });

  it("should map metadata into the project namespace", () => {
    const shoot = buildCreate(buildRuntime(), { converter, projectName: "dev" });

    expect(shoot.apiVersion).toBe("core.gardener.cloud/v1beta1");
    expect(shoot.kind).toBe("Shoot");
    expect(shoot.metadata).toEqual({
      name: "shoot-1",
      namespace: "garden-dev",
      labels: {
        [LABEL_RUNTIME_ID]: "runtime-1",
        [LABEL_GLOBAL_ACCOUNT_ID]: "account-1",
      },
      annotations: {
        [ANNOTATION_RUNTIME_ID]: "runtime-1",
        [ANNOTATION_LICENCE_TYPE]: "trial",
        [ANNOTATION_RUNTIME_GENERATION]: "1",
      },
    });
  });

  it("should build an aws evaluation Shoot without maintenance window", () => {
    const shoot = buildCreate(buildRuntime(), {
      converter,
      projectName: "dev",
      maintenanceWindow: WINDOW,
    });

    expect(shoot.spec.provider.type).toBe("aws");
    expect(shoot.spec.cloudProfileName).toBe("aws");
    expect(shoot.spec.exposureClassName).toBeUndefined();
    expect(shoot.spec.region).toBe("eu-west-1");
    expect(shoot.spec.purpose).toBe("evaluation");
    expect(shoot.spec.secretBindingName).toBe("aws-binding");
    expect(shoot.spec.maintenance).toEqual({
      autoUpdate: { kubernetesVersion: true, machineImageVersion: true },
    });
  });

  it("should set the maintenance window for production runtimes", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.purpose = "production";

    const shoot = buildCreate(runtime, {
      converter,
      projectName: "dev",
      maintenanceWindow: WINDOW,
    });

    expect(shoot.spec.maintenance?.timeWindow).toEqual(WINDOW);
  });

  it("should omit the window for production runtimes when none was resolved", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.purpose = "production";

    const shoot = buildCreate(runtime, { converter, projectName: "dev" });

    expect(shoot.spec.maintenance?.timeWindow).toBeUndefined();
  });

  it("should set the exposure class for openstack only", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.provider.type = "openstack";

    const shoot = buildCreate(runtime, { converter, projectName: "dev" });

    expect(shoot.spec.cloudProfileName).toBe("converged-cloud");
    expect(shoot.spec.exposureClassName).toBe("converged-cloud-internet");
  });

  it("should reject unknown provider types", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.provider.type = "unknown";

    expect(() =>
      buildCreate(runtime, { converter, projectName: "dev" }),
    ).toThrow(new ConversionError('unsupported provider type "unknown"'));
  });

  it("should reject runtimes without workers", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.provider.workers = [];

    expect(() =>
      buildCreate(runtime, { converter, projectName: "dev" }),
    ).toThrow(ConversionError);
  });

  it("should map kubernetes, OIDC and networking", () => {
    const shoot = buildCreate(buildRuntime(), { converter, projectName: "dev" });

    expect(shoot.spec.kubernetes.version).toBe("1.29.4");
    expect(shoot.spec.kubernetes.enableStaticTokenKubeconfig).toBe(false);
    expect(shoot.spec.kubernetes.kubeAPIServer?.oidcConfig).toEqual({
      clientID: "test-client",
      issuerURL: "https://issuer.example.com",
      groupsClaim: "groups",
      usernameClaim: "sub",
      signingAlgs: ["RS256"],
    });
    expect(shoot.spec.networking).toEqual({
      type: "calico",
      pods: "100.64.0.0/12",
      nodes: "10.250.0.0/16",
      services: "100.104.0.0/13",
    });
  });

  it("should fall back to the configured kubernetes version", () => {
    const runtime = buildRuntime();
    delete runtime.spec.shoot.kubernetes.version;

    const shoot = buildCreate(runtime, { converter, projectName: "dev" });

    expect(shoot.spec.kubernetes.version).toBe("1.29");
  });

  it("should set the high availability failure tolerance", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.controlPlane = {
      highAvailability: { failureTolerance: { type: "zone" } },
    };

    const shoot = buildCreate(runtime, { converter, projectName: "dev" });

    expect(shoot.spec.controlPlane).toEqual({
      highAvailability: { failureTolerance: { type: "zone" } },
    });
  });

  it("should disable the network filter when egress filtering is off", () => {
    const shoot = buildCreate(buildRuntime(), { converter, projectName: "dev" });

    const filter = shoot.spec.extensions?.find(
      (e) => e.type === NETWORKING_FILTER_EXTENSION_TYPE,
    );
    expect(filter?.disabled).toBe(true);
  });

  it("should seed the auditlog extension when audit data is available", () => {
    const shoot = buildCreate(buildRuntime(), {
      converter,
      projectName: "dev",
      auditLogData: AUDIT_LOG_DATA,
    });

    expect(
      shoot.spec.extensions?.find((e) => e.type === AUDITLOG_EXTENSION_TYPE),
    ).toEqual({
      type: AUDITLOG_EXTENSION_TYPE,
      providerConfig: {
        apiVersion: "service.auditlog.extensions.gardener.cloud/v1alpha1",
        kind: "AuditlogConfig",
        type: "standard",
        tenantID: "tenant-1",
        serviceURL: "https://auditlog.example.com",
        secretReferenceName: "auditlog-credentials",
      },
    });
    expect(shoot.spec.resources).toEqual([
      {
        name: "auditlog-credentials",
        resourceRef: { apiVersion: "v1", kind: "Secret", name: "auditlog-secret" },
      },
    ]);
    expect(
      shoot.spec.kubernetes.kubeAPIServer?.auditConfig?.auditPolicy?.configMapRef,
    ).toEqual({ name: "audit-policy" });
  });

  it("should leave the auditlog extension out without audit data", () => {
    const shoot = buildCreate(buildRuntime(), { converter, projectName: "dev" });

    expect(
      shoot.spec.extensions?.map((e) => e.type),
    ).toEqual([NETWORKING_FILTER_EXTENSION_TYPE]);
    expect(shoot.spec.resources).toBeUndefined();
  });

  it("should configure DNS when a provider is configured", () => {
    const shoot = buildCreate(buildRuntime(), {
      converter: {
        ...converter,
        dns: {
          secretName: "dns-secret",
          domainPrefix: "dev.example.com",
          providerType: "aws-route53",
        },
      },
      projectName: "dev",
    });

    expect(shoot.spec.dns).toEqual({
      domain: "shoot-1.dev.example.com",
      providers: [{ type: "aws-route53", secretName: "dns-secret", primary: true }],
    });
  });

  it("should not modify the runtime", () => {
    const runtime = buildRuntime();
    const before = JSON.stringify(runtime);

    buildCreate(runtime, {
      converter,
      projectName: "dev",
      auditLogData: AUDIT_LOG_DATA,
    });

    expect(JSON.stringify(runtime)).toBe(before);
  });
});

// ============================================================================
// Patch mode
// ============================================================================

describe("buildPatch", () => {
  const patchOptions = {
    policyConfigMapName: "audit-policy",
    auditLogData: AUDIT_LOG_DATA,
  };

  it("should be idempotent", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, { converter, projectName: "dev" });

    const once = buildPatch(runtime, observed, patchOptions);
    const twice = buildPatch(runtime, once, patchOptions);

    expect(JSON.stringify(twice)).toBe(JSON.stringify(once));
  });

  it("should add the auditlog extension without touching foreign fields", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, { converter, projectName: "dev" });
    observed.metadata.resourceVersion = "42";
    observed.spec.extensions?.push({ type: "shoot-dns-service" });
    observed.spec.dns = { domain: "managed.example.com" };

    const patched = buildPatch(runtime, observed, patchOptions);

    expect(patched.metadata.resourceVersion).toBe("42");
    expect(patched.spec.dns).toEqual({ domain: "managed.example.com" });
    expect(patched.spec.extensions?.map((e) => e.type)).toEqual([
      NETWORKING_FILTER_EXTENSION_TYPE,
      "shoot-dns-service",
      AUDITLOG_EXTENSION_TYPE,
    ]);
  });

  it("should replace an existing auditlog extension in place", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, {
      converter,
      projectName: "dev",
      auditLogData: { ...AUDIT_LOG_DATA, tenantID: "old-tenant" },
    });

    const patched = buildPatch(runtime, observed, patchOptions);

    const auditlog = patched.spec.extensions?.filter(
      (e) => e.type === AUDITLOG_EXTENSION_TYPE,
    );
    expect(auditlog).toHaveLength(1);
    expect(auditlog?.[0].providerConfig?.tenantID).toBe("tenant-1");
  });

  it("should record the new generation", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, { converter, projectName: "dev" });
    runtime.metadata.generation = 3;

    const patched = buildPatch(runtime, observed, patchOptions);

    expect(
      patched.metadata.annotations?.[ANNOTATION_RUNTIME_GENERATION],
    ).toBe("3");
  });

  it("should upgrade but never downgrade the kubernetes version", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, { converter, projectName: "dev" });

    runtime.spec.shoot.kubernetes.version = "1.30.1";
    expect(
      buildPatch(runtime, observed, patchOptions).spec.kubernetes.version,
    ).toBe("1.30.1");

    runtime.spec.shoot.kubernetes.version = "1.28.9";
    expect(
      buildPatch(runtime, observed, patchOptions).spec.kubernetes.version,
    ).toBe("1.29.4");
  });

  it("should not modify the observed Shoot", () => {
    const runtime = buildRuntime();
    const observed = buildCreate(runtime, { converter, projectName: "dev" });
    const before = JSON.stringify(observed);

    buildPatch(runtime, observed, patchOptions);

    expect(JSON.stringify(observed)).toBe(before);
  });
});

// ============================================================================
// Validation
// ============================================================================

describe("validateRuntime", () => {
  const requiredLabels = [LABEL_RUNTIME_ID, LABEL_GLOBAL_ACCOUNT_ID];

  it("should accept a complete runtime", () => {
    expect(() => validateRuntime(buildRuntime(), requiredLabels)).not.toThrow();
  });

  it("should name the missing labels", () => {
    const runtime = buildRuntime();
    runtime.metadata.labels = {};

    expect(() => validateRuntime(runtime, requiredLabels)).toThrow(
      new ValidationError(
        `runtime runtime-1 is missing required labels: ${LABEL_RUNTIME_ID}, ${LABEL_GLOBAL_ACCOUNT_ID}`,
      ),
    );
  });

  it("should name empty required fields", () => {
    const runtime = buildRuntime();
    runtime.spec.shoot.secretBindingName = "";

    expect(() => validateRuntime(runtime, requiredLabels)).toThrow(
      "runtime runtime-1 has empty required fields: spec.shoot.secretBindingName",
    );
  });
});
