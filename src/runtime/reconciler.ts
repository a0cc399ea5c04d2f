/**
 * Runtime Reconciler
 *
 * Drives the Gardener Shoot of one Runtime through its lifecycle. Every
 * invocation re-derives the situation from freshly observed state:
 *
 * - `observe` reads the Runtime, its Shoot and whatever lookups the situation
 *   needs (seeds, audit log tenant, maintenance window)
 * - `decide` picks the first matching entry of an ordered transition table and
 *   returns the single action to take, the conditions to record and the
 *   requeue directive
 * - `execute` performs the action, persists status and hands the directive
 *   back to the dispatcher
 */

import { Duration } from "luxon";
import { LoggerService } from "@backstage/backend-plugin-api";
import {
  ConditionReason,
  ConditionType,
  ConditionUpdate,
  Clock,
  findCondition,
  systemClock,
  upsertCondition,
} from "../conditions";
import { ConverterConfig } from "../config";
import {
  ANNOTATION_DELETION_CONFIRMATION,
  RUNTIME_FINALIZER,
} from "../constants";
import { AuditLogDataSource } from "../data/auditLogData";
import { MaintenanceWindowSource } from "../data/maintenanceWindow";
import {
  ConversionError,
  errorMessage,
  isConflictError,
  isNotFoundError,
  ValidationError,
} from "../errors";
import { ReconcilerMetrics } from "../metrics";
import {
  auditLogReflected,
  checkSeedAvailability,
  SeedAvailability,
  SeedLister,
  specDrift,
} from "../policy";
import { buildCreate, buildPatch, validateRuntime } from "../shoot/converter";
import {
  AuditLogData,
  MaintenanceTimeWindow,
  ObjectKey,
  RequeueDirective,
  Runtime,
  RuntimeState,
  RuntimeStatus,
  Shoot,
} from "../types";

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Shoots of one Gardener project. `getShoot` rejects with `NotFoundError`
 * when the Shoot does not exist.
 */
export interface ShootClient {
  getShoot(name: string): Promise<Shoot>;
  createShoot(shoot: Shoot): Promise<Shoot>;
  updateShoot(shoot: Shoot): Promise<Shoot>;
  deleteShoot(name: string): Promise<void>;
}

export interface RuntimeStore {
  listRuntimes(): Promise<Runtime[]>;
  getRuntime(key: ObjectKey): Promise<Runtime>;
  updateRuntime(runtime: Runtime): Promise<Runtime>;
  updateRuntimeStatus(runtime: Runtime): Promise<Runtime>;
}

export interface ClusterSettings {
  projectName: string;
  converter: ConverterConfig;
  auditLogMandatory: boolean;
  requiredLabels: string[];
  requeueAfter: Duration;
}

// ============================================================================
// Observation and Decision
// ============================================================================

export type Lookup<T> = { ok: true; value: T } | { ok: false; error: Error };

export interface ClusterObservation {
  runtime: Runtime;
  shoot?: Shoot;
  /** Set when the Shoot could not be read for a reason other than absence. */
  shootError?: Error;
  seeds?: Lookup<SeedAvailability>;
  auditLog?: Lookup<AuditLogData>;
  maintenanceWindow?: MaintenanceTimeWindow;
}

export type ClusterAction =
  | { kind: "none" }
  | { kind: "addFinalizer" }
  | { kind: "removeFinalizer" }
  | { kind: "createShoot"; shoot: Shoot }
  | { kind: "updateShoot"; shoot: Shoot }
  | { kind: "deleteShoot"; shoot: Shoot };

export interface ClusterDecision {
  transition: string;
  action: ClusterAction;
  state?: RuntimeState;
  conditions: ConditionUpdate[];
  requeue: RequeueDirective;
  /** Set when the decision gives up on the Runtime until its spec changes. */
  stopReason?: ConditionReason;
}

type DecisionBody = Omit<ClusterDecision, "transition">;

export interface ClusterTransition {
  name: string;
  matches(observed: ClusterObservation, settings: ClusterSettings): boolean;
  decide(observed: ClusterObservation, settings: ClusterSettings): DecisionBody;
}

const STOP: RequeueDirective = { type: "stop" };
const IMMEDIATELY: RequeueDirective = {
  type: "requeue",
  after: Duration.fromMillis(0),
};

function requeueAfter(settings: ClusterSettings): RequeueDirective {
  return { type: "requeue", after: settings.requeueAfter };
}

function lookedUp<T>(lookup?: Lookup<T>): T | undefined {
  return lookup && lookup.ok ? lookup.value : undefined;
}

function lookupError<T>(lookup?: Lookup<T>): Error | undefined {
  return lookup && !lookup.ok ? lookup.error : undefined;
}

function isDeleting(runtime: Runtime): boolean {
  return Boolean(runtime.metadata.deletionTimestamp);
}

function hasFinalizer(runtime: Runtime): boolean {
  return runtime.metadata.finalizers?.includes(RUNTIME_FINALIZER) ?? false;
}

function observedShoot(observed: ClusterObservation): Shoot {
  if (!observed.shoot) {
    throw new Error(
      `no Shoot observed for runtime ${observed.runtime.metadata.name}`,
    );
  }
  return observed.shoot;
}

function lastOperationState(observed: ClusterObservation) {
  return observed.shoot?.status?.lastOperation?.state;
}

/**
 * Generation of the Shoot spec Gardener has not processed yet, if any. Until
 * it has, `lastOperation` still describes the previous spec.
 */
function unobservedGeneration(observed: ClusterObservation): number | undefined {
  const generation = observed.shoot?.metadata.generation;
  const observedGeneration = observed.shoot?.status?.observedGeneration;
  if (generation === undefined || observedGeneration === undefined) {
    return undefined;
  }
  return observedGeneration < generation ? generation : undefined;
}

function terminal(
  reason: ConditionReason,
  message: string,
  extra: ConditionUpdate[] = [],
): DecisionBody {
  return {
    action: { kind: "none" },
    state: "Failed",
    conditions: [
      { type: ConditionType.Provisioned, status: "False", reason, message },
      ...extra,
    ],
    requeue: STOP,
    stopReason: reason,
  };
}

function decideCreate(
  observed: ClusterObservation,
  settings: ClusterSettings,
): DecisionBody {
  const { runtime } = observed;
  const { region } = runtime.spec.shoot;

  const seedError = lookupError(observed.seeds);
  if (seedError) {
    return {
      action: { kind: "none" },
      state: "Pending",
      conditions: [
        {
          type: ConditionType.Provisioned,
          status: "Unknown",
          reason: ConditionReason.SeedLookupFailed,
          message: `Failed to verify whether seed is available for the region ${region}: ${seedError.message}`,
        },
      ],
      requeue: requeueAfter(settings),
    };
  }
  const seeds = lookedUp(observed.seeds);
  if (seeds && !seeds.available) {
    return terminal(
      ConditionReason.SeedNotFound,
      `Cannot find available seed for the region ${region}. The following regions have seeds ready: [${seeds.candidateRegions.join(", ")}]`,
    );
  }

  const auditError = lookupError(observed.auditLog);
  if (auditError && settings.auditLogMandatory) {
    return terminal(
      ConditionReason.AuditLogError,
      `Failed to configure audit logs: ${auditError.message}`,
    );
  }

  let shoot: Shoot;
  try {
    validateRuntime(runtime, settings.requiredLabels);
    shoot = buildCreate(runtime, {
      converter: settings.converter,
      projectName: settings.projectName,
      auditLogData: lookedUp(observed.auditLog),
      maintenanceWindow: observed.maintenanceWindow,
    });
  } catch (error) {
    if (error instanceof ValidationError) {
      return terminal(ConditionReason.ValidationError, error.message);
    }
    if (error instanceof ConversionError) {
      return terminal(
        ConditionReason.ConversionError,
        `Runtime conversion error: ${error.message}`,
      );
    }
    throw error;
  }

  return {
    action: { kind: "createShoot", shoot },
    state: "Pending",
    conditions: [
      {
        type: ConditionType.Provisioned,
        status: "Unknown",
        reason: ConditionReason.ShootCreationPending,
        message: "Shoot is pending",
      },
    ],
    requeue: requeueAfter(settings),
  };
}

function decidePatch(
  observed: ClusterObservation,
  settings: ClusterSettings,
  conditions: ConditionUpdate[],
): DecisionBody {
  let shoot: Shoot;
  try {
    shoot = buildPatch(observed.runtime, observedShoot(observed), {
      policyConfigMapName: settings.converter.auditLog.policyConfigMapName,
      auditLogData: lookedUp(observed.auditLog),
    });
  } catch (error) {
    if (error instanceof ConversionError) {
      return terminal(
        ConditionReason.ConversionError,
        `Runtime conversion error: ${error.message}`,
      );
    }
    throw error;
  }

  return {
    action: { kind: "updateShoot", shoot },
    state: "Pending",
    conditions,
    requeue: requeueAfter(settings),
  };
}

function needsAuditPatch(
  observed: ClusterObservation,
  settings: ClusterSettings,
): boolean {
  const data = lookedUp(observed.auditLog);
  return (
    data !== undefined &&
    !auditLogReflected(
      observedShoot(observed),
      data,
      settings.converter.auditLog.policyConfigMapName,
    )
  );
}

/**
 * Ordered; the first entry whose predicate holds decides.
 */
export const CLUSTER_TRANSITIONS: readonly ClusterTransition[] = [
  {
    name: "shoot-unreadable",
    matches: (o) => o.shootError !== undefined,
    decide: (o, s) => ({
      action: { kind: "none" },
      conditions: [
        {
          type: isDeleting(o.runtime)
            ? ConditionType.Deprovisioned
            : ConditionType.Provisioned,
          status: "Unknown",
          reason: ConditionReason.GardenerError,
          message: `Gardener API get error: ${o.shootError?.message}`,
        },
      ],
      requeue: requeueAfter(s),
    }),
  },
  {
    name: "release-runtime",
    matches: (o) => isDeleting(o.runtime) && !o.shoot,
    decide: () => ({
      action: { kind: "removeFinalizer" },
      state: "Terminating",
      conditions: [],
      requeue: STOP,
    }),
  },
  {
    name: "await-shoot-deletion",
    matches: (o) =>
      isDeleting(o.runtime) && Boolean(o.shoot?.metadata.deletionTimestamp),
    decide: (_o, s) => ({
      action: { kind: "none" },
      state: "Terminating",
      conditions: [
        {
          type: ConditionType.Deprovisioned,
          status: "Unknown",
          reason: ConditionReason.DeletionPending,
          message: "Shoot deletion in progress",
        },
      ],
      requeue: requeueAfter(s),
    }),
  },
  {
    name: "delete-shoot",
    matches: (o) => isDeleting(o.runtime),
    decide: (o, s) => ({
      action: { kind: "deleteShoot", shoot: observedShoot(o) },
      state: "Terminating",
      conditions: [
        {
          type: ConditionType.Deprovisioned,
          status: "Unknown",
          reason: ConditionReason.DeletionPending,
          message: "Shoot deletion requested",
        },
      ],
      requeue: requeueAfter(s),
    }),
  },
  {
    name: "add-finalizer",
    matches: (o) => !hasFinalizer(o.runtime),
    decide: () => ({
      action: { kind: "addFinalizer" },
      state: "Pending",
      conditions: [],
      requeue: IMMEDIATELY,
    }),
  },
  {
    name: "create-shoot",
    matches: (o) => !o.shoot,
    decide: decideCreate,
  },
  {
    name: "await-shoot-operation",
    matches: (o) => {
      const state = lastOperationState(o);
      return (
        state === undefined ||
        state === "Pending" ||
        state === "Processing" ||
        unobservedGeneration(o) !== undefined
      );
    },
    decide: (o, s) => {
      const operation = o.shoot?.status?.lastOperation;
      const generation = unobservedGeneration(o);
      let message = "Shoot operation not started";
      if (generation !== undefined) {
        message = `Shoot generation ${generation} not yet observed by Gardener`;
      } else if (operation) {
        message = `Shoot ${operation.type} is ${operation.state}`;
      }
      return {
        action: { kind: "none" },
        state: "Pending",
        conditions: [
          {
            type: ConditionType.Provisioned,
            status: "Unknown",
            reason: ConditionReason.Processing,
            message,
          },
        ],
        requeue: requeueAfter(s),
      };
    },
  },
  {
    name: "patch-drifted-shoot",
    matches: (o) => specDrift(o.runtime, observedShoot(o)),
    decide: (o, s) =>
      decidePatch(o, s, [
        {
          type: ConditionType.Provisioned,
          status: "Unknown",
          reason: ConditionReason.ShootUpdatePending,
          message: `Shoot update for generation ${o.runtime.metadata.generation} is pending`,
        },
      ]),
  },
  {
    name: "shoot-failed",
    matches: (o) => lastOperationState(o) === "Failed",
    decide: (o) =>
      terminal(
        ConditionReason.ProvisioningFailed,
        `Shoot ${o.shoot?.status?.lastOperation?.type ?? "operation"} failed: ${o.shoot?.status?.lastOperation?.description ?? "no description"}`,
      ),
  },
  {
    name: "shoot-error",
    matches: (o) => {
      const state = lastOperationState(o);
      return state === "Error" || state === "Aborted";
    },
    decide: (o, s) => ({
      action: { kind: "none" },
      state: "Pending",
      conditions: [
        {
          type: ConditionType.Provisioned,
          status: "False",
          reason: ConditionReason.GardenerError,
          message: `Shoot ${o.shoot?.status?.lastOperation?.type ?? "operation"} error: ${o.shoot?.status?.lastOperation?.description ?? "no description"}`,
        },
      ],
      requeue: requeueAfter(s),
    }),
  },
  {
    name: "configure-audit-log",
    matches: needsAuditPatch,
    decide: (o, s) =>
      decidePatch(o, s, [
        {
          type: ConditionType.Provisioned,
          status: "Unknown",
          reason: ConditionReason.ShootUpdatePending,
          message: "Configuring audit logs",
        },
        {
          type: ConditionType.AuditLogConfigured,
          status: "Unknown",
          reason: ConditionReason.ShootUpdatePending,
          message: "Audit log extension is being applied",
        },
      ]),
  },
  {
    name: "audit-log-unavailable",
    matches: (o, s) =>
      s.auditLogMandatory && lookupError(o.auditLog) !== undefined,
    decide: (o) => {
      const message = `Failed to configure audit logs: ${lookupError(o.auditLog)?.message}`;
      return terminal(ConditionReason.AuditLogError, message, [
        {
          type: ConditionType.AuditLogConfigured,
          status: "False",
          reason: ConditionReason.AuditLogError,
          message,
        },
      ]);
    },
  },
  {
    name: "ready",
    matches: () => true,
    decide: (o) => {
      const auditError = lookupError(o.auditLog);
      return {
        action: { kind: "none" },
        state: "Ready",
        conditions: [
          {
            type: ConditionType.Provisioned,
            status: "True",
            reason: ConditionReason.Ready,
            message: "Runtime processing completed successfully",
          },
          auditError
            ? {
                type: ConditionType.AuditLogConfigured,
                status: "False",
                reason: ConditionReason.AuditLogSkipped,
                message: `Audit log data unavailable: ${auditError.message}`,
              }
            : {
                type: ConditionType.AuditLogConfigured,
                status: "True",
                reason: ConditionReason.AuditLogConfigured,
                message: "Audit logs configured",
              },
        ],
        requeue: STOP,
      };
    },
  },
];

/**
 * Pure: the same observation always yields the same decision.
 */
export function decide(
  observed: ClusterObservation,
  settings: ClusterSettings,
  transitions: readonly ClusterTransition[] = CLUSTER_TRANSITIONS,
): ClusterDecision {
  for (const transition of transitions) {
    if (transition.matches(observed, settings)) {
      return {
        transition: transition.name,
        ...transition.decide(observed, settings),
      };
    }
  }
  throw new Error(
    `no transition matched runtime ${observed.runtime.metadata.name}`,
  );
}

// ============================================================================
// Runtime Reconciler
// ============================================================================

export interface RuntimeReconcilerOptions {
  runtimes: RuntimeStore;
  shoots: ShootClient;
  seeds: SeedLister;
  auditLogData: AuditLogDataSource;
  maintenanceWindows?: MaintenanceWindowSource;
  metrics: ReconcilerMetrics;
  settings: ClusterSettings;
  logger: LoggerService;
  clock?: Clock;
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function lookup<T>(fn: () => Promise<T>): Promise<Lookup<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (error) {
    return { ok: false, error: asError(error) };
  }
}

/**
 * True when the persisted status already records this stop, so a repeated
 * invocation does not count it again.
 */
function alreadyStopped(runtime: Runtime, reason: ConditionReason): boolean {
  const provisioned = findCondition(
    runtime.status?.conditions,
    ConditionType.Provisioned,
  );
  return (
    runtime.status?.state === "Failed" &&
    provisioned?.status === "False" &&
    provisioned.reason === reason
  );
}

function describeAction(action: ClusterAction): string {
  switch (action.kind) {
    case "none":
      return "no action";
    case "addFinalizer":
      return "add finalizer";
    case "removeFinalizer":
      return "remove finalizer";
    case "createShoot":
      return `create shoot ${action.shoot.metadata.name}`;
    case "updateShoot":
      return `update shoot ${action.shoot.metadata.name}`;
    case "deleteShoot":
      return `delete shoot ${action.shoot.metadata.name}`;
  }
}

export class RuntimeReconciler {
  private readonly runtimes: RuntimeStore;
  private readonly shoots: ShootClient;
  private readonly seeds: SeedLister;
  private readonly auditLogData: AuditLogDataSource;
  private readonly maintenanceWindows?: MaintenanceWindowSource;
  private readonly metrics: ReconcilerMetrics;
  private readonly settings: ClusterSettings;
  private readonly logger: LoggerService;
  private readonly clock: Clock;

  constructor(options: RuntimeReconcilerOptions) {
    this.runtimes = options.runtimes;
    this.shoots = options.shoots;
    this.seeds = options.seeds;
    this.auditLogData = options.auditLogData;
    this.maintenanceWindows = options.maintenanceWindows;
    this.metrics = options.metrics;
    this.settings = options.settings;
    this.logger = options.logger.child({ component: "runtime-reconciler" });
    this.clock = options.clock ?? systemClock;
  }

  async reconcileCluster(
    key: ObjectKey,
    signal?: AbortSignal,
  ): Promise<RequeueDirective> {
    const log = this.logger.child({
      runtime: key.name,
      namespace: key.namespace,
    });
    signal?.throwIfAborted();

    const observed = await this.observe(key, log, signal);
    if (!observed) {
      log.debug(`Runtime ${key.namespace}/${key.name} not found, nothing to do`);
      return STOP;
    }

    const decision = decide(observed, this.settings);
    const message = `[${decision.transition}] ${describeAction(decision.action)}`;
    if (decision.action.kind === "none") {
      log.debug(message);
    } else {
      log.info(message);
    }

    return this.execute(observed.runtime, decision, log, signal);
  }

  // ============================================================================
  // Observe
  // ============================================================================

  private async observe(
    key: ObjectKey,
    log: LoggerService,
    signal?: AbortSignal,
  ): Promise<ClusterObservation | undefined> {
    let runtime: Runtime;
    try {
      runtime = await this.runtimes.getRuntime(key);
    } catch (error) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
    signal?.throwIfAborted();

    const shoot = await lookup(() => this.findShoot(runtime.spec.shoot.name));
    signal?.throwIfAborted();
    if (!shoot.ok) {
      log.warn(
        `Failed to get shoot ${runtime.spec.shoot.name}: ${shoot.error.message}`,
      );
      return { runtime, shootError: shoot.error };
    }
    const observed: ClusterObservation = { runtime, shoot: shoot.value };

    if (isDeleting(runtime) || !hasFinalizer(runtime)) {
      return observed;
    }

    const { provider, region, purpose } = runtime.spec.shoot;
    if (!observed.shoot && runtime.spec.shoot.enforceSeedLocation) {
      observed.seeds = await lookup(() =>
        checkSeedAvailability(this.seeds, provider.type, region),
      );
      signal?.throwIfAborted();
    }

    observed.auditLog = await lookup(() =>
      this.auditLogData.lookup(provider.type, region),
    );
    const auditError = lookupError(observed.auditLog);
    if (auditError) {
      log.warn(
        `Audit log data unavailable for ${provider.type}/${region}: ${auditError.message}`,
      );
    }
    signal?.throwIfAborted();

    if (!observed.shoot && purpose === "production" && this.maintenanceWindows) {
      try {
        observed.maintenanceWindow = await this.maintenanceWindows.lookup(region);
      } catch (error) {
        log.warn(
          `Maintenance window unavailable for region ${region}: ${errorMessage(error)}`,
        );
      }
      signal?.throwIfAborted();
    }

    return observed;
  }

  private async findShoot(name: string): Promise<Shoot | undefined> {
    try {
      return await this.shoots.getShoot(name);
    } catch (error) {
      if (isNotFoundError(error)) return undefined;
      throw error;
    }
  }

  // ============================================================================
  // Execute
  // ============================================================================

  private async execute(
    runtime: Runtime,
    decision: ClusterDecision,
    log: LoggerService,
    signal?: AbortSignal,
  ): Promise<RequeueDirective> {
    const { action } = decision;

    if (action.kind === "addFinalizer") {
      let updated: Runtime;
      try {
        updated = await this.runtimes.updateRuntime({
          ...runtime,
          metadata: {
            ...runtime.metadata,
            finalizers: [
              ...(runtime.metadata.finalizers ?? []),
              RUNTIME_FINALIZER,
            ],
          },
        });
      } catch (error) {
        const failure = asError(error);
        log.warn(`add finalizer failed: ${failure.message}`);
        signal?.throwIfAborted();
        await this.persistStatus(
          runtime,
          "Pending",
          [
            {
              type: ConditionType.Provisioned,
              status: "Unknown",
              reason: ConditionReason.GardenerError,
              message: `Failed to add finalizer: ${failure.message}`,
            },
          ],
          log,
          failure,
        );
        return requeueAfter(this.settings);
      }
      signal?.throwIfAborted();
      await this.persistStatus(updated, decision.state, decision.conditions, log);
      return decision.requeue;
    }

    if (action.kind === "removeFinalizer") {
      if (hasFinalizer(runtime)) {
        await this.runtimes.updateRuntime({
          ...runtime,
          metadata: {
            ...runtime.metadata,
            finalizers: (runtime.metadata.finalizers ?? []).filter(
              (f) => f !== RUNTIME_FINALIZER,
            ),
          },
        });
        log.info(`Runtime ${runtime.metadata.name} released for deletion`);
      }
      return decision.requeue;
    }

    try {
      await this.applyShootAction(action);
    } catch (error) {
      const failure = asError(error);
      if (isConflictError(failure)) {
        log.info(
          `${describeAction(action)} conflicts with a concurrent change: ${failure.message}`,
        );
      } else {
        log.warn(`${describeAction(action)} failed: ${failure.message}`);
      }
      signal?.throwIfAborted();

      const deleting = action.kind === "deleteShoot";
      const verb = action.kind.replace("Shoot", "");
      await this.persistStatus(
        runtime,
        deleting ? "Terminating" : "Pending",
        [
          {
            type: deleting
              ? ConditionType.Deprovisioned
              : ConditionType.Provisioned,
            status: "False",
            reason: ConditionReason.GardenerError,
            message: `Gardener API ${verb} error: ${failure.message}`,
          },
        ],
        log,
        failure,
      );
      return requeueAfter(this.settings);
    }
    signal?.throwIfAborted();

    if (decision.stopReason && !alreadyStopped(runtime, decision.stopReason)) {
      this.metrics.incStopCounter(
        runtime.metadata.name ?? "",
        decision.stopReason,
      );
      log.error(
        `Stopped processing runtime ${runtime.metadata.name}: ${decision.conditions[0]?.message}`,
      );
    }

    await this.persistStatus(runtime, decision.state, decision.conditions, log);
    return decision.requeue;
  }

  private async applyShootAction(action: ClusterAction): Promise<void> {
    switch (action.kind) {
      case "createShoot":
        await this.shoots.createShoot(action.shoot);
        return;
      case "updateShoot":
        await this.shoots.updateShoot(action.shoot);
        return;
      case "deleteShoot": {
        const name = action.shoot.metadata.name ?? "";
        if (
          action.shoot.metadata.annotations?.[ANNOTATION_DELETION_CONFIRMATION] !==
          "true"
        ) {
          await this.shoots.updateShoot({
            ...action.shoot,
            metadata: {
              ...action.shoot.metadata,
              annotations: {
                ...action.shoot.metadata.annotations,
                [ANNOTATION_DELETION_CONFIRMATION]: "true",
              },
            },
          });
        }
        await this.shoots.deleteShoot(name);
        return;
      }
      default:
        return;
    }
  }

  /**
   * Writes the status subresource when it changed. A write failure is
   * rethrown unless an earlier failure is already being reported.
   */
  private async persistStatus(
    runtime: Runtime,
    state: RuntimeState | undefined,
    conditions: ConditionUpdate[],
    log: LoggerService,
    earlierFailure?: Error,
  ): Promise<void> {
    const now = this.clock();
    const current: RuntimeStatus = runtime.status ?? {};
    const next: RuntimeStatus = {
      ...current,
      state: state ?? current.state,
      conditions:
        conditions.length === 0
          ? current.conditions
          : conditions.reduce(
              (list, update) => upsertCondition(list, update, now),
              current.conditions ?? [],
            ),
    };

    if (JSON.stringify(next) === JSON.stringify(current)) {
      return;
    }

    try {
      await this.runtimes.updateRuntimeStatus({ ...runtime, status: next });
    } catch (error) {
      log.error(
        `Failed to persist status of runtime ${runtime.metadata.name}: ${errorMessage(error)}`,
      );
      if (!earlierFailure) {
        throw error;
      }
    }
  }
}
