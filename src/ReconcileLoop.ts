/**
 * Reconcile Loop
 *
 * Turns periodic scheduler sweeps into per-object reconcile invocations.
 * An object is reconciled when it is new, when its resourceVersion moved
 * since the last invocation, or when its requested requeue time has passed.
 * With a resync period, stopped objects are also revisited after that period,
 * since a write that changes nothing leaves the resourceVersion in place.
 * Objects that disappear are reconciled once more so that cleanup runs, then
 * forgotten.
 */

import { DateTime, Duration } from "luxon";
import pLimit from "p-limit";
import { LoggerService } from "@backstage/backend-plugin-api";
import { Clock, systemClock } from "./conditions";
import { errorMessage } from "./errors";
import { KubeMetadata, ObjectKey, RequeueDirective } from "./types";

export interface ReconcileTarget<T extends { metadata: KubeMetadata }> {
  kind: string;
  list(): Promise<T[]>;
  reconcile(key: ObjectKey, signal?: AbortSignal): Promise<RequeueDirective>;
}

export interface ReconcileLoopOptions<T extends { metadata: KubeMetadata }> {
  target: ReconcileTarget<T>;
  concurrency: number;
  /** Delay before retrying an invocation that threw. */
  errorBackoff: Duration;
  /** Delay before revisiting an object whose last invocation stopped. */
  resync?: Duration;
  logger: LoggerService;
  clock?: Clock;
}

export interface SweepResult {
  reconciled: number;
  failed: number;
}

interface TrackedObject {
  key: ObjectKey;
  resourceVersion?: string;
  /** Undefined after a stop directive without resync: wait for a change. */
  dueAt?: DateTime;
  vanished?: boolean;
}

function keyString(key: ObjectKey): string {
  return `${key.namespace}/${key.name}`;
}

function isDue(tracked: TrackedObject, now: DateTime): boolean {
  return tracked.dueAt !== undefined && tracked.dueAt.toMillis() <= now.toMillis();
}

export class ReconcileLoop<T extends { metadata: KubeMetadata }> {
  private readonly target: ReconcileTarget<T>;
  private readonly concurrency: number;
  private readonly errorBackoff: Duration;
  private readonly resync?: Duration;
  private readonly logger: LoggerService;
  private readonly clock: Clock;
  private readonly tracked = new Map<string, TrackedObject>();

  constructor(options: ReconcileLoopOptions<T>) {
    this.target = options.target;
    this.concurrency = options.concurrency;
    this.errorBackoff = options.errorBackoff;
    this.resync = options.resync;
    this.logger = options.logger.child({ loop: options.target.kind });
    this.clock = options.clock ?? systemClock;
  }

  async sweep(signal?: AbortSignal): Promise<SweepResult> {
    const objects = await this.target.list();
    const now = this.clock();
    const due: TrackedObject[] = [];
    const present = new Set<string>();

    for (const object of objects) {
      const { name, namespace, resourceVersion } = object.metadata;
      if (!name || !namespace) continue;
      const key = { namespace, name };
      const id = keyString(key);
      present.add(id);

      const previous = this.tracked.get(id);
      if (
        !previous ||
        previous.vanished ||
        previous.resourceVersion !== resourceVersion ||
        isDue(previous, now)
      ) {
        due.push({ key, resourceVersion });
      }
    }

    for (const [id, previous] of this.tracked) {
      if (present.has(id)) continue;
      if (!previous.vanished || isDue(previous, now)) {
        due.push({ key: previous.key, vanished: true });
      }
    }

    if (due.length === 0) {
      this.logger.debug(`No ${this.target.kind} objects due`);
      return { reconciled: 0, failed: 0 };
    }

    const limit = pLimit(this.concurrency);
    const outcomes = await Promise.all(
      due.map((entry) => limit(() => this.reconcileOne(entry, signal))),
    );

    const failed = outcomes.filter((ok) => !ok).length;
    this.logger.info(
      `Reconciled ${outcomes.length - failed}/${outcomes.length} ${this.target.kind} objects`,
    );
    return { reconciled: outcomes.length - failed, failed };
  }

  /**
   * Resolves to false when the invocation threw; the object is then retried
   * after the error backoff.
   */
  private async reconcileOne(
    entry: TrackedObject,
    signal?: AbortSignal,
  ): Promise<boolean> {
    const id = keyString(entry.key);
    if (signal?.aborted) {
      return false;
    }

    try {
      const directive = await this.target.reconcile(entry.key, signal);
      if (entry.vanished) {
        this.tracked.delete(id);
        return true;
      }
      this.tracked.set(id, { ...entry, dueAt: this.nextDue(directive) });
      return true;
    } catch (error) {
      this.logger.warn(
        `Failed to reconcile ${this.target.kind} ${id}: ${errorMessage(error)}`,
      );
      this.tracked.set(id, {
        ...entry,
        dueAt: this.clock().plus(this.errorBackoff),
      });
      return false;
    }
  }

  private nextDue(directive: RequeueDirective): DateTime | undefined {
    if (directive.type === "requeue") {
      return this.clock().plus(directive.after);
    }
    return this.resync ? this.clock().plus(this.resync) : undefined;
  }

  /** Next requested invocation time for an object, if one is pending. */
  dueAt(key: ObjectKey): DateTime | undefined {
    return this.tracked.get(keyString(key))?.dueAt;
  }
}
