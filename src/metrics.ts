/**
 * Operational signal separating "will retry" from "gave up".
 */
export interface ReconcilerMetrics {
  incStopCounter(objectName: string, reason: string): void;
}

export class InMemoryReconcilerMetrics implements ReconcilerMetrics {
  private readonly stops = new Map<string, number>();

  incStopCounter(objectName: string, reason: string): void {
    const key = `${objectName}/${reason}`;
    this.stops.set(key, (this.stops.get(key) ?? 0) + 1);
  }

  stopCount(objectName: string, reason?: string): number {
    let count = 0;
    for (const [key, value] of this.stops) {
      if (reason ? key === `${objectName}/${reason}` : key.startsWith(`${objectName}/`)) {
        count += value;
      }
    }
    return count;
  }

  get totalStops(): number {
    let total = 0;
    for (const value of this.stops.values()) total += value;
    return total;
  }
}
