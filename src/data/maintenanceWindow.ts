import { readFile } from "fs/promises";
import { errorMessage, MaintenanceWindowError } from "../errors";
import { MaintenanceTimeWindow } from "../types";

export interface MaintenanceWindowSource {
  lookup(region: string): Promise<MaintenanceTimeWindow>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

// Gardener window bounds, e.g. 220000+0000
const WINDOW_BOUND = /^([01]\d|2[0-3])[0-5]\d[0-5]\d[+-]\d{4}$/;

/**
 * Window map keyed by region: `{ "eu-west-1": { "begin": "220000+0000", "end": "230000+0000" } }`.
 */
export class FileMaintenanceWindowSource implements MaintenanceWindowSource {
  constructor(private readonly path: string) {}

  async lookup(region: string): Promise<MaintenanceTimeWindow> {
    let windows: unknown;
    try {
      windows = JSON.parse(await readFile(this.path, "utf8"));
    } catch (error) {
      throw new MaintenanceWindowError(
        `failed to read maintenance window map ${this.path}: ${errorMessage(error)}`,
      );
    }

    if (!isRecord(windows)) {
      throw new MaintenanceWindowError(
        `maintenance window map ${this.path} is not an object`,
      );
    }
    const entry = windows[region];
    if (!isRecord(entry)) {
      throw new MaintenanceWindowError(
        `no maintenance window for region ${region}`,
      );
    }

    const { begin, end } = entry;
    if (
      typeof begin !== "string" ||
      typeof end !== "string" ||
      !WINDOW_BOUND.test(begin) ||
      !WINDOW_BOUND.test(end)
    ) {
      throw new MaintenanceWindowError(
        `invalid maintenance window for region ${region}`,
      );
    }
    return { begin, end };
  }
}
