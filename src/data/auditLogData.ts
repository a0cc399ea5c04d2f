import { readFile } from "fs/promises";
import { AuditLogDataError, errorMessage } from "../errors";
import { AuditLogData } from "../types";

export interface AuditLogDataSource {
  lookup(providerType: string, region: string): Promise<AuditLogData>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "https:" || url.protocol === "http:";
  } catch {
    return false;
  }
}

export function parseAuditLogData(value: unknown, where: string): AuditLogData {
  if (!isRecord(value)) {
    throw new AuditLogDataError(`audit log data for ${where} is not an object`);
  }
  const { tenantID, serviceURL, secretName } = value;
  if (typeof tenantID !== "string" || tenantID === "") {
    throw new AuditLogDataError(`audit log data for ${where} has no tenantID`);
  }
  if (typeof serviceURL !== "string" || !isUrl(serviceURL)) {
    throw new AuditLogDataError(
      `audit log data for ${where} has an invalid serviceURL`,
    );
  }
  if (typeof secretName !== "string" || secretName === "") {
    throw new AuditLogDataError(`audit log data for ${where} has no secretName`);
  }
  return { tenantID, serviceURL, secretName };
}

/**
 * Tenant configuration keyed by provider type, then region:
 *
 * ```json
 * { "aws": { "eu-central-1": { "tenantID": "...", "serviceURL": "...", "secretName": "..." } } }
 * ```
 *
 * The file is read on every lookup so that remounted configuration is picked
 * up without a restart.
 */
export class FileAuditLogDataSource implements AuditLogDataSource {
  constructor(private readonly path: string) {}

  async lookup(providerType: string, region: string): Promise<AuditLogData> {
    let tenants: unknown;
    try {
      tenants = JSON.parse(await readFile(this.path, "utf8"));
    } catch (error) {
      throw new AuditLogDataError(
        `failed to read audit log tenant configuration ${this.path}: ${errorMessage(error)}`,
      );
    }

    if (!isRecord(tenants)) {
      throw new AuditLogDataError(
        `audit log tenant configuration ${this.path} is not an object`,
      );
    }
    const regions = tenants[providerType];
    if (!isRecord(regions)) {
      throw new AuditLogDataError(
        `no audit log configuration for provider ${providerType}`,
      );
    }
    const data = regions[region];
    if (data === undefined) {
      throw new AuditLogDataError(
        `no audit log configuration for region ${region} of provider ${providerType}`,
      );
    }
    return parseAuditLogData(data, `${providerType}/${region}`);
  }
}

/**
 * Used when no tenant configuration path is set.
 */
export class UnconfiguredAuditLogDataSource implements AuditLogDataSource {
  async lookup(): Promise<AuditLogData> {
    throw new AuditLogDataError("audit log tenant configuration is not set");
  }
}
