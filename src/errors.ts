import { HttpError } from "@kubernetes/client-node";

/**
 * The requested object does not exist. Cleanup paths treat this as an
 * absence signal rather than a failure.
 */
export class NotFoundError extends Error {
  readonly name = "NotFoundError";
}

/** Optimistic concurrency rejection; retried on the next invocation. */
export class ConflictError extends Error {
  readonly name = "ConflictError";
}

/** Any other failure talking to Gardener or the management cluster. */
export class GardenerApiError extends Error {
  readonly name = "GardenerApiError";

  constructor(
    message: string,
    readonly statusCode?: number,
  ) {
    super(message);
  }
}

/** The desired state is missing required labels or fields. */
export class ValidationError extends Error {
  readonly name = "ValidationError";
}

/** A Shoot pipeline step could not convert the desired state. */
export class ConversionError extends Error {
  readonly name = "ConversionError";
}

/** More than one secret matched an access object's identity label. */
export class AmbiguousSecretError extends Error {
  readonly name = "AmbiguousSecretError";

  constructor(
    readonly clusterName: string,
    readonly matches: number,
  ) {
    super(
      `unexpected number of secrets found for cluster ${clusterName}: ${matches}`,
    );
  }
}

export class AuditLogDataError extends Error {
  readonly name = "AuditLogDataError";
}

export class MaintenanceWindowError extends Error {
  readonly name = "MaintenanceWindowError";
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

export function isConflictError(error: unknown): error is ConflictError {
  return error instanceof ConflictError;
}

/**
 * Translate a client-node failure into the error taxonomy above.
 */
export function toGardenerError(error: unknown, description: string): Error {
  if (error instanceof HttpError) {
    const message = `${description}: ${error.statusCode ?? "no status"} ${describeBody(error.body)}`;
    switch (error.statusCode) {
      case 404:
        return new NotFoundError(message);
      case 409:
        return new ConflictError(message);
      default:
        return new GardenerApiError(message, error.statusCode);
    }
  }

  if (error instanceof Error) {
    return new GardenerApiError(`${description}: ${error.message}`);
  }

  return new GardenerApiError(`${description}: ${String(error)}`);
}

function describeBody(body: unknown): string {
  if (typeof body === "string") {
    return body;
  }
  if (body && typeof body === "object" && "message" in body) {
    const { message } = body;
    if (typeof message === "string") {
      return message;
    }
  }
  return "";
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
