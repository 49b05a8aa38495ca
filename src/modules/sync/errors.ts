/**
 * Error taxonomy of the sync engine.
 *
 * Every failure surfaces as a `SyncError` subclass inside a `Result`; callers branch on
 * `code` (stable) rather than on message text.
 */

export type SyncErrorCode =
  | "CONFIG_INVALID"
  | "VALIDATION_FAILED"
  | "UNKNOWN_SERVER"
  | "DUPLICATE_SERVER"
  | "DUPLICATE_PUNISHMENT"
  | "INVALID_STATE"
  | "PERMISSION_DENIED"
  | "EFFECTOR_FAILURE"
  | "PERSISTENCE_FAILURE"
  | "NOT_FOUND";

export class SyncError extends Error {
  constructor(
    public readonly code: SyncErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "SyncError";
  }
}

/** Malformed or dangling configuration; fatal when raised by `load`. */
export class ConfigError extends SyncError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
  ) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class ValidationError extends SyncError {
  constructor(message: string, code: "VALIDATION_FAILED" | "UNKNOWN_SERVER" = "VALIDATION_FAILED") {
    super(code, message);
    this.name = "ValidationError";
  }
}

export class DuplicateServerError extends SyncError {
  constructor(public readonly serverId: string) {
    super("DUPLICATE_SERVER", `Server ${serverId} is already registered`);
    this.name = "DuplicateServerError";
  }
}

export class DuplicatePunishmentError extends SyncError {
  constructor(public readonly punishmentId: string) {
    super("DUPLICATE_PUNISHMENT", `Punishment ${punishmentId} already exists`);
    this.name = "DuplicatePunishmentError";
  }
}

/** Stale or duplicate confirm/reject; the caller treats it as a no-op. */
export class InvalidStateError extends SyncError {
  constructor(
    message: string,
    public readonly currentState: string | null = null,
  ) {
    super("INVALID_STATE", message);
    this.name = "InvalidStateError";
  }
}

export class PermissionDenied extends SyncError {
  constructor(message: string) {
    super("PERMISSION_DENIED", message);
    this.name = "PermissionDenied";
  }
}

/** A remote call through the effector failed or timed out. */
export class EffectorFailure extends SyncError {
  constructor(
    public readonly serverId: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super("EFFECTOR_FAILURE", message, options);
    this.name = "EffectorFailure";
  }
}

export class PersistenceError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("PERSISTENCE_FAILURE", message, options);
    this.name = "PersistenceError";
  }
}

export class NotFoundError extends SyncError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "NotFoundError";
  }
}

/** Wraps a repository error so it carries a sync error code. */
export const asPersistenceError = (error: unknown, context: string): SyncError => {
  if (error instanceof SyncError) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new PersistenceError(`${context}: ${message}`, { cause: error });
};
