/**
 * Error taxonomy for sync runs
 *
 * Every error carries a stable `code` so that run summaries and logs can be
 * grouped by kind. The `scope` tells the engine how far a failure reaches:
 * a single record, a single remote operation, a whole pass, or the run.
 */

export type SyncErrorCode =
  | "MALFORMED_INPUT"
  | "FIELD_VALIDATION"
  | "UNRESOLVED_REFERENCE"
  | "REMOTE_TRANSIENT"
  | "REMOTE_PERMANENT"
  | "CONFIGURATION"
  | "DEPENDENCY_CYCLE";

export type ErrorScope = "record" | "operation" | "pass" | "run";

export abstract class SyncError extends Error {
  abstract readonly code: SyncErrorCode;
  abstract readonly scope: ErrorScope;
}

// ============================================================================
// Pass-level
// ============================================================================

export class MalformedInputError extends SyncError {
  readonly code = "MALFORMED_INPUT" as const;
  readonly scope = "pass" as const;

  constructor(
    message: string,
    public readonly path?: string
  ) {
    super(message);
    this.name = "MalformedInputError";
  }
}

// ============================================================================
// Record-level
// ============================================================================

export class FieldValidationError extends SyncError {
  readonly code = "FIELD_VALIDATION" as const;
  readonly scope = "record" as const;

  constructor(
    message: string,
    public readonly field?: string,
    public readonly key?: string
  ) {
    super(message);
    this.name = "FieldValidationError";
  }
}

export class UnresolvedReferenceError extends SyncError {
  readonly code = "UNRESOLVED_REFERENCE" as const;
  readonly scope = "record" as const;

  constructor(
    public readonly field: string,
    public readonly value: string,
    public readonly target: string
  ) {
    super(`${field} '${value}' does not match any ${target} record`);
    this.name = "UnresolvedReferenceError";
  }
}

// ============================================================================
// Operation-level
// ============================================================================

export class RemoteTransientError extends SyncError {
  readonly code = "REMOTE_TRANSIENT" as const;
  readonly scope = "operation" as const;

  constructor(
    message: string,
    public readonly status?: number
  ) {
    super(message);
    this.name = "RemoteTransientError";
  }
}

export class RemotePermanentError extends SyncError {
  readonly code = "REMOTE_PERMANENT" as const;
  readonly scope = "operation" as const;
  details?: Record<string, unknown>;

  constructor(
    message: string,
    public readonly status?: number,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RemotePermanentError";
    this.details = details;
  }
}

// ============================================================================
// Run-level
// ============================================================================

export class ConfigurationError extends SyncError {
  readonly code = "CONFIGURATION" as const;
  readonly scope = "run" as const;

  constructor(
    public readonly option: string,
    message?: string
  ) {
    super(message ?? `Missing required configuration option ${option}`);
    this.name = "ConfigurationError";
  }
}

export class DependencyCycleError extends SyncError {
  readonly code = "DEPENDENCY_CYCLE" as const;
  readonly scope = "run" as const;

  constructor(
    message: string,
    public readonly types: string[]
  ) {
    super(message);
    this.name = "DependencyCycleError";
  }
}

/**
 * Normalize anything thrown into a message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
