/**
 * Error taxonomy for the migration engine. Every error carries a stable code so
 * callers can branch without string matching.
 */

export type MigrationErrorCode =
  | "DRIFT_DETECTED"
  | "WRITE_CONFLICT"
  | "LOCK_HELD"
  | "EXECUTION_FAILURE"
  | "TIMEOUT"
  | "PRECHECK_VIOLATION"
  | "CANCELLED"
  | "INVALID_CATALOG"
  | "NOT_FOUND";

export class MigrationError extends Error {
  readonly code: MigrationErrorCode;
  readonly unitId?: string;

  constructor(
    code: MigrationErrorCode,
    message: string,
    opts: { unitId?: string; cause?: unknown } = {},
  ) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = new.target.name;
    this.code = code;
    this.unitId = opts.unitId;
  }
}

export interface DriftRecord {
  unitId: string;
  recordedChecksum: string;
  currentChecksum: string;
}

/**
 * An applied unit's content no longer matches what the ledger recorded
 */
export class DriftDetectedError extends MigrationError {
  readonly drifted: DriftRecord[];

  constructor(drifted: DriftRecord[]) {
    super(
      "DRIFT_DETECTED",
      `Checksum drift detected for applied migration(s): ${drifted.map((d) => d.unitId).join(", ")}`,
      { unitId: drifted[0]?.unitId },
    );
    this.drifted = drifted;
  }
}

/**
 * Another writer recorded the same unit first. Re-plan and retry.
 */
export class WriteConflictError extends MigrationError {
  constructor(unitId: string) {
    super(
      "WRITE_CONFLICT",
      `Ledger entry for ${unitId} was already recorded by another writer`,
      { unitId },
    );
  }
}

export class LockHeldError extends MigrationError {
  readonly holder?: string;
  readonly expiresAt?: Date;

  constructor(holder?: string, expiresAt?: Date) {
    super(
      "LOCK_HELD",
      holder
        ? `Another migration run holds the lock (${holder})`
        : "Another migration run holds the lock",
    );
    this.holder = holder;
    this.expiresAt = expiresAt;
  }
}

export class ExecutionFailureError extends MigrationError {
  /** Set when the database may hold effects the ledger does not record */
  readonly fatal: boolean;

  constructor(
    unitId: string,
    message: string,
    opts: {
      cause?: unknown;
      fatal?: boolean;
      code?: "EXECUTION_FAILURE" | "TIMEOUT" | "PRECHECK_VIOLATION";
    } = {},
  ) {
    super(opts.code ?? "EXECUTION_FAILURE", message, {
      unitId,
      cause: opts.cause,
    });
    this.fatal = opts.fatal ?? false;
  }
}

export class TimeoutError extends ExecutionFailureError {
  readonly timeoutMs: number;

  constructor(unitId: string, timeoutMs: number) {
    super(unitId, `Migration ${unitId} exceeded its ${timeoutMs}ms budget`, {
      code: "TIMEOUT",
    });
    this.timeoutMs = timeoutMs;
  }
}

export type ViolationKind = "already-exists" | "missing-object" | "failed";

export interface Violation {
  unitId: string;
  kind: ViolationKind;
  message: string;
  /** SQLSTATE reported by the server, when there is one */
  sqlState?: string;
}

export class PrecheckViolationError extends ExecutionFailureError {
  readonly violation: Violation;

  constructor(violation: Violation) {
    super(
      violation.unitId,
      `Precheck for ${violation.unitId} failed (${violation.kind}): ${violation.message}`,
      { code: "PRECHECK_VIOLATION" },
    );
    this.violation = violation;
  }
}

export class CancelledError extends MigrationError {
  readonly appliedUnitIds: string[];

  constructor(appliedUnitIds: string[]) {
    super(
      "CANCELLED",
      `Migration run cancelled after ${appliedUnitIds.length} unit(s)`,
    );
    this.appliedUnitIds = appliedUnitIds;
  }
}

export class InvalidCatalogError extends MigrationError {
  constructor(message: string) {
    super("INVALID_CATALOG", message);
  }
}

export class LedgerEntryNotFoundError extends MigrationError {
  constructor(unitId: string) {
    super("NOT_FOUND", `No ledger entry for ${unitId}`, { unitId });
  }
}

/**
 * Read the SQLSTATE from a driver error, if it has one
 */
export function sqlStateOf(error: unknown): string | undefined {
  if (error instanceof MigrationError) {
    return undefined;
  }

  if (
    typeof error === "object" &&
    error !== null &&
    "code" in error &&
    typeof error.code === "string"
  ) {
    return error.code;
  }

  return undefined;
}
