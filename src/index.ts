/**
 * pg-ledger-migrate - ordered, checksummed PostgreSQL migrations
 *
 * Units are applied in id order, one transaction each, and recorded in a
 * ledger table. A run-level lock keeps concurrent runs apart.
 */

export {
  MigrationManager,
  type MigrationManagerOptions,
  type MigrationStatus,
  type UnitState,
  type UpResult,
} from "./lib/migration-system";

export {
  defineMigration,
  computeChecksum,
  validateCatalog,
  type ForwardAction,
  type MigrationDefinition,
  type MigrationUnit,
} from "./lib/migration-unit";

export { planMigrations, type Plan } from "./lib/planner";

export {
  PostgresLedgerStore,
  type LedgerEntry,
  type LedgerStore,
} from "./lib/ledger-store";

export {
  Executor,
  type ApplyOptions,
  type ApplyResult,
  type ExecutorOptions,
} from "./lib/executor";

export {
  Verifier,
  classifyViolation,
  type DryRunReport,
  type DryRunUnitResult,
  type PrecheckResult,
  type VerifierMode,
} from "./lib/verifier";

export {
  MigrationLock,
  type LockAttempt,
  type MigrationLockOptions,
} from "./lib/migration-lock";

export {
  createSchemaHelpers,
  type SchemaHelpers,
  type TriggerDefinition,
  type TriggerEvent,
  type TriggerTiming,
} from "./lib/schema-helpers";

export { loadSqlMigrations, parseMigrationFileName } from "./lib/sql-file-loader";

export {
  CancelledError,
  DriftDetectedError,
  ExecutionFailureError,
  InvalidCatalogError,
  LedgerEntryNotFoundError,
  LockHeldError,
  MigrationError,
  PrecheckViolationError,
  TimeoutError,
  WriteConflictError,
  type DriftRecord,
  type MigrationErrorCode,
  type Violation,
  type ViolationKind,
} from "./lib/errors";

export {
  BaseLogger,
  ConsoleLogger,
  MutableLogger,
  consoleLogger,
  type LogData,
  type LogDataInput,
  type LogLevel,
  type LogStage,
  type Logger,
} from "./lib/logger";

export type { SqlClient, SqlPool, SqlResult, SqlSession } from "./lib/database";
