import { type SqlClient, type SqlPool } from "./database";
import {
  type Violation,
  type ViolationKind,
  sqlStateOf,
} from "./errors";
import {
  type Logger,
  consoleLogger,
  createPrefixedLogger,
  describeError,
} from "./logger";
import { type MigrationUnit, runForwardAction } from "./migration-unit";
import { createSchemaHelpers } from "./schema-helpers";

/**
 * `dry-run`: violations are reported but never block a unit.
 * `enforce`: a violation stops the Executor from applying the unit.
 */
export type VerifierMode = "dry-run" | "enforce";

export type PrecheckResult = { ok: true } | { ok: false; violation: Violation };

export type DryRunUnitResult =
  | { unitId: string; ok: true }
  | { unitId: string; ok: false; violation: Violation };

export interface DryRunReport {
  ok: boolean;
  results: DryRunUnitResult[];
  /** Units not checked because an earlier unit failed outright */
  notReached: string[];
}

const ALREADY_EXISTS_STATES = new Set([
  "42P07", // duplicate_table
  "42710", // duplicate_object
  "42723", // duplicate_function
  "42701", // duplicate_column
  "42P06", // duplicate_schema
]);

const MISSING_OBJECT_STATES = new Set([
  "42P01", // undefined_table
  "42704", // undefined_object
  "42883", // undefined_function
  "42703", // undefined_column
  "3F000", // invalid_schema_name
]);

export function classifyViolation(sqlState: string | undefined): ViolationKind {
  if (sqlState && ALREADY_EXISTS_STATES.has(sqlState)) {
    return "already-exists";
  }

  if (sqlState && MISSING_OBJECT_STATES.has(sqlState)) {
    return "missing-object";
  }

  return "failed";
}

function toViolation(unitId: string, error: unknown): Violation {
  const sqlState = sqlStateOf(error);

  return {
    unitId,
    kind: classifyViolation(sqlState),
    message: describeError(error),
    sqlState,
  };
}

const PRECHECK_SAVEPOINT = "migration_precheck";

/**
 * Runs units in transactions that are always rolled back, to catch actions
 * that cannot be applied twice (missing IF EXISTS / IF NOT EXISTS guards).
 */
export class Verifier {
  private pool: SqlPool;
  private logger: Logger;
  readonly mode: VerifierMode;

  constructor(
    pool: SqlPool,
    logger: Logger = consoleLogger,
    opts: { mode?: VerifierMode } = {},
  ) {
    this.pool = pool;
    this.logger = logger;
    this.mode = opts.mode ?? "dry-run";
  }

  /**
   * Check that a unit survives being applied twice.
   *
   * Without `scope` the unit runs in a fresh transaction and is then re-run in a
   * savepoint. With `scope` (an open transaction in which the unit has already
   * run) only the re-run happens. Either way nothing is kept.
   */
  async precheck(
    unit: MigrationUnit,
    scope?: SqlClient,
  ): Promise<PrecheckResult> {
    if (scope) {
      return this.rerunInSavepoint(unit, scope);
    }

    const session = await this.pool.connect();

    try {
      await session.query("BEGIN");

      try {
        const first = await this.runOnce(unit, session);
        if (!first.ok) {
          return first;
        }

        return await this.rerunInSavepoint(unit, session);
      } finally {
        await session.query("ROLLBACK");
      }
    } finally {
      session.release();
    }
  }

  /**
   * Check a whole plan in one throwaway transaction, so each unit sees the
   * effects of the ones before it. Stops at the first unit that cannot run.
   */
  async dryRun(units: readonly MigrationUnit[]): Promise<DryRunReport> {
    const results: DryRunUnitResult[] = [];
    const notReached: string[] = [];

    if (units.length === 0) {
      return { ok: true, results, notReached };
    }

    const session = await this.pool.connect();

    try {
      await session.query("BEGIN");

      try {
        let halted = false;

        for (const unit of units) {
          if (halted) {
            notReached.push(unit.id);
            continue;
          }

          const unitLogger = createPrefixedLogger(this.logger, {
            unit: unit.id,
            stage: "dry-run",
          });

          const first = await this.runOnce(unit, session);
          if (!first.ok) {
            unitLogger.error({
              message: `Unit cannot be applied: ${first.violation.message}`,
            });
            results.push({ unitId: unit.id, ...first });
            halted = true;
            continue;
          }

          const rerun = await this.rerunInSavepoint(unit, session);
          if (rerun.ok) {
            unitLogger.info({ message: "Unit applies cleanly and is re-runnable" });
          } else {
            unitLogger.warn({
              message: `Unit is not re-runnable (${rerun.violation.kind}): ${rerun.violation.message}`,
            });
          }
          results.push({ unitId: unit.id, ...rerun });
        }
      } finally {
        await session.query("ROLLBACK");
      }
    } finally {
      session.release();
    }

    return {
      ok: notReached.length === 0 && results.every((result) => result.ok),
      results,
      notReached,
    };
  }

  /**
   * Run the action inside a savepoint; on failure the savepoint is rolled back
   * so the surrounding transaction stays usable.
   */
  private async runOnce(
    unit: MigrationUnit,
    client: SqlClient,
  ): Promise<PrecheckResult> {
    await client.query(`SAVEPOINT ${PRECHECK_SAVEPOINT}`);

    try {
      await runForwardAction(unit, client, this.helpersFor(unit));
      await client.query(`RELEASE SAVEPOINT ${PRECHECK_SAVEPOINT}`);
      return { ok: true };
    } catch (error: unknown) {
      await client.query(`ROLLBACK TO SAVEPOINT ${PRECHECK_SAVEPOINT}`);
      await client.query(`RELEASE SAVEPOINT ${PRECHECK_SAVEPOINT}`);
      return { ok: false, violation: toViolation(unit.id, error) };
    }
  }

  private async rerunInSavepoint(
    unit: MigrationUnit,
    client: SqlClient,
  ): Promise<PrecheckResult> {
    await client.query(`SAVEPOINT ${PRECHECK_SAVEPOINT}`);

    try {
      await runForwardAction(unit, client, this.helpersFor(unit));
      return { ok: true };
    } catch (error: unknown) {
      return { ok: false, violation: toViolation(unit.id, error) };
    } finally {
      await client.query(`ROLLBACK TO SAVEPOINT ${PRECHECK_SAVEPOINT}`);
      await client.query(`RELEASE SAVEPOINT ${PRECHECK_SAVEPOINT}`);
    }
  }

  private helpersFor(unit: MigrationUnit) {
    return createSchemaHelpers(this.logger, {
      unit: unit.id,
      stage: "precheck",
    });
  }
}
