import { type SqlClient, type SqlPool, type SqlSession } from "./database";
import {
  CancelledError,
  ExecutionFailureError,
  LockHeldError,
  MigrationError,
  PrecheckViolationError,
  TimeoutError,
} from "./errors";
import { type LedgerStore } from "./ledger-store";
import {
  type Logger,
  consoleLogger,
  createPrefixedLogger,
  describeError,
} from "./logger";
import { type MigrationLock } from "./migration-lock";
import { type MigrationUnit, runForwardAction } from "./migration-unit";
import { type Plan } from "./planner";
import { createSchemaHelpers } from "./schema-helpers";
import { type Verifier } from "./verifier";

export interface ExecutorOptions {
  /** Consulted after each forward action, inside the unit's transaction */
  verifier?: Verifier;
  /**
   * Per-unit budget in milliseconds. Applied server-side as
   * `statement_timeout` and client-side as a timer on the whole unit.
   */
  unitTimeoutMs?: number;
}

export interface ApplyOptions {
  /** Checked between units; a unit that has started always runs to the end */
  signal?: AbortSignal;
}

export interface ApplyResult {
  appliedCount: number;
  appliedUnitIds: string[];
  /** Plan units found in the ledger once the lock was held */
  skippedUnitIds: string[];
}

/**
 * Applies a plan one unit at a time. Each unit's forward action, precheck and
 * ledger write share one transaction.
 */
export class Executor {
  private pool: SqlPool;
  private ledger: LedgerStore;
  private lock: MigrationLock;
  private logger: Logger;
  private verifier?: Verifier;
  private unitTimeoutMs?: number;

  constructor(
    pool: SqlPool,
    ledger: LedgerStore,
    lock: MigrationLock,
    logger: Logger = consoleLogger,
    opts: ExecutorOptions = {},
  ) {
    if (opts.unitTimeoutMs !== undefined && !(opts.unitTimeoutMs > 0)) {
      throw new Error(
        `unitTimeoutMs must be a positive number, got ${opts.unitTimeoutMs}`,
      );
    }

    this.pool = pool;
    this.ledger = ledger;
    this.lock = lock;
    this.logger = logger;
    this.verifier = opts.verifier;
    this.unitTimeoutMs = opts.unitTimeoutMs;
  }

  /**
   * @throws LockHeldError when another run is in progress
   * @throws ExecutionFailureError (or TimeoutError / PrecheckViolationError) for a failed unit
   * @throws WriteConflictError when another writer recorded the unit first
   * @throws CancelledError when the signal fires between units
   */
  async apply(plan: Plan, opts: ApplyOptions = {}): Promise<ApplyResult> {
    await this.ledger.ensureReady();

    const attempt = await this.lock.acquire();
    if (!attempt.acquired) {
      throw new LockHeldError(attempt.holder, attempt.expiresAt);
    }

    const appliedUnitIds: string[] = [];
    const skippedUnitIds: string[] = [];

    try {
      // The plan may predate this lock; the ledger decides what already ran
      const applied = await this.ledger.listApplied();

      for (const unit of plan.units) {
        if (applied.has(unit.id)) {
          this.logger.info({
            unit: unit.id,
            stage: "execute",
            message: "Already recorded in the ledger, skipping",
          });
          skippedUnitIds.push(unit.id);
          continue;
        }

        if (opts.signal?.aborted) {
          this.logger.warn({
            stage: "execute",
            message: `Cancelled before ${unit.id}`,
          });
          throw new CancelledError([...appliedUnitIds]);
        }

        const ownership = await this.lock.confirm();
        if (!ownership.acquired) {
          throw new LockHeldError(ownership.holder, ownership.expiresAt);
        }

        await this.applyUnit(unit);
        appliedUnitIds.push(unit.id);
      }
    } catch (error: unknown) {
      this.logger.error({
        stage: "execute",
        message: `Migration run halted after applying ${appliedUnitIds.length} unit(s)`,
        error,
      });
      throw error;
    } finally {
      await this.lock.release();
    }

    return {
      appliedCount: appliedUnitIds.length,
      appliedUnitIds,
      skippedUnitIds,
    };
  }

  private async applyUnit(unit: MigrationUnit): Promise<void> {
    const unitLogger = createPrefixedLogger(this.logger, {
      unit: unit.id,
      stage: "execute",
    });
    const startedAt = Date.now();

    unitLogger.info({ message: `Applying ${unit.name}` });

    const session = await this.pool.connect();

    // Work still in flight after a timeout must not reach the released session
    let open = true;
    const scoped: SqlClient = {
      query: (text, values) =>
        open
          ? session.query(text, values)
          : Promise.reject(
              new ExecutionFailureError(
                unit.id,
                `Query issued by ${unit.id} after its transaction ended`,
              ),
            ),
    };

    try {
      await session.query("BEGIN");

      try {
        if (this.unitTimeoutMs !== undefined) {
          await session.query(
            `SET LOCAL statement_timeout = ${Math.ceil(this.unitTimeoutMs)}`,
          );
        }

        await this.withUnitTimeout(
          unit,
          this.runInTransaction(unit, scoped, unitLogger, startedAt),
        );
      } catch (error: unknown) {
        open = false;
        await this.rollback(session, unitLogger);
        unitLogger.error({ message: "Unit failed and was rolled back", error });
        throw toExecutionFailure(unit, error);
      }

      try {
        await session.query("COMMIT");
      } catch (error: unknown) {
        throw new ExecutionFailureError(
          unit.id,
          `Commit failed for ${unit.id} after its action succeeded; inspect the database before re-running`,
          { cause: error, fatal: true },
        );
      }
    } finally {
      open = false;
      session.release();
    }

    unitLogger.info({
      message: `Applied in ${Date.now() - startedAt}ms`,
    });
  }

  private async runInTransaction(
    unit: MigrationUnit,
    client: SqlClient,
    unitLogger: Logger,
    startedAt: number,
  ): Promise<void> {
    const helpers = createSchemaHelpers(this.logger, { unit: unit.id });

    await runForwardAction(unit, client, helpers);

    if (this.verifier) {
      const result = await this.verifier.precheck(unit, client);

      if (!result.ok) {
        if (this.verifier.mode === "enforce") {
          throw new PrecheckViolationError(result.violation);
        }

        unitLogger.warn({
          stage: "precheck",
          message: `Unit is not re-runnable (${result.violation.kind}): ${result.violation.message}`,
        });
      }
    }

    await this.ledger.recordApplied(unit.id, unit.checksum, new Date(), {
      client,
      name: unit.name,
      executionMs: Date.now() - startedAt,
    });
  }

  private async withUnitTimeout(
    unit: MigrationUnit,
    work: Promise<void>,
  ): Promise<void> {
    const timeoutMs = this.unitTimeoutMs;
    if (timeoutMs === undefined) {
      return work;
    }

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(
        () => reject(new TimeoutError(unit.id, timeoutMs)),
        timeoutMs,
      );
    });

    try {
      await Promise.race([work, timeout]);
    } finally {
      clearTimeout(timer);
    }
  }

  private async rollback(session: SqlSession, unitLogger: Logger): Promise<void> {
    try {
      await session.query("ROLLBACK");
    } catch (error: unknown) {
      // The unit error is rethrown by the caller; this one is only logged
      unitLogger.error({
        message: `Rollback failed: ${describeError(error)}`,
        error,
      });
    }
  }
}

function toExecutionFailure(unit: MigrationUnit, error: unknown): MigrationError {
  if (error instanceof MigrationError) {
    return error;
  }

  return new ExecutionFailureError(
    unit.id,
    `Migration ${unit.id} failed: ${describeError(error)}`,
    { cause: error },
  );
}
