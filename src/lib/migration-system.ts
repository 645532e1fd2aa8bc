import { type SqlPool } from "./database";
import { type ApplyOptions, type ApplyResult, Executor } from "./executor";
import { type LedgerEntry, PostgresLedgerStore } from "./ledger-store";
import { type Logger, consoleLogger } from "./logger";
import { MigrationLock } from "./migration-lock";
import { type MigrationUnit, validateCatalog } from "./migration-unit";
import { type Plan, planMigrations } from "./planner";
import { type DryRunReport, type VerifierMode, Verifier } from "./verifier";

/**
 * Migration engine facade: ordered units, a ledger table, a run-level lock,
 * and an optional verifier.
 */

export interface MigrationManagerOptions {
  ledgerTable?: string;
  lockTable?: string;
  /** Seconds an unrenewed lock stays valid (defaults to 300) */
  lockTtlSeconds?: number;
  /** Seconds between lock renewals (defaults to 60) */
  lockRenewalSeconds?: number;
  /** Per-unit budget; no client-side timeout when omitted */
  unitTimeoutMs?: number;
  /** Verify each unit while applying it. Off by default. */
  verify?: VerifierMode | false;
}

export type UnitState = "applied" | "pending" | "drifted" | "orphaned";

export interface MigrationStatus {
  id: string;
  name: string;
  state: UnitState;
  checksum: string;
  appliedAt: Date | null;
  executionMs: number | null;
}

export interface UpResult extends ApplyResult {
  previouslyApplied: string[];
}

export class MigrationManager {
  private logger: Logger;
  private migrations: MigrationUnit[] = [];
  private ledger: PostgresLedgerStore;
  private lock: MigrationLock;
  private verifier: Verifier;
  private executor: Executor;

  /**
   * @param pool Database connection pool (a `pg` Pool works as is)
   * @param logger Logger instance (defaults to console logger)
   */
  constructor(
    pool: SqlPool,
    logger: Logger = consoleLogger,
    opts: MigrationManagerOptions = {},
  ) {
    this.logger = logger;
    this.ledger = new PostgresLedgerStore(pool, { tableName: opts.ledgerTable });
    this.lock = new MigrationLock(pool, logger, {
      tableName: opts.lockTable,
      ttlSeconds: opts.lockTtlSeconds,
      renewalSeconds: opts.lockRenewalSeconds,
    });
    this.verifier = new Verifier(pool, logger, {
      mode: opts.verify || "dry-run",
    });
    this.executor = new Executor(pool, this.ledger, this.lock, logger, {
      verifier: opts.verify ? this.verifier : undefined,
      unitTimeoutMs: opts.unitTimeoutMs,
    });
  }

  /**
   * Register the migration catalog
   * @throws InvalidCatalogError if ids are duplicated or not ascending
   */
  register(migrations: MigrationUnit[]): void {
    validateCatalog(migrations);
    this.migrations = [...migrations];
  }

  get catalog(): readonly MigrationUnit[] {
    return this.migrations;
  }

  /**
   * Compute pending units against the ledger
   * @throws DriftDetectedError
   */
  async plan(): Promise<Plan> {
    const entries = await this.ledger.listEntries();
    return planMigrations(this.migrations, entries, this.logger);
  }

  /**
   * Apply all pending units in order
   */
  async up(opts: ApplyOptions = {}): Promise<UpResult> {
    const plan = await this.plan();

    if (plan.units.length > 0) {
      this.logger.info({
        stage: "plan",
        message: `Pending migrations: ${plan.units.map((u) => u.id).join(", ")}`,
      });
    }

    const result = await this.executor.apply(plan, opts);

    return {
      ...result,
      previouslyApplied: [...plan.alreadyApplied, ...result.skippedUnitIds],
    };
  }

  /**
   * Apply pending units in a throwaway transaction and report what would fail
   */
  async dryRun(): Promise<DryRunReport> {
    const plan = await this.plan();
    return this.verifier.dryRun(plan.units);
  }

  /**
   * State of every catalog unit, followed by ledger entries unknown to the catalog
   */
  async status(): Promise<MigrationStatus[]> {
    const entries = await this.ledger.listEntries();
    const byId = new Map<string, LedgerEntry>(
      entries.map((entry) => [entry.unitId, entry]),
    );

    const rows: MigrationStatus[] = this.migrations.map((unit): MigrationStatus => {
      const entry = byId.get(unit.id);
      byId.delete(unit.id);

      if (!entry) {
        return {
          id: unit.id,
          name: unit.name,
          state: "pending",
          checksum: unit.checksum,
          appliedAt: null,
          executionMs: null,
        };
      }

      return {
        id: unit.id,
        name: unit.name,
        state: entry.checksum === unit.checksum ? "applied" : "drifted",
        checksum: entry.checksum,
        appliedAt: entry.appliedAt,
        executionMs: entry.executionMs,
      };
    });

    for (const entry of byId.values()) {
      rows.push({
        id: entry.unitId,
        name: entry.name,
        state: "orphaned",
        checksum: entry.checksum,
        appliedAt: entry.appliedAt,
        executionMs: entry.executionMs,
      });
    }

    return rows;
  }

  /**
   * Direct access to the ledger, e.g. for `get(unitId)`
   */
  get ledgerStore(): PostgresLedgerStore {
    return this.ledger;
  }
}
