import { type QueryResultRow } from "pg";
import {
  type SqlClient,
  type SqlPool,
  assertSafeTableName,
  isAlreadyCreated,
} from "./database";
import { LedgerEntryNotFoundError, WriteConflictError } from "./errors";

export interface LedgerEntry {
  unitId: string;
  name: string;
  checksum: string;
  appliedAt: Date;
  executionMs: number;
}

/**
 * Persistent record of applied migration units
 */
export interface LedgerStore {
  ensureReady(): Promise<void>;

  /**
   * Record a unit as applied. Pass the unit's transaction client so the write
   * commits or rolls back together with the unit's effects.
   * @throws WriteConflictError when the unit is already recorded
   */
  recordApplied(
    unitId: string,
    checksum: string,
    appliedAt: Date,
    opts?: { client?: SqlClient; name?: string; executionMs?: number },
  ): Promise<LedgerEntry>;

  listApplied(): Promise<Set<string>>;

  listEntries(): Promise<LedgerEntry[]>;

  /**
   * @throws LedgerEntryNotFoundError
   */
  get(unitId: string): Promise<LedgerEntry>;
}

function toDate(value: unknown): Date {
  return value instanceof Date ? value : new Date(String(value));
}

function toLedgerEntry(row: QueryResultRow): LedgerEntry {
  return {
    unitId: String(row.unit_id),
    name: String(row.name),
    checksum: String(row.checksum),
    appliedAt: toDate(row.applied_at),
    executionMs: Number(row.execution_ms),
  };
}

/**
 * Ledger kept in a PostgreSQL table
 */
export class PostgresLedgerStore implements LedgerStore {
  static readonly DEFAULT_TABLE = "migration_ledger";

  private pool: SqlPool;
  private table: string;
  private initialized = false;

  constructor(pool: SqlPool, opts?: { tableName?: string }) {
    this.pool = pool;
    this.table = assertSafeTableName(
      opts?.tableName ?? PostgresLedgerStore.DEFAULT_TABLE,
    );
  }

  get tableName(): string {
    return this.table;
  }

  async ensureReady(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          unit_id VARCHAR(255) PRIMARY KEY,
          name TEXT NOT NULL,
          checksum VARCHAR(64) NOT NULL,
          applied_at TIMESTAMPTZ NOT NULL,
          execution_ms INTEGER NOT NULL DEFAULT 0
        )
      `);
    } catch (error: unknown) {
      if (!isAlreadyCreated(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  async recordApplied(
    unitId: string,
    checksum: string,
    appliedAt: Date,
    opts: { client?: SqlClient; name?: string; executionMs?: number } = {},
  ): Promise<LedgerEntry> {
    await this.ensureReady();

    const client = opts.client ?? this.pool;
    const { rows } = await client.query(
      `
      INSERT INTO ${this.table} (unit_id, name, checksum, applied_at, execution_ms)
      VALUES ($1, $2, $3, $4, $5)
      ON CONFLICT (unit_id) DO NOTHING
      RETURNING unit_id, name, checksum, applied_at, execution_ms
      `,
      [
        unitId,
        opts.name ?? unitId,
        checksum,
        appliedAt.toISOString(),
        Math.round(opts.executionMs ?? 0),
      ],
    );

    const row = rows[0];
    if (!row) {
      throw new WriteConflictError(unitId);
    }

    return toLedgerEntry(row);
  }

  async listApplied(): Promise<Set<string>> {
    await this.ensureReady();

    const { rows } = await this.pool.query(
      `SELECT unit_id FROM ${this.table}`,
    );

    return new Set(rows.map((row) => String(row.unit_id)));
  }

  async listEntries(): Promise<LedgerEntry[]> {
    await this.ensureReady();

    const { rows } = await this.pool.query(`
      SELECT unit_id, name, checksum, applied_at, execution_ms
      FROM ${this.table}
      ORDER BY unit_id COLLATE "C"
    `);

    return rows.map(toLedgerEntry);
  }

  async get(unitId: string): Promise<LedgerEntry> {
    await this.ensureReady();

    const { rows } = await this.pool.query(
      `
      SELECT unit_id, name, checksum, applied_at, execution_ms
      FROM ${this.table}
      WHERE unit_id = $1
      `,
      [unitId],
    );

    const row = rows[0];
    if (!row) {
      throw new LedgerEntryNotFoundError(unitId);
    }

    return toLedgerEntry(row);
  }
}
