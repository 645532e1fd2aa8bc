import { PGlite } from "@electric-sql/pglite";
import { type QueryResultRow } from "pg";
import {
  type SqlPool,
  type SqlResult,
  type SqlSession,
} from "../database";
import { type LogDataInput, BaseLogger } from "../logger";
import { MigrationManager } from "../migration-system";
import { type MigrationUnit } from "../migration-unit";

/**
 * Logger function type
 */
export type LoggerFunction = (
  type: "info" | "error" | "warn" | "migrate",
  message: string,
) => void;

/**
 * Console-based logger implementation for TestDatabaseInstance
 * @param migrateVerbose Whether to log verbose migration messages
 */
export const createTestDBConsoleLogger = (
  migrateVerbose: boolean = true,
): LoggerFunction => {
  return (type, message) => {
    switch (type) {
      case "info":
        console.log(message);
        break;
      case "error":
        console.error(message);
        break;
      case "warn":
        console.warn(message);
        break;
      case "migrate":
        if (migrateVerbose) {
          console.log(`[MIGRATE] ${message}`);
        }
        break;
    }
  };
};

/**
 * Adapter that routes engine log entries to a LoggerFunction
 * @internal
 */
class TestDBMigrationLogger extends BaseLogger {
  private testDbLogger?: LoggerFunction;

  constructor(logger?: LoggerFunction) {
    super();
    this.testDbLogger = logger;
  }

  private format(data: LogDataInput): string {
    const prefix = [data.unit, data.stage]
      .filter((part): part is string => Boolean(part))
      .map((part) => `[${part}]`)
      .join(" ");
    return prefix ? `${prefix} ${data.message}` : data.message;
  }

  info(data: LogDataInput): void {
    this.testDbLogger?.("migrate", this.format(data));
  }

  error(data: LogDataInput): void {
    this.testDbLogger?.("error", this.format(data));
  }

  warn(data: LogDataInput): void {
    this.testDbLogger?.("warn", this.format(data));
  }
}

const BEGIN_PATTERN = /^\s*(BEGIN|START\s+TRANSACTION)\b/i;
const END_PATTERN = /^\s*(COMMIT|END|ROLLBACK)\s*;?\s*$/i;

/**
 * SqlPool over a single in-process PGlite database.
 *
 * PGlite has one backend, so sessions cannot run transactions side by side.
 * While a session has a transaction open, statements from every other session
 * wait until it commits or rolls back, much like a server blocking on locks.
 */
export class PGlitePool implements SqlPool {
  private db: PGlite;
  private holder: object | null = null;
  private idle: Promise<void> = Promise.resolve();
  private wake: () => void = () => {};

  constructor(db: PGlite) {
    this.db = db;
  }

  get closed(): boolean {
    return this.db.closed;
  }

  async run(
    caller: object,
    text: string,
    values?: unknown[],
  ): Promise<SqlResult> {
    while (this.holder !== null && this.holder !== caller) {
      await this.idle;
    }

    const begins = BEGIN_PATTERN.test(text);
    if (begins) {
      this.holder = caller;
      this.idle = new Promise<void>((resolve) => {
        this.wake = resolve;
      });
    }

    try {
      return await this.execute(text, values);
    } catch (error: unknown) {
      if (begins) {
        this.releaseGate(caller);
      }
      throw error;
    } finally {
      if (END_PATTERN.test(text) && this.holder === caller) {
        this.releaseGate(caller);
      }
    }
  }

  releaseGate(caller: object): void {
    if (this.holder === caller) {
      this.holder = null;
      this.wake();
    }
  }

  private async execute(text: string, values?: unknown[]): Promise<SqlResult> {
    // Parameterless text may hold several statements; only exec accepts those
    if (!values || values.length === 0) {
      const results = await this.db.exec(text);
      const last = results[results.length - 1];

      return {
        rows: last ? last.rows : [],
        rowCount: last?.affectedRows ?? null,
      };
    }

    const result = await this.db.query<QueryResultRow>(text, values);
    return { rows: result.rows, rowCount: result.affectedRows ?? null };
  }

  query(text: string, values?: unknown[]): Promise<SqlResult> {
    return this.run({}, text, values);
  }

  async connect(): Promise<SqlSession> {
    const token = {};

    return {
      query: (text, values) => this.run(token, text, values),
      release: () => this.releaseGate(token),
    };
  }

  async end(): Promise<void> {
    if (!this.db.closed) {
      await this.db.close();
    }
  }
}

interface TestDatabaseOptions {
  logger?: LoggerFunction;
  migrations?: MigrationUnit[];
}

/**
 * In-process PostgreSQL (PGlite) for tests, optionally pre-migrated
 */
export class TestDatabaseInstance {
  private pool?: PGlitePool;
  private logger?: LoggerFunction;
  private migrations?: MigrationUnit[];
  private migrationsApplied = false;

  constructor(options: TestDatabaseOptions = {}) {
    this.logger = options.logger;
    this.migrations = options.migrations;
  }

  /**
   * Create and start an instance
   */
  static async create(
    options: TestDatabaseOptions = {},
  ): Promise<TestDatabaseInstance> {
    const instance = new TestDatabaseInstance(options);
    await instance.start();
    return instance;
  }

  private log(type: "info" | "error" | "warn", message: string): void {
    if (this.logger) {
      this.logger(type, message);
    }
  }

  public isReady(): boolean {
    return !!this.pool && !this.pool.closed;
  }

  public async start(): Promise<void> {
    if (this.pool) {
      return;
    }

    this.log("info", "Starting PGlite for tests");
    this.pool = new PGlitePool(await PGlite.create());

    await this.applyMigrations();
  }

  /**
   * @throws Error when the database has not been started
   */
  public getPool(): PGlitePool {
    if (!this.pool) {
      throw new Error("Database not started. Call start() first.");
    }

    return this.pool;
  }

  private async applyMigrations(): Promise<void> {
    if (this.migrationsApplied) {
      return;
    }

    if (!this.migrations || this.migrations.length === 0) {
      this.migrationsApplied = true;
      return;
    }

    const manager = new MigrationManager(
      this.getPool(),
      new TestDBMigrationLogger(this.logger),
    );
    manager.register(this.migrations);

    const result = await manager.up();
    this.log("info", `Applied ${result.appliedCount} migrations`);
    this.migrationsApplied = true;
  }

  /**
   * Drop and recreate the public schema, then reapply the configured migrations
   */
  public async reset(): Promise<void> {
    await this.getPool().query(`
      DROP SCHEMA public CASCADE;
      CREATE SCHEMA public;
    `);

    this.migrationsApplied = false;
    await this.applyMigrations();
  }

  public async stop(): Promise<void> {
    if (!this.pool) {
      return;
    }

    this.log("info", "Stopping test database...");
    await this.pool.end();
    this.pool = undefined;
    this.migrationsApplied = false;
  }
}
