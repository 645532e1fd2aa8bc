import { randomUUID } from "crypto";
import {
  type SqlPool,
  assertSafeTableName,
  isAlreadyCreated,
} from "./database";
import { type Logger, consoleLogger, createPrefixedLogger } from "./logger";

export interface MigrationLockOptions {
  tableName?: string;
  /** How long an unrenewed lock stays valid (defaults to 300) */
  ttlSeconds?: number;
  /** Seconds between renewals while the lock is held (defaults to 60) */
  renewalSeconds?: number;
  /** Identifier written to `locked_by`; generated when omitted */
  ownerId?: string;
}

export type LockAttempt =
  | { acquired: true; ownerId: string; expiresAt: Date }
  | { acquired: false; holder?: string; expiresAt?: Date };

/**
 * Run-level "migration in progress" lock. It is a row in a lock table, so it
 * survives across connections. A run that dies leaves a row that expires after
 * the TTL, after which another run may take it over.
 */
export class MigrationLock {
  static readonly DEFAULT_TABLE = "migration_lock";
  private static readonly LOCK_NAME = "database_migrations";

  private pool: SqlPool;
  private logger: Logger;
  private table: string;
  private ttlSeconds: number;
  private renewalSeconds: number;
  private ownerId: string;
  private held = false;
  private renewalInterval: NodeJS.Timeout | null = null;
  private initialized = false;

  constructor(
    pool: SqlPool,
    logger: Logger = consoleLogger,
    opts: MigrationLockOptions = {},
  ) {
    this.pool = pool;
    this.logger = createPrefixedLogger(logger, { stage: "lock" });
    this.table = assertSafeTableName(
      opts.tableName ?? MigrationLock.DEFAULT_TABLE,
    );
    this.ttlSeconds = opts.ttlSeconds ?? 300;
    this.renewalSeconds = opts.renewalSeconds ?? 60;
    this.ownerId =
      opts.ownerId ??
      `${process.env.HOSTNAME || "unknown"}-${process.pid}-${randomUUID()}`;
  }

  get owner(): string {
    return this.ownerId;
  }

  isHeld(): boolean {
    return this.held;
  }

  async ensureReady(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await this.pool.query(`
        CREATE TABLE IF NOT EXISTS ${this.table} (
          lock_name VARCHAR(100) PRIMARY KEY,
          locked_by TEXT NOT NULL,
          locked_at TIMESTAMPTZ NOT NULL,
          lock_expires_at TIMESTAMPTZ NOT NULL
        )
      `);
    } catch (error: unknown) {
      if (!isAlreadyCreated(error)) {
        throw error;
      }
    }

    this.initialized = true;
  }

  private expiryFrom(now: Date): Date {
    return new Date(now.getTime() + this.ttlSeconds * 1000);
  }

  /**
   * Try to take the lock. Never waits for a current holder.
   */
  async acquire(): Promise<LockAttempt> {
    await this.ensureReady();

    const now = new Date();
    const expiresAt = this.expiryFrom(now);

    // Inserts a fresh row, or takes over one whose holder let it expire
    const { rows } = await this.pool.query(
      `
      INSERT INTO ${this.table} (lock_name, locked_by, locked_at, lock_expires_at)
      VALUES ($1, $2, $3, $4)
      ON CONFLICT (lock_name) DO UPDATE
        SET locked_by = EXCLUDED.locked_by,
            locked_at = EXCLUDED.locked_at,
            lock_expires_at = EXCLUDED.lock_expires_at
        WHERE ${this.table}.lock_expires_at < EXCLUDED.locked_at
      RETURNING locked_by
      `,
      [
        MigrationLock.LOCK_NAME,
        this.ownerId,
        now.toISOString(),
        expiresAt.toISOString(),
      ],
    );

    if (rows.length === 0) {
      const current = await this.pool.query(
        `SELECT locked_by, lock_expires_at FROM ${this.table} WHERE lock_name = $1`,
        [MigrationLock.LOCK_NAME],
      );
      const row = current.rows[0];

      if (!row) {
        return { acquired: false };
      }

      const holderExpiry = new Date(row.lock_expires_at);
      this.logger.info({
        message: `Migration lock is held by ${row.locked_by} and will expire in ${Math.round((holderExpiry.getTime() - now.getTime()) / 1000)} seconds`,
      });

      return {
        acquired: false,
        holder: String(row.locked_by),
        expiresAt: holderExpiry,
      };
    }

    this.held = true;
    this.logger.info({
      message: `Acquired migration lock (${this.ownerId}), expires at ${expiresAt.toISOString()}`,
    });
    this.startRenewal();

    return { acquired: true, ownerId: this.ownerId, expiresAt };
  }

  /**
   * Push the expiry forward. Returns false when the lock is no longer ours.
   */
  async renew(): Promise<boolean> {
    if (!this.held) {
      return false;
    }

    const expiresAt = this.expiryFrom(new Date());
    const { rows } = await this.pool.query(
      `
      UPDATE ${this.table}
      SET lock_expires_at = $1
      WHERE lock_name = $2 AND locked_by = $3
      RETURNING locked_by
      `,
      [expiresAt.toISOString(), MigrationLock.LOCK_NAME, this.ownerId],
    );

    if (rows.length > 0) {
      this.logger.info({
        message: `Renewed migration lock until ${expiresAt.toISOString()}`,
      });
      return true;
    }

    this.logger.warn({
      message:
        "Failed to renew migration lock - it may have been taken by another process",
    });
    this.held = false;
    this.stopRenewal();
    return false;
  }

  /**
   * Check with the database that the lock row is still ours. A lock lost to
   * a failed renewal or a takeover is reported with its current holder.
   */
  async confirm(): Promise<LockAttempt> {
    const { rows } = await this.pool.query(
      `SELECT locked_by, lock_expires_at FROM ${this.table} WHERE lock_name = $1`,
      [MigrationLock.LOCK_NAME],
    );
    const row = rows[0];

    if (this.held && row && String(row.locked_by) === this.ownerId) {
      return {
        acquired: true,
        ownerId: this.ownerId,
        expiresAt: new Date(row.lock_expires_at),
      };
    }

    if (this.held) {
      this.logger.warn({
        message: row
          ? `Migration lock was taken over by ${row.locked_by}`
          : "Migration lock row disappeared while the run held it",
      });
      this.held = false;
      this.stopRenewal();
    }

    return row
      ? {
          acquired: false,
          holder: String(row.locked_by),
          expiresAt: new Date(row.lock_expires_at),
        }
      : { acquired: false };
  }

  async release(): Promise<void> {
    this.stopRenewal();

    if (!this.held) {
      return;
    }

    this.held = false;

    const { rows } = await this.pool.query(
      `
      DELETE FROM ${this.table}
      WHERE lock_name = $1 AND locked_by = $2
      RETURNING locked_by
      `,
      [MigrationLock.LOCK_NAME, this.ownerId],
    );

    if (rows.length > 0) {
      this.logger.info({ message: "Released migration lock" });
    } else {
      this.logger.warn({
        message:
          "Could not release migration lock - it may have been acquired by another process",
      });
    }
  }

  private startRenewal(): void {
    this.stopRenewal();

    this.renewalInterval = setInterval(() => {
      this.renew().catch((error: unknown) => {
        this.logger.error({ message: "Error renewing migration lock:", error });
      });
    }, this.renewalSeconds * 1000);

    // Ensure the interval doesn't keep the process alive
    this.renewalInterval.unref();
  }

  private stopRenewal(): void {
    if (this.renewalInterval) {
      clearInterval(this.renewalInterval);
      this.renewalInterval = null;
    }
  }
}
